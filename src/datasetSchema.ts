import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { REDUCERS } from './types.js';
import type { AnalyticOperation, Reducer } from './types.js';

const dimensionSchema = z.object({
  name: z.string().regex(/^[a-z_][a-z0-9_]*$/),
  label: z.string(),
  synonyms: z.array(z.string()).default([]),
  values: z.array(z.string()).min(1),
  aliases: z.record(z.string(), z.string()).default({}),
});

const metricSchema = z.object({
  label: z.string(),
  kind: z.enum(['count', 'currency', 'rate']),
  column: z.string().optional(),
  numerator: z.enum(['failed', 'fraud', 'review']).optional(),
  reducers: z.array(z.enum(REDUCERS)),
  defaultReducer: z.enum(REDUCERS),
  precision: z.number().int().min(0).max(6),
  synonyms: z.array(z.string()).default([]),
});

const schemaFileSchema = z
  .object({
    version: z.string(),
    table: z.string().regex(/^[a-z_][a-z0-9_]*$/),
    timestampColumn: z.string().regex(/^[a-z_][a-z0-9_]*$/),
    failedStatus: z.string(),
    rangeColumns: z.array(z.string()),
    dimensions: z.array(dimensionSchema).min(1),
    metrics: z.record(z.string(), metricSchema),
  })
  .superRefine((file, ctx) => {
    for (const dimension of file.dimensions) {
      for (const [alias, target] of Object.entries(dimension.aliases)) {
        if (!dimension.values.includes(target)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Alias "${alias}" of ${dimension.name} points at unknown value "${target}"`,
          });
        }
      }
    }
    const status = file.dimensions.find((d) => d.name === 'status');
    if (!status || !status.values.includes(file.failedStatus)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `failedStatus "${file.failedStatus}" is not a status value`,
      });
    }
    for (const [name, metric] of Object.entries(file.metrics)) {
      if (metric.kind === 'rate' && !metric.numerator) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Rate metric ${name} needs a numerator` });
      }
      if (metric.kind === 'currency' && !metric.column) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Currency metric ${name} needs a column` });
      }
    }
  });

export type DimensionDefinition = z.infer<typeof dimensionSchema>;
export type MetricDefinition = z.infer<typeof metricSchema>;
export type SchemaFile = z.infer<typeof schemaFileSchema>;

export const ANALYTIC_OPERATIONS: readonly AnalyticOperation[] = [
  'failure_rate',
  'aggregate',
  'compare_segments',
  'time_series',
  'top_failure_codes',
  'executive_summary',
];

/**
 * Read-only view over the versioned transaction schema. Every column, value
 * and metric an Intent mentions has to resolve here or the Intent is invalid.
 */
export class DatasetSchema {
  private readonly dimensionsByName: Map<string, DimensionDefinition>;

  constructor(private readonly file: SchemaFile) {
    this.dimensionsByName = new Map(file.dimensions.map((d) => [d.name, d]));
  }

  static parse(raw: unknown): DatasetSchema {
    return new DatasetSchema(schemaFileSchema.parse(raw));
  }

  static load(path: string): DatasetSchema {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
    return DatasetSchema.parse(raw);
  }

  get version(): string {
    return this.file.version;
  }

  get table(): string {
    return this.file.table;
  }

  get timestampColumn(): string {
    return this.file.timestampColumn;
  }

  get failedStatus(): string {
    return this.file.failedStatus;
  }

  get dimensions(): readonly DimensionDefinition[] {
    return this.file.dimensions;
  }

  get metricNames(): string[] {
    return Object.keys(this.file.metrics);
  }

  get rangeColumns(): readonly string[] {
    return this.file.rangeColumns;
  }

  dimension(name: string): DimensionDefinition | undefined {
    return this.dimensionsByName.get(name);
  }

  isDimension(name: string): boolean {
    return this.dimensionsByName.has(name);
  }

  isRangeColumn(name: string): boolean {
    return this.file.rangeColumns.includes(name);
  }

  metric(name: string): MetricDefinition | undefined {
    return Object.prototype.hasOwnProperty.call(this.file.metrics, name)
      ? this.file.metrics[name]
      : undefined;
  }

  /**
   * Maps a value to its permitted spelling. Matching is exact up to case,
   * or through a declared alias; there is no fuzzy matching.
   */
  canonicalValue(dimension: string, value: string): string | undefined {
    const definition = this.dimensionsByName.get(dimension);
    if (!definition) return undefined;
    const needle = value.trim().toLowerCase();
    const exact = definition.values.find((v) => v.toLowerCase() === needle);
    if (exact) return exact;
    return definition.aliases[needle];
  }

  reducersFor(metric: string): Reducer[] {
    const definition = this.metric(metric);
    return definition ? definition.reducers : [];
  }

  /** Compact description embedded in model prompts. */
  describeForPrompt(): string {
    const lines = [`Dataset schema version ${this.version} (table ${this.table})`, 'Dimensions:'];
    for (const d of this.file.dimensions) {
      lines.push(`  - ${d.name}: ${d.values.join(' | ')}`);
    }
    lines.push('Metrics:');
    for (const [name, m] of Object.entries(this.file.metrics)) {
      const reducers = m.reducers.length > 0 ? ` (reducers: ${m.reducers.join(', ')})` : '';
      lines.push(`  - ${name}: ${m.label}${reducers}`);
    }
    lines.push(`Range-filterable columns: ${this.file.rangeColumns.join(', ')}`);
    lines.push(`Operations: ${ANALYTIC_OPERATIONS.join(', ')}`);
    return lines.join('\n');
  }

  toJSON(): SchemaFile {
    return this.file;
  }
}
