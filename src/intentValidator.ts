import { z } from 'zod';
import type { DatasetSchema } from './datasetSchema.js';
import { isIsoDate, normalizeTimeRange, RELATIVE_PERIODS, resolveRelativePeriod } from './timeRange.js';
import type { RelativePeriod } from './timeRange.js';
import {
  GRANULARITIES,
  OPERATIONS,
  REDUCERS,
  type AnalyticOperation,
  type FilterConstraint,
  type Filters,
  type Granularity,
  type Intent,
  type Operation,
  type Reducer,
  type Segment,
  type TimeRange,
} from './types.js';

const filterEntrySchema = z.object({
  column: z.string(),
  values: z.array(z.union([z.string(), z.number()]).transform(String)).nullish(),
  min: z.number().nullish(),
  max: z.number().nullish(),
});

/**
 * Shape of the extractor's JSON reply. Deliberately loose on strings
 * (operation, metric, columns) so unknown terms reach the closure check
 * below instead of failing the parse.
 */
export const rawIntentSchema = z.object({
  operation: z.string().nullish(),
  metric: z.string().nullish(),
  reducer: z.string().nullish(),
  filters: z.array(filterEntrySchema).nullish(),
  group_by: z.array(z.string()).nullish(),
  time_range: z
    .object({
      start: z.string().nullish(),
      end: z.string().nullish(),
      period: z.string().nullish(),
    })
    .nullish(),
  granularity: z.string().nullish(),
  segments: z
    .array(z.object({ label: z.string().nullish(), filters: z.array(filterEntrySchema) }))
    .nullish(),
  top_k: z.number().nullish(),
  confidence: z.number().min(0).max(1),
  follow_up: z.boolean().nullish(),
  clarifying_question: z.string().nullish(),
});

export type RawIntent = z.infer<typeof rawIntentSchema>;
export type RawFilterEntry = z.infer<typeof filterEntrySchema>;

const nullable = (type: string) => ({ type: [type, 'null'] });

const filterEntryJsonSchema = {
  type: 'object',
  additionalProperties: false,
  required: ['column', 'values', 'min', 'max'],
  properties: {
    column: { type: 'string' },
    values: { type: ['array', 'null'], items: { type: 'string' } },
    min: nullable('number'),
    max: nullable('number'),
  },
};

/** JSON schema handed to the model's strict structured-output mode. */
export function buildIntentJsonSchema(): { name: string; schema: Record<string, unknown> } {
  return {
    name: 'transaction_query_intent',
    schema: {
      type: 'object',
      additionalProperties: false,
      required: [
        'operation', 'metric', 'reducer', 'filters', 'group_by', 'time_range', 'granularity',
        'segments', 'top_k', 'confidence', 'follow_up', 'clarifying_question',
      ],
      properties: {
        operation: { type: ['string', 'null'], enum: [...OPERATIONS, null] },
        metric: nullable('string'),
        reducer: { type: ['string', 'null'], enum: [...REDUCERS, null] },
        filters: { type: 'array', items: filterEntryJsonSchema },
        group_by: { type: 'array', items: { type: 'string' } },
        time_range: {
          type: ['object', 'null'],
          additionalProperties: false,
          required: ['start', 'end', 'period'],
          properties: {
            start: nullable('string'),
            end: nullable('string'),
            period: { type: ['string', 'null'], enum: [...RELATIVE_PERIODS, null] },
          },
        },
        granularity: { type: ['string', 'null'], enum: [...GRANULARITIES, null] },
        segments: {
          type: ['array', 'null'],
          items: {
            type: 'object',
            additionalProperties: false,
            required: ['label', 'filters'],
            properties: { label: nullable('string'), filters: { type: 'array', items: filterEntryJsonSchema } },
          },
        },
        top_k: nullable('integer'),
        confidence: { type: 'number' },
        follow_up: { type: 'boolean' },
        clarifying_question: nullable('string'),
      },
    },
  };
}

const DEFAULT_METRIC: Record<AnalyticOperation, string> = {
  failure_rate: 'failure_rate',
  aggregate: 'count',
  compare_segments: 'failure_rate',
  time_series: 'count',
  top_failure_codes: 'count',
  executive_summary: 'count',
};

const MAX_TOP_K = 20;

const OPERATION_NAMES: ReadonlySet<string> = new Set(OPERATIONS);
const REDUCER_NAMES: ReadonlySet<string> = new Set(REDUCERS);
const GRANULARITY_NAMES: ReadonlySet<string> = new Set(GRANULARITIES);
const PERIOD_NAMES: ReadonlySet<string> = new Set(RELATIVE_PERIODS);

function isOperation(value: string): value is Operation {
  return OPERATION_NAMES.has(value);
}

function isReducer(value: string): value is Reducer {
  return REDUCER_NAMES.has(value);
}

function isGranularity(value: string): value is Granularity {
  return GRANULARITY_NAMES.has(value);
}

function isRelativePeriod(value: string): value is RelativePeriod {
  return PERIOD_NAMES.has(value);
}

export function describeConstraint(column: string, constraint: FilterConstraint): string {
  switch (constraint.op) {
    case 'eq':
      return `${column} = ${constraint.value}`;
    case 'in':
      return `${column} in (${constraint.values.join(', ')})`;
    case 'range':
      if (constraint.min !== undefined && constraint.max !== undefined) {
        return `${column} between ${constraint.min} and ${constraint.max}`;
      }
      return constraint.min !== undefined ? `${column} >= ${constraint.min}` : `${column} <= ${constraint.max}`;
  }
}

export function describeFilters(filters: Filters): string[] {
  return Object.keys(filters)
    .sort()
    .map((column) => describeConstraint(column, filters[column]));
}

/** Readable name for a segment, e.g. "Android" or "iOS, 5G". */
export function segmentLabel(filters: Filters): string {
  const parts = Object.keys(filters)
    .sort()
    .map((column) => {
      const constraint = filters[column];
      if (constraint.op === 'eq') return constraint.value;
      if (constraint.op === 'in') return constraint.values.join('/');
      return describeConstraint(column, constraint);
    });
  return parts.length > 0 ? parts.join(', ') : 'all transactions';
}

export interface ValidationContext {
  schema: DatasetSchema;
  domain: TimeRange | null;
  previous: Intent | null;
  defaultTopK: number;
}

/**
 * Converts filter entries into constraints, collecting anything the schema
 * does not know into `unresolved` rather than guessing.
 */
export function validateFilters(
  entries: RawFilterEntry[],
  schema: DatasetSchema,
  unresolved: string[]
): Filters {
  const filters: Filters = {};
  for (const entry of entries) {
    const column = entry.column.trim().toLowerCase();
    const values = entry.values ?? [];
    const hasBounds = (entry.min ?? null) !== null || (entry.max ?? null) !== null;

    if (values.length > 0) {
      if (!schema.isDimension(column)) {
        unresolved.push(`column "${entry.column}"`);
        continue;
      }
      const canonical: string[] = [];
      for (const value of values) {
        const resolved = schema.canonicalValue(column, value);
        if (resolved === undefined) unresolved.push(`${column} value "${value}"`);
        else if (!canonical.includes(resolved)) canonical.push(resolved);
      }
      if (canonical.length === 1) filters[column] = { op: 'eq', value: canonical[0] };
      else if (canonical.length > 1) filters[column] = { op: 'in', values: canonical };
    } else if (hasBounds) {
      if (!schema.isRangeColumn(column)) {
        unresolved.push(`range on column "${entry.column}"`);
        continue;
      }
      const constraint: FilterConstraint = { op: 'range' };
      if (entry.min !== null && entry.min !== undefined) constraint.min = entry.min;
      if (entry.max !== null && entry.max !== undefined) constraint.max = entry.max;
      if (constraint.min !== undefined && constraint.max !== undefined && constraint.min > constraint.max) {
        unresolved.push(`empty range on "${entry.column}"`);
        continue;
      }
      filters[column] = constraint;
    }
  }
  return filters;
}

function validateTimeRange(
  raw: NonNullable<RawIntent['time_range']>,
  domain: TimeRange | null,
  unresolved: string[]
): TimeRange | undefined {
  if (raw.period) {
    if (!isRelativePeriod(raw.period)) {
      unresolved.push(`period "${raw.period}"`);
      return undefined;
    }
    return domain ? resolveRelativePeriod(raw.period, domain) : undefined;
  }
  if (!raw.start && !raw.end) return undefined;

  const start = raw.start ?? domain?.start;
  const end = raw.end ?? domain?.end;
  if (!start || !end || !isIsoDate(start) || !isIsoDate(end) || start >= end) {
    unresolved.push(`time range ${raw.start ?? '…'} to ${raw.end ?? '…'}`);
    return undefined;
  }
  // A range outside the data is kept as given; resolution then reports it.
  return normalizeTimeRange({ start, end }, domain) ?? { start, end };
}

function validateReducer(
  raw: string | null | undefined,
  metric: string,
  schema: DatasetSchema,
  inherited: Reducer | undefined,
  unresolved: string[]
): Reducer | undefined {
  const definition = schema.metric(metric);
  if (!definition) return undefined;
  if (definition.kind === 'rate') return undefined;
  if (raw) {
    const reducer = raw.trim().toLowerCase();
    if (!isReducer(reducer) || !definition.reducers.includes(reducer)) {
      unresolved.push(`${raw} of ${metric}`);
      return undefined;
    }
    return reducer;
  }
  if (inherited && definition.reducers.includes(inherited)) return inherited;
  return definition.defaultReducer;
}

/**
 * Checks a raw extraction against the dataset schema and produces an Intent.
 * Follow-ups start from the previous intent and override what they restate.
 */
export function toIntent(raw: RawIntent, ctx: ValidationContext): Intent {
  const { schema } = ctx;
  const unresolved: string[] = [];
  const followUp = raw.follow_up === true && ctx.previous !== null;
  const previous = followUp ? ctx.previous : null;

  let operation: Operation;
  const rawOperation = raw.operation?.trim().toLowerCase();
  if (rawOperation) {
    if (isOperation(rawOperation)) {
      operation = rawOperation;
    } else {
      unresolved.push(`operation "${raw.operation}"`);
      operation = 'unsupported';
    }
  } else if (previous && previous.operation !== 'unsupported') {
    operation = previous.operation;
  } else {
    operation = 'unsupported';
    unresolved.push('no recognisable analysis');
  }

  const analytic: AnalyticOperation = operation === 'unsupported' ? 'aggregate' : operation;
  let metric = DEFAULT_METRIC[analytic];
  let metricKnown = true;
  const rawMetric = raw.metric?.trim().toLowerCase().replace(/\s+/g, '_');
  if (rawMetric) {
    if (schema.metric(rawMetric)) metric = rawMetric;
    else {
      unresolved.push(`metric "${raw.metric}"`);
      metricKnown = false;
    }
  } else if (previous && schema.metric(previous.metric)) {
    metric = previous.metric;
  }
  if (operation === 'failure_rate') metric = 'failure_rate';

  const reducer = metricKnown
    ? validateReducer(raw.reducer, metric, schema, previous?.reducer, unresolved)
    : undefined;

  const ownFilters = validateFilters(raw.filters ?? [], schema, unresolved);
  const filters: Filters = previous ? { ...previous.filters, ...ownFilters } : ownFilters;

  let groupBy: string[] = previous ? [...previous.groupBy] : [];
  if (raw.group_by && raw.group_by.length > 0) {
    groupBy = [];
    for (const column of raw.group_by) {
      const name = column.trim().toLowerCase();
      if (!schema.isDimension(name)) unresolved.push(`group by "${column}"`);
      else if (!groupBy.includes(name)) groupBy.push(name);
    }
  }

  let timeRange = previous?.timeRange;
  if (raw.time_range) {
    timeRange = validateTimeRange(raw.time_range, ctx.domain, unresolved) ?? timeRange;
  }

  let granularity = previous?.granularity;
  if (raw.granularity) {
    const value = raw.granularity.trim().toLowerCase();
    if (isGranularity(value)) granularity = value;
    else unresolved.push(`granularity "${raw.granularity}"`);
  }

  let segments = previous?.segments;
  if (raw.segments && raw.segments.length > 0) {
    if (raw.segments.length === 2) {
      const parsed = raw.segments.map((segment): Segment => {
        const segmentFilters = validateFilters(segment.filters, schema, unresolved);
        return { label: segment.label?.trim() || segmentLabel(segmentFilters), filters: segmentFilters };
      });
      segments = [parsed[0], parsed[1]];
    } else {
      segments = undefined;
    }
  }

  let topK = previous?.topK ?? ctx.defaultTopK;
  if (raw.top_k !== null && raw.top_k !== undefined) {
    topK = Number.isInteger(raw.top_k) && raw.top_k > 0 ? Math.min(raw.top_k, MAX_TOP_K) : ctx.defaultTopK;
  }

  const intent: Intent = {
    operation: unresolved.length > 0 ? 'unsupported' : operation,
    metric,
    filters,
    groupBy,
    confidence: raw.confidence,
    followUp,
    unresolved,
  };
  if (reducer) intent.reducer = reducer;
  if (timeRange) intent.timeRange = timeRange;
  if (granularity) intent.granularity = granularity;
  if (segments) intent.segments = segments;
  if (operation === 'top_failure_codes') intent.topK = topK;
  if (raw.clarifying_question) intent.clarifyingQuestion = raw.clarifying_question;
  return intent;
}

function valueSet(constraint: FilterConstraint): string[] | null {
  if (constraint.op === 'eq') return [constraint.value];
  if (constraint.op === 'in') return constraint.values;
  return null;
}

function rangesOverlap(
  a: Extract<FilterConstraint, { op: 'range' }>,
  b: Extract<FilterConstraint, { op: 'range' }>
): boolean {
  const aMin = a.min ?? -Infinity;
  const aMax = a.max ?? Infinity;
  const bMin = b.min ?? -Infinity;
  const bMax = b.max ?? Infinity;
  return aMin <= bMax && bMin <= aMax;
}

/** True when some column constrained by both segments admits no common value. */
export function segmentsAreDisjoint(a: Filters, b: Filters): boolean {
  for (const column of Object.keys(a)) {
    const other = b[column];
    if (!other) continue;
    const mine = a[column];
    const left = valueSet(mine);
    const right = valueSet(other);
    if (left && right) {
      if (!left.some((value) => right.includes(value))) return true;
    } else if (mine.op === 'range' && other.op === 'range') {
      if (!rangesOverlap(mine, other)) return true;
    }
  }
  return false;
}

export type IntentVerdict =
  | { verdict: 'valid' }
  | { verdict: 'ambiguous'; reason: string; candidates: AnalyticOperation[] }
  | { verdict: 'unsupported'; reason: string };

/**
 * Guardrail decision for an extracted intent: analyse, ask, or reject.
 */
export function assessIntent(intent: Intent, confidenceThreshold: number): IntentVerdict {
  if (intent.operation === 'unsupported') {
    const reason = intent.unresolved.length > 0 ? intent.unresolved.join('; ') : 'outside the analysis catalog';
    return { verdict: 'unsupported', reason };
  }
  if (intent.operation === 'compare_segments') {
    if (!intent.segments) {
      return {
        verdict: 'ambiguous',
        reason: 'a comparison needs exactly two segments',
        candidates: ['compare_segments', 'aggregate'],
      };
    }
    if (!segmentsAreDisjoint(intent.segments[0].filters, intent.segments[1].filters)) {
      return {
        verdict: 'ambiguous',
        reason: `segments "${intent.segments[0].label}" and "${intent.segments[1].label}" overlap`,
        candidates: ['compare_segments'],
      };
    }
  }
  if (intent.confidence < confidenceThreshold) {
    const candidates: AnalyticOperation[] = [intent.operation];
    for (const fallback of ['failure_rate', 'aggregate', 'time_series'] as const) {
      if (!candidates.includes(fallback)) candidates.push(fallback);
    }
    return {
      verdict: 'ambiguous',
      reason: `low extraction confidence (${intent.confidence.toFixed(2)})`,
      candidates: candidates.slice(0, 3),
    };
  }
  return { verdict: 'valid' };
}
