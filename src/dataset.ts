import type { DatasetSchema } from './datasetSchema.js';
import { ResourceExhaustedError } from './errors.js';
import { addDays, bucketLabel, parseIsoDate, toIsoDate } from './timeRange.js';
import type { Filters, Granularity, TimeRange } from './types.js';

/** Group value used where a dimension is empty (e.g. failure_code on successful rows). */
export const MISSING_VALUE = 'UNKNOWN';

export interface TransactionRow {
  transactionId: string;
  /** Epoch milliseconds, UTC. */
  timestamp: number;
  amount: number;
  fraudFlag: boolean;
  reviewFlag: boolean;
  dimensions: Record<string, string | null>;
}

export interface AggregateRequest {
  filters: Filters;
  timeRange?: TimeRange;
  groupBy: string[];
  granularity?: Granularity;
}

/** Fixed measure set computed for every group; operations derive their numbers from it. */
export interface AggregateRow {
  group: Record<string, string>;
  bucket?: string;
  rowCount: number;
  failedCount: number;
  fraudCount: number;
  reviewCount: number;
  amountSum: number;
  amountMin: number | null;
  amountMax: number | null;
}

export interface AggregateResult {
  rows: AggregateRow[];
  /** The statement with its parameters inlined, as executed. */
  query: string;
}

export interface DatasetProfile {
  rowCount: number;
  /** Half-open day range covering every timestamp; null for an empty table. */
  domain: TimeRange | null;
}

export interface AggregateOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface TransactionDataset {
  readonly schema: DatasetSchema;
  describe(): Promise<DatasetProfile>;
  aggregate(request: AggregateRequest, options: AggregateOptions): Promise<AggregateResult>;
  close(): Promise<void>;
}

export interface SqlStatement {
  text: string;
  values: Array<string | number>;
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function bucketExpression(column: string, granularity: Granularity): string {
  const truncated = `date_trunc('${granularity}', ${quoteIdent(column)})`;
  return granularity === 'month'
    ? `to_char(${truncated}, 'YYYY-MM')`
    : `to_char(${truncated}, 'YYYY-MM-DD')`;
}

/**
 * Renders an aggregate request as parameterized SQL. Column names only ever
 * come from the dataset schema; values are always bound parameters.
 */
export function renderSql(schema: DatasetSchema, request: AggregateRequest): SqlStatement {
  const values: Array<string | number> = [];
  const bind = (value: string | number): string => {
    values.push(value);
    return `$${values.length}`;
  };

  const select: string[] = [];
  for (const column of request.groupBy) {
    select.push(`COALESCE(${quoteIdent(column)}, '${MISSING_VALUE}') AS ${quoteIdent(column)}`);
  }
  if (request.granularity) {
    select.push(`${bucketExpression(schema.timestampColumn, request.granularity)} AS bucket`);
  }
  const failedParam = bind(schema.failedStatus);
  select.push(
    'COUNT(*) AS row_count',
    `COUNT(*) FILTER (WHERE "status" = ${failedParam}) AS failed_count`,
    'COUNT(*) FILTER (WHERE "fraud_flag" = 1) AS fraud_count',
    'COUNT(*) FILTER (WHERE "review_flag" = 1) AS review_count',
    'COALESCE(SUM("amount"), 0) AS amount_sum',
    'MIN("amount") AS amount_min',
    'MAX("amount") AS amount_max'
  );

  const where: string[] = [];
  for (const column of Object.keys(request.filters).sort()) {
    const constraint = request.filters[column];
    const ident = quoteIdent(column);
    switch (constraint.op) {
      case 'eq':
        where.push(`${ident} = ${bind(constraint.value)}`);
        break;
      case 'in':
        where.push(`${ident} IN (${constraint.values.map((v) => bind(v)).join(', ')})`);
        break;
      case 'range':
        if (constraint.min !== undefined) where.push(`${ident} >= ${bind(constraint.min)}`);
        if (constraint.max !== undefined) where.push(`${ident} <= ${bind(constraint.max)}`);
        break;
    }
  }
  if (request.timeRange) {
    const ts = quoteIdent(schema.timestampColumn);
    where.push(`${ts} >= ${bind(request.timeRange.start)}`);
    where.push(`${ts} < ${bind(request.timeRange.end)}`);
  }

  const groupCount = request.groupBy.length + (request.granularity ? 1 : 0);
  const positions = Array.from({ length: groupCount }, (_, i) => String(i + 1)).join(', ');

  let text = `SELECT ${select.join(', ')} FROM ${quoteIdent(schema.table)}`;
  if (where.length > 0) text += ` WHERE ${where.join(' AND ')}`;
  if (groupCount > 0) text += ` GROUP BY ${positions} ORDER BY ${positions}`;
  return { text, values };
}

/** Inlines bound parameters so the trace reads as the statement that ran. */
export function traceQuery(statement: SqlStatement): string {
  return statement.text.replace(/\$(\d+)/g, (placeholder, index: string) => {
    const value = statement.values[Number(index) - 1];
    if (value === undefined) return placeholder;
    return typeof value === 'number' ? String(value) : `'${value.replace(/'/g, "''")}'`;
  });
}

export function domainOf(timestamps: Iterable<number>): TimeRange | null {
  let min = Infinity;
  let max = -Infinity;
  for (const ts of timestamps) {
    if (ts < min) min = ts;
    if (ts > max) max = ts;
  }
  if (min === Infinity) return null;
  return { start: toIsoDate(min), end: addDays(toIsoDate(max), 1) };
}

const DEADLINE_CHECK_INTERVAL = 4096;

/**
 * Immutable in-process table. Computes the same groups and measures as the
 * SQL from renderSql, and reports that SQL as its trace.
 */
export class MemoryTransactionDataset implements TransactionDataset {
  private readonly rows: readonly TransactionRow[];

  constructor(public readonly schema: DatasetSchema, rows: TransactionRow[]) {
    this.rows = Object.freeze(rows.slice());
  }

  async describe(): Promise<DatasetProfile> {
    return {
      rowCount: this.rows.length,
      domain: domainOf(this.rows.map((row) => row.timestamp)),
    };
  }

  async aggregate(request: AggregateRequest, options: AggregateOptions): Promise<AggregateResult> {
    const deadline = Date.now() + options.timeoutMs;
    const statement = renderSql(this.schema, request);
    const start = request.timeRange ? parseIsoDate(request.timeRange.start) : -Infinity;
    const end = request.timeRange ? parseIsoDate(request.timeRange.end) : Infinity;
    const groups = new Map<string, AggregateRow>();

    for (let i = 0; i < this.rows.length; i++) {
      if (i % DEADLINE_CHECK_INTERVAL === 0 && (Date.now() > deadline || options.signal?.aborted)) {
        throw new ResourceExhaustedError('dataset aggregate', options.timeoutMs);
      }
      const row = this.rows[i];
      if (row.timestamp < start || row.timestamp >= end) continue;
      if (!this.matches(row, request.filters)) continue;

      const group: Record<string, string> = {};
      for (const column of request.groupBy) {
        group[column] = row.dimensions[column] ?? MISSING_VALUE;
      }
      const bucket = request.granularity ? bucketLabel(row.timestamp, request.granularity) : undefined;
      const key = JSON.stringify([...request.groupBy.map((c) => group[c]), bucket ?? null]);

      let entry = groups.get(key);
      if (!entry) {
        entry = {
          group,
          ...(bucket !== undefined ? { bucket } : {}),
          rowCount: 0,
          failedCount: 0,
          fraudCount: 0,
          reviewCount: 0,
          amountSum: 0,
          amountMin: null,
          amountMax: null,
        };
        groups.set(key, entry);
      }
      entry.rowCount += 1;
      if (row.dimensions.status === this.schema.failedStatus) entry.failedCount += 1;
      if (row.fraudFlag) entry.fraudCount += 1;
      if (row.reviewFlag) entry.reviewCount += 1;
      entry.amountSum += row.amount;
      entry.amountMin = entry.amountMin === null ? row.amount : Math.min(entry.amountMin, row.amount);
      entry.amountMax = entry.amountMax === null ? row.amount : Math.max(entry.amountMax, row.amount);
    }

    const grouped = request.groupBy.length > 0 || request.granularity !== undefined;
    const rows = grouped
      ? [...groups.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)).map(([, row]) => row)
      : [groups.values().next().value ?? emptyRow()];

    return { rows, query: traceQuery(statement) };
  }

  async close(): Promise<void> {
    // nothing held open
  }

  private matches(row: TransactionRow, filters: Filters): boolean {
    for (const [column, constraint] of Object.entries(filters)) {
      switch (constraint.op) {
        case 'eq':
          if (row.dimensions[column] !== constraint.value) return false;
          break;
        case 'in': {
          const value = row.dimensions[column];
          if (value === null || value === undefined || !constraint.values.includes(value)) return false;
          break;
        }
        case 'range': {
          const value = column === 'amount' ? row.amount : Number.NaN;
          if (Number.isNaN(value)) return false;
          if (constraint.min !== undefined && value < constraint.min) return false;
          if (constraint.max !== undefined && value > constraint.max) return false;
          break;
        }
      }
    }
    return true;
  }
}

export function emptyRow(): AggregateRow {
  return {
    group: {},
    rowCount: 0,
    failedCount: 0,
    fraudCount: 0,
    reviewCount: 0,
    amountSum: 0,
    amountMin: null,
    amountMax: null,
  };
}
