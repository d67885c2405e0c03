import { Pool } from 'pg';
import type { DatasetSchema } from './datasetSchema.js';
import {
  domainOf,
  renderSql,
  traceQuery,
  type AggregateOptions,
  type AggregateRequest,
  type AggregateResult,
  type AggregateRow,
  type DatasetProfile,
  type TransactionDataset,
} from './dataset.js';
import { withTimeout } from './errors.js';

export interface SqlClient {
  query(text: string, values?: Array<string | number>): Promise<{ rows: Array<Record<string, unknown>> }>;
  end(): Promise<void>;
}

export interface PgSettings {
  host?: string;
  user?: string;
  password?: string;
  port: number;
  database?: string;
  statementTimeoutMs: number;
}

/**
 * Pool-backed client. Each statement checks out a connection and always
 * releases it, mirroring how the pool is used everywhere else.
 */
export function createPgClient(settings: PgSettings): SqlClient {
  const pool = new Pool({
    host: settings.host,
    user: settings.user,
    password: settings.password,
    port: settings.port,
    database: settings.database,
    ssl: {
      rejectUnauthorized: false,
    },
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
    statement_timeout: settings.statementTimeoutMs,
  });

  pool.on('error', (err) => {
    console.error('Unexpected error on idle client', err);
  });

  return {
    async query(text, values) {
      const client = await pool.connect();
      try {
        const result = await client.query(text, values);
        return { rows: result.rows };
      } finally {
        client.release();
      }
    },
    end: () => pool.end(),
  };
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' || typeof value === 'bigint') return Number(value);
  return 0;
}

function toNullableNumber(value: unknown): number | null {
  return value === null || value === undefined ? null : toNumber(value);
}

function toMillis(value: unknown): number | null {
  if (value instanceof Date) return value.getTime();
  if (typeof value === 'string') {
    const ms = Date.parse(value);
    return Number.isNaN(ms) ? null : ms;
  }
  return null;
}

const REQUIRED_COLUMNS = ['transaction_id', 'amount', 'fraud_flag', 'review_flag'];

/**
 * The transaction table living in PostgreSQL. Statements come only from
 * renderSql, so the trace is exactly what the server ran.
 */
export class PostgresTransactionDataset implements TransactionDataset {
  constructor(public readonly schema: DatasetSchema, private readonly client: SqlClient) {}

  async describe(): Promise<DatasetProfile> {
    const ts = `"${this.schema.timestampColumn}"`;
    const result = await this.client.query(
      `SELECT COUNT(*) AS row_count, MIN(${ts}) AS min_ts, MAX(${ts}) AS max_ts FROM "${this.schema.table}"`
    );
    const row = result.rows[0] ?? {};
    const bounds = [toMillis(row.min_ts), toMillis(row.max_ts)].filter((ms): ms is number => ms !== null);
    return { rowCount: toNumber(row.row_count), domain: domainOf(bounds) };
  }

  async aggregate(request: AggregateRequest, options: AggregateOptions): Promise<AggregateResult> {
    const statement = renderSql(this.schema, request);
    const result = await withTimeout('dataset aggregate', options.timeoutMs, () =>
      this.client.query(statement.text, statement.values)
    );
    return {
      rows: result.rows.map((row) => this.toAggregateRow(row, request)),
      query: traceQuery(statement),
    };
  }

  /** Columns of the table, as reported by information_schema. */
  async getColumnNames(): Promise<string[]> {
    const result = await this.client.query(
      `SELECT column_name FROM information_schema.columns WHERE table_schema = 'public' AND table_name = $1 ORDER BY ordinal_position`,
      [this.schema.table]
    );
    return result.rows.map((row) => String(row.column_name));
  }

  /** Fails fast when the table lacks a column the schema relies on. */
  async verifyColumns(): Promise<void> {
    const actual = new Set((await this.getColumnNames()).map((name) => name.toLowerCase()));
    const expected = [
      ...REQUIRED_COLUMNS,
      this.schema.timestampColumn,
      ...this.schema.dimensions.map((d) => d.name),
    ];
    const missing = expected.filter((name) => !actual.has(name));
    if (missing.length > 0) {
      throw new Error(`Table ${this.schema.table} is missing columns: ${missing.join(', ')}`);
    }
  }

  async close(): Promise<void> {
    await this.client.end();
  }

  private toAggregateRow(row: Record<string, unknown>, request: AggregateRequest): AggregateRow {
    const group: Record<string, string> = {};
    for (const column of request.groupBy) {
      group[column] = String(row[column]);
    }
    return {
      group,
      ...(request.granularity ? { bucket: String(row.bucket) } : {}),
      rowCount: toNumber(row.row_count),
      failedCount: toNumber(row.failed_count),
      fraudCount: toNumber(row.fraud_count),
      reviewCount: toNumber(row.review_count),
      amountSum: toNumber(row.amount_sum),
      amountMin: toNullableNumber(row.amount_min),
      amountMax: toNullableNumber(row.amount_max),
    };
  }
}
