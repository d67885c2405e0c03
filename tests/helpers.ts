import path from 'node:path';
import { DatasetSchema } from '../src/datasetSchema';
import { MemoryTransactionDataset, type TransactionRow } from '../src/dataset';
import type { CompletionRequest, LanguageModel } from '../src/llmService';

export const SCHEMA_PATH = path.join(__dirname, '..', 'data', 'transaction-schema.json');

export function loadSchema(): DatasetSchema {
  return DatasetSchema.load(SCHEMA_PATH);
}

export interface RowSpec {
  id?: string;
  timestamp?: string;
  amount?: number;
  fraud?: boolean;
  review?: boolean;
  device?: string;
  payment_method?: string;
  network?: string;
  age_group?: string;
  category?: string;
  state?: string;
  status?: string;
  failure_code?: string | null;
}

let nextId = 1;

export function row(fields: RowSpec = {}): TransactionRow {
  const status = fields.status ?? 'Success';
  return {
    transactionId: fields.id ?? `T${nextId++}`,
    timestamp: Date.parse(fields.timestamp ?? '2025-06-10T12:00:00Z'),
    amount: fields.amount ?? 100,
    fraudFlag: fields.fraud ?? false,
    reviewFlag: fields.review ?? false,
    dimensions: {
      device: fields.device ?? 'Android',
      payment_method: fields.payment_method ?? 'UPI',
      network: fields.network ?? '4G',
      age_group: fields.age_group ?? '25-34',
      category: fields.category ?? 'Food',
      state: fields.state ?? 'Karnataka',
      status,
      failure_code: fields.failure_code === undefined ? (status === 'Failed' ? 'TIMEOUT' : null) : fields.failure_code,
    },
  };
}

/**
 * 10,000 Android transactions spread over June 2025, of which the first 345
 * failed. Amounts cycle 50, 100, 150, 200.
 */
export function juneRows(): TransactionRow[] {
  const rows: TransactionRow[] = [];
  for (let i = 0; i < 10000; i++) {
    const day = String((i % 30) + 1).padStart(2, '0');
    rows.push(
      row({
        id: `J${i}`,
        timestamp: `2025-06-${day}T10:00:00Z`,
        amount: 50 * ((i % 4) + 1),
        status: i < 345 ? 'Failed' : 'Success',
        failure_code: i < 345 ? (i < 200 ? 'TIMEOUT' : 'BANK_DECLINED') : null,
      })
    );
  }
  return rows;
}

export function datasetOf(rows: TransactionRow[], schema: DatasetSchema = loadSchema()): MemoryTransactionDataset {
  return new MemoryTransactionDataset(schema, rows);
}

type Reply = string | Error | ((request: CompletionRequest) => string | Promise<string>);

/** Scripted model: answers with queued replies in order and records every request. */
export class FakeLanguageModel implements LanguageModel {
  readonly name = 'fake';
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly replies: Reply[] = []) {}

  enqueue(...replies: Reply[]): this {
    this.replies.push(...replies);
    return this;
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error('FakeLanguageModel has no reply queued');
    if (reply instanceof Error) throw reply;
    if (typeof reply === 'function') return reply(request);
    return reply;
  }
}

/** Minimal raw intent with every field the extraction schema expects. */
export function rawIntent(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    operation: 'aggregate',
    metric: 'count',
    reducer: null,
    filters: [],
    group_by: [],
    time_range: null,
    granularity: null,
    segments: null,
    top_k: null,
    confidence: 0.9,
    follow_up: false,
    clarifying_question: null,
    ...overrides,
  });
}
