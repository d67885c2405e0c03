import { readFileSync } from 'node:fs';
import * as XLSX from 'xlsx';
import { z } from 'zod';
import type { DatasetSchema } from './datasetSchema.js';
import type { TransactionRow } from './dataset.js';

const flag = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .refine((value) => ['0', '1', 'true', 'false', ''].includes(value), 'expected 0/1 flag')
  .transform((value) => value === '1' || value === 'true');

/** Timestamps without an offset are taken as UTC. */
export function parseTimestamp(value: string): number {
  const iso = value.trim().replace(' ', 'T');
  if (/^\d{4}-\d{2}-\d{2}$/.test(iso)) return Date.parse(`${iso}T00:00:00Z`);
  return Date.parse(/(?:Z|[+-]\d{2}:?\d{2})$/i.test(iso) ? iso : `${iso}Z`);
}

const csvRowSchema = z.object({
  transaction_id: z.string().min(1),
  timestamp: z
    .string()
    .transform(parseTimestamp)
    .refine((ms) => !Number.isNaN(ms), 'unparseable timestamp'),
  amount: z.coerce.number().finite(),
  fraud_flag: flag,
  review_flag: flag,
});

export class DatasetLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DatasetLoadError';
  }
}

/**
 * Parses transaction CSV text. Cells are read as plain strings and validated
 * here; dimension values outside the schema reject the whole file.
 */
export function parseTransactionsCsv(text: string, schema: DatasetSchema): TransactionRow[] {
  const workbook = XLSX.read(text, { type: 'string', raw: true });
  const sheetName = workbook.SheetNames[0];
  if (!sheetName) throw new DatasetLoadError('CSV contains no sheet');
  const records = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets[sheetName], {
    raw: true,
    defval: '',
  });

  return records.map((record, index) => {
    const cells: Record<string, string> = {};
    for (const [key, value] of Object.entries(record)) {
      cells[key.trim().toLowerCase()] = String(value ?? '').trim();
    }

    const parsed = csvRowSchema.safeParse(cells);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new DatasetLoadError(`Row ${index + 2}: ${issue.path.join('.')} ${issue.message}`);
    }

    const dimensions: Record<string, string | null> = {};
    for (const dimension of schema.dimensions) {
      const raw = cells[dimension.name] ?? '';
      if (raw === '') {
        dimensions[dimension.name] = null;
        continue;
      }
      const value = schema.canonicalValue(dimension.name, raw);
      if (value === undefined) {
        throw new DatasetLoadError(`Row ${index + 2}: "${raw}" is not a known ${dimension.name}`);
      }
      dimensions[dimension.name] = value;
    }

    return {
      transactionId: parsed.data.transaction_id,
      timestamp: parsed.data.timestamp,
      amount: parsed.data.amount,
      fraudFlag: parsed.data.fraud_flag,
      reviewFlag: parsed.data.review_flag,
      dimensions,
    };
  });
}

export function loadTransactionsCsv(path: string, schema: DatasetSchema): TransactionRow[] {
  return parseTransactionsCsv(readFileSync(path, 'utf8'), schema);
}
