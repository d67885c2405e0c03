import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  GROQ_API_KEY: optionalString,
  GROQ_MODEL: z.string().default('llama-3.1-8b-instant'),
  MAX_CONTEXT_TURNS: z.coerce.number().int().min(1).default(6),
  RATE_LIMIT_PER_MIN: z.coerce.number().int().min(1).default(10),
  TOP_K: z.coerce.number().int().min(1).max(20).default(5),
  CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.6),
  MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  DATASET_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  DATASET_SOURCE: z.enum(['csv', 'postgres']).default('csv'),
  DATA_PATH: z.string().default('./data/transactions.csv'),
  SCHEMA_PATH: z.string().default('./data/transaction-schema.json'),
  SESSION_TTL_MS: z.coerce.number().int().positive().default(1_800_000),
  MAX_SESSIONS: z.coerce.number().int().positive().default(1000),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(900_000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),
  PGHOST: optionalString,
  PGUSER: optionalString,
  PGPASSWORD: optionalString,
  PGPORT: z.coerce.number().int().positive().default(5432),
  PGDATABASE: optionalString,
});

export interface AppConfig {
  port: number;
  groq: { apiKey?: string; model: string };
  maxContextTurns: number;
  rateLimitPerMinute: number;
  topK: number;
  confidenceThreshold: number;
  modelTimeoutMs: number;
  datasetTimeoutMs: number;
  datasetSource: 'csv' | 'postgres';
  dataPath: string;
  schemaPath: string;
  sessionTtlMs: number;
  maxSessions: number;
  httpRateLimit: { windowMs: number; max: number };
  postgres: { host?: string; user?: string; password?: string; port: number; database?: string };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Reads configuration from the environment (after dotenv has populated it). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    groq: { apiKey: e.GROQ_API_KEY, model: e.GROQ_MODEL },
    maxContextTurns: e.MAX_CONTEXT_TURNS,
    rateLimitPerMinute: e.RATE_LIMIT_PER_MIN,
    topK: e.TOP_K,
    confidenceThreshold: e.CONFIDENCE_THRESHOLD,
    modelTimeoutMs: e.MODEL_TIMEOUT_MS,
    datasetTimeoutMs: e.DATASET_TIMEOUT_MS,
    datasetSource: e.DATASET_SOURCE,
    dataPath: e.DATA_PATH,
    schemaPath: e.SCHEMA_PATH,
    sessionTtlMs: e.SESSION_TTL_MS,
    maxSessions: e.MAX_SESSIONS,
    httpRateLimit: { windowMs: e.RATE_LIMIT_WINDOW_MS, max: e.RATE_LIMIT_MAX_REQUESTS },
    postgres: {
      host: e.PGHOST,
      user: e.PGUSER,
      password: e.PGPASSWORD,
      port: e.PGPORT,
      database: e.PGDATABASE,
    },
  };
}
