import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import dotenv from 'dotenv';
import { z } from 'zod';
import { AnalysisEngine } from './analysisEngine.js';
import { loadConfig, type AppConfig } from './config.js';
import { loadTransactionsCsv } from './csvLoader.js';
import { MemoryTransactionDataset, type TransactionDataset } from './dataset.js';
import { createPgClient, PostgresTransactionDataset } from './database.js';
import { DatasetSchema } from './datasetSchema.js';
import { ExplanationSynthesizer } from './explanationSynthesizer.js';
import { IntentExtractor } from './intentExtractor.js';
import { GroqLanguageModel, type LanguageModel } from './llmService.js';
import { ChatOrchestrator } from './orchestrator.js';
import { MemorySessionStore, SessionManager } from './sessionManager.js';

const chatBodySchema = z.object({
  session_id: z.string().trim().min(1).max(128),
  message: z.string().trim().min(1).max(2000),
});

const resetBodySchema = z.object({
  session_id: z.string().trim().min(1).max(128),
});

export interface AppDeps {
  orchestrator: ChatOrchestrator;
  schema: DatasetSchema;
  httpRateLimit?: { windowMs: number; max: number };
}

function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  return issue ? `${issue.path.join('.') || 'body'}: ${issue.message}` : 'Invalid request body';
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());

  // Per-IP limit in front of the per-session one
  const limiter = rateLimit({
    windowMs: deps.httpRateLimit?.windowMs ?? 900000,
    max: deps.httpRateLimit?.max ?? 100,
    message: { error: 'Too many requests from this IP, please try again later.' },
  });
  app.use(limiter);

  app.use(express.json({ limit: '100kb' }));

  app.get('/health', (req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: 'payment-insights-assistant',
      schemaVersion: deps.schema.version,
    });
  });

  app.post('/api/chat', async (req, res) => {
    const body = chatBodySchema.safeParse(req.body);
    if (!body.success) {
      return res.status(400).json({ error: firstIssue(body.error) });
    }

    try {
      const response = await deps.orchestrator.handle({
        sessionId: body.data.session_id,
        message: body.data.message,
      });
      res.json(response);
    } catch (error) {
      console.error('Error processing chat request:', error);
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  app.post('/api/chat/reset', async (req, res) => {
    const body = resetBodySchema.safeParse(req.body);
    if (!body.success) {
      return res.status(400).json({ error: firstIssue(body.error) });
    }

    try {
      await deps.orchestrator.reset(body.data.session_id);
      res.json({ session_id: body.data.session_id, reset: true });
    } catch (error) {
      console.error('Error resetting session:', error);
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  // Schema exploration endpoint
  app.get('/schema', (req, res) => {
    res.json(deps.schema.toJSON());
  });

  // 404 handler
  app.use('*', (req, res) => {
    res.status(404).json({ error: 'Endpoint not found' });
  });

  // Error handling middleware
  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: 'Malformed JSON body' });
    }
    console.error('Unhandled error:', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

async function openDataset(config: AppConfig, schema: DatasetSchema): Promise<TransactionDataset> {
  if (config.datasetSource === 'postgres') {
    const client = createPgClient({ ...config.postgres, statementTimeoutMs: config.datasetTimeoutMs });
    const dataset = new PostgresTransactionDataset(schema, client);
    await dataset.verifyColumns();
    return dataset;
  }
  return new MemoryTransactionDataset(schema, loadTransactionsCsv(config.dataPath, schema));
}

/** Wires every component from configuration. */
export async function buildApplication(config: AppConfig) {
  const schema = DatasetSchema.load(config.schemaPath);
  const dataset = await openDataset(config, schema);
  const profile = await dataset.describe();

  const model: LanguageModel | null = config.groq.apiKey
    ? new GroqLanguageModel({ apiKey: config.groq.apiKey, model: config.groq.model })
    : null;

  const sessions = new SessionManager(
    new MemorySessionStore({ ttlMs: config.sessionTtlMs, maxSessions: config.maxSessions }),
    { maxTurns: config.maxContextTurns, rateLimit: config.rateLimitPerMinute }
  );
  const orchestrator = new ChatOrchestrator({
    schema,
    sessions,
    extractor: new IntentExtractor(schema, model, {
      domain: profile.domain,
      defaultTopK: config.topK,
      timeoutMs: config.modelTimeoutMs,
    }),
    engine: new AnalysisEngine(dataset, { timeoutMs: config.datasetTimeoutMs, defaultTopK: config.topK }),
    explainer: new ExplanationSynthesizer(schema, model, { timeoutMs: config.modelTimeoutMs }),
    confidenceThreshold: config.confidenceThreshold,
  });

  const app = createApp({ orchestrator, schema, httpRateLimit: config.httpRateLimit });
  return { app, dataset, profile, model };
}

async function main(): Promise<void> {
  dotenv.config();
  const config = loadConfig();
  const { app, dataset, profile, model } = await buildApplication(config);

  const server = app.listen(config.port, () => {
    console.log(`💳 Payment Insights Assistant running on port ${config.port}`);
    console.log(`📊 Health check: http://localhost:${config.port}/health`);
    console.log(`💬 Chat endpoint: http://localhost:${config.port}/api/chat`);
    console.log(
      `✅ ${profile.rowCount} transactions loaded from ${config.datasetSource}` +
        (profile.domain ? ` (${profile.domain.start} to ${profile.domain.end})` : '')
    );
    console.log(model ? `🤖 Language model: ${model.name}` : '🔤 No GROQ_API_KEY set, using keyword extraction');
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down gracefully`);
    server.close();
    dataset
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Error closing dataset:', error);
        process.exit(1);
      });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('❌ Failed to start server:', error);
    process.exit(1);
  });
}
