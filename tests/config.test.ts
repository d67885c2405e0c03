import { ConfigError, loadConfig } from '../src/config';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});
    expect(config.port).toBe(3000);
    expect(config.groq).toEqual({ apiKey: undefined, model: 'llama-3.1-8b-instant' });
    expect(config.maxContextTurns).toBe(6);
    expect(config.rateLimitPerMinute).toBe(10);
    expect(config.topK).toBe(5);
    expect(config.confidenceThreshold).toBe(0.6);
    expect(config.datasetSource).toBe('csv');
    expect(config.httpRateLimit).toEqual({ windowMs: 900_000, max: 100 });
  });

  it('reads and coerces values', () => {
    const config = loadConfig({
      PORT: '8080',
      GROQ_API_KEY: ' test-secret ',
      RATE_LIMIT_PER_MIN: '3',
      DATASET_SOURCE: 'postgres',
      PGHOST: 'localhost',
    });
    expect(config.port).toBe(8080);
    expect(config.groq.apiKey).toBe('test-secret');
    expect(config.rateLimitPerMinute).toBe(3);
    expect(config.datasetSource).toBe('postgres');
    expect(config.postgres).toEqual({
      host: 'localhost',
      user: undefined,
      password: undefined,
      port: 5432,
      database: undefined,
    });
  });

  it('treats a blank API key as absent', () => {
    expect(loadConfig({ GROQ_API_KEY: '   ' }).groq.apiKey).toBeUndefined();
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ TOP_K: '50' })).toThrow(ConfigError);
    expect(() => loadConfig({ DATASET_SOURCE: 'mysql' })).toThrow(/^Invalid configuration: DATASET_SOURCE/);
  });
});
