import { extractFirstJsonObject, GroqLanguageModel, LanguageModelError, parseJsonObject } from '../src/llmService';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('GroqLanguageModel', () => {
  let fetchSpy: jest.SpyInstance;

  beforeEach(() => {
    fetchSpy = jest.spyOn(globalThis, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  const model = new GroqLanguageModel({ apiKey: 'test-secret', model: 'test-model', baseUrl: 'http://model.test/v1' });

  it('posts a chat completion in strict JSON schema mode', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ choices: [{ message: { content: '{"ok":true}' } }] }));

    const reply = await model.complete({
      system: 'sys',
      prompt: 'question',
      temperature: 0,
      schema: { name: 'intent', schema: { type: 'object' } },
    });

    expect(reply).toBe('{"ok":true}');
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('http://model.test/v1');
    expect(init.headers.Authorization).toBe('Bearer test-secret');
    expect(JSON.parse(init.body)).toEqual({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'sys' },
        { role: 'user', content: 'question' },
      ],
      temperature: 0,
      max_tokens: 1000,
      stream: false,
      response_format: {
        type: 'json_schema',
        json_schema: { name: 'intent', schema: { type: 'object' }, strict: true },
      },
    });
  });

  it('raises on HTTP errors', async () => {
    fetchSpy.mockResolvedValue(new Response('slow down', { status: 429 }));
    await expect(model.complete({ system: 's', prompt: 'p', temperature: 0 })).rejects.toEqual(
      new LanguageModelError('Groq API error: 429 - slow down', 429)
    );
  });

  it('raises when the reply has no content', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ choices: [] }));
    await expect(model.complete({ system: 's', prompt: 'p', temperature: 0 })).rejects.toThrow(
      'Invalid response format from Groq API'
    );
  });

  it('names itself after the model', () => {
    expect(model.name).toBe('groq:test-model');
  });
});

describe('JSON extraction', () => {
  it('finds the first balanced object in surrounding prose', () => {
    expect(extractFirstJsonObject('Sure! ```json\n{"a": {"b": "}"}}\n``` done')).toBe('{"a": {"b": "}"}}');
  });

  it('returns null when there is no complete object', () => {
    expect(extractFirstJsonObject('no json here')).toBeNull();
    expect(extractFirstJsonObject('{"a": 1')).toBeNull();
  });

  it('parses or gives up', () => {
    expect(parseJsonObject('x {"metric": "count"} y')).toEqual({ metric: 'count' });
    expect(parseJsonObject('{metric: count}')).toBeNull();
  });
});
