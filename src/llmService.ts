export interface CompletionRequest {
  system: string;
  prompt: string;
  temperature: number;
  /** JSON schema the reply must conform to; switches the model into strict JSON mode. */
  schema?: { name: string; schema: Record<string, unknown> };
  maxTokens?: number;
  signal?: AbortSignal;
}

/**
 * The language-model capability. Extraction and explanation are its only
 * two call sites; swap the implementation without touching either.
 */
export interface LanguageModel {
  readonly name: string;
  complete(request: CompletionRequest): Promise<string>;
}

export class LanguageModelError extends Error {
  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = 'LanguageModelError';
  }
}

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
}

function isChatCompletionResponse(value: unknown): value is ChatCompletionResponse {
  return typeof value === 'object' && value !== null;
}

export interface GroqSettings {
  apiKey: string;
  model: string;
  baseUrl?: string;
}

/**
 * OpenAI-compatible chat completions client for Groq.
 */
export class GroqLanguageModel implements LanguageModel {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly model: string;

  constructor(settings: GroqSettings) {
    this.apiKey = settings.apiKey;
    this.baseUrl = settings.baseUrl ?? 'https://api.groq.com/openai/v1/chat/completions';
    this.model = settings.model;
  }

  get name(): string {
    return `groq:${this.model}`;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const body: Record<string, unknown> = {
      model: this.model,
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: request.prompt },
      ],
      temperature: request.temperature,
      max_tokens: request.maxTokens ?? 1000,
      stream: false,
    };
    if (request.schema) {
      body.response_format = {
        type: 'json_schema',
        json_schema: { name: request.schema.name, schema: request.schema.schema, strict: true },
      };
    }

    const response = await fetch(this.baseUrl, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
      signal: request.signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new LanguageModelError(`Groq API error: ${response.status} - ${errorText}`, response.status);
    }

    const data: unknown = await response.json();
    const content = isChatCompletionResponse(data) ? data.choices?.[0]?.message?.content : undefined;
    if (typeof content !== 'string') {
      throw new LanguageModelError('Invalid response format from Groq API');
    }
    return content;
  }
}

/**
 * Pulls the first balanced JSON object out of a model reply, skipping code
 * fences or prose around it.
 */
export function extractFirstJsonObject(s: string): string | null {
  const start = s.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inStr = false;
  let esc = false;
  for (let i = start; i < s.length; i++) {
    const ch = s[i];
    if (inStr) {
      if (esc) esc = false;
      else if (ch === '\\') esc = true;
      else if (ch === '"') inStr = false;
      continue;
    }
    if (ch === '"') {
      inStr = true;
      continue;
    }
    if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return s.slice(start, i + 1);
    }
  }
  return null;
}

/** Parses the first JSON object in `text`; null when there is none or it is malformed. */
export function parseJsonObject(text: string): unknown {
  const json = extractFirstJsonObject(text);
  if (!json) return null;
  try {
    return JSON.parse(json);
  } catch {
    return null;
  }
}
