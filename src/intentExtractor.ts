import type { DatasetSchema } from './datasetSchema.js';
import { ExtractionFailedError, ResourceExhaustedError, withTimeout } from './errors.js';
import {
  buildIntentJsonSchema,
  describeFilters,
  rawIntentSchema,
  toIntent,
  type RawFilterEntry,
  type RawIntent,
} from './intentValidator.js';
import { parseJsonObject, type LanguageModel } from './llmService.js';
import { parseTimePhrase } from './timeRange.js';
import type { Granularity, Intent, Operation, SessionContext, SessionTurn, TimeRange } from './types.js';

export interface IntentExtractorOptions {
  /** Timestamp domain of the dataset; relative periods are anchored to its end. */
  domain: TimeRange | null;
  defaultTopK: number;
  timeoutMs: number;
}

/** Most recent turn whose intent could be resolved, for follow-up inheritance. */
export function lastResolvableIntent(turns: SessionTurn[]): Intent | null {
  for (let i = turns.length - 1; i >= 0; i--) {
    const intent = turns[i].intent;
    if (intent && intent.operation !== 'unsupported') return intent;
  }
  return null;
}

/**
 * Turns a question plus conversation context into a schema-valid Intent.
 * With a language model the reply is constrained to a JSON schema and
 * rejected outright when it does not conform; without one a deterministic
 * keyword parser takes its place.
 */
export class IntentExtractor {
  private readonly keywords: KeywordIntentParser;

  constructor(
    private readonly schema: DatasetSchema,
    private readonly model: LanguageModel | null,
    private readonly options: IntentExtractorOptions
  ) {
    this.keywords = new KeywordIntentParser(schema, options.domain);
  }

  get usesModel(): boolean {
    return this.model !== null;
  }

  async extract(text: string, context: SessionContext): Promise<Intent> {
    const previous = lastResolvableIntent(context.turns);
    const raw = this.model
      ? await this.extractWithModel(this.model, text, context)
      : this.keywords.parse(text, previous);
    return toIntent(raw, {
      schema: this.schema,
      domain: this.options.domain,
      previous,
      defaultTopK: this.options.defaultTopK,
    });
  }

  private async extractWithModel(model: LanguageModel, text: string, context: SessionContext): Promise<RawIntent> {
    let reply: string;
    try {
      reply = await withTimeout('intent extraction', this.options.timeoutMs, (signal) =>
        model.complete({
          system: this.systemPrompt(),
          prompt: this.userPrompt(text, context),
          temperature: 0,
          schema: buildIntentJsonSchema(),
          maxTokens: 600,
          signal,
        })
      );
    } catch (error) {
      if (error instanceof ResourceExhaustedError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new ExtractionFailedError(`Intent extraction call failed: ${message}`, { cause: error });
    }

    const json = parseJsonObject(reply);
    if (json === null) {
      throw new ExtractionFailedError('Intent extraction reply was not a JSON object');
    }
    const parsed = rawIntentSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ExtractionFailedError(`Intent extraction reply is malformed: ${issue.path.join('.')} ${issue.message}`);
    }
    return parsed.data;
  }

  private systemPrompt(): string {
    const domain = this.options.domain;
    return `You convert questions about payment transactions into a structured query intent.
${this.schema.describeForPrompt()}
Data covers ${domain ? `${domain.start} up to ${domain.end} (exclusive)` : 'no dates yet'}.

Rules:
- Use only the operations, metrics, dimensions and values listed above, spelled exactly as listed.
- If the question needs a metric, column or value that is not listed, still write the term you read
  (e.g. metric "customer_satisfaction"); never substitute a similar listed one.
- failure_rate: share of failed transactions. compare_segments: exactly two disjoint segments.
  time_series: metric over time buckets. top_failure_codes: most common failure codes.
  executive_summary: overall KPIs. aggregate: one metric (with reducer for amount), optionally grouped.
- filters: one entry per column; "values" for categorical columns, "min"/"max" for ${this.schema.rangeColumns.join(', ')}.
- time_range: ISO dates with an exclusive end, or a period (last_7_days, last_30_days, last_90_days).
- follow_up: true when the question refers to the previous turn ("what about iOS?"); omit fields it does not restate.
- confidence: your certainty between 0 and 1. Add clarifying_question when the question is ambiguous.
Reply with JSON only.`;
  }

  private userPrompt(text: string, context: SessionContext): string {
    const lines: string[] = [];
    if (context.turns.length > 0) {
      lines.push('Conversation so far (oldest first):');
      for (const turn of context.turns) {
        lines.push(`- Q: ${turn.question}`);
        if (turn.intent) {
          const filters = describeFilters(turn.intent.filters);
          lines.push(
            `  intent: ${turn.intent.operation} ${turn.intent.metric}` +
              (filters.length > 0 ? ` where ${filters.join(' and ')}` : '') +
              (turn.intent.groupBy.length > 0 ? ` by ${turn.intent.groupBy.join(', ')}` : '')
          );
        }
        lines.push(`  answer: ${turn.resultSummary}`);
      }
      lines.push('');
    }
    lines.push(`Question: ${text}`);
    return lines.join('\n');
  }
}

interface Mention {
  dimension: string;
  value: string;
  index: number;
  length: number;
}

const EXECUTIVE_CUE = /\b(?:summary|summarize|summarise|overview|executive|kpis?|dashboard|health check)\b/;
const TOP_CODES_CUE = /\b(?:failure|error|decline)\s+(?:codes?|reasons?)\b|\bwhy\b.*\bfail/;
const COMPARE_CUE = /\b(?:vs\.?|versus|compare|compared|comparison)(?![a-z])/;
const TREND_CUE =
  /\b(?:trend|trends|trending|over time|daily|weekly|monthly|per (?:day|week|month)|by (?:day|week|month)|each (?:day|week|month)|time series)\b/;
const COUNT_CUE = /\b(?:how many|number of|count of)\b/;
const FAILED_WORD = /\bfail(?:ed|ures?)\b/;
const FOLLOW_UP_CUE = /^(?:and|what about|how about|same|now|only|instead|also|then)\b|\b(?:the same|instead)\b/;
const GROUP_BY =
  /\b(?:by|per|across|for each|split by|broken down by)\s+([a-z_][a-z_ ]*?)(?=\s+(?:for|in|on|during|over|between|from|last|past|and|with|where|vs|versus)\b|\s*[?.!,]|\s*$)/g;
const UNKNOWN_METRIC =
  /\b(?:average|avg|mean|median|total|sum of|minimum|maximum)\s+([a-z][a-z ]*?)(?=\s+(?:by|for|in|on|per|across|over|between|during|of|from|last|past|vs|versus|and|with)\b|\s*[?.!,]|\s*$)/;
const AMOUNT_MIN =
  /(?:\bamounts?\s+(?:above|over|more than|greater than|at least)\s+(?:₹|rs\.?\s*|inr\s*)?|(?:above|over|more than|greater than|at least)\s+(?:₹|rs\.?\s*|inr\s*))([\d,]+(?:\.\d+)?)/;
const AMOUNT_MAX =
  /(?:\bamounts?\s+(?:below|under|less than|at most)\s+(?:₹|rs\.?\s*|inr\s*)?|(?:below|under|less than|at most)\s+(?:₹|rs\.?\s*|inr\s*))([\d,]+(?:\.\d+)?)/;
const TOP_K = /\btop\s+(\d{1,2})\b/;
const IGNORED_GROUPS = new Set(['day', 'week', 'month', 'date', 'time', 'transaction', 'transactions']);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function phraseRegExp(phrase: string): RegExp {
  return new RegExp(`(?<![a-z0-9])${escapeRegExp(phrase.toLowerCase())}(?![a-z0-9])`, 'g');
}

function detectReducer(text: string): string | null {
  if (/\bmedian\b/.test(text)) return 'median';
  if (/\b(?:average|avg|mean)\b/.test(text)) return 'avg';
  if (/\b(?:minimum|min|lowest|smallest)\b/.test(text)) return 'min';
  if (/\b(?:maximum|max|highest|largest|biggest)\b/.test(text)) return 'max';
  if (/\b(?:total|sum)\b/.test(text)) return 'sum';
  return null;
}

function detectGranularity(text: string): Granularity | null {
  if (/\b(?:daily|per day|by day|each day)\b/.test(text)) return 'day';
  if (/\b(?:weekly|per week|by week|each week)\b/.test(text)) return 'week';
  if (/\b(?:monthly|per month|by month|each month)\b/.test(text)) return 'month';
  return null;
}

function toAmount(value: string): number {
  return Number(value.replace(/,/g, ''));
}

/**
 * Rule-based extraction used when no language model is configured. It only
 * recognises terms the schema lists; an unknown metric phrase is passed
 * through so validation rejects it instead of guessing.
 */
export class KeywordIntentParser {
  constructor(private readonly schema: DatasetSchema, private readonly domain: TimeRange | null) {}

  parse(text: string, previous: Intent | null): RawIntent {
    const lower = text.toLowerCase().replace(/\s+/g, ' ').trim();

    let operationCue: Operation | null = null;
    if (EXECUTIVE_CUE.test(lower)) operationCue = 'executive_summary';
    else if (TOP_CODES_CUE.test(lower)) operationCue = 'top_failure_codes';
    else if (COMPARE_CUE.test(lower)) operationCue = 'compare_segments';
    else if (TREND_CUE.test(lower)) operationCue = 'time_series';

    let metric = operationCue === 'top_failure_codes' || operationCue === 'executive_summary' ? null : this.detectMetric(lower);
    let reducer: string | null = null;
    const definition = metric ? this.schema.metric(metric) : undefined;
    if (!metric && operationCue !== 'top_failure_codes' && operationCue !== 'executive_summary') {
      const unknown = UNKNOWN_METRIC.exec(lower);
      if (unknown) {
        metric = unknown[1].trim();
        reducer = detectReducer(lower);
      }
    } else if (definition?.kind === 'currency') {
      reducer = detectReducer(lower);
    }

    const skipStatus =
      definition?.kind === 'rate' || operationCue === 'top_failure_codes' || operationCue === 'executive_summary';
    const mentions = this.findMentions(lower, skipStatus);
    const filters: RawFilterEntry[] = [];
    let segments: RawIntent['segments'] = null;

    const byDimension = new Map<string, string[]>();
    for (const mention of mentions) {
      const values = byDimension.get(mention.dimension) ?? [];
      if (!values.includes(mention.value)) values.push(mention.value);
      byDimension.set(mention.dimension, values);
    }
    if (operationCue === 'compare_segments') {
      const split = [...byDimension.entries()].find(([, values]) => values.length >= 2);
      if (split) {
        const [dimension, values] = split;
        segments = values.slice(0, 2).map((value) => ({
          label: value,
          filters: [{ column: dimension, values: [value], min: null, max: null }],
        }));
        byDimension.delete(dimension);
      }
    }
    for (const [dimension, values] of byDimension) {
      filters.push({ column: dimension, values, min: null, max: null });
    }
    if (COUNT_CUE.test(lower) && FAILED_WORD.test(lower) && !skipStatus && !byDimension.has('status')) {
      filters.push({ column: 'status', values: [this.schema.failedStatus], min: null, max: null });
    }

    const min = AMOUNT_MIN.exec(lower);
    const max = AMOUNT_MAX.exec(lower);
    if (min || max) {
      filters.push({
        column: 'amount',
        values: null,
        min: min ? toAmount(min[1]) : null,
        max: max ? toAmount(max[1]) : null,
      });
    }

    const groupBy = this.detectGroupBy(lower);
    const range = parseTimePhrase(lower, this.domain);
    const granularity = detectGranularity(lower);
    const topK = TOP_K.exec(lower);

    const hasScope = filters.length > 0 || groupBy.length > 0 || range !== null || segments !== null;
    const followUp =
      previous !== null && (FOLLOW_UP_CUE.test(lower) || (!operationCue && !metric && hasScope));

    let operation: Operation | null = operationCue;
    if (!operation && followUp && previous) {
      // keep the previous operation unless the new metric cannot live under it
      if (metric && previous.operation === 'failure_rate' && metric !== 'failure_rate') operation = 'aggregate';
    } else if (!operation && metric) {
      operation = metric === 'failure_rate' ? 'failure_rate' : 'aggregate';
    } else if (!operation && hasScope) {
      operation = 'aggregate';
    }

    let confidence = 0.2;
    if (followUp) confidence = 0.8;
    else if (operationCue && metric) confidence = 0.9;
    else if (operationCue || metric) confidence = 0.75;
    else if (hasScope) confidence = 0.4;

    return {
      operation,
      metric,
      reducer,
      filters,
      group_by: groupBy,
      time_range: range ? { start: range.start, end: range.end, period: null } : null,
      granularity,
      segments,
      top_k: topK ? Number(topK[1]) : null,
      confidence,
      follow_up: followUp,
      clarifying_question: null,
    };
  }

  /** Longest metric synonym wins; "how many" always means a count. */
  private detectMetric(text: string): string | null {
    if (COUNT_CUE.test(text)) return 'count';
    let best: { metric: string; length: number } | null = null;
    for (const name of this.schema.metricNames) {
      const definition = this.schema.metric(name);
      if (!definition) continue;
      for (const synonym of [name.replace(/_/g, ' '), ...definition.synonyms]) {
        if (phraseRegExp(synonym).test(text) && (!best || synonym.length > best.length)) {
          best = { metric: name, length: synonym.length };
        }
      }
    }
    return best?.metric ?? null;
  }

  private findMentions(text: string, skipStatus: boolean): Mention[] {
    const found: Mention[] = [];
    for (const dimension of this.schema.dimensions) {
      if (skipStatus && dimension.name === 'status') continue;
      const spellings: Array<[string, string]> = [
        ...dimension.values.map((value): [string, string] => [value, value]),
        ...Object.entries(dimension.aliases),
      ];
      for (const [spelling, value] of spellings) {
        for (const match of text.matchAll(phraseRegExp(spelling))) {
          found.push({ dimension: dimension.name, value, index: match.index ?? 0, length: spelling.length });
        }
      }
    }

    found.sort((a, b) => a.index - b.index || b.length - a.length);
    const accepted: Mention[] = [];
    let covered = -1;
    for (const mention of found) {
      if (mention.index < covered) continue;
      accepted.push(mention);
      covered = mention.index + mention.length;
    }
    return accepted;
  }

  private detectGroupBy(text: string): string[] {
    const groupBy: string[] = [];
    for (const match of text.matchAll(GROUP_BY)) {
      const phrase = match[1].trim();
      if (IGNORED_GROUPS.has(phrase)) continue;
      const dimension = this.dimensionFor(phrase);
      const name = dimension ?? phrase;
      if (!groupBy.includes(name)) groupBy.push(name);
    }
    return groupBy;
  }

  private dimensionFor(phrase: string): string | null {
    const candidates = [phrase, phrase.replace(/s$/, ''), phrase.split(' ')[0]];
    for (const candidate of candidates) {
      for (const dimension of this.schema.dimensions) {
        const names = [dimension.name, dimension.name.replace(/_/g, ' '), dimension.label, ...dimension.synonyms];
        if (names.some((name) => name.toLowerCase() === candidate)) return dimension.name;
      }
    }
    return null;
  }
}
