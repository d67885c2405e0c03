import { z } from 'zod';
import type { DatasetSchema } from './datasetSchema.js';
import { GroundingViolationError, withTimeout } from './errors.js';
import { checkGrounding } from './grounding.js';
import { describeFilters } from './intentValidator.js';
import { parseJsonObject, type LanguageModel } from './llmService.js';
import type { ComputedNumber, ComputedResult, Intent } from './types.js';

export interface Explanation {
  summaryLine: string;
  methodExplanation: string;
  suggestedFollowups: string[];
  source: 'model' | 'template';
}

export interface ExplanationOptions {
  timeoutMs: number;
  maxFollowups?: number;
}

const explanationReplySchema = z.object({
  summary_line: z.string().min(1),
  method_explanation: z.string().min(1),
});

const EXPLANATION_JSON_SCHEMA = {
  name: 'grounded_explanation',
  schema: {
    type: 'object',
    additionalProperties: false,
    required: ['summary_line', 'method_explanation'],
    properties: {
      summary_line: { type: 'string' },
      method_explanation: { type: 'string' },
    },
  },
};

const SYSTEM_PROMPT = `You explain results of payment transaction analytics to business users.
You receive the computed numbers, the query that produced them and the question's intent.
Rules:
- Use ONLY numbers that appear in the provided numbers and their calculations. Copy them as displayed.
- Dates, segment names and filter values may be quoted as written; never reuse their digits as figures.
- Write a sign only where the displayed number carries one.
- Never compute new numbers: no sums, differences, ratios or roundings of your own.
- If a number's status is insufficient_data, say the data is insufficient; do not substitute zero.
- summary_line: one sentence answering the question.
- method_explanation: one or two sentences on how the numbers were computed (population, filters, formula).
Reply with a JSON object {"summary_line": string, "method_explanation": string}.`;

const DEFAULT_MAX_FOLLOWUPS = 3;
const SKIPPED_FOLLOWUP_DIMENSIONS = new Set(['status', 'failure_code']);

/**
 * Turns a ComputedResult into prose. Model text is only accepted when every
 * number in it traces back to the result; otherwise one corrective attempt is
 * made before falling back to a template built from the numbers themselves.
 */
export class ExplanationSynthesizer {
  private readonly maxFollowups: number;

  constructor(
    private readonly schema: DatasetSchema,
    private readonly model: LanguageModel | null,
    private readonly options: ExplanationOptions
  ) {
    this.maxFollowups = options.maxFollowups ?? DEFAULT_MAX_FOLLOWUPS;
  }

  async explain(intent: Intent, result: ComputedResult, requestId = '-'): Promise<Explanation> {
    const suggestedFollowups = this.followups(intent);
    if (!this.model) {
      return { ...this.template(intent, result), suggestedFollowups, source: 'template' };
    }

    const prompt = this.buildPrompt(intent, result);
    let correction: string | null = null;
    for (let attempt = 0; attempt < 2; attempt++) {
      let reply: z.infer<typeof explanationReplySchema> | null = null;
      try {
        reply = await this.ask(correction ? `${prompt}\n\n${correction}` : prompt);
      } catch (error) {
        console.warn(`⚠️ [${requestId}] Explanation model call failed, using template:`, error);
        break;
      }
      if (!reply) {
        console.warn(`⚠️ [${requestId}] Explanation reply was not valid JSON, using template`);
        break;
      }

      const report = checkGrounding(`${reply.summary_line}\n${reply.method_explanation}`, result, intent);
      if (report.ok) {
        return {
          summaryLine: reply.summary_line.trim(),
          methodExplanation: reply.method_explanation.trim(),
          suggestedFollowups,
          source: 'model',
        };
      }
      const violation = new GroundingViolationError(report.violations);
      console.warn(`⚠️ [${requestId}] ${violation.message} (attempt ${attempt + 1})`);
      correction =
        `Your previous answer contained numbers that are not in the computed results: ${violation.ungrounded.join(', ')}. ` +
        'Rewrite it using only the numbers provided, exactly as displayed.';
    }

    return { ...this.template(intent, result), suggestedFollowups, source: 'template' };
  }

  private async ask(prompt: string): Promise<z.infer<typeof explanationReplySchema> | null> {
    const model = this.model;
    if (!model) return null;
    const text = await withTimeout('explanation', this.options.timeoutMs, (signal) =>
      model.complete({
        system: SYSTEM_PROMPT,
        prompt,
        temperature: 0,
        schema: EXPLANATION_JSON_SCHEMA,
        maxTokens: 400,
        signal,
      })
    );
    const parsed = explanationReplySchema.safeParse(parseJsonObject(text));
    return parsed.success ? parsed.data : null;
  }

  /** The model sees numbers, query trace and intent; never rows. */
  private buildPrompt(intent: Intent, result: ComputedResult): string {
    const payload = {
      operation: result.operation,
      metric: result.metric,
      filters: describeFilters(intent.filters),
      group_by: intent.groupBy,
      time_range: result.timeRange ?? null,
      segments: intent.segments?.map((segment) => segment.label) ?? null,
      numbers: result.numbers.map((number) => ({
        label: number.label,
        display: number.display,
        status: number.status,
        calculation: number.calculation,
      })),
      query_trace: result.queryTrace,
    };
    return `Computed result:\n${JSON.stringify(payload, null, 2)}`;
  }

  template(intent: Intent, result: ComputedResult): Pick<Explanation, 'summaryLine' | 'methodExplanation'> {
    return {
      summaryLine: templateSummary(result),
      methodExplanation: templateMethod(intent, result),
    };
  }

  /**
   * Up to two breakdowns by dimensions the question did not use, then a
   * trend (or, for a trend, a breakdown) suggestion.
   */
  followups(intent: Intent): string[] {
    const metric = this.schema.metric(intent.metric);
    const metricLabel = (metric?.label ?? intent.metric).toLowerCase();
    const used = new Set([
      ...Object.keys(intent.filters),
      ...intent.groupBy,
      ...(intent.segments ?? []).flatMap((segment) => Object.keys(segment.filters)),
    ]);
    const unused = this.schema.dimensions.filter(
      (dimension) => !used.has(dimension.name) && !SKIPPED_FOLLOWUP_DIMENSIONS.has(dimension.name)
    );

    const suggestions: string[] = [];
    if (intent.operation === 'top_failure_codes') {
      suggestions.push(...unused.slice(0, 2).map((d) => `Which ${d.label} has the highest failure rate?`));
    } else {
      suggestions.push(...unused.slice(0, 2).map((d) => `Show ${metricLabel} by ${d.label}`));
    }
    if (intent.operation === 'time_series') {
      if (unused[2]) suggestions.push(`Compare ${metricLabel} across ${unused[2].label}`);
    } else {
      suggestions.push(`How has ${metricLabel} changed over time?`);
    }
    return suggestions.slice(0, this.maxFollowups);
  }
}

function phrase(number: ComputedNumber): string {
  return number.status === 'ok' ? `${number.label} is ${number.display}` : `${number.label} has insufficient data`;
}

function rateDetail(number: ComputedNumber): string {
  const { numerator, denominator } = number.calculation;
  if (number.unit !== 'percent' || numerator === undefined || denominator === undefined) return '';
  return ` (${numerator.toLocaleString('en-US')} of ${denominator.toLocaleString('en-US')} transactions)`;
}

export function templateSummary(result: ComputedResult): string {
  const [first, ...rest] = result.numbers;
  if (!first) return 'No figures were computed for this question.';

  switch (result.operation) {
    case 'compare_segments': {
      const [a, b, difference] = result.numbers;
      if (!b) return `${phrase(a)}.`;
      const diff = difference ? `, a difference of ${difference.display}` : '';
      return `${phrase(a)}${rateDetail(a)} and ${phrase(b)}${rateDetail(b)}${diff}.`;
    }
    case 'time_series': {
      const ok = rest.filter((n) => n.value !== null);
      if (ok.length === 0) return `${phrase(first)}.`;
      const peak = ok.reduce((best, n) => ((n.value ?? 0) > (best.value ?? 0) ? n : best));
      return `${phrase(first)} over the period; the highest point is ${peak.label} at ${peak.display}.`;
    }
    case 'top_failure_codes': {
      const top = rest[0];
      const share = rest[1];
      if (!top || !share) return `${phrase(first)}.`;
      return `${phrase(first)}; the most common code is ${top.label.replace('Failures with ', '')} with ${top.display} failures (${share.display} of failures).`;
    }
    case 'executive_summary':
      return `${result.numbers.slice(0, 4).map(phrase).join('; ')}.`;
    default: {
      if (rest.length === 0) return `${phrase(first)}${rateDetail(first)}.`;
      return `${phrase(first)}${rateDetail(first)}; highest is ${rest[0].label} at ${rest[0].display}.`;
    }
  }
}

export function templateMethod(intent: Intent, result: ComputedResult): string {
  const first = result.numbers[0];
  const filters = describeFilters(intent.filters);
  const scope = filters.length > 0 ? ` matching ${filters.join(' and ')}` : '';
  const range = result.timeRange ? ` from ${result.timeRange.start} up to ${result.timeRange.end}` : '';
  const formula = first ? `${first.calculation.formula} over ${first.calculation.sampleSize.toLocaleString('en-US')} transactions` : 'the dataset';
  const queries = result.queryTrace.length === 1 ? 'one query' : 'the queries';
  return `Computed ${formula}${scope}${range}, using ${queries} shown in the trace.`;
}
