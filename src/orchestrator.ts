import { randomUUID } from 'node:crypto';
import type { AnalysisEngine } from './analysisEngine.js';
import { ANALYTIC_OPERATIONS, type DatasetSchema } from './datasetSchema.js';
import {
  ExtractionFailedError,
  InsufficientDataError,
  InvalidFilterError,
  RateLimitedError,
  ResourceExhaustedError,
  UnsupportedOperationError,
} from './errors.js';
import type { ExplanationSynthesizer } from './explanationSynthesizer.js';
import type { IntentExtractor } from './intentExtractor.js';
import { assessIntent } from './intentValidator.js';
import type { SessionManager } from './sessionManager.js';
import type {
  Answer,
  ChatRequest,
  ChatResponse,
  ClarificationAnswer,
  ComputedResult,
  FailureAnswer,
  Intent,
  PipelineState,
  TurnOutcome,
} from './types.js';

export interface OrchestratorDeps {
  schema: DatasetSchema;
  sessions: SessionManager;
  extractor: IntentExtractor;
  engine: AnalysisEngine;
  explainer: ExplanationSynthesizer;
  confidenceThreshold: number;
  newRequestId?: () => string;
  now?: () => number;
}

interface Outcome {
  answer: Answer;
  intent: Intent | null;
  outcome: TurnOutcome;
  summary: string;
}

/**
 * Drives one request through rate check, extraction, guardrails, resolution
 * and explanation. Every path ends in exactly one Answer, and every path
 * except a rate-limit refusal records exactly one turn.
 */
export class ChatOrchestrator {
  private readonly newRequestId: () => string;
  private readonly now: () => number;

  constructor(private readonly deps: OrchestratorDeps) {
    this.newRequestId = deps.newRequestId ?? randomUUID;
    this.now = deps.now ?? Date.now;
  }

  async handle(request: ChatRequest): Promise<ChatResponse> {
    const requestId = this.newRequestId();
    const { sessionId } = request;
    const states: PipelineState[] = ['RECEIVED', 'RATE_CHECK'];

    const decision = await this.deps.sessions.checkAndRecord(sessionId);
    if (!decision.allowed) {
      const refusal = new RateLimitedError(decision.retryAfterMs);
      console.warn(`🚦 [${requestId}] Session ${sessionId}: ${refusal.message}`);
      states.push('RATE_LIMITED', 'RESPOND');
      const seconds = Math.ceil(refusal.retryAfterMs / 1000);
      return {
        requestId,
        sessionId,
        states,
        answer: failure('RATE_LIMITED', `Too many questions in a short time. Try again in ${seconds}s.`, true),
      };
    }

    console.log(`🔍 [${requestId}] ${request.message}`);
    const result = await this.run(request, requestId, states);
    await this.deps.sessions.append(
      sessionId,
      {
        question: request.message,
        intent: result.intent,
        resultSummary: result.summary,
        outcome: result.outcome,
        timestamp: this.now(),
      },
      decision.epoch
    );
    states.push('RESPOND');
    return { requestId, sessionId, states, answer: result.answer };
  }

  async reset(sessionId: string): Promise<void> {
    await this.deps.sessions.reset(sessionId);
  }

  private async run(request: ChatRequest, requestId: string, states: PipelineState[]): Promise<Outcome> {
    states.push('EXTRACT');
    let intent: Intent;
    try {
      const context = await this.deps.sessions.contextFor(request.sessionId);
      intent = await this.deps.extractor.extract(request.message, context);
    } catch (error) {
      states.push('FAILED');
      return this.failed(error, requestId, null);
    }

    const verdict = assessIntent(intent, this.deps.confidenceThreshold);
    if (verdict.verdict === 'unsupported') {
      states.push('UNSUPPORTED', 'REJECT');
      return this.rejected(intent, verdict.reason);
    }
    if (verdict.verdict === 'ambiguous') {
      states.push('AMBIGUOUS', 'CLARIFY');
      const question =
        intent.clarifyingQuestion ??
        `Could you be more specific? I was unsure because of ${verdict.reason}. ` +
          `I can run: ${verdict.candidates.map((op) => op.replace(/_/g, ' ')).join(', ')}.`;
      return this.clarify(intent, question, verdict.candidates, 'ambiguous');
    }

    states.push('VALID', 'RESOLVE');
    let computed: ComputedResult;
    const started = this.now();
    try {
      computed = await this.deps.engine.resolve(intent);
    } catch (error) {
      if (error instanceof InvalidFilterError) {
        states.push('CLARIFY');
        return this.clarify(
          intent,
          `${error.message}. Would you like to widen or change that filter?`,
          [intent.operation === 'unsupported' ? 'aggregate' : intent.operation],
          'invalid_filter'
        );
      }
      if (error instanceof InsufficientDataError) {
        states.push('CLARIFY');
        return this.clarify(
          intent,
          `${error.message}. Try a different segment or a wider time range.`,
          ['compare_segments', 'aggregate'],
          'insufficient_data'
        );
      }
      if (error instanceof UnsupportedOperationError) {
        states.push('REJECT');
        return this.rejected(intent, error.unresolved.join('; ') || error.message);
      }
      states.push('FAILED');
      return this.failed(error, requestId, intent);
    }

    const executionTimeMs = this.now() - started;

    states.push('EXPLAIN');
    try {
      const explanation = await this.deps.explainer.explain(intent, computed, requestId);
      console.log(
        `✅ [${requestId}] ${computed.operation} answered in ${executionTimeMs}ms (${explanation.source} explanation)`
      );
      const answer: Answer = {
        kind: 'analysis',
        summaryLine: explanation.summaryLine,
        numbers: computed.numbers,
        queryTrace: computed.queryTrace,
        methodExplanation: explanation.methodExplanation,
        suggestedFollowups: explanation.suggestedFollowups,
        explanationSource: explanation.source,
        warnings: computed.warnings,
        executionTimeMs,
        ...(computed.chart ? { chart: computed.chart } : {}),
        ...(computed.series ? { series: computed.series } : {}),
        ...(computed.table ? { table: computed.table } : {}),
      };
      return { answer, intent, outcome: 'analysis', summary: explanation.summaryLine };
    } catch (error) {
      states.push('FAILED');
      return this.failed(error, requestId, intent);
    }
  }

  private clarify(
    intent: Intent,
    question: string,
    candidates: ClarificationAnswer['candidateOperations'],
    reason: ClarificationAnswer['reason']
  ): Outcome {
    return {
      answer: { kind: 'clarification', clarificationQuestion: question, candidateOperations: candidates, reason },
      intent,
      outcome: 'clarification',
      summary: `Asked for clarification: ${question}`,
    };
  }

  private rejected(intent: Intent, reason: string): Outcome {
    const metrics = this.deps.schema.metricNames
      .map((name) => this.deps.schema.metric(name)?.label.toLowerCase() ?? name)
      .join(', ');
    const question =
      `I can't answer that from the transaction data (${reason}). ` +
      `I can report ${metrics}, broken down by ${this.deps.schema.dimensions.map((d) => d.label).join(', ')}.`;
    return {
      answer: {
        kind: 'clarification',
        clarificationQuestion: question,
        candidateOperations: [...ANALYTIC_OPERATIONS],
        reason: 'unsupported',
      },
      intent,
      outcome: 'rejected',
      summary: `Rejected: ${reason}`,
    };
  }

  private failed(error: unknown, requestId: string, intent: Intent | null): Outcome {
    let answer: FailureAnswer;
    if (error instanceof ExtractionFailedError) {
      console.warn(`⚠️ [${requestId}] ${error.message}`);
      answer = failure('EXTRACTION_FAILED', 'I could not interpret that question. Please try again or rephrase it.', true);
    } else if (error instanceof ResourceExhaustedError) {
      console.warn(`⏱️ [${requestId}] ${error.message}`);
      answer = failure('RESOURCE_EXHAUSTED', 'That took too long to answer. Please try again.', true);
    } else {
      console.error(`❌ [${requestId}] Unexpected pipeline error:`, error);
      answer = failure('INTERNAL', `Something went wrong (request ${requestId}).`, false);
    }
    return { answer, intent, outcome: 'failed', summary: `Failed: ${answer.code}` };
  }
}

function failure(code: FailureAnswer['code'], message: string, retryable: boolean): FailureAnswer {
  return { kind: 'failure', code, message, retryable };
}
