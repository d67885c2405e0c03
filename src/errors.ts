export type AnalyticsErrorCode =
  | 'RATE_LIMITED'
  | 'EXTRACTION_FAILED'
  | 'UNSUPPORTED_OPERATION'
  | 'INVALID_FILTER'
  | 'INSUFFICIENT_DATA'
  | 'RESOURCE_EXHAUSTED'
  | 'GROUNDING_VIOLATION';

/**
 * Base class for every failure the pipeline knows how to recover from.
 * The orchestrator switches on `code`, never on the message text.
 */
export abstract class AnalyticsError extends Error {
  abstract readonly code: AnalyticsErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class RateLimitedError extends AnalyticsError {
  readonly code = 'RATE_LIMITED' as const;

  constructor(public readonly retryAfterMs: number) {
    super(`Rate limit exceeded, retry in ${Math.ceil(retryAfterMs / 1000)}s`);
  }
}

export class ExtractionFailedError extends AnalyticsError {
  readonly code = 'EXTRACTION_FAILED' as const;
}

export class UnsupportedOperationError extends AnalyticsError {
  readonly code = 'UNSUPPORTED_OPERATION' as const;

  constructor(public readonly unresolved: string[] = []) {
    super(
      unresolved.length > 0
        ? `Unsupported request: ${unresolved.join(', ')}`
        : 'Unsupported request'
    );
  }
}

export class InvalidFilterError extends AnalyticsError {
  readonly code = 'INVALID_FILTER' as const;

  /** `filters` holds a readable form of every constraint that was applied. */
  constructor(public readonly filters: string[]) {
    super(
      filters.length > 0
        ? `No transactions match ${filters.join(' AND ')}`
        : 'No transactions in the dataset'
    );
  }
}

export class InsufficientDataError extends AnalyticsError {
  readonly code = 'INSUFFICIENT_DATA' as const;

  constructor(message: string, public readonly segments: string[] = []) {
    super(message);
  }
}

export class ResourceExhaustedError extends AnalyticsError {
  readonly code = 'RESOURCE_EXHAUSTED' as const;

  constructor(public readonly operation: string, public readonly timeoutMs: number) {
    super(`${operation} exceeded its ${timeoutMs}ms budget`);
  }
}

export class GroundingViolationError extends AnalyticsError {
  readonly code = 'GROUNDING_VIOLATION' as const;

  constructor(public readonly ungrounded: string[]) {
    super(`Ungrounded numbers in explanation: ${ungrounded.join(', ')}`);
  }
}

/**
 * Runs `task` with an AbortSignal that fires after `timeoutMs`.
 * Rejects with ResourceExhaustedError when the budget runs out first.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new ResourceExhaustedError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
