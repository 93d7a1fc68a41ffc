import logger from './logger';
import { AbortedError, Clock, systemClock } from './clock';
import { ErrorContext, ErrorKind, KlingError, RETRYABLE_KINDS, RateLimitError, toKlingError } from './errorHandler';

export interface RetryOptions {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
  /** Fraction of the computed delay added or removed at random. */
  jitterRatio: number;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffFactor: 2,
  jitterRatio: 0.1
};

export interface RetryState {
  attempt: number;
  nextDelayMs: number;
}

/**
 * Decides whether a classified failure is retried and how long to wait.
 * `attempt` always counts the attempts already made, starting at 1.
 */
export class RetryPolicy {
  readonly options: RetryOptions;
  private readonly random: () => number;

  constructor(options: Partial<RetryOptions> = {}, random: () => number = Math.random) {
    this.options = { ...DEFAULT_RETRY_OPTIONS, ...options };
    this.random = random;
  }

  static fromMaxRetries(maxRetries: number, options: Partial<RetryOptions> = {}): RetryPolicy {
    return new RetryPolicy({ ...options, maxAttempts: maxRetries + 1 });
  }

  shouldRetry(kind: ErrorKind, attempt: number): boolean {
    return RETRYABLE_KINDS.has(kind) && attempt < this.options.maxAttempts;
  }

  /** Backoff before the next attempt, without server hints. */
  baseDelayFor(attempt: number): number {
    const { initialDelayMs, backoffFactor, maxDelayMs } = this.options;
    return Math.min(maxDelayMs, initialDelayMs * Math.pow(backoffFactor, Math.max(0, attempt - 1)));
  }

  delayFor(attempt: number): number {
    const delay = this.baseDelayFor(attempt);
    const jitter = (this.random() * 2 - 1) * this.options.jitterRatio;
    return Math.max(0, Math.round(delay * (1 + jitter)));
  }

  /** A server-supplied retry-after replaces the computed backoff. */
  delayForError(error: KlingError, attempt: number): number {
    if (error instanceof RateLimitError) {
      return error.retryAfterSeconds * 1000;
    }
    return this.delayFor(attempt);
  }
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  context: ErrorContext = {},
  clock: Clock = systemClock,
  signal?: AbortSignal
): Promise<T> {
  const state: RetryState = { attempt: 0, nextDelayMs: 0 };

  for (;;) {
    state.attempt += 1;
    try {
      const result = await operation(state.attempt);

      if (state.attempt > 1) {
        logger.info('Operation succeeded after retry', {
          ...context,
          attempt: state.attempt,
          maxAttempts: policy.options.maxAttempts
        });
      }

      return result;
    } catch (caught) {
      if (caught instanceof AbortedError) {
        throw caught;
      }
      const error = toKlingError(caught, context);
      const willRetry = policy.shouldRetry(error.kind, state.attempt);

      logger.warn('Operation failed', {
        ...context,
        attempt: state.attempt,
        maxAttempts: policy.options.maxAttempts,
        kind: error.kind,
        willRetry,
        error: error.message
      });

      if (!willRetry) {
        if (error.retryable) {
          logger.error('Operation failed after all retries', {
            ...context,
            attempt: state.attempt,
            error: error.message
          });
        }
        throw error;
      }

      state.nextDelayMs = policy.delayForError(error, state.attempt);
      logger.info('Retrying operation after delay', {
        ...context,
        attempt: state.attempt,
        delayMs: state.nextDelayMs
      });

      await clock.sleep(state.nextDelayMs, signal);
    }
  }
}
