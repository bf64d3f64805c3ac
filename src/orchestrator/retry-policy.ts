/**
 * Retry Policy Engine
 *
 * Configurable retry logic for the research phase, so network blips in the
 * search provider do not fail a whole article run.
 */

import { isTransientError, toError } from './errors.js';
import { sleep } from '../utils/sleep.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('retry-policy');

/**
 * Configuration for retry behavior.
 */
export interface RetryPolicy {
  /** Total attempts including the first one (1 = no retries) */
  maxAttempts: number;

  /** Initial backoff delay in milliseconds */
  backoffMs: number;

  /** Backoff multiplier for exponential backoff */
  backoffMultiplier: number;

  /** Maximum backoff delay in milliseconds */
  maxBackoffMs: number;

  /** Whether to add jitter to backoff (0-25% of backoff value) */
  jitter: boolean;

  /** Decides whether a failed attempt may be retried */
  isRetryable: (error: Error) => boolean;
}

/**
 * Result of evaluating whether to retry.
 */
export interface RetryEvaluation {
  shouldRetry: boolean;

  /** Delay in milliseconds before retry (0 if shouldRetry is false) */
  delayMs: number;

  reason: string;
}

/**
 * Record of a single attempt.
 */
export interface RetryAttempt<T> {
  /** Attempt number (0 = first attempt, 1 = first retry, etc.) */
  attempt: number;
  success: boolean;
  result: T | null;
  error: Error | null;
  durationMs: number;
  willRetry: boolean;
  /** Delay until next retry in milliseconds (null if no retry) */
  nextRetryMs: number | null;
}

/**
 * Summary of all attempts for an operation.
 */
export interface RetryResult<T> {
  success: boolean;
  result: T | null;
  finalError: Error | null;
  attempts: RetryAttempt<T>[];
  totalDurationMs: number;
  /** Number of retries performed (0 if succeeded on first try) */
  retriedCount: number;
}

export interface RetryExecuteOptions<T> {
  /** Called after each attempt (success or failure) */
  onAttempt?: (attempt: RetryAttempt<T>) => void;
  /** Aborts the pending delay and stops further attempts */
  signal?: AbortSignal;
}

/**
 * Default policy for research: three attempts with exponential backoff,
 * retrying only errors flagged as transient.
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffMs: 1000,
  backoffMultiplier: 2,
  maxBackoffMs: 30000,
  jitter: true,
  isRetryable: isTransientError,
};

/**
 * No retry policy - for deterministic testing or when retries are undesirable.
 */
export const NO_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 1,
  backoffMs: 0,
  backoffMultiplier: 0,
  maxBackoffMs: 0,
  jitter: false,
  isRetryable: () => false,
};

export class RetryPolicyEngine {
  private readonly policy: RetryPolicy;

  constructor(policy: RetryPolicy = DEFAULT_RETRY_POLICY) {
    this.policy = policy;
  }

  /**
   * Get a copy of the current policy configuration.
   */
  getPolicy(): RetryPolicy {
    return { ...this.policy };
  }

  /**
   * Evaluate whether an error should trigger a retry.
   *
   * @param attemptCount - Number of attempts already made
   */
  evaluateRetry(error: Error, attemptCount: number): RetryEvaluation {
    if (attemptCount >= this.policy.maxAttempts) {
      return {
        shouldRetry: false,
        delayMs: 0,
        reason: `Max attempts (${this.policy.maxAttempts}) exhausted`,
      };
    }

    if (!this.policy.isRetryable(error)) {
      return {
        shouldRetry: false,
        delayMs: 0,
        reason: `${error.name} is not retryable`,
      };
    }

    const delayMs = this.calculateBackoff(attemptCount - 1);

    return {
      shouldRetry: true,
      delayMs,
      reason: `Retrying after ${delayMs}ms (attempt ${attemptCount + 1}/${this.policy.maxAttempts})`,
    };
  }

  /**
   * Execute an operation with retry logic. Never throws for operation
   * failures; inspect `success` and `finalError` on the result.
   */
  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryExecuteOptions<T> = {}
  ): Promise<RetryResult<T>> {
    const attempts: RetryAttempt<T>[] = [];
    const startTime = Date.now();
    let lastError: Error | null = null;

    for (let attempt = 0; attempt < this.policy.maxAttempts; attempt++) {
      const attemptStart = Date.now();

      try {
        const result = await operation(attempt);

        const record: RetryAttempt<T> = {
          attempt,
          success: true,
          result,
          error: null,
          durationMs: Date.now() - attemptStart,
          willRetry: false,
          nextRetryMs: null,
        };
        attempts.push(record);
        options.onAttempt?.(record);

        return {
          success: true,
          result,
          finalError: null,
          attempts,
          totalDurationMs: Date.now() - startTime,
          retriedCount: attempt,
        };
      } catch (error) {
        lastError = toError(error);

        const evaluation = options.signal?.aborted
          ? { shouldRetry: false, delayMs: 0, reason: 'Aborted' }
          : this.evaluateRetry(lastError, attempt + 1);

        const record: RetryAttempt<T> = {
          attempt,
          success: false,
          result: null,
          error: lastError,
          durationMs: Date.now() - attemptStart,
          willRetry: evaluation.shouldRetry,
          nextRetryMs: evaluation.shouldRetry ? evaluation.delayMs : null,
        };
        attempts.push(record);
        options.onAttempt?.(record);

        if (!evaluation.shouldRetry) {
          log.warn({ attempt, reason: evaluation.reason }, 'No more retries, failing');
          break;
        }

        log.info(
          { attempt, nextRetryMs: evaluation.delayMs, reason: evaluation.reason },
          'Retrying operation'
        );

        try {
          await sleep(evaluation.delayMs, options.signal);
        } catch (abortReason) {
          lastError = toError(abortReason);
          break;
        }
      }
    }

    return {
      success: false,
      result: null,
      finalError: lastError,
      attempts,
      totalDurationMs: Date.now() - startTime,
      retriedCount: Math.max(attempts.length - 1, 0),
    };
  }

  /**
   * Backoff for the nth retry (0 = first retry): exponential, capped,
   * plus optional jitter.
   */
  calculateBackoff(retryNumber: number): number {
    const base = this.policy.backoffMs * Math.pow(this.policy.backoffMultiplier, retryNumber);
    const capped = Math.min(base, this.policy.maxBackoffMs);

    if (this.policy.jitter) {
      const jitter = capped * 0.25 * Math.random();
      return Math.round(capped + jitter);
    }

    return Math.round(capped);
  }
}

/**
 * Create a RetryPolicyEngine with a partial policy merged over the defaults.
 */
export function createRetryPolicyEngine(policy?: Partial<RetryPolicy>): RetryPolicyEngine {
  return new RetryPolicyEngine({
    ...DEFAULT_RETRY_POLICY,
    ...policy,
  });
}
