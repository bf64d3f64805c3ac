/**
 * Tests for the research retry policy
 */

import { describe, it, expect, vi } from 'vitest';
import {
  RetryPolicyEngine,
  createRetryPolicyEngine,
  DEFAULT_RETRY_POLICY,
  NO_RETRY_POLICY,
  type RetryAttempt,
} from '../src/orchestrator/retry-policy.js';
import { TransientOperationError, ValidationError } from '../src/orchestrator/errors.js';

describe('RetryPolicyEngine', () => {
  describe('constructor and getPolicy', () => {
    it('should use default policy when none provided', () => {
      const policy = new RetryPolicyEngine().getPolicy();

      expect(policy.maxAttempts).toBe(3);
      expect(policy.backoffMs).toBe(1000);
      expect(policy.maxBackoffMs).toBe(30000);
      expect(policy.jitter).toBe(true);
    });

    it('should return a copy of policy to prevent mutation', () => {
      const engine = new RetryPolicyEngine();
      const policy1 = engine.getPolicy();
      policy1.maxAttempts = 999;

      expect(engine.getPolicy().maxAttempts).toBe(3);
    });

    it('should merge partial policies over the defaults', () => {
      const policy = createRetryPolicyEngine({ maxAttempts: 5 }).getPolicy();

      expect(policy.maxAttempts).toBe(5);
      expect(policy.backoffMultiplier).toBe(DEFAULT_RETRY_POLICY.backoffMultiplier);
    });
  });

  describe('evaluateRetry', () => {
    const engine = createRetryPolicyEngine({ jitter: false });

    it('should stop when attempts are exhausted', () => {
      const evaluation = engine.evaluateRetry(new TransientOperationError('timeout'), 3);

      expect(evaluation).toEqual({
        shouldRetry: false,
        delayMs: 0,
        reason: 'Max attempts (3) exhausted',
      });
    });

    it('should not retry validation errors', () => {
      const evaluation = engine.evaluateRetry(new ValidationError('no sources'), 1);

      expect(evaluation.shouldRetry).toBe(false);
      expect(evaluation.reason).toBe('ValidationError is not retryable');
    });

    it('should retry transient errors with backoff', () => {
      const evaluation = engine.evaluateRetry(new TransientOperationError('timeout'), 1);

      expect(evaluation).toEqual({
        shouldRetry: true,
        delayMs: 1000,
        reason: 'Retrying after 1000ms (attempt 2/3)',
      });
    });

    it('should never retry under NO_RETRY_POLICY', () => {
      const noRetry = new RetryPolicyEngine(NO_RETRY_POLICY);
      expect(noRetry.evaluateRetry(new TransientOperationError('timeout'), 1).shouldRetry).toBe(false);
    });
  });

  describe('calculateBackoff', () => {
    it('should grow exponentially up to the cap', () => {
      const engine = createRetryPolicyEngine({ jitter: false });

      expect(engine.calculateBackoff(0)).toBe(1000);
      expect(engine.calculateBackoff(1)).toBe(2000);
      expect(engine.calculateBackoff(2)).toBe(4000);
      expect(engine.calculateBackoff(10)).toBe(30000);
    });

    it('should add at most 25% jitter', () => {
      const engine = createRetryPolicyEngine({ jitter: true });

      for (let i = 0; i < 20; i++) {
        const delay = engine.calculateBackoff(0);
        expect(delay).toBeGreaterThanOrEqual(1000);
        expect(delay).toBeLessThanOrEqual(1250);
      }
    });
  });

  describe('execute', () => {
    it('should return the result of a first-try success', async () => {
      const engine = createRetryPolicyEngine({ backoffMs: 0, jitter: false });

      const result = await engine.execute(async () => 'ok');

      expect(result.success).toBe(true);
      expect(result.result).toBe('ok');
      expect(result.retriedCount).toBe(0);
      expect(result.attempts).toHaveLength(1);
    });

    it('should retry transient failures until success', async () => {
      const engine = createRetryPolicyEngine({ backoffMs: 0, jitter: false });
      const operation = vi
        .fn<(attempt: number) => Promise<string>>()
        .mockRejectedValueOnce(new TransientOperationError('timeout'))
        .mockResolvedValueOnce('ok');
      const seen: RetryAttempt<string>[] = [];

      const result = await engine.execute(operation, { onAttempt: (a) => seen.push(a) });

      expect(result.success).toBe(true);
      expect(result.retriedCount).toBe(1);
      expect(operation).toHaveBeenCalledTimes(2);
      expect(seen.map((a) => a.willRetry)).toEqual([true, false]);
      expect(seen.map((a) => a.success)).toEqual([false, true]);
    });

    it('should stop at the first non-retryable failure', async () => {
      const engine = createRetryPolicyEngine({ backoffMs: 0, jitter: false });
      const error = new ValidationError('No academic sources found in research results');
      const operation = vi.fn(async (): Promise<string> => {
        throw error;
      });

      const result = await engine.execute(operation);

      expect(result.success).toBe(false);
      expect(result.finalError).toBe(error);
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should give up after maxAttempts transient failures', async () => {
      const engine = createRetryPolicyEngine({ maxAttempts: 2, backoffMs: 0, jitter: false });
      const operation = vi.fn(async (): Promise<string> => {
        throw new TransientOperationError('search provider unavailable');
      });

      const result = await engine.execute(operation);

      expect(result.success).toBe(false);
      expect(result.finalError?.message).toBe('search provider unavailable');
      expect(operation).toHaveBeenCalledTimes(2);
    });

    it('should abort a pending backoff delay', async () => {
      const engine = createRetryPolicyEngine({ backoffMs: 60000, jitter: false });
      const controller = new AbortController();
      const operation = vi.fn(async (): Promise<string> => {
        throw new TransientOperationError('timeout');
      });

      const result = await engine.execute(operation, {
        signal: controller.signal,
        onAttempt: () => controller.abort(),
      });

      expect(result.success).toBe(false);
      expect(result.finalError?.name).toBe('AbortError');
      expect(operation).toHaveBeenCalledTimes(1);
    });
  });
});
