// === src/core/connection/__tests__/RetryPolicy.test.ts ===
import { ErrorCategory, isXError } from '../../../shared/errors.js';
import {
  AGGRESSIVE_RETRY_POLICY,
  DEFAULT_RETRY_POLICY,
  NO_RETRY_POLICY,
  canRetry,
  computeBackoffDelay,
  createRetryPolicy,
} from '../RetryPolicy.js';

describe('RetryPolicy', () => {
  it('fills defaults and freezes', () => {
    expect(DEFAULT_RETRY_POLICY).toEqual({
      maxAttempts: 3,
      baseDelayMs: 1000,
      multiplier: 2,
      maxDelayMs: 30000,
      jitterFactor: 0,
    });
    expect(Object.isFrozen(DEFAULT_RETRY_POLICY)).toBe(true);
    expect(NO_RETRY_POLICY.maxAttempts).toBe(0);
    expect(AGGRESSIVE_RETRY_POLICY.maxAttempts).toBe(5);
  });

  it('delays grow exponentially: 100, 200, 400', () => {
    const p = createRetryPolicy({ maxAttempts: 3, baseDelayMs: 100, multiplier: 2 });
    expect([1, 2, 3].map((n) => computeBackoffDelay(p, n))).toEqual([100, 200, 400]);
  });

  it('caps the delay at maxDelayMs', () => {
    const p = createRetryPolicy({ baseDelayMs: 1000, multiplier: 3, maxDelayMs: 5000 });
    expect(computeBackoffDelay(p, 1)).toBe(1000);
    expect(computeBackoffDelay(p, 2)).toBe(3000);
    expect(computeBackoffDelay(p, 3)).toBe(5000);
    expect(computeBackoffDelay(p, 10)).toBe(5000);
  });

  it('jitter stays within ±factor and under the cap', () => {
    const p = createRetryPolicy({ baseDelayMs: 1000, multiplier: 2, maxDelayMs: 1500, jitterFactor: 0.5 });
    expect(computeBackoffDelay(p, 1, () => 0)).toBe(500);
    expect(computeBackoffDelay(p, 1, () => 0.5)).toBe(1000);
    expect(computeBackoffDelay(p, 1, () => 1)).toBe(1500);
    expect(computeBackoffDelay(p, 2, () => 1)).toBe(1500);
  });

  it('canRetry compares attempts made so far with maxAttempts', () => {
    const p = createRetryPolicy({ maxAttempts: 2 });
    expect(canRetry(p, 0)).toBe(true);
    expect(canRetry(p, 1)).toBe(true);
    expect(canRetry(p, 2)).toBe(false);
    expect(canRetry(NO_RETRY_POLICY, 0)).toBe(false);
  });

  it.each([
    [{ maxAttempts: -1 }],
    [{ multiplier: 0.5 }],
    [{ baseDelayMs: 5000, maxDelayMs: 1000 }],
    [{ jitterFactor: 2 }],
  ])('rejects %j as a configuration error', (input) => {
    let caught: unknown;
    try {
      createRetryPolicy(input);
    } catch (e) {
      caught = e;
    }
    expect(isXError(caught, ErrorCategory.Configuration)).toBe(true);
  });
});
