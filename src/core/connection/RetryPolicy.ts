// === src/core/connection/RetryPolicy.ts ===
import { clamp } from '../../shared/utils.js';
import { RetryPolicySchema, parseConfig, type RetryPolicy, type RetryPolicyInput } from '../config/schema.js';

export type { RetryPolicy, RetryPolicyInput };

/** Validated, frozen policy. Malformed input throws XError/CONFIGURATION. */
export function createRetryPolicy(input: RetryPolicyInput = {}): RetryPolicy {
  return Object.freeze(parseConfig(RetryPolicySchema, input, 'RetryPolicy'));
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = createRetryPolicy();

/** Single attempt, no reconnection */
export const NO_RETRY_POLICY: RetryPolicy = createRetryPolicy({ maxAttempts: 0 });

/** Unreliable networks: more attempts, shorter delays */
export const AGGRESSIVE_RETRY_POLICY: RetryPolicy = createRetryPolicy({
  maxAttempts: 5,
  baseDelayMs: 500,
  maxDelayMs: 15_000,
  jitterFactor: 0.3,
});

/**
 * Delay before retry number `attempt` (1-based):
 *   min(baseDelayMs × multiplier^(attempt-1), maxDelayMs)
 * With jitterFactor f the value is scaled by a factor in [1-f, 1+f] and then
 * capped again, so it never exceeds maxDelayMs.
 */
export function computeBackoffDelay(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random,
): number {
  const n = Math.max(1, Math.floor(attempt));
  const raw = policy.baseDelayMs * Math.pow(policy.multiplier, n - 1);
  let delay = Math.min(raw, policy.maxDelayMs);
  if (policy.jitterFactor > 0) {
    delay = delay * (1 + (random() - 0.5) * 2 * policy.jitterFactor);
  }
  return Math.round(clamp(delay, 0, policy.maxDelayMs));
}

export function canRetry(policy: RetryPolicy, attemptsSoFar: number): boolean {
  return attemptsSoFar < policy.maxAttempts;
}
