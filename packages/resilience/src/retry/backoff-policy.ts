import { isRetryableError } from '../errors/errors.js';
import type { RandomFn, RetryPolicy } from './types.js';

const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 60_000,
  jitter: true,
  isRetryable: isRetryableError,
});

const JITTER_MIN = 0.5;
const JITTER_MAX = 1.5;

function createRetryPolicy(overrides?: Partial<RetryPolicy>): RetryPolicy {
  const policy = { ...DEFAULT_RETRY_POLICY, ...overrides };

  if (!Number.isInteger(policy.maxRetries) || policy.maxRetries < 0) {
    throw new RangeError(
      `maxRetries must be a non-negative integer, got ${policy.maxRetries}`,
    );
  }

  if (policy.baseDelayMs < 0 || policy.maxDelayMs < 0) {
    throw new RangeError('Retry delays must not be negative');
  }

  return Object.freeze(policy);
}

/**
 * Delay before retry number `attempt + 1`: `baseDelayMs * 2^attempt`, capped
 * at `maxDelayMs`, then scaled by a factor in [0.5, 1.5) when jitter is on.
 */
function computeBackoffDelay(
  attempt: number,
  policy: RetryPolicy,
  random: RandomFn = Math.random,
): number {
  const delay = Math.min(
    policy.baseDelayMs * Math.pow(2, attempt),
    policy.maxDelayMs,
  );

  if (!policy.jitter) {
    return delay;
  }

  return delay * (JITTER_MIN + random() * (JITTER_MAX - JITTER_MIN));
}

/**
 * Upper bound of the total time a fully retried call spends sleeping.
 */
function worstCaseDelayMs(policy: RetryPolicy): number {
  let total = 0;

  for (let attempt = 0; attempt < policy.maxRetries; attempt++) {
    total += Math.min(
      policy.baseDelayMs * Math.pow(2, attempt),
      policy.maxDelayMs,
    );
  }

  return policy.jitter ? total * JITTER_MAX : total;
}

export {
  DEFAULT_RETRY_POLICY,
  createRetryPolicy,
  computeBackoffDelay,
  worstCaseDelayMs,
};
