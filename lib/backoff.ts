import pRetry from "p-retry";
import * as retry from "retry";

export interface BackoffPolicy {
  /** Delay before the first retry, in milliseconds. */
  baseDelayMs: number;
  /** Upper bound for any single delay, in milliseconds. */
  maxDelayMs: number;
  /**
   * Multiply each delay by a random factor in [1, 2) before capping, so that
   * workers throttled at the same moment don't all come back at once.
   */
  jitter: boolean;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  baseDelayMs: 50,
  maxDelayMs: 1_000,
  jitter: false,
};

export const DEFAULT_MAX_ATTEMPTS = 5;

export function validateBackoff(policy: BackoffPolicy): BackoffPolicy {
  if (!(policy.baseDelayMs > 0) || !(policy.maxDelayMs > 0)) {
    throw new RangeError("Backoff delays must be positive");
  }
  if (policy.baseDelayMs > policy.maxDelayMs) {
    throw new RangeError(`Base delay ${policy.baseDelayMs}ms exceeds the cap of ${policy.maxDelayMs}ms`);
  }
  return policy;
}

/** Delay before retry `attempt` (0-indexed), without jitter. */
export function backoffDelay(attempt: number, policy: BackoffPolicy): number {
  return Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs);
}

/**
 * The delays p-retry will sleep between `maxAttempts` calls. With jitter this
 * is one random draw; the schedule is always sorted and capped.
 */
export function backoffSchedule(maxAttempts: number, policy: BackoffPolicy): number[] {
  return retry.timeouts(retryOptions(maxAttempts, policy));
}

export function retryOptions(maxAttempts: number, policy: BackoffPolicy): pRetry.Options {
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }
  validateBackoff(policy);
  return {
    retries: maxAttempts - 1,
    factor: 2,
    minTimeout: policy.baseDelayMs,
    maxTimeout: policy.maxDelayMs,
    randomize: policy.jitter,
  };
}
