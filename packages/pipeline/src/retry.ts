/**
 * @escrowhook/pipeline: Retry with exponential backoff.
 *
 * Drives a loop over a Result-returning step. A failed Result is the
 * retry signal; a thrown error is captured and treated the same way.
 * Every failure is retryable here: permanence is only established by
 * running out of attempts.
 *
 * Backoff formula for attempt k (1-based):
 *   min(initialDelayMs * multiplier^(k-1) + jitter, maxDelayMs)
 * where jitter = random(0, jitterMs), 0 by default.
 */

import type { Result } from "@escrowhook/types";
import { toError } from "@escrowhook/types";

export interface RetryPolicy {
  /** Maximum number of attempts, including the first. Default: 5 */
  readonly maxAttempts: number;
  /** Delay after the first failed attempt. Default: 2000 */
  readonly initialDelayMs: number;
  /** Upper bound on any single delay. Default: 10000 */
  readonly maxDelayMs: number;
  /** Growth factor between delays. Default: 2 */
  readonly multiplier: number;
  /** Maximum random jitter added to each delay. Default: 0 */
  readonly jitterMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  initialDelayMs: 2000,
  maxDelayMs: 10000,
  multiplier: 2,
  jitterMs: 0,
};

/**
 * Throw if a policy cannot produce a sane schedule.
 */
export function validateRetryPolicy(policy: RetryPolicy): void {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new Error(`maxAttempts must be an integer >= 1, got ${policy.maxAttempts}`);
  }
  if (policy.initialDelayMs < 0 || policy.maxDelayMs < 0 || policy.jitterMs < 0) {
    throw new Error("Retry delays must be >= 0");
  }
  if (policy.multiplier < 1) {
    throw new Error(`multiplier must be >= 1, got ${policy.multiplier}`);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay to wait after attempt `attempt` (1-based) fails.
 */
export function computeDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  const exponential = policy.initialDelayMs * Math.pow(policy.multiplier, attempt - 1);
  const jitter = policy.jitterMs > 0 ? random() * policy.jitterMs : 0;
  return Math.min(exponential + jitter, policy.maxDelayMs);
}

/**
 * The delay for every attempt of a policy, without jitter.
 *
 * Only the first maxAttempts - 1 entries are ever waited: there is no
 * wait after the final attempt.
 */
export function backoffSchedule(policy: RetryPolicy): readonly number[] {
  const noJitter: RetryPolicy = { ...policy, jitterMs: 0 };
  const schedule: number[] = [];
  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    schedule.push(computeDelay(attempt, noJitter));
  }
  return schedule;
}

// =============================================================================
// Retry loop
// =============================================================================

export interface RetryAttemptInfo {
  /** The attempt that just failed (1-based) */
  readonly attempt: number;
  readonly error: Error;
  /** Delay before the next attempt */
  readonly delayMs: number;
}

export interface RetryOptions {
  /** Injectable for tests */
  readonly sleep?: ((ms: number) => Promise<void>) | undefined;
  /** Called after each failed attempt that will be retried */
  readonly onRetry?: ((info: RetryAttemptInfo) => void) | undefined;
  readonly random?: (() => number) | undefined;
}

export type RetryOutcome<T> =
  | {
      readonly ok: true;
      readonly value: T;
      readonly attempts: number;
      readonly waits: readonly number[];
    }
  | {
      readonly ok: false;
      readonly error: Error;
      readonly attempts: number;
      readonly waits: readonly number[];
    };

/**
 * Run `step` until it returns an ok Result or the policy is exhausted.
 *
 * Never throws for a step failure: exhaustion is reported as
 * `{ ok: false, error, attempts }` carrying the last error.
 */
export async function runWithRetry<T>(
  step: (attempt: number) => Promise<Result<T, Error>> | Result<T, Error>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = {},
): Promise<RetryOutcome<T>> {
  const sleepFn = options.sleep ?? sleep;
  const waits: number[] = [];
  let lastError: Error = new Error("Retry loop did not run");

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    let result: Result<T, Error>;
    try {
      result = await step(attempt);
    } catch (e: unknown) {
      result = { ok: false, error: toError(e) };
    }

    if (result.ok) {
      return { ok: true, value: result.value, attempts: attempt, waits };
    }

    lastError = result.error;

    // No wait after the final attempt
    if (attempt < policy.maxAttempts) {
      const delayMs = computeDelay(attempt, policy, options.random);
      options.onRetry?.({ attempt, error: lastError, delayMs });
      waits.push(delayMs);
      await sleepFn(delayMs);
    }
  }

  return { ok: false, error: lastError, attempts: policy.maxAttempts, waits };
}
