/**
 * Retry Policy
 *
 * One policy shape, two runners: `withRetrySync` blocks the calling thread
 * between attempts, `withRetry` suspends on a timer. Nodes pick the runner
 * matching their execution mode; the attempt accounting is shared.
 */

import { ConfigurationError } from "../errors";
import type { Awaitable } from "./types";

export interface RetryPolicy {
  /** Total number of attempts (1 = no retry) */
  maxRetries: number;
  /** Seconds to wait between attempts */
  wait: number;
}

export interface RetryContext {
  /** Attempt that just failed (1-indexed) */
  attempt: number;
  maxRetries: number;
  /** Seconds about to be waited */
  wait: number;
  error: unknown;
}

export interface RetryHandlers<T> {
  /** Receives the last attempt's error once every attempt has failed */
  onExhausted: (error: unknown, attempts: number) => T;
  onRetry?: (context: RetryContext) => void;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 1,
  wait: 0,
};

/**
 * Build a validated retry policy
 */
export function createRetryPolicy(
  maxRetries: number = DEFAULT_RETRY_POLICY.maxRetries,
  wait: number = DEFAULT_RETRY_POLICY.wait,
): RetryPolicy {
  if (!Number.isInteger(maxRetries) || maxRetries < 1) {
    throw new ConfigurationError(
      `maxRetries must be an integer >= 1, got ${String(maxRetries)}`,
    );
  }
  if (!Number.isFinite(wait) || wait < 0) {
    throw new ConfigurationError(
      `wait must be a finite number of seconds >= 0, got ${String(wait)}`,
    );
  }
  return { maxRetries, wait };
}

/**
 * Sleep utility for delays
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Block the current thread for `ms` milliseconds
 */
export function sleepSync(ms: number): void {
  if (ms <= 0) return;
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

/**
 * Decide what happens after a failed attempt: either the wait before the
 * next one, or null when the attempts are used up.
 */
function nextWait(
  policy: RetryPolicy,
  attempt: number,
  error: unknown,
  onRetry?: (context: RetryContext) => void,
): number | null {
  if (attempt >= policy.maxRetries) return null;
  onRetry?.({ attempt, maxRetries: policy.maxRetries, wait: policy.wait, error });
  return policy.wait * 1000;
}

/**
 * Execute a function with retry logic, suspending between attempts
 */
export async function withRetry<T>(
  fn: (retry: number) => Awaitable<T>,
  policy: RetryPolicy,
  handlers: RetryHandlers<Awaitable<T>>,
): Promise<T> {
  for (let retry = 0; ; retry++) {
    try {
      return await fn(retry);
    } catch (e) {
      const delay = nextWait(policy, retry + 1, e, handlers.onRetry);
      if (delay === null) {
        return await handlers.onExhausted(e, retry + 1);
      }
      if (delay > 0) await sleep(delay);
    }
  }
}

/**
 * Execute a function with retry logic, blocking between attempts
 */
export function withRetrySync<T>(
  fn: (retry: number) => T,
  policy: RetryPolicy,
  handlers: RetryHandlers<T>,
): T {
  for (let retry = 0; ; retry++) {
    try {
      return fn(retry);
    } catch (e) {
      const delay = nextWait(policy, retry + 1, e, handlers.onRetry);
      if (delay === null) {
        return handlers.onExhausted(e, retry + 1);
      }
      sleepSync(delay);
    }
  }
}
