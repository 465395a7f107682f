import { FetchError, InvalidRequestError } from "../utils/errors";
import type { RetryPolicy } from "./types";

/**
 * Result of {@link withRetry}. Exhaustion is a value, not an exception, so the
 * caller decides how to report it.
 */
export type RetryOutcome<T> =
  | { status: "success"; value: T; attempts: number }
  | { status: "exhausted"; attempts: number; lastError: Error };

export interface RetryHooks {
  /** Called before sleeping ahead of the next attempt */
  onRetry?: (info: { attempt: number; delay: number; error: Error }) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/**
 * Statuses retried unless a policy says otherwise: request timeout,
 * too many requests and every 5xx.
 */
export function isDefaultTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || (status >= 500 && status < 600);
}

export function validateRetryPolicy(policy: RetryPolicy): void {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new InvalidRequestError(
      `maxAttempts must be an integer >= 1, got ${policy.maxAttempts}`,
    );
  }
  if (!(policy.baseDelay > 0)) {
    throw new InvalidRequestError(`baseDelay must be > 0, got ${policy.baseDelay}`);
  }
  if (!(policy.multiplier > 1)) {
    throw new InvalidRequestError(`multiplier must be > 1, got ${policy.multiplier}`);
  }
  if (policy.maxDelay !== undefined && !(policy.maxDelay >= policy.baseDelay)) {
    throw new InvalidRequestError(
      `maxDelay must be >= baseDelay (${policy.baseDelay}), got ${policy.maxDelay}`,
    );
  }
}

/**
 * Delay in milliseconds to wait after the failed attempt with the given
 * zero-based index.
 */
export function computeBackoff(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random,
): number {
  const ceiling = Math.min(
    policy.baseDelay * policy.multiplier ** attempt,
    policy.maxDelay ?? Number.POSITIVE_INFINITY,
  );
  switch (policy.jitter) {
    case "none":
      return ceiling;
    case "full":
      return random() * ceiling;
    case "equal":
      return ceiling / 2 + (random() * ceiling) / 2;
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRetryable(error: unknown): error is FetchError {
  return error instanceof FetchError && error.isRetryable;
}

/**
 * Runs `operation` until it succeeds, fails with a non-retryable error, or
 * `policy.maxAttempts` attempts have been made.
 *
 * Only {@link FetchError}s flagged `isRetryable` trigger another attempt;
 * anything else is rethrown immediately. Each wait is at least as long as
 * the one before it.
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  operation: (attempt: number) => Promise<T>,
  hooks: RetryHooks = {},
): Promise<RetryOutcome<T>> {
  validateRetryPolicy(policy);
  const sleep = hooks.sleep ?? delay;

  let lastError: Error | undefined;
  let previousDelay = 0;
  for (let attempt = 0; attempt < policy.maxAttempts; attempt++) {
    try {
      const value = await operation(attempt);
      return { status: "success", value, attempts: attempt + 1 };
    } catch (error) {
      if (!isRetryable(error)) {
        throw error;
      }
      lastError = error;
      if (attempt + 1 < policy.maxAttempts) {
        // Jitter may draw below the last wait; delays never shrink
        const wait = Math.max(computeBackoff(policy, attempt, hooks.random), previousDelay);
        previousDelay = wait;
        hooks.onRetry?.({ attempt, delay: wait, error });
        await sleep(wait);
      }
    }
  }

  return {
    status: "exhausted",
    attempts: policy.maxAttempts,
    lastError: lastError ?? new Error("No attempt was made"),
  };
}
