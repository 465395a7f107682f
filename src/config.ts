/**
 * Default configuration values for fetching
 */
import type { RetryPolicy } from "./fetcher/types";

/** Number of fetches allowed in flight at once in a batch */
export const DEFAULT_MAX_CONCURRENCY = 5;

/** Per-attempt request timeout in milliseconds */
export const DEFAULT_REQUEST_TIMEOUT = 5000;

/** Header set merged into every request unless explicitly suppressed */
export const DEFAULT_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  "User-Agent": "Mozilla/5.0",
});

/**
 * Up to 12 attempts. Delays start at 10ms and double, randomized over the
 * upper half of each step.
 */
export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  maxAttempts: 12,
  baseDelay: 10,
  multiplier: 2,
  jitter: "equal",
} satisfies RetryPolicy);

/** Environment variable holding the initial log level */
export const LOG_LEVEL_ENV = "HTML_FETCH_LOG_LEVEL";
