import { DEFAULT_HEADERS, DEFAULT_REQUEST_TIMEOUT, DEFAULT_RETRY_POLICY } from "../config";
import { FetchError, MaxAttemptsExceededError, TransientFetchError } from "../utils/errors";
import { logger } from "../utils/logger";
import { isDefaultTransientStatus, validateRetryPolicy, withRetry } from "./retry";
import type {
  FetchRequest,
  HttpFetcherOptions,
  HttpResponse,
  HttpSession,
  RawContent,
  RequestConfig,
  RetryPolicy,
} from "./types";

/**
 * Builds the header set for a request. An explicitly empty `params` object
 * opts out of the default headers.
 */
export function resolveHeaders(
  request: FetchRequest,
  defaultHeaders: Readonly<Record<string, string>>,
): Record<string, string> {
  const suppressDefaults =
    request.params !== undefined && Object.keys(request.params).length === 0;
  return suppressDefaults
    ? { ...request.headers }
    : { ...defaultHeaders, ...request.headers };
}

/**
 * Fetches a single HTML page over HTTP, retrying transient failures with
 * exponential backoff.
 */
export class HttpFetcher {
  private readonly retryPolicy: RetryPolicy;
  private readonly timeout: number;
  private readonly defaultHeaders: Readonly<Record<string, string>>;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly random?: () => number;

  constructor(options: HttpFetcherOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    validateRetryPolicy(this.retryPolicy);
    this.timeout = options.timeout ?? DEFAULT_REQUEST_TIMEOUT;
    this.defaultHeaders = options.defaultHeaders ?? DEFAULT_HEADERS;
    this.sleep = options.sleep;
    this.random = options.random;
  }

  /**
   * Performs the GET. Any status the policy does not treat as transient is
   * returned with its body, error pages included. Rejects with
   * {@link MaxAttemptsExceededError} when every attempt failed transiently.
   */
  async fetch(session: HttpSession, request: FetchRequest): Promise<RawContent> {
    const { url } = request;
    const config: RequestConfig = {
      params: request.params,
      headers: resolveHeaders(request, this.defaultHeaders),
      timeout: this.timeout,
    };
    const isTransientStatus = this.retryPolicy.isTransientStatus ?? isDefaultTransientStatus;

    const outcome = await withRetry(
      this.retryPolicy,
      async () => {
        let response: HttpResponse;
        try {
          response = await session.get(url, config);
        } catch (error) {
          if (error instanceof FetchError && !error.isRetryable) {
            throw error;
          }
          const cause = error instanceof Error ? error : new Error(String(error));
          throw new TransientFetchError(
            `Request to ${url} failed: ${cause.message}`,
            url,
            undefined,
            cause,
          );
        }

        if (isTransientStatus(response.status)) {
          throw new TransientFetchError(
            `Request to ${url} returned status ${response.status}`,
            url,
            response.status,
          );
        }
        return {
          source: url,
          content: response.body,
          status: response.status,
        } satisfies RawContent;
      },
      {
        sleep: this.sleep,
        random: this.random,
        onRetry: ({ attempt, delay, error }) => {
          logger.warn(
            `Attempt ${attempt + 1}/${this.retryPolicy.maxAttempts} failed for ${url} (${error.message}). Retrying in ${Math.round(delay)}ms...`,
          );
        },
      },
    );

    if (outcome.status === "exhausted") {
      logger.error(`Giving up on ${url} after ${outcome.attempts} attempts`);
      throw new MaxAttemptsExceededError(url, outcome.attempts, outcome.lastError);
    }
    return outcome.value;
  }
}
