/**
 * A single query-parameter value. Arrays are sent as repeated keys.
 */
export type QueryParamValue = string | readonly string[];

/**
 * Query parameters for a request.
 * An empty object is meaningful: it suppresses the default header set.
 */
export type QueryParams = Readonly<Record<string, QueryParamValue>>;

/**
 * A request for one HTML page. Frozen once created.
 */
export interface FetchRequest {
  /** Absolute http(s) URL */
  readonly url: string;
  /** Query parameters merged into the URL */
  readonly params?: QueryParams;
  /** Headers sent on top of (or instead of) the default header set */
  readonly headers?: Readonly<Record<string, string>>;
}

/**
 * How backoff delays are randomized.
 * - `none`: the exponential ceiling itself
 * - `full`: uniform in `[0, ceiling)`
 * - `equal`: uniform in `[ceiling / 2, ceiling)`
 */
export type JitterMode = "none" | "full" | "equal";

/**
 * Bounded retry with exponential backoff.
 */
export interface RetryPolicy {
  /** Total attempts, including the first one */
  maxAttempts: number;
  /** Delay before the second attempt, in milliseconds */
  baseDelay: number;
  /** Growth factor applied per attempt */
  multiplier: number;
  jitter: JitterMode;
  /** Upper bound for a single delay in milliseconds */
  maxDelay?: number;
  /** Decides which HTTP statuses are worth another attempt */
  isTransientStatus?: (status: number) => boolean;
}

/**
 * Per-request settings handed to an {@link HttpSession}.
 */
export interface RequestConfig {
  params?: QueryParams;
  headers: Record<string, string>;
  /** Timeout in milliseconds */
  timeout: number;
}

export interface HttpResponse {
  status: number;
  body: string;
  url: string;
}

/**
 * Connection context for HTTP calls. Holds connection-pooling state and
 * must not be shared between concurrently running fetches.
 */
export interface HttpSession {
  /**
   * Issues a GET request. Resolves for every HTTP status; rejects only on
   * transport failures (network error, timeout).
   */
  get(url: string, config: RequestConfig): Promise<HttpResponse>;

  /**
   * Releases the pooled connections. Safe to call more than once.
   */
  close(): void;
}

/**
 * Raw body of a completed fetch, before parsing.
 */
export interface RawContent {
  /** URL the content was requested from */
  source: string;
  content: string;
  status: number;
}

/**
 * Options for {@link HttpFetcher}.
 */
export interface HttpFetcherOptions {
  retryPolicy?: RetryPolicy;
  /** Per-attempt timeout in milliseconds */
  timeout?: number;
  /** Header set merged into every request unless params is `{}` */
  defaultHeaders?: Readonly<Record<string, string>>;
  /** Replaces the real timer between attempts */
  sleep?: (ms: number) => Promise<void>;
  /** Source of randomness for jitter */
  random?: () => number;
}

/**
 * Creates a frozen {@link FetchRequest}.
 */
export function createFetchRequest(
  url: string,
  params?: QueryParams,
  headers?: Readonly<Record<string, string>>,
): FetchRequest {
  const request: { url: string; params?: QueryParams; headers?: Record<string, string> } = {
    url,
  };
  if (params !== undefined) {
    request.params = Object.freeze({ ...params });
  }
  if (headers !== undefined) {
    request.headers = Object.freeze({ ...headers });
  }
  return Object.freeze(request);
}
