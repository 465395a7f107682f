class FetchError extends Error {
  constructor(
    message: string,
    public readonly isRetryable: boolean = false,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * A failure that another attempt might fix: network error, timeout or a
 * transient HTTP status.
 */
class TransientFetchError extends FetchError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly statusCode?: number,
    cause?: Error,
  ) {
    super(message, true, cause);
  }
}

/**
 * Raised by the fetcher once every attempt has failed transiently.
 */
class MaxAttemptsExceededError extends FetchError {
  constructor(
    public readonly url: string,
    public readonly attempts: number,
    cause?: Error,
  ) {
    super(
      `Failed to fetch ${url} after ${attempts} attempts: ${cause?.message ?? "Unknown error"}`,
      false,
      cause,
    );
  }
}

/**
 * Caller-facing form of {@link MaxAttemptsExceededError}.
 */
class NetworkExhaustedError extends FetchError {
  constructor(cause?: Error) {
    super("Maximum request attempts exhausted - check network connection.", false, cause);
  }
}

class InvalidRequestError extends FetchError {
  constructor(message: string, cause?: Error) {
    super(`Invalid request: ${message}`, false, cause);
  }
}

export {
  FetchError,
  TransientFetchError,
  MaxAttemptsExceededError,
  NetworkExhaustedError,
  InvalidRequestError,
};
