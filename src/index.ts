export {
  DEFAULT_HEADERS,
  DEFAULT_MAX_CONCURRENCY,
  DEFAULT_REQUEST_TIMEOUT,
  DEFAULT_RETRY_POLICY,
} from "./config";
export { AxiosSession, serializeParams } from "./fetcher/AxiosSession";
export { HttpFetcher, resolveHeaders } from "./fetcher/HttpFetcher";
export {
  computeBackoff,
  isDefaultTransientStatus,
  validateRetryPolicy,
  withRetry,
} from "./fetcher/retry";
export type { RetryHooks, RetryOutcome } from "./fetcher/retry";
export { createFetchRequest } from "./fetcher/types";
export type {
  FetchRequest,
  HttpFetcherOptions,
  HttpResponse,
  HttpSession,
  JitterMode,
  QueryParamValue,
  QueryParams,
  RawContent,
  RequestConfig,
  RetryPolicy,
} from "./fetcher/types";
export {
  DEFAULT_FILTER_RULES,
  DocumentFilter,
  defaultDocumentFilter,
} from "./filter/DocumentFilter";
export type { FilterRule } from "./filter/DocumentFilter";
export { FetchDispatcher, zipPositional } from "./pool/FetchDispatcher";
export { WorkerPool } from "./pool/WorkerPool";
export { HtmlFetchService } from "./service/HtmlFetchService";
export type { HtmlFetchServiceOptions, ParsedDocument } from "./service/HtmlFetchService";
export { resolveFetchTarget, unwrapParams } from "./service/target";
export type { FetchTarget, ParamsInput, UrlInput } from "./service/target";
export {
  FetchError,
  InvalidRequestError,
  MaxAttemptsExceededError,
  NetworkExhaustedError,
  TransientFetchError,
} from "./utils/errors";
export { LogLevel, getLogLevel, parseLogLevel, setLogLevel } from "./utils/logger";
