import { type FetchRequest, type QueryParams, createFetchRequest } from "../fetcher/types";
import { InvalidRequestError } from "../utils/errors";

/** One URL or an ordered collection of URLs. */
export type UrlInput = string | readonly string[];

/** One set of query parameters, or one per URL. */
export type ParamsInput = QueryParams | readonly QueryParams[];

/**
 * Input shape resolved once at the service boundary.
 */
export type FetchTarget =
  | { kind: "single"; request: FetchRequest }
  | { kind: "batch"; requests: readonly FetchRequest[] };

function isParamsList(params: ParamsInput): params is readonly QueryParams[] {
  return Array.isArray(params);
}

/**
 * Unwraps a one-element params list so that a batch of one looks exactly like
 * a single call.
 */
export function unwrapParams(params: ParamsInput | undefined): ParamsInput | undefined {
  if (params !== undefined && isParamsList(params) && params.length === 1) {
    return params[0];
  }
  return params;
}

function validateUrl(url: unknown): string {
  if (typeof url !== "string" || url.trim() === "") {
    throw new InvalidRequestError(`expected a non-empty URL string, got ${JSON.stringify(url)}`);
  }
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new InvalidRequestError(
      `unparsable URL ${url}`,
      error instanceof Error ? error : undefined,
    );
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new InvalidRequestError(`unsupported protocol in ${url}`);
  }
  return url;
}

/**
 * Normalizes URLs and params into a {@link FetchTarget}. Throws
 * {@link InvalidRequestError} for malformed input; never touches the network.
 *
 * A params list is applied by position and must have one entry per URL; a
 * single params object applies to every URL.
 */
export function resolveFetchTarget(urls: UrlInput, params?: ParamsInput): FetchTarget {
  const list = typeof urls === "string" ? [urls] : [...urls];
  const validated = list.map(validateUrl);
  const normalized = unwrapParams(params);

  const paramsAt = (index: number): QueryParams | undefined => {
    if (normalized === undefined) return undefined;
    return isParamsList(normalized) ? normalized[index] : normalized;
  };

  if (normalized !== undefined && isParamsList(normalized) && normalized.length !== validated.length) {
    throw new InvalidRequestError(
      `got ${normalized.length} params entries for ${validated.length} URL(s)`,
    );
  }

  const requests = validated.map((url, index) => createFetchRequest(url, paramsAt(index)));
  if (requests.length === 1) {
    return { kind: "single", request: requests[0] };
  }
  return { kind: "batch", requests };
}
