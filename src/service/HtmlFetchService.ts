import type { CheerioAPI } from "cheerio";
import { DEFAULT_MAX_CONCURRENCY } from "../config";
import { AxiosSession } from "../fetcher/AxiosSession";
import { HttpFetcher } from "../fetcher/HttpFetcher";
import type {
  FetchRequest,
  HttpFetcherOptions,
  HttpSession,
  RawContent,
} from "../fetcher/types";
import { DocumentFilter, defaultDocumentFilter } from "../filter/DocumentFilter";
import { FetchDispatcher } from "../pool/FetchDispatcher";
import { MaxAttemptsExceededError, NetworkExhaustedError } from "../utils/errors";
import { logger } from "../utils/logger";
import { type FetchTarget, type ParamsInput, type UrlInput, resolveFetchTarget } from "./target";

/**
 * A fetched page, parsed with only the retained elements.
 */
export interface ParsedDocument {
  /** URL the page was requested from */
  source: string;
  /** HTTP status of the final attempt; error pages are yielded too */
  status: number;
  dom: CheerioAPI;
}

export interface HtmlFetchServiceOptions extends HttpFetcherOptions {
  /** Worker pool size for batches */
  concurrency?: number;
  filter?: DocumentFilter;
  /** Creates the connection context for each fetch */
  createSession?: () => HttpSession;
}

/**
 * Fetches one or many HTML pages and yields them parsed through a
 * {@link DocumentFilter}, in the order the fetches complete.
 */
export class HtmlFetchService {
  private readonly fetcher: HttpFetcher;
  private readonly dispatcher: FetchDispatcher;
  private readonly filter: DocumentFilter;
  private readonly createSession: () => HttpSession;

  constructor(options: HtmlFetchServiceOptions = {}) {
    this.fetcher = new HttpFetcher(options);
    this.dispatcher = new FetchDispatcher(
      this.fetcher,
      options.concurrency ?? DEFAULT_MAX_CONCURRENCY,
    );
    this.filter = options.filter ?? defaultDocumentFilter;
    this.createSession = options.createSession ?? (() => new AxiosSession());
  }

  /** Peak concurrency of the most recent batch. */
  get lastPeakConcurrency(): number {
    return this.dispatcher.lastPeakConcurrency;
  }

  /**
   * Fetches `urls` and yields parsed documents as they become available.
   *
   * Input is validated before this returns, so malformed URLs or params
   * throw right away. The sequence is finite and cannot be restarted. Leaving
   * a `for await` loop early still closes every connection once running
   * fetches have settled.
   *
   * @throws {NetworkExhaustedError} from the sequence when a fetch ran out of
   *   attempts; documents yielded before that remain valid.
   */
  fetchMany(urls: UrlInput, params?: ParamsInput): AsyncGenerator<ParsedDocument, void, undefined> {
    const target = resolveFetchTarget(urls, params);
    return this.run(target);
  }

  /**
   * Collects every document of {@link fetchMany} into an array.
   */
  async fetchAll(urls: UrlInput, params?: ParamsInput): Promise<ParsedDocument[]> {
    const documents: ParsedDocument[] = [];
    for await (const document of this.fetchMany(urls, params)) {
      documents.push(document);
    }
    return documents;
  }

  private async *run(target: FetchTarget): AsyncGenerator<ParsedDocument, void, undefined> {
    try {
      if (target.kind === "single") {
        logger.debug(`Fetching single page ${target.request.url}`);
        yield await this.fetchSingle(target.request);
      } else {
        logger.debug(`Fetching batch of ${target.requests.length} pages`);
        yield* this.fetchBatch(target.requests);
      }
    } catch (error) {
      if (error instanceof MaxAttemptsExceededError) {
        throw new NetworkExhaustedError(error);
      }
      throw error;
    }
  }

  private async fetchSingle(request: FetchRequest): Promise<ParsedDocument> {
    const session = this.createSession();
    try {
      return this.toDocument(await this.fetcher.fetch(session, request));
    } finally {
      session.close();
    }
  }

  private async *fetchBatch(
    requests: readonly FetchRequest[],
  ): AsyncGenerator<ParsedDocument, void, undefined> {
    const opened: HttpSession[] = [];
    const createSession = this.createSession;
    // Sessions are opened lazily as the pool picks up each request
    function* sessions(): Generator<HttpSession, void, undefined> {
      for (let i = 0; i < requests.length; i++) {
        const session = createSession();
        opened.push(session);
        yield session;
      }
    }

    try {
      for await (const raw of this.dispatcher.dispatchAll(sessions(), requests)) {
        yield this.toDocument(raw);
      }
    } finally {
      for (const session of opened) {
        session.close();
      }
      logger.debug(`Closed ${opened.length} session(s)`);
    }
  }

  private toDocument(raw: RawContent): ParsedDocument {
    return {
      source: raw.source,
      status: raw.status,
      dom: this.filter.parse(raw.content),
    };
  }
}
