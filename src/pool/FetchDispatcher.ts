import { DEFAULT_MAX_CONCURRENCY } from "../config";
import type { HttpFetcher } from "../fetcher/HttpFetcher";
import type { FetchRequest, HttpSession, RawContent } from "../fetcher/types";
import { logger } from "../utils/logger";
import { WorkerPool, validatePoolSize } from "./WorkerPool";

/**
 * Pairs elements of two iterables by position, stopping at the shorter one.
 */
export function* zipPositional<A, B>(
  first: Iterable<A>,
  second: Iterable<B>,
): Generator<[A, B], void, undefined> {
  const left = first[Symbol.iterator]();
  const right = second[Symbol.iterator]();
  while (true) {
    const a = left.next();
    if (a.done) return;
    const b = right.next();
    if (b.done) return;
    yield [a.value, b.value];
  }
}

/**
 * Fans fetches out over a fixed-size worker pool.
 */
export class FetchDispatcher {
  private readonly fetcher: HttpFetcher;
  private readonly concurrency: number;
  private lastPool: WorkerPool | undefined;

  constructor(fetcher: HttpFetcher, concurrency: number = DEFAULT_MAX_CONCURRENCY) {
    validatePoolSize(concurrency);
    this.fetcher = fetcher;
    this.concurrency = concurrency;
  }

  /** Peak number of simultaneous fetches seen by the most recent dispatch. */
  get lastPeakConcurrency(): number {
    return this.lastPool?.peakConcurrency ?? 0;
  }

  /**
   * Fetches every request with the session at the same position and yields
   * raw bodies in completion order. The first unrecovered failure is thrown
   * when reached; fetches already running are left to finish.
   */
  async *dispatchAll(
    sessions: Iterable<HttpSession>,
    requests: Iterable<FetchRequest>,
  ): AsyncGenerator<RawContent, void, undefined> {
    const pool = new WorkerPool(this.concurrency);
    this.lastPool = pool;
    logger.debug(`Dispatching fetches with concurrency ${this.concurrency}`);

    yield* pool.run(zipPositional(sessions, requests), ([session, request]) =>
      this.fetcher.fetch(session, request),
    );
  }
}
