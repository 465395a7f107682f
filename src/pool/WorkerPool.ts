import { DEFAULT_MAX_CONCURRENCY } from "../config";
import { InvalidRequestError } from "../utils/errors";
import { logger } from "../utils/logger";

export function validatePoolSize(size: number): void {
  if (!Number.isInteger(size) || size < 1) {
    throw new InvalidRequestError(`pool size must be an integer >= 1, got ${size}`);
  }
}

type Settled<R> = { ok: true; value: R } | { ok: false; error: unknown };

/**
 * Bounded set of concurrent execution slots. Holds no request state; it only
 * schedules work and hands back results as they complete.
 */
export class WorkerPool {
  private readonly size: number;
  private active = 0;
  private peak = 0;

  constructor(size: number = DEFAULT_MAX_CONCURRENCY) {
    validatePoolSize(size);
    this.size = size;
  }

  /** Number of workers currently running. */
  get activeCount(): number {
    return this.active;
  }

  /** Highest number of workers that ran at the same time. */
  get peakConcurrency(): number {
    return this.peak;
  }

  /**
   * Runs `worker` for every item with at most `size` running at once and
   * yields results in completion order.
   *
   * The first failure is thrown when it is reached; no item starts after a
   * failure. However the generator ends (drained, failed, or abandoned by the
   * consumer), it waits for running workers to settle before returning and
   * discards their results.
   */
  async *run<T, R>(
    items: Iterable<T>,
    worker: (item: T) => Promise<R>,
  ): AsyncGenerator<R, void, undefined> {
    const source = items[Symbol.iterator]();
    const completed: Settled<R>[] = [];
    const running = new Set<Promise<void>>();
    let exhausted = false;
    let stopped = false;
    let wake: (() => void) | undefined;

    const notify = () => {
      const resolve = wake;
      wake = undefined;
      resolve?.();
    };

    const fill = () => {
      while (!stopped && !exhausted && this.active < this.size) {
        let next: IteratorResult<T>;
        try {
          next = source.next();
        } catch (error) {
          completed.push({ ok: false, error });
          exhausted = true;
          break;
        }
        if (next.done) {
          exhausted = true;
          break;
        }
        this.active++;
        this.peak = Math.max(this.peak, this.active);
        const item = next.value;
        const task: Promise<void> = new Promise<R>((resolve) => resolve(worker(item))).then(
          (value) => {
            completed.push({ ok: true, value });
          },
          (error: unknown) => {
            completed.push({ ok: false, error });
            // Nothing new starts once a failure is waiting to be reported
            stopped = true;
          },
        );
        const tracked = task.finally(() => {
          this.active--;
          running.delete(tracked);
          fill();
          notify();
        });
        running.add(tracked);
      }
    };

    try {
      fill();
      while (completed.length > 0 || running.size > 0) {
        const result = completed.shift();
        if (result === undefined) {
          await new Promise<void>((resolve) => {
            wake = resolve;
          });
          continue;
        }
        if (!result.ok) {
          throw result.error;
        }
        yield result.value;
      }
    } finally {
      stopped = true;
      if (running.size > 0) {
        logger.debug(`Waiting for ${running.size} running task(s) to settle`);
        await Promise.allSettled([...running]);
      }
    }
  }
}
