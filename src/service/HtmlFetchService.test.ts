import { type Mock, beforeEach, describe, expect, it, vi } from "vitest";
import type { HttpResponse, HttpSession, RequestConfig, RetryPolicy } from "../fetcher/types";
import {
  InvalidRequestError,
  MaxAttemptsExceededError,
  NetworkExhaustedError,
} from "../utils/errors";
import { HtmlFetchService, type HtmlFetchServiceOptions, type ParsedDocument } from "./HtmlFetchService";

vi.mock("../utils/logger");

type Handler = (url: string, config: RequestConfig) => Promise<HttpResponse>;

class FakeSession implements HttpSession {
  closed = false;
  readonly get: Mock<Handler>;

  constructor(handler: Handler) {
    this.get = vi.fn(handler);
  }

  close(): void {
    this.closed = true;
  }
}

const page = (count: string) =>
  [
    "<html><head><title>listing</title></head><body>",
    `<span class="totalcount">${count}</span>`,
    '<div class="other">drop me</div>',
    '<ul class="rows"><li>first</li><li>second</li></ul>',
    "<footer>footer</footer>",
    "</body></html>",
  ].join("");

/** Answers with a page whose total count is the last path segment of the URL. */
const serve: Handler = async (url) => ({
  status: 200,
  body: page(url.split("/").pop() ?? ""),
  url,
});

const pause = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const policy: RetryPolicy = { maxAttempts: 3, baseDelay: 5, multiplier: 2, jitter: "none" };

const urlsFor = (count: number) =>
  Array.from({ length: count }, (_, i) => `https://example.com/search/${i}`);

describe("HtmlFetchService", () => {
  let sessions: FakeSession[];
  let handler: Handler;
  let sleep: Mock<(ms: number) => Promise<void>>;

  const createService = (options: HtmlFetchServiceOptions = {}) =>
    new HtmlFetchService({
      retryPolicy: policy,
      sleep,
      createSession: () => {
        const session = new FakeSession((url, config) => handler(url, config));
        sessions.push(session);
        return session;
      },
      ...options,
    });

  const drain = async (iterable: AsyncIterable<ParsedDocument>) => {
    const received: ParsedDocument[] = [];
    let failure: unknown;
    try {
      for await (const document of iterable) {
        received.push(document);
      }
    } catch (error) {
      failure = error;
    }
    return { received, failure };
  };

  beforeEach(() => {
    sessions = [];
    handler = serve;
    sleep = vi.fn(async (_ms: number) => {});
  });

  describe("single fetch", () => {
    it("yields exactly one filtered document for a bare URL", async () => {
      const service = createService();

      const documents = await service.fetchAll("https://example.com/search/12");

      expect(documents).toHaveLength(1);
      const [{ source, status, dom }] = documents;
      expect(source).toBe("https://example.com/search/12");
      expect(status).toBe(200);
      expect(dom("span.totalcount").text()).toBe("12");
      expect(dom("ul.rows li").length).toBe(2);
      expect(dom(".other").length).toBe(0);
      expect(dom("footer").length).toBe(0);
      expect(dom("title").length).toBe(0);
    });

    it("uses one session and closes it", async () => {
      const service = createService();

      await service.fetchAll("https://example.com/search/1");

      expect(sessions).toHaveLength(1);
      expect(sessions[0].get).toHaveBeenCalledTimes(1);
      expect(sessions[0].closed).toBe(true);
    });

    it("takes the single path for a one-element list", async () => {
      const service = createService();

      const documents = await service.fetchAll(["https://example.com/search/3"]);

      expect(documents).toHaveLength(1);
      expect(sessions).toHaveLength(1);
      expect(service.lastPeakConcurrency).toBe(0);
    });

    it("sends the default User-Agent with the query params", async () => {
      const service = createService();

      await service.fetchAll("https://example.com/search/1", { query: "bike" });

      expect(sessions[0].get).toHaveBeenCalledWith("https://example.com/search/1", {
        params: { query: "bike" },
        headers: { "User-Agent": "Mozilla/5.0" },
        timeout: 5000,
      });
    });

    it("sends no default headers when params is empty", async () => {
      const service = createService();

      await service.fetchAll("https://example.com/search/1", {});

      expect(sessions[0].get.mock.calls[0][1].headers).toEqual({});
    });

    it("behaves the same for a params list of one and a params object", async () => {
      const service = createService();

      await service.fetchAll(["https://example.com/search/1"], [{ query: "bike" }]);
      await service.fetchAll("https://example.com/search/1", { query: "bike" });

      expect(sessions).toHaveLength(2);
      expect(sessions[0].get.mock.calls).toEqual(sessions[1].get.mock.calls);
    });
  });

  describe("batch fetch", () => {
    it("yields one filtered document per URL", async () => {
      const service = createService();
      const urls = urlsFor(4);

      const documents = await service.fetchAll(urls);

      expect(documents.map((document) => document.source).sort()).toEqual(urls);
      for (const document of documents) {
        const expected = document.source.split("/").pop();
        expect(document.dom("span.totalcount").text()).toBe(expected);
        expect(document.dom(".other").length).toBe(0);
      }
    });

    it("opens one session per request and closes them all", async () => {
      const service = createService();

      await service.fetchAll(urlsFor(3));

      expect(sessions).toHaveLength(3);
      expect(sessions.every((session) => session.closed)).toBe(true);
      expect(sessions.every((session) => session.get.mock.calls.length === 1)).toBe(true);
    });

    it("applies a params list by position", async () => {
      const service = createService();
      const urls = urlsFor(2);

      await service.fetchAll(urls, [{ query: "bike" }, { query: "car" }]);

      const sent = sessions.map((session) => session.get.mock.calls[0]);
      expect(sent.map(([url, config]) => [url, config.params])).toEqual([
        [urls[0], { query: "bike" }],
        [urls[1], { query: "car" }],
      ]);
    });

    it("yields documents in completion order", async () => {
      let releaseSlow: () => void = () => {};
      const slowGate = new Promise<void>((resolve) => {
        releaseSlow = resolve;
      });
      handler = async (url, config) => {
        if (url.endsWith("/slow")) await slowGate;
        return serve(url, config);
      };
      const service = createService();
      const iterator = service.fetchMany([
        "https://example.com/search/slow",
        "https://example.com/search/fast",
      ]);

      const first = await iterator.next();
      releaseSlow();
      const second = await iterator.next();

      expect(first).toEqual({
        done: false,
        value: expect.objectContaining({ source: "https://example.com/search/fast" }),
      });
      expect(second).toEqual({
        done: false,
        value: expect.objectContaining({ source: "https://example.com/search/slow" }),
      });
      expect((await iterator.next()).done).toBe(true);
    });

    it("never has more than five fetches in flight for twenty URLs", async () => {
      let inFlight = 0;
      let maxInFlight = 0;
      handler = async (url, config) => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await pause(2);
        inFlight--;
        return serve(url, config);
      };
      const service = createService();

      const documents = await service.fetchAll(urlsFor(20));

      expect(documents).toHaveLength(20);
      expect(maxInFlight).toBeLessThanOrEqual(5);
      expect(service.lastPeakConcurrency).toBe(5);
    });

    it("honours a custom concurrency", async () => {
      const service = createService({ concurrency: 2 });

      await service.fetchAll(urlsFor(6));

      expect(service.lastPeakConcurrency).toBe(2);
    });

    it("closes every session when the consumer stops early", async () => {
      handler = async (url, config) => {
        await pause(5);
        return serve(url, config);
      };
      const service = createService({ concurrency: 2 });

      for await (const _ of service.fetchMany(urlsFor(6))) {
        break;
      }

      expect(sessions.length).toBeGreaterThan(0);
      expect(sessions.length).toBeLessThan(6);
      expect(sessions.every((session) => session.closed)).toBe(true);
    });

    it("yields nothing for an empty list", async () => {
      const service = createService();

      expect(await service.fetchAll([])).toEqual([]);
      expect(sessions).toHaveLength(0);
    });
  });

  describe("retries", () => {
    it("recovers from transient failures", async () => {
      let calls = 0;
      handler = async (url, config) => {
        calls++;
        if (calls <= 2) return { status: 503, body: "", url };
        return serve(url, config);
      };
      const service = createService();

      const documents = await service.fetchAll("https://example.com/search/7");

      expect(documents).toHaveLength(1);
      expect(documents[0].dom("span.totalcount").text()).toBe("7");
      expect(sessions[0].get).toHaveBeenCalledTimes(3);
      expect(sleep.mock.calls).toEqual([[5], [10]]);
    });

    it("raises NetworkExhaustedError once attempts run out", async () => {
      handler = async () => {
        throw new Error("connect ECONNREFUSED");
      };
      const service = createService();

      const { received, failure } = await drain(service.fetchMany("https://example.com/search/1"));

      expect(received).toEqual([]);
      expect(failure).toBeInstanceOf(NetworkExhaustedError);
      expect(failure).toMatchObject({
        message: "Maximum request attempts exhausted - check network connection.",
        cause: expect.any(MaxAttemptsExceededError),
      });
      expect(sessions[0].get).toHaveBeenCalledTimes(3);
      expect(sessions[0].closed).toBe(true);
    });

    it("keeps documents yielded before a batch runs out of attempts", async () => {
      handler = async (url, config) => {
        if (url.endsWith("/down")) return { status: 500, body: "", url };
        return serve(url, config);
      };
      sleep.mockImplementation(() => pause(1));
      const service = createService();

      const { received, failure } = await drain(
        service.fetchMany(["https://example.com/search/1", "https://example.com/search/down"]),
      );

      expect(received.map((document) => document.source)).toEqual([
        "https://example.com/search/1",
      ]);
      expect(received[0].dom("span.totalcount").text()).toBe("1");
      expect(failure).toBeInstanceOf(NetworkExhaustedError);
      expect(sessions.every((session) => session.closed)).toBe(true);
    });

    it("yields error pages alongside the rest of a batch", async () => {
      handler = async (url, config) => {
        if (url.endsWith("/gone")) return { status: 404, body: page("gone"), url };
        return serve(url, config);
      };
      const service = createService();

      const documents = await service.fetchAll([
        "https://example.com/search/1",
        "https://example.com/search/gone",
        "https://example.com/search/2",
      ]);

      const bySource = [...documents].sort((a, b) => a.source.localeCompare(b.source));
      expect(bySource.map(({ source, status }) => [source, status])).toEqual([
        ["https://example.com/search/1", 200],
        ["https://example.com/search/2", 200],
        ["https://example.com/search/gone", 404],
      ]);
      expect(bySource[2].dom("span.totalcount").text()).toBe("gone");
      expect(sessions.every((session) => session.get.mock.calls.length === 1)).toBe(true);
      expect(sleep).not.toHaveBeenCalled();
    });
  });

  describe("input validation", () => {
    it("throws before any network call for a malformed URL", () => {
      const service = createService();

      expect(() => service.fetchMany("not a url")).toThrow(InvalidRequestError);
      expect(() => service.fetchMany(["https://example.com/a", ""])).toThrow(InvalidRequestError);
      expect(sessions).toHaveLength(0);
    });

    it("throws for a params list that does not match the URLs", () => {
      const service = createService();

      expect(() => service.fetchMany(urlsFor(3), [{ query: "a" }, { query: "b" }])).toThrow(
        InvalidRequestError,
      );
    });

    it("rejects an invalid concurrency at construction", () => {
      expect(() => createService({ concurrency: 0 })).toThrow(InvalidRequestError);
    });
  });
});
