import http from "node:http";
import https from "node:https";
import axios, { type AxiosInstance } from "axios";
import { FetchError } from "../utils/errors";
import type { HttpResponse, HttpSession, QueryParams, RequestConfig } from "./types";

/**
 * Serializes query parameters, sending array values as repeated keys
 * (`q=a&q=b`) rather than axios' default `q[]=a&q[]=b`.
 */
export function serializeParams(params: QueryParams): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (typeof value === "string") {
      search.append(key, value);
    } else {
      for (const item of value) {
        search.append(key, item);
      }
    }
  }
  return search.toString();
}

/**
 * HTTP session backed by a dedicated axios instance and keep-alive agents.
 * One session per concurrently running fetch.
 */
export class AxiosSession implements HttpSession {
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;
  private readonly client: Pick<AxiosInstance, "get">;
  private closed = false;

  constructor(client?: Pick<AxiosInstance, "get">) {
    this.httpAgent = new http.Agent({ keepAlive: true });
    this.httpsAgent = new https.Agent({ keepAlive: true });
    this.client =
      client ??
      axios.create({
        httpAgent: this.httpAgent,
        httpsAgent: this.httpsAgent,
      });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async get(url: string, config: RequestConfig): Promise<HttpResponse> {
    if (this.closed) {
      throw new FetchError(`Session is closed, cannot fetch ${url}`);
    }

    const response = await this.client.get<string>(url, {
      params: config.params,
      paramsSerializer: { serialize: serializeParams },
      headers: config.headers,
      timeout: config.timeout,
      responseType: "text",
      // The fetcher classifies statuses itself
      validateStatus: () => true,
    });

    return {
      status: response.status,
      body: typeof response.data === "string" ? response.data : "",
      url,
    };
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}
