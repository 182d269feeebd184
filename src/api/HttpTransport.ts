import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import http from "node:http";
import https from "node:https";
import { TransportError } from "../errors.js";
import type { QueryParameters } from "../types.js";
import { stderrSink, withRequestLogging, type LogSink } from "../utils/logging.js";
import { DEFAULT_TIMEOUT_MS, normalizeBaseUrl } from "../utils/config.js";

/**
 * The HTTP capability the query builders depend on: GET a path under a
 * base URL and return the body text. Implementations throw
 * TransportError on non-2xx statuses and network failures.
 */
export interface HttpTransport {
  getText(baseUrl: string, path: string, params: QueryParameters): Promise<string>;
}

export interface AxiosTransportOptions {
  timeoutMs?: number;
  /** Log each request as a JSON line. `true` logs to stderr. */
  log?: boolean | LogSink;
  /** Replaces the network adapter; tests use this to answer in-process. */
  adapter?: AxiosAdapter;
}

/**
 * Full request URL with only the given parameters, in insertion order.
 * The path is joined beneath the base the way axios joins `baseURL`.
 */
export function buildUrl(baseUrl: string, path: string, params: QueryParameters): string {
  const url = new URL(path, normalizeBaseUrl(baseUrl));
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

/**
 * Transport on one axios instance with keep-alive agents. The instance is
 * owned by whoever created it; call `close()` to release pooled sockets.
 */
export class AxiosTransport implements HttpTransport {
  private http: AxiosInstance;
  private readonly httpAgent = new http.Agent({ keepAlive: true, maxSockets: 10 });
  private readonly httpsAgent = new https.Agent({ keepAlive: true, maxSockets: 10 });
  private readonly sink: LogSink | null;
  private closed = false;

  constructor(options: AxiosTransportOptions = {}) {
    this.http = axios.create({
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      headers: { Accept: "text/xml" },
      responseType: "text",
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      ...(options.adapter && { adapter: options.adapter }),
    });
    this.sink = options.log === true ? stderrSink : options.log || null;
  }

  async getText(baseUrl: string, path: string, params: QueryParameters): Promise<string> {
    if (this.closed) {
      throw new TransportError("Transport has been closed", buildUrl(baseUrl, path, params), null);
    }

    const api = new URL(baseUrl).host;
    const request = withRequestLogging(
      api,
      path,
      this.sink,
      () => this.request(baseUrl, path, params),
      (err) => (err instanceof TransportError ? err.status ?? undefined : undefined)
    );
    return request();
  }

  /** Destroy pooled sockets. Further requests fail with TransportError. */
  close(): void {
    this.closed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  private async request(baseUrl: string, path: string, params: QueryParameters): Promise<string> {
    const url = buildUrl(baseUrl, path, params);
    try {
      const { data } = await this.http.get<unknown>(path, { baseURL: baseUrl, params });
      return typeof data === "string" ? data : String(data ?? "");
    } catch (err) {
      throw AxiosTransport.toTransportError(err, url);
    }
  }

  private static toTransportError(err: unknown, url: string): TransportError {
    if (axios.isAxiosError(err)) {
      const status = err.response?.status ?? null;
      const message = status !== null
        ? `GET ${url} failed with status ${status}`
        : `GET ${url} failed: ${err.message}`;
      return new TransportError(message, url, status, { cause: err });
    }
    const reason = err instanceof Error ? err.message : String(err);
    return new TransportError(`GET ${url} failed: ${reason}`, url, null, { cause: err });
  }
}
