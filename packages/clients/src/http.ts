import { createFetch, type FetchFn } from "./proxy";
import { describeError } from "./errors";
import type {
  BinaryResponse,
  HttpLogger,
  HttpMethod,
  JsonResponse,
  QueryParams,
} from "./types";

const RETRY_STATUSES = new Set([429, 500, 502, 503, 504]);
const RETRY_AFTER_STATUSES = new Set([429, 503]);

export interface HttpClientConfig {
  /** Per-attempt timeout. */
  timeoutMs?: number;
  /** Retries after the first attempt, for retryable statuses and transport errors. */
  retries?: number;
  /** Delay before retry n is backoffMs * 2^n. */
  backoffMs?: number;
  proxyUrl?: string;
  fetchFn?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  logger?: HttpLogger;
}

export interface RequestOptions {
  params?: QueryParams;
  /** Sent as an application/json body. */
  json?: unknown;
  /** Sent as a multipart/form-data body. */
  form?: FormData;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function buildUrl(url: string, params?: QueryParams): string {
  if (!params) return url;
  const search = new URLSearchParams();
  for (const [name, value] of Object.entries(params)) {
    search.set(name, String(value));
  }
  return `${url}?${search}`;
}

function headerMap(headers: Headers): Record<string, string> {
  const map: Record<string, string> = {};
  headers.forEach((value, name) => {
    map[name] = value;
  });
  return map;
}

function retryAfterMs(res: Response): number | null {
  if (!RETRY_AFTER_STATUSES.has(res.status)) return null;
  const header = res.headers.get("retry-after");
  if (!header || !/^\d+$/.test(header.trim())) return null;
  return Number(header.trim()) * 1000;
}

export function createHttpClient(config: HttpClientConfig = {}) {
  const timeoutMs = config.timeoutMs ?? 10_000;
  const retries = config.retries ?? 2;
  const backoffMs = config.backoffMs ?? 500;
  const fetchFn = config.fetchFn ?? createFetch(config.proxyUrl);
  const sleep = config.sleep ?? defaultSleep;
  const log = config.logger;

  function buildInit(method: HttpMethod, options: RequestOptions): RequestInit {
    if (options.form) {
      return { method, body: options.form };
    }
    if (options.json !== undefined) {
      return {
        method,
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(options.json),
      };
    }
    return { method };
  }

  /** Sends with retries. Throws only when the last attempt fails at the transport level. */
  async function send(
    method: HttpMethod,
    url: string,
    options: RequestOptions
  ): Promise<Response> {
    const target = buildUrl(url, options.params);
    const path = new URL(url).pathname;

    for (let attempt = 0; ; attempt++) {
      let res: Response;
      try {
        res = await fetchFn(target, {
          ...buildInit(method, options),
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (err) {
        if (attempt >= retries) throw err;
        const delay = backoffMs * 2 ** attempt;
        log?.debug(
          { method, path, attempt, delay, error: describeError(err).fullMessage },
          "transport error, retrying"
        );
        await sleep(delay);
        continue;
      }

      if (attempt >= retries || !RETRY_STATUSES.has(res.status)) {
        return res;
      }

      const delay = retryAfterMs(res) ?? backoffMs * 2 ** attempt;
      log?.debug(
        { method, path, attempt, status: res.status, delay },
        "retryable status, retrying"
      );
      // drain so the connection goes back to the pool
      await res.arrayBuffer();
      await sleep(delay);
    }
  }

  async function requestJson(
    method: HttpMethod,
    url: string,
    options: RequestOptions = {}
  ): Promise<JsonResponse> {
    try {
      const res = await send(method, url, options);
      const text = await res.text();
      const data: unknown = JSON.parse(text);
      return { status: res.status, data, headers: headerMap(res.headers) };
    } catch (err) {
      const error = describeError(err);
      log?.warn(
        { method, path: new URL(url).pathname, error: error.fullMessage, timedOut: error.timedOut },
        "request failed"
      );
      return { status: null, data: {}, headers: {} };
    }
  }

  async function requestBinary(
    method: HttpMethod,
    url: string,
    options: RequestOptions = {}
  ): Promise<BinaryResponse> {
    try {
      const res = await send(method, url, options);
      const bytes = new Uint8Array(await res.arrayBuffer());
      return { status: res.status, bytes, headers: headerMap(res.headers) };
    } catch (err) {
      const error = describeError(err);
      log?.warn(
        { method, path: new URL(url).pathname, error: error.fullMessage, timedOut: error.timedOut },
        "request failed"
      );
      return { status: null, bytes: new Uint8Array(0), headers: {} };
    }
  }

  return {
    /** Request and parse a JSON body. Never throws. */
    requestJson,
    /** Request raw bytes. Never throws. */
    requestBinary,
  };
}

export type HttpClient = ReturnType<typeof createHttpClient>;
