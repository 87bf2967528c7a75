import { ProxyAgent } from "undici";

export interface ProxyConfig {
  proxyUrl?: string;
}

export type FetchFn = typeof globalThis.fetch;

/**
 * fetch for the Maps requests. With KEYCHECK_PROXY_URL set, every request
 * goes out through that proxy; otherwise this is the global fetch.
 */
export function createFetch(proxyUrl?: string): FetchFn {
  if (!proxyUrl) return globalThis.fetch;

  const dispatcher = new ProxyAgent(proxyUrl);

  return (input, init) =>
    globalThis.fetch(input, Object.assign({}, init, { dispatcher }));
}
