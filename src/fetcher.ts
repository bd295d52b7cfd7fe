/**
 * @module fetcher
 *
 * HTTP transport for tile requests.
 *
 * A {@link Fetcher} performs exactly one request per call and reports the
 * status and body; it does not retry and does not interpret status codes.
 * Retry, pacing and proxy health live in the downloader.
 *
 * {@link HttpFetcher} uses undici's `fetch` so that each request can be
 * routed through a per-endpoint `ProxyAgent` dispatcher. Requests with no
 * endpoint go out directly.
 */

import { fetch, ProxyAgent, type Dispatcher } from 'undici';
import { proxyAuthorization, proxyUri, type ProxyAddress } from './proxy/pool.js';

/**
 * One tile request.
 */
export interface TileRequest {
  url: string;
  headers: Record<string, string>;
  /** Proxy to route through, or `null` for a direct connection. */
  proxy: ProxyAddress | null;
  /** Per-request timeout in ms. */
  timeout: number;
}

/**
 * Status and body of a completed request.
 */
export interface TileResponse {
  status: number;
  body: Uint8Array;
}

export interface Fetcher {
  /**
   * Issue the request.
   *
   * @throws {Error} On transport failure or timeout. A timeout is not an
   *   `AbortError`: callers retry it like any other transport failure.
   */
  fetch(request: TileRequest): Promise<TileResponse>;
  /** Release pooled connections and proxy agents. */
  close(): Promise<void>;
}

/**
 * undici-backed {@link Fetcher}.
 *
 * One `ProxyAgent` is created per distinct proxy and reused for the
 * lifetime of the fetcher; {@link HttpFetcher.close} closes them all.
 *
 * @example
 * ```typescript
 * const fetcher = new HttpFetcher();
 * const res = await fetcher.fetch({
 *   url: 'https://tiles.example.com/3/4/2.png',
 *   headers: { 'User-Agent': 'tilecrawl' },
 *   proxy: null,
 *   timeout: 30_000,
 * });
 * await fetcher.close();
 * ```
 */
export class HttpFetcher implements Fetcher {
  private readonly agents = new Map<string, ProxyAgent>();

  async fetch(request: TileRequest): Promise<TileResponse> {
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new Error(`Request timed out after ${request.timeout} ms`)),
      request.timeout,
    );

    try {
      const response = await fetch(request.url, {
        headers: request.headers,
        signal: controller.signal,
        dispatcher: this.dispatcherFor(request.proxy),
      });
      const body = new Uint8Array(await response.arrayBuffer());
      return { status: response.status, body };
    } finally {
      clearTimeout(timer);
    }
  }

  async close(): Promise<void> {
    const agents = [...this.agents.values()];
    this.agents.clear();
    await Promise.all(agents.map(agent => agent.close()));
  }

  private dispatcherFor(proxy: ProxyAddress | null): Dispatcher | undefined {
    if (!proxy) return undefined;

    const key = `${proxy.username ?? ''}@${proxy.address}:${proxy.port}`;
    let agent = this.agents.get(key);
    if (!agent) {
      agent = new ProxyAgent({
        uri: proxyUri(proxy),
        token: proxyAuthorization(proxy),
      });
      this.agents.set(key, agent);
    }
    return agent;
  }
}

/**
 * Substitute `{z}`, `{x}` and `{y}` in a tile URL template.
 *
 * @example
 * ```typescript
 * tileUrl('https://t.example.com/{z}/{x}/{y}.png', { z: 3, x: 4, y: 2 });
 * // => 'https://t.example.com/3/4/2.png'
 * ```
 */
export function tileUrl(template: string, tile: { z: number; x: number; y: number }): string {
  return template
    .replace(/\{z\}/g, String(tile.z))
    .replace(/\{x\}/g, String(tile.x))
    .replace(/\{y\}/g, String(tile.y));
}
