/**
 * @module proxy/pool
 *
 * Egress endpoint rotation with failure tracking.
 *
 * The {@link ProxyPool} decides *through which* proxy the next request
 * leaves. Selection prefers the active endpoint that has been idle the
 * longest. A wall-clock rotation interval additionally pushes the front
 * candidate to the back of the line, so traffic shifts between endpoints
 * even when only a few requests are made. The interval counts as elapsed
 * before the first selection.
 *
 * Endpoints are deactivated once their consecutive failure count reaches
 * `maxFailures`; only {@link ProxyPool.reset} brings them back. An empty
 * or fully deactivated pool is not an error: {@link ProxyPool.select}
 * returns `null` and the caller connects directly.
 *
 * The pool mutates endpoint state in place and is not safe for
 * interleaved use across an `await`; the downloader calls it from its
 * serialization gate.
 */

import { systemClock, type Clock } from '../clock.js';
import { silentLogger, type Logger } from '../logger.js';

/**
 * Address and optional credentials of one proxy.
 */
export interface ProxyAddress {
  address: string;
  port: number;
  username?: string;
  password?: string;
}

/**
 * A proxy and its health state. Owned and mutated by the pool.
 */
export interface ProxyEndpoint extends ProxyAddress {
  /** Time of the last selection in ms; 0 when never used. */
  lastUsed: number;
  /** Consecutive failures since the last success. */
  failures: number;
  active: boolean;
}

export interface ProxyPoolOptions {
  /** Opaque label of the proxy provider, used in log lines only. */
  provider?: string;
  endpoints?: readonly ProxyAddress[];
  /**
   * Credentials applied to endpoints that carry none of their own.
   */
  credentials?: { username?: string; password?: string };
  /**
   * Forced rotation interval in ms.
   *
   * @defaultValue 60000
   */
  rotationInterval?: number;
  /**
   * Consecutive failures before an endpoint is deactivated.
   *
   * @defaultValue 3
   */
  maxFailures?: number;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Recency-ordered proxy pool.
 *
 * @example
 * ```typescript
 * const pool = new ProxyPool({
 *   endpoints: [
 *     { address: '10.0.0.1', port: 3128 },
 *     { address: '10.0.0.2', port: 3128 },
 *   ],
 *   maxFailures: 2,
 * });
 *
 * const proxy = pool.select();   // null → connect directly
 * if (proxy) pool.recordSuccess(proxy);
 * ```
 */
export class ProxyPool {
  readonly provider: string;
  readonly rotationInterval: number;
  readonly maxFailures: number;
  private readonly endpoints: ProxyEndpoint[] = [];
  private readonly defaultCredentials: { username?: string; password?: string };
  private readonly clock: Clock;
  private readonly logger: Logger;
  private lastRotation: number;

  constructor(options: ProxyPoolOptions = {}) {
    this.provider = options.provider ?? '';
    this.rotationInterval = options.rotationInterval ?? 60_000;
    this.maxFailures = options.maxFailures ?? 3;
    this.defaultCredentials = options.credentials ?? {};
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.lastRotation = Number.NEGATIVE_INFINITY;

    for (const ep of options.endpoints ?? []) {
      this.add(ep);
    }
    this.logger.info('Initialized proxy pool', {
      provider: this.provider || undefined,
      endpoints: this.endpoints.length,
    });
  }

  /** Number of endpoints, active or not. */
  get size(): number {
    return this.endpoints.length;
  }

  /** Number of endpoints still eligible for selection. */
  get activeCount(): number {
    return this.endpoints.filter(ep => ep.active).length;
  }

  /**
   * Snapshot of every endpoint's state, in insertion order.
   */
  list(): readonly Readonly<ProxyEndpoint>[] {
    return this.endpoints.map(ep => ({ ...ep }));
  }

  /**
   * Add an endpoint. Missing credentials are filled from the pool-wide
   * `credentials` option.
   */
  add(address: ProxyAddress): ProxyEndpoint {
    const endpoint: ProxyEndpoint = {
      address: address.address,
      port: address.port,
      username: address.username ?? this.defaultCredentials.username,
      password: address.password ?? this.defaultCredentials.password,
      lastUsed: 0,
      failures: 0,
      active: true,
    };
    this.endpoints.push(endpoint);
    this.logger.debug('Added proxy endpoint', { proxy: label(endpoint) });
    return endpoint;
  }

  /**
   * Pick the endpoint for the next attempt and stamp its `lastUsed`.
   *
   * @returns The chosen endpoint, or `null` to connect without a proxy.
   */
  select(): ProxyEndpoint | null {
    if (this.endpoints.length === 0) {
      this.logger.debug('Proxy pool is empty, connecting directly');
      return null;
    }

    // Array#sort is stable: endpoints never used keep insertion order
    let candidates = this.endpoints
      .filter(ep => ep.active)
      .sort((a, b) => a.lastUsed - b.lastUsed);
    if (candidates.length === 0) {
      this.logger.warn('No active proxy endpoints, connecting directly');
      return null;
    }

    const now = this.clock.now();
    if (now - this.lastRotation > this.rotationInterval) {
      this.lastRotation = now;
      candidates = [...candidates.slice(1), ...candidates.slice(0, 1)];
      this.logger.info('Rotating proxy endpoints on interval');
    }

    const selected = candidates[0];
    selected.lastUsed = now;
    return selected;
  }

  /**
   * Count a failed request; deactivate the endpoint at the threshold.
   */
  recordFailure(endpoint: ProxyEndpoint): void {
    endpoint.failures++;
    this.logger.warn('Proxy request failed', {
      proxy: label(endpoint),
      failures: endpoint.failures,
    });

    if (endpoint.active && endpoint.failures >= this.maxFailures) {
      endpoint.active = false;
      this.logger.error('Proxy disabled', {
        proxy: label(endpoint),
        maxFailures: this.maxFailures,
      });
    }
  }

  /**
   * Clear the failure count after a successful request.
   */
  recordSuccess(endpoint: ProxyEndpoint): void {
    if (endpoint.failures > 0) {
      endpoint.failures = 0;
      this.logger.info('Proxy recovered, failure count reset', { proxy: label(endpoint) });
    }
  }

  /**
   * Reactivate an endpoint and clear its failure count.
   */
  reset(endpoint: ProxyEndpoint): void {
    endpoint.failures = 0;
    endpoint.active = true;
  }

  /**
   * Reactivate every endpoint.
   */
  resetAll(): void {
    for (const ep of this.endpoints) this.reset(ep);
  }

  /**
   * Force a positional rotation on the next {@link ProxyPool.select}.
   */
  rotate(): void {
    this.lastRotation = Number.NEGATIVE_INFINITY;
    this.logger.info('Manual proxy rotation requested');
  }
}

/**
 * Proxy URL for an endpoint, without credentials.
 */
export function proxyUri(endpoint: ProxyAddress): string {
  return `http://${endpoint.address}:${endpoint.port}`;
}

/**
 * `Proxy-Authorization` header value for an endpoint, or `undefined` when
 * it has no credentials.
 */
export function proxyAuthorization(endpoint: ProxyAddress): string | undefined {
  if (!endpoint.username || endpoint.password === undefined) return undefined;
  const token = Buffer.from(`${endpoint.username}:${endpoint.password}`).toString('base64');
  return `Basic ${token}`;
}

function label(endpoint: ProxyAddress): string {
  return `${endpoint.address}:${endpoint.port}`;
}
