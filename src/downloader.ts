/**
 * @module downloader
 *
 * Tile download orchestrator.
 *
 * {@link TileDownloader} fetches single tiles through a retry state
 * machine and drives whole ranges across zoom levels:
 *
 * 1. **Pacing**: every {@link PacingStrategy} runs its `before` hook, in
 *    configured order, before each attempt.
 * 2. **Egress**: the {@link ProxyPool} picks an endpoint, or none.
 * 3. **Request**: one HTTP GET with the source headers and a per-request
 *    timeout.
 * 4. **Bookkeeping**: the outcome goes to the pool and to every strategy's
 *    `after` hook. Failures retry after `retryDelay * 2^attempt` ms until
 *    `retries` attempts are spent.
 *
 * Steps 1, 2 and 4 read and write shared counters, so all workers funnel
 * them through one serialization gate (a single-concurrency `p-queue`).
 * Requests themselves run in parallel, up to `concurrency` at a time.
 *
 * Successful tiles are staged at `<outputDir>/<z>/<x>/<y>.<format>`, the
 * layout {@link MBTilesWriter.importTree} consumes.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import PQueue from 'p-queue';
import { createAbortError, isAbortError, systemClock, type Clock } from './clock.js';
import { HttpStatusError, TileFetchError } from './errors.js';
import { HttpFetcher, tileUrl, type Fetcher } from './fetcher.js';
import { errorMessage, silentLogger, type Logger } from './logger.js';
import type { ProxyEndpoint, ProxyPool } from './proxy/pool.js';
import type { PacingStrategy } from './strategies/strategy.js';
import { iterateTiles, tileCount, tileRanges } from './tiles.js';
import type {
  GeoBounds,
  RangeProgress,
  RangeResult,
  TileEvent,
  TileFailure,
  TileIndex,
} from './types.js';

/**
 * Configuration options for {@link TileDownloader}.
 */
export interface TileDownloaderOptions {
  /** Staging root; tiles land at `<outputDir>/<z>/<x>/<y>.<format>`. */
  outputDir: string;
  /**
   * File extension of staged tiles.
   *
   * @defaultValue 'png'
   */
  format?: string;
  /** Static headers sent with every request. */
  headers?: Record<string, string>;
  /**
   * Total attempts per tile, including the first.
   *
   * @defaultValue 3
   */
  retries?: number;
  /**
   * Base delay in ms between attempts; attempt `n` waits
   * `retryDelay * 2^n`.
   *
   * @defaultValue 1000
   */
  retryDelay?: number;
  /**
   * Per-request timeout in ms.
   *
   * @defaultValue 30000
   */
  timeout?: number;
  /**
   * Tiles fetched in parallel by {@link TileDownloader.downloadRange}.
   *
   * @defaultValue 1
   */
  concurrency?: number;
  /** Pacing strategies, applied in order. */
  strategies?: PacingStrategy[];
  /** Proxy pool; omit or pass `null` to always connect directly. */
  pool?: ProxyPool | null;
  /**
   * HTTP transport. Defaults to a new {@link HttpFetcher}, owned and closed
   * by the downloader; a supplied fetcher is left open.
   */
  fetcher?: Fetcher;
  clock?: Clock;
  logger?: Logger;
  /** Receives every per-tile state transition. */
  onTileEvent?: (event: TileEvent) => void;
}

type AttemptResult =
  | { ok: true; body: Uint8Array }
  | { ok: false; error: Error };

/**
 * Per-call options for {@link TileDownloader.downloadRange}.
 */
export interface DownloadRangeOptions {
  /** Stops the range between tiles and between attempts. */
  signal?: AbortSignal;
  /** Called after every finished tile. */
  onProgress?: (progress: RangeProgress) => void;
}

/**
 * Paced, proxy-aware tile downloader.
 *
 * @example
 * ```typescript
 * const downloader = new TileDownloader({
 *   outputDir: '/tmp/tiles/osm',
 *   strategies: createStrategies([{ type: 'rate_limit', requests_per_second: 2 }]),
 *   concurrency: 4,
 * });
 *
 * const result = await downloader.downloadRange(
 *   'https://tile.example.com/{z}/{x}/{y}.png',
 *   { minLat: 51.4, minLon: -0.3, maxLat: 51.6, maxLon: 0.1 },
 *   [10, 11, 12],
 * );
 * console.log(`${result.downloaded.length}/${result.total} tiles`);
 *
 * await downloader.close();
 * ```
 */
export class TileDownloader {
  readonly outputDir: string;
  readonly format: string;
  private readonly headers: Record<string, string>;
  private readonly retries: number;
  private readonly retryDelay: number;
  private readonly timeout: number;
  private readonly concurrency: number;
  private readonly strategies: PacingStrategy[];
  private readonly pool: ProxyPool | null;
  private readonly fetcher: Fetcher;
  private readonly ownsFetcher: boolean;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly onTileEvent: ((event: TileEvent) => void) | undefined;
  /** Serializes access to pool and strategy state across workers. */
  private readonly gate = new PQueue({ concurrency: 1 });

  constructor(options: TileDownloaderOptions) {
    this.outputDir = options.outputDir;
    this.format = options.format ?? 'png';
    this.headers = options.headers ?? {};
    this.retries = Math.max(1, options.retries ?? 3);
    this.retryDelay = options.retryDelay ?? 1000;
    this.timeout = options.timeout ?? 30_000;
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.strategies = options.strategies ?? [];
    this.pool = options.pool ?? null;
    this.fetcher = options.fetcher ?? new HttpFetcher();
    this.ownsFetcher = options.fetcher === undefined;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.onTileEvent = options.onTileEvent;

    this.logger.info('Initialized tile downloader', {
      strategies: this.strategies.map(s => s.type),
      proxies: this.pool?.size ?? 0,
      concurrency: this.concurrency,
    });
  }

  /**
   * Fetch one tile, retrying until it succeeds or `retries` attempts fail.
   *
   * @param urlTemplate - URL with `{z}`, `{x}` and `{y}` placeholders.
   * @param tile - Tile to fetch (XYZ).
   * @param signal - Checked before every attempt and during retry waits.
   * @returns The response body of the first 2xx response.
   * @throws {TileFetchError} When every attempt failed.
   * @throws {Error} An `AbortError` when `signal` aborts.
   */
  async downloadTile(
    urlTemplate: string,
    tile: TileIndex,
    signal?: AbortSignal,
  ): Promise<Uint8Array> {
    const url = tileUrl(urlTemplate, tile);
    this.emit({ tile, state: 'pending', attempt: 0 });

    for (let attempt = 0; ; attempt++) {
      if (signal?.aborted) throw createAbortError();
      this.emit({ tile, state: 'attempting', attempt });

      const proxy = await this.gate.add(() => this.prepareAttempt(), { throwOnTimeout: true });

      const result = await this.request(url, proxy, attempt);
      if (result.ok) {
        await this.gate.add(() => this.settleAttempt(proxy, true), { throwOnTimeout: true });
        this.emit({ tile, state: 'succeeded', attempt });
        return result.body;
      }
      const failure = result.error;

      this.logger.warn('Tile download failed', {
        url,
        attempt: attempt + 1,
        retries: this.retries,
        error: failure.message,
      });
      await this.gate.add(() => this.settleAttempt(proxy, false), { throwOnTimeout: true });

      if (attempt + 1 >= this.retries) {
        this.emit({ tile, state: 'exhausted', attempt, error: failure });
        throw new TileFetchError(tile, attempt + 1, failure);
      }

      this.emit({ tile, state: 'retrying', attempt, error: failure });
      await this.clock.sleep(this.retryDelay * 2 ** attempt, signal);
    }
  }

  /**
   * Write tile bytes to the staging tree, replacing any existing file.
   *
   * @returns Path of the staged file.
   */
  async saveTile(data: Uint8Array, tile: TileIndex): Promise<string> {
    const dir = join(this.outputDir, String(tile.z), String(tile.x));
    await mkdir(dir, { recursive: true });
    const path = join(dir, `${tile.y}.${this.format}`);
    await writeFile(path, data);
    this.logger.debug('Saved tile', { path });
    return path;
  }

  /**
   * Download and stage every tile covering `bounds` at each zoom level.
   *
   * Zoom levels are processed in the order given. Within a level, tiles
   * are started column by column, rows ascending. A tile that exhausts its
   * retries is logged and counted; the range carries on. Any other error
   * stops every worker from taking further tiles and is rethrown once the
   * tiles already in flight have settled.
   *
   * @param urlTemplate - URL with `{z}`, `{x}` and `{y}` placeholders.
   * @param bounds - WGS84 box; corner order does not matter.
   * @param zoomLevels - Zoom levels, in processing order.
   * @returns Staged paths, failures and whether the run was cancelled.
   * @throws {Error} Staging write failures (disk full, permissions).
   */
  async downloadRange(
    urlTemplate: string,
    bounds: GeoBounds,
    zoomLevels: readonly number[],
    options: DownloadRangeOptions = {},
  ): Promise<RangeResult> {
    const { signal, onProgress } = options;
    const ranges = tileRanges(bounds, zoomLevels);
    const total = ranges.reduce((sum, r) => sum + tileCount(r), 0);
    const downloaded: string[] = [];
    const failed: TileFailure[] = [];
    let cancelled = false;
    const fatal: unknown[] = [];

    const logger = this.logger;
    const tiles = (function* () {
      for (const range of ranges) {
        logger.info('Downloading zoom level', { ...range, tiles: tileCount(range) });
        yield* iterateTiles(range);
      }
    })();

    const pump = async () => {
      while (!cancelled && fatal.length === 0) {
        if (signal?.aborted) {
          cancelled = true;
          break;
        }
        const next = tiles.next();
        if (next.done) break;
        const tile = next.value;

        try {
          const data = await this.downloadTile(urlTemplate, tile, signal);
          downloaded.push(await this.saveTile(data, tile));
        } catch (err) {
          if (isAbortError(err)) {
            cancelled = true;
            break;
          }
          if (!(err instanceof TileFetchError)) throw err;
          this.logger.error('Giving up on tile', { ...tile, error: errorMessage(err.cause) });
          failed.push({ tile, attempts: err.attempts, message: err.message });
        }

        onProgress?.({ total, succeeded: downloaded.length, failed: failed.length });
      }
    };
    const worker = async () => {
      try {
        await pump();
      } catch (err) {
        fatal.push(err);
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, Math.max(total, 1)) }, () => worker());
    await Promise.all(workers);

    if (fatal.length > 0) {
      this.logger.error('Range download aborted', { error: errorMessage(fatal[0]) });
      throw fatal[0];
    }

    this.logger.info('Range download finished', {
      total,
      succeeded: downloaded.length,
      failed: failed.length,
      cancelled,
    });
    return { downloaded, failed, total, cancelled };
  }

  /**
   * Wait for queued bookkeeping and release the transport if the
   * downloader created it.
   */
  async close(): Promise<void> {
    await this.gate.onIdle();
    if (this.ownsFetcher) await this.fetcher.close();
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  /** One HTTP request; never throws. */
  private async request(
    url: string,
    proxy: ProxyEndpoint | null,
    attempt: number,
  ): Promise<AttemptResult> {
    try {
      this.logger.debug('Downloading tile', { url, attempt: attempt + 1 });
      const response = await this.fetcher.fetch({
        url,
        headers: this.headers,
        proxy,
        timeout: this.timeout,
      });
      if (response.status >= 200 && response.status < 300) {
        return { ok: true, body: response.body };
      }
      return { ok: false, error: new HttpStatusError(response.status, url) };
    } catch (err) {
      return { ok: false, error: err instanceof Error ? err : new Error(String(err)) };
    }
  }

  /** Runs inside the gate: pacing hooks, then proxy selection. */
  private async prepareAttempt(): Promise<ProxyEndpoint | null> {
    for (const strategy of this.strategies) {
      await strategy.before();
    }
    return this.pool?.select() ?? null;
  }

  /** Runs inside the gate: report the outcome to the pool and strategies. */
  private async settleAttempt(proxy: ProxyEndpoint | null, success: boolean): Promise<void> {
    if (this.pool && proxy) {
      if (success) this.pool.recordSuccess(proxy);
      else this.pool.recordFailure(proxy);
    }
    for (const strategy of this.strategies) {
      await strategy.after(success);
    }
  }

  private emit(event: TileEvent): void {
    this.onTileEvent?.(event);
  }
}

