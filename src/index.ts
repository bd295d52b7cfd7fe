/**
 * @module tilecrawl
 *
 * Public API surface for the tilecrawl library.
 *
 * tilecrawl downloads raster map tiles for a geographic box across zoom
 * levels, pacing requests and rotating egress proxies, then packs the
 * staged tiles into an MBTiles archive and copies the result to one or
 * more output sinks.
 *
 * ---
 *
 * ### Pipeline
 *
 * | Stage | Export | Role |
 * |-------|--------|------|
 * | **Mapping** | {@link tileRange}, {@link iterateTiles} | WGS84 box → inclusive tile rectangle per zoom |
 * | **Pacing** | {@link createStrategy} | Rate limit, time-boxed batches, exponential backoff |
 * | **Egress** | {@link ProxyPool} | Recency-ordered proxy selection with failure tracking |
 * | **Download** | {@link TileDownloader} | Per-tile retry state machine, bounded concurrency |
 * | **Archive** | {@link MBTilesWriter}, {@link buildArchive} | SQLite MBTiles with TMS rows |
 * | **Output** | {@link createSink} | Local directory or S3-compatible bucket |
 *
 * {@link runSources} wires all stages together from a validated
 * configuration ({@link loadConfig}).
 */

// ─── Run ────────────────────────────────────────────────────────────────────

export { runSources, archiveMetadata } from './runner.js';
export { loadConfig, parseConfig, configSchema } from './config.js';
export { cleanupOldFiles } from './cleanup.js';

// ─── Tiles ──────────────────────────────────────────────────────────────────

export {
  MAX_ZOOM,
  gridSize,
  xyzToTms,
  tmsToXyz,
  tileRange,
  tileRanges,
  tileCount,
  iterateTiles,
} from './tiles.js';

// ─── Download ───────────────────────────────────────────────────────────────

export { TileDownloader } from './downloader.js';
export { HttpFetcher, tileUrl } from './fetcher.js';
export { ProxyPool, proxyUri, proxyAuthorization } from './proxy/pool.js';
export { createStrategy, createStrategies, resolveStrategyType } from './strategies/factory.js';
export { RateLimitStrategy } from './strategies/rate-limit.js';
export { TimeBasedStrategy } from './strategies/time-based.js';
export { ExponentialBackoffStrategy } from './strategies/backoff.js';

// ─── Archive & Output ───────────────────────────────────────────────────────

export { MBTilesWriter, withArchive, buildArchive } from './archive/mbtiles.js';
export { LocalSink } from './sinks/local.js';
export { S3Sink, SdkS3Transport } from './sinks/s3.js';
export { createSink, resolveSinkType } from './sinks/factory.js';

// ─── Support ────────────────────────────────────────────────────────────────

export { systemClock } from './clock.js';
export { createConsoleLogger, silentLogger, parseLogLevel } from './logger.js';
export {
  HttpStatusError,
  TileFetchError,
  ArchiveError,
  ConfigError,
  SinkError,
} from './errors.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export type { RunDependencies, SourceReport } from './runner.js';
export type { AppConfig, SourceConfig, DestinationConfig } from './config.js';
export type { TileDownloaderOptions, DownloadRangeOptions } from './downloader.js';
export type { Fetcher, TileRequest, TileResponse } from './fetcher.js';
export type { ProxyAddress, ProxyEndpoint, ProxyPoolOptions } from './proxy/pool.js';
export type { PacingStrategy, StrategyConfig, StrategyType } from './strategies/strategy.js';
export type { ArchiveMetadata, ImportSummary } from './archive/mbtiles.js';
export type { Sink } from './sinks/sink.js';
export type { S3Transport, S3SinkOptions } from './sinks/s3.js';
export type { Clock } from './clock.js';
export type { Logger, LogLevel } from './logger.js';
export type {
  TileIndex,
  GeoBounds,
  TileRange,
  TileState,
  TileEvent,
  TileFailure,
  RangeResult,
  RangeProgress,
} from './types.js';
