/**
 * @module runner
 *
 * End-to-end run over every configured source.
 *
 * For each source, in configured order:
 *
 * 1. download and stage its tiles at `<temp_download_dir>/<name>/`;
 * 2. with `output.format = "mbtiles"`, build `<temp_download_dir>/<name>.mbtiles`
 *    and copy it to every sink as `<name>.mbtiles`;
 * 3. with `output.format = "files"`, copy every staged tile to every sink
 *    as `<name>/<z>/<x>/<y>.<format>`.
 *
 * A source that fails is logged and reported; the next source still runs.
 * Pacing strategies and the proxy pool are shared by all sources, so rate
 * limits hold across the whole run.
 */

import { mkdir, readFile } from 'node:fs/promises';
import { join, relative, sep } from 'node:path';
import { buildArchive, type ArchiveMetadata } from './archive/mbtiles.js';
import { cleanupOldFiles } from './cleanup.js';
import { systemClock, type Clock } from './clock.js';
import {
  downloaderSettings,
  sourceBounds,
  type AppConfig,
  type MBTilesConfig,
  type SourceConfig,
} from './config.js';
import { TileDownloader } from './downloader.js';
import { HttpFetcher, type Fetcher } from './fetcher.js';
import { errorMessage, silentLogger, type Logger } from './logger.js';
import { ProxyPool } from './proxy/pool.js';
import { createSink } from './sinks/factory.js';
import type { S3Transport } from './sinks/s3.js';
import type { Sink } from './sinks/sink.js';
import { createStrategies } from './strategies/factory.js';
import type { TileFailure } from './types.js';

/** Progress is logged every this many finished tiles. */
const PROGRESS_EVERY = 100;

/**
 * Collaborators of a run. Everything is optional; defaults talk to the
 * network, the filesystem and the wall clock.
 */
export interface RunDependencies {
  logger?: Logger;
  clock?: Clock;
  fetcher?: Fetcher;
  /** Transport for S3 destinations. */
  s3Transport?: S3Transport;
  /** Aborting stops the current source and skips the rest. */
  signal?: AbortSignal;
}

/**
 * Outcome of one source.
 */
export interface SourceReport {
  name: string;
  /** Tiles covered by the source's bounds and zoom levels. */
  total: number;
  downloaded: number;
  failed: TileFailure[];
  cancelled: boolean;
  /** Local archive, when one was built. */
  archivePath?: string;
  /** Sink writes that failed, as messages. */
  sinkErrors: string[];
  /** Set when the source stopped on an error. */
  error?: string;
}

/**
 * Process every source of `config`.
 *
 * Sources not started because the run was aborted have no report.
 */
export async function runSources(
  config: AppConfig,
  deps: RunDependencies = {},
): Promise<SourceReport[]> {
  const logger = deps.logger ?? silentLogger;
  const clock = deps.clock ?? systemClock;
  const tempDir = config.global.temp_download_dir;

  if (config.global.cleanup_temp_files) {
    await cleanupOldFiles(tempDir, config.global.cleanup_after_days, { clock, logger });
  }
  await mkdir(tempDir, { recursive: true });

  const strategies = createStrategies(config.download_strategies, { clock, logger });
  const pool = config.ip_pool.enabled
    ? new ProxyPool({
        provider: config.ip_pool.provider,
        endpoints: config.ip_pool.endpoints,
        credentials: config.ip_pool.credentials,
        rotationInterval: config.ip_pool.rotation_interval * 1000,
        maxFailures: config.ip_pool.max_failures,
        clock,
        logger,
      })
    : null;
  const fetcher = deps.fetcher ?? new HttpFetcher();
  const sinks = config.output.destinations.map(dest =>
    createSink(dest, { logger, s3Transport: deps.s3Transport }));

  logger.info('Starting tile download run', {
    sources: config.sources.length,
    output: config.output.format,
    destinations: sinks.map(sink => sink.kind),
  });

  const reports: SourceReport[] = [];
  try {
    for (const source of config.sources) {
      if (deps.signal?.aborted) break;
      const report = await runSource(source, { config, strategies, pool, fetcher, sinks, clock, logger, signal: deps.signal });
      reports.push(report);
      if (report.cancelled) break;
    }
  } finally {
    await Promise.all(sinks.map(sink => sink.close()));
    if (!deps.fetcher) await fetcher.close();
  }

  logger.info('Tile download run finished', {
    sources: reports.length,
    failed: reports.filter(r => r.error !== undefined).length,
  });
  return reports;
}

/**
 * Archive metadata for a source: the `mbtiles` section, with the
 * source's name, zoom span and bounds filling whatever it leaves out.
 */
export function archiveMetadata(source: SourceConfig, config: AppConfig): ArchiveMetadata {
  const m: MBTilesConfig = config.mbtiles ?? {};
  const b = source.bounds;
  const west = Math.min(b.min_lon, b.max_lon);
  const east = Math.max(b.min_lon, b.max_lon);
  const south = Math.min(b.min_lat, b.max_lat);
  const north = Math.max(b.min_lat, b.max_lat);

  return {
    name: m.name ?? source.name,
    description: m.description,
    version: m.version,
    type: m.type,
    format: source.format,
    bounds: m.bounds ?? `${west},${south},${east},${north}`,
    attribution: m.attribution,
    minzoom: m.min_zoom ?? Math.min(...source.zoom_levels),
    maxzoom: m.max_zoom ?? Math.max(...source.zoom_levels),
  };
}

// ─── Internal ───────────────────────────────────────────────────────────────

interface SourceContext {
  config: AppConfig;
  strategies: ReturnType<typeof createStrategies>;
  pool: ProxyPool | null;
  fetcher: Fetcher;
  sinks: Sink[];
  clock: Clock;
  logger: Logger;
  signal: AbortSignal | undefined;
}

async function runSource(source: SourceConfig, ctx: SourceContext): Promise<SourceReport> {
  const { config, logger } = ctx;
  const stagingDir = join(config.global.temp_download_dir, source.name);
  const report: SourceReport = {
    name: source.name,
    total: 0,
    downloaded: 0,
    failed: [],
    cancelled: false,
    sinkErrors: [],
  };

  logger.info('Processing source', { source: source.name });
  const downloader = new TileDownloader({
    outputDir: stagingDir,
    format: source.format,
    headers: source.headers,
    ...downloaderSettings(config),
    strategies: ctx.strategies,
    pool: ctx.pool,
    fetcher: ctx.fetcher,
    clock: ctx.clock,
    logger,
  });

  try {
    await mkdir(stagingDir, { recursive: true });
    const result = await downloader.downloadRange(
      source.url_template,
      sourceBounds(source),
      source.zoom_levels,
      {
        signal: ctx.signal,
        onProgress: ({ total, succeeded, failed }) => {
          const done = succeeded + failed;
          if (done % PROGRESS_EVERY === 0 || done === total) {
            logger.info('Download progress', { source: source.name, done, total });
          }
        },
      },
    );
    report.total = result.total;
    report.downloaded = result.downloaded.length;
    report.failed = result.failed;
    report.cancelled = result.cancelled;

    if (result.cancelled) {
      logger.warn('Source cancelled, skipping output', { source: source.name });
      return report;
    }

    if (config.output.format === 'mbtiles') {
      const archivePath = join(config.global.temp_download_dir, `${source.name}.mbtiles`);
      await buildArchive(stagingDir, archivePath, archiveMetadata(source, config), { logger });
      report.archivePath = archivePath;
      await copyToSinks(ctx.sinks, archivePath, `${source.name}.mbtiles`, report, logger);
    } else {
      for (const path of result.downloaded) {
        const key = [source.name, ...relative(stagingDir, path).split(sep)].join('/');
        await copyToSinks(ctx.sinks, path, key, report, logger);
      }
    }

    logger.info('Completed source', {
      source: source.name,
      downloaded: report.downloaded,
      failed: report.failed.length,
    });
  } catch (err) {
    report.error = errorMessage(err);
    logger.error('Error processing source', { source: source.name, error: report.error });
  } finally {
    await downloader.close();
  }
  return report;
}

async function copyToSinks(
  sinks: readonly Sink[],
  localPath: string,
  key: string,
  report: SourceReport,
  logger: Logger,
): Promise<void> {
  if (sinks.length === 0) return;
  const data = await readFile(localPath);

  for (const sink of sinks) {
    try {
      await sink.save(data, key);
      logger.debug('Saved to destination', { sink: sink.kind, key });
    } catch (err) {
      const message = errorMessage(err);
      report.sinkErrors.push(message);
      logger.error('Failed to save to destination', { sink: sink.kind, key, error: message });
    }
  }
}
