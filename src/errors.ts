/**
 * @module errors
 *
 * Error types raised by the pipeline.
 *
 * Only two failure kinds are absorbed locally: a tile that exhausts its
 * retries ({@link TileFetchError}, caught by the range driver) and a
 * staged file that cannot be imported (logged by the archive writer).
 * Everything else propagates.
 */

import type { TileIndex } from './types.js';

/**
 * Non-2xx HTTP response from a tile server.
 */
export class HttpStatusError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string) {
    super(`HTTP ${status} fetching ${url}`);
    this.name = 'HttpStatusError';
    this.status = status;
    this.url = url;
  }
}

/**
 * A tile that failed every attempt.
 *
 * `cause` holds the error of the last attempt.
 */
export class TileFetchError extends Error {
  readonly tile: TileIndex;
  readonly attempts: number;

  constructor(tile: TileIndex, attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Tile z=${tile.z} x=${tile.x} y=${tile.y} failed after ${attempts} attempt(s): ${reason}`, { cause });
    this.name = 'TileFetchError';
    this.tile = tile;
    this.attempts = attempts;
  }
}

/**
 * SQLite or filesystem failure while writing an archive.
 */
export class ArchiveError extends Error {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(`${message} (${path})`, { cause });
    this.name = 'ArchiveError';
    this.path = path;
  }
}

/**
 * Invalid configuration file or strategy parameters.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Failure writing to or reading from an output sink.
 */
export class SinkError extends Error {
  readonly sink: string;

  constructor(sink: string, message: string, cause?: unknown) {
    super(`[${sink}] ${message}`, { cause });
    this.name = 'SinkError';
    this.sink = sink;
  }
}
