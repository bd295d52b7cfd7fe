/**
 * @module archive/mbtiles
 *
 * MBTiles archive writer.
 *
 * Produces a single SQLite file with the two tables of the MBTiles 1.3
 * layout:
 *
 * | Table | Columns |
 * |-------|---------|
 * | `metadata` | `name text, value text` |
 * | `tiles` | `zoom_level integer, tile_column integer, tile_row integer, tile_data blob` |
 *
 * `tiles` carries the unique index `tile_index` on its first three
 * columns, and rows are written with `INSERT OR REPLACE`, so writing a tile
 * twice keeps exactly one row with the latest bytes.
 *
 * Callers address tiles in XYZ; the writer stores the TMS row
 * `(2^z − 1) − y` and applies that flip nowhere else.
 *
 * better-sqlite3 is synchronous, so every statement on one writer runs to
 * completion before the next starts: concurrent callers cannot interleave
 * writes.
 */

import { mkdirSync, rmSync } from 'node:fs';
import { readdir, readFile } from 'node:fs/promises';
import { dirname, extname, join } from 'node:path';
import Database from 'better-sqlite3';
import { ArchiveError } from '../errors.js';
import { MAX_MERCATOR_LAT } from '../geometry/project.js';
import { errorMessage, silentLogger, type Logger } from '../logger.js';
import { xyzToTms } from '../tiles.js';

/** `application_id` registered for MBTiles ("MPBX"). */
export const MBTILES_APPLICATION_ID = 0x4d504258;

/** Value written to the `generator` metadata row. */
export const GENERATOR = 'tilecrawl';

/**
 * Metadata written once when the archive is created.
 */
export interface ArchiveMetadata {
  /** @defaultValue 'map_tiles' */
  name?: string;
  /** @defaultValue 'Map tiles' */
  description?: string;
  /** @defaultValue '1.0' */
  version?: string;
  /** `baselayer` or `overlay`. @defaultValue 'baselayer' */
  type?: string;
  /** Tile encoding (`png`, `jpg`, `webp`). @defaultValue 'png' */
  format?: string;
  /** `west,south,east,north`. @defaultValue the whole Mercator world */
  bounds?: string;
  /** @defaultValue '' */
  attribution?: string;
  /** @defaultValue 0 */
  minzoom?: number;
  /** @defaultValue 22 */
  maxzoom?: number;
}

/**
 * Counts from a directory import.
 */
export interface ImportSummary {
  imported: number;
  skipped: number;
}

export interface MBTilesWriterOptions {
  logger?: Logger;
}

const WORLD_BOUNDS = `-180.0,-${MAX_MERCATOR_LAT.toFixed(4)},180.0,${MAX_MERCATOR_LAT.toFixed(4)}`;

const SCHEMA = `
  CREATE TABLE metadata (name text, value text);
  CREATE UNIQUE INDEX name ON metadata (name);
  CREATE TABLE tiles (
    zoom_level integer,
    tile_column integer,
    tile_row integer,
    tile_data blob
  );
  CREATE UNIQUE INDEX tile_index ON tiles (zoom_level, tile_column, tile_row);
`;

/**
 * Resolve metadata defaults into the ordered name/value rows.
 */
export function metadataRows(metadata: ArchiveMetadata): Array<[string, string]> {
  return [
    ['name', metadata.name ?? 'map_tiles'],
    ['description', metadata.description ?? 'Map tiles'],
    ['version', metadata.version ?? '1.0'],
    ['type', metadata.type ?? 'baselayer'],
    ['format', metadata.format ?? 'png'],
    ['bounds', metadata.bounds ?? WORLD_BOUNDS],
    ['attribution', metadata.attribution ?? ''],
    ['minzoom', String(metadata.minzoom ?? 0)],
    ['maxzoom', String(metadata.maxzoom ?? 22)],
    ['generator', GENERATOR],
  ];
}

/**
 * Writer for one MBTiles file.
 *
 * Obtain instances through {@link MBTilesWriter.create} or, preferably,
 * {@link withArchive}, which guarantees {@link MBTilesWriter.close}.
 *
 * @example
 * ```typescript
 * const writer = MBTilesWriter.create('out/osm.mbtiles', { name: 'osm', format: 'png' });
 * try {
 *   writer.addTile(1, 1, 0, pngBytes);
 *   writer.optimize();
 * } finally {
 *   writer.close();
 * }
 * ```
 */
export class MBTilesWriter {
  readonly path: string;
  private db: Database.Database | null;
  private readonly insert: Database.Statement<[number, number, number, Buffer]>;
  private readonly logger: Logger;

  private constructor(path: string, db: Database.Database, logger: Logger) {
    this.path = path;
    this.db = db;
    this.logger = logger;
    this.insert = db.prepare<[number, number, number, Buffer]>(
      'INSERT OR REPLACE INTO tiles (zoom_level, tile_column, tile_row, tile_data) VALUES (?, ?, ?, ?)',
    );
  }

  /**
   * Create a fresh archive at `path`.
   *
   * An existing file at `path` is deleted first; creation never appends.
   * Parent directories are created as needed. Schema and metadata are
   * committed in a single transaction.
   *
   * @throws {ArchiveError} If the file cannot be created or initialized.
   */
  static create(
    path: string,
    metadata: ArchiveMetadata = {},
    options: MBTilesWriterOptions = {},
  ): MBTilesWriter {
    const logger = options.logger ?? silentLogger;
    let db: Database.Database | null = null;

    try {
      mkdirSync(dirname(path), { recursive: true });
      rmSync(path, { force: true });

      db = new Database(path);
      initialize(db, metadataRows(metadata));

      const writer = new MBTilesWriter(path, db, logger);
      logger.info('Created MBTiles file', { path });
      return writer;
    } catch (err) {
      db?.close();
      throw new ArchiveError(`Cannot create archive: ${errorMessage(err)}`, path, err);
    }
  }

  /** `false` once {@link MBTilesWriter.close} has run. */
  get isOpen(): boolean {
    return this.db !== null;
  }

  /**
   * Insert or replace one tile.
   *
   * @param z - Zoom level.
   * @param x - Tile column.
   * @param y - XYZ tile row; stored as the TMS row.
   * @param data - Encoded tile bytes, stored as-is.
   * @throws {ArchiveError} If the archive is closed or the write fails.
   */
  addTile(z: number, x: number, y: number, data: Uint8Array): void {
    this.requireOpen();
    try {
      this.insert.run(z, x, xyzToTms(z, y), toBuffer(data));
    } catch (err) {
      throw new ArchiveError(`Cannot write tile z=${z} x=${x} y=${y}: ${errorMessage(err)}`, this.path, err);
    }
    this.logger.debug('Added tile', { z, x, y });
  }

  /**
   * Import every tile below one zoom directory laid out as
   * `<dir>/<x>/<y>.<format>`.
   *
   * Entries that are not numeric column directories are ignored. Files
   * with the wrong extension are ignored; files whose name is not a row
   * number, or that cannot be read, are logged and skipped. Each column is
   * written in one transaction.
   *
   * @param dir - Zoom directory, e.g. `staging/12`.
   * @param zoom - Zoom level of every tile below `dir`.
   * @param format - File extension to import, without the dot.
   * @throws {ArchiveError} If a database write fails.
   */
  async addTilesFromDirectory(dir: string, zoom: number, format = 'png'): Promise<ImportSummary> {
    this.requireOpen();
    const summary: ImportSummary = { imported: 0, skipped: 0 };

    const columns = await listEntries(dir);
    if (columns === null) {
      this.logger.warn('Directory not found', { dir });
      return summary;
    }

    for (const column of columns) {
      if (!column.isDirectory() || !isIndex(column.name)) continue;
      const x = Number(column.name);
      const columnDir = join(dir, column.name);
      const files = await listEntries(columnDir) ?? [];
      const batch: Array<{ y: number; data: Uint8Array }> = [];

      for (const file of files) {
        if (!file.isFile() || extname(file.name) !== `.${format}`) continue;
        const tilePath = join(columnDir, file.name);
        const stem = file.name.slice(0, -(format.length + 1));

        if (!isIndex(stem)) {
          this.logger.error('Skipping tile with malformed name', { path: tilePath });
          summary.skipped++;
          continue;
        }
        try {
          batch.push({ y: Number(stem), data: await readFile(tilePath) });
        } catch (err) {
          this.logger.error('Skipping unreadable tile', { path: tilePath, error: errorMessage(err) });
          summary.skipped++;
        }
      }

      this.writeBatch(zoom, x, batch);
      summary.imported += batch.length;
    }

    this.logger.info('Imported tiles from directory', { dir, zoom, ...summary });
    return summary;
  }

  /**
   * Import a whole staging tree `<root>/<z>/<x>/<y>.<format>`.
   *
   * Every numeric top-level directory is treated as a zoom level.
   */
  async importTree(root: string, format = 'png'): Promise<ImportSummary> {
    this.requireOpen();
    const total: ImportSummary = { imported: 0, skipped: 0 };

    const zooms = await listEntries(root);
    if (zooms === null) {
      this.logger.warn('Staging directory not found', { root });
      return total;
    }

    const levels = zooms
      .filter(entry => entry.isDirectory() && isIndex(entry.name))
      .map(entry => Number(entry.name))
      .sort((a, b) => a - b);

    for (const z of levels) {
      const summary = await this.addTilesFromDirectory(join(root, String(z)), z, format);
      total.imported += summary.imported;
      total.skipped += summary.skipped;
    }
    return total;
  }

  /**
   * Compact the file with `VACUUM`.
   *
   * @throws {ArchiveError} If the archive is closed or the vacuum fails.
   */
  optimize(): void {
    const db = this.requireOpen();
    this.logger.info('Optimizing MBTiles file', { path: this.path });
    try {
      db.exec('VACUUM');
    } catch (err) {
      throw new ArchiveError(`Cannot optimize archive: ${errorMessage(err)}`, this.path, err);
    }
  }

  /**
   * Close the database handle. Safe to call more than once.
   */
  close(): void {
    if (!this.db) return;
    this.db.close();
    this.db = null;
    this.logger.info('Closed MBTiles file', { path: this.path });
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private writeBatch(z: number, x: number, batch: ReadonlyArray<{ y: number; data: Uint8Array }>): void {
    if (batch.length === 0) return;
    const db = this.requireOpen();
    try {
      db.transaction(() => {
        for (const { y, data } of batch) {
          this.insert.run(z, x, xyzToTms(z, y), toBuffer(data));
        }
      })();
    } catch (err) {
      throw new ArchiveError(`Cannot write tiles for z=${z} x=${x}: ${errorMessage(err)}`, this.path, err);
    }
  }

  private requireOpen(): Database.Database {
    if (!this.db) {
      throw new ArchiveError('Archive is closed', this.path);
    }
    return this.db;
  }
}

/**
 * Create an archive, hand it to `fn`, and close it on every exit path.
 *
 * @returns Whatever `fn` returns.
 */
export async function withArchive<T>(
  path: string,
  metadata: ArchiveMetadata,
  fn: (writer: MBTilesWriter) => Promise<T> | T,
  options: MBTilesWriterOptions = {},
): Promise<T> {
  const writer = MBTilesWriter.create(path, metadata, options);
  try {
    return await fn(writer);
  } finally {
    writer.close();
  }
}

/**
 * Build a complete archive from a staging tree.
 *
 * Compaction runs even when the import fails part-way; the import error
 * is rethrown afterwards and a compaction error behind it is only logged.
 * The file is always closed.
 *
 * @example
 * ```typescript
 * const { imported } = await buildArchive('/tmp/tiles/osm', 'out/osm.mbtiles', {
 *   name: 'osm',
 *   minzoom: 10,
 *   maxzoom: 12,
 * });
 * ```
 */
export function buildArchive(
  stagingDir: string,
  path: string,
  metadata: ArchiveMetadata = {},
  options: MBTilesWriterOptions = {},
): Promise<ImportSummary> {
  const logger = options.logger ?? silentLogger;
  return withArchive(path, metadata, async writer => {
    let summary: ImportSummary;
    try {
      summary = await writer.importTree(stagingDir, metadata.format ?? 'png');
    } catch (err) {
      try {
        writer.optimize();
      } catch (optimizeErr) {
        logger.error('Cannot optimize archive after failed import', { path, error: errorMessage(optimizeErr) });
      }
      throw err;
    }
    writer.optimize();
    return summary;
  }, options);
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function initialize(db: Database.Database, rows: ReadonlyArray<[string, string]>): void {
  db.pragma(`application_id = ${MBTILES_APPLICATION_ID}`);
  db.transaction(() => {
    db.exec(SCHEMA);
    const stmt = db.prepare<[string, string]>('INSERT INTO metadata (name, value) VALUES (?, ?)');
    for (const [name, value] of rows) stmt.run(name, value);
  })();
}

function isIndex(name: string): boolean {
  return /^\d+$/.test(name);
}

function toBuffer(data: Uint8Array): Buffer {
  return Buffer.isBuffer(data) ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

async function listEntries(dir: string) {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return null;
    throw err;
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
