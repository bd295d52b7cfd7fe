import { describe, it, expect, afterEach, beforeEach, vi } from 'vitest';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import {
  MBTILES_APPLICATION_ID,
  MBTilesWriter,
  buildArchive,
  metadataRows,
  withArchive,
} from '../../src/archive/mbtiles.js';
import { ArchiveError } from '../../src/errors.js';
import type { Logger } from '../../src/logger.js';
import { makeTempDir, removeDir } from '../helpers/temp-dir.js';

const unreadable = vi.hoisted(() => new Set<string>());

vi.mock('node:fs/promises', async importOriginal => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    readFile: (...args: Parameters<typeof actual.readFile>) =>
      unreadable.has(String(args[0]))
        ? Promise.reject(new Error('EIO: i/o error, read'))
        : actual.readFile(...args),
  };
});

function recordingLogger(): { logger: Logger; errors: string[] } {
  const errors: string[] = [];
  const logger: Logger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: message => { errors.push(message); },
  };
  return { logger, errors };
}

afterEach(() => {
  unreadable.clear();
  vi.restoreAllMocks();
});

interface TileRow {
  zoom_level: number;
  tile_column: number;
  tile_row: number;
  tile_data: Buffer;
}

function readTiles(path: string): TileRow[] {
  const db = new Database(path, { readonly: true });
  try {
    return db
      .prepare('SELECT * FROM tiles ORDER BY zoom_level, tile_column, tile_row')
      .all() as TileRow[];
  } finally {
    db.close();
  }
}

function readMetadata(path: string): Record<string, string> {
  const db = new Database(path, { readonly: true });
  try {
    const rows = db.prepare('SELECT name, value FROM metadata').all() as Array<{ name: string; value: string }>;
    return Object.fromEntries(rows.map(r => [r.name, r.value]));
  } finally {
    db.close();
  }
}

async function stage(root: string, files: Record<string, number[]>): Promise<void> {
  for (const [rel, bytes] of Object.entries(files)) {
    const path = join(root, ...rel.split('/'));
    await mkdir(join(path, '..'), { recursive: true });
    await writeFile(path, new Uint8Array(bytes));
  }
}

describe('MBTilesWriter', () => {
  let dir: string;
  let archive: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    archive = join(dir, 'out', 'test.mbtiles');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  describe('create', () => {
    it('should write the schema, application id and metadata', () => {
      const writer = MBTilesWriter.create(archive, { name: 'osm', format: 'jpg', minzoom: 3, maxzoom: 5 });
      writer.close();

      const db = new Database(archive, { readonly: true });
      const appId = db.pragma('application_id', { simple: true });
      const index = db
        .prepare("SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = 'tiles'")
        .all() as Array<{ name: string }>;
      db.close();

      expect(appId).toBe(MBTILES_APPLICATION_ID);
      expect(index.map(i => i.name)).toEqual(['tile_index']);
      expect(readMetadata(archive)).toEqual({
        name: 'osm',
        description: 'Map tiles',
        version: '1.0',
        type: 'baselayer',
        format: 'jpg',
        bounds: '-180.0,-85.0511,180.0,85.0511',
        attribution: '',
        minzoom: '3',
        maxzoom: '5',
        generator: 'tilecrawl',
      });
    });

    it('should replace an existing file instead of appending', () => {
      const first = MBTilesWriter.create(archive);
      first.addTile(0, 0, 0, new Uint8Array([1]));
      first.close();

      MBTilesWriter.create(archive).close();

      expect(readTiles(archive)).toEqual([]);
    });

    it('should wrap failures in ArchiveError', async () => {
      const blocker = join(dir, 'blocker');
      await writeFile(blocker, 'not a directory');

      expect(() => MBTilesWriter.create(join(blocker, 'x.mbtiles'))).toThrow(ArchiveError);
    });
  });

  describe('addTile', () => {
    it('should store the TMS row for an XYZ tile', () => {
      const writer = MBTilesWriter.create(archive);
      writer.addTile(1, 1, 0, new Uint8Array([9, 8]));
      writer.close();

      const [row] = readTiles(archive);
      expect(row.zoom_level).toBe(1);
      expect(row.tile_column).toBe(1);
      expect(row.tile_row).toBe(1);
      expect([...row.tile_data]).toEqual([9, 8]);
    });

    it('should keep one row with the latest bytes when a tile is written twice', () => {
      const writer = MBTilesWriter.create(archive);
      writer.addTile(2, 1, 1, new Uint8Array([1]));
      writer.addTile(2, 1, 1, new Uint8Array([2]));
      writer.close();

      const rows = readTiles(archive);
      expect(rows).toHaveLength(1);
      expect([...rows[0].tile_data]).toEqual([2]);
    });

    it('should reject writes after close', () => {
      const writer = MBTilesWriter.create(archive);
      writer.close();

      expect(() => writer.addTile(0, 0, 0, new Uint8Array([1]))).toThrow('Archive is closed');
    });
  });

  describe('addTilesFromDirectory', () => {
    it('should import <x>/<y>.<format> files with flipped rows', async () => {
      const zoomDir = join(dir, 'staging', '3');
      await stage(zoomDir, { '5/7.png': [7], '5/8.png': [8] });

      const writer = MBTilesWriter.create(archive);
      const summary = await writer.addTilesFromDirectory(zoomDir, 3, 'png');
      writer.close();

      expect(summary).toEqual({ imported: 2, skipped: 0 });
      const rows = readTiles(archive);
      expect(rows.map(r => [r.zoom_level, r.tile_column, r.tile_row])).toEqual([
        [3, 5, -1],
        [3, 5, 0],
      ]);
      expect(rows.map(r => [...r.tile_data])).toEqual([[8], [7]]);
    });

    it('should skip malformed names and ignore other formats and directories', async () => {
      const zoomDir = join(dir, 'staging', '2');
      await stage(zoomDir, {
        '1/1.png': [1],
        '1/abc.png': [2],
        '1/2.jpg': [3],
        'tmp/0.png': [4],
      });

      const writer = MBTilesWriter.create(archive);
      const summary = await writer.addTilesFromDirectory(zoomDir, 2);
      writer.close();

      expect(summary).toEqual({ imported: 1, skipped: 1 });
      expect(readTiles(archive).map(r => [r.tile_column, r.tile_row])).toEqual([[1, 2]]);
    });

    it('should log and skip a file that cannot be read and import the rest', async () => {
      const zoomDir = join(dir, 'staging', '1');
      await stage(zoomDir, { '0/0.png': [1], '0/1.png': [2] });
      unreadable.add(join(zoomDir, '0', '1.png'));
      const { logger, errors } = recordingLogger();

      const writer = MBTilesWriter.create(archive, {}, { logger });
      const summary = await writer.addTilesFromDirectory(zoomDir, 1);
      writer.close();

      expect(summary).toEqual({ imported: 1, skipped: 1 });
      expect(readTiles(archive).map(r => [r.tile_column, r.tile_row, ...r.tile_data])).toEqual([[0, 1, 1]]);
      expect(errors).toEqual(['Skipping unreadable tile']);
    });

    it('should return an empty summary for a missing directory', async () => {
      const writer = MBTilesWriter.create(archive);
      const summary = await writer.addTilesFromDirectory(join(dir, 'nope'), 4);
      writer.close();

      expect(summary).toEqual({ imported: 0, skipped: 0 });
    });
  });

  describe('importTree', () => {
    it('should import every numeric zoom directory', async () => {
      const root = join(dir, 'staging');
      await stage(root, {
        '1/1/0.png': [1],
        '3/5/7.png': [2],
        'logs/0/0.png': [3],
      });

      const writer = MBTilesWriter.create(archive);
      const summary = await writer.importTree(root);
      writer.close();

      expect(summary).toEqual({ imported: 2, skipped: 0 });
      expect(readTiles(archive).map(r => [r.zoom_level, r.tile_column, r.tile_row])).toEqual([
        [1, 1, 1],
        [3, 5, 0],
      ]);
    });
  });

  describe('close', () => {
    it('should be safe to call twice', () => {
      const writer = MBTilesWriter.create(archive);
      writer.close();
      writer.close();
      expect(writer.isOpen).toBe(false);
    });
  });
});

describe('withArchive', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('should return the callback result and close the writer', async () => {
    let captured: MBTilesWriter | undefined;
    const result = await withArchive(join(dir, 'a.mbtiles'), {}, writer => {
      captured = writer;
      writer.addTile(0, 0, 0, new Uint8Array([1]));
      return 'done';
    });

    expect(result).toBe('done');
    expect(captured?.isOpen).toBe(false);
  });

  it('should close the writer when the callback throws', async () => {
    let captured: MBTilesWriter | undefined;
    const run = withArchive(join(dir, 'b.mbtiles'), {}, async writer => {
      captured = writer;
      throw new Error('boom');
    });

    await expect(run).rejects.toThrow('boom');
    expect(captured?.isOpen).toBe(false);
  });
});

describe('buildArchive', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('should import a staging tree into a closed, readable archive', async () => {
    const root = join(dir, 'staging');
    await stage(root, { '1/1/0.png': [1, 2, 3] });
    const path = join(dir, 'osm.mbtiles');

    const summary = await buildArchive(root, path, { name: 'osm', minzoom: 1, maxzoom: 1 });

    expect(summary).toEqual({ imported: 1, skipped: 0 });
    const rows = readTiles(path);
    expect(rows.map(r => [r.zoom_level, r.tile_column, r.tile_row])).toEqual([[1, 1, 1]]);
    expect(readMetadata(path).name).toBe('osm');
  });

  it('should compact and close the archive when the import fails', async () => {
    vi.spyOn(MBTilesWriter.prototype, 'importTree').mockRejectedValue(new Error('import failed'));
    const optimize = vi.spyOn(MBTilesWriter.prototype, 'optimize');
    const close = vi.spyOn(MBTilesWriter.prototype, 'close');

    await expect(buildArchive(join(dir, 'staging'), join(dir, 'f.mbtiles'))).rejects.toThrow('import failed');

    expect(optimize).toHaveBeenCalledOnce();
    expect(close).toHaveBeenCalledOnce();
  });

  it('should keep the import error when compaction fails too', async () => {
    vi.spyOn(MBTilesWriter.prototype, 'importTree').mockRejectedValue(new Error('import failed'));
    vi.spyOn(MBTilesWriter.prototype, 'optimize').mockImplementation(() => {
      throw new Error('vacuum failed');
    });
    const { logger, errors } = recordingLogger();

    await expect(
      buildArchive(join(dir, 'staging'), join(dir, 'f.mbtiles'), {}, { logger }),
    ).rejects.toThrow('import failed');

    expect(errors).toEqual(['Cannot optimize archive after failed import']);
  });

  it('should read staged files in the metadata format', async () => {
    const root = join(dir, 'staging');
    await stage(root, { '0/0/0.webp': [1], '0/0/1.png': [2] });

    const summary = await buildArchive(root, join(dir, 'w.mbtiles'), { format: 'webp' });

    expect(summary).toEqual({ imported: 1, skipped: 0 });
  });
});

describe('metadataRows', () => {
  it('should fill defaults in a fixed order', () => {
    expect(metadataRows({}).map(([name]) => name)).toEqual([
      'name', 'description', 'version', 'type', 'format',
      'bounds', 'attribution', 'minzoom', 'maxzoom', 'generator',
    ]);
    expect(metadataRows({})[0]).toEqual(['name', 'map_tiles']);
  });
});
