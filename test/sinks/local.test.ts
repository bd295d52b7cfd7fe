import { describe, it, expect, afterEach, beforeEach } from 'vitest';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { SinkError } from '../../src/errors.js';
import { LocalSink } from '../../src/sinks/local.js';
import { makeTempDir, removeDir } from '../helpers/temp-dir.js';

describe('LocalSink', () => {
  let dir: string;
  let sink: LocalSink;

  beforeEach(async () => {
    dir = await makeTempDir();
    sink = new LocalSink({ basePath: join(dir, 'output') });
  });

  afterEach(async () => {
    await sink.close();
    await removeDir(dir);
  });

  it('should write files below the base path, creating directories', async () => {
    await sink.save(new Uint8Array([1, 2, 3]), 'osm/12/2047/1362.png');

    const bytes = await readFile(join(dir, 'output', 'osm', '12', '2047', '1362.png'));
    expect([...bytes]).toEqual([1, 2, 3]);
  });

  it('should strip leading slashes from keys', async () => {
    await sink.save(new Uint8Array([1]), '/osm.mbtiles');
    expect(await sink.exists('osm.mbtiles')).toBe(true);
  });

  it('should overwrite existing files', async () => {
    await sink.save(new Uint8Array([1]), 'a.bin');
    await sink.save(new Uint8Array([2]), 'a.bin');

    expect([...(await readFile(join(dir, 'output', 'a.bin')))]).toEqual([2]);
  });

  it('should report whether a key exists', async () => {
    await sink.save(new Uint8Array([1]), 'present.bin');

    expect(await sink.exists('present.bin')).toBe(true);
    expect(await sink.exists('absent.bin')).toBe(false);
  });

  it('should report a key below a file as missing', async () => {
    await sink.save(new Uint8Array([1]), 'tile.png');

    expect(await sink.exists('tile.png/inner.png')).toBe(false);
  });

  it('should raise SinkError when the key cannot be checked', async () => {
    await sink.save(new Uint8Array([1]), 'present.bin');

    await expect(sink.exists(`${'a'.repeat(300)}.png`)).rejects.toThrow(SinkError);
  });

  it('should list keys with forward slashes, sorted', async () => {
    await sink.save(new Uint8Array([1]), 'osm/1/1/0.png');
    await sink.save(new Uint8Array([1]), 'osm/1/0/1.png');
    await sink.save(new Uint8Array([1]), 'osm.mbtiles');

    expect(await sink.list()).toEqual(['osm.mbtiles', 'osm/1/0/1.png', 'osm/1/1/0.png']);
    expect(await sink.list('osm/1/1')).toEqual(['osm/1/1/0.png']);
  });

  it('should list nothing for a missing prefix', async () => {
    expect(await sink.list('nothing-here')).toEqual([]);
  });

  it('should reject keys that escape the base path', async () => {
    await expect(sink.save(new Uint8Array([1]), '../outside.bin')).rejects.toThrow(SinkError);
  });
});
