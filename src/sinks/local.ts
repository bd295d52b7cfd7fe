/**
 * @module sinks/local
 *
 * Local filesystem {@link Sink} implementation.
 */

import type { Dirent } from 'node:fs';
import { access, mkdir, readdir, writeFile } from 'node:fs/promises';
import { dirname, join, relative, resolve, sep } from 'node:path';
import { SinkError } from '../errors.js';
import { errorMessage, silentLogger, type Logger } from '../logger.js';
import { normalizeKey, type Sink } from './sink.js';

/**
 * Configuration options for {@link LocalSink}.
 */
export interface LocalSinkOptions {
  /** Root directory; created on first write. */
  basePath: string;
  logger?: Logger;
}

/**
 * Sink writing objects as files below a base directory.
 *
 * Keys map directly to relative paths. A key that would resolve outside
 * the base directory is rejected.
 *
 * @example
 * ```typescript
 * const sink = new LocalSink({ basePath: './output' });
 * await sink.save(bytes, 'osm/12/2047/1362.png');
 * await sink.list('osm/12');   // ['osm/12/2047/1362.png']
 * ```
 */
export class LocalSink implements Sink {
  readonly kind = 'local';
  readonly basePath: string;
  private readonly logger: Logger;

  constructor(options: LocalSinkOptions) {
    this.basePath = resolve(options.basePath);
    this.logger = options.logger ?? silentLogger;
  }

  async save(data: Uint8Array, path: string): Promise<void> {
    const fullPath = this.resolveKey(path);
    try {
      await mkdir(dirname(fullPath), { recursive: true });
      await writeFile(fullPath, data);
    } catch (err) {
      throw new SinkError(this.kind, `Cannot write ${fullPath}: ${errorMessage(err)}`, err);
    }
    this.logger.debug('Saved file', { path: fullPath, bytes: data.byteLength });
  }

  async exists(path: string): Promise<boolean> {
    const fullPath = this.resolveKey(path);
    try {
      await access(fullPath);
      return true;
    } catch (err) {
      if (isMissing(err)) return false;
      throw new SinkError(this.kind, `Cannot stat ${fullPath}: ${errorMessage(err)}`, err);
    }
  }

  async list(prefix = ''): Promise<string[]> {
    const keys: string[] = [];
    await this.walk(this.resolveKey(prefix), keys);
    return keys.sort();
  }

  async close(): Promise<void> {
    // Nothing to release
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private resolveKey(path: string): string {
    const fullPath = resolve(this.basePath, normalizeKey(path));
    if (fullPath !== this.basePath && !fullPath.startsWith(this.basePath + sep)) {
      throw new SinkError(this.kind, `Key escapes base directory: ${path}`);
    }
    return fullPath;
  }

  private async walk(dir: string, keys: string[]): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (isMissing(err)) return;
      throw new SinkError(this.kind, `Cannot list ${dir}: ${errorMessage(err)}`, err);
    }

    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        await this.walk(fullPath, keys);
      } else if (entry.isFile()) {
        keys.push(relative(this.basePath, fullPath).split(sep).join('/'));
      }
    }
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}
