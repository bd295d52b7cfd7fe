/**
 * @module cleanup
 *
 * Age-based pruning of the staging directory.
 */

import type { Dirent } from 'node:fs';
import { readdir, rm, rmdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { systemClock, type Clock } from './clock.js';
import { errorMessage, silentLogger, type Logger } from './logger.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CleanupOptions {
  clock?: Clock;
  logger?: Logger;
}

/**
 * Remove files below `dir` last modified more than `days` days ago, then
 * remove directories left empty. `dir` itself is kept.
 *
 * Files that cannot be removed are logged and skipped.
 *
 * @returns Number of files removed.
 */
export async function cleanupOldFiles(
  dir: string,
  days: number,
  options: CleanupOptions = {},
): Promise<number> {
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? silentLogger;
  const cutoff = clock.now() - days * DAY_MS;

  const entries = await list(dir);
  if (entries === null) {
    logger.warn('Directory does not exist', { dir });
    return 0;
  }

  const removed = await prune(dir, entries);
  logger.info('Cleaned up old files', { dir, removed, days });
  return removed;

  async function prune(current: string, children: Dirent[]): Promise<number> {
    let count = 0;
    for (const entry of children) {
      const path = join(current, entry.name);

      if (entry.isDirectory()) {
        count += await prune(path, (await list(path)) ?? []);
        const rest = await list(path);
        if (rest !== null && rest.length === 0) {
          await rmdir(path);
          logger.debug('Removed empty directory', { path });
        }
        continue;
      }

      try {
        const { mtimeMs } = await stat(path);
        if (mtimeMs < cutoff) {
          await rm(path);
          count++;
          logger.debug('Removed old file', { path });
        }
      } catch (err) {
        logger.error('Cannot remove file', { path, error: errorMessage(err) });
      }
    }
    return count;
  }
}

async function list(dir: string): Promise<Dirent[] | null> {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
    throw err;
  }
}
