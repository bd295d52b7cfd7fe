import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

/** Fresh directory under the OS temp dir. */
export function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'tilecrawl-test-'));
}

export function removeDir(dir: string): Promise<void> {
  return rm(dir, { recursive: true, force: true });
}
