import { rm } from 'node:fs/promises';
import path from 'node:path';
import { threadId } from 'node:worker_threads';

import * as logger from './logger.js';

// ── Naming ────────────────────────────────────────────────────
// Process id + thread id keep concurrent runner instances apart.

export function scratchFileName(): string {
  return `temp_${String(process.pid)}_${String(threadId)}`;
}

// ── Scoped acquisition ────────────────────────────────────────

/**
 * Run `fn` with a scratch path inside `dir`, then remove whatever was
 * written there. Removal is best effort: failures are logged, not thrown.
 */
export async function withScratchFile<T>(
  dir: string,
  fn: (scratchPath: string) => Promise<T>,
  suffix = '',
): Promise<T> {
  const scratchPath = path.join(dir, scratchFileName() + suffix);
  try {
    return await fn(scratchPath);
  } finally {
    await rm(scratchPath, { force: true }).catch((err: unknown) => {
      const reason = err instanceof Error ? err.message : String(err);
      logger.warn(`Could not remove scratch file ${scratchPath}: ${reason}`);
    });
  }
}
