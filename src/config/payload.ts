import { readFile } from 'node:fs/promises';
import path from 'node:path';

import type { ConfigPayload } from '../schema/index.js';

// ── Error ─────────────────────────────────────────────────────

/** A referenced input file could not be read. Fatal to the exercise. */
export class ConfigReadError extends Error {
  readonly path: string;

  constructor(filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Unable to read the input file ${filePath}: ${reason}`, { cause });
    this.name = 'ConfigReadError';
    this.path = filePath;
  }
}

// ── Constructors ──────────────────────────────────────────────

export function inlinedPayload(text: string): ConfigPayload {
  return { kind: 'inlined', text };
}

export function pathPayload(filePath: string): ConfigPayload {
  return { kind: 'path', path: filePath };
}

// ── Resolution ────────────────────────────────────────────────

/**
 * Resolve a payload to its text. Inlined text is returned as is;
 * referenced files are read fresh on every call, relative to `rootDir`.
 */
export async function resolvePayload(
  payload: ConfigPayload,
  rootDir: string = process.cwd(),
): Promise<string> {
  switch (payload.kind) {
    case 'inlined':
      return payload.text;
    case 'path': {
      const filePath = path.resolve(rootDir, payload.path);
      try {
        return await readFile(filePath, 'utf-8');
      } catch (err) {
        throw new ConfigReadError(payload.path, err);
      }
    }
  }
}
