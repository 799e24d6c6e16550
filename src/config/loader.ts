import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { parse as parseYaml } from 'yaml';
import type { ZodError } from 'zod';

import { manifestSchema } from '../schema/index.js';
import type { Exercise, ExerciseEntry } from '../schema/index.js';
import { decodeMode, ModeDecodeError } from '../core/mode.js';

// ── Error ─────────────────────────────────────────────────────

export class ManifestError extends Error {
  readonly manifestPath: string;

  constructor(manifestPath: string, message: string, cause?: unknown) {
    super(`${manifestPath}: ${message}`, { cause });
    this.name = 'ManifestError';
    this.manifestPath = manifestPath;
  }
}

// ── Public types ─────────────────────────────────────────────

export interface Manifest {
  /** Directory holding the manifest; exercise paths are relative to it. */
  readonly rootDir: string;
  readonly exercises: readonly Exercise[];
}

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate an `info.yaml` (or JSON) manifest.
 * Any malformed entry fails the whole load.
 */
export async function loadManifest(manifestPath: string): Promise<Manifest> {
  let raw: string;
  try {
    raw = await readFile(manifestPath, 'utf-8');
  } catch (err) {
    throw new ManifestError(manifestPath, 'unable to read the manifest', err);
  }

  return parseManifest(raw, manifestPath);
}

export function parseManifest(raw: string, manifestPath: string): Manifest {
  let parsed: unknown;
  try {
    parsed = manifestPath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ManifestError(manifestPath, `invalid syntax: ${reason}`, err);
  }

  const result = manifestSchema.safeParse(parsed);
  if (!result.success) {
    throw new ManifestError(manifestPath, formatZodError(result.error), result.error);
  }

  const seen = new Set<string>();
  const exercises = result.data.exercises.map((entry) => {
    if (seen.has(entry.name)) {
      throw new ManifestError(manifestPath, `duplicate exercise name "${entry.name}"`);
    }
    seen.add(entry.name);
    return toExercise(entry, manifestPath);
  });

  return { rootDir: path.dirname(path.resolve(manifestPath)), exercises };
}

export function findExercise(
  manifest: Manifest,
  name: string,
): Exercise | undefined {
  return manifest.exercises.find((e) => e.name === name);
}

// ── Helpers ──────────────────────────────────────────────────

function toExercise(entry: ExerciseEntry, manifestPath: string): Exercise {
  try {
    return {
      name: entry.name,
      path: entry.path,
      mode: decodeMode(entry.mode),
      hint: entry.hint,
    };
  } catch (err) {
    if (err instanceof ModeDecodeError) {
      throw new ManifestError(
        manifestPath,
        `exercise "${entry.name}" has an invalid mode (${err.message})`,
        err,
      );
    }
    throw err;
  }
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
