import { readFile } from 'node:fs/promises';
import path from 'node:path';

import type { CompletionState, ContextLine, Exercise } from '../schema/index.js';
import { COMPLETION } from '../config/defaults.js';

// ── Marker ────────────────────────────────────────────────────
// `// I AM NOT DONE` or `/// I AM NOT DONE`, any case, any spacing.

const MARKER_PATTERN = /^\s*\/\/\/?\s*I\s+AM\s+NOT\s+DONE/i;

export class ExerciseReadError extends Error {
  readonly exercise: string;

  constructor(exercise: Exercise, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Unable to read the exercise file ${exercise.path}: ${reason}`, {
      cause,
    });
    this.name = 'ExerciseReadError';
    this.exercise = exercise.name;
  }
}

// ── Detection ─────────────────────────────────────────────────

/**
 * Text-only completion check. An exercise counts as done once its marker
 * comment is gone; nothing is compiled, so removing the marker without
 * solving the exercise also reads as done.
 */
export function detectCompletion(source: string): CompletionState {
  const lines = splitLines(source);
  const markerIndex = lines.findIndex((line) => MARKER_PATTERN.test(line));

  if (markerIndex === -1) {
    return { status: 'done' };
  }

  const low = Math.max(0, markerIndex - COMPLETION.CONTEXT_LINES);
  const high = Math.min(
    lines.length - 1,
    markerIndex + COMPLETION.CONTEXT_LINES,
  );

  const context: ContextLine[] = [];
  for (let i = low; i <= high; i++) {
    context.push({
      text: lines[i] ?? '',
      number: i + 1,
      isMarkerLine: i === markerIndex,
    });
  }

  return { status: 'pending', context };
}

function splitLines(source: string): string[] {
  const lines = source.split(/\r?\n/);
  // A trailing newline ends the last line; it does not start a new one.
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

export async function exerciseState(
  exercise: Exercise,
  rootDir: string = process.cwd(),
): Promise<CompletionState> {
  let source: string;
  try {
    source = await readFile(path.resolve(rootDir, exercise.path), 'utf-8');
  } catch (err) {
    throw new ExerciseReadError(exercise, err);
  }
  return detectCompletion(source);
}

export async function looksDone(
  exercise: Exercise,
  rootDir?: string,
): Promise<boolean> {
  const state = await exerciseState(exercise, rootDir);
  return state.status === 'done';
}
