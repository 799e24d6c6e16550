import type {
  ContextLine,
  Exercise,
  PipelineFailure,
} from '../schema/index.js';
import { encodeMode } from '../core/mode.js';

// ── Progress + success ───────────────────────────────────────

export function progressMessage(exercise: Exercise): string {
  switch (exercise.mode.kind) {
    case 'build':
      return `Building ${exercise.path} exercise...`;
    case 'test':
      return `Testing ${exercise.path} exercise...`;
    case 'execute':
    case 'proveOnly':
    case 'proveAndVerify':
      return `Running ${exercise.path} exercise...`;
  }
}

/** Success line; modes with inputs echo them for traceability. */
export function successMessage(
  exercise: Exercise,
  inputs?: string,
): string {
  const withInputs = inputs !== undefined ? `\n With inputs: ${inputs}` : '';
  switch (exercise.mode.kind) {
    case 'build':
      return `Successfully built ${exercise.path}!`;
    case 'test':
      return `Successfully tested ${exercise.path}!`;
    case 'execute':
      return `Successfully ran ${exercise.path}!${withInputs}`;
    case 'proveOnly':
      return `Successfully ran ${exercise.path} and created proof!${withInputs}`;
    case 'proveAndVerify':
      return `Successfully ran ${exercise.path} and verified proof!${withInputs}`;
  }
}

// ── Failure hints ────────────────────────────────────────────

const PROVER_INSTALL_HINT = 'Are you sure you installed barretenberg (bb) properly?';

/** Headline warning first, then any follow-up lines. */
export function failureHints(
  exercise: Exercise,
  failure: PipelineFailure,
): string[] {
  switch (failure.stage) {
    case 'compile':
      return [`Compiling of ${exercise.path} failed! Please try again.`];
    case 'execute':
      return [`Failed to execute ${exercise.path}! Please try again.`];
    case 'prove':
      return [
        `Execution worked but failed to create proof with barretenberg for ${exercise.path}! Please try again.`,
        PROVER_INSTALL_HINT,
      ];
    case 'verify':
      return [
        `Execution worked but failed to verify the proof with barretenberg for ${exercise.path}! Please try again.`,
        PROVER_INSTALL_HINT,
      ];
    case 'test':
      return [
        `Testing of ${exercise.path} failed! Please try again. See the output above ^`,
      ];
  }
}

// ── Pending excerpt ──────────────────────────────────────────

/** Text excerpt around the marker, `>` pointing at the marker line. */
export function renderPending(
  exercise: Exercise,
  context: readonly ContextLine[],
): string {
  const width = Math.max(...context.map((l) => String(l.number).length), 1);
  const lines = [
    `You can keep working on ${exercise.path}, or jump into the next one by removing the \`I AM NOT DONE\` comment:`,
    '',
  ];
  for (const line of context) {
    const marker = line.isMarkerLine ? '>' : ' ';
    lines.push(`${marker} ${String(line.number).padStart(width)} | ${line.text}`);
  }
  return lines.join('\n');
}

// ── JSON output ──────────────────────────────────────────────

export const JSON_OUTPUT_VERSION = '1.0' as const;

export type ExerciseStatus = 'done' | 'pending' | 'passed' | 'failed';

export interface JsonExercise {
  name: string;
  path: string;
  mode: unknown;
  status: ExerciseStatus;
}

export interface JsonOutput {
  version: typeof JSON_OUTPUT_VERSION;
  exercises: JsonExercise[];
}

export function exerciseToJSON(
  exercise: Exercise,
  status: ExerciseStatus,
): JsonExercise {
  return {
    name: exercise.name,
    path: exercise.path,
    mode: encodeMode(exercise.mode),
    status,
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (!isPlainObject(value)) {
    return value;
  }
  const sorted: Record<string, unknown> = {};
  for (const k of Object.keys(value).sort()) {
    sorted[k] = value[k];
  }
  return sorted;
}
