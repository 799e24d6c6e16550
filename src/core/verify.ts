import type { Exercise } from '../schema/index.js';
import type { ExerciseStatus } from '../report/index.js';
import { renderPending } from '../report/index.js';
import * as logger from '../utils/logger.js';
import { exerciseState } from './completion.js';
import { runExercise } from './runner.js';
import type { PipelineDeps } from './pipeline.js';

// ── Public types ─────────────────────────────────────────────

export interface VerifyEntry {
  exercise: Exercise;
  status: ExerciseStatus;
}

export interface VerifyResult {
  entries: VerifyEntry[];
  /** First exercise that failed or still carries its marker. */
  stoppedAt: VerifyEntry | undefined;
}

// ── Verify ───────────────────────────────────────────────────

/**
 * Run exercises in manifest order, one at a time, stopping at the first
 * one whose pipeline fails or whose marker comment is still present.
 */
export async function verifyExercises(
  exercises: readonly Exercise[],
  deps: PipelineDeps,
): Promise<VerifyResult> {
  const entries: VerifyEntry[] = [];

  for (const exercise of exercises) {
    const outcome = await runExercise(exercise, deps);
    if (!outcome.ok) {
      const entry: VerifyEntry = { exercise, status: 'failed' };
      entries.push(entry);
      return { entries, stoppedAt: entry };
    }

    const state = await exerciseState(exercise, deps.rootDir);
    if (state.status === 'pending') {
      logger.info(renderPending(exercise, state.context));
      const entry: VerifyEntry = { exercise, status: 'pending' };
      entries.push(entry);
      return { entries, stoppedAt: entry };
    }

    entries.push({ exercise, status: 'passed' });
  }

  return { entries, stoppedAt: undefined };
}
