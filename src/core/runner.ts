import path from 'node:path';

import type { Exercise, PipelineOutcome } from '../schema/index.js';
import { hasPayload } from '../schema/index.js';
import { resolvePayload } from '../config/payload.js';
import { TOOLS } from '../config/defaults.js';
import {
  failureHints,
  progressMessage,
  successMessage,
} from '../report/reporter.js';
import { failureText, runCommand } from '../utils/command.js';
import type { CommandRunner } from '../utils/command.js';
import * as logger from '../utils/logger.js';
import { runPipeline } from './pipeline.js';
import type { PipelineDeps } from './pipeline.js';

// ── Run ──────────────────────────────────────────────────────

/**
 * Run one exercise end to end and report it on stderr.
 *
 * Inputs are resolved before staging so an unreadable input file aborts
 * with a ConfigReadError, as does any StagingError.
 */
export async function runExercise(
  exercise: Exercise,
  deps: PipelineDeps,
): Promise<PipelineOutcome> {
  logger.progress(progressMessage(exercise));

  const inputs = hasPayload(exercise.mode)
    ? await resolvePayload(exercise.mode.payload, deps.rootDir)
    : undefined;

  const outcome = await runPipeline(exercise, deps);

  if (outcome.ok) {
    if (outcome.output.length > 0) {
      logger.raw(`    Output ${outcome.output}`);
    }
    logger.success(successMessage(exercise, inputs));
  } else {
    logger.raw(outcome.cause);
    const [headline, ...rest] = failureHints(exercise, outcome);
    if (headline !== undefined) logger.warn(headline);
    for (const line of rest) logger.raw(line);
  }

  return outcome;
}

// ── Reset ────────────────────────────────────────────────────

export interface ResetResult {
  ok: boolean;
  message: string;
}

/** Discard local edits to the exercise source with `git stash`. Not retried. */
export async function resetExercise(
  exercise: Exercise,
  rootDir: string = process.cwd(),
  run: CommandRunner = runCommand,
): Promise<ResetResult> {
  const result = await run(
    TOOLS.GIT,
    ['stash', '--', exercise.path],
    path.resolve(rootDir),
  );
  if (!result.ok) {
    return {
      ok: false,
      message: `Failed to reset ${exercise.path}: ${failureText(result)}`,
    };
  }
  return { ok: true, message: `The file ${exercise.path} has been reset!` };
}
