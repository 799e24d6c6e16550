import path from 'node:path';

import type { Command } from 'commander';

import type { Exercise } from '../schema/index.js';
import {
  EXIT_CODES,
  MANIFEST,
  STAGING,
  findExercise,
  loadManifest,
  loadRunnerEnv,
} from '../config/index.js';
import type { Manifest } from '../config/index.js';
import {
  createStagingArea,
  exerciseState,
  resetExercise,
  runExercise,
  verifyExercises,
} from '../core/index.js';
import type { PipelineDeps } from '../core/index.js';
import { createNargoToolkit } from '../toolkit/index.js';
import { createBbProver } from '../prover/index.js';
import {
  exerciseToJSON,
  renderPending,
  serializeJSON,
  JSON_OUTPUT_VERSION,
} from '../report/index.js';
import type { JsonExercise } from '../report/index.js';
import * as logger from '../utils/logger.js';

// ── Shared wiring ────────────────────────────────────────────

interface ManifestOpts {
  manifest: string;
}

function createDeps(manifest: Manifest): PipelineDeps {
  const env = loadRunnerEnv();
  const root =
    env.workDir !== undefined
      ? path.resolve(env.workDir)
      : path.join(manifest.rootDir, STAGING.DIR_NAME);

  return {
    area: createStagingArea(root),
    toolkit: createNargoToolkit({ binary: env.nargo }),
    prover: createBbProver({ binary: env.bb, cwd: manifest.rootDir }),
    rootDir: manifest.rootDir,
  };
}

async function loadOrReport(manifestPath: string): Promise<Manifest | undefined> {
  try {
    return await loadManifest(manifestPath);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`Config error: ${message}\n`);
    process.exitCode = EXIT_CODES.CONFIG_ERROR;
    return undefined;
  }
}

function lookup(manifest: Manifest, name: string): Exercise | undefined {
  const exercise = findExercise(manifest, name);
  if (exercise === undefined) {
    process.stderr.write(`No exercise named "${name}" found in manifest\n`);
    process.exitCode = EXIT_CODES.CONFIG_ERROR;
  }
  return exercise;
}

function reportFatal(err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Error: ${message}\n`);
  process.exitCode = EXIT_CODES.CONFIG_ERROR;
}

function withManifestOption(command: Command): Command {
  return command.option(
    '--manifest <path>',
    'Path to the exercise manifest',
    MANIFEST.DEFAULT_PATH,
  );
}

// ── list ─────────────────────────────────────────────────────

export function registerListCommand(program: Command): void {
  withManifestOption(
    program
      .command('list')
      .description('List exercises and whether they still carry their marker')
      .option('--json', 'Output JSON to stdout'),
  ).action(async (opts: ManifestOpts & { json?: true }) => {
    const manifest = await loadOrReport(opts.manifest);
    if (manifest === undefined) return;

    try {
      const exercises: JsonExercise[] = [];
      for (const exercise of manifest.exercises) {
        const state = await exerciseState(exercise, manifest.rootDir);
        exercises.push(exerciseToJSON(exercise, state.status));
      }

      if (opts.json) {
        process.stdout.write(
          serializeJSON({ version: JSON_OUTPUT_VERSION, exercises }) + '\n',
        );
        return;
      }

      for (const e of exercises) {
        const icon = e.status === 'done' ? '✅' : '⏳';
        logger.raw(`${icon} ${e.name.padEnd(24)} ${e.path}`);
      }
      const done = exercises.filter((e) => e.status === 'done').length;
      logger.info(
        `Progress: ${String(done)}/${String(exercises.length)} exercises done`,
      );
    } catch (err) {
      reportFatal(err);
    }
  });
}

// ── run ──────────────────────────────────────────────────────

export function registerRunCommand(program: Command): void {
  withManifestOption(
    program
      .command('run')
      .description('Run a single exercise through its mode pipeline')
      .argument('<name>', 'Exercise name'),
  ).action(async (name: string, opts: ManifestOpts) => {
    const manifest = await loadOrReport(opts.manifest);
    if (manifest === undefined) return;
    const exercise = lookup(manifest, name);
    if (exercise === undefined) return;

    try {
      const outcome = await runExercise(exercise, createDeps(manifest));
      process.exitCode = outcome.ok ? EXIT_CODES.OK : EXIT_CODES.EXERCISE_FAILED;
    } catch (err) {
      reportFatal(err);
    }
  });
}

// ── verify ───────────────────────────────────────────────────

export function registerVerifyCommand(program: Command): void {
  withManifestOption(
    program
      .command('verify')
      .description('Run every exercise in order, stopping at the first unfinished one')
      .option('--json', 'Output JSON to stdout'),
  ).action(async (opts: ManifestOpts & { json?: true }) => {
    const manifest = await loadOrReport(opts.manifest);
    if (manifest === undefined) return;

    try {
      const result = await verifyExercises(manifest.exercises, createDeps(manifest));

      if (opts.json) {
        const exercises = result.entries.map((e) => exerciseToJSON(e.exercise, e.status));
        process.stdout.write(
          serializeJSON({ version: JSON_OUTPUT_VERSION, exercises }) + '\n',
        );
      }

      if (result.stoppedAt !== undefined) {
        process.exitCode = EXIT_CODES.EXERCISE_FAILED;
        return;
      }
      logger.success('All exercises done!');
    } catch (err) {
      reportFatal(err);
    }
  });
}

// ── hint ─────────────────────────────────────────────────────

export function registerHintCommand(program: Command): void {
  withManifestOption(
    program
      .command('hint')
      .description('Show the hint for an exercise')
      .argument('<name>', 'Exercise name'),
  ).action(async (name: string, opts: ManifestOpts) => {
    const manifest = await loadOrReport(opts.manifest);
    if (manifest === undefined) return;
    const exercise = lookup(manifest, name);
    if (exercise === undefined) return;

    process.stdout.write(`${exercise.hint}\n`);
  });
}

// ── reset ────────────────────────────────────────────────────

export function registerResetCommand(program: Command): void {
  withManifestOption(
    program
      .command('reset')
      .description('Discard local changes to an exercise (git stash)')
      .argument('<name>', 'Exercise name'),
  ).action(async (name: string, opts: ManifestOpts) => {
    const manifest = await loadOrReport(opts.manifest);
    if (manifest === undefined) return;
    const exercise = lookup(manifest, name);
    if (exercise === undefined) return;

    const result = await resetExercise(exercise, manifest.rootDir);
    if (result.ok) {
      logger.success(result.message);
    } else {
      logger.error(result.message);
      process.exitCode = EXIT_CODES.EXERCISE_FAILED;
    }
  });
}

// ── pending ──────────────────────────────────────────────────

export function registerPendingCommand(program: Command): void {
  withManifestOption(
    program
      .command('pending')
      .description('Show where the next unfinished exercise still needs work'),
  ).action(async (opts: ManifestOpts) => {
    const manifest = await loadOrReport(opts.manifest);
    if (manifest === undefined) return;

    try {
      for (const exercise of manifest.exercises) {
        const state = await exerciseState(exercise, manifest.rootDir);
        if (state.status === 'pending') {
          logger.raw(renderPending(exercise, state.context));
          return;
        }
      }
      logger.success('All exercises done!');
    } catch (err) {
      reportFatal(err);
    }
  });
}
