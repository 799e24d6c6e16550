import path from 'node:path';

import type {
  Exercise,
  ModeKind,
  PipelineOutcome,
  PipelineStage,
} from '../schema/index.js';
import { hasPayload } from '../schema/index.js';
import type { CompilerToolkit, Execution, TestReport } from '../toolkit/index.js';
import { ToolkitError } from '../toolkit/index.js';
import type { ProverService } from '../prover/index.js';
import { ProverError } from '../prover/index.js';
import { withScratchFile } from '../utils/scratch.js';
import * as logger from '../utils/logger.js';
import { stage } from './staging.js';
import type { StagingArea, WorkingUnit } from './staging.js';

// ── Error ─────────────────────────────────────────────────────

/** One or more embedded tests failed; reported as a single failure. */
export class AggregateTestFailure extends Error {
  readonly failed: readonly string[];
  readonly total: number;

  constructor(failed: readonly string[], total: number) {
    super(
      `${String(failed.length)} of ${String(total)} tests failed: ${failed.join(', ')}`,
    );
    this.name = 'AggregateTestFailure';
    this.failed = failed;
    this.total = total;
  }
}

// ── Public types ─────────────────────────────────────────────

export interface PipelineDeps {
  area: StagingArea;
  toolkit: CompilerToolkit;
  prover: ProverService;
  /** Directory exercise and input paths are relative to. */
  rootDir?: string | undefined;
}

export const PIPELINES: Readonly<Record<ModeKind, readonly PipelineStage[]>> = {
  build: ['compile'],
  execute: ['execute'],
  proveOnly: ['execute', 'prove'],
  proveAndVerify: ['execute', 'prove', 'verify'],
  test: ['test'],
};

interface Step {
  stage: PipelineStage;
  run(): Promise<string>;
}

// ── Orchestrator ─────────────────────────────────────────────

/**
 * Stage the exercise, then run its mode's steps one after another.
 *
 * The first failing step ends the run; nothing downstream is invoked.
 * Toolkit, prover and test failures become a failed outcome. Staging
 * errors are environment defects and propagate to the caller.
 */
export async function runPipeline(
  exercise: Exercise,
  deps: PipelineDeps,
): Promise<PipelineOutcome> {
  const payload = hasPayload(exercise.mode) ? exercise.mode.payload : undefined;
  const unit = await stage(deps.area, exercise, payload, deps.rootDir);

  const steps = buildSteps(exercise, unit, deps);
  const outputs: string[] = [];

  for (const [index, step] of steps.entries()) {
    try {
      outputs.push(await step.run());
    } catch (err) {
      if (!isStepFailure(err)) throw err;
      const skipped = steps.slice(index + 1).map((s) => s.stage);
      return {
        ok: false,
        stage: step.stage,
        cause: err.message,
        skipped,
        downstreamSkipped: skipped.length > 0,
      };
    }
  }

  return {
    ok: true,
    output: outputs.filter((o) => o.trim().length > 0).join('\n'),
  };
}

function isStepFailure(
  err: unknown,
): err is ToolkitError | ProverError | AggregateTestFailure {
  return (
    err instanceof ToolkitError ||
    err instanceof ProverError ||
    err instanceof AggregateTestFailure
  );
}

// ── Step construction ────────────────────────────────────────

function buildSteps(
  exercise: Exercise,
  unit: WorkingUnit,
  deps: PipelineDeps,
): Step[] {
  const { toolkit, prover, area } = deps;
  const mode = exercise.mode;

  const proofPath = path.join(area.targetDir, `proof-${exercise.name}`);
  let execution: Execution | undefined;
  let witnessPath: string | undefined;

  const compileStep: Step = {
    stage: 'compile',
    async run() {
      await toolkit.compile(unit);
      return '';
    },
  };

  const executeStep: Step = {
    stage: 'execute',
    async run() {
      // nargo writes the witness under a scratch name first, so a failed
      // save never leaves a stray witness behind.
      return withScratchFile(
        area.targetDir,
        async (scratchPath) => {
          const result = await toolkit.execute(unit, {
            inputName: area.inputName,
            witnessName: path.basename(scratchPath, '.gz'),
          });
          logger.detail(`[${unit.packageName}] Circuit witness successfully solved`);
          if (result.returnValue !== undefined) {
            logger.detail(`[${unit.packageName}] Circuit output: ${result.returnValue}`);
          }
          witnessPath = await toolkit.saveWitness(
            result.witness,
            exercise.name,
            area.targetDir,
          );
          logger.detail(`[${unit.packageName}] Witness saved to ${witnessPath}`);
          execution = result;
          return result.output;
        },
        '.gz',
      );
    },
  };

  const proveStep: Step = {
    stage: 'prove',
    async run() {
      if (execution === undefined || witnessPath === undefined) {
        throw new ProverError('prove', 'No witness to prove');
      }
      return prover.prove({
        artifactPath: execution.artifact.path,
        witnessPath,
        proofPath,
      });
    },
  };

  const verifyStep: Step = {
    stage: 'verify',
    async run() {
      if (execution === undefined || mode.kind !== 'proveAndVerify') {
        throw new ProverError('verify', 'No proof to verify');
      }
      const artifactPath = execution.artifact.path;
      const verifyWith = async (vkPath: string): Promise<string> => {
        const written = await prover.writeVerificationKey(artifactPath, vkPath);
        const verified = await prover.verify(vkPath, proofPath);
        return [written, verified].filter((o) => o.length > 0).join('\n');
      };

      // The verification key is the intermediate artifact; the proof is
      // kept either way.
      if (mode.retainIntermediateFiles) {
        return verifyWith(path.join(area.targetDir, `vk-${exercise.name}`));
      }
      return withScratchFile(area.targetDir, verifyWith, '.vk');
    },
  };

  const testStep: Step = {
    stage: 'test',
    async run() {
      const reports = await toolkit.runTests(unit, unit.packageName);
      return summarizeTests(reports);
    },
  };

  const byStage: Record<PipelineStage, Step> = {
    compile: compileStep,
    execute: executeStep,
    prove: proveStep,
    verify: verifyStep,
    test: testStep,
  };

  return PIPELINES[mode.kind].map((s) => byStage[s]);
}

function summarizeTests(reports: readonly TestReport[]): string {
  const failed = reports.filter((r) => !r.passed).map((r) => r.name);
  if (failed.length > 0) {
    throw new AggregateTestFailure(failed, reports.length);
  }
  return '';
}
