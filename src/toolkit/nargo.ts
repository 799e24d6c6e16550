import { rename } from 'node:fs/promises';
import path from 'node:path';

import type { WorkingUnit } from '../core/staging.js';
import { TOOLS } from '../config/defaults.js';
import { failureText, runCommand } from '../utils/command.js';
import type { CommandRunner } from '../utils/command.js';
import * as logger from '../utils/logger.js';
import { ToolkitError } from './client.js';
import type {
  Artifact,
  CompilerToolkit,
  Execution,
  ExecuteOptions,
  TestReport,
  Witness,
} from './client.js';

// ── Output parsing ───────────────────────────────────────────

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;
const RETURN_VALUE_PATTERN = /Circuit output: (.*)$/m;
const TEST_LINE_PATTERN = /^\[([^\]]+)\] Testing (\S+?)\s*\.\.\.\s*(ok|fail(?:ed)?)\b/i;

export function parseReturnValue(stdout: string): string | undefined {
  const match = RETURN_VALUE_PATTERN.exec(stdout.replace(ANSI_PATTERN, ''));
  return match?.[1]?.trim();
}

/** Test results for one package, in the order nargo printed them. */
export function parseTestReport(
  output: string,
  packageName: string,
): TestReport[] {
  const reports: TestReport[] = [];
  for (const line of output.replace(ANSI_PATTERN, '').split('\n')) {
    const match = TEST_LINE_PATTERN.exec(line.trim());
    if (!match || match[1] !== packageName || match[2] === undefined) continue;
    reports.push({
      name: match[2],
      passed: match[3]?.toLowerCase() === 'ok',
    });
  }
  return reports;
}

// ── Client ───────────────────────────────────────────────────

export interface NargoToolkitOptions {
  binary?: string | undefined;
  run?: CommandRunner | undefined;
}

/** Compiler toolkit backed by the `nargo` CLI. */
export function createNargoToolkit(
  options: NargoToolkitOptions = {},
): CompilerToolkit {
  const binary = options.binary ?? TOOLS.NARGO;
  const run = options.run ?? runCommand;

  function artifactOf(unit: WorkingUnit): Artifact {
    return {
      path: path.join(unit.area.targetDir, `${unit.packageName}.json`),
    };
  }

  return {
    async compile(unit: WorkingUnit): Promise<Artifact> {
      logger.tool(`${binary} compile`);
      const result = await run(
        binary,
        ['compile', '--program-dir', unit.area.root],
        unit.area.root,
      );
      if (!result.ok) {
        throw new ToolkitError(
          'compile',
          'Failed to compile the program',
          failureText(result),
        );
      }
      return artifactOf(unit);
    },

    async execute(
      unit: WorkingUnit,
      opts: ExecuteOptions,
    ): Promise<Execution> {
      logger.tool(`${binary} execute ${opts.witnessName}`);
      const result = await run(
        binary,
        [
          'execute',
          opts.witnessName,
          '--program-dir',
          unit.area.root,
          '--prover-name',
          opts.inputName,
        ],
        unit.area.root,
      );
      if (!result.ok) {
        throw new ToolkitError(
          'execute',
          'Failed to execute the program',
          failureText(result),
        );
      }
      return {
        artifact: artifactOf(unit),
        witness: {
          path: path.join(unit.area.targetDir, `${opts.witnessName}.gz`),
        },
        returnValue: parseReturnValue(result.stdout),
        output: result.stdout,
      };
    },

    async saveWitness(
      witness: Witness,
      exerciseName: string,
      targetDir: string,
    ): Promise<string> {
      const destination = path.join(targetDir, `${exerciseName}.gz`);
      if (path.resolve(witness.path) === path.resolve(destination)) {
        return destination;
      }
      try {
        await rename(witness.path, destination);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ToolkitError(
          'saveWitness',
          `Failed to save the witness to ${destination}`,
          reason,
        );
      }
      return destination;
    },

    async runTests(
      unit: WorkingUnit,
      packageName: string,
    ): Promise<TestReport[]> {
      logger.tool(`${binary} test --package ${packageName}`);
      const result = await run(
        binary,
        ['test', '--program-dir', unit.area.root, '--package', packageName],
        unit.area.root,
      );
      const reports = parseTestReport(
        `${result.stdout}\n${result.stderr}`,
        packageName,
      );
      // A failing run with no parsed tests never got past compilation.
      if (!result.ok && !reports.some((r) => !r.passed)) {
        throw new ToolkitError(
          'test',
          'Failed to run the tests',
          failureText(result),
        );
      }
      return reports;
    },
  };
}
