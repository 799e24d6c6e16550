import path from 'node:path';

import type { WorkingUnit } from '../core/staging.js';
import { ToolkitError } from './client.js';
import type {
  Artifact,
  CompilerToolkit,
  Execution,
  ExecuteOptions,
  TestReport,
  Witness,
} from './client.js';

export interface MockToolkitOptions {
  /** Operations that throw a ToolkitError with the given text. */
  failures?: Partial<Record<'compile' | 'execute' | 'saveWitness' | 'test', string>>;
  returnValue?: string | undefined;
  tests?: readonly TestReport[];
}

export interface MockToolkit extends CompilerToolkit {
  /** Operation names in call order. */
  readonly calls: string[];
}

/**
 * In-process toolkit for tests. Never touches the filesystem; paths are
 * derived from the working unit the same way nargo lays them out.
 */
export function createMockToolkit(options: MockToolkitOptions = {}): MockToolkit {
  const calls: string[] = [];

  function fail(operation: keyof NonNullable<MockToolkitOptions['failures']>): void {
    const message = options.failures?.[operation];
    if (message !== undefined) {
      throw new ToolkitError(operation, `Mock ${operation} failed`, message);
    }
  }

  function artifactOf(unit: WorkingUnit): Artifact {
    return {
      path: path.join(unit.area.targetDir, `${unit.packageName}.json`),
    };
  }

  return {
    calls,

    async compile(unit: WorkingUnit): Promise<Artifact> {
      calls.push('compile');
      fail('compile');
      return artifactOf(unit);
    },

    async execute(unit: WorkingUnit, opts: ExecuteOptions): Promise<Execution> {
      calls.push('execute');
      fail('execute');
      return {
        artifact: artifactOf(unit),
        witness: { path: path.join(unit.area.targetDir, `${opts.witnessName}.gz`) },
        returnValue: options.returnValue,
        output: '',
      };
    },

    async saveWitness(
      _witness: Witness,
      exerciseName: string,
      targetDir: string,
    ): Promise<string> {
      calls.push('saveWitness');
      fail('saveWitness');
      return path.join(targetDir, `${exerciseName}.gz`);
    },

    async runTests(_unit: WorkingUnit, _packageName: string): Promise<TestReport[]> {
      calls.push('runTests');
      fail('test');
      return [...(options.tests ?? [])];
    },
  };
}
