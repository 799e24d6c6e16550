import type { WorkingUnit } from '../core/staging.js';

// ── Error ─────────────────────────────────────────────────────

/** Compilation, execution or test-run failure reported by the toolkit. */
export class ToolkitError extends Error {
  readonly operation: ToolkitOperation;
  readonly output: string;

  constructor(operation: ToolkitOperation, message: string, output = '') {
    super(output ? `${message}: ${output}` : message);
    this.name = 'ToolkitError';
    this.operation = operation;
    this.output = output;
  }
}

export type ToolkitOperation = 'compile' | 'execute' | 'saveWitness' | 'test';

// ── Public types ─────────────────────────────────────────────

export interface Artifact {
  readonly path: string;
}

export interface Witness {
  readonly path: string;
}

export interface ExecuteOptions {
  /** Input file name inside the working unit, without extension. */
  inputName: string;
  /** Name the toolkit writes the witness under. */
  witnessName: string;
}

export interface Execution {
  readonly artifact: Artifact;
  readonly witness: Witness;
  readonly returnValue: string | undefined;
  readonly output: string;
}

export interface TestReport {
  readonly name: string;
  readonly passed: boolean;
}

// ── CompilerToolkit interface ────────────────────────────────

export interface CompilerToolkit {
  compile(unit: WorkingUnit): Promise<Artifact>;
  execute(unit: WorkingUnit, options: ExecuteOptions): Promise<Execution>;
  saveWitness(
    witness: Witness,
    exerciseName: string,
    targetDir: string,
  ): Promise<string>;
  runTests(unit: WorkingUnit, packageName: string): Promise<TestReport[]>;
}
