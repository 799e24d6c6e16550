// ── Error ─────────────────────────────────────────────────────

/** Non-zero exit from the prover backend, with its captured stderr. */
export class ProverError extends Error {
  readonly operation: ProverOperation;
  readonly output: string;

  constructor(operation: ProverOperation, message: string, output = '') {
    super(output ? `${message}: ${output}` : message);
    this.name = 'ProverError';
    this.operation = operation;
    this.output = output;
  }
}

export type ProverOperation = 'prove' | 'writeVk' | 'verify';

// ── Public types ─────────────────────────────────────────────

export interface ProveRequest {
  artifactPath: string;
  witnessPath: string;
  proofPath: string;
}

// ── ProverService interface ──────────────────────────────────
// Each call resolves with the tool's captured stdout.

export interface ProverService {
  prove(request: ProveRequest): Promise<string>;
  writeVerificationKey(artifactPath: string, vkPath: string): Promise<string>;
  verify(vkPath: string, proofPath: string): Promise<string>;
}
