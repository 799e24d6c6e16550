import { ProverError } from './client.js';
import type { ProveRequest, ProverOperation, ProverService } from './client.js';

export interface MockProverOptions {
  /** Operations that fail with the given stderr text. */
  failures?: Partial<Record<ProverOperation, string>>;
}

export interface MockCall {
  operation: ProverOperation;
  args: string[];
}

export interface MockProver extends ProverService {
  readonly calls: MockCall[];
}

/**
 * Mock prover for testing.
 * Records every invocation with the paths it was given.
 */
export function createMockProver(options: MockProverOptions = {}): MockProver {
  const calls: MockCall[] = [];

  function record(operation: ProverOperation, args: string[]): void {
    calls.push({ operation, args });
    const stderr = options.failures?.[operation];
    if (stderr !== undefined) {
      throw new ProverError(operation, `Mock ${operation} failed`, stderr);
    }
  }

  return {
    calls,

    async prove(request: ProveRequest): Promise<string> {
      record('prove', [request.artifactPath, request.witnessPath, request.proofPath]);
      return '';
    },

    async writeVerificationKey(artifactPath: string, vkPath: string): Promise<string> {
      record('writeVk', [artifactPath, vkPath]);
      return '';
    },

    async verify(vkPath: string, proofPath: string): Promise<string> {
      record('verify', [vkPath, proofPath]);
      return '';
    },
  };
}
