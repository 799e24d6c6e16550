import { TOOLS } from '../config/defaults.js';
import { failureText, runCommand } from '../utils/command.js';
import type { CommandRunner } from '../utils/command.js';
import * as logger from '../utils/logger.js';
import { ProverError } from './client.js';
import type { ProveRequest, ProverService } from './client.js';

export interface BbProverOptions {
  binary?: string | undefined;
  run?: CommandRunner | undefined;
  cwd?: string | undefined;
}

/** Prover service backed by the barretenberg `bb` CLI. */
export function createBbProver(options: BbProverOptions = {}): ProverService {
  const binary = options.binary ?? TOOLS.BB;
  const run = options.run ?? runCommand;

  return {
    async prove(request: ProveRequest): Promise<string> {
      logger.proof('Creating proof with barretenberg (bb)');
      const result = await run(
        binary,
        [
          'prove',
          '-b',
          request.artifactPath,
          '-w',
          request.witnessPath,
          '-o',
          request.proofPath,
        ],
        options.cwd,
      );
      if (!result.ok) {
        throw new ProverError('prove', 'Failed to prove the program', failureText(result));
      }
      return result.stdout;
    },

    async writeVerificationKey(artifactPath: string, vkPath: string): Promise<string> {
      logger.proof('Exporting verification key with barretenberg (bb)');
      const result = await run(
        binary,
        ['write_vk', '-b', artifactPath, '-o', vkPath],
        options.cwd,
      );
      if (!result.ok) {
        throw new ProverError(
          'writeVk',
          'Failed to write the verification key',
          failureText(result),
        );
      }
      return result.stdout;
    },

    async verify(vkPath: string, proofPath: string): Promise<string> {
      logger.proof('Verifying proof with barretenberg (bb)');
      const result = await run(
        binary,
        ['verify', '-k', vkPath, '-p', proofPath],
        options.cwd,
      );
      if (!result.ok) {
        throw new ProverError('verify', 'Failed to verify the proof', failureText(result));
      }
      return result.stdout;
    },
  };
}
