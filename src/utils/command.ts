import { execa, ExecaError } from 'execa';

// ── Public types ─────────────────────────────────────────────

export interface CommandResult {
  ok: boolean;
  stdout: string;
  stderr: string;
  /** Short reason when the command failed, e.g. exit code or ENOENT. */
  reason: string;
}

export type CommandRunner = (
  file: string,
  args: readonly string[],
  cwd?: string,
) => Promise<CommandResult>;

// ── Runner ───────────────────────────────────────────────────

/**
 * Run an external tool to completion and capture its output.
 * A non-zero exit or a missing binary is a failed result, not a throw.
 */
export const runCommand: CommandRunner = async (file, args, cwd) => {
  try {
    const result = await execa(file, args, {
      ...(cwd !== undefined ? { cwd } : {}),
      stripFinalNewline: true,
    });
    return { ok: true, stdout: result.stdout, stderr: result.stderr, reason: '' };
  } catch (err) {
    if (err instanceof ExecaError) {
      return {
        ok: false,
        stdout: asText(err.stdout),
        stderr: asText(err.stderr),
        reason: err.shortMessage,
      };
    }
    throw err;
  }
};

function asText(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/** Best diagnostic text for a failed command. */
export function failureText(result: CommandResult): string {
  return result.stderr.trim() || result.stdout.trim() || result.reason;
}
