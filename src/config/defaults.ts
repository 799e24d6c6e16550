/**
 * Default configuration values.
 * Tool binaries and the staging directory are overridable via env.
 */

export const COMPLETION = {
  /** Lines shown on each side of the marker line. */
  CONTEXT_LINES: 2,
} as const;

export const STAGING = {
  DIR_NAME: 'runner_crate',
  SOURCE_FILE: 'src/main.nr',
  MANIFEST_FILE: 'Nargo.toml',
  INPUT_NAME: 'Prover',
  TARGET_DIR: 'target',
} as const;

export const TOOLS = {
  NARGO: 'nargo',
  BB: 'bb',
  GIT: 'git',
} as const;

export const MANIFEST = {
  DEFAULT_PATH: 'info.yaml',
} as const;

export const EXIT_CODES = {
  OK: 0,
  EXERCISE_FAILED: 1,
  CONFIG_ERROR: 4,
} as const;

// ── Env overrides ─────────────────────────────────────────────

export interface RunnerEnv {
  nargo: string;
  bb: string;
  workDir: string | undefined;
}

export function loadRunnerEnv(): RunnerEnv {
  return {
    nargo: process.env['NOIRLINGS_NARGO'] ?? TOOLS.NARGO,
    bb: process.env['NOIRLINGS_BB'] ?? TOOLS.BB,
    workDir: process.env['NOIRLINGS_WORKDIR'],
  };
}
