/**
 * Configuration module.
 * Manifest loading, input payload resolution, defaults and env overrides.
 */

export {
  COMPLETION,
  STAGING,
  TOOLS,
  MANIFEST,
  EXIT_CODES,
  loadRunnerEnv,
} from './defaults.js';
export type { RunnerEnv } from './defaults.js';
export { loadManifest, parseManifest, findExercise, ManifestError } from './loader.js';
export type { Manifest } from './loader.js';
export {
  resolvePayload,
  inlinedPayload,
  pathPayload,
  ConfigReadError,
} from './payload.js';
