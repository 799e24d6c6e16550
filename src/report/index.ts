/**
 * Report module.
 * Console messages and the `--json` contract; no side effects.
 */

export {
  progressMessage,
  successMessage,
  failureHints,
  renderPending,
  exerciseToJSON,
  serializeJSON,
  JSON_OUTPUT_VERSION,
} from './reporter.js';
export type { JsonOutput, JsonExercise, ExerciseStatus } from './reporter.js';
