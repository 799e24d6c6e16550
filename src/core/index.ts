/**
 * Core module.
 * Mode decoding, completion detection, staging and the exercise pipeline.
 */

export { decodeMode, encodeMode, ModeDecodeError } from './mode.js';
export type { ModeDecodeErrorCode } from './mode.js';
export {
  detectCompletion,
  exerciseState,
  looksDone,
  ExerciseReadError,
} from './completion.js';
export { createStagingArea, stage, StagingError } from './staging.js';
export type { StagingArea, WorkingUnit } from './staging.js';
export { runPipeline, AggregateTestFailure, PIPELINES } from './pipeline.js';
export type { PipelineDeps } from './pipeline.js';
export { runExercise, resetExercise } from './runner.js';
export type { ResetResult } from './runner.js';
export { verifyExercises } from './verify.js';
export type { VerifyEntry, VerifyResult } from './verify.js';
