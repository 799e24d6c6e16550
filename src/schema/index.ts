/**
 * Schema module: data shapes shared across the runner.
 * Zod schemas where a value crosses a boundary, plain types otherwise.
 */

export * from './mode.js';
export * from './exercise.js';
export * from './outcome.js';
