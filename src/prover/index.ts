/**
 * Prover module.
 * Out-of-process proving and verification over a compiled circuit.
 */

export * from './client.js';
export { createBbProver } from './bb.js';
export type { BbProverOptions } from './bb.js';
export { createMockProver } from './mock.js';
export type { MockProver, MockProverOptions, MockCall } from './mock.js';
