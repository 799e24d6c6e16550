/**
 * Compiler toolkit module.
 * Compile, execute and test a staged working unit.
 */

export * from './client.js';
export { createNargoToolkit, parseReturnValue, parseTestReport } from './nargo.js';
export type { NargoToolkitOptions } from './nargo.js';
export { createMockToolkit } from './mock.js';
export type { MockToolkit, MockToolkitOptions } from './mock.js';
