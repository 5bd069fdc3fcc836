/**
 * @logrelay/sdk — shared contracts for the logrelay runtime and its sinks.
 */

export * from './types.js';
export * from './errors.js';
export * from './severity.js';
export * from './format.js';
export * from './record.js';
export * from './sink.js';
export * from './testing.js';
