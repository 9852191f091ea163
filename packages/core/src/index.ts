/**
 * @session-gate/core
 *
 * Per-session admission control over a sliding window of request count and
 * token volume.
 */

export * from './types.js';
export * from './errors.js';
export * from './limits.js';
export * from './evaluator.js';
export * from './store.js';
export * from './scope.js';
export * from './controller.js';
