/**
 * CLI Utilities
 */

export * from './progress.js';
export * from './summary.js';
export * from './signal-handler.js';
