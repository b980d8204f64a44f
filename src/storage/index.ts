/**
 * Storage module re-exports
 */

export { TargetStore } from './target.js';
export * from './upsert.js';
