/**
 * Store layer re-exports
 */

export * from './lock.js';
export * from './record-store.js';
