/**
 * cohort - shared sessions and context messages for collaborating coding agents
 */

export * from './config/index.js';
export * from './errors/index.js';
export * from './commands/registry.js';
export * from './commands/resolver.js';
export * from './commands/table.js';
export * from './identity/index.js';
export * from './store/index.js';
export * from './session/index.js';
export * from './context/index.js';
export * from './dispatcher/index.js';
export { createProgram, runCli } from './cli/index.js';
export { version } from './version.js';
