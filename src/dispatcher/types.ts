/**
 * Dispatcher types
 */

import type { Config } from '../config/index.js';
import type { CommandRegistry } from '../commands/registry.js';
import type { CommandId } from '../commands/table.js';
import type { ContextRouter } from '../context/index.js';
import type { IdentityNormalizer } from '../identity/index.js';
import type { SessionStore } from '../session/index.js';
import type { Logger } from '../utils/logger.js';

/**
 * Where command output goes. `print` is the command's result (stdout);
 * `warn` carries expansions, errors and hints (stderr).
 */
export interface Output {
  print(line: string): void;
  warn(line: string): void;
}

export const consoleOutput: Output = {
  print: line => console.log(line),
  warn: line => console.error(line),
};

/**
 * Everything a handler may use
 */
export interface DispatcherDeps {
  registry: CommandRegistry<CommandId>;
  identities: IdentityNormalizer;
  sessions: SessionStore;
  contexts: ContextRouter;
  config: Config;
  output: Output;
  logger?: Logger;
}

/**
 * Parsed argument values, keyed by argument name
 */
export type ArgValues = Readonly<Record<string, string>>;

export type Handler = (args: ArgValues, deps: DispatcherDeps) => Promise<void>;

/**
 * One handler per command id; a missing id does not compile
 */
export type HandlerMap = { readonly [K in CommandId]: Handler };
