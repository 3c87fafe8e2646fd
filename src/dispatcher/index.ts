/**
 * Command dispatcher
 * Resolves typed tokens, runs the matching handler and turns every failure
 * into a message plus a stable exit code.
 */

import { ConfigError } from '../config/index.js';
import type { Config } from '../config/index.js';
import { AbbreviationResolver, expansionOf, formatUsage, matchSegment, wasAbbreviated } from '../commands/resolver.js';
import { createCommandRegistry } from '../commands/table.js';
import type { CommandId } from '../commands/table.js';
import type { CommandNode, CommandRegistry } from '../commands/registry.js';
import { createFileContextRouter } from '../context/index.js';
import type { ContextRouter } from '../context/index.js';
import {
  AmbiguityError,
  CohortError,
  EXIT_CODES,
  EXIT_SUCCESS,
  EXIT_UNEXPECTED,
  IncompleteCommandError,
  RegistryError,
} from '../errors/index.js';
import { IdentityNormalizer, loadIdentityTable } from '../identity/index.js';
import { createFileSessionStore } from '../session/index.js';
import type { SessionStore } from '../session/index.js';
import type { Clock } from '../utils/index.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { contextHandlers } from './handlers/context.js';
import { generalHandlers } from './handlers/general.js';
import { sessionHandlers } from './handlers/session.js';
import { renderOverview } from './help.js';
import type { DispatcherDeps, HandlerMap, Output } from './types.js';

export * from './types.js';
export { renderExitCodes, renderOverview, renderTopic } from './help.js';

export const HANDLERS: HandlerMap = {
  ...generalHandlers,
  ...sessionHandlers,
  ...contextHandlers,
};

export interface Dispatcher {
  dispatch(tokens: readonly string[]): Promise<number>;
}

/**
 * Exit code for any thrown value
 */
export function exitCodeFor(err: unknown): number {
  if (err instanceof CohortError) return err.exitCode;
  if (err instanceof ConfigError) return EXIT_CODES.CONFIG_INVALID;
  return EXIT_UNEXPECTED;
}

function pathOf(err: CohortError): readonly string[] | undefined {
  const path = err.details.path;
  if (Array.isArray(path) && path.every((segment): segment is string => typeof segment === 'string')) {
    return path;
  }
  return undefined;
}

/**
 * Follow-up advice printed under an error message
 */
export function hintFor<Id extends string>(err: CohortError, registry: CommandRegistry<Id>): string | undefined {
  switch (err.code) {
    case 'UNKNOWN_COMMAND':
      return "Run 'cohort help' to see available commands";
    case 'AMBIGUOUS_COMMAND':
      return err instanceof AmbiguityError ? `Type more letters of '${err.token}' to pick one` : undefined;
    case 'INCOMPLETE_COMMAND': {
      const family = err instanceof IncompleteCommandError ? err.path[0] : undefined;
      return family ? `Run 'cohort help ${family}' for its subcommands` : "Run 'cohort help' to see available commands";
    }
    case 'TOO_MANY_ARGUMENTS':
    case 'INVALID_ARGUMENT': {
      const path = pathOf(err);
      const spec = path ? registry.lookup(path) : undefined;
      return spec ? `Usage: cohort ${formatUsage(spec)}` : undefined;
    }
    case 'DUPLICATE_SESSION':
      return "Pick another name with -n=<name>, or see 'cohort session management list'";
    case 'SESSION_NOT_FOUND':
      return "Run 'cohort session management list' to see session ids";
    case 'LOCK_CONTENTION':
      return 'Another cohort process holds the record; retry shortly';
    case 'STORE_CORRUPTION':
      return 'Inspect or remove the damaged file in the data directory';
    default:
      return undefined;
  }
}

/**
 * Print an error and return its exit code
 */
export function reportError<Id extends string>(
  err: unknown,
  output: Output,
  registry?: CommandRegistry<Id>,
  logger?: Logger
): number {
  if (err instanceof CohortError) {
    output.warn(`Error: ${err.message}`);
    const hint = registry ? hintFor(err, registry) : undefined;
    if (hint) output.warn(`Hint: ${hint}`);
  } else if (err instanceof ConfigError) {
    output.warn(`Error: ${err.message}`);
  } else {
    (logger ?? createLogger({ module: 'dispatcher' })).error({ err }, 'Unexpected failure');
    output.warn(`Error: ${err instanceof Error ? err.message : String(err)}`);
  }
  return exitCodeFor(err);
}

/**
 * Create a dispatcher over the given services
 */
export function createDispatcher(deps: DispatcherDeps): Dispatcher {
  const resolver = new AbbreviationResolver<CommandId>(deps.registry);
  const logger = deps.logger ?? createLogger({ module: 'dispatcher' });

  return {
    async dispatch(tokens) {
      try {
        if (tokens.length === 0) {
          for (const line of renderOverview(deps.registry)) deps.output.print(line);
          return EXIT_SUCCESS;
        }

        const command = resolver.resolve(tokens);
        if (wasAbbreviated(command)) {
          deps.output.warn(`Expanded: ${tokens.join(' ')} → ${expansionOf(command)}`);
        }

        logger.debug({ command: command.id, args: command.args }, 'Dispatching command');
        await HANDLERS[command.id](command.args, { ...deps, logger });
        return EXIT_SUCCESS;
      } catch (err) {
        return reportError(err, deps.output, deps.registry, logger);
      }
    },
  };
}

/**
 * Reject agent aliases that a command taking `<agent>` would read as one of
 * its subcommands (`context cl` must not become `context clear`)
 */
export function assertAgentsReachable<Id extends string>(
  registry: CommandRegistry<Id>,
  identities: IdentityNormalizer
): void {
  const visit = (node: CommandNode<Id>): void => {
    const firstPositional = node.spec?.argSpec.find(arg => arg.kind === 'positional');
    if (firstPositional?.name === 'agent' && node.children.size > 0) {
      for (const alias of identities.lookupKeys()) {
        const shadowedBy = shadowingCommand(node, alias);
        if (shadowedBy !== undefined) {
          throw new RegistryError(
            `Agent alias '${alias}' would be read as '${shadowedBy}'`,
            { alias, command: shadowedBy }
          );
        }
      }
    }
    for (const child of node.children.values()) {
      visit(child);
    }
  };
  visit(registry.root);
}

function shadowingCommand<Id extends string>(node: CommandNode<Id>, alias: string): string | undefined {
  try {
    return matchSegment(node, alias, node.path.length)?.path.join(' ');
  } catch (err) {
    if (err instanceof AmbiguityError) return err.candidates.join(' or ');
    throw err;
  }
}

export interface Services {
  registry: CommandRegistry<CommandId>;
  identities: IdentityNormalizer;
  sessions: SessionStore;
  contexts: ContextRouter;
}

/**
 * Build the file-backed services for a configuration
 */
export async function createServices(config: Config, options: { now?: Clock } = {}): Promise<Services> {
  const identities = new IdentityNormalizer(await loadIdentityTable(config.identitiesPath));
  const registry = createCommandRegistry();
  assertAgentsReachable(registry, identities);
  const lock = {
    acquireTimeoutMs: config.lockAcquireTimeoutMs,
    staleLockMs: config.staleLockMs,
    pollIntervalMs: config.lockPollIntervalMs,
  };

  const sessions = createFileSessionStore({ dataDir: config.dataDir, identities, lock, now: options.now });
  const contexts = createFileContextRouter({ dataDir: config.dataDir, identities, sessions, lock, now: options.now });

  return { registry, identities, sessions, contexts };
}
