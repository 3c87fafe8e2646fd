/**
 * Argument access helpers for handlers
 */

import { InvalidArgumentError } from '../errors/index.js';
import type { AgentIdentity } from '../identity/index.js';
import type { ArgValues, DispatcherDeps } from './types.js';

export function optionalArg(args: ArgValues, name: string): string | undefined {
  return Object.hasOwn(args, name) ? args[name] : undefined;
}

export function requiredArg(args: ArgValues, name: string): string {
  const value = optionalArg(args, name);
  if (value === undefined) {
    throw new InvalidArgumentError(`Missing <${name}>`, { argument: name });
  }
  return value;
}

/**
 * The agent running the command, from --agent or COHORT_AGENT
 */
export function ownAgent(deps: DispatcherDeps): AgentIdentity {
  if (!deps.config.agent) {
    throw new InvalidArgumentError(
      'No own agent set; pass --agent <alias> or set COHORT_AGENT',
      { setting: 'agent' }
    );
  }
  return deps.identities.normalize(deps.config.agent);
}

/**
 * Metadata patch carrying the free-form note, if one was given
 */
export function noteMetadata(args: ArgValues): Record<string, string> {
  const note = optionalArg(args, 'note');
  return note === undefined ? {} : { note };
}
