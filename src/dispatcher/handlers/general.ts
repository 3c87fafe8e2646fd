/**
 * help, version, config, agents
 */

import { ConfigSchema } from '../../config/index.js';
import { version } from '../../version.js';
import { renderOverview, renderTopic } from '../help.js';
import { optionalArg } from '../args.js';
import type { HandlerMap } from '../types.js';

export const generalHandlers: Pick<HandlerMap, 'help' | 'version' | 'config' | 'agents'> = {
  async help(args, { registry, output }) {
    const topic = optionalArg(args, 'topic');
    const lines = topic === undefined ? renderOverview(registry) : renderTopic(registry, topic);
    for (const line of lines) output.print(line);
  },

  async version(_args, { output }) {
    output.print(`cohort ${version}`);
  },

  async config(_args, { config, output }) {
    const values = new Map<string, unknown>(Object.entries(config));
    for (const key of Object.keys(ConfigSchema.shape)) {
      const value = values.get(key);
      output.print(`${key}: ${value === undefined ? '(unset)' : String(value)}`);
    }
  },

  async agents(_args, { identities, contexts, output }) {
    for (const identity of identities.all()) {
      const lastActive = await contexts.lastActive(identity);
      const parts = [
        identity.shortAlias,
        identity.canonicalName,
        `(${identities.aliasesOf(identity.canonicalName).join(', ')})`,
        identity.role ?? '',
        `last active: ${lastActive ?? 'never'}`,
      ];
      output.print(parts.filter(part => part !== '' && part !== '()').join('  '));
    }
  },
};
