/**
 * The fixed command table
 */

import { CommandRegistry } from './registry.js';
import type { ArgSpec, CommandDefinition } from './registry.js';

const AGENT_ARG: ArgSpec = {
  name: 'agent',
  kind: 'positional',
  required: true,
  description: 'Agent alias (cl1, cl2, ai1, ai2, ...)',
};

const OPTIONAL_AGENT_ARG: ArgSpec = {
  name: 'agent',
  kind: 'positional',
  description: 'Agent alias; defaults to your own agent',
};

const NAME_FLAG: ArgSpec = {
  name: 'name',
  kind: 'flag',
  short: 'n',
  description: 'Session name',
};

const ID_ARG: ArgSpec = {
  name: 'id',
  kind: 'positional',
  required: true,
  description: 'Session id',
};

const NOTE_REST: ArgSpec = {
  name: 'note',
  kind: 'rest',
  description: 'Free-form note stored in the session metadata',
};

export const COMMAND_TABLE = [
  {
    id: 'help',
    path: [{ name: 'help', aliases: ['h'] }],
    args: [{ name: 'topic', kind: 'positional', description: 'Command family or exit-codes' }],
    summary: 'Show usage',
  },
  {
    id: 'version',
    path: ['version'],
    summary: 'Show version',
  },
  {
    id: 'config',
    path: [{ name: 'config', minPrefixLen: 4 }],
    summary: 'Show the effective configuration',
  },
  {
    id: 'agents',
    path: ['agents'],
    summary: 'List known agents and their aliases',
  },
  {
    id: 'session.start',
    path: ['session', 'start'],
    args: [AGENT_ARG, NAME_FLAG],
    summary: 'Start a session (or resume a saved one with the same name)',
  },
  {
    id: 'session.save',
    path: ['session', 'save'],
    args: [AGENT_ARG, NAME_FLAG, NOTE_REST],
    summary: "Save the agent's active (or named) session",
  },
  {
    id: 'session.archive',
    path: ['session', { name: 'archive', aliases: ['end'] }],
    args: [AGENT_ARG, NAME_FLAG],
    summary: "Archive the agent's active (or named) session",
  },
  {
    id: 'session.management.list',
    path: ['session', 'management', { name: 'list', aliases: ['ls'] }],
    args: [
      { name: 'agent', kind: 'positional', description: 'Only sessions of this agent' },
      { name: 'status', kind: 'flag', short: 's', description: 'active, saved or archived' },
    ],
    summary: 'List sessions, most recently updated first',
  },
  {
    id: 'session.management.show',
    path: ['session', 'management', 'show'],
    args: [ID_ARG],
    summary: 'Show one session record',
  },
  {
    id: 'session.management.history',
    path: ['session', 'management', { name: 'history', aliases: ['log'] }],
    args: [ID_ARG],
    summary: 'Show the lifecycle history of a session',
  },
  {
    id: 'session.management.save',
    path: ['session', 'management', 'save'],
    args: [ID_ARG, NOTE_REST],
    summary: 'Save a session by id',
  },
  {
    id: 'session.management.archive',
    path: ['session', 'management', 'archive'],
    args: [ID_ARG],
    summary: 'Archive a session by id',
  },
  {
    id: 'context.read',
    path: [{ name: 'context', minPrefixLen: 4 }],
    args: [OPTIONAL_AGENT_ARG],
    summary: "Read your own context, or another agent's",
  },
  {
    id: 'context.send',
    path: ['context', 'to'],
    args: [
      { name: 'agent', kind: 'positional', required: true, description: 'Recipient alias, or all' },
      { name: 'message', kind: 'rest', required: true, description: 'Message text after --' },
    ],
    summary: "Append a message to another agent's context",
  },
  {
    id: 'context.clear',
    path: ['context', 'clear'],
    args: [OPTIONAL_AGENT_ARG],
    summary: 'Empty a context document',
  },
] as const satisfies readonly CommandDefinition[];

export type CommandId = (typeof COMMAND_TABLE)[number]['id'];

/**
 * Build the registry for the fixed table
 */
export function createCommandRegistry(): CommandRegistry<CommandId> {
  return new CommandRegistry<CommandId>(COMMAND_TABLE);
}
