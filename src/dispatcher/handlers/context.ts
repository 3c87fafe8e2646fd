/**
 * context commands
 */

import { BROADCAST_TARGET, formatMessage } from '../../context/index.js';
import type { ContextMessage } from '../../context/index.js';
import type { AgentIdentity } from '../../identity/index.js';
import { optionalArg, ownAgent, requiredArg } from '../args.js';
import type { ArgValues, DispatcherDeps, HandlerMap } from '../types.js';

function printDocument(owner: AgentIdentity, messages: ContextMessage[], { output }: DispatcherDeps): void {
  if (messages.length === 0) {
    output.print(`No messages for ${owner.canonicalName}`);
    return;
  }

  output.print(`# Context of ${owner.canonicalName} (${messages.length} message${messages.length === 1 ? '' : 's'})`);
  for (const message of messages) {
    output.print('');
    output.print(formatMessage(message));
  }
}

/**
 * Agent named on the command line, or the own agent
 */
function targetOrOwn(args: ArgValues, deps: DispatcherDeps): AgentIdentity {
  const agent = optionalArg(args, 'agent');
  return agent === undefined ? ownAgent(deps) : deps.identities.normalize(agent);
}

export const contextHandlers: Pick<HandlerMap, 'context.read' | 'context.send' | 'context.clear'> = {
  async 'context.read'(args, deps) {
    const target = optionalArg(args, 'agent');

    if (target === undefined) {
      const own = ownAgent(deps);
      printDocument(own, await deps.contexts.readOwn(own), deps);
      return;
    }

    const owner = deps.identities.normalize(target);
    // Without an own agent the caller is an operator reading the document directly
    const messages = deps.config.agent
      ? await deps.contexts.readOther(ownAgent(deps), owner)
      : await deps.contexts.readOwn(owner);
    printDocument(owner, messages, deps);
  },

  async 'context.send'(args, deps) {
    const sender = ownAgent(deps);
    const to = requiredArg(args, 'agent');
    const body = requiredArg(args, 'message');

    if (to.toLowerCase() === BROADCAST_TARGET) {
      const messages = await deps.contexts.broadcast(sender, body);
      const names = messages.map(message => message.to.canonicalName);
      deps.output.print(`Sent to ${names.length} agents: ${names.join(', ')}`);
      return;
    }

    const message = await deps.contexts.send(sender, to, body);
    deps.output.print(`Sent to ${message.to.canonicalName}`);
  },

  async 'context.clear'(args, deps) {
    const target = targetOrOwn(args, deps);
    const removed = await deps.contexts.clear(target);
    deps.output.print(`Cleared ${removed} message${removed === 1 ? '' : 's'} from ${target.canonicalName}`);
  },
};
