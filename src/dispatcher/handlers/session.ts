/**
 * session commands
 */

import { InvalidArgumentError, SessionNotFoundError } from '../../errors/index.js';
import { SESSION_STATUSES, buildSessionId, isSessionStatus } from '../../session/index.js';
import type { Session, SessionEvent, SessionStatus } from '../../session/index.js';
import { noteMetadata, optionalArg, requiredArg } from '../args.js';
import type { ArgValues, DispatcherDeps, HandlerMap } from '../types.js';

/**
 * The session a per-agent command acts on: the one named with -n, or the
 * agent's active session
 */
async function targetSession(args: ArgValues, { identities, sessions }: DispatcherDeps): Promise<Session> {
  const identity = identities.normalize(requiredArg(args, 'agent'));
  const name = optionalArg(args, 'name');

  if (name !== undefined) {
    const id = buildSessionId(identity, name);
    const session = await sessions.get(id);
    if (!session) {
      throw new SessionNotFoundError(id);
    }
    return session;
  }

  const active = await sessions.findActive(identity);
  if (!active) {
    throw new SessionNotFoundError(`active session of ${identity.canonicalName}`);
  }
  return active;
}

async function sessionById(args: ArgValues, { sessions }: DispatcherDeps): Promise<Session> {
  const id = requiredArg(args, 'id');
  const session = await sessions.get(id);
  if (!session) {
    throw new SessionNotFoundError(id);
  }
  return session;
}

function parseStatus(raw: string | undefined): SessionStatus | undefined {
  if (raw === undefined) return undefined;
  const status = raw.toLowerCase();
  if (!isSessionStatus(status)) {
    throw new InvalidArgumentError(
      `Unknown status '${raw}', expected one of: ${SESSION_STATUSES.join(', ')}`,
      { status: raw }
    );
  }
  return status;
}

export function formatSessionLine(session: Session): string {
  return [session.id, session.status, session.agent.canonicalName, session.updatedAt].join('  ');
}

export function formatEventLine(event: SessionEvent): string {
  const line = `${event.at}  ${event.type}`;
  return event.message === undefined ? line : `${line}  ${event.message}`;
}

export const sessionHandlers: Pick<
  HandlerMap,
  | 'session.start'
  | 'session.save'
  | 'session.archive'
  | 'session.management.list'
  | 'session.management.show'
  | 'session.management.history'
  | 'session.management.save'
  | 'session.management.archive'
> = {
  async 'session.start'(args, { sessions, output }) {
    const { session, resumed, autoSaved } = await sessions.start(
      requiredArg(args, 'agent'),
      optionalArg(args, 'name')
    );
    for (const id of autoSaved) {
      output.print(`Saved previous session ${id}`);
    }
    output.print(`${resumed ? 'Resumed' : 'Started'} session ${session.id} for ${session.agent.canonicalName}`);
  },

  async 'session.save'(args, deps) {
    const target = await targetSession(args, deps);
    const saved = await deps.sessions.save(target.id, noteMetadata(args), optionalArg(args, 'note'));
    deps.output.print(`Saved session ${saved.id}`);
  },

  async 'session.archive'(args, deps) {
    const target = await targetSession(args, deps);
    const archived = await deps.sessions.archive(target.id);
    deps.output.print(`Archived session ${archived.id}`);
  },

  async 'session.management.list'(args, { sessions, output }) {
    const list = await sessions.list({
      agent: optionalArg(args, 'agent'),
      status: parseStatus(optionalArg(args, 'status')),
    });
    if (list.length === 0) {
      output.print('No sessions found');
      return;
    }
    for (const session of list) {
      output.print(formatSessionLine(session));
    }
  },

  async 'session.management.show'(args, deps) {
    const session = await sessionById(args, deps);
    deps.output.print(JSON.stringify(session, null, 2));
  },

  async 'session.management.history'(args, deps) {
    const session = await sessionById(args, deps);
    deps.output.print(`# History of ${session.id} (${session.status})`);
    for (const event of session.events) {
      deps.output.print(formatEventLine(event));
    }
  },

  async 'session.management.save'(args, deps) {
    const session = await sessionById(args, deps);
    const saved = await deps.sessions.save(session.id, noteMetadata(args), optionalArg(args, 'note'));
    deps.output.print(`Saved session ${saved.id}`);
  },

  async 'session.management.archive'(args, deps) {
    const session = await sessionById(args, deps);
    const archived = await deps.sessions.archive(session.id);
    deps.output.print(`Archived session ${archived.id}`);
  },
};
