/**
 * Session store
 * One JSON record per session under `<dataDir>/sessions/`, rewritten in full
 * on every change while holding that record's lock.
 */

import { join } from 'path';
import { z } from 'zod';
import {
  DuplicateSessionError,
  InvalidArgumentError,
  InvalidTransitionError,
  SessionNotFoundError,
  StoreCorruptionError,
  formatIssues,
} from '../errors/index.js';
import type { AgentIdentity, IdentityNormalizer } from '../identity/index.js';
import { FileRecordStore } from '../store/index.js';
import type { RecordLockConfig, RecordStore } from '../store/index.js';
import { formatCompactStamp, slugify, systemClock } from '../utils/index.js';
import type { Clock } from '../utils/index.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

/**
 * Session status
 *
 * active -> saved -> archived, active -> archived, saved -> active.
 * Nothing leaves archived.
 */
export const SESSION_STATUSES = ['active', 'saved', 'archived'] as const;

export type SessionStatus = (typeof SESSION_STATUSES)[number];

export const SESSION_RECORD_VERSION = 1;

/**
 * Lifecycle events kept in a session's history, oldest first
 */
export const SESSION_EVENT_TYPES = ['created', 'saved', 'auto-saved', 'resumed', 'archived'] as const;

export type SessionEventType = (typeof SESSION_EVENT_TYPES)[number];

const AgentIdentitySchema = z.object({
  rawAlias: z.string(),
  canonicalName: z.string().min(1),
  shortAlias: z.string().min(1),
  role: z.string().optional(),
});

const SessionEventSchema = z.object({
  type: z.enum(SESSION_EVENT_TYPES),
  at: z.string().datetime(),
  message: z.string().optional(),
});

export const SessionRecordSchema = z.object({
  version: z.literal(SESSION_RECORD_VERSION),
  id: z.string().min(1),
  name: z.string().min(1),
  agent: AgentIdentitySchema,
  status: z.enum(SESSION_STATUSES),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  metadata: z.record(z.string()),
  // Records written before the history existed have none
  events: z.array(SessionEventSchema).default([]),
});

export interface SessionEvent {
  type: SessionEventType;
  at: string;
  message?: string;
}

/**
 * Session record
 */
export interface Session {
  id: string;
  name: string;
  agent: AgentIdentity;
  status: SessionStatus;
  createdAt: string;
  updatedAt: string;
  metadata: Record<string, string>;
  /** Append-only lifecycle history */
  events: SessionEvent[];
}

/**
 * Filter for list()
 */
export interface SessionFilter {
  agent?: string | AgentIdentity;
  status?: SessionStatus;
}

/**
 * Result of start()
 */
export interface StartResult {
  session: Session;
  /** A saved session with the same id was reactivated */
  resumed: boolean;
  /** Other sessions of the agent moved from active to saved */
  autoSaved: string[];
}

export interface SessionStoreOptions {
  records: RecordStore;
  identities: IdentityNormalizer;
  now?: Clock;
  logger?: Logger;
}

export function isSessionStatus(value: string): value is SessionStatus {
  return SESSION_STATUSES.some(status => status === value);
}

/**
 * Session id for an agent and a session name: `cl2-refactor`
 */
export function buildSessionId(agent: AgentIdentity, name: string): string {
  const slug = slugify(name);
  if (!slug) {
    throw new InvalidArgumentError(`Session name '${name}' has no usable characters`, { name });
  }
  return `${agent.shortAlias.toLowerCase()}-${slug}`;
}

/**
 * Session store
 */
export class SessionStore {
  private readonly records: RecordStore;
  private readonly identities: IdentityNormalizer;
  private readonly now: Clock;
  private readonly logger: Logger;

  constructor(options: SessionStoreOptions) {
    this.records = options.records;
    this.identities = options.identities;
    this.now = options.now ?? systemClock;
    this.logger = options.logger ?? createLogger({ module: 'session-store' });
  }

  /**
   * Create a new active session
   * @throws DuplicateSessionError if the derived id exists; the existing
   *   record is left untouched
   */
  async create(agent: string | AgentIdentity, explicitName?: string): Promise<Session> {
    const identity = this.identities.resolve(agent);
    const now = this.now();
    const name = explicitName ?? formatCompactStamp(now);
    const id = buildSessionId(identity, name);

    return this.records.withLock(id, async () => {
      if ((await this.records.read(id)) !== null) {
        throw new DuplicateSessionError(id);
      }

      const timestamp = now.toISOString();
      const session: Session = {
        id,
        name,
        agent: identity,
        status: 'active',
        createdAt: timestamp,
        updatedAt: timestamp,
        metadata: {},
        events: [{ type: 'created', at: timestamp }],
      };

      await this.persist(session);
      this.logger.info({ sessionId: id, agent: identity.canonicalName }, 'Session created');
      return session;
    });
  }

  /**
   * Merge metadata and mark the session saved; `message` goes to the history
   */
  async save(
    sessionId: string,
    metadataPatch: Record<string, string> = {},
    message?: string
  ): Promise<Session> {
    return this.markSaved(sessionId, metadataPatch, eventOf('saved', message));
  }

  /**
   * Merge metadata and bump updatedAt without changing status
   */
  async touch(sessionId: string, metadataPatch: Record<string, string> = {}): Promise<Session> {
    return this.mutate(sessionId, session => {
      if (session.status === 'archived') {
        throw new InvalidTransitionError(sessionId, session.status, 'updated');
      }
      return {
        ...session,
        metadata: { ...session.metadata, ...metadataPatch },
      };
    });
  }

  /**
   * Reactivate a saved session
   */
  async resume(sessionId: string): Promise<Session> {
    return this.mutate(sessionId, session => {
      if (session.status === 'archived') {
        throw new InvalidTransitionError(sessionId, session.status, 'active');
      }
      return { ...session, status: 'active' };
    }, eventOf('resumed'));
  }

  /**
   * Archive a session; archiving an archived session changes nothing
   */
  async archive(sessionId: string): Promise<Session> {
    return this.records.withLock(sessionId, async () => {
      const session = await this.load(sessionId);
      if (!session) {
        throw new SessionNotFoundError(sessionId);
      }
      if (session.status === 'archived') {
        return session;
      }

      const updatedAt = this.now().toISOString();
      const archived: Session = {
        ...session,
        status: 'archived',
        updatedAt,
        events: [...session.events, { type: 'archived', at: updatedAt }],
      };
      await this.persist(archived);
      this.logger.info({ sessionId }, 'Session archived');
      return archived;
    });
  }

  /**
   * Get session by ID
   */
  async get(sessionId: string): Promise<Session | null> {
    return this.load(sessionId);
  }

  /**
   * List sessions, most recently updated first.
   * Unreadable records are logged and left out.
   */
  async list(filter: SessionFilter = {}): Promise<Session[]> {
    const agentName = filter.agent !== undefined
      ? this.identities.resolve(filter.agent).canonicalName
      : undefined;

    const sessions: Session[] = [];
    for (const key of await this.records.keys()) {
      let session: Session | null;
      try {
        session = await this.load(key);
      } catch (err) {
        if (err instanceof StoreCorruptionError) {
          this.logger.warn({ sessionId: key, problems: err.problems }, 'Skipping unreadable session record');
          continue;
        }
        throw err;
      }

      if (!session) continue;
      if (agentName && session.agent.canonicalName !== agentName) continue;
      if (filter.status && session.status !== filter.status) continue;
      sessions.push(session);
    }

    return sessions.sort((a, b) => {
      const byTime = new Date(b.updatedAt).getTime() - new Date(a.updatedAt).getTime();
      return byTime !== 0 ? byTime : a.id.localeCompare(b.id);
    });
  }

  /**
   * Most recently updated active session of an agent
   */
  async findActive(agent: string | AgentIdentity): Promise<Session | null> {
    const [session] = await this.list({ agent, status: 'active' });
    return session ?? null;
  }

  /**
   * Start work for an agent: create, or resume a saved session of the same
   * name, then move the agent's other active sessions to saved
   */
  async start(agent: string | AgentIdentity, explicitName?: string): Promise<StartResult> {
    const identity = this.identities.resolve(agent);

    let session: Session;
    let resumed = false;
    try {
      session = await this.create(identity, explicitName);
    } catch (err) {
      if (!(err instanceof DuplicateSessionError)) throw err;

      const existing = await this.get(err.sessionId);
      if (!existing || existing.status !== 'saved') throw err;

      session = await this.resume(existing.id);
      resumed = true;
    }

    const autoSaved: string[] = [];
    for (const other of await this.list({ agent: identity, status: 'active' })) {
      if (other.id === session.id) continue;
      await this.markSaved(
        other.id,
        { autoSavedBy: session.id },
        eventOf('auto-saved', `superseded by ${session.id}`)
      );
      autoSaved.push(other.id);
    }

    return { session, resumed, autoSaved };
  }

  private async markSaved(
    sessionId: string,
    metadataPatch: Record<string, string>,
    event: Omit<SessionEvent, 'at'>
  ): Promise<Session> {
    return this.mutate(sessionId, session => {
      if (session.status === 'archived') {
        throw new InvalidTransitionError(sessionId, session.status, 'saved');
      }
      return {
        ...session,
        status: 'saved',
        metadata: { ...session.metadata, ...metadataPatch },
      };
    }, event);
  }

  private async mutate(
    sessionId: string,
    change: (session: Session) => Session,
    event?: Omit<SessionEvent, 'at'>
  ): Promise<Session> {
    return this.records.withLock(sessionId, async () => {
      const session = await this.load(sessionId);
      if (!session) {
        throw new SessionNotFoundError(sessionId);
      }

      const changed = change(session);
      const updatedAt = this.now().toISOString();
      const updated: Session = {
        ...changed,
        id: session.id,
        createdAt: session.createdAt,
        updatedAt,
        events: event ? [...session.events, { ...event, at: updatedAt }] : session.events,
      };
      await this.persist(updated);
      this.logger.debug({ sessionId, status: updated.status }, 'Session updated');
      return updated;
    });
  }

  private async load(sessionId: string): Promise<Session | null> {
    const content = await this.records.read(sessionId);
    if (content === null) {
      return null;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (err) {
      throw new StoreCorruptionError(sessionId, [err instanceof Error ? err.message : String(err)]);
    }

    const result = SessionRecordSchema.safeParse(data);
    if (!result.success) {
      throw new StoreCorruptionError(sessionId, formatIssues(result.error.issues));
    }
    if (result.data.id !== sessionId) {
      throw new StoreCorruptionError(sessionId, [`record claims id '${result.data.id}'`]);
    }

    const { version: _version, ...session } = result.data;
    return session;
  }

  private async persist(session: Session): Promise<void> {
    const record = { version: SESSION_RECORD_VERSION, ...session };
    await this.records.write(session.id, JSON.stringify(record, null, 2) + '\n');
  }
}

function eventOf(type: SessionEventType, message?: string): Omit<SessionEvent, 'at'> {
  return message === undefined ? { type } : { type, message };
}

/**
 * Session store backed by `<dataDir>/sessions/*.json`
 */
export function createFileSessionStore(options: {
  dataDir: string;
  identities: IdentityNormalizer;
  lock?: Partial<RecordLockConfig>;
  now?: Clock;
  logger?: Logger;
}): SessionStore {
  return new SessionStore({
    records: new FileRecordStore({
      dir: getSessionsDir(options.dataDir),
      extension: '.json',
      lock: options.lock,
      logger: options.logger,
    }),
    identities: options.identities,
    now: options.now,
    logger: options.logger,
  });
}

/**
 * Get sessions directory
 */
export function getSessionsDir(dataDir: string): string {
  return join(dataDir, 'sessions');
}
