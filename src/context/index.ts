/**
 * Context router
 * Each agent owns one append-only context document, `context/<Agent>.jsonl`.
 * Other agents write into it; only the owner (or an operator) reads it.
 */

import { join } from 'path';
import { z } from 'zod';
import {
  CohortError,
  InvalidArgumentError,
  StoreCorruptionError,
  formatIssues,
} from '../errors/index.js';
import type { AgentIdentity, IdentityNormalizer } from '../identity/index.js';
import type { SessionStore } from '../session/index.js';
import { FileRecordStore } from '../store/index.js';
import type { RecordLockConfig, RecordStore } from '../store/index.js';
import { generateId, systemClock } from '../utils/index.js';
import type { Clock } from '../utils/index.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

const MessageIdentitySchema = z.object({
  rawAlias: z.string(),
  canonicalName: z.string().min(1),
  shortAlias: z.string().min(1),
  role: z.string().optional(),
});

export const ContextMessageSchema = z.object({
  id: z.string().min(1),
  from: MessageIdentitySchema,
  to: MessageIdentitySchema,
  body: z.string().min(1),
  timestamp: z.string().datetime(),
});

/**
 * One entry of a context document
 */
export type ContextMessage = z.infer<typeof ContextMessageSchema>;

/** Recipient alias that addresses every other agent */
export const BROADCAST_TARGET = 'all';

export interface ContextRouterOptions {
  records: RecordStore;
  identities: IdentityNormalizer;
  sessions: SessionStore;
  now?: Clock;
  logger?: Logger;
}

/**
 * Context router
 */
export class ContextRouter {
  private readonly records: RecordStore;
  private readonly identities: IdentityNormalizer;
  private readonly sessions: SessionStore;
  private readonly now: Clock;
  private readonly logger: Logger;

  constructor(options: ContextRouterOptions) {
    this.records = options.records;
    this.identities = options.identities;
    this.sessions = options.sessions;
    this.now = options.now ?? systemClock;
    this.logger = options.logger ?? createLogger({ module: 'context-router' });
  }

  /**
   * Messages addressed to an agent, oldest first
   */
  async readOwn(agent: string | AgentIdentity): Promise<ContextMessage[]> {
    const identity = this.identities.resolve(agent);
    return this.load(identity.canonicalName);
  }

  /**
   * Read another agent's document. The requester must be a known agent.
   */
  async readOther(
    requester: string | AgentIdentity,
    target: string | AgentIdentity
  ): Promise<ContextMessage[]> {
    const reader = this.identities.resolve(requester);
    const owner = this.identities.resolve(target);
    this.logger.debug({ reader: reader.canonicalName, owner: owner.canonicalName }, 'Reading foreign context');
    return this.load(owner.canonicalName);
  }

  /**
   * Append a message to the recipient's document.
   * The sender's own document is never written.
   */
  async send(
    from: string | AgentIdentity,
    to: string | AgentIdentity,
    body: string
  ): Promise<ContextMessage> {
    const sender = this.identities.resolve(from);
    const recipient = this.identities.resolve(to);
    if (recipient.canonicalName === sender.canonicalName) {
      throw new InvalidArgumentError(`${sender.canonicalName} cannot send context to itself`, {
        agent: sender.canonicalName,
      });
    }
    const text = requireBody(body);

    const message = await this.deliver(sender, recipient, text);
    await this.recordActivity(sender, recipient.canonicalName, message.timestamp);
    return message;
  }

  /**
   * Send the same message to every agent except the sender
   */
  async broadcast(from: string | AgentIdentity, body: string): Promise<ContextMessage[]> {
    const sender = this.identities.resolve(from);
    const text = requireBody(body);

    const messages: ContextMessage[] = [];
    for (const recipient of this.identities.all()) {
      if (recipient.canonicalName === sender.canonicalName) continue;
      messages.push(await this.deliver(sender, recipient, text));
    }

    const last = messages[messages.length - 1];
    if (last) {
      await this.recordActivity(sender, BROADCAST_TARGET, last.timestamp);
    }
    return messages;
  }

  /**
   * Replace an agent's document with an empty one
   * @returns number of messages removed
   */
  async clear(agent: string | AgentIdentity): Promise<number> {
    const identity = this.identities.resolve(agent);
    const key = identity.canonicalName;

    return this.records.withLock(key, async () => {
      const existing = await this.records.read(key);
      if (existing === null) {
        return 0;
      }
      const removed = parseDocument(key, existing).length;
      await this.records.write(key, '');
      this.logger.info({ agent: key, removed }, 'Context cleared');
      return removed;
    });
  }

  /**
   * updatedAt of the agent's most recently updated session
   */
  async lastActive(agent: string | AgentIdentity): Promise<string | null> {
    const [latest] = await this.sessions.list({ agent });
    return latest?.updatedAt ?? null;
  }

  private async deliver(
    sender: AgentIdentity,
    recipient: AgentIdentity,
    body: string
  ): Promise<ContextMessage> {
    const key = recipient.canonicalName;
    const now = this.now();
    const message: ContextMessage = {
      id: generateId('msg', now),
      from: sender,
      to: recipient,
      body,
      timestamp: now.toISOString(),
    };

    await this.records.withLock(key, async () => {
      const existing = (await this.records.read(key)) ?? '';
      // Validate before rewriting so a damaged document is not extended
      parseDocument(key, existing);
      const prefix = existing.length > 0 && !existing.endsWith('\n') ? `${existing}\n` : existing;
      await this.records.write(key, `${prefix}${JSON.stringify(message)}\n`);
    });

    this.logger.info({ from: sender.canonicalName, to: key, messageId: message.id }, 'Context message delivered');
    return message;
  }

  private async recordActivity(sender: AgentIdentity, target: string, at: string): Promise<void> {
    const active = await this.sessions.findActive(sender);
    if (!active) return;

    try {
      await this.sessions.touch(active.id, { lastContextTo: target, lastContextAt: at });
    } catch (err) {
      // Message is already delivered
      if (!(err instanceof CohortError)) throw err;
      this.logger.warn({ sessionId: active.id, err }, 'Could not record context activity');
    }
  }

  private async load(key: string): Promise<ContextMessage[]> {
    const content = await this.records.read(key);
    return content === null ? [] : parseDocument(key, content);
  }
}

function requireBody(body: string): string {
  if (!body.trim()) {
    throw new InvalidArgumentError('Message body is empty', {});
  }
  return body;
}

/**
 * Parse a JSONL context document
 * @throws StoreCorruptionError naming the first bad line
 */
export function parseDocument(key: string, content: string): ContextMessage[] {
  const messages: ContextMessage[] = [];
  const lines = content.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]?.trim();
    if (!line) continue;

    let data: unknown;
    try {
      data = JSON.parse(line);
    } catch (err) {
      throw new StoreCorruptionError(key, [`line ${i + 1}: ${err instanceof Error ? err.message : String(err)}`]);
    }

    const result = ContextMessageSchema.safeParse(data);
    if (!result.success) {
      throw new StoreCorruptionError(
        key,
        formatIssues(result.error.issues).map(problem => `line ${i + 1}: ${problem}`)
      );
    }
    messages.push(result.data);
  }

  return messages;
}

/**
 * Format a message for display
 */
export function formatMessage(message: ContextMessage): string {
  const lines: string[] = [];

  lines.push(`**${message.from.shortAlias} (${message.from.canonicalName})** ${message.timestamp}`);
  for (const line of message.body.split('\n')) {
    lines.push(`  ${line}`);
  }

  return lines.join('\n');
}

/**
 * Context router backed by `<dataDir>/context/*.jsonl`
 */
export function createFileContextRouter(options: {
  dataDir: string;
  identities: IdentityNormalizer;
  sessions: SessionStore;
  lock?: Partial<RecordLockConfig>;
  now?: Clock;
  logger?: Logger;
}): ContextRouter {
  return new ContextRouter({
    records: new FileRecordStore({
      dir: getContextDir(options.dataDir),
      extension: '.jsonl',
      lock: options.lock,
      logger: options.logger,
    }),
    identities: options.identities,
    sessions: options.sessions,
    now: options.now,
    logger: options.logger,
  });
}

/**
 * Get context documents directory
 */
export function getContextDir(dataDir: string): string {
  return join(dataDir, 'context');
}
