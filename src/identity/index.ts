/**
 * Agent identities
 * Maps typed aliases (`cl2`, `Claude-2`, `CL2`) to one canonical identity.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigError } from '../config/index.js';
import { RegistryError, StoreCorruptionError, UnknownIdentityError, formatIssues } from '../errors/index.js';

/**
 * Resolved agent identity
 */
export interface AgentIdentity {
  /** As typed, e.g. `cl2` */
  rawAlias: string;
  /** e.g. `Claude-2` */
  canonicalName: string;
  /** e.g. `CL2` */
  shortAlias: string;
  role?: string;
}

/**
 * Canonical names double as context document names, so they stay within
 * letters, `-` and `_`, ending in the agent number
 */
const CANONICAL_NAME_PATTERN = /^[A-Za-z][A-Za-z_-]*\d+$/;
const CANONICAL_NAME_RULE = 'must be a name followed by a number, e.g. Claude-2, without spaces';

/**
 * Identity table entry
 */
export const IdentityEntrySchema = z.object({
  canonicalName: z.string().regex(CANONICAL_NAME_PATTERN, CANONICAL_NAME_RULE),
  aliases: z.array(z.string().min(1)).default([]),
  role: z.string().optional(),
});

export const IdentityTableSchema = z.object({
  agents: z.array(IdentityEntrySchema).min(1),
});

export type IdentityEntry = z.infer<typeof IdentityEntrySchema>;

export const DEFAULT_IDENTITIES: readonly IdentityEntry[] = [
  { canonicalName: 'Claude-1', aliases: ['cl1'], role: 'Legacy-Guardian' },
  { canonicalName: 'Claude-2', aliases: ['cl2'], role: 'Innovation-Driver' },
  { canonicalName: 'Aider-1', aliases: ['ai1'], role: 'Quality-Controller' },
  { canonicalName: 'Aider-2', aliases: ['ai2'], role: 'Assistant' },
];

/**
 * Derive the display alias: first two letters of the name plus its number,
 * uppercased (`Claude-2` -> `CL2`, `Aider-1` -> `AI1`)
 */
export function deriveShortAlias(canonicalName: string): string {
  const match = /^(.*?)[-_ ]?(\d+)$/.exec(canonicalName);
  if (!match) {
    throw new RegistryError(`Cannot derive a short alias from '${canonicalName}'`, { canonicalName });
  }
  const letters = (match[1] ?? '').replace(/[^A-Za-z]/g, '').slice(0, 2);
  if (letters.length < 2) {
    throw new RegistryError(`'${canonicalName}' needs at least two letters before its number`, { canonicalName });
  }
  return `${letters}${match[2] ?? ''}`.toUpperCase();
}

interface TableRow {
  canonicalName: string;
  shortAlias: string;
  role?: string;
  aliases: string[];
}

/**
 * Identity normalizer
 *
 * Built once from a table and read-only afterwards. Input matching is
 * case-insensitive; output keeps the table's casing.
 */
export class IdentityNormalizer {
  private readonly rows: TableRow[] = [];
  private readonly byKey = new Map<string, TableRow>();

  constructor(entries: readonly IdentityEntry[] = DEFAULT_IDENTITIES) {
    for (const entry of entries) {
      if (!CANONICAL_NAME_PATTERN.test(entry.canonicalName)) {
        throw new RegistryError(
          `Agent name '${entry.canonicalName}' ${CANONICAL_NAME_RULE}`,
          { canonicalName: entry.canonicalName }
        );
      }
      const row: TableRow = {
        canonicalName: entry.canonicalName,
        shortAlias: deriveShortAlias(entry.canonicalName),
        role: entry.role,
        aliases: [...entry.aliases],
      };

      for (const key of [row.canonicalName, row.shortAlias, ...row.aliases]) {
        const lower = key.toLowerCase();
        const existing = this.byKey.get(lower);
        if (existing && existing !== row) {
          throw new RegistryError(
            `Alias '${key}' of ${row.canonicalName} collides with ${existing.canonicalName}`,
            { alias: key, agent: row.canonicalName, other: existing.canonicalName }
          );
        }
        this.byKey.set(lower, row);
      }

      this.rows.push(row);
    }
  }

  /**
   * Resolve an alias to its identity
   * @throws UnknownIdentityError listing the known aliases
   */
  normalize(rawAlias: string): AgentIdentity {
    const row = this.byKey.get(rawAlias.trim().toLowerCase());
    if (!row) {
      throw new UnknownIdentityError(rawAlias, this.knownAliases());
    }
    return toIdentity(row, rawAlias);
  }

  /**
   * Normalize, passing identities through unchanged after re-validating them
   */
  resolve(agent: string | AgentIdentity): AgentIdentity {
    if (typeof agent === 'string') {
      return this.normalize(agent);
    }
    const identity = this.normalize(agent.canonicalName);
    return { ...identity, rawAlias: agent.rawAlias };
  }

  isKnown(rawAlias: string): boolean {
    return this.byKey.has(rawAlias.trim().toLowerCase());
  }

  /**
   * Every identity, in table order
   */
  all(): AgentIdentity[] {
    return this.rows.map(row => toIdentity(row, row.aliases[0] ?? row.shortAlias.toLowerCase()));
  }

  /**
   * Every string that normalizes to an identity, lowercased
   */
  lookupKeys(): string[] {
    return [...this.byKey.keys()];
  }

  /**
   * Typed aliases plus short forms, for error messages
   */
  knownAliases(): string[] {
    return this.rows.map(row => {
      const typed = row.aliases.length > 0 ? row.aliases.join('/') : row.shortAlias.toLowerCase();
      return `${typed} (${row.canonicalName})`;
    });
  }

  /**
   * Extra aliases of an identity, for listings
   */
  aliasesOf(canonicalName: string): string[] {
    const row = this.byKey.get(canonicalName.toLowerCase());
    return row ? [...row.aliases] : [];
  }
}

function toIdentity(row: TableRow, rawAlias: string): AgentIdentity {
  const identity: AgentIdentity = {
    rawAlias,
    canonicalName: row.canonicalName,
    shortAlias: row.shortAlias,
  };
  if (row.role !== undefined) {
    identity.role = row.role;
  }
  return identity;
}

/**
 * Load an identity table from a JSON file, or the built-in one
 * @throws ConfigError if the file is missing
 * @throws StoreCorruptionError if the file is not a valid table
 */
export async function loadIdentityTable(path?: string): Promise<IdentityEntry[]> {
  if (!path) {
    return [...DEFAULT_IDENTITIES];
  }

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigError(`Identity table not found: ${path}`);
    }
    throw err;
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    throw new StoreCorruptionError(path, [err instanceof Error ? err.message : String(err)]);
  }

  const result = IdentityTableSchema.safeParse(data);
  if (!result.success) {
    throw new StoreCorruptionError(path, formatIssues(result.error.issues));
  }
  return result.data.agents;
}
