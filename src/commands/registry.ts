/**
 * Command registry
 * Immutable tree of canonical command paths, built once from a fixed table.
 */

import { RegistryError } from '../errors/index.js';

/** Shortest prefix a segment may be typed as, unless overridden */
export const DEFAULT_MIN_PREFIX_LEN = 2;

/**
 * Argument kinds
 * - positional: filled in order from bare tokens
 * - flag: `-x=value` or `--name=value`
 * - rest: everything after a literal `--`, joined with spaces
 */
export type ArgKind = 'positional' | 'flag' | 'rest';

export interface ArgSpec {
  readonly name: string;
  readonly kind: ArgKind;
  readonly required?: boolean;
  /** Single-letter flag form, e.g. `n` for `-n=value` */
  readonly short?: string;
  readonly description: string;
}

export interface SegmentOptions {
  readonly name: string;
  readonly minPrefixLen?: number;
  /** Exact-match alternatives; may be one character long */
  readonly aliases?: readonly string[];
}

export type SegmentDefinition = string | SegmentOptions;

/**
 * Table entry as written by hand
 */
export interface CommandDefinition<Id extends string = string> {
  readonly id: Id;
  readonly path: readonly SegmentDefinition[];
  readonly args?: readonly ArgSpec[];
  readonly summary: string;
}

/**
 * Normalized command, as exposed by the registry
 */
export interface CommandSpec<Id extends string = string> {
  readonly id: Id;
  readonly path: readonly string[];
  readonly minPrefixLen: readonly number[];
  readonly aliases: readonly (readonly string[])[];
  readonly argSpec: readonly ArgSpec[];
  readonly summary: string;
}

export interface CommandNode<Id extends string = string> {
  readonly name: string;
  readonly path: readonly string[];
  readonly minPrefixLen: number;
  readonly aliases: readonly string[];
  readonly children: ReadonlyMap<string, CommandNode<Id>>;
  readonly spec?: CommandSpec<Id>;
}

interface MutableNode<Id extends string> {
  name: string;
  path: string[];
  minPrefixLen: number;
  aliases: string[];
  explicit: boolean;
  children: Map<string, MutableNode<Id>>;
  spec?: CommandSpec<Id>;
}

const SEGMENT_PATTERN = /^[a-z][a-z0-9-]*$/;
const ALIAS_PATTERN = /^[a-z0-9?][a-z0-9-]*$/;
const ARG_NAME_PATTERN = /^[a-z][a-zA-Z0-9]*$/;

function segmentOptions(segment: SegmentDefinition): SegmentOptions {
  return typeof segment === 'string' ? { name: segment } : segment;
}

function sameOptions<Id extends string>(node: MutableNode<Id>, options: SegmentOptions): boolean {
  const aliases = options.aliases ?? [];
  return (
    node.minPrefixLen === (options.minPrefixLen ?? DEFAULT_MIN_PREFIX_LEN) &&
    node.aliases.length === aliases.length &&
    node.aliases.every((alias, i) => alias === aliases[i])
  );
}

/**
 * Command registry
 *
 * Construction validates the whole table and throws RegistryError on the
 * first violation, so a bad table never reaches a query.
 */
export class CommandRegistry<Id extends string = string> {
  private readonly tree: MutableNode<Id>;
  private readonly specs: CommandSpec<Id>[] = [];
  private readonly byPath = new Map<string, CommandSpec<Id>>();
  private readonly pending = new Map<string, { definition: CommandDefinition<Id>; path: string[] }>();

  constructor(definitions: readonly CommandDefinition<Id>[]) {
    this.tree = {
      name: '',
      path: [],
      minPrefixLen: 0,
      aliases: [],
      explicit: true,
      children: new Map(),
    };

    for (const definition of definitions) {
      this.register(definition);
    }

    this.assertUnambiguous(this.tree);
    this.finalize();
  }

  /**
   * Root of the command tree (no name, no spec)
   */
  get root(): CommandNode<Id> {
    return this.tree;
  }

  /**
   * Find a command by its exact canonical path
   */
  lookup(path: readonly string[]): CommandSpec<Id> | undefined {
    return this.byPath.get(path.map(segment => segment.toLowerCase()).join(' '));
  }

  /**
   * All commands in table order
   */
  all(): readonly CommandSpec<Id>[] {
    return this.specs;
  }

  /**
   * Tree node for a canonical path (commands and intermediate groups)
   */
  node(path: readonly string[]): CommandNode<Id> | undefined {
    let current: CommandNode<Id> | undefined = this.tree;
    for (const segment of path) {
      current = current.children.get(segment.toLowerCase());
      if (!current) return undefined;
    }
    return current;
  }

  private register(definition: CommandDefinition<Id>): void {
    if (definition.path.length === 0) {
      throw new RegistryError(`Command '${definition.id}' has an empty path`, { id: definition.id });
    }

    let node = this.tree;
    const path: string[] = [];

    for (const segment of definition.path) {
      const options = segmentOptions(segment);
      this.assertSegment(definition.id, options);
      path.push(options.name);

      let child = node.children.get(options.name);
      if (!child) {
        child = {
          name: options.name,
          path: [...path],
          minPrefixLen: options.minPrefixLen ?? DEFAULT_MIN_PREFIX_LEN,
          aliases: [...(options.aliases ?? [])],
          explicit: typeof segment !== 'string',
          children: new Map(),
        };
        node.children.set(options.name, child);
      } else if (typeof segment !== 'string') {
        if (child.explicit && !sameOptions(child, options)) {
          throw new RegistryError(
            `Segment '${path.join(' ')}' is declared with conflicting options`,
            { id: definition.id, path: [...path] }
          );
        }
        child.minPrefixLen = options.minPrefixLen ?? DEFAULT_MIN_PREFIX_LEN;
        child.aliases = [...(options.aliases ?? [])];
        child.explicit = true;
      }

      node = child;
    }

    const key = path.join(' ');
    if (this.pending.has(key) || [...this.pending.values()].some(p => p.definition.id === definition.id)) {
      throw new RegistryError(`Command '${key}' (${definition.id}) is registered twice`, {
        id: definition.id,
        path,
      });
    }

    this.assertArgs(definition.id, definition.args ?? []);
    this.pending.set(key, { definition, path });
  }

  /**
   * Second pass: segment options are final once every definition is in
   */
  private finalize(): void {
    for (const [key, { definition, path }] of this.pending) {
      const nodes = this.nodesAlong(path);
      const spec: CommandSpec<Id> = {
        id: definition.id,
        path,
        minPrefixLen: nodes.map(n => n.minPrefixLen),
        aliases: nodes.map(n => [...n.aliases]),
        argSpec: definition.args ?? [],
        summary: definition.summary,
      };
      const node = nodes[nodes.length - 1];
      if (node) {
        node.spec = spec;
      }
      this.specs.push(spec);
      this.byPath.set(key, spec);
    }
    this.pending.clear();
  }

  private nodesAlong(path: readonly string[]): MutableNode<Id>[] {
    const nodes: MutableNode<Id>[] = [];
    let current = this.tree;
    for (const segment of path) {
      const next = current.children.get(segment);
      if (!next) break;
      nodes.push(next);
      current = next;
    }
    return nodes;
  }

  private assertSegment(id: string, options: SegmentOptions): void {
    if (!SEGMENT_PATTERN.test(options.name)) {
      throw new RegistryError(`Command '${id}': segment '${options.name}' must be a lowercase word`, { id });
    }

    const minLen = options.minPrefixLen ?? DEFAULT_MIN_PREFIX_LEN;
    if (!Number.isInteger(minLen) || minLen < DEFAULT_MIN_PREFIX_LEN || minLen > Math.max(options.name.length, DEFAULT_MIN_PREFIX_LEN)) {
      throw new RegistryError(
        `Command '${id}': minimum prefix ${minLen} is invalid for '${options.name}'`,
        { id, segment: options.name }
      );
    }

    for (const alias of options.aliases ?? []) {
      if (!ALIAS_PATTERN.test(alias)) {
        throw new RegistryError(`Command '${id}': alias '${alias}' must be lowercase`, { id, alias });
      }
    }
  }

  private assertArgs(id: string, args: readonly ArgSpec[]): void {
    const names = new Set<string>();
    const shorts = new Set<string>();
    let rest = 0;
    let optionalPositionalSeen = false;

    for (const arg of args) {
      if (!ARG_NAME_PATTERN.test(arg.name) || names.has(arg.name)) {
        throw new RegistryError(`Command '${id}': argument name '${arg.name}' is invalid or repeated`, { id });
      }
      names.add(arg.name);

      if (arg.kind === 'flag') {
        if (arg.short !== undefined) {
          if (arg.short.length !== 1 || shorts.has(arg.short)) {
            throw new RegistryError(`Command '${id}': flag letter '${arg.short}' is invalid or repeated`, { id });
          }
          shorts.add(arg.short);
        }
      } else if (arg.kind === 'rest') {
        rest++;
      } else if (arg.required) {
        if (optionalPositionalSeen) {
          throw new RegistryError(`Command '${id}': required '${arg.name}' follows an optional positional`, { id });
        }
      } else {
        optionalPositionalSeen = true;
      }
    }

    if (rest > 1) {
      throw new RegistryError(`Command '${id}' declares more than one rest argument`, { id });
    }
  }

  /**
   * Siblings must stay distinguishable by their minimum prefixes and aliases
   */
  private assertUnambiguous(node: MutableNode<Id>): void {
    const siblings = [...node.children.values()];

    for (const a of siblings) {
      const prefix = a.name.slice(0, a.minPrefixLen);
      for (const b of siblings) {
        if (a === b) continue;
        if (b.name.startsWith(prefix)) {
          throw new RegistryError(
            `Minimum prefix '${prefix}' of '${[...a.path].join(' ')}' also matches '${[...b.path].join(' ')}'`,
            { path: a.path, other: b.path }
          );
        }
        for (const alias of a.aliases) {
          if (alias === b.name || b.aliases.includes(alias)) {
            throw new RegistryError(
              `Alias '${alias}' of '${a.path.join(' ')}' collides with '${b.path.join(' ')}'`,
              { path: a.path, other: b.path, alias }
            );
          }
        }
      }
    }

    for (const child of siblings) {
      this.assertUnambiguous(child);
    }
  }
}
