/**
 * Abbreviation resolver
 * Turns typed tokens such as `se st cl2 -n=refactor` into one canonical command.
 *
 * Matching walks the command tree one token per depth:
 *   1. an exact canonical name wins outright, then an exact alias
 *   2. otherwise every sibling starting with the token (2+ chars) is a candidate
 *   3. one candidate descends, several fail with AmbiguityError
 *   4. none ends the path if the walked path is a command (the token becomes
 *      an argument), and fails with UnknownCommandError otherwise
 * There is no lookahead: each depth is decided on its own token.
 */

import {
  AmbiguityError,
  IncompleteCommandError,
  InvalidArgumentError,
  TooManyArgumentsError,
  UnknownCommandError,
} from '../errors/index.js';
import type { CommandNode, CommandRegistry, CommandSpec } from './registry.js';

/** Tokens shorter than this only match exact aliases */
export const MIN_TOKEN_LEN = 2;

/** Separates command tokens from a free-form trailing value */
export const REST_SEPARATOR = '--';

const FLAG_PATTERN = /^(-{1,2})([A-Za-z][A-Za-z0-9-]*)(?:=([\s\S]*))?$/;

export interface ResolvedCommand<Id extends string = string> {
  readonly id: Id;
  readonly spec: CommandSpec<Id>;
  /** Canonical segments */
  readonly path: readonly string[];
  /** Argument name to raw value, only for arguments that were given */
  readonly args: Readonly<Record<string, string>>;
  /** Tokens as typed, for messages */
  readonly rawInput: readonly string[];
}

/**
 * Match one token against the children of a node.
 * Returns undefined when nothing matches; throws on ambiguity.
 */
export function matchSegment<Id extends string>(
  node: CommandNode<Id>,
  token: string,
  depth: number
): CommandNode<Id> | undefined {
  const lower = token.toLowerCase();

  const exact = node.children.get(lower);
  if (exact) return exact;

  for (const child of node.children.values()) {
    if (child.aliases.includes(lower)) return child;
  }

  if (lower.length < MIN_TOKEN_LEN) return undefined;

  const candidates = [...node.children.values()].filter(child => child.name.startsWith(lower));

  if (candidates.length > 1) {
    throw new AmbiguityError(
      token,
      depth,
      candidates.map(child => child.path.join(' '))
    );
  }

  return candidates[0];
}

function splitRest(tokens: readonly string[]): { head: readonly string[]; rest?: string } {
  const index = tokens.indexOf(REST_SEPARATOR);
  if (index === -1) {
    return { head: tokens };
  }
  return {
    head: tokens.slice(0, index),
    rest: tokens.slice(index + 1).join(' '),
  };
}

/**
 * Bind argument tokens to a command's argSpec
 */
export function parseArguments(
  spec: CommandSpec,
  tokens: readonly string[],
  rest?: string
): Record<string, string> {
  const args: Record<string, string> = {};
  const positionals = spec.argSpec.filter(arg => arg.kind === 'positional');
  const extra: string[] = [];
  let nextPositional = 0;

  for (const token of tokens) {
    const flag = FLAG_PATTERN.exec(token);
    if (flag) {
      const dashes = flag[1];
      const key = flag[2];
      const value: string | undefined = flag[3];
      const arg = spec.argSpec.find(candidate =>
        candidate.kind === 'flag' &&
        (dashes === '-' ? candidate.short === key : candidate.name === key)
      );
      if (!arg) {
        throw new InvalidArgumentError(
          `Unknown option '${token}' for '${spec.path.join(' ')}'`,
          { path: spec.path, token }
        );
      }
      if (value === undefined) {
        throw new InvalidArgumentError(
          `Option '${token}' needs a value: ${token}=<${arg.name}>`,
          { path: spec.path, token }
        );
      }
      args[arg.name] = value;
      continue;
    }

    const positional = positionals[nextPositional];
    if (positional) {
      args[positional.name] = token;
      nextPositional++;
    } else {
      extra.push(token);
    }
  }

  if (rest !== undefined) {
    const restArg = spec.argSpec.find(arg => arg.kind === 'rest');
    if (restArg) {
      if (rest.length > 0) {
        args[restArg.name] = rest;
      }
    } else {
      extra.push(REST_SEPARATOR, ...rest.split(' ').filter(Boolean));
    }
  }

  if (extra.length > 0) {
    throw new TooManyArgumentsError(spec.path, extra);
  }

  for (const arg of spec.argSpec) {
    if (arg.required && args[arg.name] === undefined) {
      const form = arg.kind === 'rest' ? `-- <${arg.name}>` : `<${arg.name}>`;
      throw new InvalidArgumentError(
        `'${spec.path.join(' ')}' requires ${form}`,
        { path: spec.path, argument: arg.name }
      );
    }
  }

  return args;
}

/**
 * Abbreviation resolver over a command registry
 */
export class AbbreviationResolver<Id extends string = string> {
  constructor(private readonly registry: CommandRegistry<Id>) {}

  /**
   * Resolve typed tokens to a canonical command
   * @throws UnknownCommandError, AmbiguityError, IncompleteCommandError,
   *   TooManyArgumentsError or InvalidArgumentError
   */
  resolve(tokens: readonly string[]): ResolvedCommand<Id> {
    const { head, rest } = splitRest(tokens);

    let node = this.registry.root;
    let consumed = 0;

    while (consumed < head.length && node.children.size > 0) {
      const token = head[consumed];
      if (token === undefined || token.startsWith('-')) break;

      const match = matchSegment(node, token, consumed);
      if (!match) {
        if (node.spec) break;
        throw new UnknownCommandError(token, consumed, node.path);
      }

      node = match;
      consumed++;
    }

    const spec = node.spec;
    if (!spec) {
      throw new IncompleteCommandError(
        node.path,
        [...node.children.values()].map(child => child.name)
      );
    }

    return {
      id: spec.id,
      spec,
      path: spec.path,
      args: parseArguments(spec, head.slice(consumed), rest),
      rawInput: [...tokens],
    };
  }
}

/**
 * Canonical rendering of a resolved command, e.g. `session start cl2 -n=x`
 */
export function expansionOf(resolved: ResolvedCommand): string {
  const parts: string[] = [...resolved.path];

  for (const arg of resolved.spec.argSpec) {
    const value = resolved.args[arg.name];
    if (value === undefined || arg.kind !== 'positional') continue;
    parts.push(value);
  }
  for (const arg of resolved.spec.argSpec) {
    const value = resolved.args[arg.name];
    if (value === undefined || arg.kind !== 'flag') continue;
    parts.push(arg.short ? `-${arg.short}=${value}` : `--${arg.name}=${value}`);
  }
  for (const arg of resolved.spec.argSpec) {
    const value = resolved.args[arg.name];
    if (value === undefined || arg.kind !== 'rest') continue;
    parts.push(REST_SEPARATOR, value);
  }

  return parts.join(' ');
}

/**
 * True when any path segment was typed as an abbreviation or alias
 */
export function wasAbbreviated(resolved: ResolvedCommand): boolean {
  return resolved.path.some((segment, i) => resolved.rawInput[i]?.toLowerCase() !== segment);
}

/**
 * Usage line showing each segment's minimum prefix, e.g.
 * `se[ssion] st[art] <agent> [-n=<name>]`
 */
export function formatUsage(spec: CommandSpec): string {
  const segments = spec.path.map((segment, i) => {
    const len = spec.minPrefixLen[i] ?? segment.length;
    const head = segment.slice(0, len);
    const tail = segment.slice(len);
    return tail ? `${head}[${tail}]` : head;
  });

  const args = spec.argSpec.map(arg => {
    switch (arg.kind) {
      case 'positional':
        return arg.required ? `<${arg.name}>` : `[${arg.name}]`;
      case 'flag': {
        const form = arg.short ? `-${arg.short}=<${arg.name}>` : `--${arg.name}=<${arg.name}>`;
        return arg.required ? form : `[${form}]`;
      }
      case 'rest':
        return arg.required ? `-- <${arg.name}>` : `[-- ${arg.name}]`;
    }
  });

  return [...segments, ...args].join(' ');
}
