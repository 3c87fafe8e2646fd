/**
 * Abbreviation resolver tests
 */

import { describe, it, expect } from 'vitest';
import {
  AmbiguityError,
  IncompleteCommandError,
  InvalidArgumentError,
  TooManyArgumentsError,
  UnknownCommandError,
} from '../errors/index.js';
import { AbbreviationResolver, expansionOf, formatUsage, wasAbbreviated } from './resolver.js';
import { createCommandRegistry } from './table.js';

const registry = createCommandRegistry();
const resolver = new AbbreviationResolver(registry);

function errorOf(tokens: string[]): unknown {
  try {
    resolver.resolve(tokens);
  } catch (err) {
    return err;
  }
  throw new Error(`'${tokens.join(' ')}' resolved`);
}

describe('AbbreviationResolver', () => {
  describe('full paths', () => {
    it('should resolve canonical paths in any case', () => {
      expect(resolver.resolve(['session', 'start', 'cl2']).id).toBe('session.start');
      expect(resolver.resolve(['SESSION', 'Start', 'cl2']).id).toBe('session.start');
      expect(resolver.resolve(['session', 'management', 'list']).id).toBe('session.management.list');
    });

    it('should keep argument values as typed', () => {
      const resolved = resolver.resolve(['session', 'start', 'CL2', '-n=Big Refactor']);

      expect(resolved.args).toEqual({ agent: 'CL2', name: 'Big Refactor' });
    });
  });

  describe('abbreviations', () => {
    it('should resolve minimum prefixes like the full words', () => {
      const full = resolver.resolve(['session', 'start', 'cl2', '-n=refactor']);
      const short = resolver.resolve(['se', 'st', 'cl2', '-n=refactor']);

      expect(short.id).toBe(full.id);
      expect(short.path).toEqual(full.path);
      expect(short.args).toEqual(full.args);
    });

    it('should accept any prefix between the minimum and the full word', () => {
      expect(resolver.resolve(['sess', 'mana', 'sh', 'cl2-x']).id).toBe('session.management.show');
      expect(resolver.resolve(['conf']).id).toBe('config');
      expect(resolver.resolve(['cont']).id).toBe('context.read');
    });

    it('should fail with both candidates for an ambiguous prefix', () => {
      const err = errorOf(['co']);

      expect(err).toBeInstanceOf(AmbiguityError);
      if (err instanceof AmbiguityError) {
        expect(err.candidates).toEqual(['config', 'context']);
        expect(err.depth).toBe(0);
        expect(err.message).toBe("'co' is ambiguous, it matches: config, context");
        expect(err.exitCode).toBe(3);
      }
    });

    it('should not prefix-match single letters', () => {
      expect(errorOf(['session', 's', 'cl2'])).toBeInstanceOf(UnknownCommandError);
      expect(errorOf(['session', 'management', 's', 'x'])).toBeInstanceOf(UnknownCommandError);
    });

    it('should match one-letter aliases exactly', () => {
      expect(resolver.resolve(['h']).id).toBe('help');
      expect(resolver.resolve(['se', 'end', 'cl2']).id).toBe('session.archive');
      expect(resolver.resolve(['se', 'ma', 'ls']).id).toBe('session.management.list');
    });

    it('should resolve two-letter words exactly', () => {
      expect(resolver.resolve(['context', 'to', 'ai1', '--', 'hi']).id).toBe('context.send');
    });
  });

  describe('commands that are also groups', () => {
    it('should treat a non-matching token as the first argument', () => {
      const resolved = resolver.resolve(['cont', 'cl2']);

      expect(resolved.id).toBe('context.read');
      expect(resolved.args).toEqual({ agent: 'cl2' });
    });

    it('should descend when the token names a subcommand', () => {
      expect(resolver.resolve(['cont', 'cl']).id).toBe('context.clear');
    });

    it('should resolve the bare group to its own command', () => {
      expect(resolver.resolve(['context']).args).toEqual({});
    });
  });

  describe('errors', () => {
    it('should reject unknown words with their position', () => {
      const err = errorOf(['session', 'launch', 'cl2']);

      expect(err).toBeInstanceOf(UnknownCommandError);
      expect(err instanceof Error ? err.message : '').toBe("Unknown command 'launch' at position 2 after 'session'");
    });

    it('should reject a group without a subcommand', () => {
      const err = errorOf(['session']);

      expect(err).toBeInstanceOf(IncompleteCommandError);
      expect(err instanceof Error ? err.message : '').toBe("'session' needs one of: start, save, archive, management");
    });

    it('should reject a group followed only by flags', () => {
      expect(errorOf(['session', 'management', '-s=active'])).toBeInstanceOf(IncompleteCommandError);
    });

    it('should reject extra positionals', () => {
      const err = errorOf(['se', 'st', 'cl2', 'extra']);

      expect(err).toBeInstanceOf(TooManyArgumentsError);
      expect(err instanceof Error ? err.message : '').toBe("Too many arguments for 'session start': extra");
    });

    it('should reject a rest value on a command without one', () => {
      expect(errorOf(['version', '--', 'now'])).toBeInstanceOf(TooManyArgumentsError);
    });

    it('should reject missing required arguments', () => {
      const missingAgent = errorOf(['se', 'st']);
      expect(missingAgent).toBeInstanceOf(InvalidArgumentError);
      expect(missingAgent instanceof Error ? missingAgent.message : '').toBe("'session start' requires <agent>");

      const missingMessage = errorOf(['cont', 'to', 'ai1']);
      expect(missingMessage instanceof Error ? missingMessage.message : '').toBe("'context to' requires -- <message>");
    });

    it('should reject unknown flags and flags without a value', () => {
      expect(errorOf(['se', 'st', 'cl2', '-x=1'])).toBeInstanceOf(InvalidArgumentError);

      const bare = errorOf(['se', 'st', 'cl2', '-n']);
      expect(bare instanceof Error ? bare.message : '').toBe("Option '-n' needs a value: -n=<name>");
    });
  });

  describe('rest values', () => {
    it('should join everything after -- with spaces', () => {
      const resolved = resolver.resolve(['cont', 'to', 'ai1', '--', 'run', 'the', '-n=tests']);

      expect(resolved.args).toEqual({ agent: 'ai1', message: 'run the -n=tests' });
    });

    it('should accept long flag names', () => {
      expect(resolver.resolve(['se', 'st', 'cl2', '--name=x']).args).toEqual({ agent: 'cl2', name: 'x' });
    });
  });
});

describe('expansionOf', () => {
  it('should render the canonical command line', () => {
    const resolved = resolver.resolve(['se', 'sa', 'cl2', '-n=refactor', '--', 'half', 'done']);

    expect(expansionOf(resolved)).toBe('session save cl2 -n=refactor -- half done');
  });
});

describe('wasAbbreviated', () => {
  it('should ignore case-only differences', () => {
    expect(wasAbbreviated(resolver.resolve(['Session', 'START', 'cl2']))).toBe(false);
  });

  it('should flag prefixes and aliases', () => {
    expect(wasAbbreviated(resolver.resolve(['se', 'start', 'cl2']))).toBe(true);
    expect(wasAbbreviated(resolver.resolve(['h']))).toBe(true);
  });
});

describe('formatUsage', () => {
  function usageOf(path: string[]): string {
    const spec = registry.lookup(path);
    if (!spec) throw new Error(`no command ${path.join(' ')}`);
    return formatUsage(spec);
  }

  it('should mark the optional letters of each segment', () => {
    expect(usageOf(['session', 'start'])).toBe('se[ssion] st[art] <agent> [-n=<name>]');
    expect(usageOf(['context', 'to'])).toBe('cont[ext] to <agent> -- <message>');
    expect(usageOf(['session', 'save'])).toBe('se[ssion] sa[ve] <agent> [-n=<name>] [-- note]');
    expect(usageOf(['config'])).toBe('conf[ig]');
  });
});
