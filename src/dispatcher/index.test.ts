/**
 * Dispatcher tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { ConfigError, validateConfig } from '../config/index.js';
import { createCommandRegistry } from '../commands/table.js';
import { ContextRouter } from '../context/index.js';
import { IdentityNormalizer } from '../identity/index.js';
import { SessionStore } from '../session/index.js';
import { MemoryRecordStore } from '../store/index.js';
import { RegistryError } from '../errors/index.js';
import { assertAgentsReachable, createDispatcher, createServices, exitCodeFor, reportError } from './index.js';
import type { Output } from './index.js';

const NOW = '2026-10-19T12:00:00.000Z';

describe('createDispatcher', () => {
  let sessions: SessionStore;
  let contexts: ContextRouter;
  let lines: string[];
  let warnings: string[];

  const identities = new IdentityNormalizer();
  const registry = createCommandRegistry();
  const output: Output = {
    print: line => lines.push(line),
    warn: line => warnings.push(line),
  };

  beforeEach(() => {
    const now = () => new Date(NOW);
    sessions = new SessionStore({ records: new MemoryRecordStore(), identities, now });
    contexts = new ContextRouter({ records: new MemoryRecordStore(), identities, sessions, now });
    lines = [];
    warnings = [];
  });

  /**
   * Run one command line, optionally as an agent; output buffers start empty
   */
  async function run(tokens: string[], agent?: string): Promise<number> {
    lines = [];
    warnings = [];
    const dispatcher = createDispatcher({
      registry,
      identities,
      sessions,
      contexts,
      config: validateConfig({ agent }),
      output,
    });
    return dispatcher.dispatch(tokens);
  }

  describe('general commands', () => {
    it('should print the overview for empty input', async () => {
      expect(await run([])).toBe(0);
      expect(lines[0]).toBe('Usage: cohort [options] <command> [args]');
      const start = lines.find(line => line.startsWith('  se[ssion] st[art] <agent> [-n=<name>] '));
      expect(start?.endsWith('  Start a session (or resume a saved one with the same name)')).toBe(true);
    });

    it('should print the version', async () => {
      expect(await run(['ve'])).toBe(0);
      expect(lines).toEqual(['cohort 0.1.0']);
      expect(warnings).toEqual(['Expanded: ve → version']);
    });

    it('should print the exit code table', async () => {
      expect(await run(['help', 'exit-codes'])).toBe(0);
      expect(lines[0]).toBe('Exit codes:');
      expect(lines).toContain('   8  DUPLICATE_SESSION');
      expect(lines).toContain('  14  REGISTRY_INVALID');
    });

    it('should print help for one command family', async () => {
      expect(await run(['h', 'se'])).toBe(0);
      expect(lines[0]).toBe('se[ssion] st[art] <agent> [-n=<name>]');
      expect(lines[1]).toBe('    Start a session (or resume a saved one with the same name)');
    });

    it('should reject an unknown help topic', async () => {
      expect(await run(['help', 'zz'])).toBe(2);
      expect(warnings[0]).toBe("Error: Unknown command 'zz' at position 1");
    });

    it('should show the effective configuration', async () => {
      expect(await run(['config'], 'cl2')).toBe(0);
      expect(lines).toContain('dataDir: ./.cohort');
      expect(lines).toContain('agent: cl2');
      expect(lines).toContain('identitiesPath: (unset)');
      expect(lines).toContain('lockAcquireTimeoutMs: 2000');
    });

    it('should list agents with their last activity', async () => {
      await sessions.create('cl2', 'main');

      expect(await run(['agents'])).toBe(0);
      expect(lines).toEqual([
        'CL1  Claude-1  (cl1)  Legacy-Guardian  last active: never',
        `CL2  Claude-2  (cl2)  Innovation-Driver  last active: ${NOW}`,
        'AI1  Aider-1  (ai1)  Quality-Controller  last active: never',
        'AI2  Aider-2  (ai2)  Assistant  last active: never',
      ]);
    });
  });

  describe('session commands', () => {
    it('should echo the expansion of abbreviated input', async () => {
      expect(await run(['se', 'st', 'cl2', '-n=refactor'])).toBe(0);
      expect(warnings).toEqual(['Expanded: se st cl2 -n=refactor → session start cl2 -n=refactor']);
      expect(lines).toEqual(['Started session cl2-refactor for Claude-2']);
    });

    it('should not echo full commands', async () => {
      expect(await run(['session', 'start', 'cl2', '-n=refactor'])).toBe(0);
      expect(warnings).toEqual([]);
    });

    it('should report auto-saved sessions on start', async () => {
      await run(['session', 'start', 'cl2', '-n=a']);

      expect(await run(['session', 'start', 'cl2', '-n=b'])).toBe(0);
      expect(lines).toEqual(['Saved previous session cl2-a', 'Started session cl2-b for Claude-2']);
    });

    it('should map a duplicate start to its exit code', async () => {
      await run(['session', 'start', 'cl2', '-n=a']);

      expect(await run(['session', 'start', 'cl2', '-n=a'])).toBe(8);
      expect(warnings).toEqual([
        'Error: Session already exists: cl2-a',
        "Hint: Pick another name with -n=<name>, or see 'cohort session management list'",
      ]);
    });

    it("should save the agent's active session with a note", async () => {
      await run(['session', 'start', 'cl2', '-n=a']);

      expect(await run(['se', 'sa', 'cl2', '--', 'half', 'way'])).toBe(0);
      expect(lines).toEqual(['Saved session cl2-a']);
      expect((await sessions.get('cl2-a'))?.metadata).toEqual({ note: 'half way' });
    });

    it('should fail to save when the agent has no active session', async () => {
      expect(await run(['session', 'save', 'cl2'])).toBe(9);
      expect(warnings[0]).toBe('Error: Session not found: active session of Claude-2');
    });

    it('should archive a named session through the end alias', async () => {
      await run(['session', 'start', 'ai1', '-n=review']);

      expect(await run(['se', 'end', 'ai1', '-n=review'])).toBe(0);
      expect(lines).toEqual(['Archived session ai1-review']);
      expect((await sessions.get('ai1-review'))?.status).toBe('archived');
    });

    it('should list, show, save and archive by id', async () => {
      await run(['session', 'start', 'cl2', '-n=a']);

      expect(await run(['se', 'ma', 'ls'])).toBe(0);
      expect(lines).toEqual([`cl2-a  active  Claude-2  ${NOW}`]);

      expect(await run(['se', 'ma', 'show', 'cl2-a'])).toBe(0);
      expect(JSON.parse(lines.join('\n'))).toMatchObject({ id: 'cl2-a', status: 'active' });

      expect(await run(['se', 'ma', 'sa', 'cl2-a', '--', 'parked'])).toBe(0);
      expect(lines).toEqual(['Saved session cl2-a']);

      expect(await run(['se', 'ma', 'ar', 'cl2-a'])).toBe(0);
      expect(await run(['se', 'ma', 'ls', '-s=archived'])).toBe(0);
      expect(lines).toEqual([`cl2-a  archived  Claude-2  ${NOW}`]);
    });

    it('should print the lifecycle history of a session', async () => {
      await run(['session', 'start', 'cl2', '-n=a']);
      await run(['session', 'save', 'cl2', '--', 'half', 'way']);

      expect(await run(['se', 'ma', 'log', 'cl2-a'])).toBe(0);
      expect(lines).toEqual([
        '# History of cl2-a (saved)',
        `${NOW}  created`,
        `${NOW}  saved  half way`,
      ]);
    });

    it('should include the history in the shown record', async () => {
      await run(['session', 'start', 'cl2', '-n=a']);

      expect(await run(['session', 'management', 'show', 'cl2-a'])).toBe(0);
      expect(JSON.parse(lines.join('\n'))).toMatchObject({ events: [{ type: 'created', at: NOW }] });
    });

    it('should print a placeholder for an empty list', async () => {
      expect(await run(['session', 'management', 'list', 'ai2'])).toBe(0);
      expect(lines).toEqual(['No sessions found']);
    });

    it('should reject an unknown status filter', async () => {
      expect(await run(['session', 'management', 'list', '-s=done'])).toBe(6);
      expect(warnings).toEqual(["Error: Unknown status 'done', expected one of: active, saved, archived"]);
    });

    it('should reject transitions out of archived', async () => {
      await run(['session', 'start', 'cl2', '-n=a']);
      await run(['session', 'archive', 'cl2']);

      expect(await run(['session', 'management', 'save', 'cl2-a'])).toBe(12);
    });
  });

  describe('context commands', () => {
    it('should deliver and read back a message', async () => {
      expect(await run(['cont', 'to', 'ai1', '--', 'check', 'the', 'tests'], 'cl2')).toBe(0);
      expect(lines).toEqual(['Sent to Aider-1']);

      expect(await run(['context'], 'ai1')).toBe(0);
      expect(lines).toEqual([
        '# Context of Aider-1 (1 message)',
        '',
        `**CL2 (Claude-2)** ${NOW}\n  check the tests`,
      ]);

      expect(await run(['context'], 'cl2')).toBe(0);
      expect(lines).toEqual(['No messages for Claude-2']);
    });

    it('should broadcast to all other agents', async () => {
      expect(await run(['context', 'to', 'all', '--', 'freeze'], 'cl2')).toBe(0);
      expect(lines).toEqual(['Sent to 3 agents: Claude-1, Aider-1, Aider-2']);
    });

    it('should require an own agent to send', async () => {
      expect(await run(['context', 'to', 'ai1', '--', 'hi'])).toBe(6);
      expect(warnings[0]).toBe('Error: No own agent set; pass --agent <alias> or set COHORT_AGENT');
    });

    it("should read another agent's context as an operator", async () => {
      await contexts.send('ai1', 'cl2', 'reply');

      expect(await run(['cont', 'cl2'])).toBe(0);
      expect(lines[0]).toBe('# Context of Claude-2 (1 message)');
    });

    it('should clear the own context', async () => {
      await contexts.send('cl2', 'ai1', 'one');

      expect(await run(['context', 'clear'], 'ai1')).toBe(0);
      expect(lines).toEqual(['Cleared 1 message from Aider-1']);
      expect(await contexts.readOwn('ai1')).toEqual([]);
    });
  });

  describe('errors', () => {
    it('should report ambiguity with a hint', async () => {
      expect(await run(['co'])).toBe(3);
      expect(warnings).toEqual([
        "Error: 'co' is ambiguous, it matches: config, context",
        "Hint: Type more letters of 'co' to pick one",
      ]);
    });

    it('should report unknown agents', async () => {
      expect(await run(['se', 'st', 'cl9'])).toBe(7);
      expect(warnings[1]).toBe(
        "Error: Unknown agent 'cl9'. Known agents: cl1 (Claude-1), cl2 (Claude-2), ai1 (Aider-1), ai2 (Aider-2)"
      );
    });

    it('should point incomplete commands at their family help', async () => {
      expect(await run(['session'])).toBe(4);
      expect(warnings[1]).toBe("Hint: Run 'cohort help session' for its subcommands");
    });

    it('should show usage for extra arguments', async () => {
      expect(await run(['session', 'start', 'cl2', 'extra'])).toBe(5);
      expect(warnings).toEqual([
        "Error: Too many arguments for 'session start': extra",
        'Hint: Usage: cohort se[ssion] st[art] <agent> [-n=<name>]',
      ]);
    });
  });
});

describe('exitCodeFor', () => {
  it('should map configuration and unexpected errors', () => {
    expect(exitCodeFor(new ConfigError('bad'))).toBe(13);
    expect(exitCodeFor(new Error('boom'))).toBe(1);
    expect(exitCodeFor('thrown string')).toBe(1);
  });
});

describe('reportError', () => {
  it('should print unexpected errors and return 1', () => {
    const warnings: string[] = [];

    const code = reportError(new Error('boom'), { print: () => undefined, warn: line => warnings.push(line) });

    expect(code).toBe(1);
    expect(warnings).toEqual(['Error: boom']);
  });
});

describe('assertAgentsReachable', () => {
  const registry = createCommandRegistry();

  it('should accept the built-in agents', () => {
    expect(() => assertAgentsReachable(registry, new IdentityNormalizer())).not.toThrow();
  });

  it('should reject an alias that abbreviates a context subcommand', () => {
    const identities = new IdentityNormalizer([{ canonicalName: 'Claude-1', aliases: ['cl'] }]);

    expect(() => assertAgentsReachable(registry, identities)).toThrow("Agent alias 'cl' would be read as 'context clear'");
  });

  it('should reject an alias equal to a subcommand', () => {
    const identities = new IdentityNormalizer([{ canonicalName: 'Tool-1', aliases: ['to'] }]);

    expect(() => assertAgentsReachable(registry, identities)).toThrow(RegistryError);
  });

  it('should run when services are built from an identity file', async () => {
    const testDir = join(tmpdir(), `cohort-services-test-${Date.now()}-${Math.random().toString(16).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    const identitiesPath = join(testDir, 'agents.json');
    await writeFile(identitiesPath, JSON.stringify({ agents: [{ canonicalName: 'Claude-1', aliases: ['cl'] }] }));

    try {
      await expect(createServices(validateConfig({ dataDir: testDir, identitiesPath }))).rejects.toThrow(RegistryError);
    } finally {
      await rm(testDir, { recursive: true, force: true });
    }
  });
});
