/**
 * Help text
 */

import { matchSegment, formatUsage } from '../commands/resolver.js';
import type { CommandRegistry, CommandSpec } from '../commands/registry.js';
import { EXIT_CODES, EXIT_SUCCESS, EXIT_UNEXPECTED, UnknownCommandError } from '../errors/index.js';

export const EXIT_CODES_TOPIC = 'exit-codes';

function usageTable(specs: readonly CommandSpec[]): string[] {
  const rows = specs.map(spec => ({ usage: formatUsage(spec), summary: spec.summary }));
  const width = Math.max(...rows.map(row => row.usage.length)) + 2;
  return rows.map(row => `  ${row.usage.padEnd(width)}${row.summary}`);
}

/**
 * Overview of every command
 */
export function renderOverview<Id extends string>(registry: CommandRegistry<Id>): string[] {
  return [
    'Usage: cohort [options] <command> [args]',
    '',
    'Commands (bracketed letters may be left out):',
    ...usageTable(registry.all()),
    '',
    `Run 'cohort help <command>' for details or 'cohort help ${EXIT_CODES_TOPIC}' for exit codes.`,
  ];
}

/**
 * Exit code table
 */
export function renderExitCodes(): string[] {
  const lines = [
    'Exit codes:',
    `  ${String(EXIT_SUCCESS).padStart(2)}  success`,
    `  ${String(EXIT_UNEXPECTED).padStart(2)}  unexpected error`,
  ];
  for (const [code, exitCode] of Object.entries(EXIT_CODES)) {
    lines.push(`  ${String(exitCode).padStart(2)}  ${code}`);
  }
  return lines;
}

/**
 * Detailed help for one top-level command family, e.g. `help se`
 */
export function renderTopic<Id extends string>(registry: CommandRegistry<Id>, topic: string): string[] {
  if (topic.toLowerCase() === EXIT_CODES_TOPIC) {
    return renderExitCodes();
  }

  const family = matchSegment(registry.root, topic, 0);
  if (!family) {
    throw new UnknownCommandError(topic, 0);
  }

  const specs = registry.all().filter(spec => spec.path[0] === family.name);
  const lines: string[] = [];
  for (const spec of specs) {
    lines.push(formatUsage(spec));
    lines.push(`    ${spec.summary}`);
    for (const arg of spec.argSpec) {
      lines.push(`    ${arg.name.padEnd(10)}${arg.description}`);
    }
    const aliases = spec.aliases.flat();
    if (aliases.length > 0) {
      lines.push(`    aliases: ${aliases.join(', ')}`);
    }
    lines.push('');
  }
  return lines.slice(0, -1);
}
