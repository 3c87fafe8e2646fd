/**
 * Error taxonomy
 * Every failure the CLI can report maps to one code and one stable exit code.
 */

/**
 * Error codes
 */
export type CohortErrorCode =
  | 'UNKNOWN_COMMAND'
  | 'AMBIGUOUS_COMMAND'
  | 'INCOMPLETE_COMMAND'
  | 'TOO_MANY_ARGUMENTS'
  | 'INVALID_ARGUMENT'
  | 'UNKNOWN_IDENTITY'
  | 'DUPLICATE_SESSION'
  | 'SESSION_NOT_FOUND'
  | 'LOCK_CONTENTION'
  | 'STORE_CORRUPTION'
  | 'INVALID_TRANSITION'
  | 'CONFIG_INVALID'
  | 'REGISTRY_INVALID';

/**
 * Process exit codes, one per error code. 0 is success, 1 is reserved for
 * unexpected failures.
 */
export const EXIT_CODES: Readonly<Record<CohortErrorCode, number>> = {
  UNKNOWN_COMMAND: 2,
  AMBIGUOUS_COMMAND: 3,
  INCOMPLETE_COMMAND: 4,
  TOO_MANY_ARGUMENTS: 5,
  INVALID_ARGUMENT: 6,
  UNKNOWN_IDENTITY: 7,
  DUPLICATE_SESSION: 8,
  SESSION_NOT_FOUND: 9,
  LOCK_CONTENTION: 10,
  STORE_CORRUPTION: 11,
  INVALID_TRANSITION: 12,
  CONFIG_INVALID: 13,
  REGISTRY_INVALID: 14,
};

export const EXIT_SUCCESS = 0;
export const EXIT_UNEXPECTED = 1;

/**
 * Base class for all domain errors
 */
export class CohortError extends Error {
  constructor(
    public readonly code: CohortErrorCode,
    message: string,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'CohortError';
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }
}

export class UnknownCommandError extends CohortError {
  constructor(
    public readonly token: string,
    public readonly depth: number,
    public readonly parentPath: readonly string[] = []
  ) {
    const where = parentPath.length > 0 ? ` after '${parentPath.join(' ')}'` : '';
    super(
      'UNKNOWN_COMMAND',
      `Unknown command '${token}' at position ${depth + 1}${where}`,
      { token, depth, parentPath }
    );
    this.name = 'UnknownCommandError';
  }
}

export class AmbiguityError extends CohortError {
  constructor(
    public readonly token: string,
    public readonly depth: number,
    public readonly candidates: readonly string[]
  ) {
    super(
      'AMBIGUOUS_COMMAND',
      `'${token}' is ambiguous, it matches: ${candidates.join(', ')}`,
      { token, depth, candidates }
    );
    this.name = 'AmbiguityError';
  }
}

export class IncompleteCommandError extends CohortError {
  constructor(
    public readonly path: readonly string[],
    public readonly expected: readonly string[]
  ) {
    const prefix = path.length > 0 ? `'${path.join(' ')}' needs` : 'A command needs';
    super(
      'INCOMPLETE_COMMAND',
      `${prefix} one of: ${expected.join(', ')}`,
      { path, expected }
    );
    this.name = 'IncompleteCommandError';
  }
}

export class TooManyArgumentsError extends CohortError {
  constructor(
    public readonly path: readonly string[],
    public readonly extra: readonly string[]
  ) {
    super(
      'TOO_MANY_ARGUMENTS',
      `Too many arguments for '${path.join(' ')}': ${extra.join(' ')}`,
      { path, extra }
    );
    this.name = 'TooManyArgumentsError';
  }
}

export class InvalidArgumentError extends CohortError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('INVALID_ARGUMENT', message, details);
    this.name = 'InvalidArgumentError';
  }
}

export class UnknownIdentityError extends CohortError {
  constructor(
    public readonly alias: string,
    public readonly knownAliases: readonly string[]
  ) {
    super(
      'UNKNOWN_IDENTITY',
      `Unknown agent '${alias}'. Known agents: ${knownAliases.join(', ')}`,
      { alias, knownAliases }
    );
    this.name = 'UnknownIdentityError';
  }
}

export class DuplicateSessionError extends CohortError {
  constructor(public readonly sessionId: string) {
    super('DUPLICATE_SESSION', `Session already exists: ${sessionId}`, { sessionId });
    this.name = 'DuplicateSessionError';
  }
}

export class SessionNotFoundError extends CohortError {
  constructor(public readonly sessionId: string) {
    super('SESSION_NOT_FOUND', `Session not found: ${sessionId}`, { sessionId });
    this.name = 'SessionNotFoundError';
  }
}

export class LockContentionError extends CohortError {
  constructor(
    public readonly key: string,
    public readonly waitedMs: number,
    reason?: string
  ) {
    super(
      'LOCK_CONTENTION',
      `Record '${key}' is locked by another process (waited ${waitedMs}ms)${reason ? `: ${reason}` : ''}`,
      { key, waitedMs }
    );
    this.name = 'LockContentionError';
  }
}

export class StoreCorruptionError extends CohortError {
  constructor(
    public readonly key: string,
    public readonly problems: readonly string[]
  ) {
    super(
      'STORE_CORRUPTION',
      `Record '${key}' is unreadable: ${problems.join('; ')}`,
      { key, problems }
    );
    this.name = 'StoreCorruptionError';
  }
}

export class InvalidTransitionError extends CohortError {
  constructor(
    public readonly sessionId: string,
    public readonly from: string,
    public readonly to: string
  ) {
    super(
      'INVALID_TRANSITION',
      `Session ${sessionId} cannot go from ${from} to ${to}`,
      { sessionId, from, to }
    );
    this.name = 'InvalidTransitionError';
  }
}

/**
 * A command or identity table broke one of its construction invariants
 */
export class RegistryError extends CohortError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('REGISTRY_INVALID', message, details);
    this.name = 'RegistryError';
  }
}

/**
 * Format zod-style issues as "path: message" strings
 */
export function formatIssues(
  issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>
): string[] {
  return issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
