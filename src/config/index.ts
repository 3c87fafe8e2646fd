/**
 * Configuration module
 * Handles loading and validating configuration from environment
 */

import { z, ZodError } from 'zod';
import dotenv from 'dotenv';
import { resolve } from 'path';

/**
 * Configuration schema with zod validation
 * All options have sensible defaults
 */
export const ConfigSchema = z.object({
  // Storage
  dataDir: z
    .string()
    .min(1)
    .default('./.cohort')
    .describe('Root directory holding session records and context documents'),
  identitiesPath: z
    .string()
    .optional()
    .describe('Optional JSON file replacing the built-in agent table'),

  // Identity of the invoking agent
  agent: z
    .string()
    .min(1)
    .optional()
    .describe('Alias of the agent running the command (own context, sender)'),

  // Locking
  lockAcquireTimeoutMs: z
    .coerce
    .number()
    .int()
    .min(0)
    .max(60_000)
    .default(2000)
    .describe('How long a mutation waits for a record lock'),
  staleLockMs: z
    .coerce
    .number()
    .int()
    .min(100)
    .default(30_000)
    .describe('Age after which a lock file is considered abandoned'),
  lockPollIntervalMs: z
    .coerce
    .number()
    .int()
    .min(1)
    .max(1000)
    .default(25)
    .describe('Polling interval while waiting for a lock'),

  // Logging Configuration
  logLevel: z
    .enum(['silent', 'debug', 'info', 'warn', 'error'])
    .default('warn')
    .describe('Logging verbosity level'),
  logFormat: z
    .enum(['json', 'pretty'])
    .default('pretty')
    .describe('Log output format'),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Configuration error with helpful messages
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  static fromZodError(error: ZodError): ConfigError {
    const messages = error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );
    return new ConfigError(
      `Configuration validation failed:\n${messages.join('\n')}`,
      error.issues
    );
  }
}

/**
 * Load .env file from specified path or default locations
 */
export function loadEnvFile(envPath?: string): void {
  if (envPath) {
    dotenv.config({ path: resolve(envPath) });
  } else {
    dotenv.config({ path: resolve(process.cwd(), '.env') });
    dotenv.config({ path: resolve(process.cwd(), '.env.local') });
  }
}

/**
 * Build raw config object from environment variables
 */
function buildRawConfig(): Record<string, unknown> {
  return {
    dataDir: process.env.COHORT_DATA_DIR,
    identitiesPath: process.env.COHORT_IDENTITIES,
    agent: process.env.COHORT_AGENT,
    lockAcquireTimeoutMs: process.env.COHORT_LOCK_TIMEOUT_MS,
    staleLockMs: process.env.COHORT_STALE_LOCK_MS,
    lockPollIntervalMs: process.env.COHORT_LOCK_POLL_MS,
    logLevel: process.env.COHORT_LOG_LEVEL,
    logFormat: process.env.COHORT_LOG_FORMAT,
  };
}

/**
 * Load and validate configuration from environment
 * @param envPath Optional path to .env file
 * @throws ConfigError if validation fails
 */
export function loadConfig(envPath?: string): Config {
  loadEnvFile(envPath);

  const result = ConfigSchema.safeParse(buildRawConfig());

  if (!result.success) {
    throw ConfigError.fromZodError(result.error);
  }

  return result.data;
}

/**
 * Validate a partial config object
 */
export function validateConfig(config: unknown): Config {
  const result = ConfigSchema.safeParse(config);

  if (!result.success) {
    throw ConfigError.fromZodError(result.error);
  }

  return result.data;
}

/**
 * Get default configuration values
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

// Singleton config instance
let _config: Config | null = null;

/**
 * Get the global configuration instance (singleton)
 * Loads from environment on first access
 */
export function getConfig(): Config {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}

/**
 * Set the global configuration instance
 * Useful for testing or programmatic configuration
 */
export function setConfig(config: Config): void {
  _config = validateConfig(config);
}

/**
 * Reset the global configuration instance
 * Forces reload on next getConfig() call
 */
export function resetConfig(): void {
  _config = null;
}

/**
 * Values given on the command line; validated together with the rest
 */
export interface ConfigOverrides {
  dataDir?: string;
  agent?: string;
  logLevel?: string;
}

/**
 * Apply CLI overrides on top of a loaded config.
 * Undefined overrides keep the loaded value.
 */
export function withOverrides(config: Config, overrides: ConfigOverrides): Config {
  const merged: Record<string, unknown> = { ...config };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return validateConfig(merged);
}
