/**
 * cohort CLI
 * Global options are parsed by commander; everything after the first
 * command word goes to the abbreviation resolver untouched.
 */

import { Command, CommanderError } from 'commander';
import { getConfig, resetConfig, setConfig, withOverrides } from '../config/index.js';
import type { Config } from '../config/index.js';
import { consoleOutput, createDispatcher, createServices, reportError } from '../dispatcher/index.js';
import type { Output } from '../dispatcher/index.js';
import { EXIT_SUCCESS } from '../errors/index.js';
import { resetLogger } from '../utils/logger.js';
import { version } from '../version.js';

interface GlobalOptions {
  dataDir?: string;
  agent?: string;
  logLevel?: string;
}

/**
 * Apply global options to the loaded configuration and make it current
 */
function configure(options: GlobalOptions): Config {
  const config = withOverrides(getConfig(), options);
  setConfig(config);
  resetLogger();
  return config;
}

async function execute(tokens: string[], options: GlobalOptions, output: Output): Promise<number> {
  try {
    const config = configure(options);
    const services = await createServices(config);
    return await createDispatcher({ ...services, config, output }).dispatch(tokens);
  } catch (err) {
    return reportError(err, output);
  }
}

/**
 * Create and configure the CLI program
 */
export function createProgram(
  output: Output = consoleOutput,
  onExit: (code: number) => void = code => {
    process.exitCode = code;
  }
): Command {
  const program = new Command();

  program
    .name('cohort')
    .description('Shared sessions and context messages for collaborating coding agents')
    .version(version)
    .option('-d, --data-dir <path>', 'Data directory (default: ./.cohort or COHORT_DATA_DIR)')
    .option('-a, --agent <alias>', 'Agent running the command (or COHORT_AGENT)')
    .option('--log-level <level>', 'silent, debug, info, warn or error')
    .argument('[tokens...]', 'Command, possibly abbreviated, and its arguments')
    .allowUnknownOption()
    .passThroughOptions()
    .helpOption('--help', 'Show commander help; see `cohort help` for commands')
    .configureOutput({
      writeOut: text => output.print(text.trimEnd()),
      writeErr: text => output.warn(text.trimEnd()),
    })
    .exitOverride()
    .action(async (tokens: string[], options: GlobalOptions) => {
      onExit(await execute(tokens, options, output));
    });

  return program;
}

/**
 * Parse argv and run one command
 * @returns exit code
 */
export async function runCli(argv: readonly string[], output: Output = consoleOutput): Promise<number> {
  let exitCode: number = EXIT_SUCCESS;
  const program = createProgram(output, code => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv]);
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  } finally {
    resetConfig();
    resetLogger();
  }

  return exitCode;
}
