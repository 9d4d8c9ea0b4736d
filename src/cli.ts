import { Command, CommanderError } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { renderUsage } from './commands';
import { resolveConfig } from './config';
import type { CliOptions, Environment, MigrateConfig } from './config';
import { MigrationDispatcher } from './dispatcher';
import { formatError, MigrateError, UnknownCommandError, UsageError } from './errors';
import { MigrateLogger, processWriters } from './logger';
import type { OutputWriters } from './logger';
import { ToolRunner } from './tool-runner';
import type { MigrationTool } from './tool-runner';

export const PROGRAM_NAME = 'migrate';

/**
 * Version from package.json, which sits one level above both src/ and dist/
 */
export function readPackageVersion(packageJsonPath = path.join(__dirname, '..', 'package.json')): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch (error) {
    return '0.0.0';
  }
}

export const VERSION = readPackageVersion();

export interface CliDependencies {
  output?: OutputWriters;
  env?: Environment;
  cwd?: string;
  createTool?: (config: MigrateConfig) => MigrationTool;
}

function defaultTool(config: MigrateConfig): MigrationTool {
  return new ToolRunner({ tool: config.tool, cwd: config.cwd, env: config.env });
}

/**
 * Prints an error the way the user should see it and returns the exit code
 */
export function reportError(logger: MigrateLogger, error: unknown): number {
  if (error instanceof UsageError) {
    logger.error(error.message);
    logger.hint(`Usage: ${error.usage}`);
    return error.exitCode;
  }

  if (error instanceof UnknownCommandError) {
    logger.error(error.message);
    logger.hint(`Run '${PROGRAM_NAME} help' for usage`);
    return error.exitCode;
  }

  if (error instanceof MigrateError) {
    logger.error(error.message);
    return error.exitCode;
  }

  logger.error(formatError(error));
  return 1;
}

export function createProgram(output: OutputWriters): Command {
  const program = new Command();

  program
    .name(PROGRAM_NAME)
    .description('Run database schema migrations through the migration tool')
    .version(VERSION)
    .argument('[command]', 'create, upgrade, downgrade, history, current, reset or help')
    .argument('[arg]', 'migration message for create, number of steps for downgrade')
    .allowExcessArguments(true)
    // "-drop legacy" as a create message, or "-x" as a command, reaches the dispatcher
    .allowUnknownOption(true)
    .option('--tool <command>', 'Migration tool command')
    .option('--cwd <dir>', 'Directory to run the tool in')
    .option('-c, --config <path>', 'Alembic config file')
    .option('--env-file <path>', 'Environment file to load')
    .option('--dry-run', 'Print the tool command without running it')
    .option('--log-level <level>', 'Log verbosity: minimal, standard, verbose')
    .option('--log-file <path>', 'Append structured JSON log entries to a file')
    .configureHelp({ formatHelp: () => renderUsage(PROGRAM_NAME) })
    .configureOutput({
      writeOut: (str) => output.writeOut(str),
      writeErr: (str) => output.writeErr(str)
    })
    .exitOverride();

  return program;
}

/**
 * Parses argv (node-style, including the executable and script paths),
 * runs at most one migration command and resolves with the exit code
 */
export async function run(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const output = deps.output ?? processWriters;
  const program = createProgram(output);
  let exitCode = 0;

  program.action(async (command: string | undefined, arg: string | undefined, options: CliOptions) => {
    let logger = new MigrateLogger('standard', output);

    try {
      const config = resolveConfig(options, deps.env ?? process.env, deps.cwd ?? process.cwd());
      logger = new MigrateLogger(config.logLevel, output, config.logFile);

      const dispatcher = new MigrationDispatcher({
        tool: (deps.createTool ?? defaultTool)(config),
        logger,
        programName: PROGRAM_NAME,
        alembicConfig: config.alembicConfig,
        dryRun: config.dryRun
      });

      exitCode = await dispatcher.dispatch(command, arg);
    } catch (error) {
      exitCode = reportError(logger, error);
    }
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}
