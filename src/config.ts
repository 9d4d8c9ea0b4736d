import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigError } from './errors';
import { isLogLevel } from './logger';
import type { LogLevel } from './logger';
import { splitCommand } from './tool-runner';

export const DEFAULT_TOOL = 'uv run alembic';

/** Options as commander hands them over; every field is optional */
export interface CliOptions {
  tool?: string;
  cwd?: string;
  config?: string;
  envFile?: string;
  dryRun?: boolean;
  logLevel?: string;
  logFile?: string;
}

export type Environment = Record<string, string | undefined>;

export interface MigrateConfig {
  tool: string[];
  cwd: string;
  alembicConfig?: string;
  env: Environment;
  dryRun: boolean;
  logLevel: LogLevel;
  logFile?: string;
}

/**
 * Reads KEY=value pairs from an env file without touching process.env.
 * A missing default file is fine; a missing file the user named is not.
 */
function loadEnvFile(filePath: string, required: boolean): Environment {
  if (!fs.existsSync(filePath)) {
    if (required) {
      throw new ConfigError(`Environment file not found: ${filePath}`);
    }
    return {};
  }

  try {
    return dotenv.parse(fs.readFileSync(filePath));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to read environment file ${filePath}: ${reason}`);
  }
}

function isTruthy(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Merges CLI options, the process environment and the env file into one config.
 * Precedence: CLI option > process env > env file > default.
 */
export function resolveConfig(options: CliOptions, processEnv: Environment = process.env, baseDir = process.cwd()): MigrateConfig {
  const cwd = path.resolve(baseDir, options.cwd || processEnv.MIGRATE_CWD || '.');

  const envFilePath = options.envFile ? path.resolve(cwd, options.envFile) : path.join(cwd, '.env');
  const fileEnv = loadEnvFile(envFilePath, Boolean(options.envFile));
  const env: Environment = { ...fileEnv, ...processEnv };

  const toolCommand = options.tool || env.MIGRATE_TOOL || DEFAULT_TOOL;
  const tool = splitCommand(toolCommand);
  if (tool.length === 0) {
    throw new ConfigError('Migration tool command is empty');
  }

  const logLevel = options.logLevel || env.MIGRATE_LOG_LEVEL || 'standard';
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`Invalid log level: ${logLevel} (expected minimal, standard or verbose)`);
  }

  const alembicConfig = options.config || env.ALEMBIC_CONFIG_FILE || undefined;
  const logFile = options.logFile || env.MIGRATE_LOG_FILE || undefined;

  return {
    tool,
    cwd,
    alembicConfig,
    env,
    dryRun: Boolean(options.dryRun) || isTruthy(env.MIGRATE_DRY_RUN),
    logLevel,
    logFile: logFile ? path.resolve(cwd, logFile) : undefined
  };
}
