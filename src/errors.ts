export class MigrateError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

/**
 * A required argument is missing or malformed (e.g. `create` without a message)
 */
export class UsageError extends MigrateError {
  readonly usage: string;

  constructor(message: string, usage: string) {
    super(message, 1);
    this.usage = usage;
  }
}

export class UnknownCommandError extends MigrateError {
  readonly command: string;

  constructor(command: string) {
    super(`Unknown command: ${command}`, 1);
    this.command = command;
  }
}

export class ConfigError extends MigrateError {}

/**
 * The migration tool could not be started at all (missing executable, bad cwd).
 * Uses the shell's "command not found" status.
 */
export class ToolLaunchError extends MigrateError {
  constructor(command: string, cause: Error) {
    super(`Failed to start migration tool '${command}': ${cause.message}`, 127);
    this.cause = cause;
  }
}

export function formatError(error: unknown): string {
  if (error instanceof MigrateError) {
    return error.message;
  }
  if (error instanceof Error) {
    return error.stack || String(error);
  }
  return String(error);
}
