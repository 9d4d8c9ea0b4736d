import { planInvocation, renderUsage } from './commands';
import type { MigrationTool } from './tool-runner';
import type { MigrateLogger } from './logger';

export interface DispatcherOptions {
  tool: MigrationTool;
  logger: MigrateLogger;
  programName?: string;
  /** Passed to the tool as `-c <path>` before the subcommand */
  alembicConfig?: string;
  dryRun?: boolean;
}

/**
 * Selects one action for a command and runs it. Every command except `help`
 * results in exactly one call of the migration tool.
 */
export class MigrationDispatcher {
  private readonly options: DispatcherOptions;
  private readonly programName: string;

  constructor(options: DispatcherOptions) {
    this.options = options;
    this.programName = options.programName ?? 'migrate';
  }

  usage(): string {
    return renderUsage(this.programName);
  }

  /**
   * Resolves with the exit code. Usage and unknown-command errors are thrown
   * before the tool is touched; tool failures come back as its exit code.
   */
  async dispatch(command?: string, arg?: string): Promise<number> {
    const { tool, logger } = this.options;
    // an empty first argument counts as no command
    const name = command || 'help';

    if (name === 'help') {
      logger.print(this.usage());
      return 0;
    }

    const invocation = planInvocation(name, arg, this.programName);
    const toolArgs = this.options.alembicConfig
      ? ['-c', this.options.alembicConfig, ...invocation.toolArgs]
      : invocation.toolArgs;

    logger.status(invocation.statusLine, { command: invocation.command });
    logger.debug('command', `Running: ${tool.describe(toolArgs)}`, { args: toolArgs });

    if (this.options.dryRun) {
      logger.print(`[dry-run] ${tool.describe(toolArgs)}`);
      return 0;
    }

    const exitCode = await tool.run(toolArgs);
    logger.debug('tool', `Migration tool exited with code ${exitCode}`, { exitCode });
    return exitCode;
  }
}
