import { UnknownCommandError, UsageError } from './errors';

/** Commands that end in exactly one call of the migration tool; `help` is the only other one */
export type ToolCommandName = 'create' | 'upgrade' | 'downgrade' | 'history' | 'current' | 'reset';

export interface MigrationInvocation {
  command: ToolCommandName;
  statusLine: string;
  toolArgs: string[];
}

export const DEFAULT_DOWNGRADE_STEPS = '1';

/**
 * Maps a command and its optional argument to the single tool call it makes.
 * `help` has no tool call and is handled by the dispatcher.
 */
export function planInvocation(command: string, arg?: string, programName = 'migrate'): MigrationInvocation {
  switch (command) {
    case 'create': {
      if (!arg) {
        throw new UsageError('Migration message required', `${programName} create 'migration message'`);
      }
      return {
        command,
        statusLine: `Creating migration: ${arg}`,
        toolArgs: ['revision', '--autogenerate', '-m', arg]
      };
    }

    case 'upgrade':
      return { command, statusLine: 'Running migrations...', toolArgs: ['upgrade', 'head'] };

    case 'downgrade': {
      // passed through as-is; the tool rejects anything it cannot parse
      const steps = arg || DEFAULT_DOWNGRADE_STEPS;
      return {
        command,
        statusLine: `Downgrading ${steps} migration(s)...`,
        toolArgs: ['downgrade', `-${steps}`]
      };
    }

    case 'history':
      return { command, statusLine: 'Migration history:', toolArgs: ['history', '--verbose'] };

    case 'current':
      return { command, statusLine: 'Current migration:', toolArgs: ['current'] };

    case 'reset':
      return { command, statusLine: 'Resetting database to base...', toolArgs: ['downgrade', 'base'] };

    default:
      throw new UnknownCommandError(command);
  }
}

export function renderUsage(programName = 'migrate'): string {
  return [
    'Migration Management',
    '',
    `Usage: ${programName} [options] [command] [args]`,
    '',
    'Commands:',
    "  create 'message'  - Create new migration with autogenerate",
    '  upgrade           - Run all pending migrations',
    '  downgrade [n]     - Downgrade n migrations (default: 1)',
    '  history           - Show migration history',
    '  current           - Show current migration',
    '  reset             - Downgrade all migrations to base',
    '  help              - Show this help message',
    '',
    'Options:',
    '  --tool <command>      Migration tool command (default: uv run alembic, env: MIGRATE_TOOL)',
    '  --cwd <dir>           Directory to run the tool in (env: MIGRATE_CWD)',
    '  -c, --config <path>   Alembic config file passed as -c (env: ALEMBIC_CONFIG_FILE)',
    '  --env-file <path>     Environment file to load (default: <cwd>/.env)',
    '  --dry-run             Print the tool command without running it',
    '  --log-level <level>   minimal, standard, verbose (default: standard)',
    '  --log-file <path>     Append structured JSON log entries to a file',
    '  -V, --version         Show version',
    '  -h, --help            Show this help message',
    '',
    'Examples:',
    `  ${programName} create 'add users table'`,
    `  ${programName} upgrade`,
    `  ${programName} downgrade 2`,
    `  ${programName} create -- '-drop legacy columns'`,
    ''
  ].join('\n');
}
