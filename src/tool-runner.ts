import { spawn } from 'child_process';
import type { ChildProcess, SpawnOptions } from 'child_process';
import treeKill from 'tree-kill';
import * as os from 'os';
import { ToolLaunchError } from './errors';

export interface ToolRunnerOptions {
  /** Tool argv prefix, e.g. ['uv', 'run', 'alembic'] */
  tool: string[];
  cwd: string;
  env: Record<string, string | undefined>;
}

/**
 * Anything that can run the migration tool once and report its exit code.
 * The dispatcher only depends on this, so tests can substitute a fake.
 */
export interface MigrationTool {
  run(args: string[]): Promise<number>;
  describe(args: string[]): string;
}

const FORWARDED_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(os.constants.signals));

/**
 * Splits a command string into argv, respecting single/double quotes.
 * Inside quotes only \" \' and \\ are escapes; other backslashes are kept.
 */
export function splitCommand(command: string): string[] {
  const args: string[] = [];
  let current = '';
  let hasToken = false;
  let quoteChar = '';

  for (let i = 0; i < command.length; i++) {
    const char = command[i];
    const nextChar = command[i + 1];

    if (quoteChar) {
      if (char === quoteChar) {
        quoteChar = '';
      } else if (char === '\\' && (nextChar === quoteChar || nextChar === '\\')) {
        current += nextChar;
        i++;
      } else {
        current += char;
      }
    } else if (char === '"' || char === "'") {
      quoteChar = char;
      hasToken = true;
    } else if (/\s/.test(char)) {
      if (hasToken) {
        args.push(current);
        current = '';
        hasToken = false;
      }
    } else {
      current += char;
      hasToken = true;
    }
  }

  if (hasToken) {
    args.push(current);
  }

  return args;
}

/**
 * Quotes an argument for display so the printed command line can be pasted into a shell
 */
export function quoteArg(arg: string): string {
  if (arg !== '' && /^[A-Za-z0-9_\-+=.,/:@%]+$/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Exit status the way a POSIX shell reports it: the code, or 128 + signal number
 */
export function toExitStatus(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) {
    return code;
  }
  if (signal) {
    return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0);
  }
  return 1;
}

export class ToolRunner implements MigrationTool {
  private process: ChildProcess | null = null;
  private readonly isWindows = process.platform === 'win32';
  private readonly options: ToolRunnerOptions;

  constructor(options: ToolRunnerOptions) {
    this.options = options;
  }

  describe(args: string[]): string {
    return [...this.options.tool, ...args].map(quoteArg).join(' ');
  }

  /**
   * Runs the tool once with inherited stdio and resolves with its exit status.
   * Rejects only when the process cannot be started.
   */
  run(args: string[]): Promise<number> {
    const [command, ...prefix] = this.options.tool;

    const spawnOptions: SpawnOptions = {
      cwd: this.options.cwd,
      env: this.options.env,
      stdio: 'inherit',
      // .cmd/.bat shims cannot be spawned directly on Windows
      shell: this.isWindows && /\.(cmd|bat)$/i.test(command)
    };

    return new Promise<number>((resolve, reject) => {
      let settled = false;
      const child = spawn(command, [...prefix, ...args], spawnOptions);
      this.process = child;

      const forward = (signal: NodeJS.Signals) => this.stop(signal);
      for (const signal of FORWARDED_SIGNALS) {
        process.on(signal, forward);
      }

      const finish = () => {
        for (const signal of FORWARDED_SIGNALS) {
          process.removeListener(signal, forward);
        }
        this.process = null;
        settled = true;
      };

      child.on('error', (error) => {
        if (settled) {
          return;
        }
        finish();
        reject(new ToolLaunchError(command, error));
      });

      child.on('close', (code, signal) => {
        if (settled) {
          return;
        }
        finish();
        resolve(toExitStatus(code, signal));
      });
    });
  }

  /**
   * Terminates the tool and everything it spawned (uv -> python -> alembic)
   */
  stop(signal: NodeJS.Signals = 'SIGTERM'): void {
    const child = this.process;
    if (!child || child.pid === undefined) {
      return;
    }

    treeKill(child.pid, signal, (err?: Error) => {
      if (err) {
        console.warn(`[migrate] Warning: Failed to kill process tree: ${err.message}`);
        // Fallback to direct kill if tree-kill fails
        child.kill(signal);
      }
    });
  }

  isRunning(): boolean {
    return this.process !== null && !this.process.killed;
  }
}
