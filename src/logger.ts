import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'minimal' | 'standard' | 'verbose';

export const LOG_LEVELS: readonly LogLevel[] = ['minimal', 'standard', 'verbose'];

export interface LogEntry {
  timestamp: string;
  type: 'status' | 'command' | 'tool' | 'error';
  level: 'info' | 'debug' | 'error';
  message: string;
  data?: Record<string, unknown>;
}

export interface OutputWriters {
  writeOut(text: string): void;
  writeErr(text: string): void;
}

export const processWriters: OutputWriters = {
  writeOut: (text) => process.stdout.write(text),
  writeErr: (text) => process.stderr.write(text)
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export class MigrateLogger {
  private logLevel: LogLevel;
  private output: OutputWriters;
  private logFile?: string;

  constructor(logLevel: LogLevel = 'standard', output: OutputWriters = processWriters, logFile?: string) {
    this.logLevel = logLevel;
    this.output = output;
    this.logFile = logFile;

    if (this.logFile) {
      this.writeSessionHeader();
    }
  }

  private writeSessionHeader() {
    const header = {
      migrate_session_start: new Date().toISOString(),
      format: 'structured_json_logs',
      log_level: this.logLevel,
      pid: process.pid
    };

    try {
      if (this.logFile) {
        fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
        fs.appendFileSync(this.logFile, `# Migrate Session\n${JSON.stringify(header)}\n`);
      }
    } catch (err) {
      this.output.writeErr(`❌ Failed to write log file header: ${describeFsError(err)}\n`);
      this.logFile = undefined;
    }
  }

  private record(entry: LogEntry) {
    if (!this.logFile) {
      return;
    }

    try {
      fs.appendFileSync(this.logFile, `${JSON.stringify(entry)}\n`);
    } catch (err) {
      this.output.writeErr(`❌ Failed to write to log file: ${describeFsError(err)}\n`);
      this.logFile = undefined;
    }
  }

  private entry(type: LogEntry['type'], level: LogEntry['level'], message: string, data?: Record<string, unknown>): LogEntry {
    return { timestamp: new Date().toISOString(), type, level, message, data };
  }

  /**
   * Human-readable progress line, e.g. "Running migrations..."
   */
  status(message: string, data?: Record<string, unknown>) {
    this.record(this.entry('status', 'info', message, data));
    if (this.logLevel !== 'minimal') {
      this.output.writeOut(`${message}\n`);
    }
  }

  /**
   * Details only shown in verbose mode (resolved command line, cwd, exit code)
   */
  debug(type: 'command' | 'tool', message: string, data?: Record<string, unknown>) {
    this.record(this.entry(type, 'debug', message, data));
    if (this.logLevel === 'verbose') {
      this.output.writeOut(`🔍 ${message}\n`);
    }
  }

  error(message: string, data?: Record<string, unknown>) {
    this.record(this.entry('error', 'error', message, data));
    this.output.writeErr(`❌ Error: ${message}\n`);
  }

  /**
   * Secondary error line (usage hint), printed without the error marker
   */
  hint(message: string) {
    this.output.writeErr(`${message}\n`);
  }

  /**
   * Unconditional output such as help text; never filtered by level
   */
  print(text: string) {
    this.output.writeOut(text.endsWith('\n') ? text : `${text}\n`);
  }

  getLogLevel(): LogLevel {
    return this.logLevel;
  }
}

function describeFsError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
