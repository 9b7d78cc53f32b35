/**
 * Structured logging infrastructure.
 *
 * Every record carries an ISO timestamp. Records fan out to sinks: the console
 * sink colors them for a terminal, the file sink appends plain lines.
 */
import { appendFileSync } from 'node:fs';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type RecordLevel = Exclude<LogLevel, 'silent'>;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface LogRecord {
  timestamp: string;
  level: RecordLevel;
  prefix: string;
  message: string;
  /** Marks success/failure lines so sinks can style them. */
  tone?: 'success' | 'failure';
  data?: Record<string, unknown>;
}

export interface LogSink {
  write(record: LogRecord): void;
}

/**
 * Render a record as a single plain-text line.
 */
export function formatRecord(record: LogRecord): string {
  const prefix = record.prefix ? ` [${record.prefix}]` : '';
  const line = `${record.timestamp} [${record.level.toUpperCase()}]${prefix} ${record.message}`;
  return record.data ? `${line} ${JSON.stringify(record.data)}` : line;
}

export class ConsoleSink implements LogSink {
  write(record: LogRecord): void {
    const line = formatRecord(record);
    if (record.tone === 'success') {
      console.log(chalk.green(line));
      return;
    }
    if (record.tone === 'failure') {
      console.log(chalk.red(line));
      return;
    }
    switch (record.level) {
      case 'debug':
        console.log(chalk.gray(line));
        break;
      case 'info':
        console.log(chalk.blue(line));
        break;
      case 'warn':
        console.warn(chalk.yellow(line));
        break;
      case 'error':
        console.error(chalk.red(line));
        break;
    }
  }
}

/**
 * Appends records to a log file. Writes are synchronous so lines never interleave.
 */
export class FileSink implements LogSink {
  constructor(readonly filePath: string) {}

  write(record: LogRecord): void {
    appendFileSync(this.filePath, `${formatRecord(record)}\n`, 'utf-8');
  }
}

/**
 * Keeps records in memory.
 */
export class MemorySink implements LogSink {
  readonly records: LogRecord[] = [];

  write(record: LogRecord): void {
    this.records.push(record);
  }

  messages(level?: RecordLevel): string[] {
    return this.records.filter((r) => !level || r.level === level).map((r) => r.message);
  }
}

export type Clock = () => Date;

/**
 * Logger with levels, prefixes and pluggable sinks.
 */
class Logger {
  private level: LogLevel = 'info';
  private prefix: string = '';
  private sinks: LogSink[];
  private clock: Clock;

  constructor(sinks: LogSink[] = [new ConsoleSink()], clock: Clock = () => new Date()) {
    this.sinks = sinks;
    this.clock = clock;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  addSink(sink: LogSink): void {
    this.sinks.push(sink);
  }

  removeSink(sink: LogSink): void {
    const index = this.sinks.indexOf(sink);
    if (index >= 0) this.sinks.splice(index, 1);
  }

  private shouldLog(level: RecordLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private emit(
    level: RecordLevel,
    message: string,
    extra: Pick<LogRecord, 'tone' | 'data'> = {}
  ): void {
    if (!this.shouldLog(level)) return;
    const record: LogRecord = {
      timestamp: this.clock().toISOString(),
      level,
      prefix: this.prefix,
      message,
      ...extra,
    };
    for (const sink of this.sinks) {
      sink.write(record);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit('debug', message, { data });
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit('info', message, { data });
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit('warn', message, { data });
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.emit('error', message, { data: { error: error.message } });
      return;
    }
    this.emit('error', message, { data: error });
  }

  /**
   * Log a success message (shown unless level is above info).
   */
  success(message: string): void {
    this.emit('info', `✓ ${message}`, { tone: 'success' });
  }

  /**
   * Log a failure message (shown unless level is above info).
   */
  fail(message: string): void {
    this.emit('info', `✗ ${message}`, { tone: 'failure' });
  }

  /**
   * Create a child logger with a prefix. Children share the parent's sinks.
   */
  child(prefix: string): Logger {
    const child = new Logger(this.sinks, this.clock);
    child.level = this.level;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

// Singleton instance
export const logger = new Logger();

// Re-export for convenience
export { Logger };
