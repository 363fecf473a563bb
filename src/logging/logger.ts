import { appendFile, mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { format } from 'date-fns';
import type { LogLevel, LogEntry, LogContext, ReconcileEvent } from './events.js';

export interface LoggerOptions {
  /** Directory for log files; no file is written when null. */
  logDir: string | null;
  /** Minimum log level to output. */
  level: LogLevel;
  /** Whether to also print to console. */
  console: boolean;
  /** Source identifier for this logger instance. */
  source: string;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  private readonly opts: LoggerOptions;
  private readonly logFile: string | null;
  private initPromise: Promise<unknown> | null = null;

  constructor(opts: Partial<LoggerOptions> & { source: string }) {
    this.opts = {
      logDir: opts.logDir ?? null,
      level: opts.level ?? 'info',
      console: opts.console ?? true,
      source: opts.source,
    };
    this.logFile = this.opts.logDir ? join(this.opts.logDir, `${this.opts.source}.log`) : null;
  }

  private async ensureDir(file: string): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = mkdir(dirname(file), { recursive: true });
    }
    await this.initPromise;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.opts.level];
  }

  formatConsole(entry: LogEntry): string {
    const ts = format(new Date(entry.timestamp), 'HH:mm:ss.SSS');
    const levelTag = entry.level.toUpperCase().padEnd(5);
    const ctxStr = entry.iteration != null ? ` [iter ${entry.iteration}]` : '';
    return `${ts} ${levelTag} [${entry.source}]${ctxStr} ${entry.message}`;
  }

  private async writeEntry(entry: LogEntry): Promise<void> {
    if (!this.shouldLog(entry.level)) return;

    if (this.opts.console) {
      const formatted = this.formatConsole(entry);
      if (entry.level === 'error') {
        console.error(formatted);
      } else if (entry.level === 'warn') {
        console.warn(formatted);
      } else {
        console.log(formatted);
      }
    }

    if (!this.logFile) return;
    try {
      await this.ensureDir(this.logFile);
      await appendFile(this.logFile, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (err) {
      // The log file is secondary output; report once on stderr and keep going.
      if (this.opts.console) {
        console.error(`Failed to write log file ${this.logFile}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  private buildEntry(level: LogLevel, message: string, context?: LogContext): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      source: this.opts.source,
      message,
      ...context,
    };
  }

  debug(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('debug', message, context));
  }

  info(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('info', message, context));
  }

  warn(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('warn', message, context));
  }

  error(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('error', message, context));
  }

  /**
   * Log a structured event. Defaults to debug level, so events reach the
   * console only when debug output is on.
   */
  event(event: ReconcileEvent, level: LogLevel = 'debug'): void {
    void this.writeEntry(
      this.buildEntry(level, event.type, {
        iteration: 'iteration' in event ? event.iteration : undefined,
        data: { ...event },
      }),
    );
  }
}
