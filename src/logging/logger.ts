import { appendFile, mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { format } from 'date-fns';
import type { LogLevel, LogEntry, PipelineEvent } from './events.js';

export interface LoggerOptions {
  /** Base directory for log files. */
  logDir: string;
  /** Minimum log level to output. */
  level: LogLevel;
  /** Whether to also print to console. */
  console: boolean;
  /** Source identifier for this logger instance. */
  source: string;
  /** Run id stamped on every entry. */
  runId?: string;
}

export type LogContext = {
  runId?: string;
  stage?: string;
  data?: Record<string, unknown>;
};

/**
 * What the orchestrator needs from a logger. Logger satisfies it; tests pass plain mocks.
 */
export interface StructuredLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  event(event: PipelineEvent, level?: LogLevel): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger implements StructuredLogger {
  private readonly opts: LoggerOptions;
  private readonly logFile: string;
  private initPromise: Promise<unknown> | null = null;
  private fileDisabled = false;

  constructor(opts: Partial<LoggerOptions> & { source: string }) {
    this.opts = {
      logDir: opts.logDir ?? join(homedir(), '.stageline', 'logs'),
      level: opts.level ?? 'info',
      console: opts.console ?? true,
      source: opts.source,
      runId: opts.runId,
    };
    this.logFile = join(this.opts.logDir, `${this.opts.source}.log`);
  }

  get filePath(): string {
    return this.logFile;
  }

  private async ensureDir(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = mkdir(dirname(this.logFile), { recursive: true });
    }
    await this.initPromise;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.opts.level];
  }

  formatConsole(entry: LogEntry): string {
    const ts = format(new Date(entry.timestamp), 'HH:mm:ss.SSS');
    const levelTag = entry.level.toUpperCase().padEnd(5);
    const ctxStr = entry.stage ? ` [${entry.stage}]` : '';
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

    if (this.fileDisabled) return;
    try {
      await this.ensureDir();
      await appendFile(this.logFile, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (err) {
      // Stop trying after the first failure; logging must not take the pipeline down.
      this.fileDisabled = true;
      console.error(`Log file ${this.logFile} is not writable, file logging disabled: ${String(err)}`);
    }
  }

  private buildEntry(level: LogLevel, message: string, context?: LogContext): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      source: this.opts.source,
      message,
      ...(this.opts.runId ? { runId: this.opts.runId } : {}),
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
   * Log a structured event.
   */
  event(event: PipelineEvent, level: LogLevel = 'info'): void {
    const { type, runId, ...data } = event;
    const stage = 'stage' in event ? event.stage : undefined;
    void this.writeEntry(this.buildEntry(level, type, { runId, ...(stage ? { stage } : {}), data }));
  }
}
