/**
 * Structured Logger with Trace IDs and Multiple Sinks
 *
 * Single logging entry point for chatrelay. Child loggers created with
 * `withTrace()` / `withContext()` share their root's level and sinks, so
 * `configureLogger()` at startup also reconfigures component loggers that
 * were created at module load.
 *
 * Sinks:
 * - console: Human-readable output for development (default)
 * - memory: Ring buffer of recent entries for programmatic access
 * - file: Append JSON lines to a log file
 *
 * Usage:
 *   const log = createComponentLogger('PipelineController');
 *   log.withTrace(requestId).debug('Stage completed', { stage: 'planner' });
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

// ─── Types ───────────────────────────────────────────────────────────

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  traceId?: string;
  data?: Record<string, unknown>;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: LogSink[];
  /** Default context merged into every log entry */
  defaultContext?: Record<string, unknown>;
}

interface SharedLoggerState {
  minLevel: LogLevel;
  sinks: LogSink[];
}

// ─── Level Priority ──────────────────────────────────────────────────

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

// ─── Sinks ───────────────────────────────────────────────────────────

/** Console sink, one human-readable line per entry */
export class ConsoleSink implements LogSink {
  write(entry: LogEntry): void {
    const prefix = `[${entry.timestamp}] [${entry.level.toUpperCase()}]`;
    const traceStr = entry.traceId ? ` (${entry.traceId})` : '';
    const dataStr =
      entry.data && Object.keys(entry.data).length > 0 ? ' ' + JSON.stringify(entry.data) : '';
    const line = `${prefix}${traceStr} ${entry.message}${dataStr}`;

    switch (entry.level) {
      case 'error':
        // eslint-disable-next-line no-console
        console.error(line);
        break;
      case 'warn':
        // eslint-disable-next-line no-console
        console.warn(line);
        break;
      default:
        // eslint-disable-next-line no-console
        console.log(line);
        break;
    }
  }
}

/** Memory sink: ring buffer holding the most recent entries */
export class MemorySink implements LogSink {
  private buffer: LogEntry[] = [];
  private maxSize: number;

  constructor(maxSize = 1000) {
    this.maxSize = maxSize;
  }

  write(entry: LogEntry): void {
    this.buffer.push(entry);
    if (this.buffer.length > this.maxSize) {
      this.buffer.shift();
    }
  }

  getEntries(filter?: { level?: LogLevel; traceId?: string; limit?: number }): LogEntry[] {
    let entries = this.buffer;

    if (filter?.level) {
      const minPriority = LEVEL_PRIORITY[filter.level];
      entries = entries.filter((e) => LEVEL_PRIORITY[e.level] >= minPriority);
    }

    if (filter?.traceId) {
      entries = entries.filter((e) => e.traceId === filter.traceId);
    }

    if (filter?.limit) {
      entries = entries.slice(-filter.limit);
    }

    return entries;
  }

  clear(): void {
    this.buffer = [];
  }

  get size(): number {
    return this.buffer.length;
  }
}

/** File sink, JSON lines appended to a log file */
export class FileSink implements LogSink {
  private filePath: string;
  private initialized = false;
  private failed = false;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  write(entry: LogEntry): void {
    if (this.failed) return;

    try {
      if (!this.initialized) {
        mkdirSync(dirname(this.filePath), { recursive: true });
        this.initialized = true;
      }
      appendFileSync(this.filePath, JSON.stringify(entry) + '\n');
    } catch (err) {
      // Report once on stderr, then stop writing to this file
      this.failed = true;
      process.stderr.write(
        `[logger] file sink disabled for ${this.filePath}: ${err instanceof Error ? err.message : String(err)}\n`,
      );
    }
  }
}

// ─── Logger ──────────────────────────────────────────────────────────

export class StructuredLogger {
  private shared: SharedLoggerState;
  private defaultContext: Record<string, unknown>;
  private traceId?: string;

  constructor(config: LoggerConfig = {}) {
    this.shared = {
      minLevel: config.level ?? 'info',
      sinks: config.sinks ?? [new ConsoleSink()],
    };
    this.defaultContext = config.defaultContext ?? {};
  }

  /** Create a child logger with a bound trace ID */
  withTrace(traceId: string): StructuredLogger {
    return this.child(this.defaultContext, traceId);
  }

  /** Create a child logger with additional default context */
  withContext(context: Record<string, unknown>): StructuredLogger {
    return this.child({ ...this.defaultContext, ...context }, this.traceId);
  }

  /** Update the minimum log level for this logger and every logger sharing its root */
  setLevel(level: LogLevel): void {
    this.shared.minLevel = level;
  }

  get level(): LogLevel {
    return this.shared.minLevel;
  }

  /** Add a sink at runtime (e.g., a file sink once config is loaded) */
  addSink(sink: LogSink): void {
    this.shared.sinks.push(sink);
  }

  /** Replace all sinks; children created earlier see the new set */
  setSinks(sinks: LogSink[]): void {
    this.shared.sinks.splice(0, this.shared.sinks.length, ...sinks);
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.log('trace', message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private child(context: Record<string, unknown>, traceId: string | undefined): StructuredLogger {
    const child = new StructuredLogger({ defaultContext: context });
    child.shared = this.shared;
    child.traceId = traceId;
    return child;
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.shared.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.traceId && { traceId: this.traceId }),
      ...(data || Object.keys(this.defaultContext).length > 0
        ? { data: { ...this.defaultContext, ...data } }
        : {}),
    };

    for (const sink of this.shared.sinks) {
      try {
        sink.write(entry);
      } catch (err) {
        process.stderr.write(
          `[logger] sink write failed: ${err instanceof Error ? err.message : String(err)}\n`,
        );
      }
    }
  }
}

// ─── Global singleton ────────────────────────────────────────────────

/**
 * Global logger instance. Defaults to a console sink at 'info' level.
 */
export const logger = new StructuredLogger();

/**
 * Reconfigure the global logger in place. Component loggers created before
 * the call pick up the new level and sinks.
 */
export function configureLogger(config: LoggerConfig): void {
  if (config.level) logger.setLevel(config.level);
  if (config.sinks) logger.setSinks(config.sinks);
}

/**
 * Create a logger for a specific component (adds component name to context).
 */
export function createComponentLogger(component: string): StructuredLogger {
  return logger.withContext({ component });
}
