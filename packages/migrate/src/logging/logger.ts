/**
 * @fileoverview Centralized logging for tablewright
 *
 * Uses pino for structured logging with:
 * - Configurable log levels (settings or explicit options)
 * - JSON output, or pretty printing through pino-pretty
 * - Context-aware child loggers
 * - Timing helpers for migration steps
 */

import pino from 'pino';
import { getSettings } from '../settings/index.js';
import type { LogContext, LoggerOptions, LogLevel } from './types.js';

type LogData = Record<string, unknown>;

/**
 * Create a configured pino logger instance.
 * All output goes to stderr so that stdout stays free for callers.
 */
function createPinoLogger(options: LoggerOptions = {}): pino.Logger {
  const settings = getSettings();
  const level = options.level ?? settings.logLevel;
  const pretty = options.pretty ?? settings.logPretty;

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: options.name ?? 'tablewright',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        name: bindings.name,
      }),
    },
  };

  if (pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(pinoOptions, pino.destination(2));
}

export class MigrationLogger {
  private readonly pino: pino.Logger;
  private readonly context: LogContext;

  constructor(options: LoggerOptions | pino.Logger = {}, context: LogContext = {}) {
    this.pino = isPinoLogger(options) ? options : createPinoLogger(options);
    this.context = context;
  }

  /**
   * Create a child logger with additional context.
   * Reuses the parent's pino instance so no new transport is opened.
   */
  child(context: LogContext): MigrationLogger {
    return new MigrationLogger(this.pino.child(context), { ...this.context, ...context });
  }

  getContext(): LogContext {
    return { ...this.context };
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.pino.isLevelEnabled(level);
  }

  trace(msgOrData: string | LogData, msgOrDataSecond?: string | LogData): void {
    this.write('trace', msgOrData, msgOrDataSecond);
  }

  debug(msgOrData: string | LogData, msgOrDataSecond?: string | LogData): void {
    this.write('debug', msgOrData, msgOrDataSecond);
  }

  info(msgOrData: string | LogData, msgOrDataSecond?: string | LogData): void {
    this.write('info', msgOrData, msgOrDataSecond);
  }

  warn(msgOrData: string | LogData, msgOrDataSecond?: string | LogData): void {
    this.write('warn', msgOrData, msgOrDataSecond);
  }

  /**
   * Log at error level
   * Supports: (msg), (msg, data), (msg, error), and (data, msg) signatures
   */
  error(msgOrData: string | LogData, msgOrDataOrError?: string | Error | LogData): void {
    if (typeof msgOrData === 'string' && msgOrDataOrError instanceof Error) {
      this.pino.error({ err: msgOrDataOrError }, msgOrData);
      return;
    }
    this.write('error', msgOrData, msgOrDataOrError instanceof Error ? undefined : msgOrDataOrError);
  }

  fatal(msgOrData: string | LogData, msgOrDataOrError?: string | Error | LogData): void {
    if (typeof msgOrData === 'string' && msgOrDataOrError instanceof Error) {
      this.pino.fatal({ err: msgOrDataOrError }, msgOrData);
      return;
    }
    this.write('fatal', msgOrData, msgOrDataOrError instanceof Error ? undefined : msgOrDataOrError);
  }

  /**
   * Start a timer; the returned function logs the elapsed time at debug level.
   */
  startTimer(label: string, data: LogData = {}): () => number {
    const start = performance.now();
    return () => {
      const duration = performance.now() - start;
      this.debug({ ...data, durationMs: Number(duration.toFixed(2)) }, `${label} completed`);
      return duration;
    };
  }

  private write(level: LogLevel, msgOrData: string | LogData, second?: string | LogData): void {
    if (typeof msgOrData === 'string') {
      if (typeof second === 'object') {
        this.pino[level](second, msgOrData);
      } else {
        this.pino[level](msgOrData);
      }
      return;
    }
    this.pino[level](msgOrData, typeof second === 'string' ? second : '');
  }
}

function isPinoLogger(value: LoggerOptions | pino.Logger): value is pino.Logger {
  return 'child' in value;
}

// =============================================================================
// Singleton Logger
// =============================================================================

let defaultLogger: MigrationLogger | null = null;

/**
 * Get the default logger instance
 */
export function getLogger(options?: LoggerOptions): MigrationLogger {
  if (!defaultLogger) {
    defaultLogger = new MigrationLogger(options);
  }
  return defaultLogger;
}

/**
 * Create a component-specific logger
 */
export function createLogger(component: string, context?: LogContext): MigrationLogger {
  return getLogger().child({ component, ...context });
}

/**
 * Reset the default logger (for testing)
 */
export function resetLogger(): void {
  defaultLogger = null;
}
