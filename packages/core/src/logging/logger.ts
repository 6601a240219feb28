/**
 * @fileoverview Centralized logging for the task list
 *
 * Uses pino for structured logging with:
 * - Configurable log levels
 * - JSON output to stderr for production
 * - Pretty printing for development
 * - Component-scoped child loggers
 * - Performance tracking
 */

import pino, { type Logger as PinoLogger, type LoggerOptions as PinoOptions } from 'pino';

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  pretty?: boolean;
}

export interface LogContext {
  component?: string;
  taskId?: string;
  [key: string]: unknown;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isTestEnvironment(): boolean {
  return process.env.VITEST === 'true' || process.env.NODE_ENV === 'test';
}

// =============================================================================
// Logger Factory
// =============================================================================

/**
 * Create a configured pino logger instance
 */
function createPinoLogger(options: LoggerOptions = {}): PinoLogger {
  // Default to 'warn' so library consumers are not flooded with info logs
  const envLevel = process.env.LOG_LEVEL;
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'warn');
  const pretty = options.pretty ?? (process.env.NODE_ENV !== 'production' && !isTestEnvironment());

  const pinoOptions: PinoOptions = {
    level,
    name: options.name ?? 'tasklist',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        host: bindings.hostname,
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

let rootPino: PinoLogger | null = null;

function getRootPino(): PinoLogger {
  if (!rootPino) {
    rootPino = createPinoLogger();
  }
  return rootPino;
}

// =============================================================================
// Logger Wrapper Class
// =============================================================================

/**
 * Thin wrapper over pino.
 *
 * The underlying pino child is resolved against the current root on use, so
 * loggers created at module load pick up a later `configureLogging` call.
 */
export class Logger {
  private readonly context: LogContext;
  private resolved: { root: PinoLogger; pino: PinoLogger } | null = null;

  constructor(context: LogContext = {}) {
    this.context = context;
  }

  private get pino(): PinoLogger {
    const root = getRootPino();
    let resolved = this.resolved;
    if (!resolved || resolved.root !== root) {
      const bound = Object.keys(this.context).length > 0 ? root.child(this.context) : root;
      resolved = { root, pino: bound };
      this.resolved = resolved;
    }
    return resolved.pino;
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): Logger {
    return new Logger({ ...this.context, ...context });
  }

  trace(msg: string, data?: Record<string, unknown>): void {
    this.pino.trace(data ?? {}, msg);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.pino.debug(data ?? {}, msg);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.pino.info(data ?? {}, msg);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.pino.warn(data ?? {}, msg);
  }

  /**
   * Log at error level. Accepts either an Error or structured data.
   */
  error(msg: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.pino.error({ err: error }, msg);
    } else {
      this.pino.error(error ?? {}, msg);
    }
  }

  /**
   * Start a timer for performance tracking
   */
  startTimer(label: string): () => void {
    const start = performance.now();
    return () => {
      const duration = performance.now() - start;
      this.debug(`${label} completed`, { durationMs: duration.toFixed(2) });
    };
  }
}

// =============================================================================
// Singleton Logger
// =============================================================================

let defaultLogger: Logger | null = null;

/**
 * Get the default logger instance
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = new Logger();
  }
  return defaultLogger;
}

/**
 * Replace the root pino instance. Existing component loggers follow.
 */
export function configureLogging(options: LoggerOptions): void {
  rootPino = createPinoLogger(options);
}

/**
 * Create a component-specific logger
 */
export function createLogger(component: string, context?: LogContext): Logger {
  return getLogger().child({ component, ...context });
}

/**
 * Reset logging to its defaults (for testing)
 */
export function resetLogger(): void {
  rootPino = null;
  defaultLogger = null;
}
