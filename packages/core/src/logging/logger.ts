/**
 * Logging
 *
 * Thin wrapper around a winston root logger. Each Logger is bound to a component name
 * (e.g. "merge", "reconcile.probe") that is written as a `component` field on every entry.
 *
 * Usage:
 *   const logger = getLogger('merge');
 *   logger.warn('Dependency divergence', { name: 'bundle-1' });
 */

import winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';
export type LogFormat = 'text' | 'json';

const LOG_LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3
};

export function parseLogLevel(value: string | undefined): LogLevel {
  const lowered = value?.trim().toLowerCase();
  return lowered === 'error' || lowered === 'warn' || lowered === 'info' || lowered === 'debug' ? lowered : 'info';
}

export class Logger {
  constructor(
    private readonly component: string,
    private readonly winstonLogger: winston.Logger
  ) {}

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.logAt('debug', message, undefined, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.logAt('info', message, undefined, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.logAt('warn', message, undefined, metadata);
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.logAt('error', message, error, metadata);
  }

  /** e.g. `getLogger('reconcile').child('probe')` logs as "reconcile.probe". */
  child(subComponent: string): Logger {
    return new Logger(`${this.component}.${subComponent}`, this.winstonLogger);
  }

  getComponent(): string {
    return this.component;
  }

  private logAt(level: LogLevel, message: string, error?: Error, metadata?: Record<string, unknown>): void {
    const meta: Record<string, unknown> = { component: this.component, ...metadata };
    if (error) {
      meta.error = error.message;
      if (error.stack) meta.errorStack = error.stack;
    }
    this.winstonLogger.log(level, message, meta);
  }
}

function textFormat(): winston.Logform.Format {
  return winston.format.printf((info) => {
    const level = info.level.toUpperCase().padStart(5);
    const component = typeof info.component === 'string' ? ` [${info.component}]` : '';
    return `${level} ${new Date().toISOString()}${component} ${String(info.message)}`;
  });
}

export interface LoggingOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** Replaces the default console transport. */
  transports?: winston.transport[];
}

let rootLogger: winston.Logger | null = null;
const loggerCache = new Map<string, Logger>();

/**
 * Initializes (or re-initializes) the root logger. Optional: {@link getLogger} lazily
 * initializes from `BUNDLEKEEPER_LOG_LEVEL` / `BUNDLEKEEPER_LOG_FORMAT`.
 */
export function initializeLogging(opts: LoggingOptions = {}): winston.Logger {
  const level = opts.level ?? parseLogLevel(process.env.BUNDLEKEEPER_LOG_LEVEL);
  const format = opts.format ?? (process.env.BUNDLEKEEPER_LOG_FORMAT === 'json' ? 'json' : 'text');

  // Logs go to stderr so command output on stdout stays machine-readable.
  const transports = opts.transports ?? [
    new winston.transports.Console({
      format: format === 'json' ? winston.format.combine(winston.format.timestamp(), winston.format.json()) : textFormat(),
      stderrLevels: Object.keys(LOG_LEVELS)
    })
  ];

  const root = winston.createLogger({
    levels: LOG_LEVELS,
    level,
    transports,
    exitOnError: false
  });
  rootLogger = root;

  for (const component of loggerCache.keys()) {
    loggerCache.set(component, new Logger(component, root));
  }
  return root;
}

function ensureRoot(): winston.Logger {
  return rootLogger ?? initializeLogging();
}

export function getLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) return cached;

  const logger = new Logger(component, ensureRoot());
  loggerCache.set(component, logger);
  return logger;
}

export function setLogLevel(level: LogLevel): void {
  ensureRoot().level = level;
}
