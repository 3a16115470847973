/**
 * Structured Logging
 * ==================
 * Winston behind a small namespaced `Logger`. Settings come from the
 * environment (see `getLoggingSettings`); secrets in log context are redacted
 * before any transport sees them.
 */

import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';
import { getLoggingSettings, type LoggingSettings } from './config/index.js';

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
  TRACE = 'trace',
}

export interface LogContext {
  runId?: string;
  strategyId?: string;
  symbol?: string;
  broker?: string;
  stage?: string;
  [key: string]: unknown;
}

const REDACTED = '[REDACTED]';
const SECRET_KEY = /api[_-]?key|secret|password|token|authorization/i;

function redactValue(value: unknown, depth: number): unknown {
  if (depth > 3 || typeof value !== 'object' || value === null) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, depth + 1));
  }
  return Object.fromEntries(
    Object.entries(value).map(([key, inner]) => [key, SECRET_KEY.test(key) ? REDACTED : redactValue(inner, depth + 1)])
  );
}

/**
 * Replace values under secret-looking keys, at any depth up to 3
 */
export const redactSecrets = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key === 'level' || key === 'message') continue;
    info[key] = SECRET_KEY.test(key) ? REDACTED : redactValue(info[key], 1);
  }
  return info;
});

const structuredFormat = winston.format.combine(
  redactSecrets(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  redactSecrets(),
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
    return `[${String(timestamp)}] ${level}: ${String(message)}${metaStr ? '\n' + metaStr : ''}`;
  })
);

/**
 * Console plus daily-rotated error and combined files, as the settings allow
 */
export function buildTransports(settings: LoggingSettings): winston.transport[] {
  const transports: winston.transport[] = [];

  if (settings.console) {
    transports.push(
      new winston.transports.Console({
        format: settings.json ? structuredFormat : consoleFormat,
        level: settings.level === 'trace' ? 'debug' : settings.level,
      })
    );
  }

  if (settings.file) {
    fs.mkdirSync(settings.dir, { recursive: true });
    const rotation = {
      datePattern: 'YYYY-MM-DD',
      format: structuredFormat,
      maxSize: settings.maxSize,
      maxFiles: settings.maxFiles,
      zippedArchive: true,
    };
    transports.push(
      new DailyRotateFile({ ...rotation, filename: path.join(settings.dir, 'error-%DATE%.log'), level: 'error' }),
      new DailyRotateFile({ ...rotation, filename: path.join(settings.dir, 'combined-%DATE%.log') })
    );
  }

  return transports;
}

const settings = getLoggingSettings();
const transports = buildTransports(settings);

const winstonLogger = winston.createLogger({
  // winston has no trace level; trace lines go out as debug
  level: settings.level === 'trace' ? 'debug' : settings.level,
  format: structuredFormat,
  defaultMeta: { service: 'stratgate' },
  transports,
  silent: transports.length === 0,
  exitOnError: false,
});

class Logger {
  private context: LogContext;
  private readonly namespace: string;

  constructor(namespace: string = 'stratgate', context: LogContext = {}) {
    this.namespace = namespace;
    this.context = { ...context };
  }

  /**
   * Add context included in every later message
   */
  setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  getContext(): LogContext {
    return { ...this.context };
  }

  getNamespace(): string {
    return this.namespace;
  }

  private mergeContext(additionalContext?: LogContext): LogContext {
    return {
      namespace: this.namespace,
      ...this.context,
      ...additionalContext,
    };
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    const logContext = this.mergeContext(context);

    if (error instanceof Error) {
      winstonLogger.error(message, {
        ...logContext,
        error: { message: error.message, stack: error.stack, name: error.name },
      });
    } else if (error !== undefined && error !== null) {
      winstonLogger.error(message, { ...logContext, error });
    } else {
      winstonLogger.error(message, logContext);
    }
  }

  warn(message: string, context?: LogContext): void {
    winstonLogger.warn(message, this.mergeContext(context));
  }

  info(message: string, context?: LogContext): void {
    winstonLogger.info(message, this.mergeContext(context));
  }

  debug(message: string, context?: LogContext): void {
    winstonLogger.debug(message, this.mergeContext(context));
  }

  trace(message: string, context?: LogContext): void {
    winstonLogger.debug(message, { ...this.mergeContext(context), level: 'trace' });
  }

  /**
   * Same namespace, context extended; the parent is unaffected
   */
  child(context: LogContext): Logger {
    return new Logger(this.namespace, { ...this.context, ...context });
  }
}

export function createLogger(namespace: string): Logger {
  return new Logger(namespace);
}

export const logger = new Logger('stratgate');

export { Logger, winstonLogger };
