/**
 * @fileoverview Structured logger for the curation pipeline, backed by pino.
 * Output goes to stderr so that nothing written to stdout is ever interleaved
 * with log lines.
 * @module src/utils/internal/logger
 */
import pino from 'pino';

import { config, type AppConfig } from '@/config/index.js';

export type LogLevel = AppConfig['logLevel'];

/**
 * Arbitrary structured fields attached to a log line. A spread
 * {@link RequestContext} is the usual starting point.
 */
export type LogContext = Record<string, unknown>;

const PINO_LEVELS: Record<LogLevel, pino.LevelWithSilent> = {
  debug: 'debug',
  info: 'info',
  notice: 'info',
  warning: 'warn',
  error: 'error',
  silent: 'silent',
};

function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return error;
}

/**
 * Thin wrapper that keeps the `(message, context)` call shape used across the
 * codebase and maps `notice`/`warning` onto pino's numeric levels.
 */
export class Logger {
  private readonly pinoLogger: pino.Logger;

  constructor(level: LogLevel) {
    this.pinoLogger = pino(
      {
        level: PINO_LEVELS[level],
        base: { service: 'mhc-affinity-curation' },
        timestamp: pino.stdTimeFunctions.isoTime,
        formatters: {
          level: (label) => ({ level: label }),
        },
      },
      pino.destination(2),
    );
  }

  debug(message: string, context?: LogContext): void {
    this.pinoLogger.debug(this.prepare(context), message);
  }

  info(message: string, context?: LogContext): void {
    this.pinoLogger.info(this.prepare(context), message);
  }

  notice(message: string, context?: LogContext): void {
    this.pinoLogger.info({ ...this.prepare(context), notice: true }, message);
  }

  warning(message: string, context?: LogContext): void {
    this.pinoLogger.warn(this.prepare(context), message);
  }

  error(message: string, context?: LogContext): void {
    this.pinoLogger.error(this.prepare(context), message);
  }

  private prepare(context?: LogContext): LogContext {
    if (!context) return {};
    if (!('error' in context)) return context;
    return { ...context, error: serializeError(context.error) };
  }
}

export const logger = new Logger(config.logLevel);
