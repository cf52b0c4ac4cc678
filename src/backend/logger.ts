/**
 * Logger Configuration
 *
 * One pino root logger for the collection service. Development gets
 * pino-pretty output; everything else writes JSON lines.
 *
 * Element payloads may carry note text and base64 uploads, so those
 * fields are removed before a line is written.
 *
 * Usage:
 *   import { loggers } from './logger';
 *   loggers.elements.info({ collectionPath, basename }, 'Element created');
 */

import pino, { Logger, LoggerOptions } from 'pino';
import { config } from './config';
import { AppError } from '../shared/errors';
import { StorageError } from '../shared/storage/interface';

export interface LoggerEnvironment {
  level: string;
  nodeEnv: string;
  isDevelopment: boolean;
}

/**
 * Fields never written to the log
 */
export const REDACT_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'res.headers["set-cookie"]',
  'payload.content',
  'payload.file.data',
  '*.payload.content',
  '*.payload.file.data',
  'token',
  '*.token',
];

export function createLoggerOptions(env: LoggerEnvironment): LoggerOptions {
  const options: LoggerOptions = {
    level: env.level,
    base: { pid: process.pid, env: env.nodeEnv },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, remove: true },
  };

  if (env.isDevelopment) {
    return {
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid,hostname,env',
          messageFormat: '{component} {msg}',
        },
      },
    };
  }

  return {
    ...options,
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({ pid: bindings.pid, host: bindings.hostname, env: env.nodeEnv }),
    },
  };
}

export const logger: Logger = pino(
  createLoggerOptions({
    level: config.logging.level,
    nodeEnv: config.server.nodeEnv,
    isDevelopment: config.server.isDevelopment,
  })
);

export function createComponentLogger(component: string): Logger {
  return logger.child({ component });
}

export const loggers = {
  /** Request/response lines from pino-http */
  http: createComponentLogger('http'),
  /** JWT checks */
  auth: createComponentLogger('auth'),
  /** Adapter selection and backend lifecycle */
  storage: createComponentLogger('storage'),
  /** Collection element operations */
  elements: createComponentLogger('elements'),
  /** Collection tag operations */
  tags: createComponentLogger('tags'),
};

/**
 * Structured form of an error for the `err` field
 *
 * AppError keeps its element code and technical details; StorageError its
 * adapter code and path. Stacks are only included in development.
 */
export function serializeError(err: unknown): Record<string, unknown> {
  const stack = (error: Error) => (config.server.isDevelopment ? error.stack : undefined);

  if (err instanceof AppError) {
    return {
      type: 'AppError',
      code: err.code,
      category: err.category,
      severity: err.severity,
      message: err.technicalDetails,
      context: err.context,
      stack: stack(err),
    };
  }
  if (err instanceof StorageError) {
    return { type: 'StorageError', code: err.code, path: err.path, message: err.message, stack: stack(err) };
  }
  if (err instanceof Error) {
    return { type: err.name, message: err.message, stack: stack(err) };
  }
  return { message: String(err) };
}

/**
 * Log a startup failure and exit
 */
export function logFatal(err: unknown, message: string, exitCode = 1): void {
  logger.fatal({ err: serializeError(err) }, message);
  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}
