/**
 * Error handling middleware - provides centralized error handling for the API.
 * Maps element errors to status codes, formats error responses,
 * and handles structured logging of server-side errors.
 */

import { Request, Response, NextFunction } from 'express';
import { AppError, ElementErrorCode, ErrorHandler } from '../../shared/errors';
import { logger, serializeError } from '../logger';
import { config } from '../config';

/**
 * Custom error class for API errors with status codes
 */
export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

const STATUS_BY_CODE: Record<ElementErrorCode, number> = {
  [ElementErrorCode.MALFORMED_TOKEN]: 400,
  [ElementErrorCode.UNSUPPORTED_ELEMENT_TYPE]: 400,
  [ElementErrorCode.EMPTY_CONTENT]: 400,
  [ElementErrorCode.INVALID_LINK]: 400,
  [ElementErrorCode.INVALID_PAYLOAD]: 400,
  [ElementErrorCode.NOT_FOUND]: 404,
  [ElementErrorCode.ALREADY_EXISTS]: 409,
  [ElementErrorCode.CANNOT_RENAME]: 409,
  [ElementErrorCode.WRITE_ERROR]: 500,
  [ElementErrorCode.MALFORMED_METADATA]: 500,
  [ElementErrorCode.UNEXPECTED]: 500,
  [ElementErrorCode.CONFIGURATION]: 503,
};

export function statusForError(err: Error): number {
  if (err instanceof ApiError) {
    return err.statusCode;
  }
  if (err instanceof AppError) {
    return STATUS_BY_CODE[err.code];
  }
  return 500;
}

/**
 * Centralized error handler middleware
 * Logs errors with full context and returns appropriate responses
 */
export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  const statusCode = statusForError(err);
  const isClientError = statusCode >= 400 && statusCode < 500;
  const isServerError = statusCode >= 500;
  const code = err instanceof ApiError || err instanceof AppError ? err.code : undefined;

  const errorContext = {
    err: serializeError(err),
    requestId: req.id,
    method: req.method,
    path: req.path,
    userId: req.user?.id,
    statusCode,
    ...(code && { errorCode: code }),
  };

  if (isServerError) {
    logger.error(errorContext, `Request failed: ${err.message}`);
    ErrorHandler.logError(err);
  } else if (isClientError) {
    logger.warn(errorContext, `Client error: ${err.message}`);
  }

  // Element errors carry a message meant for the user, whatever the status
  const response: Record<string, unknown> = {
    error: err instanceof AppError
      ? err.userMessage
      : isServerError ? 'Internal Server Error' : err.message,
  };

  if (code) {
    response.code = code;
  }

  if (config.server.isDevelopment) {
    response.message = err instanceof AppError ? err.technicalDetails : err.message;
    response.stack = err.stack;
  }

  if (err instanceof ApiError && err.details && config.server.isDevelopment) {
    response.details = err.details;
  }

  res.status(statusCode).json(response);
};

/**
 * Async handler wrapper to catch errors in async route handlers
 * Forwards errors to the error handling middleware
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
