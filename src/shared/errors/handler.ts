/**
 * Error Handler
 *
 * Factories for the element error taxonomy and helpers for narrowing
 * and recording errors. The element layer never retries; every factory
 * produces an error for the immediate caller to translate.
 */

import { AppError, ErrorCategory, ErrorSeverity, ElementErrorCode } from './types';
import { ErrorLogger } from './logger';

type ErrorContext = Record<string, unknown>;

/**
 * Error handler class for managing errors throughout the application
 */
export class ErrorHandler {
  /**
   * An encoded path, basename or tag does not decode
   */
  static createMalformedTokenError(token: string, context?: ErrorContext): AppError {
    return new AppError({
      category: ErrorCategory.REQUEST,
      severity: ErrorSeverity.LOW,
      code: ElementErrorCode.MALFORMED_TOKEN,
      userMessage: 'Badly encoded path or element name',
      technicalDetails: `Token is not valid base64url: "${token}"`,
      timestamp: new Date(),
      context: { token, ...context },
      recoverable: true
    });
  }

  static createUnsupportedTypeError(extension: string, context?: ErrorContext): AppError {
    return new AppError({
      category: ErrorCategory.ELEMENT,
      severity: ErrorSeverity.LOW,
      code: ElementErrorCode.UNSUPPORTED_ELEMENT_TYPE,
      userMessage: 'Element type is not supported',
      technicalDetails: `No element kind claims extension "${extension}"`,
      timestamp: new Date(),
      context: { extension, ...context },
      recoverable: true
    });
  }

  static createNotFoundError(technicalDetails: string, context?: ErrorContext): AppError {
    return new AppError({
      category: ErrorCategory.STORAGE,
      severity: ErrorSeverity.LOW,
      code: ElementErrorCode.NOT_FOUND,
      userMessage: 'Element not found',
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: true
    });
  }

  static createAlreadyExistsError(path: string, context?: ErrorContext): AppError {
    return new AppError({
      category: ErrorCategory.STORAGE,
      severity: ErrorSeverity.LOW,
      code: ElementErrorCode.ALREADY_EXISTS,
      userMessage: 'An element with this name already exists',
      technicalDetails: `Target path already exists: ${path}`,
      timestamp: new Date(),
      context: { path, ...context },
      recoverable: true
    });
  }

  static createEmptyContentError(context?: ErrorContext): AppError {
    return new AppError({
      category: ErrorCategory.VALIDATION,
      severity: ErrorSeverity.LOW,
      code: ElementErrorCode.EMPTY_CONTENT,
      userMessage: 'Element content is empty',
      technicalDetails: 'No bytes were provided where content is required',
      timestamp: new Date(),
      context,
      recoverable: true
    });
  }

  static createWriteError(technicalDetails: string, context?: ErrorContext): AppError {
    return new AppError({
      category: ErrorCategory.STORAGE,
      severity: ErrorSeverity.HIGH,
      code: ElementErrorCode.WRITE_ERROR,
      userMessage: 'The storage backend could not write the element',
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: false
    });
  }

  static createCannotRenameError(technicalDetails: string, context?: ErrorContext): AppError {
    return new AppError({
      category: ErrorCategory.STORAGE,
      severity: ErrorSeverity.MEDIUM,
      code: ElementErrorCode.CANNOT_RENAME,
      userMessage: 'The storage backend could not rename the element',
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: true
    });
  }

  static createConfigurationError(technicalDetails: string, context?: ErrorContext): AppError {
    return new AppError({
      category: ErrorCategory.CONFIGURATION,
      severity: ErrorSeverity.CRITICAL,
      code: ElementErrorCode.CONFIGURATION,
      userMessage: 'No storage backend is configured for this account',
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: false
    });
  }

  static createInvalidLinkError(url: string, context?: ErrorContext): AppError {
    return new AppError({
      category: ErrorCategory.VALIDATION,
      severity: ErrorSeverity.LOW,
      code: ElementErrorCode.INVALID_LINK,
      userMessage: 'Link element content must be a valid URL',
      technicalDetails: `Invalid link URL: "${url}"`,
      timestamp: new Date(),
      context: { url, ...context },
      recoverable: true
    });
  }

  static createInvalidPayloadError(technicalDetails: string, context?: ErrorContext): AppError {
    return new AppError({
      category: ErrorCategory.VALIDATION,
      severity: ErrorSeverity.LOW,
      code: ElementErrorCode.INVALID_PAYLOAD,
      userMessage: 'Invalid element data',
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: true
    });
  }

  static createMalformedMetadataError(technicalDetails: string, context?: ErrorContext): AppError {
    return new AppError({
      category: ErrorCategory.STORAGE,
      severity: ErrorSeverity.HIGH,
      code: ElementErrorCode.MALFORMED_METADATA,
      userMessage: 'The storage backend returned unusable metadata',
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: false
    });
  }

  /**
   * Create an unexpected error
   */
  static createUnexpectedError(error: unknown, context?: ErrorContext): AppError {
    const message = error instanceof Error ? error.message : String(error);
    return new AppError({
      category: ErrorCategory.UNEXPECTED,
      severity: ErrorSeverity.CRITICAL,
      code: ElementErrorCode.UNEXPECTED,
      userMessage: 'An unexpected error occurred. Please try again.',
      technicalDetails: message,
      timestamp: new Date(),
      context,
      recoverable: false
    });
  }

  /**
   * Narrow an unknown error to an AppError, optionally of a given code
   */
  static isElementError(error: unknown, code?: ElementErrorCode): error is AppError {
    return error instanceof AppError && (code === undefined || error.code === code);
  }

  /**
   * Log an error with technical details
   */
  static logError(error: AppError | Error): void {
    ErrorLogger.logError(error);
  }

  /**
   * Get all logged errors
   */
  static getLogs() {
    return ErrorLogger.getLogs();
  }

  /**
   * Clear error logs
   */
  static clearLogs(): void {
    ErrorLogger.clearLogs();
  }

  /**
   * Format error message for display to user
   */
  static formatUserMessage(error: AppError | Error): string {
    if (error instanceof AppError) {
      return error.userMessage;
    }
    return error.message;
  }
}
