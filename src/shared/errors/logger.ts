/**
 * Error Logger
 *
 * Bounded in-memory record of errors that reached the API boundary.
 * Structured output goes through the pino logger; this keeps the
 * recent history readable through ErrorHandler.getLogs.
 */

import { ErrorInfo, AppError, ErrorCategory, ErrorSeverity, ElementErrorCode } from './types';

/**
 * Error logger class for managing error logs
 */
export class ErrorLogger {
  private static logs: ErrorInfo[] = [];
  private static maxLogs = 1000;

  /**
   * Record an error
   */
  static logError(error: AppError | Error): void {
    const errorInfo: ErrorInfo = error instanceof AppError
      ? {
          category: error.category,
          severity: error.severity,
          code: error.code,
          userMessage: error.userMessage,
          technicalDetails: error.technicalDetails,
          timestamp: error.timestamp,
          context: error.context,
          recoverable: error.recoverable
        }
      : {
          category: ErrorCategory.UNEXPECTED,
          severity: ErrorSeverity.CRITICAL,
          code: ElementErrorCode.UNEXPECTED,
          userMessage: 'An unexpected error occurred',
          technicalDetails: error.message,
          timestamp: new Date(),
          recoverable: false
        };

    this.logs.push(errorInfo);

    // Keep only the most recent logs
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }
  }

  /**
   * Get all logged errors
   */
  static getLogs(): ErrorInfo[] {
    return [...this.logs];
  }

  /**
   * Clear error logs
   */
  static clearLogs(): void {
    this.logs = [];
  }
}
