/**
 * Error Types
 *
 * Type definitions for error codes and error structures.
 * Shared by the element services, the storage adapters and the HTTP layer.
 */

/**
 * Error categories for different types of failures
 */
export enum ErrorCategory {
  REQUEST = 'REQUEST',
  ELEMENT = 'ELEMENT',
  STORAGE = 'STORAGE',
  VALIDATION = 'VALIDATION',
  CONFIGURATION = 'CONFIGURATION',
  UNEXPECTED = 'UNEXPECTED'
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

/**
 * Backend-agnostic failure kinds surfaced by the element layer
 */
export enum ElementErrorCode {
  MALFORMED_TOKEN = 'MALFORMED_TOKEN',
  UNSUPPORTED_ELEMENT_TYPE = 'UNSUPPORTED_ELEMENT_TYPE',
  NOT_FOUND = 'NOT_FOUND',
  ALREADY_EXISTS = 'ALREADY_EXISTS',
  EMPTY_CONTENT = 'EMPTY_CONTENT',
  WRITE_ERROR = 'WRITE_ERROR',
  CANNOT_RENAME = 'CANNOT_RENAME',
  CONFIGURATION = 'CONFIGURATION',
  INVALID_LINK = 'INVALID_LINK',
  INVALID_PAYLOAD = 'INVALID_PAYLOAD',
  MALFORMED_METADATA = 'MALFORMED_METADATA',
  UNEXPECTED = 'UNEXPECTED'
}

/**
 * Structured error information
 */
export interface ErrorInfo {
  category: ErrorCategory;
  severity: ErrorSeverity;
  code: ElementErrorCode;
  userMessage: string;
  technicalDetails: string;
  timestamp: Date;
  context?: Record<string, unknown>;
  recoverable: boolean;
}

/**
 * Custom error class with additional context
 */
export class AppError extends Error {
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly code: ElementErrorCode;
  public readonly userMessage: string;
  public readonly technicalDetails: string;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;
  public readonly recoverable: boolean;

  constructor(info: ErrorInfo) {
    super(info.userMessage);
    this.name = 'AppError';
    this.category = info.category;
    this.severity = info.severity;
    this.code = info.code;
    this.userMessage = info.userMessage;
    this.technicalDetails = info.technicalDetails;
    this.timestamp = info.timestamp;
    this.context = info.context;
    this.recoverable = info.recoverable;
  }
}
