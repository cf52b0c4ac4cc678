/**
 * Errors Module
 *
 * Standardized error types, factories and the in-memory error log.
 */

export * from './handler';
export * from './types';
export * from './logger';
