/**
 * Validation Module
 *
 * Zod schemas and validators for element payloads.
 */

export * from './validator';
export * from './schemas';
export * from './types';
