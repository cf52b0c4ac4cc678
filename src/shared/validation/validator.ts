/**
 * Validator Utilities
 *
 * Validates incoming element payloads and tag names with Zod.
 */

import { z } from 'zod';
import { ErrorHandler } from '../errors';
import { ValidationResult, ValidationError } from './types';
import { ElementPayload, ElementPayloadSchema, TagNameSchema } from './schemas';

function toValidationErrors(error: z.ZodError): ValidationError[] {
  return error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message
  }));
}

/**
 * Element Payload Validator
 * The form-validation step in front of element create and update
 */
export class ElementPayloadValidator {
  /**
   * @returns Validation result with specific errors for each invalid field
   */
  validate(input: unknown): ValidationResult {
    const result = ElementPayloadSchema.safeParse(input);

    if (result.success) {
      return {
        isValid: true,
        errors: []
      };
    }

    return {
      isValid: false,
      errors: toValidationErrors(result.error)
    };
  }

  /**
   * @throws AppError INVALID_PAYLOAD listing every field error
   */
  parse(input: unknown): ElementPayload {
    const result = ElementPayloadSchema.safeParse(input);
    if (!result.success) {
      const errors = toValidationErrors(result.error);
      throw ErrorHandler.createInvalidPayloadError(
        errors.map(e => `${e.field || 'payload'}: ${e.message}`).join('; '),
        { errors }
      );
    }
    return result.data;
  }

  /**
   * @throws AppError INVALID_PAYLOAD
   */
  parseTagName(input: unknown): string {
    const result = TagNameSchema.safeParse(input);
    if (!result.success) {
      const errors = toValidationErrors(result.error);
      throw ErrorHandler.createInvalidPayloadError(
        errors.map(e => e.message).join('; '),
        { errors }
      );
    }
    return result.data;
  }
}

export const elementPayloadValidator = new ElementPayloadValidator();
