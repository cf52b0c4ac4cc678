/**
 * Validation Schemas
 *
 * Zod schemas for element payloads submitted by clients.
 */

import { z } from 'zod';

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Tag names travel inside basenames, so they cannot contain the
 * separators the basename parser relies on.
 */
export const TagNameSchema = z
  .string()
  .trim()
  .min(1, 'Tag cannot be empty')
  .max(100, 'Tag cannot exceed 100 characters')
  .refine(tag => !/[\s#/\\:*?"<>|]/.test(tag), 'Tag cannot contain whitespace, # or path characters');

export const ElementNameSchema = z
  .string()
  .trim()
  .min(1, 'Name cannot be empty or whitespace only')
  .max(200, 'Name cannot exceed 200 characters')
  .refine(name => !/(^|\s)#/.test(name), 'Name cannot contain a word starting with #');

export const ExtensionSchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z0-9]{1,16}$/, 'Extension must be alphanumeric');

/**
 * An uploaded file: its original name and base64 encoded bytes
 */
export const UploadedFileSchema = z.object({
  fileName: z.string().trim().min(1, 'File name is required').max(255),
  data: z.string().regex(BASE64, 'File data must be base64 encoded'),
});

/**
 * Element create/update form
 *
 * Bytes come either from `file` or from textual `content` (notes, link
 * URLs, color palettes), never both.
 */
export const ElementPayloadSchema = z
  .object({
    name: ElementNameSchema.optional(),
    tags: z.array(TagNameSchema).max(50, 'At most 50 tags').optional(),
    extension: ExtensionSchema.optional(),
    file: UploadedFileSchema.optional(),
    content: z.string().optional(),
  })
  .refine(payload => !(payload.file && payload.content !== undefined), {
    message: 'Provide either a file or content, not both',
    path: ['content'],
  });

export type ElementPayload = z.infer<typeof ElementPayloadSchema>;
export type UploadedFile = z.infer<typeof UploadedFileSchema>;
