/**
 * Metadata Normalizer
 *
 * Converts whatever a backend reports about a path into the single shape
 * the element layer works with.
 */

import { posix } from 'path';
import { lookup } from 'mime-types';
import { ErrorHandler } from '../errors';
import type { StorageMetadata } from '../storage';

export const DEFAULT_MIMETYPE = 'application/octet-stream';
export const DIRECTORY_MIMETYPE = 'directory';

export interface NormalizedMetadata {
  /** Last modification, unix seconds */
  timestamp: number;
  size: number;
  mimetype: string;
  type: 'file' | 'dir';
  path: string;
}

function toWholeNumber(value: number, field: string, path: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw ErrorHandler.createMalformedMetadataError(`Invalid ${field} "${value}" for ${path}`, { path, field });
  }
  return Math.floor(value);
}

/**
 * Fill backend gaps with defaults. An explicit `path` wins over the one in
 * the raw metadata (some backends report paths relative to their own root).
 *
 * @throws AppError MALFORMED_METADATA when no path is known or a number is invalid
 */
export function standardize(raw: Partial<StorageMetadata>, path?: string): NormalizedMetadata {
  const resolvedPath = path ?? raw.path;
  if (!resolvedPath) {
    throw ErrorHandler.createMalformedMetadataError('Metadata has no path');
  }

  const type = raw.type ?? 'file';
  const mimetype = raw.mimetype
    || (type === 'dir' ? DIRECTORY_MIMETYPE : lookup(resolvedPath) || DEFAULT_MIMETYPE);

  return {
    timestamp: toWholeNumber(raw.timestamp ?? 0, 'timestamp', resolvedPath),
    size: toWholeNumber(raw.size ?? 0, 'size', resolvedPath),
    mimetype,
    type,
    path: resolvedPath,
  };
}

export function basenameOf(path: string): string {
  return posix.basename(path);
}
