/**
 * Path Codec
 *
 * Reversible transport encoding for collection paths, basenames and tag
 * names: UTF-8 bytes as unpadded base64url. Tokens are safe in a single
 * URL path segment.
 */

import { ErrorHandler } from '../errors';

const TOKEN_PATTERN = /^[A-Za-z0-9_-]*$/;

export function encodeToken(raw: string): string {
  return Buffer.from(raw, 'utf-8').toString('base64url');
}

/**
 * A token is valid when it uses the base64url alphabet, has a length a
 * base64 encoder can produce, and re-encodes to itself. The last rule
 * rejects non-canonical trailing bits and byte sequences that are not UTF-8.
 */
export function isValidToken(token: string): boolean {
  if (!TOKEN_PATTERN.test(token) || token.length % 4 === 1) {
    return false;
  }
  return encodeToken(Buffer.from(token, 'base64url').toString('utf-8')) === token;
}

/**
 * @throws AppError MALFORMED_TOKEN
 */
export function decodeToken(token: string): string {
  if (!isValidToken(token)) {
    throw ErrorHandler.createMalformedTokenError(token);
  }
  return Buffer.from(token, 'base64url').toString('utf-8');
}
