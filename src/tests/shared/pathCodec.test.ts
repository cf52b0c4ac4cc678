import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { decodeToken, encodeToken, isValidToken } from '../../shared/elements/pathCodec';
import { AppError, ElementErrorCode } from '../../shared/errors';

describe('PathCodec', () => {
  describe('encodeToken', () => {
    it('should produce unpadded base64url', () => {
      expect(encodeToken('/albums/trip')).toBe('L2FsYnVtcy90cmlw');
      expect(encodeToken('Café #food.md')).toBe('Q2Fmw6kgI2Zvb2QubWQ');
      expect(encodeToken('a')).toBe('YQ');
      expect(encodeToken('')).toBe('');
    });
  });

  describe('decodeToken', () => {
    it('should decode canonical tokens', () => {
      expect(decodeToken('cGhvdG8uanBn')).toBe('photo.jpg');
      expect(decodeToken('YWI')).toBe('ab');
    });

    it.each([
      ['padding', 'YQ=='],
      ['standard base64 alphabet', 'a+b/'],
      ['impossible length', 'YWJjZ'],
      ['non-canonical trailing bits', 'YR'],
      ['bytes that are not UTF-8', '_w'],
      ['whitespace', 'YW I'],
    ])('should reject %s with MALFORMED_TOKEN', (_label, token) => {
      expect(isValidToken(token)).toBe(false);
      expect(() => decodeToken(token)).toThrow(AppError);
      try {
        decodeToken(token);
      } catch (error) {
        expect(error instanceof AppError && error.code).toBe(ElementErrorCode.MALFORMED_TOKEN);
      }
    });
  });

  describe('Property: encoding is reversible', () => {
    it('should decode every encoded string back to itself', () => {
      fc.assert(
        fc.property(fc.fullUnicodeString(), raw => {
          expect(decodeToken(encodeToken(raw))).toBe(raw);
        }),
        { numRuns: 200 }
      );
    });

    it('should only emit URL path segment characters', () => {
      fc.assert(
        fc.property(fc.fullUnicodeString(), raw => {
          const token = encodeToken(raw);
          expect(token).toMatch(/^[A-Za-z0-9_-]*$/);
          expect(isValidToken(token)).toBe(true);
        }),
        { numRuns: 200 }
      );
    });
  });
});
