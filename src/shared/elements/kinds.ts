/**
 * Element Type Registry
 *
 * Closed set of element kinds, each a behaviour table resolved once by
 * extension. Exactly one kind claims any given extension.
 */

import { z } from 'zod';
import { ErrorHandler } from '../errors';
import { splitExtension } from './basename';

export type ElementType = 'image' | 'note' | 'link' | 'colors';

export interface ElementKind {
  readonly type: ElementType;
  /** Lower-case extensions claimed by this kind */
  readonly extensions: readonly string[];
  /** Whether reads attach the file content to the element */
  readonly loadsContent: boolean;
  /** Stored bytes to the element's content representation */
  parseContent(raw: Buffer): string;
  /**
   * Submitted textual content to the bytes to store
   * @throws AppError INVALID_LINK / INVALID_PAYLOAD
   */
  formatContent(content: string): Buffer;
}

const LinkUrlSchema = z
  .string()
  .trim()
  .url()
  .refine(url => /^https?:\/\//i.test(url), 'Only http and https links are supported');

const HEX_COLOR = /^#?([0-9a-f]{6})$/i;

const imageKind: ElementKind = {
  type: 'image',
  extensions: ['jpg', 'jpeg', 'png', 'gif', 'webp'],
  loadsContent: false,
  parseContent: raw => raw.toString('base64'),
  formatContent: () => {
    throw ErrorHandler.createInvalidPayloadError('Image content must be uploaded as a file', { field: 'content' });
  },
};

const noteKind: ElementKind = {
  type: 'note',
  extensions: ['txt', 'md'],
  loadsContent: true,
  parseContent: raw => raw.toString('utf-8'),
  formatContent: content => Buffer.from(content, 'utf-8'),
};

/**
 * Links are stored as internet shortcut files:
 *
 *   [InternetShortcut]
 *   URL=https://example.com
 */
const linkKind: ElementKind = {
  type: 'link',
  extensions: ['link'],
  loadsContent: true,
  parseContent: raw => {
    const text = raw.toString('utf-8');
    const match = /^URL=(.*)$/m.exec(text);
    return (match ? match[1] : text).trim();
  },
  formatContent: content => {
    const result = LinkUrlSchema.safeParse(content);
    if (!result.success) {
      throw ErrorHandler.createInvalidLinkError(content);
    }
    return Buffer.from(`[InternetShortcut]\nURL=${result.data}\n`, 'utf-8');
  },
};

/**
 * Palettes: one lower-case `#rrggbb` per line
 */
const colorsKind: ElementKind = {
  type: 'colors',
  extensions: ['colors'],
  loadsContent: true,
  parseContent: raw => raw
    .toString('utf-8')
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .join('\n'),
  formatContent: content => {
    const colors = content.split(/[\s,;]+/).filter(value => value.length > 0);
    const normalized = colors.map(value => {
      const match = HEX_COLOR.exec(value);
      if (!match) {
        throw ErrorHandler.createInvalidPayloadError(`Invalid color "${value}"`, { field: 'content' });
      }
      return `#${match[1].toLowerCase()}`;
    });
    return Buffer.from(normalized.join('\n'), 'utf-8');
  },
};

export const ELEMENT_KINDS = {
  image: imageKind,
  note: noteKind,
  link: linkKind,
  colors: colorsKind,
} as const satisfies Record<ElementType, ElementKind>;

const KIND_BY_EXTENSION: ReadonlyMap<string, ElementKind> = (() => {
  const map = new Map<string, ElementKind>();
  for (const kind of Object.values(ELEMENT_KINDS)) {
    for (const extension of kind.extensions) {
      const claimed = map.get(extension);
      if (claimed) {
        throw new Error(`Extension "${extension}" is claimed by both ${claimed.type} and ${kind.type}`);
      }
      map.set(extension, kind);
    }
  }
  return map;
})();

/**
 * @throws AppError UNSUPPORTED_ELEMENT_TYPE
 */
export function resolveKindByExtension(extension: string): ElementKind {
  const kind = KIND_BY_EXTENSION.get(extension.toLowerCase());
  if (!kind) {
    throw ErrorHandler.createUnsupportedTypeError(extension);
  }
  return kind;
}

/**
 * Resolve from a basename (anything with a dot) or a bare extension
 *
 * @throws AppError UNSUPPORTED_ELEMENT_TYPE
 */
export function resolveKind(basenameOrExtension: string): ElementKind {
  const extension = basenameOrExtension.includes('.')
    ? splitExtension(basenameOrExtension).extension
    : basenameOrExtension;
  return resolveKindByExtension(extension);
}

/**
 * Kind of a stored file. Unlike resolveKind, a name without a dot has
 * no extension rather than being one.
 *
 * @throws AppError UNSUPPORTED_ELEMENT_TYPE
 */
export function resolveKindForBasename(basename: string): ElementKind {
  return resolveKindByExtension(splitExtension(basename).extension);
}

export function shouldLoadContent(kind: ElementKind): boolean {
  return kind.loadsContent;
}

export function getSupportedExtensions(): string[] {
  return Array.from(KIND_BY_EXTENSION.keys());
}
