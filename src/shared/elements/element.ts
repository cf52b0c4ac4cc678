/**
 * Typed Elements
 *
 * An element is one file of a collection, built per request from
 * normalized backend metadata and never persisted.
 */

import { ErrorHandler } from '../errors';
import { parseBasename, splitExtension } from './basename';
import { ElementKind, ElementType, resolveKindForBasename } from './kinds';
import { basenameOf, NormalizedMetadata } from './metadata';
import { encodeToken } from './pathCodec';

export interface Element {
  type: ElementType;
  name: string;
  tags: string[];
  updated: Date;
  size: number;
  /** Lower-case, always one of the kind's extensions */
  extension: string;
  encodedCollectionPath: string;
  encodedElementBasename: string;
  /** Present only for kinds that load content, after a content read */
  content?: string;
  /** Where the raw bytes can be fetched; set by the transport layer */
  fileUrl?: string;
}

/**
 * Build the element for `kind` from normalized metadata
 *
 * @throws AppError UNSUPPORTED_ELEMENT_TYPE if the file's extension is not the kind's
 */
export function construct(kind: ElementKind, meta: NormalizedMetadata, encodedCollectionPath: string): Element {
  const basename = basenameOf(meta.path);
  const extension = splitExtension(basename).extension.toLowerCase();
  if (!kind.extensions.includes(extension)) {
    throw ErrorHandler.createUnsupportedTypeError(extension, { kind: kind.type, path: meta.path });
  }

  const { name, tags } = parseBasename(basename);

  return {
    type: kind.type,
    name,
    tags,
    updated: new Date(meta.timestamp * 1000),
    size: meta.size,
    extension,
    encodedCollectionPath,
    encodedElementBasename: encodeToken(basename),
  };
}

/**
 * Resolve the kind from the file name, then construct
 *
 * @throws AppError UNSUPPORTED_ELEMENT_TYPE
 */
export function createElement(meta: NormalizedMetadata, encodedCollectionPath: string): { kind: ElementKind; element: Element } {
  const kind = resolveKindForBasename(basenameOf(meta.path));
  return { kind, element: construct(kind, meta, encodedCollectionPath) };
}

export function setElementContent(element: Element, kind: ElementKind, raw: Buffer): void {
  element.content = kind.parseContent(raw);
}
