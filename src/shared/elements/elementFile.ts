/**
 * Element Files
 *
 * ElementFile is the editable view of an element: create and update
 * fill one from a payload, batch renames hand one to a transform. Its
 * cleaned basename is where the element is (re)written.
 */

import { ErrorHandler } from '../errors';
import type { ElementPayload } from '../validation';
import { buildBasename, parseBasename, ParsedBasename } from './basename';
import type { Element } from './element';
import { ElementKind, resolveKindByExtension } from './kinds';
import { decodeToken } from './pathCodec';

export class ElementFile {
  name: string;
  tags: string[];
  extension: string;
  /** Bytes to store; undefined leaves stored content untouched */
  content?: Buffer;
  private readonly basename?: string;

  constructor(init: ParsedBasename, basename?: string) {
    this.name = init.name;
    this.tags = [...init.tags];
    this.extension = init.extension;
    this.basename = basename;
  }

  static fromBasename(basename: string): ElementFile {
    return new ElementFile(parseBasename(basename), basename);
  }

  static fromElement(element: Element): ElementFile {
    return ElementFile.fromBasename(decodeToken(element.encodedElementBasename));
  }

  /**
   * The basename this file was read from, if any
   */
  getBasename(): string | undefined {
    return this.basename;
  }

  /**
   * @throws AppError INVALID_PAYLOAD when neither a name nor a tag remains
   */
  getCleanedBasename(): string {
    const basename = buildBasename(this);
    if (basename.startsWith('.') || basename === '') {
      throw ErrorHandler.createInvalidPayloadError('Element needs a name or at least one tag', {
        basename: this.basename,
      });
    }
    return basename;
  }

  /**
   * @throws AppError UNSUPPORTED_ELEMENT_TYPE
   */
  getKind(): ElementKind {
    return resolveKindByExtension(this.extension);
  }

  hasTag(tag: string): boolean {
    return this.tags.includes(tag);
  }

  addTag(tag: string): void {
    if (!this.hasTag(tag)) {
      this.tags.push(tag);
    }
  }

  removeTag(tag: string): void {
    this.tags = this.tags.filter(existing => existing !== tag);
  }

  /**
   * Rename in place; merges into `to` when the file already carries it
   */
  renameTag(from: string, to: string): void {
    if (from === to || !this.hasTag(from)) {
      return;
    }
    if (this.hasTag(to)) {
      this.removeTag(from);
      return;
    }
    this.tags = this.tags.map(tag => (tag === from ? to : tag));
  }
}

export interface ApplyPayloadOptions {
  /**
   * `create` takes name, tags and extension from the uploaded file name
   * and accepts an explicit extension; `update` keeps the stored extension
   * and uses an upload for its bytes only.
   */
  mode: 'create' | 'update';
}

/**
 * Applies a validated payload to an ElementFile
 */
export class ElementFileHandler {
  /**
   * @throws AppError UNSUPPORTED_ELEMENT_TYPE, INVALID_LINK, INVALID_PAYLOAD
   */
  applyPayload(file: ElementFile, payload: ElementPayload, options: ApplyPayloadOptions): ElementFile {
    if (payload.file) {
      file.content = Buffer.from(payload.file.data, 'base64');

      if (options.mode === 'create') {
        const uploaded = parseBasename(payload.file.fileName);
        if (payload.name === undefined && payload.tags === undefined) {
          file.name = uploaded.name;
          file.tags = uploaded.tags;
        }
        file.extension = uploaded.extension;
      }
    }

    if (payload.extension !== undefined && options.mode === 'create') {
      file.extension = payload.extension;
    }
    if (payload.name !== undefined) {
      file.name = payload.name;
    }
    if (payload.tags !== undefined) {
      file.tags = [...payload.tags];
    }

    const kind = file.getKind();

    if (payload.content !== undefined) {
      if (!kind.loadsContent) {
        throw ErrorHandler.createInvalidPayloadError(
          `Textual content is not accepted for ${kind.type} elements`,
          { field: 'content', type: kind.type }
        );
      }
      file.content = kind.formatContent(payload.content);
    }

    return file;
  }
}

export const elementFileHandler = new ElementFileHandler();
