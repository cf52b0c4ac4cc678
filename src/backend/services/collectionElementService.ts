/**
 * Collection Element Service
 *
 * CRUD over the typed elements of one collection, bound to the acting
 * user's storage adapter for the length of a request. Tokens in, typed
 * elements and AppErrors out; no StorageError leaves this module.
 */

import type { Logger } from 'pino';
import { AppError, ErrorHandler } from '../../shared/errors';
import {
  createElement,
  decodeToken,
  Element,
  ElementFile,
  ElementFileHandler,
  elementFileHandler,
  NormalizedMetadata,
  resolveKindForBasename,
  setElementContent,
  shouldLoadContent,
  standardize,
} from '../../shared/elements';
import { FilesystemAdapter, isStorageError, StorageMetadata } from '../../shared/storage';
import type { RequestHeaders } from '../../shared/types';
import { ElementPayloadValidator, elementPayloadValidator } from '../../shared/validation';
import { loggers, serializeError } from '../logger';
import { createLoggingTimer, OperationTimer, timed } from './timing';

export interface CollectionElementServiceOptions {
  timer?: OperationTimer;
  logger?: Logger;
  validator?: ElementPayloadValidator;
  fileHandler?: ElementFileHandler;
}

export type ElementContentResult =
  | { status: 'not-modified'; lastModified: Date }
  | { status: 'ok'; content: Buffer; mimetype: string; lastModified: Date; size: number };

export type ElementMatcher = (element: Element) => boolean;
export type ElementTransform = (file: ElementFile, element: Element) => void;

export interface BatchRenameReport {
  renamed: Array<{ from: string; to: string }>;
  /** Matched elements whose basename the transform left as it was */
  unchanged: number;
  failures: Array<{ basename: string; error: AppError }>;
}

type StorageAction = 'read' | 'write' | 'rename';

/**
 * Map a backend failure onto the element taxonomy
 */
function translateStorageError(error: unknown, action: StorageAction, path: string): AppError {
  if (ErrorHandler.isElementError(error)) {
    return error;
  }
  const details = error instanceof Error ? error.message : String(error);

  if (action === 'read' || isStorageError(error, 'NOT_FOUND')) {
    return ErrorHandler.createNotFoundError(details, { path });
  }
  if (action === 'rename') {
    return ErrorHandler.createCannotRenameError(details, { path });
  }
  if (isStorageError(error, 'ALREADY_EXISTS')) {
    return ErrorHandler.createAlreadyExistsError(path);
  }
  return ErrorHandler.createWriteError(details, { path });
}

/**
 * Header names are case-insensitive; the first value wins when repeated
 */
function headerValue(headers: RequestHeaders, name: string): string | undefined {
  const wanted = name.toLowerCase();
  const key = Object.keys(headers).find(candidate => candidate.toLowerCase() === wanted);
  const value = key === undefined ? undefined : headers[key];
  return Array.isArray(value) ? value[0] : value;
}

export class CollectionElementService {
  private readonly timer: OperationTimer;
  private readonly logger: Logger;
  private readonly validator: ElementPayloadValidator;
  private readonly fileHandler: ElementFileHandler;

  constructor(
    private readonly adapter: FilesystemAdapter,
    options: CollectionElementServiceOptions = {}
  ) {
    this.logger = options.logger ?? loggers.elements;
    this.timer = options.timer ?? createLoggingTimer(this.logger);
    this.validator = options.validator ?? elementPayloadValidator;
    this.fileHandler = options.fileHandler ?? elementFileHandler;
  }

  /**
   * Elements of a collection, oldest first. A collection the backend
   * cannot list is empty.
   *
   * @throws AppError MALFORMED_TOKEN
   */
  list(encodedCollectionPath: string): Promise<Element[]> {
    return timed(this.timer, 'collection_element_list', () => this.listElements(encodedCollectionPath));
  }

  /**
   * @throws AppError INVALID_PAYLOAD, UNSUPPORTED_ELEMENT_TYPE, INVALID_LINK,
   *   EMPTY_CONTENT, ALREADY_EXISTS, WRITE_ERROR, NOT_FOUND
   */
  create(encodedCollectionPath: string, input: unknown): Promise<Element> {
    return timed(this.timer, 'collection_element_create', async () => {
      const collectionPath = decodeToken(encodedCollectionPath);
      const payload = this.validator.parse(input);

      const file = this.fileHandler.applyPayload(
        new ElementFile({ name: '', tags: [], extension: '' }),
        payload,
        { mode: 'create' }
      );
      if (!file.content || file.content.length === 0) {
        throw ErrorHandler.createEmptyContentError({ collectionPath });
      }

      const path = `${collectionPath}/${file.getCleanedBasename()}`;
      try {
        await this.adapter.write(path, file.content);
      } catch (error) {
        throw translateStorageError(error, 'write', path);
      }

      this.logger.debug({ path, backend: this.adapter.name }, 'Element created');
      return this.buildElement(await this.fetchMetadata(path), encodedCollectionPath);
    });
  }

  /**
   * Rename and/or rewrite an element. A rename happens before any
   * content is written; the extension never changes. Submitted bytes are
   * ignored for kinds that do not load content.
   *
   * @throws AppError MALFORMED_TOKEN, UNSUPPORTED_ELEMENT_TYPE, INVALID_PAYLOAD,
   *   NOT_FOUND, EMPTY_CONTENT, CANNOT_RENAME, WRITE_ERROR
   */
  update(encodedBasename: string, encodedCollectionPath: string, input: unknown): Promise<Element> {
    return timed(this.timer, 'collection_element_update', async () => {
      const collectionPath = decodeToken(encodedCollectionPath);
      const currentPath = this.getElementPath(encodedBasename, collectionPath);
      const payload = this.validator.parse(input);

      const { kind, element: current } = createElement(await this.fetchMetadata(currentPath), encodedCollectionPath);
      const file = this.fileHandler.applyPayload(ElementFile.fromElement(current), payload, { mode: 'update' });
      // Only kinds that load content have it overwritten
      const content = shouldLoadContent(kind) ? file.content : undefined;
      if (content && content.length === 0) {
        throw ErrorHandler.createEmptyContentError({ path: currentPath });
      }

      let path = currentPath;
      const basename = file.getCleanedBasename();
      if (basename !== file.getBasename()) {
        path = `${collectionPath}/${basename}`;
        try {
          await this.adapter.rename(currentPath, path);
        } catch (error) {
          throw translateStorageError(error, 'rename', currentPath);
        }
        this.logger.debug({ from: currentPath, to: path }, 'Element renamed');
      }

      if (content) {
        try {
          await this.adapter.update(path, content);
        } catch (error) {
          throw translateStorageError(error, 'write', path);
        }
      }

      return this.buildElement(await this.fetchMetadata(path), encodedCollectionPath);
    });
  }

  /**
   * The element with its content attached when its kind loads content
   *
   * @throws AppError MALFORMED_TOKEN, UNSUPPORTED_ELEMENT_TYPE, NOT_FOUND
   */
  get(encodedBasename: string, encodedCollectionPath: string): Promise<Element> {
    return timed(this.timer, 'collection_element_get', async () => {
      const path = this.getElementPath(encodedBasename, decodeToken(encodedCollectionPath));
      const { kind, element } = createElement(await this.fetchMetadata(path), encodedCollectionPath);

      if (shouldLoadContent(kind)) {
        setElementContent(element, kind, await this.readBytes(path));
      }
      return element;
    });
  }

  /**
   * Raw bytes for delivery. When `if-modified-since` is at or after the
   * stored timestamp nothing is read.
   *
   * @throws AppError MALFORMED_TOKEN, UNSUPPORTED_ELEMENT_TYPE, NOT_FOUND
   */
  getContent(
    encodedBasename: string,
    encodedCollectionPath: string,
    headers: RequestHeaders = {}
  ): Promise<ElementContentResult> {
    return timed(this.timer, 'collection_element_get_content', async () => {
      const path = this.getElementPath(encodedBasename, decodeToken(encodedCollectionPath));
      const meta = await this.fetchMetadata(path);
      const lastModified = new Date(meta.timestamp * 1000);

      const since = headerValue(headers, 'if-modified-since');
      const sinceMs = since === undefined ? NaN : Date.parse(since);
      if (!Number.isNaN(sinceMs) && meta.timestamp <= Math.floor(sinceMs / 1000)) {
        return { status: 'not-modified', lastModified };
      }

      const content = await this.readBytes(path);
      return { status: 'ok', content, mimetype: meta.mimetype, lastModified, size: content.length };
    });
  }

  /**
   * Idempotent: deleting a missing element succeeds
   *
   * @throws AppError MALFORMED_TOKEN, UNSUPPORTED_ELEMENT_TYPE, WRITE_ERROR
   */
  delete(encodedBasename: string, encodedCollectionPath: string): Promise<void> {
    return timed(this.timer, 'collection_element_delete', async () => {
      const path = this.getElementPath(encodedBasename, decodeToken(encodedCollectionPath));
      try {
        await this.adapter.delete(path);
      } catch (error) {
        if (isStorageError(error, 'NOT_FOUND')) {
          this.logger.debug({ path }, 'Element already absent');
          return;
        }
        throw translateStorageError(error, 'write', path);
      }
    });
  }

  /**
   * Rename every element `matches` selects to the basename `transform`
   * leaves on its ElementFile. A failing element is reported and the
   * batch goes on; nothing is rolled back.
   *
   * @throws AppError MALFORMED_TOKEN
   */
  batchRename(
    encodedCollectionPath: string,
    matches: ElementMatcher,
    transform: ElementTransform
  ): Promise<BatchRenameReport> {
    return timed(this.timer, 'collection_element_batch_rename', async () => {
      const collectionPath = decodeToken(encodedCollectionPath);
      const report: BatchRenameReport = { renamed: [], unchanged: 0, failures: [] };

      for (const element of await this.listElements(encodedCollectionPath)) {
        if (!matches(element)) {
          continue;
        }

        const file = ElementFile.fromElement(element);
        const from = file.getBasename() ?? '';
        try {
          transform(file, element);
          const to = file.getCleanedBasename();
          if (to === from) {
            report.unchanged++;
            continue;
          }

          try {
            await this.adapter.rename(`${collectionPath}/${from}`, `${collectionPath}/${to}`);
          } catch (error) {
            throw translateStorageError(error, 'rename', `${collectionPath}/${from}`);
          }
          report.renamed.push({ from, to });
        } catch (error) {
          const appError = ErrorHandler.isElementError(error) ? error : ErrorHandler.createUnexpectedError(error);
          this.logger.warn({ collectionPath, basename: from, code: appError.code }, 'Batch rename skipped an element');
          report.failures.push({ basename: from, error: appError });
        }
      }

      this.logger.debug(
        { collectionPath, renamed: report.renamed.length, unchanged: report.unchanged, failed: report.failures.length },
        'Batch rename finished'
      );
      return report;
    });
  }

  /**
   * Backend path of an element, checked without touching the backend
   *
   * @throws AppError MALFORMED_TOKEN, UNSUPPORTED_ELEMENT_TYPE
   */
  getElementPath(encodedBasename: string, collectionPath: string): string {
    const basename = decodeToken(encodedBasename);
    if (basename === '' || basename === '.' || basename === '..' || basename.includes('/')) {
      throw ErrorHandler.createMalformedTokenError(encodedBasename, { reason: 'not a single path segment' });
    }
    resolveKindForBasename(basename);
    return `${collectionPath}/${basename}`;
  }

  private async listElements(encodedCollectionPath: string): Promise<Element[]> {
    const collectionPath = decodeToken(encodedCollectionPath);

    let entries: StorageMetadata[];
    try {
      entries = await this.adapter.listWithMetadata(collectionPath);
    } catch (error) {
      this.logger.debug({ collectionPath, err: serializeError(error) }, 'Collection could not be listed');
      return [];
    }

    const files: NormalizedMetadata[] = [];
    for (const entry of entries) {
      if (entry.type !== 'file') {
        continue;
      }
      try {
        files.push(standardize(entry));
      } catch (error) {
        this.logger.warn({ collectionPath, path: entry.path, err: serializeError(error) }, 'Skipping entry with unusable metadata');
      }
    }
    // Array.prototype.sort is stable
    files.sort((a, b) => a.timestamp - b.timestamp);

    const elements: Element[] = [];
    let unsupported = 0;
    for (const meta of files) {
      try {
        elements.push(createElement(meta, encodedCollectionPath).element);
      } catch (error) {
        if (!ErrorHandler.isElementError(error)) {
          throw error;
        }
        unsupported++;
      }
    }
    if (unsupported > 0) {
      this.logger.debug({ collectionPath, unsupported }, 'Skipped files with unsupported extensions');
    }
    return elements;
  }

  private async fetchMetadata(path: string): Promise<NormalizedMetadata> {
    let raw: StorageMetadata | null;
    try {
      raw = await this.adapter.getMetadata(path);
    } catch (error) {
      throw translateStorageError(error, 'read', path);
    }
    if (!raw || raw.type !== 'file') {
      throw ErrorHandler.createNotFoundError(`No element at ${path}`, { path });
    }
    return standardize(raw, path);
  }

  private async readBytes(path: string): Promise<Buffer> {
    try {
      return await this.adapter.read(path);
    } catch (error) {
      throw translateStorageError(error, 'read', path);
    }
  }

  private buildElement(meta: NormalizedMetadata, encodedCollectionPath: string): Element {
    return createElement(meta, encodedCollectionPath).element;
  }
}
