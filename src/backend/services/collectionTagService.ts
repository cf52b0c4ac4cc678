/**
 * Collection Tag Service
 *
 * Tags live only in element basenames, so every tag edit is a batch
 * rename over the elements that carry the tag.
 */

import type { Logger } from 'pino';
import { ErrorHandler } from '../../shared/errors';
import { decodeToken, encodeToken } from '../../shared/elements';
import { ElementPayloadValidator, elementPayloadValidator } from '../../shared/validation';
import { loggers } from '../logger';
import type { BatchRenameReport, CollectionElementService } from './collectionElementService';

export interface CollectionTag {
  name: string;
  encodedName: string;
  /** Number of elements carrying the tag */
  count: number;
}

export class CollectionTagService {
  constructor(
    private readonly elements: CollectionElementService,
    private readonly validator: ElementPayloadValidator = elementPayloadValidator,
    private readonly logger: Logger = loggers.tags
  ) {}

  async list(encodedCollectionPath: string): Promise<CollectionTag[]> {
    const counts = new Map<string, number>();
    for (const element of await this.elements.list(encodedCollectionPath)) {
      for (const tag of element.tags) {
        counts.set(tag, (counts.get(tag) ?? 0) + 1);
      }
    }

    return Array.from(counts, ([name, count]) => ({ name, encodedName: encodeToken(name), count }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Rename a tag on every element; elements already carrying the new
   * name keep a single copy
   *
   * @throws AppError MALFORMED_TOKEN, INVALID_PAYLOAD, NOT_FOUND
   */
  async rename(encodedCollectionPath: string, encodedTag: string, newName: unknown): Promise<BatchRenameReport> {
    const tag = decodeToken(encodedTag);
    const to = this.validator.parseTagName(newName);

    const report = await this.elements.batchRename(
      encodedCollectionPath,
      element => element.tags.includes(tag),
      file => file.renameTag(tag, to)
    );
    this.assertMatched(report, tag);

    this.logger.info({ tag, to, renamed: report.renamed.length, failed: report.failures.length }, 'Tag renamed');
    return report;
  }

  /**
   * @throws AppError MALFORMED_TOKEN, NOT_FOUND
   */
  async delete(encodedCollectionPath: string, encodedTag: string): Promise<BatchRenameReport> {
    const tag = decodeToken(encodedTag);

    const report = await this.elements.batchRename(
      encodedCollectionPath,
      element => element.tags.includes(tag),
      file => file.removeTag(tag)
    );
    this.assertMatched(report, tag);

    this.logger.info({ tag, removed: report.renamed.length, failed: report.failures.length }, 'Tag deleted');
    return report;
  }

  private assertMatched(report: BatchRenameReport, tag: string): void {
    if (report.renamed.length + report.unchanged + report.failures.length === 0) {
      throw ErrorHandler.createNotFoundError(`No element carries tag "${tag}"`, { tag });
    }
  }
}
