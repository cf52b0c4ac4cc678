/**
 * Collection routes - element and tag operations inside one collection.
 * Mounted under /api/collections/:encodedCollectionPath; every path
 * segment after that is an encoded token.
 */

import { Router, Request, Response } from 'express';
import type { AppError } from '../../shared/errors';
import type { Element } from '../../shared/elements';
import { loggers } from '../logger';
import { asyncHandler, ApiError } from '../middleware/errorHandler';
import {
  BatchRenameReport,
  CollectionElementService,
  CollectionTagService,
  createCollectionElementService,
  FilesystemAdapterManager,
} from '../services';

interface CollectionServices {
  elements: CollectionElementService;
  tags: CollectionTagService;
}

function requireParam(req: Request, name: string): string {
  const value = req.params[name];
  if (!value) {
    throw new ApiError(400, `Missing route parameter: ${name}`, 'MISSING_PARAMETER');
  }
  return value;
}

function withFileUrl(req: Request, element: Element): Element {
  return {
    ...element,
    fileUrl: `${req.baseUrl}/elements/${element.encodedElementBasename}/content`,
  };
}

function serializeReport(report: BatchRenameReport) {
  return {
    renamed: report.renamed,
    unchanged: report.unchanged,
    failures: report.failures.map(({ basename, error }: { basename: string; error: AppError }) => ({
      basename,
      code: error.code,
      error: error.userMessage,
    })),
  };
}

export function createCollectionsRouter(manager: FilesystemAdapterManager): Router {
  const router = Router({ mergeParams: true });

  /**
   * One service per request, bound to the acting user's adapter
   */
  async function servicesFor(req: Request): Promise<CollectionServices> {
    if (!req.user) {
      throw new ApiError(401, 'Unauthorized', 'UNAUTHENTICATED');
    }
    const elements = await createCollectionElementService(manager, req.user);
    return { elements, tags: new CollectionTagService(elements) };
  }

  /**
   * GET /elements
   * Elements of the collection, oldest first
   */
  router.get('/elements', asyncHandler(async (req: Request, res: Response) => {
    const { elements } = await servicesFor(req);
    const list = await elements.list(requireParam(req, 'encodedCollectionPath'));
    res.json(list.map(element => withFileUrl(req, element)));
  }));

  /**
   * POST /elements
   * Create an element from { name?, tags?, extension?, content? | file? }
   */
  router.post('/elements', asyncHandler(async (req: Request, res: Response) => {
    const { elements } = await servicesFor(req);
    const element = await elements.create(requireParam(req, 'encodedCollectionPath'), req.body);
    loggers.elements.info({ userId: req.user?.id, basename: element.encodedElementBasename, type: element.type }, 'Element created');
    res.status(201).json(withFileUrl(req, element));
  }));

  /**
   * GET /elements/:basename
   */
  router.get('/elements/:basename', asyncHandler(async (req: Request, res: Response) => {
    const { elements } = await servicesFor(req);
    const element = await elements.get(requireParam(req, 'basename'), requireParam(req, 'encodedCollectionPath'));
    res.json(withFileUrl(req, element));
  }));

  /**
   * GET /elements/:basename/content
   * Raw bytes; honours If-Modified-Since
   */
  router.get('/elements/:basename/content', asyncHandler(async (req: Request, res: Response) => {
    const { elements } = await servicesFor(req);
    const result = await elements.getContent(
      requireParam(req, 'basename'),
      requireParam(req, 'encodedCollectionPath'),
      req.headers
    );

    res.set('Last-Modified', result.lastModified.toUTCString());
    if (result.status === 'not-modified') {
      res.status(304).end();
      return;
    }
    res.set('Content-Type', result.mimetype);
    res.set('Content-Length', String(result.size));
    res.send(result.content);
  }));

  /**
   * PUT /elements/:basename
   * Rename, retag or rewrite an element
   */
  router.put('/elements/:basename', asyncHandler(async (req: Request, res: Response) => {
    const { elements } = await servicesFor(req);
    const element = await elements.update(
      requireParam(req, 'basename'),
      requireParam(req, 'encodedCollectionPath'),
      req.body
    );
    res.json(withFileUrl(req, element));
  }));

  /**
   * DELETE /elements/:basename
   * Succeeds for elements that are already gone
   */
  router.delete('/elements/:basename', asyncHandler(async (req: Request, res: Response) => {
    const { elements } = await servicesFor(req);
    await elements.delete(requireParam(req, 'basename'), requireParam(req, 'encodedCollectionPath'));
    res.status(204).send();
  }));

  /**
   * GET /tags
   */
  router.get('/tags', asyncHandler(async (req: Request, res: Response) => {
    const { tags } = await servicesFor(req);
    res.json(await tags.list(requireParam(req, 'encodedCollectionPath')));
  }));

  /**
   * PUT /tags/:tag
   * Rename a tag across the collection: { name }
   */
  router.put('/tags/:tag', asyncHandler(async (req: Request, res: Response) => {
    const { tags } = await servicesFor(req);
    const body: unknown = req.body;
    const name = typeof body === 'object' && body !== null && 'name' in body ? body.name : undefined;
    const report = await tags.rename(requireParam(req, 'encodedCollectionPath'), requireParam(req, 'tag'), name);
    res.json(serializeReport(report));
  }));

  /**
   * DELETE /tags/:tag
   * Remove a tag from every element carrying it
   */
  router.delete('/tags/:tag', asyncHandler(async (req: Request, res: Response) => {
    const { tags } = await servicesFor(req);
    const report = await tags.delete(requireParam(req, 'encodedCollectionPath'), requireParam(req, 'tag'));
    res.json(serializeReport(report));
  }));

  return router;
}
