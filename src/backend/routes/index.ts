/**
 * Main router index - aggregates the route modules mounted under /api.
 */

import { Router } from 'express';
import type { FilesystemAdapterManager } from '../services';
import { createCollectionsRouter } from './collections';

export function createApiRouter(manager: FilesystemAdapterManager): Router {
  const router = Router();

  router.use('/collections/:encodedCollectionPath', createCollectionsRouter(manager));

  return router;
}

export { createCollectionsRouter };
