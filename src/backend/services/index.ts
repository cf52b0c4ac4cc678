/**
 * Services index - wires the element services to the configured storage
 * backends for use by backend routes.
 */

import type { UserIdentity } from '../../shared/types';
import { config } from '../config';
import { ConfigBackendSource, FilesystemAdapterManager } from './adapterManager';
import { CollectionElementService, CollectionElementServiceOptions } from './collectionElementService';

export const adapterManager = new FilesystemAdapterManager(new ConfigBackendSource(config.storage));

/**
 * A service bound to the user's adapter, built fresh for each request
 *
 * @throws AppError CONFIGURATION when the user has no backend
 */
export async function createCollectionElementService(
  manager: FilesystemAdapterManager,
  user: UserIdentity,
  options?: CollectionElementServiceOptions
): Promise<CollectionElementService> {
  return new CollectionElementService(await manager.getAdapter(user), options);
}

export { ConfigBackendSource, FilesystemAdapterManager } from './adapterManager';
export type { UserBackendSource } from './adapterManager';
export { CollectionElementService } from './collectionElementService';
export type {
  BatchRenameReport,
  CollectionElementServiceOptions,
  ElementContentResult,
  ElementMatcher,
  ElementTransform,
} from './collectionElementService';
export { CollectionTagService } from './collectionTagService';
export type { CollectionTag } from './collectionTagService';
export { createLoggingTimer, timed } from './timing';
export type { OperationTimer } from './timing';
