/**
 * Filesystem Adapter Manager
 *
 * Selects the storage backend for the acting user and hands out one
 * adapter per user id. Backend selection is delegated to a
 * UserBackendSource so it can come from configuration or elsewhere.
 */

import * as path from 'path';
import type { Logger } from 'pino';
import { ErrorHandler } from '../../shared/errors';
import { encodeToken } from '../../shared/elements';
import {
  DatabaseStorage,
  FileStorage,
  FilesystemAdapter,
  MemoryStorage,
} from '../../shared/storage';
import type { BackendConfig, UserIdentity } from '../../shared/types';
import type { StorageConfig } from '../config';
import { loggers } from '../logger';

export interface UserBackendSource {
  /**
   * @returns null when the user has no backend configured
   */
  getBackendConfig(user: UserIdentity): Promise<BackendConfig | null>;
}

/**
 * Backend selection from STORAGE_* settings: the default provider plus
 * per-user overrides
 */
export class ConfigBackendSource implements UserBackendSource {
  constructor(private readonly storage: StorageConfig) {}

  async getBackendConfig(user: UserIdentity): Promise<BackendConfig | null> {
    const provider = this.storage.userProviders[user.id] ?? this.storage.defaultProvider;

    switch (provider) {
      case 'local':
        // User ids may contain path characters
        return { provider: 'local', rootPath: path.join(this.storage.rootDir, encodeToken(user.id)) };
      case 'database':
        return { provider: 'database', databasePath: this.storage.databasePath };
      case 'memory':
        return { provider: 'memory' };
      case 'none':
        return null;
    }
  }
}

export class FilesystemAdapterManager {
  private readonly adapters = new Map<string, Promise<FilesystemAdapter>>();
  private readonly databases = new Map<string, DatabaseStorage>();

  constructor(
    private readonly source: UserBackendSource,
    private readonly logger: Logger = loggers.storage
  ) {}

  /**
   * @throws AppError CONFIGURATION when the user has no backend
   */
  getAdapter(user: UserIdentity): Promise<FilesystemAdapter> {
    const cached = this.adapters.get(user.id);
    if (cached) {
      return cached;
    }

    const pending = this.createAdapter(user);
    this.adapters.set(user.id, pending);
    // A failed lookup is retried on the next request
    pending.catch(() => this.adapters.delete(user.id));
    return pending;
  }

  /**
   * Release database connections and forget every adapter
   */
  close(): void {
    for (const database of this.databases.values()) {
      database.close();
    }
    this.databases.clear();
    this.adapters.clear();
  }

  private async createAdapter(user: UserIdentity): Promise<FilesystemAdapter> {
    const backend = await this.source.getBackendConfig(user);
    if (!backend) {
      this.logger.warn({ userId: user.id }, 'No storage backend configured for user');
      throw ErrorHandler.createConfigurationError('No storage backend is configured for this user', {
        userId: user.id,
      });
    }

    const adapter = this.instantiate(backend, user);
    this.logger.info({ userId: user.id, provider: adapter.name }, 'Storage adapter created');
    return adapter;
  }

  private instantiate(backend: BackendConfig, user: UserIdentity): FilesystemAdapter {
    switch (backend.provider) {
      case 'local':
        return new FileStorage(backend.rootPath);
      case 'memory':
        return new MemoryStorage();
      case 'database': {
        const shared = this.databases.get(backend.databasePath);
        if (shared) {
          return shared.forUser(user.id);
        }
        const database = new DatabaseStorage({ databasePath: backend.databasePath, userId: user.id });
        this.databases.set(backend.databasePath, database);
        return database;
      }
    }
  }
}
