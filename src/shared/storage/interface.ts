/**
 * Filesystem Adapter Interface
 *
 * Backend-agnostic contract over a storage backend.
 * Implementations:
 * - FileStorage: local disk rooted at a per-user directory
 * - DatabaseStorage: SQLite, multi-tenant by user id
 * - MemoryStorage: in-memory (testing, development)
 *
 * Every failure a caller is expected to handle is raised as a
 * StorageError carrying one of the codes below.
 */

/**
 * Backend-agnostic failure conditions
 */
export type StorageErrorCode = 'NOT_FOUND' | 'ALREADY_EXISTS' | 'WRITE_FAILED';

export class StorageError extends Error {
  constructor(
    public readonly code: StorageErrorCode,
    public readonly path: string,
    message?: string
  ) {
    super(message ?? `${code}: ${path}`);
    this.name = 'StorageError';
  }
}

export function isStorageError(error: unknown, code?: StorageErrorCode): error is StorageError {
  return error instanceof StorageError && (code === undefined || error.code === code);
}

/**
 * Metadata as reported by a backend.
 * Only `path` and `type` are guaranteed; the rest is best effort.
 */
export interface StorageMetadata {
  path: string;
  type: 'file' | 'dir';
  /** Last modification, unix seconds */
  timestamp?: number;
  size?: number;
  mimetype?: string;
}

/**
 * Storage adapter contract
 *
 * Paths are backend-relative; leading and duplicate slashes are
 * normalized by the implementation.
 */
export interface FilesystemAdapter {
  /** Identifier of the backend kind, for logging */
  readonly name: string;

  /**
   * List the immediate children of a directory with their metadata
   * @throws StorageError NOT_FOUND if the directory does not exist
   */
  listWithMetadata(directory: string): Promise<StorageMetadata[]>;

  /**
   * @throws StorageError NOT_FOUND if the file does not exist
   */
  read(path: string): Promise<Buffer>;

  /**
   * Create a new file, creating parent directories as needed
   * @throws StorageError ALREADY_EXISTS if the path is taken
   */
  write(path: string, content: Buffer): Promise<void>;

  /**
   * Overwrite an existing file
   * @throws StorageError NOT_FOUND if the file does not exist
   */
  update(path: string, content: Buffer): Promise<void>;

  /**
   * @throws StorageError NOT_FOUND if the source is missing
   * @throws StorageError ALREADY_EXISTS if the target is taken
   */
  rename(from: string, to: string): Promise<void>;

  /**
   * @throws StorageError NOT_FOUND if the file does not exist
   */
  delete(path: string): Promise<void>;

  /**
   * @returns null when nothing exists at the path
   */
  getMetadata(path: string): Promise<StorageMetadata | null>;
}
