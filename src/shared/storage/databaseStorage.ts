/**
 * Database Storage Adapter
 *
 * SQLite-based implementation of FilesystemAdapter for multi-tenant support.
 * Uses better-sqlite3 for synchronous, performant database operations.
 *
 * Schema:
 *   files(id, user_id, path, content, is_directory, created_at, updated_at)
 *   UNIQUE(user_id, path)
 *
 * Directory semantics are emulated through path prefixes.
 */

import Database from 'better-sqlite3';
import * as path from 'path';
import { FilesystemAdapter, StorageError, StorageMetadata } from './interface';

// ============================================================================
// Types
// ============================================================================

/**
 * Configuration options for DatabaseStorage
 */
export interface DatabaseStorageOptions {
  /**
   * Path to the SQLite database file
   * Use ':memory:' for an in-memory database (useful for testing)
   */
  databasePath: string;

  /**
   * User ID for multi-tenant isolation
   * All operations are scoped to this user
   */
  userId: string;

  /**
   * Whether to enable WAL mode for better concurrent performance
   * Default: true
   */
  walMode?: boolean;

  /** Clock returning unix seconds */
  now?: () => number;
}

/**
 * Row structure from the files table
 */
interface FileRow {
  path: string;
  is_directory: number;
  size: number;
  updated_at: number;
}

// ============================================================================
// Schema Migration
// ============================================================================

const SCHEMA_VERSION = 1;

const MIGRATIONS: Record<number, string[]> = {
  1: [
    `CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY
    )`,
    `CREATE TABLE IF NOT EXISTS files (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id TEXT NOT NULL,
      path TEXT NOT NULL,
      content BLOB NOT NULL,
      is_directory INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL,
      UNIQUE(user_id, path)
    )`,
    `CREATE INDEX IF NOT EXISTS idx_files_user_path ON files(user_id, path)`,
  ],
};

const EMPTY = Buffer.alloc(0);

// ============================================================================
// Database Storage Implementation
// ============================================================================

/**
 * SQLite-based storage adapter with multi-tenant support
 *
 * Each user's files are isolated by user_id. Directory operations
 * are emulated through path prefix queries.
 */
export class DatabaseStorage implements FilesystemAdapter {
  readonly name = 'database';
  private readonly db: Database.Database;
  private readonly options: DatabaseStorageOptions;
  private readonly userId: string;
  private readonly now: () => number;

  // Prepared statements for performance
  private readonly stmtRead: Database.Statement<[string, string], { content: Buffer }>;
  private readonly stmtInsert: Database.Statement<[string, string, Buffer, number, number, number]>;
  private readonly stmtUpdate: Database.Statement<[Buffer, number, string, string]>;
  private readonly stmtDelete: Database.Statement<[string, string]>;
  private readonly stmtMeta: Database.Statement<[string, string], FileRow>;
  private readonly stmtChildren: Database.Statement<[string, string], FileRow>;
  private readonly stmtMove: Database.Statement<[string, number, string, string]>;

  /**
   * @param connection - An already-migrated connection to share (see forUser)
   */
  constructor(options: DatabaseStorageOptions, connection?: Database.Database) {
    this.options = options;
    this.userId = options.userId;
    this.now = options.now ?? (() => Math.floor(Date.now() / 1000));

    if (connection) {
      this.db = connection;
    } else {
      this.db = new Database(options.databasePath);

      // Enable WAL mode for better performance (unless disabled)
      if (options.walMode !== false && options.databasePath !== ':memory:') {
        this.db.pragma('journal_mode = WAL');
      }

      this.runMigrations();
    }

    this.stmtRead = this.db.prepare<[string, string], { content: Buffer }>(
      'SELECT content FROM files WHERE user_id = ? AND path = ? AND is_directory = 0'
    );
    this.stmtInsert = this.db.prepare<[string, string, Buffer, number, number, number]>(`
      INSERT INTO files (user_id, path, content, is_directory, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    this.stmtUpdate = this.db.prepare<[Buffer, number, string, string]>(`
      UPDATE files SET content = ?, updated_at = ?
      WHERE user_id = ? AND path = ? AND is_directory = 0
    `);
    this.stmtDelete = this.db.prepare<[string, string]>(
      'DELETE FROM files WHERE user_id = ? AND path = ? AND is_directory = 0'
    );
    this.stmtMeta = this.db.prepare<[string, string], FileRow>(`
      SELECT path, is_directory, LENGTH(content) AS size, updated_at FROM files
      WHERE user_id = ? AND path = ?
    `);
    // instr() keeps the prefix match case-sensitive and free of LIKE wildcards
    this.stmtChildren = this.db.prepare<[string, string], FileRow>(`
      SELECT path, is_directory, LENGTH(content) AS size, updated_at FROM files
      WHERE user_id = ? AND instr(path, ?) = 1
      ORDER BY id
    `);
    this.stmtMove = this.db.prepare<[string, number, string, string]>(
      'UPDATE files SET path = ?, updated_at = ? WHERE user_id = ? AND path = ?'
    );
  }

  /**
   * Run database migrations
   */
  private runMigrations(): void {
    let currentVersion = 0;
    const hasVersionTable = this.db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'"
      )
      .get();
    if (hasVersionTable) {
      const row = this.db
        .prepare<[], { version: number }>('SELECT version FROM schema_version ORDER BY version DESC LIMIT 1')
        .get();
      currentVersion = row?.version ?? 0;
    }

    // Run migrations up to SCHEMA_VERSION
    for (let v = currentVersion + 1; v <= SCHEMA_VERSION; v++) {
      const statements = MIGRATIONS[v];
      if (statements) {
        const transaction = this.db.transaction(() => {
          for (const sql of statements) {
            this.db.exec(sql);
          }
          this.db.prepare('INSERT OR REPLACE INTO schema_version (version) VALUES (?)').run(v);
        });
        transaction();
      }
    }
  }

  /**
   * Normalize a path for consistent storage
   */
  private normalizePath(filePath: string): string {
    const normalized = path.posix.normalize(`/${filePath}`).replace(/^\/+|\/+$/g, '');
    return normalized === '.' ? '' : normalized;
  }

  private toMetadata(row: FileRow): StorageMetadata {
    return {
      path: row.path,
      type: row.is_directory ? 'dir' : 'file',
      timestamp: row.updated_at,
      size: row.is_directory ? 0 : row.size,
    };
  }

  /**
   * Ensure parent directories exist (as directory markers)
   */
  private ensureParentDirs(normalized: string): void {
    const parts = normalized.split('/');
    parts.pop();

    const timestamp = this.now();
    let currentPath = '';
    for (const part of parts) {
      currentPath = currentPath ? `${currentPath}/${part}` : part;
      this.db
        .prepare(`
          INSERT OR IGNORE INTO files (user_id, path, content, is_directory, created_at, updated_at)
          VALUES (?, ?, ?, 1, ?, ?)
        `)
        .run(this.userId, currentPath, EMPTY, timestamp, timestamp);
    }
  }

  // ============================================================================
  // FilesystemAdapter Implementation
  // ============================================================================

  async listWithMetadata(directory: string): Promise<StorageMetadata[]> {
    const normalized = this.normalizePath(directory);
    const prefix = normalized ? `${normalized}/` : '';

    if (normalized) {
      const dir = this.stmtMeta.get(this.userId, normalized);
      if (!dir || !dir.is_directory) {
        throw new StorageError('NOT_FOUND', directory);
      }
    }

    // Immediate children only; deeper rows imply a directory entry
    const entries = new Map<string, StorageMetadata>();
    for (const row of this.stmtChildren.all(this.userId, prefix)) {
      const relativePath = row.path.substring(prefix.length);
      if (!relativePath) continue;

      const firstSlash = relativePath.indexOf('/');
      if (firstSlash < 0) {
        entries.set(relativePath, this.toMetadata(row));
      } else {
        const name = relativePath.substring(0, firstSlash);
        if (!entries.has(name)) {
          entries.set(name, { path: prefix + name, type: 'dir', timestamp: row.updated_at, size: 0 });
        }
      }
    }

    return Array.from(entries.values());
  }

  async read(filePath: string): Promise<Buffer> {
    const row = this.stmtRead.get(this.userId, this.normalizePath(filePath));
    if (!row) {
      throw new StorageError('NOT_FOUND', filePath);
    }
    return row.content;
  }

  async write(filePath: string, content: Buffer): Promise<void> {
    const normalized = this.normalizePath(filePath);
    if (!normalized) {
      throw new StorageError('WRITE_FAILED', filePath, 'Cannot write to root directory');
    }
    if (this.stmtMeta.get(this.userId, normalized)) {
      throw new StorageError('ALREADY_EXISTS', filePath);
    }

    const timestamp = this.now();
    this.db.transaction(() => {
      this.ensureParentDirs(normalized);
      this.stmtInsert.run(this.userId, normalized, content, 0, timestamp, timestamp);
    })();
  }

  async update(filePath: string, content: Buffer): Promise<void> {
    const result = this.stmtUpdate.run(content, this.now(), this.userId, this.normalizePath(filePath));
    if (result.changes === 0) {
      throw new StorageError('NOT_FOUND', filePath);
    }
  }

  async rename(from: string, to: string): Promise<void> {
    const source = this.normalizePath(from);
    const destination = this.normalizePath(to);

    const sourceRow = this.stmtMeta.get(this.userId, source);
    if (!source || !sourceRow) {
      throw new StorageError('NOT_FOUND', from);
    }
    if (!destination) {
      throw new StorageError('WRITE_FAILED', to, 'Cannot move to root directory');
    }
    if (this.stmtMeta.get(this.userId, destination)) {
      throw new StorageError('ALREADY_EXISTS', to);
    }

    const timestamp = this.now();
    this.db.transaction(() => {
      this.ensureParentDirs(destination);

      if (sourceRow.is_directory) {
        // Move directory and all children
        for (const child of this.stmtChildren.all(this.userId, `${source}/`)) {
          const newPath = destination + child.path.substring(source.length);
          this.stmtMove.run(newPath, timestamp, this.userId, child.path);
        }
      }
      this.stmtMove.run(destination, timestamp, this.userId, source);
    })();
  }

  async delete(filePath: string): Promise<void> {
    const result = this.stmtDelete.run(this.userId, this.normalizePath(filePath));
    if (result.changes === 0) {
      throw new StorageError('NOT_FOUND', filePath);
    }
  }

  async getMetadata(filePath: string): Promise<StorageMetadata | null> {
    const normalized = this.normalizePath(filePath);
    if (!normalized) {
      return { path: '', type: 'dir', timestamp: 0, size: 0 };
    }
    const row = this.stmtMeta.get(this.userId, normalized);
    return row ? this.toMetadata(row) : null;
  }

  // ============================================================================
  // Additional Methods
  // ============================================================================

  /**
   * Create a new DatabaseStorage instance for a different user
   * Shares the same database connection
   */
  forUser(userId: string): DatabaseStorage {
    return new DatabaseStorage({ ...this.options, userId }, this.db);
  }

  /**
   * Close the database connection (shared by every forUser instance)
   */
  close(): void {
    this.db.close();
  }
}
