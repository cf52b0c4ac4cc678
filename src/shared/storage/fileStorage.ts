/**
 * File System Storage Adapter
 *
 * Local disk implementation rooted at a directory.
 * Uses fs/promises for async operations.
 */

import type { Stats } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { FilesystemAdapter, StorageError, StorageMetadata } from './interface';

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * File-system based storage adapter
 *
 * All paths are resolved relative to the configured root directory.
 */
export class FileStorage implements FilesystemAdapter {
  readonly name = 'local';
  private readonly rootPath: string;

  /**
   * @param rootPath - Path to the storage root directory
   */
  constructor(rootPath: string) {
    this.rootPath = path.resolve(rootPath);
  }

  /**
   * Resolve a relative path to an absolute path within the root
   */
  private resolvePath(relativePath: string): string {
    const resolved = path.resolve(this.rootPath, `.${path.posix.sep}${relativePath}`);

    // Prevent path traversal attacks
    if (resolved !== this.rootPath && !resolved.startsWith(this.rootPath + path.sep)) {
      throw new StorageError('NOT_FOUND', relativePath, `Invalid path: ${relativePath} escapes storage root`);
    }

    return resolved;
  }

  private toRelative(absolutePath: string): string {
    return path.relative(this.rootPath, absolutePath).split(path.sep).join('/');
  }

  private toMetadata(absolutePath: string, stats: { isDirectory(): boolean; mtimeMs: number; size: number }): StorageMetadata {
    return {
      path: this.toRelative(absolutePath),
      type: stats.isDirectory() ? 'dir' : 'file',
      timestamp: Math.floor(stats.mtimeMs / 1000),
      size: stats.isDirectory() ? 0 : stats.size,
    };
  }

  async listWithMetadata(directory: string): Promise<StorageMetadata[]> {
    const absolutePath = this.resolvePath(directory);
    let names: string[];
    try {
      names = await fs.readdir(absolutePath);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'ENOTDIR')) {
        throw new StorageError('NOT_FOUND', directory);
      }
      throw error;
    }

    const entries: StorageMetadata[] = [];
    for (const name of names) {
      const entryPath = path.join(absolutePath, name);
      try {
        entries.push(this.toMetadata(entryPath, await fs.stat(entryPath)));
      } catch (error) {
        // Removed since readdir, or a dangling link
        if (hasErrorCode(error, 'ENOENT')) {
          continue;
        }
        throw error;
      }
    }
    return entries;
  }

  async read(filePath: string): Promise<Buffer> {
    const absolutePath = this.resolvePath(filePath);
    try {
      return await fs.readFile(absolutePath);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'EISDIR')) {
        throw new StorageError('NOT_FOUND', filePath);
      }
      throw error;
    }
  }

  async write(filePath: string, content: Buffer): Promise<void> {
    const absolutePath = this.resolvePath(filePath);

    // Ensure parent directories exist
    await fs.mkdir(path.dirname(absolutePath), { recursive: true });
    try {
      // 'wx' fails when the file exists
      await fs.writeFile(absolutePath, content, { flag: 'wx' });
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) {
        throw new StorageError('ALREADY_EXISTS', filePath);
      }
      throw new StorageError('WRITE_FAILED', filePath, error instanceof Error ? error.message : undefined);
    }
  }

  async update(filePath: string, content: Buffer): Promise<void> {
    const absolutePath = this.resolvePath(filePath);
    try {
      // 'r+' requires the file to exist
      const handle = await fs.open(absolutePath, 'r+');
      try {
        await handle.truncate(0);
        await handle.write(content, 0, content.length, 0);
      } finally {
        await handle.close();
      }
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'EISDIR')) {
        throw new StorageError('NOT_FOUND', filePath);
      }
      throw new StorageError('WRITE_FAILED', filePath, error instanceof Error ? error.message : undefined);
    }
  }

  async rename(from: string, to: string): Promise<void> {
    const sourcePath = this.resolvePath(from);
    const destPath = this.resolvePath(to);

    let source: Stats;
    try {
      source = await fs.lstat(sourcePath);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'ENOTDIR')) {
        throw new StorageError('NOT_FOUND', from);
      }
      throw error;
    }

    // Ensure destination directory exists
    await fs.mkdir(path.dirname(destPath), { recursive: true });

    if (source.isDirectory()) {
      if (await this.pathExists(destPath)) {
        throw new StorageError('ALREADY_EXISTS', to);
      }
      await fs.rename(sourcePath, destPath);
      return;
    }

    // fs.rename replaces an existing target; link fails with EEXIST instead
    try {
      await fs.link(sourcePath, destPath);
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) {
        throw new StorageError('ALREADY_EXISTS', to);
      }
      if (hasErrorCode(error, 'ENOENT')) {
        throw new StorageError('NOT_FOUND', from);
      }
      throw new StorageError('WRITE_FAILED', to, error instanceof Error ? error.message : undefined);
    }
    await fs.unlink(sourcePath);
  }

  async delete(filePath: string): Promise<void> {
    const absolutePath = this.resolvePath(filePath);
    try {
      await fs.unlink(absolutePath);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        throw new StorageError('NOT_FOUND', filePath);
      }
      throw error;
    }
  }

  async getMetadata(filePath: string): Promise<StorageMetadata | null> {
    const absolutePath = this.resolvePath(filePath);
    try {
      const stats = await fs.stat(absolutePath);
      return this.toMetadata(absolutePath, stats);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'ENOTDIR')) {
        return null;
      }
      throw error;
    }
  }

  private async pathExists(absolutePath: string): Promise<boolean> {
    try {
      await fs.lstat(absolutePath);
      return true;
    } catch {
      return false;
    }
  }
}
