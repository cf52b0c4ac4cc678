/**
 * In-Memory Storage Adapter
 *
 * Memory-based implementation for testing and development.
 * Data is stored in a tree and persists only for the lifetime of the instance.
 */

import * as path from 'path';
import { FilesystemAdapter, StorageError, StorageMetadata } from './interface';

/**
 * Node in the virtual file system tree
 */
interface FSNode {
  type: 'file' | 'dir';
  content: Buffer;
  timestamp: number;
  children: Map<string, FSNode>;
}

export interface MemoryStorageOptions {
  /** Clock returning unix seconds; defaults to the wall clock */
  now?: () => number;
}

/**
 * In-memory storage adapter for testing
 *
 * Simulates a file system using a tree structure in memory.
 */
export class MemoryStorage implements FilesystemAdapter {
  readonly name = 'memory';
  private readonly root: FSNode;
  private readonly now: () => number;

  constructor(options: MemoryStorageOptions = {}) {
    this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
    this.root = this.createDirectory();
  }

  private createDirectory(): FSNode {
    return { type: 'dir', content: Buffer.alloc(0), timestamp: this.now(), children: new Map() };
  }

  /**
   * Parse a path into segments
   */
  private parsePath(filePath: string): string[] {
    const normalized = path.posix.normalize(`/${filePath}`).replace(/^\/+|\/+$/g, '');
    if (normalized === '' || normalized === '.') {
      return [];
    }
    return normalized.split('/');
  }

  /**
   * Navigate to a node, optionally creating directories along the way
   */
  private navigate(segments: string[], createDirectories: boolean = false): FSNode | null {
    let current = this.root;

    for (const segment of segments) {
      if (current.type !== 'dir') {
        return null;
      }

      let child = current.children.get(segment);

      if (!child) {
        if (!createDirectories) {
          return null;
        }
        child = this.createDirectory();
        current.children.set(segment, child);
      }

      current = child;
    }

    return current;
  }

  /**
   * Split a path into its parent node and entry name
   */
  private locate(filePath: string, createParents: boolean = false): { parent: FSNode | null; name: string } {
    const segments = this.parsePath(filePath);
    const name = segments.pop() ?? '';
    return { parent: this.navigate(segments, createParents), name };
  }

  private getFile(filePath: string): FSNode {
    const node = this.navigate(this.parsePath(filePath));
    if (!node || node.type !== 'file') {
      throw new StorageError('NOT_FOUND', filePath);
    }
    return node;
  }

  private toMetadata(filePath: string, node: FSNode): StorageMetadata {
    return {
      path: this.parsePath(filePath).join('/'),
      type: node.type,
      timestamp: node.timestamp,
      size: node.type === 'file' ? node.content.length : 0,
    };
  }

  async listWithMetadata(directory: string): Promise<StorageMetadata[]> {
    const segments = this.parsePath(directory);
    const node = this.navigate(segments);

    if (!node || node.type !== 'dir') {
      throw new StorageError('NOT_FOUND', directory);
    }

    return Array.from(node.children, ([name, child]) =>
      this.toMetadata([...segments, name].join('/'), child)
    );
  }

  async read(filePath: string): Promise<Buffer> {
    return Buffer.from(this.getFile(filePath).content);
  }

  async write(filePath: string, content: Buffer): Promise<void> {
    const { parent, name } = this.locate(filePath, true);
    if (!parent || parent.type !== 'dir' || name === '') {
      throw new StorageError('WRITE_FAILED', filePath, `Cannot create file at: ${filePath}`);
    }
    if (parent.children.has(name)) {
      throw new StorageError('ALREADY_EXISTS', filePath);
    }

    parent.children.set(name, {
      type: 'file',
      content: Buffer.from(content),
      timestamp: this.now(),
      children: new Map(),
    });
  }

  async update(filePath: string, content: Buffer): Promise<void> {
    const node = this.getFile(filePath);
    node.content = Buffer.from(content);
    node.timestamp = this.now();
  }

  async rename(from: string, to: string): Promise<void> {
    const source = this.locate(from);
    const node = source.parent?.children.get(source.name);
    if (!source.parent || !node) {
      throw new StorageError('NOT_FOUND', from);
    }

    const target = this.locate(to, true);
    if (!target.parent || target.parent.type !== 'dir' || target.name === '') {
      throw new StorageError('WRITE_FAILED', to, `Cannot move to: ${to}`);
    }
    if (target.parent.children.has(target.name)) {
      throw new StorageError('ALREADY_EXISTS', to);
    }

    source.parent.children.delete(source.name);
    target.parent.children.set(target.name, node);
  }

  async delete(filePath: string): Promise<void> {
    const { parent, name } = this.locate(filePath);
    if (!parent || parent.children.get(name)?.type !== 'file') {
      throw new StorageError('NOT_FOUND', filePath);
    }
    parent.children.delete(name);
  }

  async getMetadata(filePath: string): Promise<StorageMetadata | null> {
    const node = this.navigate(this.parsePath(filePath));
    return node ? this.toMetadata(filePath, node) : null;
  }

  /**
   * Dump all files as UTF-8 text keyed by path (for debugging)
   */
  dump(): Record<string, string> {
    const result: Record<string, string> = {};

    const traverse = (node: FSNode, currentPath: string) => {
      if (node.type === 'file') {
        result[currentPath] = node.content.toString('utf-8');
        return;
      }
      for (const [name, child] of node.children) {
        traverse(child, currentPath ? `${currentPath}/${name}` : name);
      }
    };

    traverse(this.root, '');
    return result;
  }
}
