/**
 * Storage Module
 *
 * Backend-agnostic storage adapters for element files.
 * Supports multiple backends: local filesystem, SQLite database and memory (testing).
 */

export * from './interface';
export * from './fileStorage';
export * from './memoryStorage';
export * from './databaseStorage';
