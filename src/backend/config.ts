/**
 * Environment Configuration
 *
 * Loads and validates environment variables, providing a typed configuration object.
 * Fails fast on invalid values to prevent runtime errors.
 *
 * Usage:
 *   import { config } from './config';
 *   console.log(config.server.port);
 */

import 'dotenv/config';

// =============================================================================
// Types
// =============================================================================

export type StorageProviderType = 'local' | 'database' | 'memory' | 'none';
export type NodeEnv = 'development' | 'production' | 'test';

export interface ServerConfig {
  port: number;
  nodeEnv: NodeEnv;
  isDevelopment: boolean;
  isProduction: boolean;
  isTest: boolean;
}

export interface StorageConfig {
  /** Backend used for users without an override */
  defaultProvider: StorageProviderType;
  /** Root of per-user directories for the local provider */
  rootDir: string;
  /** SQLite file for the database provider */
  databasePath: string;
  /** Per-user provider overrides keyed by user id */
  userProviders: Record<string, StorageProviderType>;
}

export interface Auth0Config {
  domain: string;
  audience: string;
}

export interface AuthConfig {
  disabled: boolean;
  auth0: Auth0Config;
}

export interface CorsConfig {
  origins: string[];
}

export interface LoggingConfig {
  level: string;
}

export interface Config {
  server: ServerConfig;
  storage: StorageConfig;
  auth: AuthConfig;
  cors: CorsConfig;
  logging: LoggingConfig;
}

// =============================================================================
// Validation Helpers
// =============================================================================

class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Get an environment variable, empty string when unset
 */
function getEnv(key: string): string {
  return process.env[key] || '';
}

/**
 * Get an environment variable with a default value
 */
function getEnvWithDefault(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Get a numeric environment variable
 */
function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new ConfigurationError(
      `Invalid numeric value for ${key}: "${value}". Expected a number.`
    );
  }
  return parsed;
}

/**
 * Get a boolean environment variable
 */
function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Parse CORS origins from comma-separated string
 */
function parseCorsOrigins(value: string): string[] {
  if (!value) return [];
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

const STORAGE_PROVIDERS: readonly StorageProviderType[] = ['local', 'database', 'memory', 'none'];

function isStorageProvider(value: string): value is StorageProviderType {
  return STORAGE_PROVIDERS.some(provider => provider === value);
}

/**
 * Validate storage provider value
 */
export function parseStorageProvider(value: string, key: string): StorageProviderType {
  const normalized = value.trim().toLowerCase();
  if (isStorageProvider(normalized)) {
    return normalized;
  }
  throw new ConfigurationError(
    `Invalid storage provider for ${key}: "${value}". Expected one of ${STORAGE_PROVIDERS.join(', ')}.`
  );
}

/**
 * Parse "alice=database,bob=local" into per-user overrides
 */
export function parseUserProviders(value: string): Record<string, StorageProviderType> {
  const overrides: Record<string, StorageProviderType> = {};
  for (const entry of value.split(',').map(part => part.trim()).filter(Boolean)) {
    const separator = entry.lastIndexOf('=');
    const userId = entry.slice(0, separator).trim();
    if (separator <= 0 || !userId) {
      throw new ConfigurationError(
        `Invalid STORAGE_USER_PROVIDERS entry: "${entry}". Expected userId=provider.`
      );
    }
    overrides[userId] = parseStorageProvider(entry.slice(separator + 1), 'STORAGE_USER_PROVIDERS');
  }
  return overrides;
}

/**
 * Validate node environment
 */
function parseNodeEnv(value: string): NodeEnv {
  if (value === 'production' || value === 'test') {
    return value;
  }
  return 'development'; // default
}

// =============================================================================
// Configuration Loader
// =============================================================================

export function loadConfig(): Config {
  const nodeEnv = parseNodeEnv(getEnvWithDefault('NODE_ENV', 'development'));

  return {
    server: {
      port: getEnvNumber('PORT', 3001),
      nodeEnv,
      isDevelopment: nodeEnv === 'development',
      isProduction: nodeEnv === 'production',
      isTest: nodeEnv === 'test',
    },

    storage: {
      defaultProvider: parseStorageProvider(getEnvWithDefault('STORAGE_PROVIDER', 'local'), 'STORAGE_PROVIDER'),
      rootDir: getEnvWithDefault('STORAGE_ROOT', './data/collections'),
      databasePath: getEnvWithDefault('DATABASE_PATH', './data/collections.db'),
      userProviders: parseUserProviders(getEnv('STORAGE_USER_PROVIDERS')),
    },

    auth: {
      disabled: getEnvBoolean('AUTH_DISABLED', false),
      auth0: {
        domain: getEnv('AUTH0_DOMAIN'),
        audience: getEnv('AUTH0_AUDIENCE'),
      },
    },

    cors: {
      origins: parseCorsOrigins(
        getEnvWithDefault('CORS_ORIGINS', 'http://localhost:5173,http://localhost:3000')
      ),
    },

    logging: {
      level: getEnvWithDefault('LOG_LEVEL', nodeEnv === 'development' ? 'debug' : 'info'),
    },
  };
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Validate configuration for production readiness
 * Throws ConfigurationError if critical settings are missing
 */
export function validateConfig(config: Config): void {
  const errors: string[] = [];

  // In production, auth must be properly configured
  if (config.server.isProduction) {
    if (config.auth.disabled) {
      errors.push('AUTH_DISABLED cannot be true in production');
    } else {
      if (!config.auth.auth0.domain) errors.push('AUTH0_DOMAIN is required for Auth0');
      if (!config.auth.auth0.audience) errors.push('AUTH0_AUDIENCE is required for Auth0');
    }

    if (config.storage.defaultProvider === 'memory') {
      errors.push('STORAGE_PROVIDER=memory loses every element on restart and cannot be used in production');
    }
  }

  if (config.server.port <= 0 || config.server.port > 65535) {
    errors.push(`PORT must be between 1 and 65535, got ${config.server.port}`);
  }

  if (errors.length > 0) {
    throw new ConfigurationError(
      'Configuration validation failed:\n' +
      errors.map(e => `  - ${e}`).join('\n')
    );
  }
}

// =============================================================================
// Export
// =============================================================================

/**
 * Application configuration loaded from environment variables.
 * Validated at import time - will throw on invalid values.
 */
export const config: Config = loadConfig();

validateConfig(config);

/**
 * Re-export the ConfigurationError for consumers
 */
export { ConfigurationError };
