/**
 * Environment configuration tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  ConfigurationError,
  loadConfig,
  parseStorageProvider,
  parseUserProviders,
  validateConfig,
} from '../../backend/config';

describe('Backend Config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('parseStorageProvider', () => {
    it('should accept known providers in any case', () => {
      expect(parseStorageProvider(' Database ', 'STORAGE_PROVIDER')).toBe('database');
      expect(parseStorageProvider('none', 'STORAGE_PROVIDER')).toBe('none');
    });

    it('should reject unknown providers', () => {
      expect(() => parseStorageProvider('s3', 'STORAGE_PROVIDER')).toThrow(
        'Invalid storage provider for STORAGE_PROVIDER: "s3". Expected one of local, database, memory, none.'
      );
    });
  });

  describe('parseUserProviders', () => {
    it('should parse comma separated overrides', () => {
      expect(parseUserProviders('alice=database, bob = local')).toEqual({ alice: 'database', bob: 'local' });
    });

    it('should be empty when unset', () => {
      expect(parseUserProviders('')).toEqual({});
    });

    it('should keep everything before the last = as the user id', () => {
      expect(parseUserProviders('team=a=memory')).toEqual({ 'team=a': 'memory' });
    });

    it('should reject entries without a user id', () => {
      expect(() => parseUserProviders('=local')).toThrow(ConfigurationError);
      expect(() => parseUserProviders('alice')).toThrow('Invalid STORAGE_USER_PROVIDERS entry: "alice". Expected userId=provider.');
    });
  });

  describe('loadConfig', () => {
    it('should read storage settings from the environment', () => {
      vi.stubEnv('STORAGE_PROVIDER', 'local');
      vi.stubEnv('STORAGE_ROOT', '/srv/collections');
      vi.stubEnv('STORAGE_USER_PROVIDERS', 'alice=database');
      vi.stubEnv('DATABASE_PATH', '');

      expect(loadConfig().storage).toEqual({
        defaultProvider: 'local',
        rootDir: '/srv/collections',
        databasePath: './data/collections.db',
        userProviders: { alice: 'database' },
      });
    });

    it('should reject a non-numeric port', () => {
      vi.stubEnv('PORT', 'eighty');
      expect(loadConfig).toThrow('Invalid numeric value for PORT: "eighty". Expected a number.');
    });
  });

  describe('validateConfig', () => {
    it('should list every production problem', () => {
      vi.stubEnv('NODE_ENV', 'production');
      vi.stubEnv('PORT', '3001');
      vi.stubEnv('AUTH_DISABLED', 'true');
      vi.stubEnv('STORAGE_PROVIDER', 'memory');

      expect(() => validateConfig(loadConfig())).toThrow(
        'Configuration validation failed:\n' +
        '  - AUTH_DISABLED cannot be true in production\n' +
        '  - STORAGE_PROVIDER=memory loses every element on restart and cannot be used in production'
      );
    });

    it('should require Auth0 settings in production', () => {
      vi.stubEnv('NODE_ENV', 'production');
      vi.stubEnv('PORT', '3001');
      vi.stubEnv('AUTH_DISABLED', 'false');
      vi.stubEnv('STORAGE_PROVIDER', 'database');
      vi.stubEnv('AUTH0_DOMAIN', '');
      vi.stubEnv('AUTH0_AUDIENCE', 'https://collections.test');

      expect(() => validateConfig(loadConfig())).toThrow(
        'Configuration validation failed:\n  - AUTH0_DOMAIN is required for Auth0'
      );
    });

    it('should accept the test environment', () => {
      expect(() => validateConfig(loadConfig())).not.toThrow();
    });
  });
});
