/**
 * Common Types
 *
 * Shared type definitions used across the backend and the element layer.
 */

/**
 * The acting user, as established by authentication
 */
export interface UserIdentity {
  id: string;
  email?: string;
}

/**
 * Where a user's elements are stored
 */
export type BackendConfig =
  | { provider: 'local'; rootPath: string }
  | { provider: 'database'; databasePath: string }
  | { provider: 'memory' };

/**
 * Raw request headers as handed over by the transport layer
 */
export type RequestHeaders = Record<string, string | string[] | undefined>;
