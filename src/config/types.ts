/**
 * Configuration types for the user-intake server.
 *
 * These types define the structure of config.yaml and provide
 * type-safe access to server configuration.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Top-level configuration.
 */
export interface AppConfig {
  server: ServerConfig;
  storage: StorageConfig;
  provider: ProviderConfig;
  listing: ListingConfig;
}

/**
 * Server settings.
 */
export interface ServerConfig {
  /** Port to listen on (default: 3001) */
  port: number;
  /** Host to bind to (default: '0.0.0.0') */
  host: string;
  /** Log level (default: 'info') */
  logLevel: LogLevel;
  /** CORS configuration */
  cors: CorsConfig;
}

/**
 * CORS configuration.
 */
export interface CorsConfig {
  /** Whether CORS is enabled (default: true) */
  enabled: boolean;
  /** Allowed origins (default: ['*']) */
  origins: string[];
}

/**
 * Record store settings.
 */
export interface StorageConfig {
  /** SQLite file, relative to the base path unless absolute (default: 'data/users.db') */
  databasePath: string;
}

/**
 * Random-user provider settings.
 */
export interface ProviderConfig {
  /** Endpoint consulted for pre-fill (default: 'https://randomuser.me/api/') */
  url: string;
}

/**
 * Listing settings.
 */
export interface ListingConfig {
  /** Rows per page (default: 5) */
  pageSize: number;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  server: {
    port: 3001,
    host: '0.0.0.0',
    logLevel: 'info',
    cors: {
      enabled: true,
      origins: ['*'],
    },
  },
  storage: {
    databasePath: 'data/users.db',
  },
  provider: {
    url: 'https://randomuser.me/api/',
  },
  listing: {
    pageSize: 5,
  },
};
