import type { ConnectionManagerOptions } from './types.js';

/**
 * Define connection options with validation
 *
 * @example
 * ```typescript
 * import { defineConfig, withConnection } from 'db-session-manager';
 *
 * const config = defineConfig({
 *   database: 'inventory',
 *   host: 'db.internal',
 *   username: 'reporter',
 *   password: process.env.DB_PASSWORD ?? '',
 *   retry: { maxConnectionRetries: 5 },
 * });
 *
 * const rows = await withConnection(config, (db) => db.executeQuery('SELECT 1'));
 * ```
 */
export function defineConfig(config: ConnectionManagerOptions): ConnectionManagerOptions {
  validateConfig(config);
  return config;
}

/**
 * Validate options at runtime
 */
export function validateConfig(config: ConnectionManagerOptions): void {
  if (!config.database) {
    throw new Error('[db-session] database is required');
  }

  if (!config.host) {
    throw new Error('[db-session] host is required');
  }

  if (!config.username) {
    throw new Error('[db-session] username is required');
  }

  if (typeof config.password !== 'string') {
    throw new Error('[db-session] password must be a string');
  }

  if (
    config.port !== undefined &&
    (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535)
  ) {
    throw new Error(`[db-session] port must be an integer between 1 and 65535, got ${config.port}`);
  }

  if (config.retry) {
    const retry = config.retry;

    if (retry.maxConnectionRetries !== undefined && retry.maxConnectionRetries < 1) {
      throw new Error('[db-session] retry.maxConnectionRetries must be at least 1');
    }

    if (retry.initialDelayMs !== undefined && retry.initialDelayMs < 0) {
      throw new Error('[db-session] retry.initialDelayMs must be non-negative');
    }

    if (retry.maxDelayMs !== undefined && retry.maxDelayMs < 0) {
      throw new Error('[db-session] retry.maxDelayMs must be non-negative');
    }

    if (retry.backoffMultiplier !== undefined && retry.backoffMultiplier < 1) {
      throw new Error('[db-session] retry.backoffMultiplier must be at least 1');
    }

    if (
      retry.initialDelayMs !== undefined &&
      retry.maxDelayMs !== undefined &&
      retry.initialDelayMs > retry.maxDelayMs
    ) {
      throw new Error('[db-session] retry.initialDelayMs cannot be greater than maxDelayMs');
    }
  }
}
