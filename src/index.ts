// Core exports
export { defineConfig, validateConfig } from './config.js';
export { ConnectionManager, createConnectionManager, withConnection } from './manager.js';
export { ConnectionFailedError, CursorCreationError, isFatalError } from './errors.js';
export { formatValue, normalizeRows, toSqlValue } from './normalize.js';
export { DebugLogger, createDebugLogger } from './debug.js';

// Retry utilities
export { RetryHandler, createRetryHandler } from './connection/retry/index.js';
export type { RetryOutcome } from './connection/retry/index.js';

// Drivers
export {
  MysqlDriver,
  PostgresDriver,
  DriverError,
  createDriver,
  classifyDriverError,
  toDriverError,
  isRecoverableDriverError,
} from './drivers/index.js';

export type {
  Driver,
  DriverConnection,
  DriverCursor,
  DriverErrorKind,
  MysqlDriverOptions,
  PostgresDriverOptions,
} from './drivers/index.js';

// Types
export type {
  ConnectionManagerOptions,
  ConnectionStatus,
  ConnectionTarget,
  DebugConfig,
  DebugContext,
  DriverName,
  ErrorPhase,
  Hooks,
  LogLevel,
  NormalizedRow,
  NormalizeOptions,
  QueryOutcome,
  RetryConfig,
  SqlJson,
  SqlRow,
  SqlValue,
} from './types.js';

export { DEFAULT_CONFIG } from './types.js';
