import type { Driver } from './drivers/base.js';

/**
 * A single column value as handed over by a driver
 */
export type SqlValue =
  | string
  | number
  | bigint
  | boolean
  | Date
  | Uint8Array
  | null
  | SqlJson;

/**
 * JSON column payloads (objects and arrays decoded by the driver)
 */
export type SqlJson = { readonly [key: string]: unknown } | readonly unknown[];

/**
 * A raw driver row, in column order
 */
export type SqlRow = SqlValue[];

/**
 * A row after normalization: every value rendered as a string
 */
export type NormalizedRow = string[];

/**
 * Lifecycle of a connection manager. `failed` is terminal.
 */
export type ConnectionStatus = 'idle' | 'attempting' | 'connected' | 'failed';

/**
 * Where to connect
 */
export interface ConnectionTarget {
  /** Database (schema) name */
  database: string;
  /** Server host name or address */
  host: string;
  /** Server port */
  port: number;
  /** Login user */
  username: string;
  /** Login password */
  password: string;
}

/**
 * Retry configuration for opening a connection
 */
export interface RetryConfig {
  /**
   * Attempt index at which the loop gives up. The loop stops when the counter
   * reaches this value, so `maxConnectionRetries - 1` opens are made (default: 5)
   */
  maxConnectionRetries: number;
  /** Delay before the second attempt in ms (default: 0, retry immediately) */
  initialDelayMs: number;
  /** Upper bound for any single delay in ms (default: 5000) */
  maxDelayMs: number;
  /** Multiplier applied per attempt (default: 2) */
  backoffMultiplier: number;
  /** Add up to 25% random jitter to each delay (default: false) */
  jitter: boolean;
  /** Decide whether an open error is worth another attempt */
  isRetryable?: (error: Error) => boolean;
  /** Called before each retry */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

/**
 * Log levels understood by the debug logger, lowest first
 */
export type LogLevel = 'debug' | 'info' | 'error';

/**
 * Logging configuration
 */
export interface DebugConfig {
  /** Enable logging (default: true) */
  enabled?: boolean;
  /** Minimum level to emit (default: 'info') */
  level?: LogLevel;
  /** Log query text and results */
  logQueries?: boolean;
  /** Log connect, retry, cursor and disconnect events */
  logConnectionEvents?: boolean;
  /** Custom logger function (default: console) */
  logger?: (message: string, context: DebugContext) => void;
}

/**
 * Context passed to the logger
 */
export interface DebugContext {
  /** Event type */
  type:
    | 'connect_attempt'
    | 'connection_retry'
    | 'connection_success'
    | 'connection_failed'
    | 'cursor_error'
    | 'query'
    | 'query_result'
    | 'query_error'
    | 'disconnect'
    | 'disconnect_error'
    | 'message';
  /** Severity of the entry */
  level: LogLevel;
  /** `host:port` of the target */
  target?: string;
  /** SQL text (for query events) */
  query?: string;
  /** Error message */
  error?: string;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

/**
 * Stage of the lifecycle an error hook refers to
 */
export type ErrorPhase = 'connect' | 'cursor' | 'query' | 'disconnect';

/**
 * Lifecycle hooks
 */
export interface Hooks {
  /** Called after a connection is opened */
  onConnected?: (attempts: number) => void | Promise<void>;
  /** Called once when retries are exhausted and the manager latches `failed` */
  onConnectionFailed?: (attempts: number) => void | Promise<void>;
  /** Called after an open connection is closed */
  onDisconnected?: () => void | Promise<void>;
  /** Called on every recoverable or fatal error */
  onError?: (phase: ErrorPhase, error: Error) => void | Promise<void>;
}

/**
 * Row normalization options
 */
export interface NormalizeOptions {
  /** Text used for SQL NULL (default: 'NULL') */
  nullText?: string;
}

/**
 * Options for a connection manager
 */
export interface ConnectionManagerOptions {
  /** Database name */
  database: string;
  /** Server host */
  host: string;
  /** Login user */
  username: string;
  /** Login password */
  password: string;
  /** Server port (default: the driver's port, else 3306) */
  port?: number;
  /** Informational label for the instance, never used to connect */
  instance?: string;
  /** Driver or driver name (default: 'mysql') */
  driver?: Driver | DriverName;
  /** Connection retry settings */
  retry?: Partial<RetryConfig>;
  /** Logging settings */
  debug?: DebugConfig;
  /** Row normalization settings */
  normalize?: NormalizeOptions;
  /** Lifecycle hooks */
  hooks?: Hooks;
}

/**
 * Names of the bundled drivers
 */
export type DriverName = 'mysql' | 'postgres';

/**
 * Result of `ConnectionManager.query`
 */
export type QueryOutcome =
  | { ok: true; rows: NormalizedRow[] }
  | { ok: false; error: Error };

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG = {
  port: 3306,
  driver: 'mysql',
  nullText: 'NULL',
  retry: {
    maxConnectionRetries: 5,
    initialDelayMs: 0,
    maxDelayMs: 5_000,
    backoffMultiplier: 2,
    jitter: false,
  },
  debug: {
    enabled: true,
    level: 'info',
    logQueries: true,
    logConnectionEvents: true,
  },
} as const;
