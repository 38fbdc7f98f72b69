import type {
  ConnectionManagerOptions,
  ConnectionStatus,
  ConnectionTarget,
  Hooks,
  NormalizedRow,
  NormalizeOptions,
  QueryOutcome,
} from './types.js';
import { DEFAULT_CONFIG } from './types.js';
import type { Driver, DriverConnection, DriverCursor } from './drivers/base.js';
import { resolveDriver } from './drivers/index.js';
import { DriverError } from './drivers/errors.js';
import { validateConfig } from './config.js';
import { createDebugLogger, DebugLogger } from './debug.js';
import { createRetryHandler, RetryHandler } from './connection/retry/index.js';
import type { RetryOutcome } from './connection/retry/index.js';
import { ConnectionFailedError, CursorCreationError } from './errors.js';
import { normalizeRows } from './normalize.js';

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Owns a single connection to one database and the cursor derived from it
 *
 * Opening is retried a bounded number of times. When the limit is reached the
 * manager latches into `failed` and every later operation that needs the
 * connection throws `ConnectionFailedError` without touching the network.
 */
export class ConnectionManager {
  /** Default attempt limit; `MAX_CONNECTION_RETRIES - 1` opens are made */
  static readonly MAX_CONNECTION_RETRIES: number = DEFAULT_CONFIG.retry.maxConnectionRetries;

  readonly database: string;
  readonly host: string;
  readonly port: number;
  readonly username: string;
  readonly instance: string | undefined;

  private readonly password: string;
  private readonly driver: Driver;
  private readonly retryHandler: RetryHandler;
  private readonly debugLogger: DebugLogger;
  private readonly normalizeOptions: NormalizeOptions;
  private readonly hooks: Hooks;

  private connection: DriverConnection | null = null;
  private cursor: DriverCursor | null = null;
  private state: ConnectionStatus = 'idle';
  private pendingConnect: Promise<void> | null = null;
  private attempts = 0;

  constructor(options: ConnectionManagerOptions) {
    validateConfig(options);

    this.driver = resolveDriver(options.driver, DEFAULT_CONFIG.driver);
    this.database = options.database;
    this.host = options.host;
    this.port = options.port ?? this.driver.defaultPort ?? DEFAULT_CONFIG.port;
    this.username = options.username;
    this.password = options.password;
    this.instance = options.instance;
    this.normalizeOptions = options.normalize ?? {};
    this.hooks = options.hooks ?? {};
    this.debugLogger = createDebugLogger(options.debug);

    const userOnRetry = options.retry?.onRetry;
    this.retryHandler = createRetryHandler({
      ...options.retry,
      onRetry: (attempt, error, delayMs) => {
        this.debugLogger.logConnectionRetry(this.target, attempt, error, delayMs);
        this.fireHook(() => this.hooks.onError?.('connect', error));
        userOnRetry?.(attempt, error, delayMs);
      },
    });
  }

  /**
   * `host:port` of the target
   */
  get target(): string {
    return `${this.host}:${this.port}`;
  }

  /**
   * Current lifecycle state
   */
  get status(): ConnectionStatus {
    return this.state;
  }

  /**
   * Whether retries were exhausted. Never cleared once set.
   */
  get hasConnectionError(): boolean {
    return this.state === 'failed';
  }

  /**
   * Open attempts made by the last `connect()`
   */
  get connectionAttempts(): number {
    return this.attempts;
  }

  /**
   * Name of the driver in use
   */
  get driverName(): string {
    return this.driver.name;
  }

  /**
   * Check if a live connection is held
   */
  isConnected(): boolean {
    return this.connection !== null;
  }

  /**
   * Open the connection with bounded retries
   *
   * Does nothing when a connection is already open or the manager has failed.
   * Exhausted retries latch the `failed` state instead of rejecting; only
   * errors that are not driver errors reject.
   */
  async connect(): Promise<void> {
    if (this.connection || this.state === 'failed') return;

    // Concurrent callers share the attempt in flight
    if (this.pendingConnect) {
      return this.pendingConnect;
    }

    this.pendingConnect = this.openWithRetry();
    try {
      await this.pendingConnect;
    } finally {
      this.pendingConnect = null;
    }
  }

  /**
   * Make sure a connection is open
   *
   * @throws ConnectionFailedError when the manager has failed, now or before
   */
  async verifyConnection(): Promise<void> {
    if (this.state === 'failed') {
      throw new ConnectionFailedError(this.target, this.attempts);
    }

    if (!this.connection) {
      await this.connect();
    }

    if (this.hasConnectionError) {
      throw new ConnectionFailedError(this.target, this.attempts);
    }
  }

  /**
   * Return the cursor, creating it on first use
   *
   * @throws CursorCreationError when the driver cannot create one
   */
  verifyCursor(): DriverCursor {
    if (this.cursor) return this.cursor;

    if (!this.connection) {
      throw new CursorCreationError(this.target, new Error('no open connection'));
    }

    try {
      this.cursor = this.connection.cursor();
      return this.cursor;
    } catch (error) {
      const cause = toError(error);
      this.debugLogger.logCursorError(this.target, cause);
      this.fireHook(() => this.hooks.onError?.('cursor', cause));
      throw new CursorCreationError(this.target, cause);
    }
  }

  /**
   * Execute a statement and report rows or the execution error
   *
   * @throws ConnectionFailedError or CursorCreationError, which are fatal
   *
   * @example
   * ```typescript
   * const outcome = await db.query('SELECT id, name FROM users');
   * if (outcome.ok) {
   *   console.table(outcome.rows);
   * } else {
   *   console.error(outcome.error.message);
   * }
   * ```
   */
  async query(sql: string): Promise<QueryOutcome> {
    await this.verifyConnection();
    const cursor = this.verifyCursor();

    this.debugLogger.logQuery(this.target, sql);

    try {
      await cursor.execute(sql);
      const rows = normalizeRows(cursor.fetchAll(), this.normalizeOptions);
      this.debugLogger.logQueryResult(this.target, rows);
      return { ok: true, rows };
    } catch (error) {
      if (!(error instanceof DriverError)) {
        throw error;
      }
      const driverError = error;
      this.debugLogger.logQueryError(this.target, sql, driverError);
      this.fireHook(() => this.hooks.onError?.('query', driverError));
      return { ok: false, error: driverError };
    }
  }

  /**
   * Execute a statement and return its rows with every value as text
   *
   * An execution error is logged and yields `[]`, the same as an empty
   * result; use `query()` to tell the two apart.
   */
  async executeQuery(sql: string): Promise<NormalizedRow[]> {
    const outcome = await this.query(sql);
    return outcome.ok ? outcome.rows : [];
  }

  /**
   * Close the connection if one is open
   *
   * Waits for a connect in flight so its connection is closed too. Close
   * errors are logged, never thrown. Safe to call repeatedly.
   */
  async disconnect(): Promise<void> {
    // An open still in flight would otherwise land after teardown
    if (this.pendingConnect) {
      await this.pendingConnect.catch((error: unknown) => {
        this.debugLogger.log(`pending connect failed during disconnect: ${toError(error).message}`, 'debug', {
          target: this.target,
        });
      });
    }

    const connection = this.connection;
    if (!connection) return;

    this.connection = null;
    this.cursor = null;
    if (this.state !== 'failed') {
      this.state = 'idle';
    }

    try {
      await connection.close();
      this.debugLogger.logDisconnect(this.target);
      this.fireHook(() => this.hooks.onDisconnected?.());
    } catch (error) {
      const cause = toError(error);
      this.debugLogger.logDisconnectError(this.target, cause);
      this.fireHook(() => this.hooks.onError?.('disconnect', cause));
    }
  }

  /**
   * Run `fn` with this manager and disconnect afterwards, on every exit path
   */
  async use<T>(fn: (manager: this) => T | Promise<T>): Promise<T> {
    try {
      return await fn(this);
    } finally {
      await this.disconnect();
    }
  }

  /**
   * Describe the target without credentials
   */
  toJSON(): {
    database: string;
    host: string;
    port: number;
    username: string;
    instance?: string;
    driver: string;
    status: ConnectionStatus;
  } {
    return {
      database: this.database,
      host: this.host,
      port: this.port,
      username: this.username,
      ...(this.instance !== undefined && { instance: this.instance }),
      driver: this.driver.name,
      status: this.state,
    };
  }

  toString(): string {
    const label = this.instance ? ` (${this.instance})` : '';
    return `${this.database}@${this.target}${label}`;
  }

  private connectionTarget(): ConnectionTarget {
    return {
      database: this.database,
      host: this.host,
      port: this.port,
      username: this.username,
      password: this.password,
    };
  }

  private async openWithRetry(): Promise<void> {
    this.state = 'attempting';

    let outcome: RetryOutcome<DriverConnection>;
    try {
      outcome = await this.retryHandler.withRetry<DriverConnection>((attempt) => {
        this.debugLogger.logConnectAttempt(this.target, attempt);
        return this.driver.open(this.connectionTarget());
      });
    } catch (error) {
      this.state = 'idle';
      throw error;
    }

    const attempts = outcome.attempts;
    this.attempts = attempts;

    if (outcome.ok) {
      this.connection = outcome.result;
      this.cursor = null;
      this.state = 'connected';
      this.debugLogger.logConnectionSuccess(this.target, attempts, outcome.totalTimeMs);
      this.fireHook(() => this.hooks.onConnected?.(attempts));
      return;
    }

    this.state = 'failed';
    this.debugLogger.logConnectionFailed(this.target, attempts);
    this.fireHook(() => this.hooks.onConnectionFailed?.(attempts));
  }

  /**
   * Invoke a hook without letting it affect control flow
   */
  private fireHook(invoke: () => void | Promise<void> | undefined): void {
    const report = (error: unknown): void => {
      this.debugLogger.log(`hook failed: ${toError(error).message}`, 'error', { target: this.target });
    };

    try {
      const result = invoke();
      if (result instanceof Promise) {
        result.catch(report);
      }
    } catch (error) {
      report(error);
    }
  }
}

/**
 * Create a connection manager and open its connection
 *
 * Always resolves to a manager; when retries are exhausted the manager is
 * returned in the `failed` state.
 *
 * @example
 * ```typescript
 * const db = await createConnectionManager({
 *   database: 'inventory',
 *   host: 'localhost',
 *   username: 'reporter',
 *   password: 'secret',
 * });
 *
 * const rows = await db.executeQuery('SELECT sku, qty FROM stock');
 * await db.disconnect();
 * ```
 */
export async function createConnectionManager(options: ConnectionManagerOptions): Promise<ConnectionManager> {
  const manager = new ConnectionManager(options);
  await manager.connect();
  return manager;
}

/**
 * Scoped acquisition: connect, run `fn`, always disconnect
 */
export async function withConnection<T>(
  options: ConnectionManagerOptions,
  fn: (manager: ConnectionManager) => T | Promise<T>
): Promise<T> {
  const manager = await createConnectionManager(options);
  return manager.use(fn);
}
