import type { ConnectionTarget, SqlRow } from '../types.js';

/**
 * Query-execution context scoped to one connection
 */
export interface DriverCursor {
  /** Run a statement. Rejects with a `DriverError`. */
  execute(sql: string): Promise<void>;

  /** Return the rows buffered by the last `execute` and clear the buffer. */
  fetchAll(): SqlRow[];
}

/**
 * A live database session
 */
export interface DriverConnection {
  /** Create a cursor. Throws a `DriverError` when the session is unusable. */
  cursor(): DriverCursor;

  /** End the session. Rejects with a `DriverError`. */
  close(): Promise<void>;
}

/**
 * Adapter around a database client library
 */
export interface Driver {
  /** Human-readable driver name */
  readonly name: string;

  /** Port used when the caller gives none */
  readonly defaultPort?: number;

  /** Open a session. Rejects with a `DriverError`. */
  open(target: ConnectionTarget): Promise<DriverConnection>;
}
