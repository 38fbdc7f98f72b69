/**
 * Thrown when an operation needs a connection but the manager has latched
 * into the `failed` state. No I/O is attempted once this is the case.
 */
export class ConnectionFailedError extends Error {
  constructor(
    public readonly target: string,
    public readonly attempts: number
  ) {
    super(
      `[db-session] Connection to ${target} failed after ${attempts} attempt${attempts === 1 ? '' : 's'}`
    );
    this.name = 'ConnectionFailedError';
  }
}

/**
 * Thrown when a cursor cannot be created from the open connection.
 * Cursor creation is never retried.
 */
export class CursorCreationError extends Error {
  constructor(
    public readonly target: string,
    cause: Error
  ) {
    super(`[db-session] Cursor creation failed on ${target}: ${cause.message}`, { cause });
    this.name = 'CursorCreationError';
  }
}

/**
 * Whether an error leaves the manager unusable
 */
export function isFatalError(error: unknown): error is ConnectionFailedError | CursorCreationError {
  return error instanceof ConnectionFailedError || error instanceof CursorCreationError;
}
