/**
 * `interface` covers transport and session failures (refused, reset, lost
 * connection); `operation` covers everything the server rejected.
 */
export type DriverErrorKind = 'interface' | 'operation';

/**
 * Error reported by a driver adapter
 */
export class DriverError extends Error {
  constructor(
    message: string,
    public readonly kind: DriverErrorKind,
    public readonly code?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DriverError';
  }
}

const INTERFACE_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'EPIPE',
  'PROTOCOL_CONNECTION_LOST',
  'PROTOCOL_SEQUENCE_TIMEOUT',
  'ER_CON_COUNT_ERROR',
  'ER_SERVER_SHUTDOWN',
  'ERR_STREAM_DESTROYED',
  // postgres: too_many_connections, admin_shutdown, cannot_connect_now
  '53300',
  '57P01',
  '57P03',
]);

const INTERFACE_PATTERNS = [
  'connection refused',
  'connection reset',
  'connection terminated',
  'connection timed out',
  'connection lost',
  'connection is closed',
  'timeout expired',
  'socket hang up',
  'too many connections',
  'sorry, too many clients',
  'the database system is starting up',
  'the database system is shutting down',
  'server closed the connection unexpectedly',
  'could not connect to server',
];

function readCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  const { code } = error;
  return typeof code === 'string' ? code : undefined;
}

function isFatalFlag(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'fatal' in error && error.fatal === true;
}

/**
 * Classify a raw driver error by its code, its `fatal` flag (mysql2) and
 * known transient-connection messages
 */
export function classifyDriverError(error: unknown): DriverErrorKind {
  const code = readCode(error);
  if (code !== undefined && INTERFACE_CODES.has(code)) {
    return 'interface';
  }

  if (isFatalFlag(error)) {
    return 'interface';
  }

  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
  if (INTERFACE_PATTERNS.some((pattern) => message.includes(pattern))) {
    return 'interface';
  }

  return 'operation';
}

/**
 * Wrap anything a driver library throws into a `DriverError`
 */
export function toDriverError(error: unknown): DriverError {
  if (error instanceof DriverError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new DriverError(message, classifyDriverError(error), readCode(error), { cause: error });
}

/**
 * Default retry predicate: any error a driver reported is recoverable
 */
export function isRecoverableDriverError(error: Error): boolean {
  return error instanceof DriverError;
}
