import type { DebugConfig, DebugContext, LogLevel } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

const PREFIX = '[db-session]';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  error: 2,
};

/**
 * Logger for connection lifecycle and query events
 * Emits one prefixed line per event together with a structured context
 */
export class DebugLogger {
  private readonly enabled: boolean;
  private readonly level: LogLevel;
  private readonly logQueries: boolean;
  private readonly logConnectionEvents: boolean;
  private readonly logger: (message: string, context: DebugContext) => void;

  constructor(config?: DebugConfig) {
    this.enabled = config?.enabled ?? DEFAULT_CONFIG.debug.enabled;
    this.level = config?.level ?? DEFAULT_CONFIG.debug.level;
    this.logQueries = config?.logQueries ?? DEFAULT_CONFIG.debug.logQueries;
    this.logConnectionEvents = config?.logConnectionEvents ?? DEFAULT_CONFIG.debug.logConnectionEvents;
    this.logger = config?.logger ?? this.defaultLogger;
  }

  /**
   * Check if a level would be emitted
   */
  isEnabled(level: LogLevel = 'debug'): boolean {
    return this.enabled && LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  /**
   * Log the start of a connection attempt
   */
  logConnectAttempt(target: string, attempt: number): void {
    if (!this.logConnectionEvents) return;

    this.emit(`${PREFIX} CONNECT target=${target} attempt=${attempt}`, {
      type: 'connect_attempt',
      level: 'debug',
      target,
      metadata: { attempt },
    });
  }

  /**
   * Log a failed attempt that will be retried
   */
  logConnectionRetry(target: string, attempt: number, error: Error, delayMs: number): void {
    if (!this.logConnectionEvents) return;

    this.emit(
      `${PREFIX} CONNECTION_RETRY target=${target} attempt=${attempt} delay=${delayMs}ms error="${error.message}"`,
      {
        type: 'connection_retry',
        level: 'error',
        target,
        error: error.message,
        metadata: { attempt, delayMs },
      }
    );
  }

  /**
   * Log an opened connection
   */
  logConnectionSuccess(target: string, attempts: number, totalTimeMs: number): void {
    if (!this.logConnectionEvents) return;

    this.emit(`${PREFIX} CONNECTION_SUCCESS target=${target} attempts=${attempts} totalTime=${totalTimeMs}ms`, {
      type: 'connection_success',
      level: 'debug',
      target,
      metadata: { attempts, totalTimeMs },
    });
  }

  /**
   * Log exhausted retries
   */
  logConnectionFailed(target: string, attempts: number): void {
    if (!this.logConnectionEvents) return;

    this.emit(`${PREFIX} CONNECTION_FAILED target=${target} attempts=${attempts} max retry count reached`, {
      type: 'connection_failed',
      level: 'error',
      target,
      metadata: { attempts },
    });
  }

  /**
   * Log a cursor that could not be created
   */
  logCursorError(target: string, error: Error): void {
    if (!this.logConnectionEvents) return;

    this.emit(`${PREFIX} CURSOR_ERROR target=${target} error="${error.message}"`, {
      type: 'cursor_error',
      level: 'error',
      target,
      error: error.message,
    });
  }

  /**
   * Log a query about to be reported
   */
  logQuery(target: string, query: string): void {
    if (!this.logQueries) return;

    const truncated = this.truncateQuery(query);
    this.emit(`${PREFIX} QUERY target=${target} query="${truncated}"`, {
      type: 'query',
      level: 'info',
      target,
      query: truncated,
    });
  }

  /**
   * Log the rows a query returned
   */
  logQueryResult(target: string, rows: readonly string[][]): void {
    if (!this.logQueries) return;

    const message = rows.length > 0
      ? `${PREFIX} RESULT target=${target} rows=${rows.length} ${JSON.stringify(rows)}`
      : `${PREFIX} RESULT target=${target} rows=0 query executed successfully`;

    this.emit(message, {
      type: 'query_result',
      level: 'debug',
      target,
      metadata: { rowCount: rows.length },
    });
  }

  /**
   * Log a failed query
   */
  logQueryError(target: string, query: string, error: Error): void {
    if (!this.logQueries) return;

    const truncated = this.truncateQuery(query);
    this.emit(`${PREFIX} QUERY_ERROR target=${target} query="${truncated}" error="${error.message}"`, {
      type: 'query_error',
      level: 'error',
      target,
      query: truncated,
      error: error.message,
    });
  }

  /**
   * Log a closed connection
   */
  logDisconnect(target: string): void {
    if (!this.logConnectionEvents) return;

    this.emit(`${PREFIX} DISCONNECT target=${target}`, {
      type: 'disconnect',
      level: 'debug',
      target,
    });
  }

  /**
   * Log a failure while closing
   */
  logDisconnectError(target: string, error: Error): void {
    if (!this.logConnectionEvents) return;

    this.emit(`${PREFIX} DISCONNECT_ERROR target=${target} error="${error.message}"`, {
      type: 'disconnect_error',
      level: 'error',
      target,
      error: error.message,
    });
  }

  /**
   * Log a custom message
   */
  log(message: string, level: LogLevel = 'debug', context?: Partial<DebugContext>): void {
    this.emit(`${PREFIX} ${message}`, { ...context, type: context?.type ?? 'message', level });
  }

  private emit(message: string, context: DebugContext): void {
    if (!this.isEnabled(context.level)) return;
    this.logger(message, context);
  }

  /**
   * Default logger implementation using console
   */
  private defaultLogger(message: string, context: DebugContext): void {
    if (context.level === 'error') {
      console.error(message);
    } else {
      console.log(message);
    }
  }

  /**
   * Truncate long queries for readability
   */
  private truncateQuery(query: string, maxLength = 100): string {
    const normalized = query.replace(/\s+/g, ' ').trim();
    if (normalized.length <= maxLength) {
      return normalized;
    }
    return normalized.substring(0, maxLength - 3) + '...';
  }
}

/**
 * Create a logger instance
 */
export function createDebugLogger(config?: DebugConfig): DebugLogger {
  return new DebugLogger(config);
}
