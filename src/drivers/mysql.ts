import mysql from 'mysql2/promise';
import type { Connection } from 'mysql2/promise';
import type { ConnectionTarget, SqlRow } from '../types.js';
import type { Driver, DriverConnection, DriverCursor } from './base.js';
import { DriverError, toDriverError } from './errors.js';
import { toSqlValue } from '../normalize.js';

export interface MysqlDriverOptions {
  /** Milliseconds before an unanswered handshake fails (mysql2 default: 10000) */
  connectTimeout?: number;
}

function toRows(result: unknown): SqlRow[] {
  // DML statements resolve to a ResultSetHeader, not an array
  if (!Array.isArray(result)) return [];

  const rows: unknown[] = result;
  return rows.map((row) => (Array.isArray(row) ? row.map(toSqlValue) : []));
}

class MysqlCursor implements DriverCursor {
  private rows: SqlRow[] = [];

  constructor(private readonly connection: Connection) {}

  async execute(sql: string): Promise<void> {
    this.rows = [];
    try {
      const [result] = await this.connection.query({ sql, rowsAsArray: true });
      this.rows = toRows(result);
    } catch (error) {
      throw toDriverError(error);
    }
  }

  fetchAll(): SqlRow[] {
    const rows = this.rows;
    this.rows = [];
    return rows;
  }
}

class MysqlConnection implements DriverConnection {
  private closed = false;

  constructor(private readonly connection: Connection) {}

  cursor(): DriverCursor {
    if (this.closed) {
      throw new DriverError('MySQL connection is closed', 'interface');
    }
    return new MysqlCursor(this.connection);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    try {
      await this.connection.end();
    } catch (error) {
      throw toDriverError(error);
    }
  }
}

/**
 * Driver backed by mysql2
 */
export class MysqlDriver implements Driver {
  readonly name = 'mysql';
  readonly defaultPort = 3306;

  constructor(private readonly options: MysqlDriverOptions = {}) {}

  async open(target: ConnectionTarget): Promise<DriverConnection> {
    try {
      const connection = await mysql.createConnection({
        host: target.host,
        port: target.port,
        user: target.username,
        password: target.password,
        database: target.database,
        // keep BIGINT, DECIMAL and temporal values as the text the server sent
        supportBigNumbers: true,
        bigNumberStrings: true,
        dateStrings: true,
        ...(this.options.connectTimeout !== undefined && {
          connectTimeout: this.options.connectTimeout,
        }),
      });
      return new MysqlConnection(connection);
    } catch (error) {
      throw toDriverError(error);
    }
  }
}
