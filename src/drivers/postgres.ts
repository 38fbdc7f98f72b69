import { Client } from 'pg';
import type { ClientConfig } from 'pg';
import type { ConnectionTarget, SqlRow } from '../types.js';
import type { Driver, DriverConnection, DriverCursor } from './base.js';
import { DriverError, toDriverError } from './errors.js';
import { toSqlValue } from '../normalize.js';

// date, timestamp and timestamptz; int8 and numeric already arrive as text
const TEMPORAL_TYPE_OIDS = [1082, 1114, 1184] as const;

export interface PostgresDriverOptions {
  /** Extra client settings (credentials always come from the target) */
  clientConfig?: Omit<ClientConfig, 'host' | 'port' | 'user' | 'password' | 'database' | 'connectionString'>;
}

class PostgresCursor implements DriverCursor {
  private rows: SqlRow[] = [];

  constructor(private readonly client: Client) {}

  async execute(sql: string): Promise<void> {
    this.rows = [];
    try {
      const result = await this.client.query<unknown[]>({ text: sql, rowMode: 'array' });
      this.rows = result.rows.map((row) => row.map(toSqlValue));
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

class PostgresConnection implements DriverConnection {
  private closed = false;
  private lostError: Error | null = null;

  constructor(private readonly client: Client) {
    // an idle client that loses its socket emits 'error'; unhandled it would crash the process
    client.on('error', (error) => {
      this.lostError = error;
    });
  }

  cursor(): DriverCursor {
    if (this.closed) {
      throw new DriverError('PostgreSQL connection is closed', 'interface');
    }
    if (this.lostError) {
      throw new DriverError(`PostgreSQL connection lost: ${this.lostError.message}`, 'interface', undefined, {
        cause: this.lostError,
      });
    }
    return new PostgresCursor(this.client);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    try {
      await this.client.end();
    } catch (error) {
      throw toDriverError(error);
    }
  }
}

/**
 * Driver backed by pg
 */
export class PostgresDriver implements Driver {
  readonly name = 'postgres';
  readonly defaultPort = 5432;

  constructor(private readonly options: PostgresDriverOptions = {}) {}

  async open(target: ConnectionTarget): Promise<DriverConnection> {
    const client = new Client({
      ...this.options.clientConfig,
      host: target.host,
      port: target.port,
      user: target.username,
      password: target.password,
      database: target.database,
    });

    for (const oid of TEMPORAL_TYPE_OIDS) {
      client.setTypeParser(oid, (value: string) => value);
    }

    try {
      await client.connect();
    } catch (error) {
      throw toDriverError(error);
    }

    return new PostgresConnection(client);
  }
}
