/**
 * Flags on the root program; `color` is false under --no-color
 */
export type GlobalFlags = {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  color?: boolean;
};

/**
 * Connection flags shared by every command
 */
export interface ConnectionFlags {
  database?: string;
  host?: string;
  user?: string;
  password?: string;
  port?: string;
  instance?: string;
  driver?: string;
  retries?: string;
}

/**
 * Options for the query command
 */
export interface QueryOptions extends ConnectionFlags {
  format: string;
}

/**
 * Options for the check command
 */
export type CheckOptions = ConnectionFlags;

/**
 * JSON output for the query command
 */
export interface QueryJsonOutput {
  target: string;
  rowCount: number;
  rows: string[][];
}

/**
 * JSON output for the check command
 */
export interface CheckJsonOutput {
  target: string;
  database: string;
  driver: string;
  status: string;
  attempts: number;
  instance?: string;
}
