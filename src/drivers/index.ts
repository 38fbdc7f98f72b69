import type { DriverName } from '../types.js';
import type { Driver } from './base.js';
import { MysqlDriver } from './mysql.js';
import { PostgresDriver } from './postgres.js';

export type { Driver, DriverConnection, DriverCursor } from './base.js';
export { MysqlDriver } from './mysql.js';
export type { MysqlDriverOptions } from './mysql.js';
export { PostgresDriver } from './postgres.js';
export type { PostgresDriverOptions } from './postgres.js';
export {
  DriverError,
  classifyDriverError,
  toDriverError,
  isRecoverableDriverError,
} from './errors.js';
export type { DriverErrorKind } from './errors.js';

/**
 * Create one of the bundled drivers by name
 */
export function createDriver(name: DriverName): Driver {
  switch (name) {
    case 'mysql':
      return new MysqlDriver();
    case 'postgres':
      return new PostgresDriver();
  }
}

/**
 * Resolve a driver option to a driver instance
 */
export function resolveDriver(driver: Driver | DriverName | undefined, fallback: DriverName): Driver {
  if (driver === undefined) return createDriver(fallback);
  return typeof driver === 'string' ? createDriver(driver) : driver;
}
