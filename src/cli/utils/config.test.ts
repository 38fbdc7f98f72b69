import { describe, it, expect } from 'vitest';
import { resolveConnectionSettings, toManagerOptions } from './config.js';
import { CLIError } from './errors.js';

describe('resolveConnectionSettings', () => {
  const env = {
    DB_NAME: 'inventory',
    DB_HOST: 'db.local',
    DB_USER: 'reporter',
    DB_PASSWORD: 'test-secret',
  };

  it('should read settings from the environment', () => {
    expect(resolveConnectionSettings({}, env)).toEqual({
      database: 'inventory',
      host: 'db.local',
      username: 'reporter',
      password: 'test-secret',
      driver: 'mysql',
    });
  });

  it('should prefer flags over the environment', () => {
    const settings = resolveConnectionSettings({ database: 'orders', user: 'admin' }, env);

    expect(settings.database).toBe('orders');
    expect(settings.username).toBe('admin');
    expect(settings.host).toBe('db.local');
  });

  it('should default the password to empty', () => {
    const settings = resolveConnectionSettings({ database: 'inventory', host: 'db.local', user: 'reporter' }, {});

    expect(settings.password).toBe('');
  });

  it('should coerce port and retries', () => {
    const settings = resolveConnectionSettings({ port: '5433', retries: '3', driver: 'postgres' }, env);

    expect(settings.port).toBe(5433);
    expect(settings.retries).toBe(3);
    expect(settings.driver).toBe('postgres');
  });

  it('should list every missing setting', () => {
    expect(() => resolveConnectionSettings({}, {})).toThrow(
      'Invalid connection settings: database: database is required (--database or DB_NAME); ' +
        'host: host is required (--host or DB_HOST); username: user is required (--user or DB_USER)'
    );
  });

  it('should throw a CLIError for invalid values', () => {
    expect(() => resolveConnectionSettings({ port: 'abc' }, env)).toThrow(CLIError);
    expect(() => resolveConnectionSettings({ driver: 'oracle' }, env)).toThrow(/driver: /);
    expect(() => resolveConnectionSettings({ retries: '0' }, env)).toThrow(/retries: /);
  });
});

describe('toManagerOptions', () => {
  const debugConfig = { enabled: false };

  it('should map settings to manager options', () => {
    const options = toManagerOptions(
      { database: 'inventory', host: 'db.local', username: 'reporter', password: 'test-secret', driver: 'mysql' },
      debugConfig
    );

    expect(options).toEqual({
      database: 'inventory',
      host: 'db.local',
      username: 'reporter',
      password: 'test-secret',
      driver: 'mysql',
      debug: debugConfig,
    });
  });

  it('should map optional settings', () => {
    const options = toManagerOptions(
      {
        database: 'inventory',
        host: 'db.local',
        username: 'reporter',
        password: '',
        driver: 'postgres',
        port: 5433,
        instance: 'replica',
        retries: 3,
      },
      debugConfig
    );

    expect(options.port).toBe(5433);
    expect(options.instance).toBe('replica');
    expect(options.retry).toEqual({ maxConnectionRetries: 3 });
  });
});
