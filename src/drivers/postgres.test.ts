import { describe, it, expect, vi, beforeEach } from 'vitest';

const { Client, mockClient } = vi.hoisted(() => {
  const mockClient = {
    connect: vi.fn(),
    query: vi.fn(),
    end: vi.fn(),
    on: vi.fn(),
    setTypeParser: vi.fn(),
  };
  return {
    mockClient,
    Client: vi.fn(function MockClient() {
      return mockClient;
    }),
  };
});

vi.mock('pg', () => ({ Client }));

import { PostgresDriver } from './postgres.js';
import { DriverError } from './errors.js';

const target = {
  database: 'inventory',
  host: 'db.local',
  port: 5432,
  username: 'reporter',
  password: 'test-secret',
};

describe('PostgresDriver', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockClient.connect.mockResolvedValue(undefined);
    mockClient.query.mockResolvedValue({ rows: [] });
    mockClient.end.mockResolvedValue(undefined);
  });

  describe('open', () => {
    it('should create a client for the target and connect', async () => {
      await new PostgresDriver().open(target);

      expect(Client).toHaveBeenCalledWith({
        host: 'db.local',
        port: 5432,
        user: 'reporter',
        password: 'test-secret',
        database: 'inventory',
      });
      expect(mockClient.connect).toHaveBeenCalledTimes(1);
      expect(mockClient.on).toHaveBeenCalledWith('error', expect.any(Function));
    });

    it('should keep date and timestamp columns as server text', async () => {
      await new PostgresDriver().open(target);

      expect(mockClient.setTypeParser.mock.calls.map(([oid]) => oid)).toEqual([1082, 1114, 1184]);
      const parse: unknown = mockClient.setTypeParser.mock.calls[0]?.[1];
      if (typeof parse !== 'function') throw new Error('type parser not registered');
      expect(parse('2024-01-02')).toBe('2024-01-02');
    });

    it('should register type parsers before connecting', async () => {
      await new PostgresDriver().open(target);

      const lastParserCall = mockClient.setTypeParser.mock.invocationCallOrder[2] ?? Infinity;
      const connectCall = mockClient.connect.mock.invocationCallOrder[0] ?? -Infinity;
      expect(lastParserCall).toBeLessThan(connectCall);
    });

    it('should merge extra client settings', async () => {
      await new PostgresDriver({ clientConfig: { connectionTimeoutMillis: 2000 } }).open(target);

      expect(Client).toHaveBeenCalledWith(expect.objectContaining({ connectionTimeoutMillis: 2000, host: 'db.local' }));
    });

    it('should wrap connection errors', async () => {
      mockClient.connect.mockRejectedValue(
        Object.assign(new Error('password authentication failed for user "reporter"'), { code: '28P01' })
      );

      const result = new PostgresDriver().open(target);

      await expect(result).rejects.toBeInstanceOf(DriverError);
      await expect(result).rejects.toMatchObject({ kind: 'operation', code: '28P01' });
    });
  });

  describe('cursor', () => {
    it('should query rows as arrays', async () => {
      mockClient.query.mockResolvedValue({ rows: [[1, 'a', null]] });
      const cursor = (await new PostgresDriver().open(target)).cursor();

      await cursor.execute('SELECT id, name, note FROM items');

      expect(mockClient.query).toHaveBeenCalledWith({ text: 'SELECT id, name, note FROM items', rowMode: 'array' });
      expect(cursor.fetchAll()).toEqual([[1, 'a', null]]);
      expect(cursor.fetchAll()).toEqual([]);
    });

    it('should wrap execution errors', async () => {
      mockClient.query.mockRejectedValue(
        Object.assign(new Error('relation "missing" does not exist'), { code: '42P01' })
      );
      const cursor = (await new PostgresDriver().open(target)).cursor();

      await expect(cursor.execute('SELECT * FROM missing')).rejects.toMatchObject({
        name: 'DriverError',
        kind: 'operation',
        code: '42P01',
      });
    });

    it('should refuse cursors once the client reported a lost connection', async () => {
      const connection = await new PostgresDriver().open(target);
      const listener: unknown = mockClient.on.mock.calls[0]?.[1];
      if (typeof listener !== 'function') throw new Error('error listener not registered');

      listener(new Error('Connection terminated unexpectedly'));

      expect(() => connection.cursor()).toThrow('PostgreSQL connection lost: Connection terminated unexpectedly');
    });
  });

  describe('close', () => {
    it('should end the client once', async () => {
      const connection = await new PostgresDriver().open(target);

      await connection.close();
      await connection.close();

      expect(mockClient.end).toHaveBeenCalledTimes(1);
      expect(() => connection.cursor()).toThrow('PostgreSQL connection is closed');
    });

    it('should wrap close errors', async () => {
      mockClient.end.mockRejectedValue(new Error('Connection terminated'));
      const connection = await new PostgresDriver().open(target);

      await expect(connection.close()).rejects.toMatchObject({ name: 'DriverError', kind: 'interface' });
    });
  });
});
