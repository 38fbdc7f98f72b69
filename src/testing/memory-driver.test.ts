import { describe, it, expect } from 'vitest';
import { MemoryDriver } from './memory-driver.js';
import { DriverError } from '../drivers/errors.js';

const target = {
  database: 'inventory',
  host: 'db.local',
  port: 3306,
  username: 'reporter',
  password: 'test-secret',
};

describe('MemoryDriver', () => {
  it('should fail the configured number of opens', async () => {
    const driver = new MemoryDriver({ failOpens: 1 });

    await expect(driver.open(target)).rejects.toMatchObject({ kind: 'interface', code: 'ECONNREFUSED' });
    await expect(driver.open(target)).resolves.toBeDefined();
    expect(driver.stats.opens).toBe(2);
  });

  it('should use a custom open error', async () => {
    const driver = new MemoryDriver().failNextOpens(1, () => new DriverError('too many connections', 'interface'));

    await expect(driver.open(target)).rejects.toThrow('too many connections');
  });

  it('should return copies of canned rows', async () => {
    const driver = new MemoryDriver({ results: { 'SELECT 1': [[1]] } });
    const cursor = (await driver.open(target)).cursor();

    await cursor.execute('SELECT 1');
    const rows = cursor.fetchAll();
    rows[0]?.push(2);
    await cursor.execute('SELECT 1');

    expect(cursor.fetchAll()).toEqual([[1]]);
    expect(driver.executed).toEqual(['SELECT 1', 'SELECT 1']);
  });

  it('should refuse cursors after close', async () => {
    const driver = new MemoryDriver();
    const connection = await driver.open(target);

    await connection.close();
    await connection.close();

    expect(driver.stats.closes).toBe(1);
    expect(() => connection.cursor()).toThrow('memory connection is closed');
  });

  it('should record targets', async () => {
    const driver = new MemoryDriver();

    await driver.open(target);

    expect(driver.targets).toEqual([target]);
  });
});
