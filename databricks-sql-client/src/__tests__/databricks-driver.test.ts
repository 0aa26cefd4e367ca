/**
 * Adapter tests over a stubbed @databricks/sql client surface
 */

import { describe, it, expect, vi } from 'vitest';
import { ConversionError } from '../errors.js';
import {
  assertUniqueColumns,
  createDatabricksDriver,
  recordToRow,
  type DatabricksClientLike,
  type DatabricksOperationLike,
  type DatabricksSessionLike
} from '../clients/databricks-driver.js';

function createStubClient(records: object[], columns: Array<{ columnName: string; position: number }>) {
  const operation: DatabricksOperationLike = {
    fetchAll: vi.fn(async () => records),
    getSchema: vi.fn(async () => ({ columns })),
    close: vi.fn(async () => undefined)
  };
  const session: DatabricksSessionLike = {
    executeStatement: vi.fn(async () => operation),
    close: vi.fn(async () => undefined)
  };
  const client: DatabricksClientLike = {
    connect: vi.fn(async () => client),
    openSession: vi.fn(async () => session),
    close: vi.fn(async () => undefined)
  };
  return { client, session, operation };
}

describe('createDatabricksDriver', () => {
  it('should connect with token auth and open a session in the given catalog', async () => {
    const { client } = createStubClient([], []);
    const driver = createDatabricksDriver(() => client);

    const connection = await driver.connect({
      host: 'test-workspace.cloud.databricks.com',
      path: '/sql/1.0/warehouses/test-warehouse',
      token: 'test-token'
    });
    await connection.openCursor({ catalog: 'main', schema: 'sales' });

    expect(client.connect).toHaveBeenCalledWith({
      host: 'test-workspace.cloud.databricks.com',
      path: '/sql/1.0/warehouses/test-warehouse',
      token: 'test-token'
    });
    expect(client.openSession).toHaveBeenCalledWith({ initialCatalog: 'main', initialSchema: 'sales' });
  });

  it('should leave catalog and schema to the warehouse when unset', async () => {
    const { client } = createStubClient([], []);
    const connection = await createDatabricksDriver(() => client).connect({
      host: 'h',
      path: '/p',
      token: 'test-token'
    });

    await connection.openCursor();

    expect(client.openSession).toHaveBeenCalledWith({});
  });

  it('should return rows as tuples in column position order', async () => {
    const { client, session } = createStubClient(
      [
        { name: 'a', id: 1 },
        { name: 'b', id: 2 }
      ],
      [
        { columnName: 'name', position: 2 },
        { columnName: 'id', position: 1 }
      ]
    );
    const connection = await createDatabricksDriver(() => client).connect({
      host: 'h',
      path: '/p',
      token: 'test-token'
    });
    const cursor = await connection.openCursor();

    const statement = await cursor.execute('SELECT id, name FROM t');

    expect(session.executeStatement).toHaveBeenCalledWith('SELECT id, name FROM t');
    expect(await statement.columnNames()).toEqual(['id', 'name']);
    expect(await statement.fetchAll()).toEqual([
      [1, 'a'],
      [2, 'b']
    ]);
  });

  it('should refuse a result whose columns share a name', async () => {
    const { client, operation } = createStubClient(
      [{ id: 2 }],
      [
        { columnName: 'id', position: 1 },
        { columnName: 'id', position: 2 }
      ]
    );
    const connection = await createDatabricksDriver(() => client).connect({
      host: 'h',
      path: '/p',
      token: 'test-token'
    });
    const statement = await (await connection.openCursor()).execute('SELECT a.id, b.id FROM a JOIN b');

    const pending = statement.fetchAll();

    await expect(pending).rejects.toBeInstanceOf(ConversionError);
    await expect(pending).rejects.toMatchObject({ details: { duplicated: ['id'] } });
    expect(operation.fetchAll).not.toHaveBeenCalled();
  });

  it('should close operation, session and client', async () => {
    const { client, session, operation } = createStubClient([], []);
    const connection = await createDatabricksDriver(() => client).connect({
      host: 'h',
      path: '/p',
      token: 'test-token'
    });
    const cursor = await connection.openCursor();
    const statement = await cursor.execute('SELECT 1');

    await statement.close();
    await cursor.close();
    await connection.close();

    expect(operation.close).toHaveBeenCalledTimes(1);
    expect(session.close).toHaveBeenCalledTimes(1);
    expect(client.close).toHaveBeenCalledTimes(1);
  });

  it('should pass a connect failure through unchanged', async () => {
    const failure = new Error('getaddrinfo ENOTFOUND h');
    const { client } = createStubClient([], []);
    client.connect = vi.fn(async () => {
      throw failure;
    });

    await expect(
      createDatabricksDriver(() => client).connect({ host: 'h', path: '/p', token: 'test-token' })
    ).rejects.toBe(failure);
  });

  it('should report no columns for a statement without a result schema', async () => {
    const { client, operation } = createStubClient([], []);
    operation.getSchema = vi.fn(async () => null);
    const connection = await createDatabricksDriver(() => client).connect({
      host: 'h',
      path: '/p',
      token: 'test-token'
    });
    const statement = await (await connection.openCursor()).execute('SET spark.sql.ansi.enabled = true');

    expect(await statement.columnNames()).toEqual([]);
  });
});

describe('assertUniqueColumns', () => {
  it('should accept distinct names', () => {
    expect(() => assertUniqueColumns(['id', 'name'])).not.toThrow();
  });

  it('should name each repeated column once', () => {
    expect(() => assertUniqueColumns(['id', 'name', 'id', 'name', 'id'])).toThrow(
      'Result has duplicate column names: id, name. Alias them to make each name unique.'
    );
  });
});

describe('recordToRow', () => {
  it('should order values by the given columns', () => {
    expect(recordToRow({ b: 2, a: 1 }, ['a', 'b'])).toEqual([1, 2]);
  });

  it('should keep a NULL value that the record carries', () => {
    expect(recordToRow({ a: 1, b: null }, ['a', 'b'])).toEqual([1, null]);
  });

  it('should reject a record that lacks one of the columns', () => {
    expect(() => recordToRow({ a: 1 }, ['a', 'b'])).toThrow(
      new ConversionError('Row is missing columns: b')
    );
  });

  it('should reject repeated column names', () => {
    expect(() => recordToRow({ id: 2 }, ['id', 'id'])).toThrow(ConversionError);
  });

  it('should fall back to field order without column metadata', () => {
    expect(recordToRow({ x: 'first', y: 'second' }, [])).toEqual(['first', 'second']);
  });
});
