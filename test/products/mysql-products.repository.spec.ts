import type { DatabaseService, SqlExecutor } from '../../src/database/database.service';
import { MysqlProductsRepository } from '../../src/products/mysql-products.repository';
import type { Product } from '../../src/products/product.entity';

const LAMP: Product = {
  id: 3,
  name: 'Desk lamp',
  price: 39.9,
  description: null,
  quantity: 4,
  created_by: 'bob',
  created_at: new Date(Date.UTC(2026, 0, 1)),
  updated_at: new Date(Date.UTC(2026, 0, 1))
};

function makeExecutor() {
  return {
    sql: jest.fn(),
    selectAll: jest.fn(),
    updateByKey: jest.fn()
  };
}

function makeDb(executor: ReturnType<typeof makeExecutor>) {
  const db = {
    ...executor,
    transaction: jest.fn(async <T>(work: (tx: SqlExecutor) => Promise<T>) => work(executor as unknown as SqlExecutor))
  };
  return db as unknown as DatabaseService;
}

// Joins the literal parts of a tagged-template call the way templateToSql does.
function statementOf(call: unknown[]): string {
  const [strings] = call as [TemplateStringsArray];
  return strings.join('?').replace(/\s+/g, ' ').trim();
}

describe('MysqlProductsRepository', () => {
  it('inserts and reads back the new row in one transaction', async () => {
    const executor = makeExecutor();
    executor.sql.mockResolvedValueOnce({ insertId: 3 }).mockResolvedValueOnce([LAMP]);
    const db = makeDb(executor);
    const repository = new MysqlProductsRepository(db);

    const created = await repository.insert({
      name: 'Desk lamp',
      price: 39.9,
      description: null,
      quantity: 4,
      created_by: 'bob'
    });

    expect(created).toEqual(LAMP);
    expect(db.transaction).toHaveBeenCalledTimes(1);
    expect(statementOf(executor.sql.mock.calls[0])).toBe(
      'INSERT INTO products (name, price, description, quantity, created_by) VALUES (?, ?, ?, ?, ?)'
    );
    expect(executor.sql.mock.calls[0].slice(1)).toEqual(['Desk lamp', 39.9, null, 4, 'bob']);
    expect(executor.sql.mock.calls[1].slice(1)).toEqual([3]);
  });

  it('resolves to null for a missing id', async () => {
    const executor = makeExecutor();
    executor.sql.mockResolvedValueOnce([]);
    const repository = new MysqlProductsRepository(makeDb(executor));

    await expect(repository.findById(99)).resolves.toBeNull();
  });

  it('passes the sort through the column allow-list', async () => {
    const executor = makeExecutor();
    executor.selectAll.mockResolvedValueOnce([LAMP]);
    const repository = new MysqlProductsRepository(makeDb(executor));

    await expect(repository.findAll({ field: 'price', order: 'desc' })).resolves.toEqual([LAMP]);
    expect(executor.selectAll).toHaveBeenCalledWith('products', { column: 'price', direction: 'desc' }, [
      'id',
      'name',
      'price',
      'created_at'
    ]);
  });

  it('lists without ORDER BY when no sort is given', async () => {
    const executor = makeExecutor();
    executor.selectAll.mockResolvedValueOnce([]);
    const repository = new MysqlProductsRepository(makeDb(executor));

    await repository.findAll();
    expect(executor.selectAll.mock.calls[0][1]).toBeUndefined();
  });

  it('updates only updatable columns and returns the fresh row', async () => {
    const executor = makeExecutor();
    executor.updateByKey.mockResolvedValueOnce(1);
    executor.sql.mockResolvedValueOnce([{ ...LAMP, price: 35 }]);
    const repository = new MysqlProductsRepository(makeDb(executor));

    await expect(repository.update(3, { price: 35 })).resolves.toMatchObject({ id: 3, price: 35 });
    expect(executor.updateByKey).toHaveBeenCalledWith('products', 'id', 3, { price: 35 }, [
      'name',
      'price',
      'description',
      'quantity'
    ]);
  });

  it('reports a missing row after update as null', async () => {
    const executor = makeExecutor();
    executor.updateByKey.mockResolvedValueOnce(0);
    executor.sql.mockResolvedValueOnce([]);
    const repository = new MysqlProductsRepository(makeDb(executor));

    await expect(repository.update(99, { price: 1 })).resolves.toBeNull();
  });

  it('reports whether a row was deleted', async () => {
    const executor = makeExecutor();
    executor.sql.mockResolvedValueOnce({ affectedRows: 1 }).mockResolvedValueOnce({ affectedRows: 0 });
    const repository = new MysqlProductsRepository(makeDb(executor));

    await expect(repository.delete(3)).resolves.toBe(true);
    await expect(repository.delete(3)).resolves.toBe(false);
  });

  it('counts rows', async () => {
    const executor = makeExecutor();
    executor.sql.mockResolvedValueOnce([{ total: 5 }]);
    const repository = new MysqlProductsRepository(makeDb(executor));

    await expect(repository.count()).resolves.toBe(5);
  });
});
