import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SqliteAdapter } from '../../db/adapters/sqlite.js';
import { ConfigurationError } from '../../errors.js';
import { FakeAdapter, createEcommerceDb, ecommerceSnapshot, neverSettles } from '../../__tests__/helpers.js';
import { SchemaDescriptor, loadSchemaDescriptor } from '../descriptor.js';
import { ECOMMERCE_TABLES } from '../ecommerce.js';

describe('SchemaDescriptor', () => {
  const schema = new SchemaDescriptor(ECOMMERCE_TABLES);

  it('lists tables in declaration order', () => {
    assert.deepEqual(
      schema.tables().map((t) => t.name),
      ['customers', 'products', 'orders'],
    );
  });

  it('matches identifiers case-insensitively', () => {
    assert.equal(schema.hasTable('CUSTOMERS'), true);
    assert.equal(schema.contains('Orders', 'Customer_ID'), true);
    assert.equal(schema.table('Products')?.name, 'products');
  });

  it('does not contain undeclared tables or columns', () => {
    assert.equal(schema.hasTable('ghost_table'), false);
    assert.equal(schema.contains('customers', 'salary'), false);
    assert.equal(schema.contains('ghost_table', 'id'), false);
  });

  it('freezes its definitions', () => {
    assert.equal(Object.isFrozen(schema.tables()), true);
    assert.equal(Object.isFrozen(schema.tables()[0].columns), true);
  });

  it('derives a stable version from its content', () => {
    const again = new SchemaDescriptor(ECOMMERCE_TABLES);
    assert.equal(again.version, schema.version);
    assert.match(schema.version, /^[0-9a-f]{16}$/);

    const changed = new SchemaDescriptor([
      { name: 'customers', columns: [{ name: 'id', declaredType: 'INTEGER' }] },
    ]);
    assert.notEqual(changed.version, schema.version);
  });

  it('rejects a table declared twice', () => {
    assert.throws(
      () =>
        new SchemaDescriptor([
          { name: 'customers', columns: [] },
          { name: 'Customers', columns: [] },
        ]),
      { name: 'ConfigurationError', message: 'Table "Customers" is declared more than once.' },
    );
  });
});

describe('loadSchemaDescriptor', () => {
  it('builds the descriptor when every declared column exists', async () => {
    const adapter = new FakeAdapter(neverSettles);
    const schema = await loadSchemaDescriptor(adapter, ECOMMERCE_TABLES);
    assert.equal(schema.tables().length, 3);
    assert.equal(adapter.acquired, 0);
  });

  it('fails when no tables are declared', async () => {
    const adapter = new FakeAdapter(neverSettles);
    await assert.rejects(loadSchemaDescriptor(adapter, []), {
      name: 'ConfigurationError',
      message: 'No tables are declared for querying.',
    });
  });

  it('fails when the database is unreachable', async () => {
    const adapter = new FakeAdapter(neverSettles, async () => {
      throw new Error('connect ECONNREFUSED');
    });
    await assert.rejects(loadSchemaDescriptor(adapter, ECOMMERCE_TABLES), (err: unknown) => {
      assert.ok(err instanceof ConfigurationError);
      assert.equal(err.message, 'Database is unreachable: connect ECONNREFUSED');
      return true;
    });
  });

  it('names missing tables', async () => {
    const adapter = new FakeAdapter(neverSettles, async () => {
      const snapshot = ecommerceSnapshot();
      return { ...snapshot, tables: snapshot.tables.filter((t) => t.name === 'customers') };
    });
    await assert.rejects(loadSchemaDescriptor(adapter, ECOMMERCE_TABLES), {
      message: 'Database is missing expected tables: products, orders',
    });
  });

  it('names missing columns', async () => {
    const adapter = new FakeAdapter(neverSettles, async () => {
      const snapshot = ecommerceSnapshot();
      return {
        ...snapshot,
        tables: snapshot.tables.map((t) =>
          t.name === 'orders' ? { ...t, columns: t.columns.filter((c) => c.name !== 'quantity') } : t,
        ),
      };
    });
    await assert.rejects(loadSchemaDescriptor(adapter, ECOMMERCE_TABLES), {
      message: 'Database is missing expected columns: orders.quantity',
    });
  });

  it('verifies a real SQLite store database', async () => {
    const store = createEcommerceDb();
    try {
      const schema = await loadSchemaDescriptor(new SqliteAdapter({ filename: store.path }), ECOMMERCE_TABLES);
      assert.equal(schema.contains('orders', 'order_date'), true);
    } finally {
      store.cleanup();
    }
  });
});
