/**
 * Shared fixtures for core tests: a scripted language model, a throwaway
 * SQLite store database and in-process database fakes.
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import { pino } from 'pino';
import type { DbAdapter, DbSession, RowSet, SchemaSnapshot, SessionLimits } from '../db/types.js';
import type { ChatMessage, CompletionOptions, LanguageModel } from '../llm/types.js';
import type { Logger } from '../logger.js';
import { ECOMMERCE_TABLES } from '../schema/ecommerce.js';

export const silentLogger: Logger = pino({ level: 'silent' });

/** Replies with the scripted responses in order; an Error entry is thrown instead. */
export class ScriptedModel implements LanguageModel {
  readonly name = 'scripted';
  readonly calls: ChatMessage[][] = [];
  private readonly script: (string | Error)[];

  constructor(script: (string | Error)[]) {
    this.script = [...script];
  }

  async complete(messages: ChatMessage[], _options?: CompletionOptions): Promise<string> {
    this.calls.push(messages);
    const next = this.script.shift();
    if (next === undefined) {
      throw new Error('ScriptedModel ran out of responses');
    }
    if (next instanceof Error) throw next;
    return next;
  }
}

/** Never answers; settles only when the caller aborts. */
export class HangingModel implements LanguageModel {
  readonly name = 'hanging';
  aborted = false;

  complete(_messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    return new Promise((_resolve, reject) => {
      options.signal?.addEventListener('abort', () => {
        this.aborted = true;
        reject(new Error('aborted'));
      });
    });
  }
}

export interface StoreDb {
  path: string;
  cleanup: () => void;
}

/** Create a SQLite file holding the store tables with a few made-up rows. */
export function createEcommerceDb(): StoreDb {
  const dir = mkdtempSync(join(tmpdir(), 'cartquery-test-'));
  const path = join(dir, 'ecommerce.db');
  const db = new Database(path);
  db.exec(`
    CREATE TABLE customers (
      id INTEGER PRIMARY KEY,
      name VARCHAR(100),
      email VARCHAR(100),
      created_at TIMESTAMP
    );
    CREATE TABLE products (
      id INTEGER PRIMARY KEY,
      name VARCHAR(100),
      price FLOAT,
      category VARCHAR(50)
    );
    CREATE TABLE orders (
      id INTEGER PRIMARY KEY,
      customer_id INTEGER REFERENCES customers(id),
      product_id INTEGER REFERENCES products(id),
      quantity INTEGER,
      order_date TIMESTAMP
    );
    INSERT INTO customers (id, name, email, created_at) VALUES
      (1, 'Ada Park', 'ada@example.com', '2024-01-05 10:00:00'),
      (2, 'Ben Ortiz', 'ben@example.com', '2024-02-11 09:30:00'),
      (3, 'Cleo Wang', 'cleo@example.com', '2024-03-20 14:15:00');
    INSERT INTO products (id, name, price, category) VALUES
      (1, 'Desk Lamp', 24.5, 'Home'),
      (2, 'Notebook', 3.25, 'Office'),
      (3, 'Headphones', 79.99, 'Electronics'),
      (4, 'Mug', 8.0, 'Home');
    INSERT INTO orders (id, customer_id, product_id, quantity, order_date) VALUES
      (1, 1, 3, 1, '2024-04-01 12:00:00'),
      (2, 1, 2, 4, '2024-04-02 08:00:00'),
      (3, 2, 1, 2, '2024-04-03 16:45:00'),
      (4, 3, 4, 6, '2024-04-05 11:20:00'),
      (5, 3, 3, 1, '2024-04-06 19:05:00');
  `);
  db.close();

  return {
    path,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

/** Snapshot matching the declared store tables. */
export function ecommerceSnapshot(): SchemaSnapshot {
  return {
    capturedAt: new Date(0),
    tables: ECOMMERCE_TABLES.map((table) => ({
      name: table.name,
      columns: table.columns.map((column) => ({
        name: column.name,
        dataType: column.declaredType,
        nullable: true,
        isPrimaryKey: column.name === 'id',
      })),
    })),
  };
}

export type FakeQuery = (sql: string, limits: SessionLimits) => Promise<RowSet>;

/** In-process adapter whose sessions run the given function and record their release. */
export class FakeAdapter implements DbAdapter {
  readonly type = 'sqlite' as const;
  acquired = 0;
  readonly releases: boolean[] = [];
  readonly statements: string[] = [];
  closed = false;

  constructor(
    private readonly run: FakeQuery,
    private readonly snapshot: () => Promise<SchemaSnapshot> = async () => ecommerceSnapshot(),
  ) {}

  async acquire(): Promise<DbSession> {
    this.acquired++;
    return {
      query: (sql, limits) => {
        this.statements.push(sql);
        return this.run(sql, limits);
      },
      release: async (discard = false) => {
        this.releases.push(discard);
      },
    };
  }

  introspect(): Promise<SchemaSnapshot> {
    return this.snapshot();
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Wraps a real adapter and counts acquired sessions. */
export class CountingAdapter implements DbAdapter {
  acquired = 0;

  constructor(private readonly inner: DbAdapter) {}

  get type(): DbAdapter['type'] {
    return this.inner.type;
  }

  acquire(): Promise<DbSession> {
    this.acquired++;
    return this.inner.acquire();
  }

  introspect(): Promise<SchemaSnapshot> {
    return this.inner.introspect();
  }

  close(): Promise<void> {
    return this.inner.close();
  }
}

/** A query that never settles, as a stuck database would. */
export const neverSettles: FakeQuery = () => new Promise<RowSet>(() => undefined);
