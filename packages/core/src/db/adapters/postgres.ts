/**
 * Postgres adapter.
 * Uses a `pg` Pool; every session runs its statement inside a read-only
 * transaction with a transaction-local statement timeout, and reads the
 * result through a cursor so no more than maxRows + 1 rows leave the server.
 */

import pg from 'pg';
import type { FieldDef, Pool as PgPool, PoolClient, QueryResultRow } from 'pg';
import Cursor from 'pg-cursor';
import type { Logger } from '../../logger.js';
import type { DbAdapter, DbSession, RowSet, SchemaSnapshot, SessionLimits, TableInfo } from '../types.js';
import { StatementTimeoutError } from '../types.js';

const { Pool } = pg;

/** SQLSTATE for query_canceled, raised when statement_timeout fires */
const QUERY_CANCELED = '57014';

export interface PostgresAdapterOptions {
  connectionString: string;
  /** Upper bound on pooled connections */
  maxConnections?: number;
  logger?: Logger;
}

function sqlState(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** The part of a pg-cursor the session reads through. */
export interface RowCursor {
  read(
    maxRows: number,
    callback: (err: Error | undefined, rows: QueryResultRow[], result: { fields: FieldDef[] }) => void,
  ): unknown;
  close(): Promise<void>;
}

/**
 * Fetch up to maxRows rows, plus one to learn whether more exist, then close
 * the cursor so the server stops producing rows. A cursor that failed is
 * left to the transaction rollback.
 */
export async function readCapped(cursor: RowCursor, maxRows: number): Promise<RowSet> {
  const { rows, fields } = await new Promise<{ rows: QueryResultRow[]; fields: FieldDef[] }>((resolve, reject) => {
    cursor.read(maxRows + 1, (err, batch, result) => {
      if (err) reject(err);
      else resolve({ rows: batch, fields: result.fields });
    });
  });
  await cursor.close();

  const truncated = rows.length > maxRows;
  return {
    columns: fields.map((f) => f.name),
    rows: truncated ? rows.slice(0, maxRows) : rows,
    truncated,
  };
}

class PostgresSession implements DbSession {
  private broken = false;
  private released = false;

  constructor(private readonly client: PoolClient) {}

  async query(sql: string, limits: SessionLimits): Promise<RowSet> {
    const timeoutMs = Math.max(1, Math.floor(limits.timeoutMs));

    try {
      await this.client.query('BEGIN READ ONLY');
      await this.client.query(`SET LOCAL statement_timeout = ${timeoutMs}`);

      const cursor = this.client.query(new Cursor<QueryResultRow>(sql));
      const rowSet = await readCapped(cursor, limits.maxRows);
      await this.client.query('COMMIT');
      return rowSet;
    } catch (err: unknown) {
      await this.rollback();
      if (sqlState(err) === QUERY_CANCELED) {
        throw new StatementTimeoutError(undefined, { cause: err });
      }
      throw err;
    }
  }

  private async rollback(): Promise<void> {
    try {
      await this.client.query('ROLLBACK');
    } catch {
      // A connection that cannot roll back is not handed to the next request.
      this.broken = true;
    }
  }

  async release(discard = false): Promise<void> {
    if (this.released) return;
    this.released = true;
    this.client.release(discard || this.broken);
  }
}

export class PostgresAdapter implements DbAdapter {
  readonly type = 'postgres' as const;
  private readonly pool: PgPool;

  constructor(options: PostgresAdapterOptions) {
    this.pool = new Pool({
      connectionString: options.connectionString,
      max: options.maxConnections ?? 10,
      connectionTimeoutMillis: 10_000,
    });

    const logger = options.logger;
    // Idle clients can fail (server restart); without a listener the process dies.
    this.pool.on('error', (err) => {
      logger?.warn({ err }, 'idle postgres client failed');
    });
  }

  async acquire(): Promise<DbSession> {
    const client = await this.pool.connect();
    return new PostgresSession(client);
  }

  /**
   * Introspect base tables and columns of the public schema.
   */
  async introspect(): Promise<SchemaSnapshot> {
    const client = await this.pool.connect();
    try {
      const colsRes = await client.query<{
        table_name: string;
        column_name: string;
        data_type: string;
        is_nullable: string;
        is_pk: boolean;
      }>(`
        SELECT c.table_name, c.column_name, c.data_type, c.is_nullable,
               CASE WHEN pk.column_name IS NOT NULL THEN true ELSE false END AS is_pk
        FROM information_schema.columns c
        JOIN information_schema.tables t
          ON t.table_schema = c.table_schema
          AND t.table_name = c.table_name
          AND t.table_type = 'BASE TABLE'
        LEFT JOIN (
          SELECT ku.table_schema, ku.table_name, ku.column_name
          FROM information_schema.table_constraints tc
          JOIN information_schema.key_column_usage ku
            ON tc.constraint_name = ku.constraint_name
            AND tc.table_schema = ku.table_schema
          WHERE tc.constraint_type = 'PRIMARY KEY'
        ) pk ON pk.table_schema = c.table_schema
            AND pk.table_name = c.table_name
            AND pk.column_name = c.column_name
        WHERE c.table_schema = 'public'
        ORDER BY c.table_name, c.ordinal_position
      `);

      const tableMap = new Map<string, TableInfo>();
      for (const row of colsRes.rows) {
        let table = tableMap.get(row.table_name);
        if (!table) {
          table = { name: row.table_name, schema: 'public', columns: [] };
          tableMap.set(row.table_name, table);
        }
        table.columns.push({
          name: row.column_name,
          dataType: row.data_type,
          nullable: row.is_nullable === 'YES',
          isPrimaryKey: row.is_pk === true,
        });
      }

      return { tables: Array.from(tableMap.values()), capturedAt: new Date() };
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
