/**
 * Database abstraction types.
 * Adapters for Postgres and SQLite implement DbAdapter.
 */

export type DbType = 'postgres' | 'sqlite';

/** SQL grammar a statement is parsed and executed under. */
export type SqlDialect = DbType;

export interface SessionLimits {
  /** Maximum rows returned per query */
  maxRows: number;
  /** Query timeout in milliseconds */
  timeoutMs: number;
}

export interface RowSet {
  columns: string[];
  rows: Record<string, unknown>[];
  /** True when the statement produced more rows than maxRows */
  truncated: boolean;
}

export interface SchemaSnapshot {
  tables: TableInfo[];
  capturedAt: Date;
}

export interface TableInfo {
  name: string;
  schema?: string;
  columns: ColumnInfo[];
}

export interface ColumnInfo {
  name: string;
  dataType: string;
  nullable: boolean;
  isPrimaryKey: boolean;
}

/**
 * One connection (or pooled client) scoped to a single request.
 * The holder must call release() exactly once, on every exit path.
 */
export interface DbSession {
  /** Run one read-only statement, without parameters */
  query(sql: string, limits: SessionLimits): Promise<RowSet>;

  /**
   * Give the connection back. With discard set, the connection is destroyed
   * instead of being reused (it may still be mid-query).
   */
  release(discard?: boolean): Promise<void>;
}

export interface DbAdapter {
  readonly type: DbType;

  acquire(): Promise<DbSession>;

  /** Snapshot the live schema */
  introspect(): Promise<SchemaSnapshot>;

  /** Close pooled resources */
  close(): Promise<void>;
}

/** Raised by adapters when the database cancels a statement for running too long. */
export class StatementTimeoutError extends Error {
  constructor(message = 'Statement exceeded the execution timeout', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StatementTimeoutError';
  }
}
