/**
 * SQLite adapter.
 *
 * better-sqlite3 runs statements synchronously, so a slow statement would
 * block the event loop past any timer. Each session therefore runs its
 * statements in a child Node process that holds a read-only handle; the
 * session kills the process when the deadline passes or on release.
 * Introspection stays in process.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { createRequire } from 'node:module';
import Database from 'better-sqlite3';
import type { DbAdapter, DbSession, RowSet, SchemaSnapshot, SessionLimits, TableInfo } from '../types.js';
import { StatementTimeoutError } from '../types.js';

export interface SqliteAdapterOptions {
  filename: string;
  /** How long to wait on a locked database file, in milliseconds */
  busyTimeoutMs?: number;
}

const DRIVER_PATH = createRequire(import.meta.url).resolve('better-sqlite3');

// Plain CommonJS, run with `node -e`. One request message in, one reply out.
const RUNNER_SOURCE = `
let db;
process.on('message', (request) => {
  try {
    if (!db) {
      const Database = require(request.driver);
      db = new Database(request.filename, {
        readonly: true,
        fileMustExist: true,
        timeout: request.busyTimeoutMs,
      });
    }
    const stmt = db.prepare(request.sql);
    if (!stmt.reader) throw new Error('Statement does not return rows.');
    const columns = stmt.columns().map((column) => column.name);
    const rows = [];
    let truncated = false;
    for (const row of stmt.iterate()) {
      if (rows.length >= request.maxRows) {
        truncated = true;
        break;
      }
      rows.push(row);
    }
    process.send({ ok: true, columns, rows, truncated });
  } catch (err) {
    process.send({ ok: false, message: err instanceof Error ? err.message : String(err) });
  }
});
process.on('disconnect', () => process.exit(0));
`;

interface RunnerRequest {
  driver: string;
  filename: string;
  busyTimeoutMs: number;
  sql: string;
  maxRows: number;
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Read a runner reply; anything malformed becomes an Error. */
export function parseRunnerReply(reply: unknown): RowSet | Error {
  if (!isRecord(reply)) return new Error('SQLite worker sent a malformed reply.');
  if (reply.ok !== true) {
    return new Error(typeof reply.message === 'string' ? reply.message : 'SQLite worker failed.');
  }

  const columns: string[] = [];
  const rows: Record<string, unknown>[] = [];
  if (!Array.isArray(reply.columns) || !Array.isArray(reply.rows) || typeof reply.truncated !== 'boolean') {
    return new Error('SQLite worker sent a malformed reply.');
  }
  for (const column of reply.columns) {
    if (typeof column !== 'string') return new Error('SQLite worker sent a malformed reply.');
    columns.push(column);
  }
  for (const row of reply.rows) {
    if (!isRecord(row)) return new Error('SQLite worker sent a malformed reply.');
    rows.push(row);
  }
  return { columns, rows, truncated: reply.truncated };
}

function hasExited(child: ChildProcess): boolean {
  return child.exitCode !== null || child.signalCode !== null;
}

class SqliteSession implements DbSession {
  private readonly child: ChildProcess;
  private spawnError: Error | null = null;
  private released = false;

  constructor(
    private readonly target: Omit<RunnerRequest, 'sql' | 'maxRows'>,
    private readonly onRelease: (session: SqliteSession) => void,
  ) {
    this.child = spawn(process.execPath, ['-e', RUNNER_SOURCE], {
      stdio: ['ignore', 'ignore', 'inherit', 'ipc'],
      serialization: 'advanced',
    });
    this.child.on('error', (err) => {
      this.spawnError = err;
    });
  }

  query(sql: string, limits: SessionLimits): Promise<RowSet> {
    if (this.released) return Promise.reject(new Error('Session has been released.'));
    if (this.spawnError) return Promise.reject(this.spawnError);
    if (hasExited(this.child)) return Promise.reject(new Error('SQLite worker is not running.'));

    const child = this.child;
    return new Promise<RowSet>((resolve, reject) => {
      let settled = false;
      const settle = (outcome: RowSet | Error): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        child.off('message', onMessage);
        child.off('exit', onExit);
        child.off('error', onError);
        if (outcome instanceof Error) reject(outcome);
        else resolve(outcome);
      };
      const onMessage = (message: unknown): void => settle(parseRunnerReply(message));
      const onExit = (code: number | null, signal: NodeJS.Signals | null): void =>
        settle(new Error(`SQLite worker exited (${signal ?? String(code)}).`));
      const onError = (err: Error): void => settle(err);

      const timer = setTimeout(() => {
        settle(new StatementTimeoutError(`Statement exceeded ${limits.timeoutMs}ms`));
        child.kill('SIGKILL');
      }, Math.max(limits.timeoutMs, 1));

      child.on('message', onMessage);
      child.once('exit', onExit);
      child.once('error', onError);

      const request: RunnerRequest = { ...this.target, sql, maxRows: limits.maxRows };
      child.send(request, (err) => {
        if (err) settle(err);
      });
    });
  }

  async release(discard = false): Promise<void> {
    if (this.released) return;
    this.released = true;
    this.onRelease(this);

    if (hasExited(this.child) || this.spawnError) return;
    const exited = new Promise<void>((resolve) => this.child.once('exit', () => resolve()));
    if (discard || !this.child.connected) {
      this.child.kill('SIGKILL');
    } else {
      this.child.disconnect();
    }
    await exited;
  }
}

export class SqliteAdapter implements DbAdapter {
  readonly type = 'sqlite' as const;
  private readonly filename: string;
  private readonly busyTimeoutMs: number;
  private readonly sessions = new Set<SqliteSession>();

  constructor(options: SqliteAdapterOptions) {
    if (!options.filename.trim()) {
      throw new Error('SQLite database path is required.');
    }
    this.filename = options.filename;
    this.busyTimeoutMs = options.busyTimeoutMs ?? 5_000;
  }

  private open(): Database.Database {
    return new Database(this.filename, {
      readonly: true,
      fileMustExist: true,
      timeout: this.busyTimeoutMs,
    });
  }

  async acquire(): Promise<DbSession> {
    // Fail here, not in the worker, when the file is missing or unreadable.
    this.open().close();

    const session = new SqliteSession(
      { driver: DRIVER_PATH, filename: this.filename, busyTimeoutMs: this.busyTimeoutMs },
      (released) => this.sessions.delete(released),
    );
    this.sessions.add(session);
    return session;
  }

  async introspect(): Promise<SchemaSnapshot> {
    const db = this.open();
    try {
      const tables = db
        .prepare<[], { name: string }>(`
          SELECT name
          FROM sqlite_master
          WHERE type = 'table'
            AND name NOT LIKE 'sqlite_%'
          ORDER BY name
        `)
        .all();

      const tableInfos: TableInfo[] = [];
      for (const { name } of tables) {
        const columns = db
          .prepare<[], { name: string; type: string; notnull: number; pk: number }>(
            `PRAGMA table_info(${quoteIdent(name)})`,
          )
          .all();

        tableInfos.push({
          name,
          schema: 'main',
          columns: columns.map((column) => ({
            name: column.name,
            dataType: column.type || 'TEXT',
            nullable: column.notnull === 0,
            isPrimaryKey: column.pk > 0,
          })),
        });
      }

      return { tables: tableInfos, capturedAt: new Date() };
    } finally {
      db.close();
    }
  }

  /** Kill any session still holding a worker. */
  async close(): Promise<void> {
    await Promise.all([...this.sessions].map((session) => session.release(true)));
  }
}
