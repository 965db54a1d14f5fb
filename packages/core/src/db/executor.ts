/**
 * Executor: runs a ValidatedQuery with bounded time and bounded rows.
 *
 * A session is acquired per request and released on every exit path. A
 * session that timed out is discarded, since its connection may still be
 * busy with the statement.
 */

import { Buffer } from 'node:buffer';
import { ExecutionError, errorMessage } from '../errors.js';
import { ValidatedQuery } from '../policy/validate.js';
import type { QueryResult } from '../types.js';
import { withTimeout } from '../util/timeout.js';
import { SAFE_DEFAULTS } from './defaults.js';
import type { DbAdapter, DbSession, RowSet } from './types.js';
import { StatementTimeoutError } from './types.js';

export interface ExecutorOptions {
  adapter: DbAdapter;
  maxRows?: number;
  timeoutMs?: number;
}

/** Make a value safe to serialise as JSON. */
export function shapeValue(value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return value.toString('base64');
  // Blobs arrive as plain Uint8Array when rows cross a process boundary.
  if (value instanceof Uint8Array) return Buffer.from(value).toString('base64');
  return value;
}

function shapeRows(rows: Record<string, unknown>[]): Record<string, unknown>[] {
  return rows.map((row) => {
    const shaped: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(row)) {
      shaped[key] = shapeValue(value);
    }
    return shaped;
  });
}

export class Executor {
  readonly adapter: DbAdapter;
  private readonly maxRows: number;
  private readonly timeoutMs: number;

  constructor(options: ExecutorOptions) {
    this.adapter = options.adapter;
    this.maxRows = options.maxRows ?? SAFE_DEFAULTS.maxRows;
    this.timeoutMs = options.timeoutMs ?? SAFE_DEFAULTS.statementTimeoutMs;
  }

  async execute(query: ValidatedQuery): Promise<QueryResult> {
    if (!ValidatedQuery.isValidatedQuery(query)) {
      throw new ExecutionError('Refusing to run a statement that did not pass validation.');
    }

    let session: DbSession;
    try {
      session = await this.adapter.acquire();
    } catch (err: unknown) {
      throw new ExecutionError(`Could not acquire a database session: ${errorMessage(err)}`, { cause: err });
    }

    let discard = false;
    const start = performance.now();
    try {
      const rowSet: RowSet = await withTimeout(
        this.timeoutMs,
        () => session.query(query.sql, { maxRows: this.maxRows, timeoutMs: this.timeoutMs }),
        () => new StatementTimeoutError(`Statement exceeded ${this.timeoutMs}ms`),
      );
      const execMs = Math.round(performance.now() - start);

      return {
        sql: query.sql,
        columns: rowSet.columns,
        rows: shapeRows(rowSet.rows),
        rowCount: rowSet.rows.length,
        truncated: rowSet.truncated,
        execMs,
      };
    } catch (err: unknown) {
      if (err instanceof StatementTimeoutError) {
        discard = true;
        throw new ExecutionError(err.message, { cause: err, timedOut: true });
      }
      throw new ExecutionError(`Statement failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      await session.release(discard);
    }
  }
}
