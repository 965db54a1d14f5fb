/**
 * AST-based SQL parser for the safety validator.
 * Uses node-sql-parser with the grammar of the target database.
 *
 * Parsing is the structural layer; the textual pre-filter runs first and
 * never decides alone that a statement is safe.
 */

import pkg from 'node-sql-parser';
import type { SqlDialect } from '../db/types.js';
import { isRecord } from './ast.js';
const { Parser } = pkg;

const parser = new Parser();

const PARSER_DATABASE: Record<SqlDialect, string> = {
  postgres: 'PostgresQL',
  sqlite: 'sqlite',
};

export type SqlKind =
  | 'select'
  | 'insert'
  | 'update'
  | 'delete'
  | 'replace'
  | 'create'
  | 'alter'
  | 'drop'
  | 'truncate'
  | 'unknown';

const KNOWN_KINDS: readonly SqlKind[] = [
  'select',
  'insert',
  'update',
  'delete',
  'replace',
  'create',
  'alter',
  'drop',
  'truncate',
];

export interface ParseResult {
  /** The parsed AST of the first statement */
  ast: Record<string, unknown>;
  /** Number of statements found */
  statementCount: number;
  /** Classified type of the first statement */
  kind: SqlKind;
  /** Input with one trailing terminator stripped */
  normalizedSql: string;
}

export interface ParseError {
  ok: false;
  error: string;
}

export type ParseOutcome = ({ ok: true } & ParseResult) | ParseError;

/**
 * Parse a SQL string into an AST.
 * Returns a structured result or a parse error, never throws.
 */
export function parseSql(sql: string, dialect: SqlDialect): ParseOutcome {
  const normalizedSql = sql.trim().replace(/;\s*$/, '').trim();

  if (!normalizedSql) {
    return { ok: false, error: 'Empty SQL statement' };
  }

  let astResult: unknown;
  try {
    astResult = parser.astify(normalizedSql, { database: PARSER_DATABASE[dialect] });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `SQL parse error: ${msg}` };
  }

  const statements: unknown[] = Array.isArray(astResult) ? astResult : [astResult];
  const first = statements[0];
  if (!isRecord(first)) {
    return { ok: false, error: 'No statements found' };
  }

  const rawKind = typeof first.type === 'string' ? first.type.toLowerCase() : '';
  const kind = KNOWN_KINDS.find((k) => k === rawKind) ?? 'unknown';

  return {
    ok: true,
    ast: first,
    statementCount: statements.length,
    kind,
    normalizedSql,
  };
}
