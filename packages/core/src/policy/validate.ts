/**
 * Safety validator: the only gate between model output and the database.
 *
 * A statement passes when the textual pre-filter finds nothing and the
 * parsed AST satisfies every structural rule against the schema. Passing
 * statements are wrapped in a ValidatedQuery, which nothing else can mint;
 * the executor accepts no other input.
 */

import type { SqlDialect } from '../db/types.js';
import { UnsafeQueryError } from '../errors.js';
import type { SchemaDescriptor } from '../schema/descriptor.js';
import type { CandidateQuery } from '../types.js';
import { parseSql } from './parse.js';
import { prefilter } from './prefilter.js';
import { validateAst } from './rules.js';
import type { ValidationResult } from './types.js';

/** Set once by the class below; not exported, so only validate() can mint. */
let mint: (sql: string, dialect: SqlDialect, schemaVersion: string) => ValidatedQuery;

/** A statement that passed every rule for one schema version and dialect. */
export class ValidatedQuery {
  // Makes the type nominal: a structurally equal object literal is not a ValidatedQuery.
  readonly #brand = true;

  private constructor(
    readonly sql: string,
    readonly dialect: SqlDialect,
    readonly schemaVersion: string,
  ) {
    Object.freeze(this);
  }

  static {
    mint = (sql, dialect, schemaVersion) => new ValidatedQuery(sql, dialect, schemaVersion);
  }

  static isValidatedQuery(value: unknown): value is ValidatedQuery {
    return typeof value === 'object' && value !== null && #brand in value;
  }
}

/**
 * Run both validator layers over sql. Never throws.
 */
export function inspectSql(sql: string, schema: SchemaDescriptor, dialect: SqlDialect): ValidationResult {
  const textual = prefilter(sql);
  if (textual.length > 0) {
    return { allowed: false, violations: textual };
  }

  const parsed = parseSql(sql, dialect);
  if (!parsed.ok) {
    return { allowed: false, violations: [{ rule: 'parse_error', reason: parsed.error }] };
  }

  const violations = validateAst(parsed.ast, parsed.kind, parsed.statementCount, schema);
  if (violations.length > 0) {
    return { allowed: false, violations };
  }

  return { allowed: true, sql: parsed.normalizedSql, violations: [] };
}

/**
 * Validate a candidate statement.
 * @throws UnsafeQueryError listing every violated rule
 */
export function validate(
  candidate: CandidateQuery,
  schema: SchemaDescriptor,
  dialect: SqlDialect,
): ValidatedQuery {
  const result = inspectSql(candidate.sql, schema, dialect);
  if (!result.allowed) {
    throw new UnsafeQueryError(result.violations);
  }
  return mint(result.sql, dialect, schema.version);
}
