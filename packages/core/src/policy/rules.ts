/**
 * AST-based validation rules, the second validator layer.
 *
 * Every rule operates on the parsed AST, not on raw SQL text. Identifier
 * resolution walks SELECT scopes the way the database would: FROM items and
 * CTEs bind names, select-list aliases are visible to the clauses after the
 * select list, and a subquery sees the scopes around it. A derived table or
 * CTE exposes only the output names it can be shown to produce.
 */

import type { SchemaDescriptor, TableDefinition } from '../schema/descriptor.js';
import { asList, functionName, identifierName, isRecord, walkAst } from './ast.js';
import type { SqlKind } from './parse.js';
import type { RuleViolation } from './types.js';

/** Statement types that write or change schema; never allowed, even nested */
const WRITE_KINDS = new Set([
  'insert',
  'update',
  'delete',
  'replace',
  'create',
  'alter',
  'drop',
  'truncate',
  'grant',
  'revoke',
  'merge',
  'copy',
  'call',
  'exec',
  'execute',
  'attach',
  'detach',
  'pragma',
  'set',
  'lock',
  'load',
]);

/** Only these schema qualifiers may prefix a table */
const ALLOWED_SCHEMAS = new Set(['public', 'main']);

const DANGEROUS_PREFIXES = ['pg_', 'lo_', 'dblink', 'sqlite_'];

const DANGEROUS_FUNCTIONS = new Set([
  'query_to_xml',
  'query_to_xml_and_xmlschema',
  'cursor_to_xml',
  'table_to_xml',
  'database_to_xml',
  'schema_to_xml',
  'set_config',
  'current_setting',
  'load_extension',
  'readfile',
  'writefile',
  'edit',
  'fts3_tokenizer',
]);

export function isDangerousFunction(name: string): boolean {
  return name
    .toLowerCase()
    .split('.')
    .some((part) => DANGEROUS_FUNCTIONS.has(part) || DANGEROUS_PREFIXES.some((p) => part.startsWith(p)));
}

// ── Scopes ──────────────────────────────────────────────────────────

type Binding = { kind: 'table'; table: TableDefinition } | { kind: 'derived'; columns: ReadonlySet<string> };

class Scope {
  private readonly bindings = new Map<string, Binding>();
  private readonly ctes = new Map<string, Binding>();
  private readonly aliases = new Set<string>();

  constructor(
    private readonly schema: SchemaDescriptor,
    readonly parent: Scope | null,
  ) {}

  bind(name: string, binding: Binding): void {
    this.bindings.set(name.toLowerCase(), binding);
  }

  defineCte(name: string, binding: Binding): void {
    this.ctes.set(name.toLowerCase(), binding);
  }

  addAlias(name: string): void {
    this.aliases.add(name.toLowerCase());
  }

  findCte(name: string): Binding | undefined {
    const key = name.toLowerCase();
    for (let s: Scope | null = this; s; s = s.parent) {
      const found = s.ctes.get(key);
      if (found) return found;
    }
    return undefined;
  }

  /** A binding of this scope only, not of the scopes around it */
  ownBinding(name: string): Binding | undefined {
    return this.bindings.get(name.toLowerCase());
  }

  ownBindings(): Iterable<Binding> {
    return this.bindings.values();
  }

  findQualifier(name: string): Binding | undefined {
    const key = name.toLowerCase();
    for (let s: Scope | null = this; s; s = s.parent) {
      const found = s.bindings.get(key);
      if (found) return found;
    }
    return undefined;
  }

  /** Whether an unqualified column resolves here or in an enclosing scope */
  resolvesColumn(column: string): boolean {
    const key = column.toLowerCase();
    for (let s: Scope | null = this; s; s = s.parent) {
      if (s.aliases.has(key)) return true;
      for (const binding of s.bindings.values()) {
        if (bindingHasColumn(s.schema, binding, key)) return true;
      }
    }
    return false;
  }
}

function bindingHasColumn(schema: SchemaDescriptor, binding: Binding, column: string): boolean {
  if (binding.kind === 'table') return schema.contains(binding.table.name, column);
  return binding.columns.has(column.toLowerCase());
}

function bindingColumns(binding: Binding): string[] {
  if (binding.kind === 'table') return binding.table.columns.map((c) => c.name.toLowerCase());
  return [...binding.columns];
}

// ── Checker ─────────────────────────────────────────────────────────

class ScopeChecker {
  readonly violations: RuleViolation[] = [];
  private readonly reported = new Set<string>();

  constructor(private readonly schema: SchemaDescriptor) {}

  private report(violation: RuleViolation): void {
    const key = `${violation.rule}:${violation.reason}`;
    if (this.reported.has(key)) return;
    this.reported.add(key);
    this.violations.push(violation);
  }

  /**
   * Check a SELECT (and any UNION branches) in a new scope under parent.
   * Returns the output column names of the first branch.
   */
  checkSelect(node: Record<string, unknown>, parent: Scope | null): ReadonlySet<string> {
    const cteScope = new Scope(this.schema, parent);

    // Visible to its own body (recursive CTEs) with only the declared column list.
    const declaredColumns = new Map<string, ReadonlySet<string>>();
    for (const cte of asList(node.with)) {
      if (!isRecord(cte)) continue;
      const name = identifierName(cte.name);
      if (!name) continue;
      const declared = new Set(
        asList(cte.columns)
          .map(identifierName)
          .filter((c): c is string => c !== null)
          .map((c) => c.toLowerCase()),
      );
      declaredColumns.set(name, declared);
      cteScope.defineCte(name, { kind: 'derived', columns: declared });
    }
    for (const cte of asList(node.with)) {
      if (!isRecord(cte)) continue;
      const name = identifierName(cte.name);
      const body = selectBody(cte.stmt);
      if (!body) continue;
      const produced = this.checkSelect(body, cteScope);
      if (name) {
        const declared = declaredColumns.get(name);
        cteScope.defineCte(name, {
          kind: 'derived',
          columns: declared && declared.size > 0 ? declared : produced,
        });
      }
    }

    // UNION / INTERSECT / EXCEPT branches share the WITH clause.
    let output: ReadonlySet<string> | null = null;
    let branch: unknown = node;
    while (isRecord(branch)) {
      const columns = this.checkSelectBody(branch, cteScope);
      output ??= columns;
      branch = branch._next;
    }
    return output ?? new Set<string>();
  }

  private checkSelectBody(node: Record<string, unknown>, cteScope: Scope): ReadonlySet<string> {
    const scope = new Scope(this.schema, cteScope);

    const joinConditions: unknown[] = [];
    const usingColumns: unknown[] = [];
    for (const item of asList(node.from)) {
      if (!isRecord(item)) continue;
      this.bindFromItem(item, scope, cteScope);
      if (item.on) joinConditions.push(item.on);
      usingColumns.push(...asList(item.using));
    }

    // Aliases are not in scope for the select list itself or for FROM.
    for (const column of asList(node.columns)) {
      if (isRecord(column)) this.checkExpression(column.expr, scope);
    }
    for (const condition of joinConditions) {
      this.checkExpression(condition, scope);
    }
    for (const using of usingColumns) {
      const name = identifierName(using);
      if (name && !scope.resolvesColumn(name)) {
        this.report({ rule: 'unknown_column', reason: `Column "${name}" does not exist in the joined tables.` });
      }
    }
    for (const column of asList(node.columns)) {
      if (!isRecord(column)) continue;
      const alias = identifierName(column.as);
      if (alias) scope.addAlias(alias);
    }
    for (const clause of ['where', 'groupby', 'having', 'orderby', 'limit', 'window', 'qualify']) {
      this.checkExpression(node[clause], scope);
    }

    return outputColumns(node, scope);
  }

  private bindFromItem(item: Record<string, unknown>, scope: Scope, cteScope: Scope): void {
    const alias = identifierName(item.as);

    const subquery = selectBody(item.expr);
    if (subquery) {
      const columns = this.checkSelect(subquery, cteScope);
      if (alias) scope.bind(alias, { kind: 'derived', columns });
      return;
    }

    const tableName = identifierName(item.table);
    if (!tableName) {
      this.report({
        rule: 'unsupported_from',
        reason: 'Only tables, CTEs and subqueries may appear in FROM.',
      });
      return;
    }

    for (const qualifier of [identifierName(item.db), identifierName(item.schema)]) {
      if (qualifier && !ALLOWED_SCHEMAS.has(qualifier.toLowerCase())) {
        this.report({
          rule: 'foreign_schema',
          reason: `Schema "${qualifier}" is outside the queryable schema.`,
        });
        return;
      }
    }

    const cte = scope.findCte(tableName);
    if (cte) {
      scope.bind(alias ?? tableName, cte);
      return;
    }

    const table = this.schema.table(tableName);
    if (!table) {
      this.report({ rule: 'unknown_table', reason: `Table "${tableName}" is not a queryable table.` });
      return;
    }
    scope.bind(alias ?? tableName, { kind: 'table', table });
  }

  private checkExpression(expr: unknown, scope: Scope): void {
    if (Array.isArray(expr)) {
      for (const item of expr) this.checkExpression(item, scope);
      return;
    }
    if (!isRecord(expr)) return;

    if (expr.type === 'select') {
      this.checkSelect(expr, scope);
      return;
    }
    if (expr.type === 'column_ref') {
      this.checkColumnRef(expr, scope);
      return;
    }
    for (const value of Object.values(expr)) {
      this.checkExpression(value, scope);
    }
  }

  private checkColumnRef(ref: Record<string, unknown>, scope: Scope): void {
    const column = identifierName(ref.column);
    const qualifier = identifierName(ref.table);

    if (qualifier) {
      const binding = scope.findQualifier(qualifier);
      if (!binding) {
        this.report({
          rule: 'unknown_qualifier',
          reason: `"${qualifier}" does not name a table in scope.`,
        });
        return;
      }
      if (column && column !== '*' && !bindingHasColumn(this.schema, binding, column)) {
        this.report({
          rule: 'unknown_column',
          reason: `Column "${qualifier}.${column}" does not exist.`,
        });
      }
      return;
    }

    if (column && column !== '*' && !scope.resolvesColumn(column)) {
      this.report({ rule: 'unknown_column', reason: `Column "${column}" does not exist.` });
    }
  }
}

/** The SELECT inside a CTE or subquery wrapper, if it is one. */
function selectBody(node: unknown): Record<string, unknown> | null {
  if (!isRecord(node)) return null;
  if (node.type === 'select') return node;
  if (isRecord(node.ast) && node.ast.type === 'select') return node.ast;
  return null;
}

/**
 * Output column names of one SELECT body, with `*` and `t.*` expanded from its
 * FROM bindings. An unaliased expression gets a database-chosen name, so it
 * contributes none and any reference to it fails.
 */
function outputColumns(select: Record<string, unknown>, scope: Scope): ReadonlySet<string> {
  const names = new Set<string>();
  const addAll = (binding: Binding | undefined): void => {
    if (!binding) return;
    for (const name of bindingColumns(binding)) names.add(name);
  };

  if (!Array.isArray(select.columns)) {
    // Older grammars give a bare '*' for SELECT *.
    if (select.columns === '*') {
      for (const binding of scope.ownBindings()) addAll(binding);
    }
    return names;
  }

  for (const column of select.columns) {
    if (!isRecord(column)) continue;
    const alias = identifierName(column.as);
    if (alias) {
      names.add(alias.toLowerCase());
      continue;
    }
    if (!isRecord(column.expr) || column.expr.type !== 'column_ref') continue;

    const name = identifierName(column.expr.column);
    if (!name) continue;
    if (name !== '*') {
      names.add(name.toLowerCase());
      continue;
    }
    const qualifier = identifierName(column.expr.table);
    if (qualifier) {
      addAll(scope.ownBinding(qualifier));
    } else {
      for (const binding of scope.ownBindings()) addAll(binding);
    }
  }
  return names;
}

// ── Global rules ────────────────────────────────────────────────────

function checkGlobal(ast: Record<string, unknown>): RuleViolation[] {
  const violations: RuleViolation[] = [];
  const seen = new Set<string>();
  const add = (violation: RuleViolation): void => {
    const key = `${violation.rule}:${violation.reason}`;
    if (!seen.has(key)) {
      seen.add(key);
      violations.push(violation);
    }
  };

  walkAst(ast, (node) => {
    const type = typeof node.type === 'string' ? node.type.toLowerCase() : '';

    if (node !== ast && WRITE_KINDS.has(type)) {
      add({
        rule: 'nested_statement',
        reason: `A nested ${type.toUpperCase()} statement is not allowed.`,
      });
    }

    if (type === 'select') {
      if (isRecord(node.into) && (node.into.position || node.into.expr)) {
        add({ rule: 'select_into', reason: 'SELECT ... INTO is not allowed.' });
      }
      if (node.locking_read) {
        add({ rule: 'locking_clause', reason: 'Locking clauses (FOR UPDATE / FOR SHARE) are not allowed.' });
      }
    }

    if (type === 'function' || type === 'aggr_func') {
      const name = functionName(node);
      if (name && isDangerousFunction(name)) {
        add({
          rule: 'dangerous_function',
          reason: `Function "${name}" is potentially dangerous and not allowed.`,
        });
      }
    }
  });

  return violations;
}

/**
 * Validate a parsed statement against the read-only policy and the schema.
 * Returns every violation found; an empty list means the statement is allowed.
 */
export function validateAst(
  ast: Record<string, unknown>,
  kind: SqlKind,
  statementCount: number,
  schema: SchemaDescriptor,
): RuleViolation[] {
  const violations: RuleViolation[] = [];

  if (statementCount > 1) {
    violations.push({
      rule: 'single_statement',
      reason: `Multiple statements detected (${statementCount}). Only single statements are allowed.`,
    });
  }

  if (kind !== 'select') {
    violations.push({
      rule: 'read_only',
      reason: `Statement type "${kind.toUpperCase()}" is not allowed; only SELECT may run.`,
    });
    return violations;
  }

  violations.push(...checkGlobal(ast));

  const checker = new ScopeChecker(schema);
  checker.checkSelect(ast, null);
  violations.push(...checker.violations);

  return violations;
}
