/**
 * Immutable description of the tables the pipeline may query.
 *
 * Built once at startup and shared read-only by every request. Identifier
 * lookups are case-insensitive because unquoted SQL identifiers fold case.
 */

import { createHash } from 'node:crypto';
import { ConfigurationError, errorMessage } from '../errors.js';
import type { DbAdapter, SchemaSnapshot } from '../db/types.js';

export interface ColumnDefinition {
  readonly name: string;
  readonly declaredType: string;
}

export interface TableDefinition {
  readonly name: string;
  readonly columns: readonly ColumnDefinition[];
}

export class SchemaDescriptor {
  /** Short content hash; changes whenever a table or column changes */
  readonly version: string;

  private readonly definitions: readonly TableDefinition[];
  private readonly byName: ReadonlyMap<string, TableDefinition>;
  private readonly columnsByTable: ReadonlyMap<string, ReadonlySet<string>>;

  constructor(tables: readonly TableDefinition[]) {
    const byName = new Map<string, TableDefinition>();
    const columnsByTable = new Map<string, ReadonlySet<string>>();

    const definitions = tables.map((table) => {
      const key = table.name.toLowerCase();
      if (byName.has(key)) {
        throw new ConfigurationError(`Table "${table.name}" is declared more than once.`);
      }
      const frozen: TableDefinition = Object.freeze({
        name: table.name,
        columns: Object.freeze(
          table.columns.map((c) => Object.freeze({ name: c.name, declaredType: c.declaredType })),
        ),
      });
      byName.set(key, frozen);
      columnsByTable.set(key, new Set(table.columns.map((c) => c.name.toLowerCase())));
      return frozen;
    });

    this.definitions = Object.freeze(definitions);
    this.byName = byName;
    this.columnsByTable = columnsByTable;
    this.version = createHash('sha256')
      .update(JSON.stringify(this.definitions))
      .digest('hex')
      .slice(0, 16);
  }

  tables(): readonly TableDefinition[] {
    return this.definitions;
  }

  isEmpty(): boolean {
    return this.definitions.length === 0;
  }

  hasTable(table: string): boolean {
    return this.byName.has(table.toLowerCase());
  }

  table(name: string): TableDefinition | undefined {
    return this.byName.get(name.toLowerCase());
  }

  contains(table: string, column: string): boolean {
    return this.columnsByTable.get(table.toLowerCase())?.has(column.toLowerCase()) ?? false;
  }
}

/**
 * Check the declared tables against the live database and build the descriptor.
 * Fails fast when the database cannot be reached or lacks a declared table or column.
 */
export async function loadSchemaDescriptor(
  adapter: DbAdapter,
  declared: readonly TableDefinition[],
): Promise<SchemaDescriptor> {
  if (declared.length === 0) {
    throw new ConfigurationError('No tables are declared for querying.');
  }

  let snapshot: SchemaSnapshot;
  try {
    snapshot = await adapter.introspect();
  } catch (err: unknown) {
    throw new ConfigurationError(`Database is unreachable: ${errorMessage(err)}`, { cause: err });
  }

  const live = new Map<string, Set<string>>();
  for (const table of snapshot.tables) {
    live.set(table.name.toLowerCase(), new Set(table.columns.map((c) => c.name.toLowerCase())));
  }

  const missingTables = declared.filter((t) => !live.has(t.name.toLowerCase())).map((t) => t.name);
  if (missingTables.length > 0) {
    throw new ConfigurationError(`Database is missing expected tables: ${missingTables.join(', ')}`);
  }

  const missingColumns: string[] = [];
  for (const table of declared) {
    const columns = live.get(table.name.toLowerCase());
    for (const column of table.columns) {
      if (!columns?.has(column.name.toLowerCase())) {
        missingColumns.push(`${table.name}.${column.name}`);
      }
    }
  }
  if (missingColumns.length > 0) {
    throw new ConfigurationError(`Database is missing expected columns: ${missingColumns.join(', ')}`);
  }

  return new SchemaDescriptor(declared);
}
