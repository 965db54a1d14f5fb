/**
 * Adapter selection.
 * Picks the adapter for the configured database location.
 */

import type { DatabaseConfig } from '../config.js';
import type { Logger } from '../logger.js';
import { PostgresAdapter } from './adapters/postgres.js';
import { SqliteAdapter } from './adapters/sqlite.js';
import type { DbAdapter } from './types.js';

export function createAdapter(database: DatabaseConfig, logger?: Logger): DbAdapter {
  switch (database.type) {
    case 'postgres':
      return new PostgresAdapter({ connectionString: database.connectionString, logger });
    case 'sqlite':
      return new SqliteAdapter({ filename: database.filename });
  }
}
