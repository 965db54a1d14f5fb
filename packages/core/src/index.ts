/**
 * @cartquery/core barrel export
 *
 * Question-to-SQL pipeline shared by the CLI and any other inbound surface.
 */

// Errors
export {
  CartQueryError,
  ConfigurationError,
  UpstreamError,
  TranslationError,
  UnsafeQueryError,
  ExecutionError,
  isCartQueryError,
  errorMessage,
} from './errors.js';
export type { ErrorKind } from './errors.js';

// Configuration and logging
export { loadConfig, parseDatabaseUrl } from './config.js';
export type { AppConfig, DatabaseConfig } from './config.js';
export { createLogger } from './logger.js';
export type { Logger } from './logger.js';

// Per-request entities
export type { TranslationRequest, CandidateQuery, QueryResult } from './types.js';

// Database types
export type {
  DbType,
  SqlDialect,
  SessionLimits,
  RowSet,
  SchemaSnapshot,
  TableInfo,
  ColumnInfo,
  DbSession,
  DbAdapter,
} from './db/types.js';
export { StatementTimeoutError } from './db/types.js';

// Safe session defaults
export { SAFE_DEFAULTS } from './db/defaults.js';

// Adapters and execution
export { PostgresAdapter } from './db/adapters/postgres.js';
export type { PostgresAdapterOptions } from './db/adapters/postgres.js';
export { SqliteAdapter } from './db/adapters/sqlite.js';
export type { SqliteAdapterOptions } from './db/adapters/sqlite.js';
export { createAdapter } from './db/connect.js';
export { Executor, shapeValue } from './db/executor.js';
export type { ExecutorOptions } from './db/executor.js';

// Schema descriptor
export { SchemaDescriptor, loadSchemaDescriptor } from './schema/descriptor.js';
export type { TableDefinition, ColumnDefinition } from './schema/descriptor.js';
export { ECOMMERCE_TABLES } from './schema/ecommerce.js';

// Policy
export type { RuleName, RuleViolation, ValidationResult } from './policy/types.js';
export { parseSql } from './policy/parse.js';
export type { ParseResult, ParseOutcome, SqlKind } from './policy/parse.js';
export { prefilter } from './policy/prefilter.js';
export { validateAst, isDangerousFunction } from './policy/rules.js';
export { ValidatedQuery, inspectSql, validate } from './policy/validate.js';

// LLM module
export * from './llm/index.js';

// Pipeline
export { QueryPipeline, createPipeline, USER_MESSAGES } from './pipeline.js';
export type { PipelineError, PipelineOptions, PipelineOutcome, PipelineStage } from './pipeline.js';
export { toResponse } from './response.js';
export type { QuestionResponse } from './response.js';
