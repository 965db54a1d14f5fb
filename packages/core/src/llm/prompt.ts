/**
 * Prompt construction for SQL generation.
 */

import { ConfigurationError } from '../errors.js';
import type { SchemaDescriptor } from '../schema/descriptor.js';
import type { SqlDialect } from '../db/types.js';
import type { ChatMessage } from './types.js';

/** Reply the model is told to give when the schema cannot answer the question. */
export const CANNOT_ANSWER = 'CANNOT_ANSWER';

const SYSTEM_PROMPT =
  'You are a helpful assistant that converts natural language questions into SQL queries.';

const DIALECT_NAMES: Record<SqlDialect, string> = {
  postgres: 'PostgreSQL',
  sqlite: 'SQLite',
};

function renderSchema(schema: SchemaDescriptor): string {
  const lines: string[] = [];
  for (const table of schema.tables()) {
    lines.push(`TABLE ${table.name}`);
    for (const column of table.columns) {
      lines.push(`  ${column.name} ${column.declaredType}`);
    }
    lines.push('');
  }
  return lines.join('\n');
}

/**
 * Build the instruction prompt for one question.
 * The same question, schema and dialect always give the same text.
 */
export function buildPrompt(question: string, schema: SchemaDescriptor, dialect: SqlDialect): string {
  if (schema.isEmpty()) {
    throw new ConfigurationError('Cannot build a prompt from an empty schema.');
  }

  return `You are a SQL expert working with the ${DIALECT_NAMES[dialect]} database of an online store.

Database schema (these are the only tables and columns that exist):

${renderSchema(schema)}
RULES:
- Answer with exactly ONE read-only SQL statement: a SELECT, or WITH ... SELECT.
- Use only the tables and columns listed above.
- Never write INSERT, UPDATE, DELETE, DROP, ALTER, CREATE, TRUNCATE or any statement that changes data or schema.
- Do not add comments, explanations or a second statement.
- If the question cannot be answered from this schema, reply with exactly: ${CANNOT_ANSWER}

Question: "${question}"

SQL:`;
}

export function buildMessages(prompt: string): ChatMessage[] {
  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: prompt },
  ];
}
