import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { USER_MESSAGES } from '../pipeline.js';
import { toResponse } from '../response.js';

describe('toResponse', () => {
  it('returns the statement and rows on success', () => {
    const response = toResponse({
      ok: true,
      result: {
        sql: 'SELECT name FROM customers',
        columns: ['name'],
        rows: [{ name: 'Ada Park' }],
        rowCount: 1,
        truncated: false,
        execMs: 3,
      },
    });
    assert.deepEqual(response, {
      status: 200,
      body: { sql: 'SELECT name FROM customers', results: [{ name: 'Ada Park' }], truncated: false },
    });
  });

  it('returns only the stage and fixed message on failure', () => {
    const response = toResponse({
      ok: false,
      error: { stage: 'validation', kind: 'unsafe_query', message: USER_MESSAGES.unsafe_query, status: 400 },
    });
    assert.deepEqual(response, { status: 400, body: { stage: 'validation', message: 'Cannot run this query.' } });
  });
});
