import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SqliteAdapter } from '../db/adapters/sqlite.js';
import type { DbAdapter } from '../db/types.js';
import { UpstreamError } from '../errors.js';
import type { LanguageModel } from '../llm/types.js';
import { QueryPipeline, type PipelineOptions } from '../pipeline.js';
import { toResponse } from '../response.js';
import { ECOMMERCE_TABLES } from '../schema/ecommerce.js';
import {
  CountingAdapter,
  FakeAdapter,
  HangingModel,
  ScriptedModel,
  createEcommerceDb,
  ecommerceSnapshot,
  neverSettles,
  silentLogger,
  type StoreDb,
} from './helpers.js';

function pipelineFor(
  model: LanguageModel,
  adapter: DbAdapter,
  overrides: Partial<PipelineOptions> = {},
): QueryPipeline {
  return new QueryPipeline({
    model,
    adapter,
    tables: ECOMMERCE_TABLES,
    logger: silentLogger,
    retryBaseDelayMs: 1,
    ...overrides,
  });
}

async function withStore(run: (store: StoreDb, adapter: CountingAdapter) => Promise<void>): Promise<void> {
  const store = createEcommerceDb();
  try {
    await run(store, new CountingAdapter(new SqliteAdapter({ filename: store.path })));
  } finally {
    store.cleanup();
  }
}

describe('QueryPipeline scenarios', () => {
  it('answers "list all customers" with every customer row', async () => {
    await withStore(async (_store, adapter) => {
      const model = new ScriptedModel(['SELECT * FROM customers;']);
      const pipeline = pipelineFor(model, adapter);
      await pipeline.init();

      const outcome = await pipeline.handle('list all customers');
      assert.equal(outcome.ok, true);
      if (!outcome.ok) return;

      assert.equal(outcome.result.rowCount, 3);
      assert.deepEqual(outcome.result.rows[0], {
        id: 1,
        name: 'Ada Park',
        email: 'ada@example.com',
        created_at: '2024-01-05 10:00:00',
      });

      const response = toResponse(outcome);
      assert.equal(response.status, 200);
      assert.deepEqual(response.body, {
        sql: 'SELECT * FROM customers',
        results: outcome.result.rows,
        truncated: false,
      });

      assert.ok(model.calls[0][1].content.includes('Question: "list all customers"'));
      assert.equal(adapter.acquired, 1);
    });
  });

  it('rejects "delete all orders" at validation without touching the database', async () => {
    await withStore(async (_store, adapter) => {
      const pipeline = pipelineFor(new ScriptedModel(['DELETE FROM orders;']), adapter);
      await pipeline.init();

      const outcome = await pipeline.handle('delete all orders');
      assert.deepEqual(outcome, {
        ok: false,
        error: { stage: 'validation', kind: 'unsafe_query', message: 'Cannot run this query.', status: 400 },
      });
      assert.deepEqual(toResponse(outcome), {
        status: 400,
        body: { stage: 'validation', message: 'Cannot run this query.' },
      });
      assert.equal(adapter.acquired, 0);
    });
  });

  it('rejects chained statements without running the first one', async () => {
    await withStore(async (_store, adapter) => {
      const pipeline = pipelineFor(
        new ScriptedModel(['SELECT * FROM customers; DROP TABLE customers;']),
        adapter,
      );
      await pipeline.init();

      const outcome = await pipeline.handle('show customers then clean up');
      assert.equal(outcome.ok, false);
      if (outcome.ok) return;
      assert.equal(outcome.error.stage, 'validation');
      assert.equal(outcome.error.kind, 'unsafe_query');
      assert.equal(adapter.acquired, 0);
    });
  });

  it('rejects a table missing from the schema', async () => {
    await withStore(async (_store, adapter) => {
      const pipeline = pipelineFor(new ScriptedModel(['SELECT * FROM ghost_table;']), adapter);
      await pipeline.init();

      const outcome = await pipeline.handle('show the ghosts');
      assert.equal(outcome.ok, false);
      if (outcome.ok) return;
      assert.equal(outcome.error.status, 400);
      assert.equal(adapter.acquired, 0);
    });
  });

  it('times out a stuck database call and releases the session', async () => {
    const adapter = new FakeAdapter(neverSettles);
    const pipeline = pipelineFor(new ScriptedModel(['SELECT name FROM customers']), adapter, {
      executionTimeoutMs: 30,
    });
    await pipeline.init();

    const outcome = await pipeline.handle('who are our customers?');
    assert.deepEqual(outcome, {
      ok: false,
      error: { stage: 'execution', kind: 'execution', message: 'The query took too long to run.', status: 504 },
    });
    assert.deepEqual(adapter.releases, [true]);
  });
});

describe('QueryPipeline failures', () => {
  it('reports a database error as an execution failure', async () => {
    const adapter = new FakeAdapter(async () => {
      throw new Error('relation "customers" does not exist');
    });
    const pipeline = pipelineFor(new ScriptedModel(['SELECT name FROM customers']), adapter);
    await pipeline.init();

    const outcome = await pipeline.handle('who are our customers?');
    assert.deepEqual(outcome, {
      ok: false,
      error: { stage: 'execution', kind: 'execution', message: 'The query could not be executed.', status: 500 },
    });
    assert.deepEqual(adapter.releases, [false]);
  });

  it('retries upstream failures, then succeeds', async () => {
    const model = new ScriptedModel([
      new UpstreamError('rate limited', { status: 429 }),
      new Error('socket hang up'),
      'SELECT name FROM customers',
    ]);
    const adapter = new FakeAdapter(async () => ({ columns: ['name'], rows: [{ name: 'Ada Park' }], truncated: false }));
    const pipeline = pipelineFor(model, adapter, { maxUpstreamRetries: 2 });
    await pipeline.init();

    const outcome = await pipeline.handle('who are our customers?');
    assert.equal(outcome.ok, true);
    assert.equal(model.calls.length, 3);
  });

  it('gives up after the configured number of retries', async () => {
    const model = new ScriptedModel([
      new UpstreamError('unavailable', { status: 503 }),
      new UpstreamError('unavailable', { status: 503 }),
      new UpstreamError('unavailable', { status: 503 }),
      'SELECT name FROM customers',
    ]);
    const pipeline = pipelineFor(model, new FakeAdapter(neverSettles), { maxUpstreamRetries: 2 });
    await pipeline.init();

    const outcome = await pipeline.handle('who are our customers?');
    assert.deepEqual(outcome, {
      ok: false,
      error: {
        stage: 'translation',
        kind: 'upstream',
        message: 'The language model service is unavailable. Please try again later.',
        status: 502,
      },
    });
    assert.equal(model.calls.length, 3);
  });

  it('treats a hung model call as an upstream failure', async () => {
    const pipeline = pipelineFor(new HangingModel(), new FakeAdapter(neverSettles), {
      llmTimeoutMs: 20,
      maxUpstreamRetries: 0,
    });
    await pipeline.init();

    const outcome = await pipeline.handle('who are our customers?');
    assert.equal(outcome.ok, false);
    if (outcome.ok) return;
    assert.equal(outcome.error.status, 502);
  });

  it('does not retry an unusable answer', async () => {
    const model = new ScriptedModel(['I cannot answer that from this schema.', 'SELECT 1']);
    const pipeline = pipelineFor(model, new FakeAdapter(neverSettles));
    await pipeline.init();

    const outcome = await pipeline.handle('what is the meaning of life?');
    assert.deepEqual(outcome, {
      ok: false,
      error: {
        stage: 'translation',
        kind: 'translation',
        message: 'Could not translate the question into a query. Please rephrase it or add detail.',
        status: 422,
      },
    });
    assert.equal(model.calls.length, 1);
  });

  it('rejects an empty question before calling the model', async () => {
    const model = new ScriptedModel([]);
    const pipeline = pipelineFor(model, new FakeAdapter(neverSettles));
    await pipeline.init();

    const outcome = await pipeline.handle('   ');
    assert.equal(outcome.ok, false);
    if (outcome.ok) return;
    assert.equal(outcome.error.kind, 'translation');
    assert.equal(outcome.error.status, 422);
    assert.equal(model.calls.length, 0);
  });

  it('rejects an over-long question', async () => {
    const model = new ScriptedModel([]);
    const pipeline = pipelineFor(model, new FakeAdapter(neverSettles), { maxQuestionLength: 10 });
    await pipeline.init();

    const outcome = await pipeline.handle('x'.repeat(11));
    assert.equal(outcome.ok, false);
    if (outcome.ok) return;
    assert.equal(outcome.error.status, 422);
    assert.equal(model.calls.length, 0);
  });

  it('flags truncated results in the response', async () => {
    await withStore(async (_store, adapter) => {
      const pipeline = pipelineFor(new ScriptedModel(['SELECT id FROM orders ORDER BY id']), adapter, {
        maxRows: 2,
      });
      await pipeline.init();

      const response = toResponse(await pipeline.handle('list order ids'));
      assert.deepEqual(response, {
        status: 200,
        body: { sql: 'SELECT id FROM orders ORDER BY id', results: [{ id: 1 }, { id: 2 }], truncated: true },
      });
    });
  });
});

describe('QueryPipeline lifecycle', () => {
  it('is not ready until the schema is loaded', async () => {
    const model = new ScriptedModel([]);
    const pipeline = pipelineFor(model, new FakeAdapter(neverSettles));
    assert.equal(pipeline.ready(), false);

    const outcome = await pipeline.handle('list all customers');
    assert.deepEqual(outcome, {
      ok: false,
      error: {
        stage: 'translation',
        kind: 'configuration',
        message: 'The service is not configured correctly.',
        status: 500,
      },
    });
    assert.equal(model.calls.length, 0);

    await pipeline.init();
    assert.equal(pipeline.ready(), true);
  });

  it('fails init when the database lacks a declared table', async () => {
    const adapter = new FakeAdapter(neverSettles, async () => {
      const snapshot = ecommerceSnapshot();
      return { ...snapshot, tables: snapshot.tables.filter((t) => t.name !== 'orders') };
    });
    const pipeline = pipelineFor(new ScriptedModel([]), adapter);

    await assert.rejects(pipeline.init(), {
      name: 'ConfigurationError',
      message: 'Database is missing expected tables: orders',
    });
    assert.equal(pipeline.ready(), false);
  });

  it('closes its adapter', async () => {
    const adapter = new FakeAdapter(neverSettles);
    await pipelineFor(new ScriptedModel([]), adapter).close();
    assert.equal(adapter.closed, true);
  });
});
