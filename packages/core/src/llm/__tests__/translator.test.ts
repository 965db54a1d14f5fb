import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { TranslationError, UpstreamError } from '../../errors.js';
import { HangingModel, ScriptedModel } from '../../__tests__/helpers.js';
import { buildMessages } from '../prompt.js';
import { Translator } from '../translator.js';

describe('Translator', () => {
  it('sends the prompt as chat messages and extracts the statement', async () => {
    const model = new ScriptedModel(['```sql\nSELECT name FROM customers\n```']);
    const translator = new Translator({ model, timeoutMs: 1000 });

    const candidate = await translator.translate('PROMPT');
    assert.equal(candidate.sql, 'SELECT name FROM customers');
    assert.deepEqual(model.calls, [buildMessages('PROMPT')]);
  });

  it('makes exactly one call, even on failure', async () => {
    const model = new ScriptedModel([new Error('socket hang up'), 'SELECT 1']);
    const translator = new Translator({ model, timeoutMs: 1000 });

    await assert.rejects(translator.translate('PROMPT'), (err: unknown) => {
      assert.ok(err instanceof UpstreamError);
      assert.equal(err.message, 'Model call failed: socket hang up');
      assert.equal(err.timedOut, false);
      return true;
    });
    assert.equal(model.calls.length, 1);
  });

  it('passes upstream errors through unchanged', async () => {
    const original = new UpstreamError('OpenAI request failed with status 429', { status: 429 });
    const translator = new Translator({ model: new ScriptedModel([original]), timeoutMs: 1000 });

    await assert.rejects(translator.translate('PROMPT'), (err: unknown) => {
      assert.equal(err, original);
      return true;
    });
  });

  it('times out a hung model call and aborts it', async () => {
    const model = new HangingModel();
    const translator = new Translator({ model, timeoutMs: 20 });

    await assert.rejects(translator.translate('PROMPT'), (err: unknown) => {
      assert.ok(err instanceof UpstreamError);
      assert.equal(err.timedOut, true);
      assert.equal(err.message, 'Model call exceeded 20ms');
      return true;
    });
    assert.equal(model.aborted, true);
  });

  it('reports an unusable answer as a translation error', async () => {
    const translator = new Translator({ model: new ScriptedModel(['']), timeoutMs: 1000 });
    await assert.rejects(translator.translate('PROMPT'), TranslationError);
  });
});
