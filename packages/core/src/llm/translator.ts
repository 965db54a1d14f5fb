/**
 * Translator: one model call per prompt, then extraction of the candidate
 * statement. Retrying is the orchestrator's decision, never made here.
 */

import { UpstreamError, errorMessage } from '../errors.js';
import type { CandidateQuery } from '../types.js';
import { withTimeout } from '../util/timeout.js';
import { extractCandidateSql } from './extract.js';
import { buildMessages } from './prompt.js';
import type { LanguageModel } from './types.js';

export interface TranslatorOptions {
  model: LanguageModel;
  /** Deadline for a single model call */
  timeoutMs: number;
}

export class Translator {
  private readonly model: LanguageModel;
  private readonly timeoutMs: number;

  constructor(options: TranslatorOptions) {
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
  }

  get modelName(): string {
    return this.model.name;
  }

  async translate(prompt: string): Promise<CandidateQuery> {
    const messages = buildMessages(prompt);

    let response: string;
    try {
      response = await withTimeout(
        this.timeoutMs,
        (signal) => this.model.complete(messages, { signal }),
        () => new UpstreamError(`Model call exceeded ${this.timeoutMs}ms`, { timedOut: true }),
      );
    } catch (err: unknown) {
      if (err instanceof UpstreamError) throw err;
      throw new UpstreamError(`Model call failed: ${errorMessage(err)}`, { cause: err });
    }

    return extractCandidateSql(response);
  }
}
