/**
 * Pipeline orchestration.
 * Ties together prompt building, translation, validation and execution for
 * one question at a time, and maps every failure to a stage and a fixed
 * user-facing message.
 */

import { randomUUID } from 'node:crypto';
import { setTimeout as sleep } from 'node:timers/promises';
import type { AppConfig } from './config.js';
import { createAdapter } from './db/connect.js';
import { SAFE_DEFAULTS } from './db/defaults.js';
import { Executor } from './db/executor.js';
import type { DbAdapter } from './db/types.js';
import {
  ConfigurationError,
  ExecutionError,
  TranslationError,
  UnsafeQueryError,
  UpstreamError,
  isCartQueryError,
  type ErrorKind,
} from './errors.js';
import { OpenAIModel } from './llm/openai.js';
import { buildPrompt } from './llm/prompt.js';
import { Translator } from './llm/translator.js';
import type { LanguageModel } from './llm/types.js';
import type { Logger } from './logger.js';
import { validate } from './policy/validate.js';
import { loadSchemaDescriptor, type SchemaDescriptor, type TableDefinition } from './schema/descriptor.js';
import { ECOMMERCE_TABLES } from './schema/ecommerce.js';
import type { CandidateQuery, QueryResult } from './types.js';

export type PipelineStage = 'translation' | 'validation' | 'execution';

export interface PipelineError {
  stage: PipelineStage;
  kind: ErrorKind | 'internal';
  /** Fixed, safe to show to the end user */
  message: string;
  /** HTTP-style status for the inbound surface */
  status: number;
}

export type PipelineOutcome = { ok: true; result: QueryResult } | { ok: false; error: PipelineError };

export const USER_MESSAGES = {
  upstream: 'The language model service is unavailable. Please try again later.',
  translation: 'Could not translate the question into a query. Please rephrase it or add detail.',
  unsafe_query: 'Cannot run this query.',
  execution: 'The query could not be executed.',
  executionTimeout: 'The query took too long to run.',
  configuration: 'The service is not configured correctly.',
  internal: 'An unexpected error occurred.',
} as const;

export interface PipelineOptions {
  model: LanguageModel;
  adapter: DbAdapter;
  tables: readonly TableDefinition[];
  logger: Logger;
  llmTimeoutMs?: number;
  executionTimeoutMs?: number;
  maxRows?: number;
  maxUpstreamRetries?: number;
  retryBaseDelayMs?: number;
  maxQuestionLength?: number;
}

function toPipelineError(err: unknown, stage: PipelineStage): PipelineError {
  if (err instanceof UpstreamError) {
    return { stage, kind: err.kind, message: USER_MESSAGES.upstream, status: 502 };
  }
  if (err instanceof TranslationError) {
    return { stage, kind: err.kind, message: USER_MESSAGES.translation, status: 422 };
  }
  if (err instanceof UnsafeQueryError) {
    return { stage, kind: err.kind, message: USER_MESSAGES.unsafe_query, status: 400 };
  }
  if (err instanceof ExecutionError) {
    return err.timedOut
      ? { stage, kind: err.kind, message: USER_MESSAGES.executionTimeout, status: 504 }
      : { stage, kind: err.kind, message: USER_MESSAGES.execution, status: 500 };
  }
  if (err instanceof ConfigurationError) {
    return { stage, kind: err.kind, message: USER_MESSAGES.configuration, status: 500 };
  }
  return { stage, kind: 'internal', message: USER_MESSAGES.internal, status: 500 };
}

export class QueryPipeline {
  private readonly adapter: DbAdapter;
  private readonly tables: readonly TableDefinition[];
  private readonly logger: Logger;
  private readonly translator: Translator;
  private readonly executor: Executor;
  private readonly maxUpstreamRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly maxQuestionLength: number;
  private schema: SchemaDescriptor | null = null;

  constructor(options: PipelineOptions) {
    this.adapter = options.adapter;
    this.tables = options.tables;
    this.logger = options.logger;
    this.translator = new Translator({
      model: options.model,
      timeoutMs: options.llmTimeoutMs ?? SAFE_DEFAULTS.llmTimeoutMs,
    });
    this.executor = new Executor({
      adapter: options.adapter,
      maxRows: options.maxRows,
      timeoutMs: options.executionTimeoutMs,
    });
    this.maxUpstreamRetries = options.maxUpstreamRetries ?? SAFE_DEFAULTS.maxUpstreamRetries;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? SAFE_DEFAULTS.retryBaseDelayMs;
    this.maxQuestionLength = options.maxQuestionLength ?? SAFE_DEFAULTS.maxQuestionLength;
  }

  /**
   * Load and verify the schema descriptor. Must succeed before handle().
   * @throws ConfigurationError when the database is unreachable or incomplete
   */
  async init(): Promise<SchemaDescriptor> {
    const schema = await loadSchemaDescriptor(this.adapter, this.tables);
    this.schema = schema;
    this.logger.info(
      { tables: schema.tables().length, schemaVersion: schema.version, dialect: this.adapter.type },
      'schema descriptor loaded',
    );
    return schema;
  }

  ready(): boolean {
    return this.schema !== null;
  }

  get descriptor(): SchemaDescriptor {
    if (!this.schema) {
      throw new ConfigurationError('Schema descriptor has not been loaded.');
    }
    return this.schema;
  }

  async handle(question: string): Promise<PipelineOutcome> {
    const log = this.logger.child({ requestId: randomUUID() });
    let stage: PipelineStage = 'translation';

    try {
      const schema = this.descriptor;
      const trimmed = question.trim();
      if (!trimmed) {
        throw new TranslationError('Question is empty.');
      }
      if (trimmed.length > this.maxQuestionLength) {
        throw new TranslationError(
          `Question is ${trimmed.length} characters; the limit is ${this.maxQuestionLength}.`,
        );
      }

      const prompt = buildPrompt(trimmed, schema, this.adapter.type);
      log.debug({ stage, model: this.translator.modelName }, 'translating question');
      const candidate = await this.translateWithRetry(prompt, log);

      stage = 'validation';
      log.debug({ stage, sql: candidate.sql }, 'validating candidate');
      const validated = validate(candidate, schema, this.adapter.type);

      stage = 'execution';
      log.debug({ stage, schemaVersion: validated.schemaVersion }, 'executing statement');
      const result = await this.executor.execute(validated);

      log.info({ rowCount: result.rowCount, truncated: result.truncated, execMs: result.execMs }, 'query answered');
      return { ok: true, result };
    } catch (err: unknown) {
      const error = toPipelineError(err, stage);
      if (err instanceof UnsafeQueryError) {
        log.warn({ stage, violations: err.violations }, 'statement rejected');
      } else if (isCartQueryError(err) && err.kind === 'translation') {
        log.warn({ stage, err }, 'translation failed');
      } else {
        log.error({ stage, err }, 'request failed');
      }
      return { ok: false, error };
    }
  }

  private async translateWithRetry(prompt: string, log: Logger): Promise<CandidateQuery> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.translator.translate(prompt);
      } catch (err: unknown) {
        if (!(err instanceof UpstreamError) || attempt >= this.maxUpstreamRetries) {
          throw err;
        }
        const delayMs = this.retryBaseDelayMs * 2 ** attempt;
        log.warn({ err, attempt: attempt + 1, delayMs }, 'language model call failed, retrying');
        await sleep(delayMs);
      }
    }
  }

  async close(): Promise<void> {
    await this.adapter.close();
  }
}

/**
 * Build a pipeline over the e-commerce tables from startup configuration.
 */
export function createPipeline(config: AppConfig, logger: Logger): QueryPipeline {
  return new QueryPipeline({
    model: new OpenAIModel({
      apiKey: config.openaiApiKey,
      model: config.model,
      timeoutMs: config.llmTimeoutMs,
    }),
    adapter: createAdapter(config.database, logger),
    tables: ECOMMERCE_TABLES,
    logger,
    llmTimeoutMs: config.llmTimeoutMs,
    executionTimeoutMs: config.executionTimeoutMs,
    maxRows: config.maxRows,
    maxUpstreamRetries: config.maxUpstreamRetries,
    retryBaseDelayMs: config.retryBaseDelayMs,
    maxQuestionLength: config.maxQuestionLength,
  });
}
