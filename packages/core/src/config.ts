/**
 * Startup configuration.
 *
 * Read once from the environment, validated with an AJV schema (numbers are
 * coerced from their string form, defaults filled in) and frozen.
 */

import { Ajv, type ErrorObject, type JSONSchemaType } from 'ajv';
import { ConfigurationError } from './errors.js';
import { SAFE_DEFAULTS } from './db/defaults.js';
import { DEFAULT_MODEL } from './llm/openai.js';

export type DatabaseConfig =
  | { type: 'postgres'; connectionString: string }
  | { type: 'sqlite'; filename: string };

export interface AppConfig {
  readonly openaiApiKey: string;
  readonly model: string;
  readonly database: DatabaseConfig;
  readonly llmTimeoutMs: number;
  readonly executionTimeoutMs: number;
  readonly maxRows: number;
  readonly maxUpstreamRetries: number;
  readonly retryBaseDelayMs: number;
  readonly maxQuestionLength: number;
  readonly logLevel: string;
}

interface RawConfig {
  openaiApiKey: string;
  model: string;
  databaseUrl: string;
  llmTimeoutMs: number;
  executionTimeoutMs: number;
  maxRows: number;
  maxUpstreamRetries: number;
  retryBaseDelayMs: number;
  maxQuestionLength: number;
  logLevel: string;
}

const ENV_NAMES: Record<keyof RawConfig, string> = {
  openaiApiKey: 'OPENAI_API_KEY',
  model: 'CARTQUERY_MODEL',
  databaseUrl: 'CARTQUERY_DATABASE_URL',
  llmTimeoutMs: 'CARTQUERY_LLM_TIMEOUT_MS',
  executionTimeoutMs: 'CARTQUERY_EXEC_TIMEOUT_MS',
  maxRows: 'CARTQUERY_MAX_ROWS',
  maxUpstreamRetries: 'CARTQUERY_MAX_RETRIES',
  retryBaseDelayMs: 'CARTQUERY_RETRY_BASE_MS',
  maxQuestionLength: 'CARTQUERY_MAX_QUESTION_LENGTH',
  logLevel: 'CARTQUERY_LOG_LEVEL',
};

const rawConfigSchema: JSONSchemaType<RawConfig> = {
  type: 'object',
  properties: {
    openaiApiKey: { type: 'string', minLength: 1 },
    model: { type: 'string', minLength: 1, default: DEFAULT_MODEL },
    databaseUrl: { type: 'string', minLength: 1 },
    llmTimeoutMs: { type: 'integer', minimum: 1, default: SAFE_DEFAULTS.llmTimeoutMs },
    executionTimeoutMs: { type: 'integer', minimum: 1, default: SAFE_DEFAULTS.statementTimeoutMs },
    maxRows: { type: 'integer', minimum: 1, default: SAFE_DEFAULTS.maxRows },
    maxUpstreamRetries: { type: 'integer', minimum: 0, maximum: 10, default: SAFE_DEFAULTS.maxUpstreamRetries },
    retryBaseDelayMs: { type: 'integer', minimum: 0, default: SAFE_DEFAULTS.retryBaseDelayMs },
    maxQuestionLength: { type: 'integer', minimum: 1, default: SAFE_DEFAULTS.maxQuestionLength },
    logLevel: {
      type: 'string',
      enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
      default: 'info',
    },
  },
  required: [
    'openaiApiKey',
    'model',
    'databaseUrl',
    'llmTimeoutMs',
    'executionTimeoutMs',
    'maxRows',
    'maxUpstreamRetries',
    'retryBaseDelayMs',
    'maxQuestionLength',
    'logLevel',
  ],
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true, coerceTypes: true, useDefaults: true });
const validateRawConfig = ajv.compile(rawConfigSchema);

function isConfigKey(key: string): key is keyof RawConfig {
  return Object.prototype.hasOwnProperty.call(ENV_NAMES, key);
}

function describeError(error: ErrorObject): string {
  if (error.keyword === 'required') {
    const missing = String(error.params.missingProperty);
    const envName = isConfigKey(missing) ? ENV_NAMES[missing] : missing;
    return `${envName} is not set`;
  }
  const key = error.instancePath.replace(/^\//, '');
  const envName = isConfigKey(key) ? ENV_NAMES[key] : key;
  return `${envName} ${error.message ?? 'is invalid'}`;
}

/**
 * Parse a database location: a postgres:// (or postgresql://) URL, or
 * sqlite:<path> for a local database file.
 */
export function parseDatabaseUrl(url: string): DatabaseConfig {
  const trimmed = url.trim();
  if (/^postgres(?:ql)?:\/\//i.test(trimmed)) {
    return { type: 'postgres', connectionString: trimmed };
  }
  if (trimmed.toLowerCase().startsWith('sqlite:')) {
    const filename = trimmed.slice('sqlite:'.length).replace(/^\/\//, '');
    if (!filename) {
      throw new ConfigurationError(`${ENV_NAMES.databaseUrl} names no SQLite database file.`);
    }
    return { type: 'sqlite', filename };
  }
  throw new ConfigurationError(
    `${ENV_NAMES.databaseUrl} must start with postgres://, postgresql:// or sqlite:`,
  );
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw: Record<string, unknown> = {};
  for (const [key, envName] of Object.entries(ENV_NAMES)) {
    const value = env[envName];
    if (value !== undefined && value.trim() !== '') {
      raw[key] = value.trim();
    }
  }

  if (!validateRawConfig(raw)) {
    const problems = (validateRawConfig.errors ?? []).map(describeError);
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`);
  }

  return Object.freeze({
    openaiApiKey: raw.openaiApiKey,
    model: raw.model,
    database: Object.freeze(parseDatabaseUrl(raw.databaseUrl)),
    llmTimeoutMs: raw.llmTimeoutMs,
    executionTimeoutMs: raw.executionTimeoutMs,
    maxRows: raw.maxRows,
    maxUpstreamRetries: raw.maxUpstreamRetries,
    retryBaseDelayMs: raw.retryBaseDelayMs,
    maxQuestionLength: raw.maxQuestionLength,
    logLevel: raw.logLevel,
  });
}
