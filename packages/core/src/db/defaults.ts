/**
 * Safe defaults for model calls and query execution.
 * Configuration may tighten or relax them at startup.
 */

export const SAFE_DEFAULTS = {
  /** Hard cap on returned rows */
  maxRows: 5000,
  /** Statement timeout in milliseconds */
  statementTimeoutMs: 15_000,
  /** Language-model call timeout in milliseconds */
  llmTimeoutMs: 30_000,
  /** Orchestrator retries for upstream model failures */
  maxUpstreamRetries: 2,
  /** Base delay for exponential backoff between retries */
  retryBaseDelayMs: 250,
  /** Longest question accepted */
  maxQuestionLength: 2000,
} as const;
