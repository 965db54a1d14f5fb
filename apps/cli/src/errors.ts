import { ConfigurationError, type PipelineError } from '@cartquery/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;
export const EXIT_CODE_POLICY = 3;

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'CONFIG_INVALID'
  | 'NOT_READY'
  | 'UPSTREAM_FAILED'
  | 'TRANSLATION_FAILED'
  | 'QUERY_REJECTED'
  | 'EXECUTION_FAILED'
  | 'INTERNAL_ERROR';

export type CliErrorKind = 'usage' | 'runtime' | 'policy';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  readonly details?: unknown;

  constructor(kind: CliErrorKind, code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export function usageError(message: string, code: CliErrorCode = 'INVALID_ARGS', details?: unknown): CliError {
  return new CliError('usage', code, message, details);
}

export function runtimeError(message: string, code: CliErrorCode = 'INTERNAL_ERROR', details?: unknown): CliError {
  return new CliError('runtime', code, message, details);
}

export function policyError(message: string, details?: unknown): CliError {
  return new CliError('policy', 'QUERY_REJECTED', message, details);
}

const PIPELINE_CODES: Record<PipelineError['kind'], CliErrorCode> = {
  configuration: 'CONFIG_INVALID',
  upstream: 'UPSTREAM_FAILED',
  translation: 'TRANSLATION_FAILED',
  unsafe_query: 'QUERY_REJECTED',
  execution: 'EXECUTION_FAILED',
  internal: 'INTERNAL_ERROR',
};

/** A failed pipeline outcome as a CLI error; only validation rejections count as policy. */
export function fromPipelineError(error: PipelineError): CliError {
  const details = { stage: error.stage, status: error.status };
  if (error.kind === 'unsafe_query') {
    return policyError(error.message, details);
  }
  return runtimeError(error.message, PIPELINE_CODES[error.kind], details);
}

export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) return error;
  if (error instanceof ConfigurationError) {
    return runtimeError(error.message, 'CONFIG_INVALID', { stack: error.stack });
  }
  if (error instanceof Error) {
    return runtimeError(error.message, 'INTERNAL_ERROR', { stack: error.stack });
  }
  return runtimeError(String(error), 'INTERNAL_ERROR', { raw: String(error) });
}

export function toExitCode(error: unknown): number {
  if (error instanceof CliError) {
    if (error.kind === 'usage') return EXIT_CODE_USAGE;
    if (error.kind === 'policy') return EXIT_CODE_POLICY;
    return EXIT_CODE_RUNTIME;
  }
  return EXIT_CODE_RUNTIME;
}
