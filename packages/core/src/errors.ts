/**
 * Error taxonomy for the question-to-SQL pipeline.
 *
 * Every failure a component raises is one of these kinds. The pipeline maps
 * them to a stage and a fixed user-facing message; the message and cause
 * carried here are internal and only ever reach the log.
 */

import type { RuleViolation } from './policy/types.js';

export type ErrorKind = 'configuration' | 'upstream' | 'translation' | 'unsafe_query' | 'execution';

export abstract class CartQueryError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Startup-fatal: missing credential, unreachable database, missing tables. */
export class ConfigurationError extends CartQueryError {
  readonly kind = 'configuration' as const;
}

/**
 * The language-model service failed (transport, auth, rate limit, timeout).
 * Eligible for retry by the orchestrator, never inside the translator.
 */
export class UpstreamError extends CartQueryError {
  readonly kind = 'upstream' as const;
  readonly status?: number;
  readonly timedOut: boolean;

  constructor(message: string, options: { cause?: unknown; status?: number; timedOut?: boolean } = {}) {
    super(message, { cause: options.cause });
    this.status = options.status;
    this.timedOut = options.timedOut ?? false;
  }
}

/** The model answered, but no usable statement could be extracted. */
export class TranslationError extends CartQueryError {
  readonly kind = 'translation' as const;
}

/** The candidate statement broke at least one safety rule. */
export class UnsafeQueryError extends CartQueryError {
  readonly kind = 'unsafe_query' as const;
  readonly violations: RuleViolation[];

  constructor(violations: RuleViolation[]) {
    super(
      violations.length > 0
        ? violations.map((v) => `[${v.rule}] ${v.reason}`).join('; ')
        : 'Statement rejected by policy',
    );
    this.violations = violations;
  }
}

/** Database-level failure or timeout while running a validated statement. */
export class ExecutionError extends CartQueryError {
  readonly kind = 'execution' as const;
  readonly timedOut: boolean;

  constructor(message: string, options: { cause?: unknown; timedOut?: boolean } = {}) {
    super(message, { cause: options.cause });
    this.timedOut = options.timedOut ?? false;
  }
}

export function isCartQueryError(err: unknown): err is CartQueryError {
  return err instanceof CartQueryError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
