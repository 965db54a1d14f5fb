import type { Command } from 'commander';
import type { QueryResult } from '@cartquery/core';
import { formatTable } from './util/table.js';
import { CliError } from './errors.js';

export interface OutputOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  debug: boolean;
}

export function outputOptionsFromCommand(command: Command): OutputOptions {
  const opts = command.optsWithGlobals();
  return {
    json: Boolean(opts.json),
    quiet: Boolean(opts.quiet),
    verbose: Boolean(opts.verbose),
    debug: Boolean(opts.debug),
  };
}

export function printHuman(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.log(message);
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/** Rows as a table, with the executed SQL under --verbose and a row-count footer. */
export function printQueryResult(result: QueryResult, output: OutputOptions): void {
  if (output.quiet) return;
  if (output.verbose) {
    console.log(`SQL: ${result.sql}\n`);
  }
  console.log(formatTable(result.columns, result.rows));
  const suffix = result.truncated ? ' (truncated at the row limit)' : '';
  console.log(`\n${result.rowCount} row(s) in ${result.execMs}ms${suffix}`);
}

/** Error payload for --json output; details only with --debug. */
export function errorPayload(error: unknown, debug: boolean): Record<string, unknown> {
  const isCliError = error instanceof CliError;
  const payload: Record<string, unknown> = {
    ok: false,
    code: isCliError ? error.code : 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : String(error),
  };
  if (debug) {
    payload.details = isCliError
      ? error.details ?? null
      : error instanceof Error
        ? { stack: error.stack }
        : { raw: String(error) };
  }
  return payload;
}

export function printError(error: unknown, output: OutputOptions): void {
  if (output.json) {
    printJson(errorPayload(error, output.debug));
    return;
  }

  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${message}`);
  if (output.debug) {
    if (error instanceof CliError && error.details !== undefined) {
      console.error('Details:', JSON.stringify(error.details, null, 2));
    } else if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
  }
}

export function printCommandSuccess(value: unknown, output: OutputOptions, humanMessage?: string): void {
  if (output.json) {
    printJson({ ok: true, data: value });
    return;
  }
  if (humanMessage && !output.quiet) {
    console.log(humanMessage);
  }
}

export function withOutputFlags<T extends Command>(command: T): T {
  return command
    .option('--json', 'Machine-readable JSON output', false)
    .option('--quiet', 'Suppress non-essential logs', false)
    .option('--verbose', 'Show additional context', false)
    .option('--debug', 'Show internal error details and stacks', false);
}
