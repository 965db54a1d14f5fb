#!/usr/bin/env -S node --import tsx

/**
 * cartquery CLI entrypoint.
 * Answers questions about the store database with read-only SQL.
 */

import { Command, CommanderError, Option } from 'commander';
import {
  ECOMMERCE_TABLES,
  SchemaDescriptor,
  buildPrompt,
  createLogger,
  createPipeline,
  inspectSql,
  loadConfig,
  toResponse,
  type QueryPipeline,
  type SqlDialect,
} from '@cartquery/core';
import {
  EXIT_CODE_SUCCESS,
  EXIT_CODE_USAGE,
  fromPipelineError,
  policyError,
  runtimeError,
  toCliError,
  toExitCode,
  usageError,
} from './errors.js';
import {
  outputOptionsFromCommand,
  printCommandSuccess,
  printError,
  printHuman,
  printJson,
  printQueryResult,
  withOutputFlags,
  type OutputOptions,
} from './output.js';
import { serveStdio } from './stdio.js';

const VERSION = '0.1.0';

// ── Helpers ──────────────────────────────────────────────────────────

async function runCommand(command: Command, fn: (output: OutputOptions) => Promise<void> | void): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    const cliError = toCliError(error);
    printError(cliError, output);
    process.exitCode = toExitCode(cliError);
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

function dialectOption(): Option {
  return new Option('--dialect <dialect>', 'SQL dialect to target').choices(['postgres', 'sqlite']).default('postgres');
}

function parseDialect(value: unknown): SqlDialect {
  if (value === 'postgres' || value === 'sqlite') return value;
  throw usageError(`Unknown dialect "${String(value)}".`);
}

/** Load configuration, build the pipeline, run fn with it, and always close it. */
async function withPipeline<T>(fn: (pipeline: QueryPipeline) => Promise<T>): Promise<T> {
  const config = loadConfig();
  const pipeline = createPipeline(config, createLogger(config.logLevel));
  try {
    return await fn(pipeline);
  } finally {
    await pipeline.close();
  }
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('cartquery')
  .description('Ask questions about the store database in plain language')
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Suppress non-essential logs', false)
  .option('--verbose', 'Show additional context', false)
  .option('--debug', 'Show internal error details and stacks', false)
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();
program.addHelpText(
  'after',
  `
Command groups:
  Query:    ask, stdio
  Inspect:  health, schema, prompt, check

Environment:
  OPENAI_API_KEY, CARTQUERY_DATABASE_URL (postgres://... or sqlite:<path>)
`,
);

// ── ask ──────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('ask')
      .description('Translate a question into SQL, check it, and run it')
      .argument('<question>', 'Question about the store data')
      .action(async function (this: Command, question: string) {
        await runCommand(this, async (output) => {
          const outcome = await withPipeline(async (pipeline) => {
            await pipeline.init();
            return pipeline.handle(question);
          });

          if (output.json) {
            printJson(toResponse(outcome));
            if (!outcome.ok) process.exitCode = toExitCode(fromPipelineError(outcome.error));
            return;
          }
          if (!outcome.ok) {
            throw fromPipelineError(outcome.error);
          }

          printQueryResult(outcome.result, output);
        });
      }),
  ),
  ['cartquery ask "list all customers"', 'cartquery ask "top 5 products by revenue" --json'],
);

// ── health ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('health')
      .description('Check that configuration loads and the database matches the declared schema')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const reason = await withPipeline(async (pipeline) => {
            try {
              await pipeline.init();
              return null;
            } catch (error: unknown) {
              return toCliError(error).message;
            }
          });

          if (reason !== null) {
            throw runtimeError(`Not ready: ${reason}`, 'NOT_READY', { ready: false });
          }
          printCommandSuccess({ ready: true }, output, 'ready');
        });
      }),
  ),
  ['cartquery health', 'cartquery health --json'],
);

// ── schema ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('schema')
      .description('Show the tables and columns questions may refer to')
      .option('--verify', 'Also check the declared tables against the live database', false)
      .action(async function (this: Command, opts: { verify?: boolean }) {
        await runCommand(this, async (output) => {
          const schema = opts.verify
            ? await withPipeline((pipeline) => pipeline.init())
            : new SchemaDescriptor(ECOMMERCE_TABLES);

          if (output.json) {
            printCommandSuccess({ version: schema.version, tables: schema.tables() }, output);
            return;
          }
          for (const table of schema.tables()) {
            printHuman(table.name, output);
            for (const column of table.columns) {
              printHuman(`  ${column.name.padEnd(16)} ${column.declaredType}`, output);
            }
          }
          printHuman(`\nversion ${schema.version}${opts.verify ? ' (verified)' : ''}`, output);
        });
      }),
  ),
  ['cartquery schema', 'cartquery schema --verify --json'],
);

// ── prompt ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('prompt')
      .description('Print the prompt that would be sent to the language model')
      .argument('<question>', 'Question about the store data')
      .addOption(dialectOption())
      .action(async function (this: Command, question: string, opts: { dialect?: string }) {
        await runCommand(this, (output) => {
          const prompt = buildPrompt(question, new SchemaDescriptor(ECOMMERCE_TABLES), parseDialect(opts.dialect));
          if (output.json) {
            printCommandSuccess({ prompt }, output);
            return;
          }
          console.log(prompt);
        });
      }),
  ),
  ['cartquery prompt "how many orders were placed in May?" --dialect sqlite'],
);

// ── check ────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('check')
      .description('Run the safety checks on a statement without executing it')
      .argument('<sql>', 'SQL statement to check')
      .addOption(dialectOption())
      .action(async function (this: Command, sql: string, opts: { dialect?: string }) {
        await runCommand(this, (output) => {
          const result = inspectSql(sql, new SchemaDescriptor(ECOMMERCE_TABLES), parseDialect(opts.dialect));
          if (!result.allowed) {
            if (!output.json) {
              for (const v of result.violations) {
                printHuman(`  [${v.rule}] ${v.reason}`, output);
              }
            }
            throw policyError('Statement rejected.', { violations: result.violations });
          }
          printCommandSuccess({ sql: result.sql }, output, `allowed: ${result.sql}`);
        });
      }),
  ),
  ['cartquery check "SELECT name FROM customers"', 'cartquery check "DELETE FROM orders" --json --debug'],
);

// ── stdio ────────────────────────────────────────────────────────────

withExamples(
  program
    .command('stdio')
    .description('Serve newline-delimited JSON requests on stdin, one JSON response per line on stdout')
    .action(async function (this: Command) {
      await runCommand(this, async () => {
        const config = loadConfig();
        const logger = createLogger(config.logLevel);
        const pipeline = createPipeline(config, logger);
        try {
          try {
            await pipeline.init();
          } catch (error: unknown) {
            logger.error({ err: error }, 'schema check failed; serving requests as not ready');
          }
          const served = await serveStdio(process.stdin, (line) => process.stdout.write(`${line}\n`), pipeline);
          logger.info({ served }, 'stdin closed');
        } finally {
          await pipeline.close();
        }
      });
    }),
  [
    `echo '{"id":1,"method":"ask","params":{"question":"list all customers"}}' | cartquery stdio`,
    `echo '{"id":2,"method":"health"}' | cartquery stdio`,
  ],
);

// ── parse ────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // help and version exit through here with exit code 0
      process.exitCode = error.exitCode === 0 ? EXIT_CODE_SUCCESS : EXIT_CODE_USAGE;
      return;
    }
    printError(toCliError(error), outputOptionsFromCommand(program));
    process.exitCode = toExitCode(error);
  }
}

void main();
