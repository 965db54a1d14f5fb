/**
 * Line-oriented JSON protocol for driving the pipeline from another process.
 *
 * Each stdin line is one request `{ id, method, params }`; each answer is one
 * stdout line `{ id, result }` or `{ id, error: { code, message } }`.
 * Requests are served one at a time, in order.
 */

import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { toResponse, type PipelineOutcome, type QuestionResponse } from '@cartquery/core';
import type { CliErrorCode } from './errors.js';

export type RequestId = string | number | null;

export interface StdioTarget {
  handle(question: string): Promise<PipelineOutcome>;
  ready(): boolean;
}

export type StdioResponse =
  | { id: RequestId; result: QuestionResponse | { ready: boolean } }
  | { id: RequestId; error: { code: CliErrorCode; message: string } };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requestId(value: unknown): RequestId {
  return typeof value === 'string' || typeof value === 'number' ? value : null;
}

function invalid(id: RequestId, message: string): StdioResponse {
  return { id, error: { code: 'INVALID_ARGS', message } };
}

export async function handleStdioLine(line: string, target: StdioTarget): Promise<StdioResponse> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return invalid(null, 'Request is not valid JSON.');
  }
  if (!isRecord(parsed)) {
    return invalid(null, 'Request must be a JSON object.');
  }

  const id = requestId(parsed.id);
  switch (parsed.method) {
    case 'health':
      return { id, result: { ready: target.ready() } };
    case 'ask': {
      const params = parsed.params;
      if (!isRecord(params) || typeof params.question !== 'string') {
        return invalid(id, 'params.question must be a string.');
      }
      return { id, result: toResponse(await target.handle(params.question)) };
    }
    default:
      return invalid(id, `Unknown method "${String(parsed.method)}".`);
  }
}

/** Serve requests until the input ends. Blank lines are skipped. */
export async function serveStdio(
  input: Readable,
  write: (line: string) => void,
  target: StdioTarget,
): Promise<number> {
  const rl = createInterface({ input, crlfDelay: Infinity });
  let served = 0;
  for await (const line of rl) {
    if (!line.trim()) continue;
    write(JSON.stringify(await handleStdioLine(line, target)));
    served++;
  }
  return served;
}
