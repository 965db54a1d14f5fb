/**
 * Transport shape of a pipeline outcome.
 */

import type { PipelineOutcome, PipelineStage } from './pipeline.js';

export type QuestionResponse =
  | {
      status: 200;
      body: { sql: string; results: Record<string, unknown>[]; truncated: boolean };
    }
  | {
      status: number;
      body: { stage: PipelineStage; message: string };
    };

export function toResponse(outcome: PipelineOutcome): QuestionResponse {
  if (outcome.ok) {
    const { sql, rows, truncated } = outcome.result;
    return { status: 200, body: { sql, results: rows, truncated } };
  }
  const { stage, message, status } = outcome.error;
  return { status, body: { stage, message } };
}
