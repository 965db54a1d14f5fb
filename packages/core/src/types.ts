/**
 * Per-request entities of the question-to-SQL pipeline.
 * None of them outlives the request that created it.
 */

export interface TranslationRequest {
  question: string;
}

/** SQL text pulled out of a model response; not yet trusted. */
export interface CandidateQuery {
  /** Non-empty, trimmed statement text */
  sql: string;
  /** The raw model response it was extracted from */
  extractedFrom: string;
}

export interface QueryResult {
  /** The statement that was executed */
  sql: string;
  columns: string[];
  /** Rows in the order the database returned them */
  rows: Record<string, unknown>[];
  rowCount: number;
  /** True when the row cap cut the result short */
  truncated: boolean;
  execMs: number;
}
