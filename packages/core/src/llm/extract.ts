/**
 * Pull a single candidate statement out of a free-text model response.
 *
 * The span starts at the first line that opens with a SQL verb and ends at
 * the statement terminator, or at the next blank line when there is none.
 * Text after the terminator is dropped unless it opens another statement;
 * chained statements are kept so the validator sees them and rejects the
 * whole response.
 */

import { TranslationError } from '../errors.js';
import type { CandidateQuery } from '../types.js';
import { CANNOT_ANSWER } from './prompt.js';

const VERBS =
  'select|insert|update|delete|drop|alter|create|truncate|replace|merge|grant|revoke|' +
  'attach|detach|pragma|copy|vacuum|execute';

/** WITH only counts when a CTE definition follows, so prose like "With pleasure" is skipped */
const CTE = 'with\\s+(?:recursive\\s+)?[\\w"]+\\s*(?:\\([^)]*\\)\\s*)?as\\s*\\(';

/** A line that starts a statement, optionally labelled "SQL:" */
const LINE_START = new RegExp(`^(?:sql\\s*:\\s*)?((?:(?:${VERBS})\\b|${CTE})[\\s\\S]*)$`, 'i');

/** An upper-case verb inside prose, e.g. "Here it is: SELECT ..." */
const INLINE_START = /\b(SELECT|WITH|INSERT|UPDATE|DELETE|DROP|ALTER|CREATE|TRUNCATE)\b/;

const FENCE = /```[ \t]*[A-Za-z0-9_-]*[ \t]*\n?([\s\S]*?)```/g;

const REFUSALS: RegExp[] = [
  new RegExp(`^${CANNOT_ANSWER}\\b`, 'i'),
  /^(?:i'?m|i am)\s+(?:sorry|unable|not able)\b/i,
  /^sorry\b/i,
  /^unfortunately\b/i,
  /^i\s+(?:cannot|can't|can not|won't|will not)\b/i,
  /^as an ai\b/i,
  /^(?:could|can|would)\s+you\s+(?:please\s+)?(?:clarify|specify|provide|rephrase)\b/i,
  /^(?:the|your) (?:question|request) is (?:ambiguous|unclear)\b/i,
];

function takeStatementSpan(body: string): string | null {
  const lines = body.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const match = lines[i].trim().match(LINE_START);
    if (match) {
      return collectParagraph(match[1], lines.slice(i + 1));
    }
  }

  for (let i = 0; i < lines.length; i++) {
    const inline = INLINE_START.exec(lines[i]);
    if (inline) {
      return collectParagraph(lines[i].slice(inline.index), lines.slice(i + 1));
    }
  }

  return null;
}

function collectParagraph(first: string, rest: string[]): string {
  const span = [first];
  for (const line of rest) {
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('```')) break;
    span.push(line);
  }
  return cutAtTerminator(span.join('\n').trim());
}

/** Index of the first `;` outside string literals and quoted identifiers, or -1. */
function terminatorIndex(text: string): number {
  let quote: string | null = null;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === quote) {
        // A doubled quote is an escaped one.
        if (text[i + 1] === quote) i++;
        else quote = null;
      }
    } else if (ch === "'" || ch === '"') {
      quote = ch;
    } else if (ch === ';') {
      return i;
    }
  }
  return -1;
}

function cutAtTerminator(span: string): string {
  const end = terminatorIndex(span);
  if (end === -1) return span;
  const after = span.slice(end + 1).trim();
  if (after === '' || LINE_START.test(after)) return span;
  return span.slice(0, end + 1);
}

export function extractCandidateSql(response: string): CandidateQuery {
  const text = response.replace(/\r\n?/g, '\n').trim();
  if (!text) {
    throw new TranslationError('Model response was empty.');
  }

  if (REFUSALS.some((re) => re.test(text))) {
    throw new TranslationError('Model declined the question or asked for clarification.');
  }

  const fenced = [...text.matchAll(FENCE)]
    .map((m) => m[1].trim())
    .filter((block) => takeStatementSpan(block) !== null);
  if (fenced.length > 1) {
    throw new TranslationError(`Model response holds ${fenced.length} SQL blocks; expected one.`);
  }

  const sql = takeStatementSpan(fenced.length === 1 ? fenced[0] : text);
  if (!sql) {
    throw new TranslationError('No SQL statement found in model response.');
  }

  return { sql, extractedFrom: response };
}
