/**
 * Textual pre-filter, the first validator layer.
 *
 * Runs before parsing and is deliberately over-strict: it will reject some
 * read-only statements that mention a write keyword, and never accepts a
 * statement on its own. Quoted text is blanked first so a keyword inside a
 * literal such as 'drop shipping' does not count.
 */

import type { RuleViolation } from './types.js';

const FORBIDDEN_KEYWORDS = [
  'INSERT',
  'UPDATE',
  'DELETE',
  'DROP',
  'ALTER',
  'CREATE',
  'TRUNCATE',
  'GRANT',
  'REVOKE',
  'ATTACH',
  'DETACH',
  'PRAGMA',
  'COPY',
  'VACUUM',
  'REINDEX',
  'EXECUTE',
  'CALL',
  'MERGE',
  'LOAD',
];

const FORBIDDEN_PATTERN = new RegExp(`\\b(${FORBIDDEN_KEYWORDS.join('|')})\\b`, 'gi');

type Masked = { ok: true; text: string } | { ok: false; quote: string };

/**
 * Replace the contents of '...' literals and "..." identifiers with spaces.
 * A doubled quote inside a literal is an escaped quote.
 */
export function maskQuoted(sql: string): Masked {
  let out = '';
  let i = 0;
  while (i < sql.length) {
    const ch = sql[i];
    if (ch !== "'" && ch !== '"') {
      out += ch;
      i++;
      continue;
    }

    out += ch;
    i++;
    let closed = false;
    while (i < sql.length) {
      if (sql[i] === ch) {
        if (sql[i + 1] === ch) {
          out += '  ';
          i += 2;
          continue;
        }
        out += ch;
        i++;
        closed = true;
        break;
      }
      out += ' ';
      i++;
    }
    if (!closed) return { ok: false, quote: ch };
  }
  return { ok: true, text: out };
}

export function prefilter(sql: string): RuleViolation[] {
  if (sql.includes('\0')) {
    return [{ rule: 'null_byte', reason: 'Statement contains a NUL byte.' }];
  }

  const masked = maskQuoted(sql);
  if (!masked.ok) {
    return [
      {
        rule: 'unterminated_quote',
        reason: `Statement has an unterminated ${masked.quote === "'" ? 'string literal' : 'quoted identifier'}.`,
      },
    ];
  }

  const text = masked.text;
  const violations: RuleViolation[] = [];

  if (/--|\/\*|\*\//.test(text)) {
    violations.push({ rule: 'comment', reason: 'Comments are not allowed in statements.' });
  }

  const body = text.trim().replace(/;\s*$/, '');
  if (body.includes(';')) {
    violations.push({
      rule: 'single_statement',
      reason: 'Only one statement is allowed; found a statement separator.',
    });
  }

  const keywords = new Set<string>();
  for (const match of text.matchAll(FORBIDDEN_PATTERN)) {
    keywords.add(match[1].toUpperCase());
  }
  for (const keyword of keywords) {
    violations.push({
      rule: 'forbidden_keyword',
      reason: `Statement contains forbidden keyword: ${keyword}`,
    });
  }

  return violations;
}
