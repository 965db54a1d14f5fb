/**
 * Plain-text table for result rows: a header, a dashed separator, one line per
 * row. Cells wider than MAX_CELL_WIDTH are cut with an ellipsis.
 */

const MAX_CELL_WIDTH = 60;

export function formatTable(columns: string[], rows: Record<string, unknown>[]): string {
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return '(0 rows)';

  const widths = columns.map((col) => Math.min(col.length, MAX_CELL_WIDTH));
  for (const row of rows) {
    columns.forEach((col, i) => {
      widths[i] = Math.min(Math.max(widths[i], formatValue(row[col]).length), MAX_CELL_WIDTH);
    });
  }

  const lines = [
    columns.map((col, i) => fit(col, widths[i])).join(' | '),
    widths.map((w) => '-'.repeat(w)).join('-+-'),
  ];
  for (const row of rows) {
    lines.push(columns.map((col, i) => fit(formatValue(row[col]), widths[i])).join(' | '));
  }
  return lines.join('\n');
}

function fit(text: string, width: number): string {
  return text.length > width ? text.slice(0, width - 1) + '…' : text.padEnd(width);
}

export function formatValue(val: unknown): string {
  if (val === null || val === undefined) return 'NULL';
  if (val instanceof Date) return val.toISOString();
  if (typeof val === 'object') return JSON.stringify(val);
  return String(val);
}
