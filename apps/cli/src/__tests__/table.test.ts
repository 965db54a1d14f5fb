import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { formatTable, formatValue } from '../util/table.js';

describe('formatTable', () => {
  it('pads columns to the widest cell', () => {
    const table = formatTable(
      ['id', 'name'],
      [
        { id: 1, name: 'Ada Park' },
        { id: 2, name: null },
      ],
    );
    assert.equal(table, ['id | name    ', '---+---------', '1  | Ada Park', '2  | NULL    '].join('\n'));
  });

  it('cuts cells wider than 60 characters', () => {
    const lines = formatTable(['note'], [{ note: 'x'.repeat(70) }]).split('\n');
    assert.equal(lines[0], 'note'.padEnd(60));
    assert.equal(lines[2], 'x'.repeat(59) + '…');
  });

  it('reports empty results', () => {
    assert.equal(formatTable([], []), '(no columns)');
    assert.equal(formatTable(['id'], []), '(0 rows)');
  });
});

describe('formatValue', () => {
  it('renders nulls, dates and objects', () => {
    assert.equal(formatValue(undefined), 'NULL');
    assert.equal(formatValue(new Date('2024-05-01T12:00:00Z')), '2024-05-01T12:00:00.000Z');
    assert.equal(formatValue({ a: 1 }), '{"a":1}');
    assert.equal(formatValue(19.99), '19.99');
  });
});
