import assert from 'node:assert/strict';
import { test } from 'node:test';

import { coerceTable, dropEmptyColumns, toTable } from '../src/normalize/table.js';

test('dropEmptyColumns removes columns that are null in every row', () => {
  const table = dropEmptyColumns({
    columns: ['id', 'icon', 'note'],
    rows: [
      { id: 't1', icon: null, note: '' },
      { id: 't2', icon: null, note: null },
    ],
  });

  assert.deepEqual(table, {
    columns: ['id', 'note'],
    rows: [
      { id: 't1', note: '' },
      { id: 't2', note: null },
    ],
  });
});

test('coerceTable only touches configured columns that exist', () => {
  const table = coerceTable(
    { columns: ['amount.value', 'label'], rows: [{ 'amount.value': 1234.5, label: '1.5' }] },
    { dateColumns: ['timestamp'], amountColumns: ['amount.value', 'subAmount.value'] },
  );

  assert.deepEqual(table, { columns: ['amount.value', 'label'], rows: [{ 'amount.value': '1234,5', label: '1.5' }] });
});

test('toTable flattens, drops empty columns, then coerces', () => {
  const table = toTable([
    {
      id: 't1',
      timestamp: '2024-03-05T10:00:00.000+0000',
      amount: { value: 10, currency: 'EUR' },
      icon: null,
    },
    {
      id: 't2',
      timestamp: 'mañana',
      amount: { value: 20.5, currency: 'EUR' },
      icon: null,
    },
  ]);

  assert.deepEqual(table.columns, ['id', 'timestamp', 'amount.value', 'amount.currency']);
  assert.deepEqual(table.rows, [
    { id: 't1', timestamp: '05/03/2024', 'amount.value': '10', 'amount.currency': 'EUR' },
    { id: 't2', timestamp: null, 'amount.value': '20,5', 'amount.currency': 'EUR' },
  ]);
});
