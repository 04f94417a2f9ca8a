import test from 'node:test';
import assert from 'node:assert/strict';
import { tableToCsv, toCsv } from './csv';

test('quotes only what needs quoting', () => {
  const csv = toCsv({
    headers: ['Name', 'Note'],
    rows: [
      ['Alice', 'Jan 06, 2025'],
      ['Bob "B"', 'line\nbreak'],
      ['Carol', null],
      [undefined, 8.5],
    ],
  });
  assert.equal(csv, 'Name,Note\r\nAlice,"Jan 06, 2025"\r\n"Bob ""B""","line\nbreak"\r\nCarol,\r\n,8.5');
});

test('tables carry a BOM by default', () => {
  const csv = tableToCsv({ headers: ['Total Hours'], rows: [[15.75]] });
  assert.equal(csv, '\uFEFFTotal Hours\r\n15.75');
  assert.equal(tableToCsv({ headers: ['A'], rows: [] }, false), 'A');
});
