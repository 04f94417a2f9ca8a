import test from 'node:test';
import assert from 'node:assert/strict';
import { processTranscript, type TimesheetSuccess } from '@/lib/timesheet/process';
import { buildTimesheetWorkbook, SHEET_NAMES } from './timesheetWorkbook';

function sample(): TimesheetSuccess {
  const text = [
    '[01/06/25, 09:00:00 AM] Alice: in',
    '[01/06/25, 05:00:00 PM] Alice: out',
    '[01/07/25, 09:15:00 AM] Alice: back',
    '[01/07/25, 05:00:00 PM] Alice: lunch',
  ].join('\n');
  const result = processTranscript(text, { lastWeekPolicy: 'complete' });
  assert.ok(result.ok);
  return result;
}

test('one sheet per table', () => {
  const workbook = buildTimesheetWorkbook(sample());
  assert.deepEqual(
    workbook.worksheets.map((sheet) => sheet.name),
    ['Daily Work Log', 'Weekly Summary', 'Last Week'],
  );
});

test('daily sheet holds header and rows', () => {
  const sheet = buildTimesheetWorkbook(sample()).getWorksheet(SHEET_NAMES.daily);
  assert.ok(sheet);
  assert.equal(sheet.rowCount, 3);
  assert.equal(sheet.getRow(1).getCell(1).value, 'Name');
  assert.equal(sheet.getRow(2).getCell(2).value, 'Jan 06, 2025');
  assert.equal(sheet.getRow(3).getCell(7).value, 7.75);
  assert.equal(sheet.getColumn(1).width, 12);
  assert.equal(sheet.getColumn(4).width, 22);
});

test('last week sheet starts with its caption', () => {
  const sheet = buildTimesheetWorkbook(sample()).getWorksheet(SHEET_NAMES.lastWeek);
  assert.ok(sheet);
  assert.equal(sheet.getRow(1).getCell(1).value, 'No complete week yet');
  assert.equal(sheet.getRow(2).getCell(7).value, 'Total Hours This Week');
  assert.equal(sheet.rowCount, 2);
});

test('writes an xlsx buffer', async () => {
  const buffer = await buildTimesheetWorkbook(sample()).xlsx.writeBuffer();
  assert.ok(buffer.byteLength > 0);
});
