import test from 'node:test';
import assert from 'node:assert/strict';
import { processTranscript } from './process';

const SAMPLE = [
  '[01/06/25, 09:00:00 AM] Alice: in',
  '[01/06/25, 05:00:00 PM] Alice: out',
  '[01/07/25, 09:15:00 AM] Alice: back',
  '[01/07/25, 05:00:00 PM] Alice: lunch',
].join('\n');

const line = (date: string, time: string, name: string, message: string) => `[${date}, ${time}] ${name}: ${message}`;

test('daily log and weekly summary for a short export', () => {
  const result = processTranscript(SAMPLE, { lastWeekPolicy: 'complete' });
  assert.equal(result.ok, true);
  if (!result.ok) return;
  assert.equal(result.eventCount, 4);
  assert.deepEqual(
    result.dailyLog.map((row) => [row.name, row.date, row.day, row.clockIn, row.clockOut, row.hours]),
    [
      ['Alice', '2025-01-06', 'Monday', '09:00 AM', '05:00 PM', 8],
      ['Alice', '2025-01-07', 'Tuesday', '09:15 AM', '05:00 PM', 7.75],
    ],
  );
  assert.deepEqual(result.weeklySummary, [{ name: 'Alice', week: 'Jan 06 - Jan 12 2025', totalHours: 15.75 }]);
  assert.deepEqual(result.lastWeek, { range: null, title: null, rows: [] });
});

test('nothing readable is a format issue', () => {
  assert.deepEqual(processTranscript('hello\nthis is not a chat export'), {
    ok: false,
    error: 'FORMAT_ISSUE',
    message: 'Format issue: could not extract any messages. Please upload an exported group chat .txt file.',
  });
  assert.equal(processTranscript('').ok, false);
});

test('messages without pairs are reported apart from format issues', () => {
  const text = [line('1/6/25', '9:00 AM', 'Alice', 'good morning'), line('1/6/25', '9:05 AM', 'Alice', 'in')].join('\n');
  assert.deepEqual(processTranscript(text), { ok: false, error: 'NO_PAIRS', message: 'No valid IN/OUT pairs found.' });
});

test('noise lines do not disturb pairing', () => {
  const text = [
    line('1/6/25', '9:00 AM', 'Alice', 'in'),
    'coffee first though',
    line('1/6/25', '10:00 AM', 'Alice', 'meeting moved'),
    line('2/30/25', '11:00 AM', 'Alice', 'out'),
    line('1/6/25', '12:00 PM', 'Alice', 'lunch'),
  ].join('\n');
  const result = processTranscript(text);
  assert.ok(result.ok);
  assert.deepEqual(
    result.dailyLog.map((row) => row.hours),
    [3],
  );
});

test('older weeks fall out of every table', () => {
  const mondays = ['1/6/25', '1/13/25', '1/20/25', '1/27/25', '2/3/25', '2/10/25'];
  const text = mondays
    .flatMap((date) => [line(date, '9:00 AM', 'Alice', 'in'), line(date, '1:00 PM', 'Alice', 'out')])
    .join('\n');
  const result = processTranscript(text, { lastWeekPolicy: 'complete' });
  assert.ok(result.ok);
  assert.deepEqual(
    result.dailyLog.map((row) => row.date),
    ['2025-01-20', '2025-01-27', '2025-02-03', '2025-02-10'],
  );
  assert.deepEqual(
    result.weeklySummary.map((row) => row.week),
    ['Feb 03 - Feb 09 2025', 'Feb 10 - Feb 16 2025', 'Jan 20 - Jan 26 2025', 'Jan 27 - Feb 02 2025'],
  );
});

test('complete week becomes the timesheet', () => {
  const days = ['1/6/25', '1/7/25', '1/8/25', '1/9/25', '1/10/25', '1/11/25', '1/12/25'];
  const text = [
    ...days.flatMap((date) => [line(date, '9:00 AM', 'Alice', 'in'), line(date, '5:00 PM', 'Alice', 'out')]),
    line('1/8/25', '10:00 AM', 'Bob', 'in'),
    line('1/8/25', '2:30 PM', 'Bob', 'out'),
  ].join('\n');
  const result = processTranscript(text, { lastWeekPolicy: 'complete' });
  assert.ok(result.ok);
  assert.equal(result.lastWeek.title, 'Jan 06 - Jan 12 2025 WORKDAY TIMESHEET');
  assert.deepEqual(
    result.lastWeek.rows.map((row) => [row.name, row.date, row.totalHoursThisWeek]),
    [
      ['Alice', '2025-01-06', 56],
      ['Alice', '2025-01-07', null],
      ['Alice', '2025-01-08', null],
      ['Alice', '2025-01-09', null],
      ['Alice', '2025-01-10', null],
      ['Alice', '2025-01-11', null],
      ['Alice', '2025-01-12', null],
      ['Bob', '2025-01-08', 4.5],
    ],
  );
});

test('calendar policy uses the given today', () => {
  const result = processTranscript(SAMPLE, { lastWeekPolicy: 'calendar', today: '2025-01-14' });
  assert.ok(result.ok);
  assert.equal(result.lastWeek.range?.monday, '2025-01-06');
  assert.deepEqual(
    result.lastWeek.rows.map((row) => row.totalHoursThisWeek),
    [15.75, null],
  );
});
