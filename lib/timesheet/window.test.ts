import test from 'node:test';
import assert from 'node:assert/strict';
import { toDateKey } from './dates';
import type { ChatEvent } from './types';
import { keepRecentWeeks, listWeeksDescending, RECENT_WEEK_LIMIT } from './window';

const event = (date: string, message = 'in'): ChatEvent => ({
  name: 'Alice',
  timestamp: new Date(`${date}T09:00:00.000Z`),
  message,
});

test('keeps only the four latest ISO weeks', () => {
  const mondays = ['2025-01-27', '2025-01-06', '2025-02-10', '2025-01-13', '2025-02-03', '2025-01-20'];
  const kept = keepRecentWeeks(mondays.map((date) => event(date)));
  assert.equal(RECENT_WEEK_LIMIT, 4);
  assert.deepEqual(
    kept.map((item) => toDateKey(item.timestamp)),
    ['2025-01-27', '2025-02-10', '2025-02-03', '2025-01-20'],
  );
});

test('every event of a kept week survives', () => {
  const events = [event('2025-01-06'), event('2025-01-12', 'out'), event('2024-12-02')];
  assert.equal(keepRecentWeeks(events).length, 3);
});

test('weeks sort across the year boundary', () => {
  assert.deepEqual(listWeeksDescending([event('2024-12-23'), event('2024-12-30'), event('2024-12-24')]), [
    '2025-W01',
    '2024-W52',
  ]);
});
