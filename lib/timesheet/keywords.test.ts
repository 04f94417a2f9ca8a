import test from 'node:test';
import assert from 'node:assert/strict';
import { classifyMessage, filterAttendanceEvents, isClockIn, isClockOut } from './keywords';

test('matches whole words only', () => {
  assert.equal(isClockIn('irontown'), false);
  assert.equal(isClockIn('login'), false);
  assert.equal(isClockIn('returning soon'), false);
  assert.equal(isClockOut('outside'), false);
  assert.equal(isClockIn('checked in.'), true);
  assert.equal(isClockOut('sign-out'), true);
});

test('a message can be both', () => {
  assert.deepEqual(classifyMessage('lunch out back'), { clockIn: true, clockOut: true });
});

test('lunch only closes an interval', () => {
  assert.deepEqual(classifyMessage('lunch'), { clockIn: false, clockOut: true });
  assert.deepEqual(classifyMessage('return'), { clockIn: true, clockOut: false });
});

test('case does not matter', () => {
  assert.equal(isClockIn('BACK'), true);
  assert.equal(isClockOut('Out'), true);
});

test('neutral messages are filtered out', () => {
  const timestamp = new Date(Date.UTC(2025, 0, 6, 9));
  const events = [
    { name: 'Alice', timestamp, message: 'good morning' },
    { name: 'Alice', timestamp, message: 'in' },
    { name: 'Bob', timestamp, message: 'going to lunch' },
  ];
  assert.deepEqual(
    filterAttendanceEvents(events).map((event) => event.message),
    ['in', 'going to lunch'],
  );
});

test('accented letters are part of the word', () => {
  assert.equal(isClockIn('inégalité'), false);
  assert.equal(isClockIn('ñback'), false);
  assert.equal(isClockOut('déout'), false);
  assert.equal(isClockIn('café in'), true);
  assert.equal(isClockOut('out à midi'), true);
});
