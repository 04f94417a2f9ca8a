import test from 'node:test';
import assert from 'node:assert/strict';
import { readTimesheetRequest, validateTimesheetRequest } from './validator';

test('accepts text with optional policy and today', () => {
  assert.deepEqual(validateTimesheetRequest({ text: 'x', policy: 'calendar', today: '2025-01-14' }, 100), {
    success: true,
    data: { text: 'x', policy: 'calendar', today: '2025-01-14' },
  });
});

test('rejects missing, blank and oversized text', () => {
  assert.deepEqual(validateTimesheetRequest({}, 100), { success: false, hint: 'text is required' });
  assert.deepEqual(validateTimesheetRequest({ text: '   ' }, 100), { success: false, hint: 'text is required' });
  assert.deepEqual(validateTimesheetRequest(['text'], 100), { success: false, hint: 'text is required' });
  assert.deepEqual(validateTimesheetRequest({ text: 'abcd' }, 3), {
    success: false,
    hint: 'text must not exceed 3 bytes',
  });
});

test('rejects unknown policy and impossible dates', () => {
  assert.equal(validateTimesheetRequest({ text: 'x', policy: 'weekly' }, 100).success, false);
  assert.equal(validateTimesheetRequest({ text: 'x', today: '2025-02-30' }, 100).success, false);
  assert.equal(validateTimesheetRequest({ text: 'x', today: 20250214 }, 100).success, false);
});

test('plain text bodies are the transcript', async () => {
  const request = new Request('http://localhost/api/timesheet', {
    method: 'POST',
    headers: { 'content-type': 'text/plain; charset=utf-8' },
    body: '[1/6/25, 9:00 AM] Alice: in',
  });
  assert.deepEqual(await readTimesheetRequest(request, 1000), {
    success: true,
    data: { text: '[1/6/25, 9:00 AM] Alice: in', policy: undefined, today: undefined },
  });
});

test('broken JSON is a bad request', async () => {
  const request = new Request('http://localhost/api/timesheet', {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: '{"text":',
  });
  assert.deepEqual(await readTimesheetRequest(request, 1000), { success: false, hint: 'invalid JSON payload' });
});

test('a declared length over the limit is refused without reading the body', async () => {
  const request = new Request('http://localhost/api/timesheet', {
    method: 'POST',
    headers: { 'content-type': 'text/plain', 'content-length': '2048' },
    body: 'in',
  });
  assert.deepEqual(await readTimesheetRequest(request, 1024), {
    success: false,
    hint: 'text must not exceed 1024 bytes',
  });
  assert.equal(request.bodyUsed, false);
});

test('an undeclared body stops being read past the limit', async () => {
  const request = new Request('http://localhost/api/timesheet', {
    method: 'POST',
    headers: { 'content-type': 'text/plain' },
    body: '[1/6/25, 9:00 AM] Alice: in',
  });
  assert.deepEqual(await readTimesheetRequest(request, 20), {
    success: false,
    hint: 'text must not exceed 20 bytes',
  });
});
