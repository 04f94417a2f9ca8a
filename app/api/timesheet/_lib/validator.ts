import { Buffer } from 'node:buffer';
import { asPolicy } from '@/src/lib/timesheetConfig';
import type { LastWeekPolicy } from '@/lib/timesheet/types';

export type TimesheetRequest = {
  text: string;
  policy?: LastWeekPolicy;
  today?: string;
};

export type ValidationResult = { success: true; data: TimesheetRequest } | { success: false; hint: string };

const DATE_KEY = /^\d{4}-\d{2}-\d{2}$/;

function isDateKey(value: string): boolean {
  if (!DATE_KEY.test(value)) {
    return false;
  }
  const date = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(date.getTime()) && date.toISOString().startsWith(value);
}

const tooLarge = (maxBytes: number): ValidationResult => ({
  success: false,
  hint: `text must not exceed ${maxBytes} bytes`,
});

export function validateTimesheetRequest(data: unknown, maxBytes: number): ValidationResult {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    return { success: false, hint: 'text is required' };
  }
  const fields = new Map<string, unknown>(Object.entries(data));
  const text = fields.get('text');
  const policy = fields.get('policy');
  const today = fields.get('today');

  if (typeof text !== 'string' || text.trim().length === 0) {
    return { success: false, hint: 'text is required' };
  }
  if (Buffer.byteLength(text, 'utf8') > maxBytes) {
    return tooLarge(maxBytes);
  }
  if (policy !== undefined && (typeof policy !== 'string' || asPolicy(policy, 'complete') !== policy)) {
    return { success: false, hint: 'policy must be "complete" or "calendar"' };
  }
  if (today !== undefined && (typeof today !== 'string' || !isDateKey(today))) {
    return { success: false, hint: 'today must be YYYY-MM-DD' };
  }
  return {
    success: true,
    data: {
      text,
      policy: typeof policy === 'string' ? asPolicy(policy, 'complete') : undefined,
      today: typeof today === 'string' ? today : undefined,
    },
  };
}

/** Body as UTF-8 text, or null once more than `maxBytes` have arrived. */
async function readBodyText(request: Request, maxBytes: number): Promise<string | null> {
  if (!request.body) {
    return '';
  }
  const reader = request.body.getReader();
  const chunks: Uint8Array[] = [];
  let size = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) {
      break;
    }
    size += value.byteLength;
    if (size > maxBytes) {
      await reader.cancel();
      return null;
    }
    chunks.push(value);
  }
  return Buffer.concat(chunks).toString('utf8');
}

/**
 * Accepts a JSON body ({ text, policy?, today? }) or the raw transcript as text/plain.
 * The byte limit covers the whole body; a declared Content-Length over it is refused unread.
 */
export async function readTimesheetRequest(request: Request, maxBytes: number): Promise<ValidationResult> {
  const declaredLength = Number(request.headers.get('content-length') ?? Number.NaN);
  if (Number.isFinite(declaredLength) && declaredLength > maxBytes) {
    return tooLarge(maxBytes);
  }
  const body = await readBodyText(request, maxBytes);
  if (body === null) {
    return tooLarge(maxBytes);
  }

  const contentType = request.headers.get('content-type') ?? '';
  if (contentType.includes('application/json')) {
    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch {
      return { success: false, hint: 'invalid JSON payload' };
    }
    return validateTimesheetRequest(payload, maxBytes);
  }
  return validateTimesheetRequest({ text: body }, maxBytes);
}
