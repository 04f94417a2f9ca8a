import type { ChatEvent } from './types';

// "[1/6/25, 9:00:00 AM] Alice: in"
// Exports differ in what sits between the time and AM/PM: a space, U+202F or U+00A0.
const LINE_PATTERN =
  /^\[(\d{1,2}\/\d{1,2}\/\d{2,4}), (\d{1,2}:\d{2}(?::\d{2})?[\u0020\u202f\u00a0]?[APMapm]{2})\] (.*?): (.*)$/;

const MARKER_SEPARATOR = /[\u0020\u202f\u00a0]?([APMapm]{2})$/;

// Tried in order; the first one that yields a real calendar date-time wins.
const TIMESTAMP_FORMATS: readonly RegExp[] = [
  // M/D/YY h:mm:ss AM
  /^(\d{1,2})\/(\d{1,2})\/(\d{2}) (\d{1,2}):(\d{2}):(\d{2}) ([AaPp][Mm])$/,
  // M/D/YYYY h:mm:ss AM
  /^(\d{1,2})\/(\d{1,2})\/(\d{4}) (\d{1,2}):(\d{2}):(\d{2}) ([AaPp][Mm])$/,
  // M/D/YY h:mm AM
  /^(\d{1,2})\/(\d{1,2})\/(\d{2}) (\d{1,2}):(\d{2})() ([AaPp][Mm])$/,
  // M/D/YYYY h:mm AM
  /^(\d{1,2})\/(\d{1,2})\/(\d{4}) (\d{1,2}):(\d{2})() ([AaPp][Mm])$/,
];

function expandYear(yearText: string): number {
  const year = Number.parseInt(yearText, 10);
  if (yearText.length > 2) {
    return year;
  }
  return year < 69 ? 2000 + year : 1900 + year;
}

function buildTimestamp(match: RegExpExecArray): Date | null {
  const [, monthText, dayText, yearText, hourText, minuteText, secondText, marker] = match;
  const month = Number.parseInt(monthText, 10);
  const day = Number.parseInt(dayText, 10);
  const year = expandYear(yearText);
  const hour12 = Number.parseInt(hourText, 10);
  const minute = Number.parseInt(minuteText, 10);
  const second = secondText ? Number.parseInt(secondText, 10) : 0;

  if (month < 1 || month > 12 || day < 1) return null;
  if (hour12 < 1 || hour12 > 12 || minute > 59 || second > 59) return null;

  const hour = (hour12 % 12) + (marker.toUpperCase() === 'PM' ? 12 : 0);
  const timestamp = new Date(0);
  timestamp.setUTCFullYear(year, month - 1, day);
  timestamp.setUTCHours(hour, minute, second, 0);
  // 2/30 rolls over into March; reject instead.
  if (timestamp.getUTCMonth() !== month - 1 || timestamp.getUTCDate() !== day) {
    return null;
  }
  return timestamp;
}

/** Parses "M/D/YY h:mm[:ss] AM" style text; null when no format fits. */
export function parseTimestamp(value: string): Date | null {
  for (const pattern of TIMESTAMP_FORMATS) {
    const match = pattern.exec(value);
    if (!match) {
      continue;
    }
    const timestamp = buildTimestamp(match);
    if (timestamp) {
      return timestamp;
    }
  }
  return null;
}

/**
 * Turns one line of a chat export into an event.
 * Lines of any other shape (continuations, system notices) and lines whose
 * timestamp cannot be read give null.
 */
export function parseLine(line: string): ChatEvent | null {
  const match = LINE_PATTERN.exec(line);
  if (!match) {
    return null;
  }
  const [, dateText, timeText, name, message] = match;
  const timestamp = parseTimestamp(`${dateText} ${timeText.replace(MARKER_SEPARATOR, ' $1')}`);
  if (!timestamp) {
    return null;
  }
  return {
    name: name.trim(),
    timestamp,
    message: message.trim().toLowerCase(),
  };
}

// Same breaks as a universal-newline reader, U+2028/U+2029 included.
const LINE_BREAK = /\r\n|[\n\r\v\f\x1c\x1d\x1e\x85\u2028\u2029]/;

export function splitLines(text: string): string[] {
  return text.split(LINE_BREAK);
}

export function parseTranscript(text: string): ChatEvent[] {
  const events: ChatEvent[] = [];
  for (const line of splitLines(text)) {
    const event = parseLine(line);
    if (event) {
      events.push(event);
    }
  }
  return events;
}
