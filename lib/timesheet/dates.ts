// Calendar helpers for chat timestamps.
// Timestamps carry no zone, so every Date here holds wall-clock values in its UTC fields.
// Callers get plain strings/numbers back; only the UTC getters are ever read.
import type { WeekRange } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

export type IsoWeek = { year: number; week: number };

const pad2 = (value: number) => value.toString().padStart(2, '0');

/** Midnight UTC of the given day; unlike Date.UTC, years 0-99 stay as written. */
export function utcDate(year: number, monthIndex: number, day: number): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  return date;
}

export function toDateKey(date: Date): string {
  return `${date.getUTCFullYear().toString().padStart(4, '0')}-${pad2(date.getUTCMonth() + 1)}-${pad2(
    date.getUTCDate(),
  )}`;
}

export function fromDateKey(key: string): Date {
  const [yearText, monthText, dayText] = key.split('-');
  const date = utcDate(Number(yearText), Number(monthText) - 1, Number(dayText));
  if (Number.isNaN(date.getTime())) {
    throw new Error(`Invalid date key: ${key}`);
  }
  return date;
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

function startOfDay(date: Date): Date {
  return utcDate(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

/** 0 = Monday ... 6 = Sunday */
export function weekdayIndex(date: Date): number {
  return (date.getUTCDay() + 6) % 7;
}

/** ISO-8601 week: the week belongs to the year that contains its Thursday. */
export function getIsoWeek(date: Date): IsoWeek {
  const thursday = addDays(startOfDay(date), 3 - weekdayIndex(date));
  const year = thursday.getUTCFullYear();
  const firstDay = utcDate(year, 0, 1).getTime();
  const week = Math.floor((thursday.getTime() - firstDay) / DAY_MS / 7) + 1;
  return { year, week };
}

/** Sortable key, e.g. "2025-W02". */
export function isoWeekKey(date: Date): string {
  const { year, week } = getIsoWeek(date);
  return `${year.toString().padStart(4, '0')}-W${pad2(week)}`;
}

export function startOfWeek(date: Date): Date {
  return addDays(startOfDay(date), -weekdayIndex(date));
}

function formatMonthDay(date: Date): string {
  return `${MONTHS[date.getUTCMonth()]} ${pad2(date.getUTCDate())}`;
}

/** Monday-Sunday span containing `date`, labelled like "Dec 29 - Jan 04 2026". */
export function getWeekRange(date: Date): WeekRange {
  const monday = startOfWeek(date);
  const sunday = addDays(monday, 6);
  return {
    monday: toDateKey(monday),
    sunday: toDateKey(sunday),
    label: `${formatMonthDay(monday)} - ${formatMonthDay(sunday)} ${sunday.getUTCFullYear()}`,
  };
}

export function formatDateLabel(date: Date): string {
  return `${formatMonthDay(date)}, ${date.getUTCFullYear()}`;
}

export function formatWeekday(date: Date): string {
  return WEEKDAYS[date.getUTCDay()] ?? '';
}

/** "09:05 AM" */
export function formatClockTime(date: Date): string {
  const hours = date.getUTCHours();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  return `${pad2(hour12)}:${pad2(date.getUTCMinutes())} ${hours < 12 ? 'AM' : 'PM'}`;
}

/**
 * Today's date in the given IANA zone as YYYY-MM-DD.
 * Falls back to UTC when the zone is unknown to Intl.
 */
export function todayInTimeZone(timeZone: string, now: Date = new Date()): string {
  const format = (zone: string) =>
    new Intl.DateTimeFormat('en-CA', {
      timeZone: zone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
    }).format(now);
  try {
    return format(timeZone);
  } catch (error) {
    if (error instanceof RangeError) {
      return format('UTC');
    }
    throw error;
  }
}
