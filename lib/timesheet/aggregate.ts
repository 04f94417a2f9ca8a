import { addDays, fromDateKey, getWeekRange, isoWeekKey, startOfWeek, weekdayIndex } from './dates';
import type {
  LastWeekPolicy,
  LastWeekReport,
  LastWeekRow,
  WeeklyTotal,
  WeekRange,
  WorkInterval,
} from './types';

const FULL_WEEK_DAYS = 7;

const compareText = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/** Sums already rounded daily hours; the result is re-rounded to shed float noise. */
export function sumHours(values: readonly number[]): number {
  const total = values.reduce((sum, value) => sum + value, 0);
  return Math.round(total * 100) / 100;
}

/** One row per (name, week label), ordered by name then label. */
export function summarizeWeeks(log: readonly WorkInterval[]): WeeklyTotal[] {
  const buckets = new Map<string, { name: string; week: string; hours: number[] }>();
  for (const row of log) {
    const key = JSON.stringify([row.name, row.week]);
    const bucket = buckets.get(key) ?? { name: row.name, week: row.week, hours: [] };
    bucket.hours.push(row.hours);
    buckets.set(key, bucket);
  }

  return Array.from(buckets.values())
    .map((bucket) => ({ name: bucket.name, week: bucket.week, totalHours: sumHours(bucket.hours) }))
    .sort((a, b) => compareText(a.name, b.name) || compareText(a.week, b.week));
}

/** Latest ISO week in which the log has rows on every weekday, Monday to Sunday. */
export function findLatestCompleteWeek(log: readonly WorkInterval[]): WeekRange | null {
  const coverage = new Map<string, { monday: Date; weekdays: Set<number> }>();
  for (const row of log) {
    const date = fromDateKey(row.date);
    const key = isoWeekKey(date);
    const entry = coverage.get(key) ?? { monday: startOfWeek(date), weekdays: new Set<number>() };
    entry.weekdays.add(weekdayIndex(date));
    coverage.set(key, entry);
  }

  const complete = Array.from(coverage.entries())
    .filter(([, entry]) => entry.weekdays.size === FULL_WEEK_DAYS)
    .sort(([a], [b]) => b.localeCompare(a));
  const latest = complete[0];
  return latest ? getWeekRange(latest[1].monday) : null;
}

/** The Monday-Sunday week before the one containing `today` (YYYY-MM-DD). */
export function previousCalendarWeek(today: string): WeekRange {
  return getWeekRange(addDays(startOfWeek(fromDateKey(today)), -7));
}

/**
 * Keeps log order and writes each person's weekly total on their first row only;
 * the rest carry null, the way a printed timesheet shows a running total once.
 */
export function attachWeeklyTotals(rows: readonly WorkInterval[]): LastWeekRow[] {
  const totals = new Map<string, number[]>();
  for (const row of rows) {
    const hours = totals.get(row.name) ?? [];
    hours.push(row.hours);
    totals.set(row.name, hours);
  }

  const seen = new Set<string>();
  return rows.map((row) => {
    if (seen.has(row.name)) {
      return { ...row, totalHoursThisWeek: null };
    }
    seen.add(row.name);
    return { ...row, totalHoursThisWeek: sumHours(totals.get(row.name) ?? []) };
  });
}

export function timesheetTitle(range: WeekRange): string {
  return `${range.label} WORKDAY TIMESHEET`;
}

export type LastWeekOptions = {
  policy: LastWeekPolicy;
  /** YYYY-MM-DD, only read by the calendar policy. */
  today: string;
};

export function buildLastWeekReport(log: readonly WorkInterval[], options: LastWeekOptions): LastWeekReport {
  const range = options.policy === 'calendar' ? previousCalendarWeek(options.today) : findLatestCompleteWeek(log);
  if (!range) {
    return { range: null, title: null, rows: [] };
  }
  const inRange = log.filter((row) => row.date >= range.monday && row.date <= range.sunday);
  return { range, title: timesheetTitle(range), rows: attachWeeklyTotals(inRange) };
}
