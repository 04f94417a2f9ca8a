import { formatDateLabel, fromDateKey } from './dates';
import type { LastWeekRow, WeeklyTotal, WorkInterval } from './types';

export type TableCell = string | number | null;

export type Table = {
  headers: string[];
  rows: TableCell[][];
};

export const DAILY_LOG_HEADERS = ['Name', 'Date', 'Day', 'Week', 'Clock In', 'Clock Out', 'Hours Worked'];
export const WEEKLY_SUMMARY_HEADERS = ['Name', 'Week', 'Total Hours'];
export const LAST_WEEK_HEADERS = [
  'Name',
  'Date',
  'Day',
  'Clock In',
  'Clock Out',
  'Hours Worked',
  'Total Hours This Week',
];

/** "2025-01-06" -> "Jan 06, 2025" */
export function displayDate(key: string): string {
  return formatDateLabel(fromDateKey(key));
}

export function dailyLogTable(rows: readonly WorkInterval[]): Table {
  return {
    headers: DAILY_LOG_HEADERS,
    rows: rows.map((row) => [
      row.name,
      displayDate(row.date),
      row.day,
      row.week,
      row.clockIn,
      row.clockOut,
      row.hours,
    ]),
  };
}

export function weeklySummaryTable(rows: readonly WeeklyTotal[]): Table {
  return {
    headers: WEEKLY_SUMMARY_HEADERS,
    rows: rows.map((row) => [row.name, row.week, row.totalHours]),
  };
}

export function lastWeekTable(rows: readonly LastWeekRow[]): Table {
  return {
    headers: LAST_WEEK_HEADERS,
    rows: rows.map((row) => [
      row.name,
      displayDate(row.date),
      row.day,
      row.clockIn,
      row.clockOut,
      row.hours,
      row.totalHoursThisWeek ?? '',
    ]),
  };
}

/** "Jan 06 - Jan 12 2025 WORKDAY TIMESHEET" -> "Jan_06_-_Jan_12_2025_WORKDAY_TIMESHEET.csv" */
export function timesheetFileName(title: string, extension: string): string {
  return `${title.replace(/ /g, '_')}.${extension}`;
}
