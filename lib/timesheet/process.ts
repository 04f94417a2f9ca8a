import { resolveTimesheetConfig, type TimesheetConfig } from '@/src/lib/timesheetConfig';
import { buildLastWeekReport, summarizeWeeks } from './aggregate';
import { todayInTimeZone } from './dates';
import { describeTimesheetError, type TimesheetErrorCode } from './errors';
import { filterAttendanceEvents } from './keywords';
import { pairEvents } from './pair';
import { parseTranscript } from './parseLine';
import { keepRecentWeeks } from './window';
import type { LastWeekReport, WeeklyTotal, WorkInterval } from './types';

export type TimesheetSuccess = {
  ok: true;
  /** Lines that parsed into events, before keyword filtering. */
  eventCount: number;
  dailyLog: WorkInterval[];
  weeklySummary: WeeklyTotal[];
  lastWeek: LastWeekReport;
};

export type TimesheetFailure = {
  ok: false;
  error: TimesheetErrorCode;
  message: string;
};

export type TimesheetResult = TimesheetSuccess | TimesheetFailure;

export type ProcessOptions = Partial<TimesheetConfig> & {
  /** YYYY-MM-DD; defaults to today in the configured time zone. */
  today?: string;
};

function failure(error: TimesheetErrorCode): TimesheetFailure {
  return { ok: false, error, message: describeTimesheetError(error) };
}

/**
 * Chat export text in, timesheet tables out.
 * Unreadable lines are skipped; only an export with no readable lines at all
 * (FORMAT_ISSUE) or with no IN/OUT pair (NO_PAIRS) is reported.
 */
export function processTranscript(text: string, options: ProcessOptions = {}): TimesheetResult {
  const { today, ...overrides } = options;
  const config = resolveTimesheetConfig(overrides);

  const events = parseTranscript(text);
  if (events.length === 0) {
    return failure('FORMAT_ISSUE');
  }

  const dailyLog = pairEvents(keepRecentWeeks(filterAttendanceEvents(events)));
  if (dailyLog.length === 0) {
    return failure('NO_PAIRS');
  }

  return {
    ok: true,
    eventCount: events.length,
    dailyLog,
    weeklySummary: summarizeWeeks(dailyLog),
    lastWeek: buildLastWeekReport(dailyLog, {
      policy: config.lastWeekPolicy,
      today: today ?? todayInTimeZone(config.timeZone),
    }),
  };
}
