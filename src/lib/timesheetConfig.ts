// Timesheet settings read from the environment.
//  TIMESHEET_LAST_WEEK_POLICY=complete | calendar
//    complete: latest ISO week whose rows cover Monday through Sunday
//    calendar: the week before the one containing today
//  TIMESHEET_TIME_ZONE=UTC        zone used to decide "today" (calendar policy)
//  TIMESHEET_MAX_UPLOAD_BYTES=5242880
import type { LastWeekPolicy } from '@/lib/timesheet/types';

export type TimesheetConfig = {
  lastWeekPolicy: LastWeekPolicy;
  timeZone: string;
  maxUploadBytes: number;
};

export const DEFAULT_MAX_UPLOAD_BYTES = 5 * 1024 * 1024;

const asInt = (v: string | undefined, d: number) => {
  if (v === undefined || v.trim() === '') return d;
  const n = Number(v);
  return Number.isFinite(n) ? Math.trunc(n) : d;
};

export const asPolicy = (v: string | undefined, d: LastWeekPolicy): LastWeekPolicy => {
  const normalized = v?.trim().toLowerCase();
  if (normalized === 'complete' || normalized === 'calendar') return normalized;
  return d;
};

const asTimeZone = (v: string | undefined, d: string): string => {
  const zone = v?.trim();
  if (!zone) return d;
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return zone;
  } catch {
    return d;
  }
};

export function getTimesheetConfig(): TimesheetConfig {
  return {
    lastWeekPolicy: asPolicy(process.env.TIMESHEET_LAST_WEEK_POLICY, 'complete'),
    timeZone: asTimeZone(process.env.TIMESHEET_TIME_ZONE, 'UTC'),
    maxUploadBytes: Math.max(1, asInt(process.env.TIMESHEET_MAX_UPLOAD_BYTES, DEFAULT_MAX_UPLOAD_BYTES)),
  };
}

// Explicit per-call values win; undefined ones fall back to the environment.
export function resolveTimesheetConfig(cfg?: Partial<TimesheetConfig>): TimesheetConfig {
  const base = getTimesheetConfig();
  return {
    lastWeekPolicy: cfg?.lastWeekPolicy ?? base.lastWeekPolicy,
    timeZone: cfg?.timeZone ?? base.timeZone,
    maxUploadBytes: cfg?.maxUploadBytes ?? base.maxUploadBytes,
  };
}
