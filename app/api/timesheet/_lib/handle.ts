import { NextResponse } from 'next/server';
import { createLogger } from '@/lib/logger';
import { processTranscript, type TimesheetSuccess } from '@/lib/timesheet/process';
import { getTimesheetConfig } from '@/src/lib/timesheetConfig';
import { readTimesheetRequest } from './validator';

export const timesheetLogger = createLogger('timesheet');

export type HandledTimesheet = { ok: true; result: TimesheetSuccess } | { ok: false; response: NextResponse };

/**
 * Validates the request and runs the transcript through the pipeline.
 * Bad input ends in 400, the two batch conditions in 422, anything else in 500.
 */
export async function handleTimesheetRequest(request: Request, route: string): Promise<HandledTimesheet> {
  const config = getTimesheetConfig();
  const parsed = await readTimesheetRequest(request, config.maxUploadBytes);
  if (!parsed.success) {
    return {
      ok: false,
      response: NextResponse.json({ ok: false, error: 'BAD_REQUEST', hint: parsed.hint }, { status: 400 }),
    };
  }

  try {
    const result = processTranscript(parsed.data.text, {
      ...config,
      lastWeekPolicy: parsed.data.policy ?? config.lastWeekPolicy,
      today: parsed.data.today,
    });
    if (!result.ok) {
      timesheetLogger.warn(`${route} rejected transcript`, { error: result.error });
      return { ok: false, response: NextResponse.json(result, { status: 422 }) };
    }
    timesheetLogger.info(`${route} processed transcript`, {
      events: result.eventCount,
      intervals: result.dailyLog.length,
      weeks: result.weeklySummary.length,
      lastWeek: result.lastWeek.range?.label ?? null,
    });
    return { ok: true, result };
  } catch (error) {
    timesheetLogger.error(`${route} failed`, error);
    return {
      ok: false,
      response: NextResponse.json({ ok: false, error: 'INTERNAL_ERROR' }, { status: 500 }),
    };
  }
}
