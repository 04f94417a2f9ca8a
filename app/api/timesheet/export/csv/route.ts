import { NextResponse } from 'next/server';
import { tableToCsv } from '@/lib/csv';
import type { TimesheetSuccess } from '@/lib/timesheet/process';
import {
  dailyLogTable,
  lastWeekTable,
  timesheetFileName,
  weeklySummaryTable,
  type Table,
} from '@/lib/timesheet/tables';
import { handleTimesheetRequest } from '../../_lib/handle';

export const runtime = 'nodejs';

type TableKey = 'daily' | 'weekly' | 'last-week';

const TABLE_KEYS: readonly TableKey[] = ['daily', 'weekly', 'last-week'];

function isTableKey(value: string): value is TableKey {
  return TABLE_KEYS.some((key) => key === value);
}

function selectTable(result: TimesheetSuccess, key: TableKey): { table: Table; filename: string } {
  switch (key) {
    case 'daily':
      return { table: dailyLogTable(result.dailyLog), filename: 'Daily_Work_Log.csv' };
    case 'weekly':
      return { table: weeklySummaryTable(result.weeklySummary), filename: 'Weekly_Total_Hours_Summary.csv' };
    case 'last-week':
      return {
        table: lastWeekTable(result.lastWeek.rows),
        filename: result.lastWeek.title ? timesheetFileName(result.lastWeek.title, 'csv') : 'Last_Week_Timesheet.csv',
      };
  }
}

export async function POST(request: Request) {
  const tableParam = new URL(request.url).searchParams.get('table') ?? 'daily';
  if (!isTableKey(tableParam)) {
    return NextResponse.json(
      { ok: false, error: 'BAD_REQUEST', hint: 'table must be daily, weekly or last-week' },
      { status: 400 },
    );
  }

  const handled = await handleTimesheetRequest(request, 'POST /api/timesheet/export/csv');
  if (!handled.ok) {
    return handled.response;
  }

  const { table, filename } = selectTable(handled.result, tableParam);
  return new NextResponse(tableToCsv(table), {
    status: 200,
    headers: {
      'Content-Type': 'text/csv; charset=utf-8',
      'Content-Disposition': `attachment; filename="${filename}"`,
      'Cache-Control': 'no-store',
    },
  });
}
