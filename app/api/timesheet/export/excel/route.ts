import { NextResponse } from 'next/server';
import { buildTimesheetWorkbook } from '@/src/lib/excel/timesheetWorkbook';
import { handleTimesheetRequest, timesheetLogger } from '../../_lib/handle';

export const runtime = 'nodejs';

export async function POST(request: Request) {
  const handled = await handleTimesheetRequest(request, 'POST /api/timesheet/export/excel');
  if (!handled.ok) {
    return handled.response;
  }

  try {
    const workbook = buildTimesheetWorkbook(handled.result);
    const buffer = await workbook.xlsx.writeBuffer();
    return new NextResponse(buffer, {
      status: 200,
      headers: {
        'Content-Type': 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
        'Content-Disposition': 'attachment; filename="timesheet.xlsx"',
        'Cache-Control': 'no-store',
      },
    });
  } catch (error) {
    timesheetLogger.error('excel export failed', error);
    return NextResponse.json({ ok: false, error: 'INTERNAL_ERROR' }, { status: 500 });
  }
}
