import { NextResponse } from 'next/server';
import { handleTimesheetRequest } from './_lib/handle';

export const runtime = 'nodejs';

export async function POST(request: Request) {
  const handled = await handleTimesheetRequest(request, 'POST /api/timesheet');
  if (!handled.ok) {
    return handled.response;
  }
  return NextResponse.json(handled.result, { headers: { 'Cache-Control': 'no-store' } });
}
