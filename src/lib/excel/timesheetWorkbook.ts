import ExcelJS, { type Workbook } from 'exceljs';
import type { TimesheetSuccess } from '@/lib/timesheet/process';
import { dailyLogTable, lastWeekTable, weeklySummaryTable, type Table } from '@/lib/timesheet/tables';

export const SHEET_NAMES = {
  daily: 'Daily Work Log',
  weekly: 'Weekly Summary',
  lastWeek: 'Last Week',
} as const;

const MIN_COLUMN_WIDTH = 10;
const MAX_COLUMN_WIDTH = 60;

function addTableSheet(workbook: Workbook, name: string, table: Table, caption?: string) {
  const sheet = workbook.addWorksheet(name, {
    views: [{ state: 'frozen', ySplit: caption ? 2 : 1 }],
  });
  if (caption) {
    sheet.addRow([caption]);
  }
  sheet.addRow(table.headers);
  for (const row of table.rows) {
    sheet.addRow(row.map((cell) => cell ?? ''));
  }

  table.headers.forEach((header, index) => {
    let maxLength = Math.max(MIN_COLUMN_WIDTH, header.length);
    for (const row of table.rows) {
      const value = row[index];
      const length = value === null || value === undefined ? 0 : String(value).length;
      if (length > maxLength) {
        maxLength = Math.min(length, MAX_COLUMN_WIDTH);
      }
    }
    sheet.getColumn(index + 1).width = maxLength + 2;
  });
  return sheet;
}

/** Daily log, weekly summary and last-week timesheet as one workbook. */
export function buildTimesheetWorkbook(result: TimesheetSuccess): Workbook {
  const workbook = new ExcelJS.Workbook();
  addTableSheet(workbook, SHEET_NAMES.daily, dailyLogTable(result.dailyLog));
  addTableSheet(workbook, SHEET_NAMES.weekly, weeklySummaryTable(result.weeklySummary));
  addTableSheet(
    workbook,
    SHEET_NAMES.lastWeek,
    lastWeekTable(result.lastWeek.rows),
    result.lastWeek.title ?? 'No complete week yet',
  );
  return workbook;
}
