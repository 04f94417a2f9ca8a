import { tableToCsv } from '@/lib/csv';
import { asPolicy } from '@/src/lib/timesheetConfig';
import type { TimesheetResult } from './process';
import { dailyLogTable, lastWeekTable, weeklySummaryTable } from './tables';
import type { LastWeekPolicy } from './types';

export type CliTable = 'daily' | 'weekly' | 'last-week';

export type CliOptions = {
  file: string;
  table?: CliTable;
  policy?: LastWeekPolicy;
  today?: string;
};

export const CLI_USAGE =
  'usage: timesheet <chat.txt> [--table daily|weekly|last-week] [--policy complete|calendar] [--today YYYY-MM-DD]';

const asTable = (value: string): CliTable | null =>
  value === 'daily' || value === 'weekly' || value === 'last-week' ? value : null;

export function parseCliArgs(argv: readonly string[]): { ok: true; options: CliOptions } | { ok: false; hint: string } {
  let file: string | undefined;
  let table: CliTable | undefined;
  let policy: LastWeekPolicy | undefined;
  let today: string | undefined;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === '--table' || arg === '--policy' || arg === '--today') {
      const value = argv[index + 1];
      if (value === undefined) {
        return { ok: false, hint: `${arg} needs a value` };
      }
      index += 1;
      if (arg === '--table') {
        const parsed = asTable(value);
        if (!parsed) return { ok: false, hint: `unknown table: ${value}` };
        table = parsed;
      } else if (arg === '--policy') {
        if (asPolicy(value, 'complete') !== value) return { ok: false, hint: `unknown policy: ${value}` };
        policy = asPolicy(value, 'complete');
      } else {
        if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return { ok: false, hint: `bad date: ${value}` };
        today = value;
      }
      continue;
    }
    if (arg.startsWith('--')) {
      return { ok: false, hint: `unknown option: ${arg}` };
    }
    if (file) {
      return { ok: false, hint: 'only one input file is accepted' };
    }
    file = arg;
  }

  if (!file) {
    return { ok: false, hint: 'missing input file' };
  }
  return { ok: true, options: { file, table, policy, today } };
}

/** Text for stdout: one table as CSV, or a short summary when no table is asked for. */
export function renderCliOutput(result: TimesheetResult, table?: CliTable): string {
  if (!result.ok) {
    return `[${result.error}] ${result.message}`;
  }
  switch (table) {
    case 'daily':
      return tableToCsv(dailyLogTable(result.dailyLog), false);
    case 'weekly':
      return tableToCsv(weeklySummaryTable(result.weeklySummary), false);
    case 'last-week':
      return tableToCsv(lastWeekTable(result.lastWeek.rows), false);
    default: {
      const lines = [
        `messages: ${result.eventCount}`,
        `intervals: ${result.dailyLog.length}`,
        ...result.weeklySummary.map((row) => `${row.name} | ${row.week} | ${row.totalHours.toFixed(2)}h`),
        result.lastWeek.title ? `last week: ${result.lastWeek.title}` : 'last week: none',
      ];
      return lines.join('\n');
    }
  }
}
