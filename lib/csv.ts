import type { Table, TableCell } from '@/lib/timesheet/tables';

export type CsvInput = {
  headers: string[];
  rows: (TableCell | undefined)[][];
  includeBom?: boolean;
};

export function toCsv({ headers, rows, includeBom = false }: CsvInput): string {
  const lines = [headers, ...rows].map((row) => row.map(escapeValue).join(','));
  const content = lines.join('\r\n');
  return includeBom ? `\uFEFF${content}` : content;
}

export function tableToCsv(table: Table, includeBom = true): string {
  return toCsv({ headers: table.headers, rows: table.rows, includeBom });
}

function escapeValue(value: TableCell | undefined): string {
  if (value === null || typeof value === 'undefined') {
    return '';
  }
  const stringValue = String(value);
  if (stringValue === '') {
    return '';
  }
  if (/[",\n\r]/.test(stringValue)) {
    return `"${stringValue.replace(/"/g, '""')}"`;
  }
  return stringValue;
}
