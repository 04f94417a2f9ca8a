'use client';

import { tableToCsv } from '@/lib/csv';
import type { Table } from '@/lib/timesheet/tables';
import { saveBlob } from './saveBlob';

type DownloadCsvButtonProps = {
  table: Table;
  filename: string;
  label?: string;
};

export function DownloadCsvButton({ table, filename, label = 'Download CSV' }: DownloadCsvButtonProps) {
  const handleDownload = () => {
    const csv = tableToCsv(table, true);
    saveBlob(new Blob([csv], { type: 'text/csv;charset=utf-8;' }), filename);
  };

  return (
    <button
      type="button"
      className="inline-flex items-center justify-center rounded-md border border-gray-300 bg-white px-4 py-2 text-sm font-medium text-gray-900 shadow-sm transition hover:bg-gray-50 disabled:cursor-not-allowed disabled:opacity-60"
      onClick={handleDownload}
      disabled={table.rows.length === 0}
      aria-label={`${label}: ${filename}`}
    >
      {label}
    </button>
  );
}
