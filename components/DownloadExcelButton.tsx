'use client';

import { useState } from 'react';
import type { LastWeekPolicy } from '@/lib/timesheet/types';
import { saveBlob } from './saveBlob';

type DownloadExcelButtonProps = {
  text: string;
  policy: LastWeekPolicy;
  disabled?: boolean;
};

export function DownloadExcelButton({ text, policy, disabled }: DownloadExcelButtonProps) {
  const [isDownloading, setIsDownloading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const handleDownload = async () => {
    setIsDownloading(true);
    setError(null);
    try {
      const response = await fetch('/api/timesheet/export/excel', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text, policy }),
        cache: 'no-store',
      });
      if (!response.ok) {
        const data = await response.json().catch(() => ({}));
        throw new Error(typeof data.message === 'string' ? data.message : 'Excel export failed');
      }
      saveBlob(await response.blob(), 'timesheet.xlsx');
    } catch (error) {
      setError(error instanceof Error ? error.message : 'Excel export failed');
    } finally {
      setIsDownloading(false);
    }
  };

  return (
    <div className="flex flex-col items-end gap-2">
      <button
        type="button"
        className="inline-flex items-center justify-center rounded-md border border-indigo-500 bg-indigo-500 px-4 py-2 text-sm font-medium text-white transition hover:bg-indigo-600 disabled:cursor-not-allowed disabled:opacity-60"
        onClick={handleDownload}
        disabled={disabled || isDownloading}
      >
        {isDownloading ? 'Preparing...' : 'Download Excel workbook'}
      </button>
      {error ? (
        <p role="status" aria-live="polite" className="text-xs text-red-600">
          {error}
        </p>
      ) : null}
    </div>
  );
}
