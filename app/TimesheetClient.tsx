'use client';

import { useRef, useState, type ChangeEvent } from 'react';
import { DownloadCsvButton } from '@/components/DownloadCsvButton';
import { DownloadExcelButton } from '@/components/DownloadExcelButton';
import PrintButton from '@/components/PrintButton';
import { createRequestTracker } from '@/components/latestRequest';
import { TimesheetTable } from '@/components/TimesheetTable';
import type { TimesheetSuccess } from '@/lib/timesheet/process';
import {
  dailyLogTable,
  lastWeekTable,
  timesheetFileName,
  weeklySummaryTable,
} from '@/lib/timesheet/tables';
import type { LastWeekPolicy } from '@/lib/timesheet/types';

type Status =
  | { kind: 'idle' }
  | { kind: 'loading' }
  | { kind: 'error'; message: string }
  | { kind: 'warning'; message: string }
  | { kind: 'success'; result: TimesheetSuccess };

type ApiResponse =
  | TimesheetSuccess
  | { ok: false; error: string; message?: string; hint?: string };

type Props = {
  defaultPolicy: LastWeekPolicy;
};

export default function TimesheetClient({ defaultPolicy }: Props) {
  const [text, setText] = useState('');
  const [policy, setPolicy] = useState<LastWeekPolicy>(defaultPolicy);
  const [status, setStatus] = useState<Status>({ kind: 'idle' });
  const requests = useRef(createRequestTracker());

  const submit = async (transcript: string, selectedPolicy: LastWeekPolicy) => {
    const ticket = requests.current.begin();
    // Answers to superseded requests are dropped.
    const update = (next: Status) => {
      if (requests.current.isLatest(ticket)) {
        setStatus(next);
      }
    };
    setStatus({ kind: 'loading' });
    try {
      const response = await fetch('/api/timesheet', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text: transcript, policy: selectedPolicy }),
        cache: 'no-store',
      });
      const data: ApiResponse = await response.json();
      if (data.ok) {
        update({ kind: 'success', result: data });
        return;
      }
      if (data.error === 'NO_PAIRS') {
        update({ kind: 'warning', message: data.message ?? 'No valid IN/OUT pairs found.' });
        return;
      }
      update({ kind: 'error', message: data.message ?? data.hint ?? 'Could not process the file.' });
    } catch (error) {
      update({
        kind: 'error',
        message: error instanceof Error ? error.message : 'Could not process the file.',
      });
    }
  };

  const handleFile = async (event: ChangeEvent<HTMLInputElement>) => {
    const file = event.target.files?.[0];
    if (!file) {
      return;
    }
    let transcript: string;
    try {
      transcript = await file.text();
    } catch (error) {
      setStatus({ kind: 'error', message: error instanceof Error ? error.message : 'Could not read the file.' });
      return;
    }
    setText(transcript);
    await submit(transcript, policy);
  };

  const handlePolicy = async (event: ChangeEvent<HTMLSelectElement>) => {
    const next: LastWeekPolicy = event.target.value === 'calendar' ? 'calendar' : 'complete';
    setPolicy(next);
    if (text) {
      await submit(text, next);
    }
  };

  return (
    <section className="space-y-6">
      <div className="grid gap-4 sm:grid-cols-2">
        <div className="flex flex-col">
          <label htmlFor="transcript" className="text-sm font-medium text-gray-700">
            Chat export (.txt)
          </label>
          <input
            id="transcript"
            type="file"
            accept=".txt,text/plain"
            onChange={handleFile}
            className="mt-1 rounded border border-gray-300 bg-white px-3 py-2 text-sm text-gray-900"
          />
        </div>
        <div className="flex flex-col">
          <label htmlFor="policy" className="text-sm font-medium text-gray-700">
            Last week
          </label>
          <select
            id="policy"
            value={policy}
            onChange={handlePolicy}
            className="mt-1 rounded border border-gray-300 bg-white px-3 py-2 text-sm text-gray-900 focus:border-indigo-500 focus:outline-none focus:ring-1 focus:ring-indigo-500"
          >
            <option value="complete">Latest complete week (Mon-Sun)</option>
            <option value="calendar">Previous calendar week</option>
          </select>
        </div>
      </div>

      {status.kind === 'loading' ? (
        <p role="status" aria-live="polite" className="text-sm text-gray-500">
          Processing...
        </p>
      ) : null}
      {status.kind === 'error' ? (
        <div role="alert" className="rounded-md border border-red-300 bg-red-50 p-3 text-sm text-red-700">
          {status.message}
        </div>
      ) : null}
      {status.kind === 'warning' ? (
        <div role="alert" className="rounded-md border border-amber-300 bg-amber-50 p-3 text-sm text-amber-800">
          {status.message}
        </div>
      ) : null}
      {status.kind === 'success' ? <TimesheetResults result={status.result} text={text} policy={policy} /> : null}
    </section>
  );
}

type ResultsProps = {
  result: TimesheetSuccess;
  text: string;
  policy: LastWeekPolicy;
};

function TimesheetResults({ result, text, policy }: ResultsProps) {
  const daily = dailyLogTable(result.dailyLog);
  const weekly = weeklySummaryTable(result.weeklySummary);
  const lastWeek = lastWeekTable(result.lastWeek.rows);
  const title = result.lastWeek.title;

  return (
    <div className="space-y-8">
      <div className="flex items-center justify-between rounded-md border border-green-300 bg-green-50 p-3">
        <p className="text-sm text-green-800">Processed {result.eventCount} messages.</p>
        <DownloadExcelButton text={text} policy={policy} />
      </div>

      <section className="space-y-3">
        <div className="flex items-center justify-between">
          <h2 className="text-lg font-semibold text-gray-900">Daily Work Log</h2>
          <DownloadCsvButton table={daily} filename="Daily_Work_Log.csv" />
        </div>
        <TimesheetTable table={daily} label="Daily Work Log" />
      </section>

      <section className="space-y-3">
        <div className="flex items-center justify-between">
          <h2 className="text-lg font-semibold text-gray-900">Weekly Total Hours per Person</h2>
          <DownloadCsvButton table={weekly} filename="Weekly_Total_Hours_Summary.csv" />
        </div>
        <TimesheetTable table={weekly} label="Weekly Summary" />
      </section>

      {title ? (
        <section className="space-y-3">
          <div className="flex items-center justify-between">
            <h2 className="text-lg font-semibold text-gray-900">{title}</h2>
            <div className="flex items-center gap-2">
              <PrintButton />
              <DownloadCsvButton table={lastWeek} filename={timesheetFileName(title, 'csv')} />
            </div>
          </div>
          <TimesheetTable table={lastWeek} label={title} emptyMessage="No rows in this week." />
        </section>
      ) : (
        <p className="text-sm text-gray-500">No week with all seven days logged yet.</p>
      )}
    </div>
  );
}
