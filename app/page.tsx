import { getTimesheetConfig } from '@/src/lib/timesheetConfig';
import TimesheetClient from './TimesheetClient';

export const dynamic = 'force-dynamic';

export default function Home() {
  const { lastWeekPolicy } = getTimesheetConfig();

  return (
    <div className="space-y-6">
      <header className="space-y-2">
        <h1 className="text-2xl font-semibold text-gray-900">Chat Work Hours</h1>
        <p className="text-sm text-gray-600">
          Upload an exported group chat to pair IN/OUT messages and total the hours worked per person.
        </p>
      </header>
      <TimesheetClient defaultPolicy={lastWeekPolicy} />
    </div>
  );
}
