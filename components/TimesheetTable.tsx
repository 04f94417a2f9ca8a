import type { Table } from '@/lib/timesheet/tables';

type TimesheetTableProps = {
  table: Table;
  label: string;
  emptyMessage?: string;
};

const isNumeric = (value: unknown): value is number => typeof value === 'number';

export function TimesheetTable({ table, label, emptyMessage = 'No rows.' }: TimesheetTableProps) {
  return (
    <div className="overflow-x-auto">
      <table
        className="min-w-full divide-y divide-gray-200 overflow-hidden rounded-lg border border-gray-200"
        aria-label={label}
      >
        <thead className="bg-gray-50">
          <tr className="text-sm text-gray-700">
            {table.headers.map((header) => (
              <th key={header} scope="col" className="px-4 py-3 text-left font-semibold">
                {header}
              </th>
            ))}
          </tr>
        </thead>
        <tbody className="divide-y divide-gray-200 bg-white text-sm text-gray-900">
          {table.rows.length === 0 ? (
            <tr>
              <td colSpan={table.headers.length} className="px-4 py-6 text-center text-sm text-gray-500">
                {emptyMessage}
              </td>
            </tr>
          ) : (
            table.rows.map((row, rowIndex) => (
              <tr key={rowIndex} className="odd:bg-white even:bg-gray-50">
                {row.map((cell, cellIndex) => (
                  <td
                    key={cellIndex}
                    className={`px-4 py-3 ${isNumeric(cell) ? 'text-right tabular-nums' : ''}`}
                  >
                    {isNumeric(cell) ? cell.toFixed(2) : cell ?? ''}
                  </td>
                ))}
              </tr>
            ))
          )}
        </tbody>
      </table>
    </div>
  );
}
