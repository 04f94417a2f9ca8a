export type TimesheetErrorCode = 'FORMAT_ISSUE' | 'NO_PAIRS';

export const describeTimesheetError = (code: TimesheetErrorCode): string => {
  switch (code) {
    case 'FORMAT_ISSUE':
      return 'Format issue: could not extract any messages. Please upload an exported group chat .txt file.';
    case 'NO_PAIRS':
      return 'No valid IN/OUT pairs found.';
    default:
      return 'Unknown error.';
  }
};
