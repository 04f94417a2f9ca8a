/** One attributed, timestamped message line pulled out of a chat export. */
export type ChatEvent = Readonly<{
  name: string;
  /** Wall-clock time of the message, stored in UTC fields so no zone shifts it. */
  timestamp: Date;
  /** Lowercased and trimmed. */
  message: string;
}>;

/** A clock-in/clock-out pair for one person on one day (a Daily Work Log row). */
export type WorkInterval = Readonly<{
  name: string;
  /** YYYY-MM-DD */
  date: string;
  day: string;
  week: string;
  clockIn: string;
  clockOut: string;
  hours: number;
}>;

export type WeeklyTotal = Readonly<{
  name: string;
  week: string;
  totalHours: number;
}>;

export type LastWeekRow = WorkInterval & {
  /** Set on the first row of each person only. */
  readonly totalHoursThisWeek: number | null;
};

export type WeekRange = Readonly<{
  /** YYYY-MM-DD */
  monday: string;
  /** YYYY-MM-DD */
  sunday: string;
  label: string;
}>;

export type LastWeekReport = Readonly<{
  range: WeekRange | null;
  title: string | null;
  rows: LastWeekRow[];
}>;

export type LastWeekPolicy = 'complete' | 'calendar';
