import { formatClockTime, formatWeekday, getWeekRange, toDateKey } from './dates';
import { isClockIn, isClockOut } from './keywords';
import type { ChatEvent, WorkInterval } from './types';

const HOUR_MS = 60 * 60 * 1000;

export type DayGroup = {
  name: string;
  /** YYYY-MM-DD */
  date: string;
  events: ChatEvent[];
};

const compareText = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/** Hours between two instants, rounded to 2 decimals. */
export function hoursBetween(start: Date, end: Date): number {
  return Math.round(((end.getTime() - start.getTime()) / HOUR_MS) * 100) / 100;
}

/**
 * Buckets events per person and calendar day.
 * Groups come out ordered by name then date; events inside a group by timestamp.
 */
export function groupEventsByDay(events: readonly ChatEvent[]): DayGroup[] {
  const byName = new Map<string, Map<string, ChatEvent[]>>();

  for (const event of events) {
    const date = toDateKey(event.timestamp);
    const dateMap = byName.get(event.name) ?? new Map<string, ChatEvent[]>();
    const list = dateMap.get(date) ?? [];
    list.push(event);
    dateMap.set(date, list);
    byName.set(event.name, dateMap);
  }

  const groups: DayGroup[] = [];
  for (const [name, dateMap] of byName.entries()) {
    for (const [date, list] of dateMap.entries()) {
      const sorted = [...list].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
      groups.push({ name, date, events: sorted });
    }
  }

  return groups.sort((a, b) => compareText(a.name, b.name) || compareText(a.date, b.date));
}

function toInterval(clockIn: ChatEvent, clockOut: ChatEvent): WorkInterval {
  return {
    name: clockIn.name,
    date: toDateKey(clockIn.timestamp),
    day: formatWeekday(clockIn.timestamp),
    week: getWeekRange(clockIn.timestamp).label,
    clockIn: formatClockTime(clockIn.timestamp),
    clockOut: formatClockTime(clockOut.timestamp),
    hours: hoursBetween(clockIn.timestamp, clockOut.timestamp),
  };
}

/**
 * Pairs one person's events of one day, oldest first.
 * An IN-like event followed directly by an OUT-like one makes an interval and
 * both are consumed; anything else drops the leading event and moves on by one.
 * Unpaired events (a trailing "in", repeated "out") are discarded.
 */
export function pairDayEvents(events: readonly ChatEvent[]): WorkInterval[] {
  const intervals: WorkInterval[] = [];
  let index = 0;
  while (index < events.length - 1) {
    const current = events[index];
    const next = events[index + 1];
    if (isClockIn(current.message) && isClockOut(next.message)) {
      intervals.push(toInterval(current, next));
      index += 2;
    } else {
      index += 1;
    }
  }
  return intervals;
}

/** Daily Work Log for a set of events. */
export function pairEvents(events: readonly ChatEvent[]): WorkInterval[] {
  return groupEventsByDay(events).flatMap((group) => pairDayEvents(group.events));
}
