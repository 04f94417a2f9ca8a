import { isoWeekKey } from './dates';
import type { ChatEvent } from './types';

/** How many of the most recent ISO weeks survive into pairing. */
export const RECENT_WEEK_LIMIT = 4;

/** Distinct ISO week keys present in the events, newest first. */
export function listWeeksDescending(events: readonly ChatEvent[]): string[] {
  const keys = new Set(events.map((event) => isoWeekKey(event.timestamp)));
  return Array.from(keys).sort((a, b) => b.localeCompare(a));
}

/**
 * Keeps events whose own ISO week is one of the latest RECENT_WEEK_LIMIT weeks.
 * Decided per event, before any pairing happens.
 */
export function keepRecentWeeks(events: readonly ChatEvent[]): ChatEvent[] {
  const recent = new Set(listWeeksDescending(events).slice(0, RECENT_WEEK_LIMIT));
  return events.filter((event) => recent.has(isoWeekKey(event.timestamp)));
}
