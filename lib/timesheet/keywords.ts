import type { ChatEvent } from './types';

export const CLOCK_IN_KEYWORDS = ['in', 'back', 'return'] as const;
// "lunch" only ever closes an interval; coming back is "back", "return" or "in".
export const CLOCK_OUT_KEYWORDS = ['out', 'lunch'] as const;

// Letters and digits of any script count as word characters, so "inégalité" is not "in".
const wholeWord = (words: readonly string[]) =>
  new RegExp(`(?<![\\p{L}\\p{N}_])(?:${words.join('|')})(?![\\p{L}\\p{N}_])`, 'iu');

const CLOCK_IN_PATTERN = wholeWord(CLOCK_IN_KEYWORDS);
const CLOCK_OUT_PATTERN = wholeWord(CLOCK_OUT_KEYWORDS);

export type MessageKind = {
  clockIn: boolean;
  clockOut: boolean;
};

export function isClockIn(message: string): boolean {
  return CLOCK_IN_PATTERN.test(message);
}

export function isClockOut(message: string): boolean {
  return CLOCK_OUT_PATTERN.test(message);
}

/** A message may be both ("lunch out, back at 1"). */
export function classifyMessage(message: string): MessageKind {
  return { clockIn: isClockIn(message), clockOut: isClockOut(message) };
}

/** Drops events that say nothing about clocking in or out. */
export function filterAttendanceEvents(events: readonly ChatEvent[]): ChatEvent[] {
  return events.filter((event) => {
    const kind = classifyMessage(event.message);
    return kind.clockIn || kind.clockOut;
  });
}
