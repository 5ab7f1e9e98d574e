import { DateTime } from 'luxon';

/** 0 = Monday … 6 = Sunday. */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

export const WEEKDAYS: readonly Weekday[] = [0, 1, 2, 3, 4, 5, 6];

export const isWeekday = (value: number): value is Weekday => Number.isInteger(value) && value >= 0 && value <= 6;

// luxon numbers weekdays 1 (Monday) … 7 (Sunday).
const weekdayOf = (instant: DateTime): Weekday => {
  const index = instant.weekday - 1;
  return isWeekday(index) ? index : 0;
};

/**
 * Next instant strictly after `now` that falls on `weekday` at hour:minute,
 * evaluated in `now`'s zone.
 */
export function nextOccurrence(weekday: Weekday, hour: number, minute: number, now: DateTime): DateTime {
  const daysAhead = (((weekday - weekdayOf(now)) % 7) + 7) % 7;
  const candidate = now.set({ hour, minute, second: 0, millisecond: 0 }).plus({ days: daysAhead });
  return candidate <= now ? candidate.plus({ days: 7 }) : candidate;
}

// Feb 29 can skip up to 8 years across a non-leap century.
const MAX_YEAR_SEARCH = 8;

/**
 * Next instant strictly after `now` at month/day hour:minute. This year when
 * still ahead, otherwise the first following year where the date exists.
 */
export function nextOccurrenceForDate(month: number, day: number, hour: number, minute: number, now: DateTime): DateTime {
  for (let offset = 0; offset <= MAX_YEAR_SEARCH; offset += 1) {
    const candidate = DateTime.fromObject({ year: now.year + offset, month, day, hour, minute }, { zone: now.zone });
    if (candidate.isValid && candidate > now) {
      return candidate;
    }
  }
  throw new Error(`No valid occurrence for ${month}/${day} within ${MAX_YEAR_SEARCH} years`);
}

/** Advances a fired weekly instant by whole weeks until it is after `now`. */
export function nextWeeklyRun(fireAt: DateTime, now: DateTime): DateTime {
  let next = fireAt.plus({ days: 7 });
  while (next <= now) {
    next = next.plus({ days: 7 });
  }
  return next;
}
