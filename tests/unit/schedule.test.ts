import { DateTime } from 'luxon';
import { describe, expect, it } from 'vitest';
import { nextOccurrence, nextOccurrenceForDate, nextWeeklyRun } from '../../src/utils/schedule';

const ZONE = 'Asia/Taipei';
const at = (iso: string) => DateTime.fromISO(iso, { zone: ZONE });

// 2025-03-10 is a Monday.
const monday0900 = at('2025-03-10T09:00:00');

describe('nextOccurrence', () => {
  it('returns today when the time is still ahead', () => {
    expect(nextOccurrence(0, 10, 0, monday0900).toISO()).toBe(at('2025-03-10T10:00:00').toISO());
  });

  it('rolls to next week when the time is now or has passed', () => {
    expect(nextOccurrence(0, 9, 0, monday0900).toISO()).toBe(at('2025-03-17T09:00:00').toISO());
    expect(nextOccurrence(0, 8, 59, monday0900).toISO()).toBe(at('2025-03-17T08:59:00').toISO());
  });

  it('lands on the requested weekday', () => {
    expect(nextOccurrence(2, 8, 0, monday0900).toISO()).toBe(at('2025-03-12T08:00:00').toISO());
    expect(nextOccurrence(6, 23, 30, monday0900).toISO()).toBe(at('2025-03-16T23:30:00').toISO());
  });

  it('is always strictly in the future on the right weekday', () => {
    for (const weekday of [0, 1, 2, 3, 4, 5, 6] as const) {
      for (const hour of [0, 9, 23]) {
        const next = nextOccurrence(weekday, hour, 0, monday0900);
        expect(next > monday0900).toBe(true);
        expect(next.weekday - 1).toBe(weekday);
        expect(next.diff(monday0900, 'days').days).toBeLessThanOrEqual(7);
      }
    }
  });

  it('spaces repeated application exactly seven days apart', () => {
    const first = nextOccurrence(3, 7, 15, monday0900);
    const second = nextOccurrence(3, 7, 15, first);
    expect(second.diff(first, 'days').days).toBe(7);
  });
});

describe('nextOccurrenceForDate', () => {
  it('uses this year when the date is still ahead', () => {
    expect(nextOccurrenceForDate(12, 1, 9, 30, monday0900).toISO()).toBe(at('2025-12-01T09:30:00').toISO());
  });

  it('uses next year once the date has passed', () => {
    expect(nextOccurrenceForDate(3, 10, 9, 0, monday0900).toISO()).toBe(at('2026-03-10T09:00:00').toISO());
    expect(nextOccurrenceForDate(1, 5, 12, 0, monday0900).toISO()).toBe(at('2026-01-05T12:00:00').toISO());
  });

  it('rolls Feb 29 forward to the next leap year', () => {
    expect(nextOccurrenceForDate(2, 29, 8, 0, monday0900).toISO()).toBe(at('2028-02-29T08:00:00').toISO());
  });
});

describe('nextWeeklyRun', () => {
  it('adds one week to an on-time firing', () => {
    const fired = at('2025-03-10T09:00:00');
    expect(nextWeeklyRun(fired, fired).toISO()).toBe(at('2025-03-17T09:00:00').toISO());
  });

  it('skips whole weeks missed while offline', () => {
    const fired = at('2025-03-10T09:00:00');
    expect(nextWeeklyRun(fired, at('2025-03-25T12:00:00')).toISO()).toBe(at('2025-03-31T09:00:00').toISO());
  });
});
