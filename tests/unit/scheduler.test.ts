import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MAX_TIMER_DELAY_MS, ReminderScheduler, type ReminderJob } from '../../src/services/scheduler';

describe('ReminderScheduler', () => {
  let fired: number[];
  let scheduler: ReminderScheduler;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2025-03-10T00:00:00Z'));
    fired = [];
    scheduler = new ReminderScheduler(async (job: ReminderJob) => {
      fired.push(job.reminderId);
    });
  });

  afterEach(() => {
    scheduler.stop();
    vi.useRealTimers();
  });

  it('runs a job at its fire time', async () => {
    scheduler.arm({ reminderId: 1 }, Date.now() + 60_000);

    await vi.advanceTimersByTimeAsync(59_999);
    expect(fired).toEqual([]);

    await vi.advanceTimersByTimeAsync(1);
    expect(fired).toEqual([1]);
    expect(scheduler.isArmed(1)).toBe(false);
  });

  it('runs past-due jobs immediately', async () => {
    scheduler.arm({ reminderId: 5 }, Date.now() - 3_600_000);
    await vi.advanceTimersByTimeAsync(0);
    expect(fired).toEqual([5]);
  });

  it('replaces an existing timer for the same id', async () => {
    scheduler.arm({ reminderId: 1 }, Date.now() + 1_000);
    scheduler.arm({ reminderId: 1 }, Date.now() + 5_000);
    expect(scheduler.size).toBe(1);

    await vi.advanceTimersByTimeAsync(5_000);
    expect(fired).toEqual([1]);
  });

  it('cancel is a no-op for unknown ids', async () => {
    scheduler.arm({ reminderId: 1 }, Date.now() + 1_000);

    expect(scheduler.cancel(1)).toBe(true);
    expect(scheduler.cancel(1)).toBe(false);
    expect(scheduler.cancel(99)).toBe(false);

    await vi.advanceTimersByTimeAsync(2_000);
    expect(fired).toEqual([]);
  });

  it('chains waits longer than the maximum timer delay', async () => {
    const fireAt = Date.now() + MAX_TIMER_DELAY_MS + 10_000;
    scheduler.arm({ reminderId: 9 }, fireAt);

    await vi.advanceTimersByTimeAsync(MAX_TIMER_DELAY_MS);
    expect(fired).toEqual([]);
    expect(scheduler.isArmed(9)).toBe(true);

    await vi.advanceTimersByTimeAsync(10_000);
    expect(fired).toEqual([9]);
  });

  it('keeps running after a job throws', async () => {
    const failing = new ReminderScheduler(async (job) => {
      if (job.reminderId === 1) throw new Error('boom');
      fired.push(job.reminderId);
    });
    failing.arm({ reminderId: 1 }, Date.now());
    failing.arm({ reminderId: 2 }, Date.now() + 10);

    await vi.advanceTimersByTimeAsync(10);
    expect(fired).toEqual([2]);
    failing.stop();
  });
});
