import { errorMessage, logError } from '../utils/logger';

/** The only payload a timer carries; everything else is re-read at fire time. */
export type ReminderJob = { reminderId: number };

export type JobRunner = (job: ReminderJob) => Promise<void>;

// setTimeout overflows above 2^31-1 ms (~24.8 days); longer waits are chained.
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Process-wide registry of armed reminder timers, keyed by reminder id.
 * Arming an id that is already armed replaces the earlier timer.
 */
export class ReminderScheduler {
  private readonly timers = new Map<number, NodeJS.Timeout>();

  constructor(
    private readonly run: JobRunner,
    private readonly now: () => number = () => Date.now()
  ) {}

  arm(job: ReminderJob, fireAtMs: number): void {
    this.cancel(job.reminderId);

    const delay = Math.max(0, fireAtMs - this.now());
    if (delay > MAX_TIMER_DELAY_MS) {
      this.timers.set(
        job.reminderId,
        setTimeout(() => this.arm(job, fireAtMs), MAX_TIMER_DELAY_MS)
      );
      return;
    }

    this.timers.set(
      job.reminderId,
      setTimeout(() => {
        this.timers.delete(job.reminderId);
        void this.execute(job);
      }, delay)
    );
  }

  cancel(reminderId: number): boolean {
    const timer = this.timers.get(reminderId);
    if (!timer) return false;
    clearTimeout(timer);
    this.timers.delete(reminderId);
    return true;
  }

  isArmed(reminderId: number): boolean {
    return this.timers.has(reminderId);
  }

  get size(): number {
    return this.timers.size;
  }

  stop(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }

  private async execute(job: ReminderJob): Promise<void> {
    try {
      await this.run(job);
    } catch (error) {
      logError('Reminder job failed', { scope: 'scheduler', event: 'job_error', reminderId: job.reminderId, error: errorMessage(error) });
    }
  }
}
