import type { DateTime } from 'luxon';
import { isRecurringKind, type ReminderInsert, type ReminderRow } from '../types/rows';
import { reminderMessage } from '../ui/labels';
import { errorMessage, logError, logInfo, logWarn } from '../utils/logger';
import { nextWeeklyRun } from '../utils/schedule';
import { fromEpochSeconds, nowInZone, toEpochSeconds } from '../utils/time';
import type { MessagingGateway } from './gateway';
import type { ReminderStore } from './reminders';
import { ReminderScheduler, type ReminderJob } from './scheduler';

export const STORE_RETRY_DELAY_MS = 30_000;

export type ReminderServiceOptions = {
  store: ReminderStore;
  gateway: MessagingGateway;
  timezone: string;
  now?: () => DateTime;
};

/**
 * Ties the reminder store to the timer registry: every stored row has exactly
 * one armed job while the process runs.
 */
export class ReminderService {
  readonly scheduler: ReminderScheduler;

  private readonly store: ReminderStore;
  private readonly gateway: MessagingGateway;
  private readonly timezone: string;
  private readonly clock: () => DateTime;
  // Ids whose message went out but whose row is not yet deleted or rolled forward.
  private readonly delivered = new Set<number>();

  constructor(options: ReminderServiceOptions) {
    this.store = options.store;
    this.gateway = options.gateway;
    this.timezone = options.timezone;
    this.clock = options.now ?? (() => nowInZone(this.timezone));
    this.scheduler = new ReminderScheduler((job) => this.fire(job), () => this.clock().toMillis());
  }

  now(): DateTime {
    return this.clock().setZone(this.timezone);
  }

  async schedule(input: ReminderInsert): Promise<ReminderRow> {
    const reminder = await this.store.add(input);
    this.arm(reminder);
    logInfo('Reminder scheduled', { scope: 'reminders', event: 'reminder_scheduled', reminderId: reminder.id, chatId: reminder.chat_id, kind: reminder.kind, fireAt: reminder.fire_at });
    return reminder;
  }

  list(chatId: number): Promise<ReminderRow[]> {
    return this.store.list(chatId);
  }

  get(id: number): Promise<ReminderRow | null> {
    return this.store.get(id);
  }

  /** Deletes the row, then disarms its timer. Resolves `false` when it was already gone. */
  async cancel(id: number): Promise<boolean> {
    const removed = await this.store.delete(id);
    this.scheduler.cancel(id);
    this.delivered.delete(id);
    logInfo('Reminder cancelled', { scope: 'reminders', event: 'reminder_cancelled', reminderId: id, removed });
    return removed;
  }

  /** Arms every persisted reminder. Rows already due fire immediately. */
  async recover(): Promise<number> {
    const reminders = await this.store.listAll();
    const nowSeconds = toEpochSeconds(this.now());
    let overdue = 0;
    for (const reminder of reminders) {
      if (reminder.fire_at <= nowSeconds) overdue += 1;
      this.arm(reminder);
    }
    logInfo('Reminders recovered', { scope: 'reminders', event: 'recovery_done', armed: reminders.length, overdue });
    return reminders.length;
  }

  async fire(job: ReminderJob): Promise<void> {
    const { reminderId } = job;
    let reminder: ReminderRow | null;
    try {
      reminder = await this.store.get(reminderId);
    } catch (error) {
      this.retry(reminderId, 'load', error);
      return;
    }

    if (!reminder) {
      this.delivered.delete(reminderId);
      logInfo('Reminder skipped', { scope: 'reminders', event: 'reminder_skipped', reason: 'missing', reminderId });
      return;
    }

    // A retry after a failed store step must not post the message again.
    if (!this.delivered.has(reminderId)) {
      await this.deliver(reminder);
      this.delivered.add(reminderId);
    }

    try {
      await this.settle(reminder);
      this.delivered.delete(reminderId);
    } catch (error) {
      this.retry(reminderId, 'settle', error);
    }
  }

  stop(): void {
    this.scheduler.stop();
    this.delivered.clear();
  }

  private async deliver(reminder: ReminderRow): Promise<void> {
    try {
      await this.gateway.send(reminder.chat_id, reminderMessage(reminder));
      logInfo('Reminder sent', { scope: 'reminders', event: 'reminder_sent', reminderId: reminder.id, chatId: reminder.chat_id });
    } catch (error) {
      logError('Reminder delivery failed', { scope: 'reminders', event: 'reminder_error', reminderId: reminder.id, chatId: reminder.chat_id, error: errorMessage(error) });
    }
  }

  /** Deletes a fired one-off row, or swaps a weekly row for its next run and arms it. */
  private async settle(reminder: ReminderRow): Promise<void> {
    if (!isRecurringKind(reminder.kind)) {
      await this.store.delete(reminder.id);
      return;
    }

    const next = nextWeeklyRun(fromEpochSeconds(reminder.fire_at, this.timezone), this.now());
    const successor = await this.store.replace(reminder.id, toEpochSeconds(next));
    if (!successor) {
      logInfo('Reminder removed before re-arming', { scope: 'reminders', event: 'reminder_skipped', reason: 'removed', reminderId: reminder.id });
      return;
    }
    this.arm(successor);
  }

  private retry(reminderId: number, step: 'load' | 'settle', error: unknown): void {
    logWarn('Reminder store step failed, retrying', { scope: 'reminders', event: 'reminder_retry', reminderId, step, retryInMs: STORE_RETRY_DELAY_MS, error: errorMessage(error) });
    this.scheduler.arm({ reminderId }, this.now().toMillis() + STORE_RETRY_DELAY_MS);
  }

  private arm(reminder: ReminderRow): void {
    this.scheduler.arm({ reminderId: reminder.id }, reminder.fire_at * 1000);
  }
}
