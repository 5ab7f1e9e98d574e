import type { SupabaseClient } from '@supabase/supabase-js';
import { StoreError } from '../errors';
import { reminderRowSchema, type ReminderInsert, type ReminderRow } from '../types/rows';

const REMINDERS_TABLE = 'reminders';
const REPLACE_REMINDER_FN = 'replace_reminder';
const REMINDER_COLUMNS = 'id, chat_id, kind, fire_at, body';

/**
 * Durable record of pending reminders. Every write is committed before the
 * returned promise resolves.
 */
export interface ReminderStore {
  add(input: ReminderInsert): Promise<ReminderRow>;
  /** Reminders of one chat, earliest `fire_at` first. */
  list(chatId: number): Promise<ReminderRow[]>;
  listAll(): Promise<ReminderRow[]>;
  get(id: number): Promise<ReminderRow | null>;
  /** Resolves `false` when the row was already gone. */
  delete(id: number): Promise<boolean>;
  /**
   * Deletes the row and inserts its successor at `fireAt` in one transaction.
   * Resolves `null` when the row no longer exists.
   */
  replace(id: number, fireAt: number): Promise<ReminderRow | null>;
}

const parseRows = (data: unknown): ReminderRow[] => reminderRowSchema.array().parse(data ?? []);

const parseRow = (data: unknown): ReminderRow | null => (data ? reminderRowSchema.parse(data) : null);

export function createReminderStore(client: SupabaseClient): ReminderStore {
  return {
    async add(input) {
      const { data, error } = await client
        .from(REMINDERS_TABLE)
        .insert({ chat_id: input.chat_id, kind: input.kind, fire_at: input.fire_at, body: input.body })
        .select(REMINDER_COLUMNS)
        .single();

      if (error) {
        throw new StoreError('create reminder', error.message);
      }

      return reminderRowSchema.parse(data);
    },

    async list(chatId) {
      const { data, error } = await client
        .from(REMINDERS_TABLE)
        .select(REMINDER_COLUMNS)
        .eq('chat_id', chatId)
        .order('fire_at', { ascending: true })
        .order('id', { ascending: true });

      if (error) {
        throw new StoreError('list reminders', error.message);
      }

      return parseRows(data);
    },

    async listAll() {
      const { data, error } = await client
        .from(REMINDERS_TABLE)
        .select(REMINDER_COLUMNS)
        .order('fire_at', { ascending: true });

      if (error) {
        throw new StoreError('list all reminders', error.message);
      }

      return parseRows(data);
    },

    async get(id) {
      const { data, error } = await client.from(REMINDERS_TABLE).select(REMINDER_COLUMNS).eq('id', id).maybeSingle();

      if (error) {
        throw new StoreError('load reminder', error.message);
      }

      return parseRow(data);
    },

    async delete(id) {
      const { data, error } = await client.from(REMINDERS_TABLE).delete().eq('id', id).select('id');

      if (error) {
        throw new StoreError('delete reminder', error.message);
      }

      return Array.isArray(data) && data.length > 0;
    },

    async replace(id, fireAt) {
      const { data, error } = await client
        .rpc(REPLACE_REMINDER_FN, { p_id: id, p_fire_at: fireAt })
        .maybeSingle();

      if (error) {
        throw new StoreError('replace reminder', error.message);
      }

      return parseRow(data);
    }
  };
}
