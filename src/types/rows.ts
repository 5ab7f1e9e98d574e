import { z } from 'zod';

export const REMINDER_KINDS = ['single-date', 'weekly-cycle', 'apk-weekly'] as const;

export const reminderKindSchema = z.enum(REMINDER_KINDS);

export type ReminderKind = z.infer<typeof reminderKindSchema>;

export const reminderRowSchema = z.object({
  id: z.coerce.number().int(),
  chat_id: z.coerce.number().int(),
  kind: reminderKindSchema,
  fire_at: z.coerce.number().int(),
  body: z.string()
});

export type ReminderRow = z.infer<typeof reminderRowSchema>;

export type ReminderInsert = Omit<ReminderRow, 'id'>;

export const mentionTargetRowSchema = z.object({
  id: z.coerce.number().int(),
  chat_id: z.coerce.number().int(),
  handle: z.string(),
  display_name: z.string()
});

export type MentionTargetRow = z.infer<typeof mentionTargetRowSchema>;

export const isRecurringKind = (kind: ReminderKind): boolean => kind !== 'single-date';
