import type { ReminderKind, ReminderRow } from '../types/rows';
import type { Weekday } from '../utils/schedule';
import { emoji, withEmoji } from './emoji';

const WEEKDAY_SHORT: Record<Weekday, string> = { 0: 'Mon', 1: 'Tue', 2: 'Wed', 3: 'Thu', 4: 'Fri', 5: 'Sat', 6: 'Sun' };
const WEEKDAY_LONG: Record<Weekday, string> = {
  0: 'Monday',
  1: 'Tuesday',
  2: 'Wednesday',
  3: 'Thursday',
  4: 'Friday',
  5: 'Saturday',
  6: 'Sunday'
};

const KIND_LABEL: Record<ReminderKind, string> = {
  'single-date': 'One-off',
  'weekly-cycle': 'Weekly',
  'apk-weekly': 'APK release'
};

const KIND_EMOJI: Record<ReminderKind, string> = {
  'single-date': emoji('reminder'),
  'weekly-cycle': emoji('weekly'),
  'apk-weekly': emoji('apk')
};

export const weekdayShort = (weekday: Weekday): string => WEEKDAY_SHORT[weekday];

export const weekdayLong = (weekday: Weekday): string => WEEKDAY_LONG[weekday];

export const kindLabel = (kind: ReminderKind): string => `${KIND_EMOJI[kind]} ${KIND_LABEL[kind]}`;

export const labels = {
  nav: {
    back: () => withEmoji('back', 'Back'),
    home: () => withEmoji('home', 'Main menu'),
    next: () => withEmoji('next', 'Next'),
    done: () => withEmoji('confirm', 'Done')
  },
  menu: {
    title: () => withEmoji('menu', 'Choose a function:'),
    general: () => withEmoji('reminder', 'General reminders'),
    apk: () => withEmoji('apk', 'APK release reminders'),
    people: () => withEmoji('people', 'Member list'),
    list: () => withEmoji('list', 'All reminders'),
    cancelled: () => withEmoji('info', 'Cancelled.')
  },
  general: {
    title: () => withEmoji('reminder', 'General reminders'),
    single: () => withEmoji('calendar', 'Single date'),
    cycle: () => withEmoji('weekly', 'Weekly cycle')
  },
  prompts: {
    date: () => withEmoji('calendar', 'Enter the date as MMDD (e.g. 1201 for Dec 1).'),
    time: () => withEmoji('clock', 'Enter the time as HHMM in 24h (e.g. 0930).'),
    text: () => withEmoji('text', 'Enter the reminder text.'),
    weekdays: (title: string) => `${title}\n${withEmoji('calendar', 'Select one or more weekdays, then press Next.')}`,
    mentions: () => withEmoji('people', 'Select members to tag, then press Done.')
  },
  flows: {
    cycleTitle: () => withEmoji('weekly', 'Weekly cycle reminder'),
    apkTitle: () => withEmoji('apk', 'APK release reminder')
  },
  errors: {
    invalidDate: () => withEmoji('warning', 'Invalid date. Use MMDD, e.g. 1201.'),
    invalidTime: () => withEmoji('warning', 'Invalid time. Use HHMM, e.g. 0930.'),
    emptyText: () => withEmoji('warning', 'The reminder text cannot be empty.'),
    noWeekdays: () => withEmoji('warning', 'Select at least one weekday first.'),
    stateLost: () => withEmoji('warning', 'Internal state lost, please restart with /start.'),
    failure: () => withEmoji('error', 'Something went wrong. Back to the main menu.')
  },
  confirm: {
    recorded: (fireTimes: string[]) =>
      fireTimes.length === 1
        ? withEmoji('success', `Recorded, will remind at ${fireTimes[0]}.`)
        : [withEmoji('success', 'Recorded, will remind at:'), ...fireTimes.map((time) => `• ${time}`)].join('\n')
  },
  reminders: {
    title: () => withEmoji('list', 'All reminders'),
    empty: () => withEmoji('info', 'No reminders.'),
    itemLabel: (fireTime: string, kind: ReminderKind) => `${fireTime} · ${kindLabel(kind)}`,
    detail: (params: { fireTime: string; kind: ReminderKind; body: string }) =>
      [withEmoji('clock', params.fireTime), kindLabel(params.kind), '', params.body].join('\n'),
    delete: () => withEmoji('delete', 'Delete'),
    backToList: () => withEmoji('back', 'Back to list'),
    deleted: () => withEmoji('success', 'Reminder deleted.'),
    alreadyGone: () => withEmoji('info', 'That reminder is already gone.')
  },
  people: {
    title: () => withEmoji('people', 'Member list'),
    add: () => withEmoji('add', 'Add'),
    delete: () => withEmoji('delete', 'Delete'),
    show: () => withEmoji('list', 'Show list'),
    addPrompt: () =>
      [
        withEmoji('add', 'Send members, one per line, as:'),
        '@handle Name',
        'e.g.',
        '@alice Ally',
        '@bob Bob',
        'Press Done when finished.'
      ].join('\n'),
    added: (count: number) => withEmoji('success', `Added ${count} member(s).`),
    lineError: (lineNumber: number, line: string) => withEmoji('warning', `Line ${lineNumber} skipped: "${line}"`),
    deletePrompt: () => withEmoji('delete', 'Tap a member to delete:'),
    targetLabel: (displayName: string, handle: string) => `${displayName} (${handle})`,
    deleted: () => withEmoji('success', 'Member deleted.'),
    alreadyGone: () => withEmoji('info', 'That member is already gone.'),
    empty: () => withEmoji('info', 'The member list is empty.'),
    listHeader: () => withEmoji('people', 'Members:')
  }
};

/** Stored body. Mentions and, for APK reminders, the weekday are baked in. */
export function composeReminderBody(params: {
  kind: ReminderKind;
  text: string;
  mentions: string;
  weekday?: Weekday;
}): string {
  const lines: string[] = [];
  if (params.kind === 'apk-weekly') {
    lines.push(params.weekday === undefined ? 'APK release' : `APK release (${weekdayLong(params.weekday)})`);
  }
  lines.push(params.text);
  if (params.mentions) lines.push(params.mentions);
  return lines.join('\n');
}

/** Text posted to the chat when a reminder fires. */
export const reminderMessage = (reminder: Pick<ReminderRow, 'kind' | 'body'>): string =>
  `${KIND_EMOJI[reminder.kind]} ${reminder.body}`;
