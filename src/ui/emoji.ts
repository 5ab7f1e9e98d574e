export const EMOJI = {
  menu: '📋',
  back: '⬅️',
  home: '🏠',
  delete: '🗑️',
  confirm: '✅',
  warning: '⚠️',
  info: 'ℹ️',
  success: '✅',
  error: '❌',
  reminder: '⏰',
  weekly: '🔁',
  apk: '📦',
  calendar: '📅',
  clock: '🕒',
  text: '📝',
  people: '👥',
  add: '➕',
  list: '📜',
  next: '➡️',
  toggleOn: '✅',
  toggleOff: '⬜️'
} as const;

export type EmojiKey = keyof typeof EMOJI;

export const emoji = (key: EmojiKey): string => EMOJI[key];

export const withEmoji = (key: EmojiKey, text: string): string => `${EMOJI[key]} ${text}`;

export const toggleMark = (selected: boolean): string => (selected ? EMOJI.toggleOn : EMOJI.toggleOff);
