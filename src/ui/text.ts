// Telegram's hard cap is 4096.
export const MESSAGE_LIMIT = 3500;

const BUTTON_PREVIEW_LIMIT = 24;

const cut = (text: string, max: number): string =>
  text.length <= max ? text : `${text.slice(0, Math.max(0, max - 1))}…`;

const normalizeNewlines = (text: string): string => text.replace(/\u0000/g, '').replace(/\r\n?/g, '\n');

/** Message text as sent: NUL-free, `\n` line endings, at most `max` characters. */
export const clampMessage = (text: string, max = MESSAGE_LIMIT): string => cut(normalizeNewlines(text), max);

/** Single-line preview of a reminder body for button labels. */
export const preview = (text: string, max = BUTTON_PREVIEW_LIMIT): string =>
  cut(normalizeNewlines(text).replace(/\s+/g, ' ').trim(), max);
