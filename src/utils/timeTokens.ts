import { DateTime } from 'luxon';

export type MonthDay = { month: number; day: number };
export type TimeOfDay = { hour: number; minute: number };

// Leap year used to validate MMDD so that 0229 is always accepted.
const REFERENCE_YEAR = 2000;
const FOUR_DIGITS = /^[0-9]{4}$/;

const splitFourDigits = (token: string): [number, number] | null => {
  if (!FOUR_DIGITS.test(token)) return null;
  return [Number(token.slice(0, 2)), Number(token.slice(2))];
};

export function parseDate(token: string): MonthDay | null {
  const parts = splitFourDigits(token);
  if (!parts) return null;
  const [month, day] = parts;
  if (!DateTime.fromObject({ year: REFERENCE_YEAR, month, day }).isValid) return null;
  return { month, day };
}

export function parseTime(token: string): TimeOfDay | null {
  const parts = splitFourDigits(token);
  if (!parts) return null;
  const [hour, minute] = parts;
  if (hour > 23 || minute > 59) return null;
  return { hour, minute };
}
