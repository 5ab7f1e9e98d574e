import { DateTime } from 'luxon';

export const DEFAULT_TIMEZONE = 'Asia/Taipei';

export type LocalTime = {
  date: string;
  time: string;
  timezone: string;
};

const normalizeTimezone = (timezone?: string | null): string => {
  const tz = timezone?.trim();
  return tz && tz.length > 0 ? tz : DEFAULT_TIMEZONE;
};

export const nowInZone = (timezone?: string | null): DateTime => DateTime.now().setZone(normalizeTimezone(timezone));

export const fromEpochSeconds = (epochSeconds: number, timezone?: string | null): DateTime =>
  DateTime.fromSeconds(epochSeconds, { zone: normalizeTimezone(timezone) });

export const toEpochSeconds = (instant: DateTime): number => Math.floor(instant.toSeconds());

// Format a stored fire_at (epoch seconds) into chat-local time.
export function formatInstantToLocal(epochSeconds: number, timezone?: string | null): LocalTime {
  const local = fromEpochSeconds(epochSeconds, timezone);
  return {
    date: local.toFormat('MM/dd'),
    time: local.toFormat('HH:mm'),
    timezone: local.zoneName ?? normalizeTimezone(timezone)
  };
}

/** `MM/DD HH:MM` in the given zone. */
export function formatFireAt(epochSeconds: number, timezone?: string | null): string {
  const local = formatInstantToLocal(epochSeconds, timezone);
  return `${local.date} ${local.time}`;
}
