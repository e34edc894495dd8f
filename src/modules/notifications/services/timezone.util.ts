import { MINUTES_PER_HOUR } from '../entities/notification-preferences.constants';

export const DEFAULT_TIMEZONE = 'UTC';

const MS_PER_HOUR = 3_600_000;

const formatterCache: Map<string, Intl.DateTimeFormat> = new Map<string, Intl.DateTimeFormat>();

const getWallClockFormatter = (timezone: string): Intl.DateTimeFormat => {
  const cachedFormatter: Intl.DateTimeFormat | undefined = formatterCache.get(timezone);

  if (cachedFormatter !== undefined) {
    return cachedFormatter;
  }

  const formatter: Intl.DateTimeFormat = new Intl.DateTimeFormat('en-GB', {
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
    timeZone: timezone,
  });
  formatterCache.set(timezone, formatter);

  return formatter;
};

export const isValidTimezone = (timezone: string | null | undefined): boolean => {
  if (typeof timezone !== 'string' || timezone.trim().length === 0) {
    return false;
  }

  try {
    getWallClockFormatter(timezone);
    return true;
  } catch (error: unknown) {
    if (error instanceof RangeError) {
      return false;
    }

    throw error;
  }
};

/**
 * Returns the IANA zone to compute wall-clock time in. Empty or unknown
 * identifiers resolve to UTC; callers decide whether that is worth a warning.
 */
export const resolveTimezone = (timezone: string | null | undefined): string => {
  if (typeof timezone === 'string' && isValidTimezone(timezone)) {
    return timezone;
  }

  return DEFAULT_TIMEZONE;
};

/**
 * Minutes since local midnight (0-1439) of `instant` in the given zone.
 * DST rules come from the ICU time zone database; seconds are truncated.
 */
export const utcToLocalMinutes = (instant: Date, timezone: string | null | undefined): number => {
  const formatter: Intl.DateTimeFormat = getWallClockFormatter(resolveTimezone(timezone));
  const parts: Intl.DateTimeFormatPart[] = formatter.formatToParts(instant);
  const hourPart: string | undefined = parts.find(
    (part: Intl.DateTimeFormatPart): boolean => part.type === 'hour',
  )?.value;
  const minutePart: string | undefined = parts.find(
    (part: Intl.DateTimeFormatPart): boolean => part.type === 'minute',
  )?.value;
  const hour: number = Number.parseInt(hourPart ?? '0', 10);
  const minute: number = Number.parseInt(minutePart ?? '0', 10);

  return hour * MINUTES_PER_HOUR + minute;
};

export const hoursBetween = (later: Date, earlier: Date): number => {
  return (later.getTime() - earlier.getTime()) / MS_PER_HOUR;
};
