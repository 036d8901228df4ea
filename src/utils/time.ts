import { logger } from '../logger';

export type Clock = () => number;

export type DisplayTime = {
  instant: Date;
  // IANA zone of the forecast location, null for server-local time
  timeZone: string | null;
};

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function partsOf(
  date: Date,
  options: Intl.DateTimeFormatOptions
): Partial<Record<Intl.DateTimeFormatPartTypes, string>> {
  const parts: Partial<Record<Intl.DateTimeFormatPartTypes, string>> = {};
  for (const part of new Intl.DateTimeFormat('en-US', options).formatToParts(date)) {
    parts[part.type] = part.value;
  }
  return parts;
}

// `YYYY-MM-DD` naming a real calendar day, as a UTC midnight; null otherwise.
function parseCalendarDate(value: string): Date | null {
  const match = ISO_DATE.exec(value);
  if (!match) return null;

  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));

  if (date.getUTCMonth() !== Number(month) - 1 || date.getUTCDate() !== Number(day)) {
    return null;
  }
  return date;
}

export function isCalendarDate(value: string): boolean {
  return parseCalendarDate(value) !== null;
}

/**
 * `2024-03-05` -> `Tue, Mar 05`. Works on the calendar date alone, so the
 * server's timezone never shifts the day.
 */
export function formatDate(value: string): string {
  const date = parseCalendarDate(value);
  if (!date) {
    throw new RangeError(`Invalid date: ${value}`);
  }

  const parts = partsOf(date, {
    timeZone: 'UTC',
    weekday: 'short',
    month: 'short',
    day: '2-digit',
  });

  return `${parts.weekday}, ${parts.month} ${parts.day}`;
}

// `2024-03-05T14:00` -> `14:00`
export function sliceTime(value: string): string {
  const [, time] = value.split('T');
  if (time === undefined) {
    throw new RangeError(`Not an ISO datetime: ${value}`);
  }
  return time;
}

export function isKnownTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch (err) {
    if (err instanceof RangeError) return false;
    throw err;
  }
}

export function resolveNow(
  timeZone: string | undefined,
  clock: Clock = Date.now
): DisplayTime {
  const instant = new Date(clock());

  if (!timeZone) {
    return { instant, timeZone: null };
  }

  if (!isKnownTimeZone(timeZone)) {
    logger.warn({ timeZone }, 'Unknown forecast timezone, using server time');
    return { instant, timeZone: null };
  }

  return { instant, timeZone };
}

/**
 * Reads like `Tuesday, March 5, 1:00 PM UTC`.
 * Without a zone the server's local time is shown and no zone name is appended.
 */
export function formatDisplayTime({ instant, timeZone }: DisplayTime): string {
  const parts = partsOf(instant, {
    timeZone: timeZone ?? undefined,
    weekday: 'long',
    month: 'long',
    day: 'numeric',
    hour: 'numeric',
    minute: '2-digit',
    hour12: true,
    timeZoneName: timeZone ? 'short' : undefined,
  });

  const base = `${parts.weekday}, ${parts.month} ${parts.day}, ${parts.hour}:${parts.minute} ${parts.dayPeriod}`;
  return parts.timeZoneName ? `${base} ${parts.timeZoneName}` : base;
}

/**
 * Start of the current hour as the forecast API writes local times:
 * `YYYY-MM-DDTHH:00`.
 */
export function localHourStamp({ instant, timeZone }: DisplayTime): string {
  const parts = partsOf(instant, {
    timeZone: timeZone ?? undefined,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    hourCycle: 'h23',
  });

  return `${parts.year}-${parts.month}-${parts.day}T${parts.hour}:00`;
}
