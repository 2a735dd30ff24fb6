/**
 * Calendar helpers
 *
 * Dedup keys are built from the calendar day and minute bucket of a value
 * timestamp, evaluated in the configured IANA time zone.
 *
 * @module utils/calendar
 */

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-CA', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

interface ZonedParts {
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
}

function zonedParts(instant: Date, timeZone: string): ZonedParts {
  const parts: ZonedParts = { year: '', month: '', day: '', hour: '', minute: '' };
  for (const part of formatterFor(timeZone).formatToParts(instant)) {
    switch (part.type) {
      case 'year':
        parts.year = part.value;
        break;
      case 'month':
        parts.month = part.value;
        break;
      case 'day':
        parts.day = part.value;
        break;
      case 'hour':
        parts.hour = part.value;
        break;
      case 'minute':
        parts.minute = part.value;
        break;
    }
  }
  return parts;
}

/**
 * Normalize any ISO 8601 instant to UTC `toISOString()` form so stored
 * timestamps compare lexicographically.
 *
 * @throws RangeError for unparseable input
 */
export function normalizeTimestamp(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) {
    throw new RangeError(`Invalid timestamp: ${iso}`);
  }
  return date.toISOString();
}

/**
 * Calendar day (YYYY-MM-DD) of an instant in the given time zone
 */
export function calendarDay(iso: string, timeZone: string): string {
  const { year, month, day } = zonedParts(new Date(iso), timeZone);
  return `${year}-${month}-${day}`;
}

/**
 * HH:mm of an instant in the given time zone
 */
export function localTimeOfDay(iso: string, timeZone: string): string {
  const { hour, minute } = zonedParts(new Date(iso), timeZone);
  return `${hour}:${minute}`;
}

/**
 * Floor an HH:mm value to its bucket of `bucketMinutes`
 */
export function bucketSubDayTime(subDayTime: string, bucketMinutes: number): string {
  const [hours, minutes] = subDayTime.split(':').map((part) => parseInt(part, 10));
  const total = hours * 60 + minutes;
  const floored = total - (total % bucketMinutes);
  const h = Math.floor(floored / 60);
  const m = floored % 60;
  return `${String(h).padStart(2, '0')}:${String(m).padStart(2, '0')}`;
}

const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)(:[0-5]\d(\.\d+)?)?$/;

/**
 * Reduce a remote time of day (HH:mm or HH:mm:ss[.fff]) to HH:mm.
 * Anything else yields undefined.
 */
export function normalizeSubDayTime(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const match = TIME_OF_DAY_PATTERN.exec(value);
  return match ? `${match[1]}:${match[2]}` : undefined;
}
