import { addMinutes, getDaysInMonth, isValid } from 'date-fns';

const RFC3339_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(\.\d+)?(Z|[+-](\d{2}):(\d{2}))$/;
const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

// 23h59m past midnight: the last minute of the day is the inclusive bound.
const END_OF_DAY_OFFSET_MINUTES = 23 * 60 + 59;

/**
 * RFC 3339 timestamp with an explicit offset, or null. Out-of-range fields
 * (2024-02-30, 24:00, +25:00) are rejected rather than rolled over.
 */
export function parseRfc3339(value: string): Date | null {
  const match = RFC3339_PATTERN.exec(value);

  if (!match) {
    return null;
  }

  const [, year, month, day, hour, minute, second] = match.map(Number);
  const offsetHour = match[9] === undefined ? 0 : Number(match[9]);
  const offsetMinute = match[10] === undefined ? 0 : Number(match[10]);

  if (
    month < 1 ||
    month > 12 ||
    day < 1 ||
    day > getDaysInMonth(new Date(year, month - 1, 1)) ||
    hour > 23 ||
    minute > 59 ||
    second > 59 ||
    offsetHour > 23 ||
    offsetMinute > 59
  ) {
    return null;
  }

  const date = new Date(value);
  return isValid(date) ? date : null;
}

/**
 * Parse-or-omit: a malformed value yields `undefined`, so callers drop the
 * field instead of failing the request. Every permissive field goes through
 * here.
 */
export function parseTimestampOrOmit(
  value: string | undefined,
): Date | undefined {
  if (value === undefined) {
    return undefined;
  }

  return parseRfc3339(value) ?? undefined;
}

/** `YYYY-MM-DD` as midnight UTC. Impossible dates (2024-02-30) are rejected. */
export function parseCalendarDate(value: string): Date | null {
  if (!CALENDAR_DATE_PATTERN.test(value)) {
    return null;
  }

  const date = new Date(`${value}T00:00:00.000Z`);

  if (!isValid(date) || date.toISOString().slice(0, 10) !== value) {
    return null;
  }

  return date;
}

export function endOfDayBound(day: Date): Date {
  return addMinutes(day, END_OF_DAY_OFFSET_MINUTES);
}
