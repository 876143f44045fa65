import { InvalidTimestampError } from './errors.js';

const ISO_DATE_TIME_RE = /^(\d{4})-(\d{2})-(\d{2}) (\d{1,2}):(\d{2}):(\d{2})$/;

const WEEKDAY_DATE_TIME_RE =
  /^(Mon|Tue|Wed|Thu|Fri|Sat|Sun) +(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec) +(\d{1,2}) +(\d{1,2}):(\d{2}):(\d{2}) +(\d{4})$/;

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

type DateParts = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
};

function partsInRange(parts: DateParts): boolean {
  return (
    parts.month >= 0 &&
    parts.month <= 11 &&
    parts.day >= 1 &&
    parts.day <= 31 &&
    parts.hour <= 23 &&
    parts.minute <= 59 &&
    parts.second <= 59
  );
}

/**
 * Parses `YYYY-MM-DD H:MM:SS` (surrounding whitespace ignored) as UTC and
 * returns whole epoch seconds.
 */
export function parseIsoDateTime(text: string): number {
  const match = ISO_DATE_TIME_RE.exec(text.trim());
  if (!match) {
    throw new InvalidTimestampError(text);
  }

  const [, year, month, day, hour, minute, second] = match.map(Number);
  const parts: DateParts = { year, month: month - 1, day, hour, minute, second };
  if (!partsInRange(parts)) {
    throw new InvalidTimestampError(text);
  }

  const date = new Date(Date.UTC(year, parts.month, day, hour, minute, second));
  // Date.UTC rolls Feb 30 over into March; reject instead.
  if (date.getUTCMonth() !== parts.month || date.getUTCDate() !== day) {
    throw new InvalidTimestampError(text);
  }
  return Math.floor(date.getTime() / 1000);
}

/**
 * Parses the `Mon Jan 2 15:04:05 2006` form written by OpenVPN clients,
 * interpreted in the local time zone of the process. The weekday name is
 * required but not checked against the date.
 */
export function parseWeekdayDateTime(text: string): number {
  const match = WEEKDAY_DATE_TIME_RE.exec(text);
  if (!match) {
    throw new InvalidTimestampError(text);
  }

  const [, , monthName, day, hour, minute, second, year] = match;
  const parts: DateParts = {
    year: Number(year),
    month: MONTHS.indexOf(monthName),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second)
  };
  if (!partsInRange(parts)) {
    throw new InvalidTimestampError(text);
  }

  const date = new Date(parts.year, parts.month, parts.day, parts.hour, parts.minute, parts.second);
  if (date.getMonth() !== parts.month || date.getDate() !== parts.day) {
    throw new InvalidTimestampError(text);
  }
  return Math.floor(date.getTime() / 1000);
}
