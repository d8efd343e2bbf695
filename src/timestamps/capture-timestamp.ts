/**
 * Naive local capture timestamps.
 *
 * EXIF date tags carry no zone, so timestamps are plain calendar fields.
 * Arithmetic goes through UTC epoch values to stay clear of the host's
 * daylight-saving transitions.
 */

export interface CalendarDate {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
}

export interface CaptureTimestamp extends CalendarDate {
  hour: number;
  minute: number;
  second: number;
}

const EXIF_TIMESTAMP_PATTERN = /^(\d{4}):(\d{2}):(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

export const MS_PER_MINUTE = 60_000;
export const MS_PER_DAY = 86_400_000;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

export function isValidCalendarDate(date: CalendarDate): boolean {
  if (![date.year, date.month, date.day].every(Number.isInteger)) {
    return false;
  }
  const probe = new Date(Date.UTC(date.year, date.month - 1, date.day));
  return (
    probe.getUTCFullYear() === date.year &&
    probe.getUTCMonth() === date.month - 1 &&
    probe.getUTCDate() === date.day
  );
}

export function isValidTimestamp(timestamp: CaptureTimestamp): boolean {
  return (
    isValidCalendarDate(timestamp) &&
    Number.isInteger(timestamp.hour) &&
    Number.isInteger(timestamp.minute) &&
    Number.isInteger(timestamp.second) &&
    timestamp.hour >= 0 &&
    timestamp.hour <= 23 &&
    timestamp.minute >= 0 &&
    timestamp.minute <= 59 &&
    timestamp.second >= 0 &&
    timestamp.second <= 59
  );
}

/**
 * Milliseconds since the epoch, reading the fields as UTC
 */
export function toEpochMillis(timestamp: CaptureTimestamp): number {
  return Date.UTC(
    timestamp.year,
    timestamp.month - 1,
    timestamp.day,
    timestamp.hour,
    timestamp.minute,
    timestamp.second
  );
}

export function fromEpochMillis(millis: number): CaptureTimestamp {
  const date = new Date(millis);
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    hour: date.getUTCHours(),
    minute: date.getUTCMinutes(),
    second: date.getUTCSeconds()
  };
}

export function startOfDay(date: CalendarDate): CaptureTimestamp {
  return { year: date.year, month: date.month, day: date.day, hour: 0, minute: 0, second: 0 };
}

export function datePart(timestamp: CaptureTimestamp): CalendarDate {
  return { year: timestamp.year, month: timestamp.month, day: timestamp.day };
}

/**
 * 0 = Monday ... 6 = Sunday
 */
export function weekdayIndex(date: CalendarDate): number {
  const sundayBased = new Date(Date.UTC(date.year, date.month - 1, date.day)).getUTCDay();
  return (sundayBased + 6) % 7;
}

export function isWeekday(date: CalendarDate): boolean {
  return weekdayIndex(date) <= 4;
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return toEpochMillis(startOfDay(a)) - toEpochMillis(startOfDay(b));
}

/**
 * "YYYY:MM:DD HH:MM:SS", the EXIF DateTime layout
 */
export function formatExifTimestamp(timestamp: CaptureTimestamp): string {
  return (
    `${pad(timestamp.year, 4)}:${pad(timestamp.month)}:${pad(timestamp.day)} ` +
    `${pad(timestamp.hour)}:${pad(timestamp.minute)}:${pad(timestamp.second)}`
  );
}

/**
 * "YYYY:MM:DD", used for provenance keys
 */
export function formatExifDate(date: CalendarDate): string {
  return `${pad(date.year, 4)}:${pad(date.month)}:${pad(date.day)}`;
}

export function parseExifTimestamp(value: string): CaptureTimestamp | null {
  const match = EXIF_TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, year, month, day, hour, minute, second] = match;
  const timestamp: CaptureTimestamp = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second)
  };

  return isValidTimestamp(timestamp) ? timestamp : null;
}

/**
 * Read the local calendar fields of a JS Date (form inputs, "now")
 */
export function fromLocalDate(date: Date): CaptureTimestamp {
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
    hour: date.getHours(),
    minute: date.getMinutes(),
    second: date.getSeconds()
  };
}
