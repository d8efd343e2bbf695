/**
 * Synthetic capture timestamp policies.
 *
 * Both random policies draw a uniform instant over an inclusive range of
 * calendar days and then overwrite the hour and minute so the shot lands
 * inside business hours. The second is kept from the drawn instant.
 */

import { InvalidRangeError } from '../lib/errors.js';
import {
  MS_PER_DAY,
  MS_PER_MINUTE,
  type CalendarDate,
  type CaptureTimestamp,
  compareDates,
  formatExifDate,
  fromEpochMillis,
  isValidCalendarDate,
  isValidTimestamp,
  isWeekday,
  startOfDay,
  toEpochMillis
} from './capture-timestamp.js';

/**
 * Uniform source in [0, 1)
 */
export type RandomSource = () => number;

export interface BusinessHours {
  /** First eligible hour, inclusive */
  startHour: number;
  /** Last eligible hour, inclusive */
  endHour: number;
}

export interface GeneratorOptions {
  random?: RandomSource;
  businessHours?: BusinessHours;
}

export interface WeekdayGeneratorOptions extends GeneratorOptions {
  /** Upper bound on rejection-sampling draws */
  maxAttempts?: number;
}

export const DEFAULT_BUSINESS_HOURS: BusinessHours = { startHour: 8, endHour: 18 };
export const DEFAULT_MAX_WEEKDAY_ATTEMPTS = 1000;

/**
 * Uniform integer in [min, max]
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

function assertRange(start: CalendarDate, end: CalendarDate): void {
  if (!isValidCalendarDate(start) || !isValidCalendarDate(end)) {
    throw new InvalidRangeError('Date range contains an invalid calendar date');
  }
  if (compareDates(end, start) < 0) {
    throw new InvalidRangeError(
      `Range end ${formatExifDate(end)} is before start ${formatExifDate(start)}`
    );
  }
}

function assertBusinessHours(hours: BusinessHours): void {
  const { startHour, endHour } = hours;
  if (
    !Number.isInteger(startHour) ||
    !Number.isInteger(endHour) ||
    startHour < 0 ||
    endHour > 23 ||
    startHour > endHour
  ) {
    throw new InvalidRangeError(`Invalid business hours ${startHour}-${endHour}`);
  }
}

/**
 * Uniform instant over [start 00:00:00, end 23:59:59]
 */
function drawInstant(start: CalendarDate, end: CalendarDate, random: RandomSource): CaptureTimestamp {
  const from = toEpochMillis(startOfDay(start));
  const spanSeconds = (toEpochMillis(startOfDay(end)) - from + MS_PER_DAY) / 1000;
  const offsetSeconds = Math.floor(random() * spanSeconds);
  return fromEpochMillis(from + offsetSeconds * 1000);
}

function withBusinessTime(
  instant: CaptureTimestamp,
  random: RandomSource,
  hours: BusinessHours
): CaptureTimestamp {
  return {
    ...instant,
    hour: randomInt(random, hours.startHour, hours.endHour),
    minute: randomInt(random, 0, 59)
  };
}

/**
 * Random business-hours timestamp on any day in the inclusive range
 */
export function uniformInRange(
  start: CalendarDate,
  end: CalendarDate,
  options: GeneratorOptions = {}
): CaptureTimestamp {
  const random = options.random ?? Math.random;
  const hours = options.businessHours ?? DEFAULT_BUSINESS_HOURS;
  assertRange(start, end);
  assertBusinessHours(hours);

  return withBusinessTime(drawInstant(start, end, random), random, hours);
}

/**
 * Whether any Monday-Friday falls inside the inclusive range
 */
export function rangeContainsWeekday(start: CalendarDate, end: CalendarDate): boolean {
  const first = toEpochMillis(startOfDay(start));
  const last = toEpochMillis(startOfDay(end));
  // Any 7 consecutive days hold a weekday, so at most 7 probes are needed.
  for (let day = 0; day < 7 && first + day * MS_PER_DAY <= last; day++) {
    if (isWeekday(fromEpochMillis(first + day * MS_PER_DAY))) {
      return true;
    }
  }
  return false;
}

/**
 * Random business-hours timestamp on a Monday-Friday in the inclusive range
 *
 * @throws InvalidRangeError when the range holds no weekday, or when
 *   `maxAttempts` draws all land on a weekend
 */
export function uniformWeekdayInRange(
  start: CalendarDate,
  end: CalendarDate,
  options: WeekdayGeneratorOptions = {}
): CaptureTimestamp {
  const random = options.random ?? Math.random;
  const hours = options.businessHours ?? DEFAULT_BUSINESS_HOURS;
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_WEEKDAY_ATTEMPTS;
  assertRange(start, end);
  assertBusinessHours(hours);

  if (!rangeContainsWeekday(start, end)) {
    throw new InvalidRangeError(
      `Range ${formatExifDate(start)} to ${formatExifDate(end)} contains no weekday`
    );
  }

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const instant = drawInstant(start, end, random);
    if (isWeekday(instant)) {
      return withBusinessTime(instant, random, hours);
    }
  }

  throw new InvalidRangeError(`No weekday drawn after ${maxAttempts} attempts`);
}

/**
 * Deterministic offset for the index-th frame of one session
 */
export function sequentialDrift(
  base: CaptureTimestamp,
  index: number,
  stepMinutes: number
): CaptureTimestamp {
  if (!isValidTimestamp(base)) {
    throw new InvalidRangeError('Base timestamp is not a valid calendar timestamp');
  }
  if (!Number.isInteger(index) || index < 0) {
    throw new RangeError(`Frame index must be a non-negative integer, got ${index}`);
  }
  return fromEpochMillis(toEpochMillis(base) + index * stepMinutes * MS_PER_MINUTE);
}
