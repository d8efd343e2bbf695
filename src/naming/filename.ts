/**
 * SEO filenames: "<service>-<location>-MM-DD-YYYY[-NN-suffix].jpg"
 */

import type { CalendarDate } from '../timestamps/capture-timestamp.js';

export interface FilenameParts {
  service: string;
  locationName: string;
  date: CalendarDate;
  /** 0-based frame index; rendered 1-based and zero-padded */
  sequenceIndex?: number;
  /** Positional label such as "before", "after" or "action-3" */
  suffix?: string;
}

export const FILENAME_EXTENSION = '.jpg';

/**
 * Replace every non-alphanumeric character with "-", collapse runs and trim
 */
export function slugify(value: string): string {
  return value
    .replace(/[^a-zA-Z0-9]/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^-|-$/g, '');
}

/**
 * MM-DD-YYYY
 */
export function formatFilenameDate(date: CalendarDate): string {
  const month = String(date.month).padStart(2, '0');
  const day = String(date.day).padStart(2, '0');
  return `${month}-${day}-${String(date.year).padStart(4, '0')}`;
}

/**
 * Label for the index-th of `count` frames sampled from one video
 */
export function positionalSuffix(index: number, count: number): string {
  if (index === 0) {
    return 'before';
  }
  if (index === count - 1) {
    return 'after';
  }
  return `action-${index}`;
}

/**
 * Pure function of its inputs; callers needing uniqueness across a batch
 * run the result through a FilenameAllocator.
 */
export function composeFilename(parts: FilenameParts): string {
  const segments = [parts.service, parts.locationName, formatFilenameDate(parts.date)];

  if (parts.sequenceIndex !== undefined) {
    if (!Number.isInteger(parts.sequenceIndex) || parts.sequenceIndex < 0) {
      throw new RangeError(`Sequence index must be a non-negative integer, got ${parts.sequenceIndex}`);
    }
    segments.push(String(parts.sequenceIndex + 1).padStart(2, '0'));
  }
  if (parts.suffix !== undefined) {
    segments.push(parts.suffix);
  }

  return `${slugify(segments.join('-'))}${FILENAME_EXTENSION}`;
}

/**
 * Hands out unique names within one batch.
 *
 * The first request for a name returns it unchanged; repeats get "-2",
 * "-3", ... inserted before the extension.
 */
export class FilenameAllocator {
  private readonly taken = new Set<string>();

  allocate(filename: string): string {
    const stem = filename.endsWith(FILENAME_EXTENSION)
      ? filename.slice(0, -FILENAME_EXTENSION.length)
      : filename;

    let candidate = `${stem}${FILENAME_EXTENSION}`;
    for (let counter = 2; this.taken.has(candidate); counter++) {
      candidate = `${stem}-${counter}${FILENAME_EXTENSION}`;
    }

    this.taken.add(candidate);
    return candidate;
  }

  release(filename: string): void {
    this.taken.delete(filename);
  }

  has(filename: string): boolean {
    return this.taken.has(filename);
  }
}
