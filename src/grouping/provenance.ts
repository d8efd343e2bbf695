/**
 * Provenance grouping.
 *
 * Uploads whose original metadata shares a capture date and a location
 * (rounded to 4 decimals, roughly 11 m) are treated as one shoot and get
 * one synthetic assignment.
 */

import type { GeoCoordinate } from '../metadata/coordinates.js';
import type { MetadataRecord } from '../metadata/exif.js';
import { formatExifDate } from '../timestamps/capture-timestamp.js';

export type ProvenanceGroupKey = string;

export const KEY_SEPARATOR = '_';
const COORDINATE_PLACES = 4;

/**
 * Round to 4 decimals and render in shortest form ("38.8126", "-90", "0")
 */
export function roundCoordinate(value: number): string {
  const factor = 10 ** COORDINATE_PLACES;
  const rounded = Math.round(value * factor) / factor;
  // Collapse -0 so that tiny negative values share a key with 0.
  return String(rounded === 0 ? 0 : rounded);
}

function hasUsableLocation(location: GeoCoordinate | null): location is GeoCoordinate {
  return location !== null && (location.latitude !== 0 || location.longitude !== 0);
}

/**
 * Stable key for a file's original metadata, or null when it cannot be grouped
 */
export function computeGroupKey(record: MetadataRecord | null): ProvenanceGroupKey | null {
  if (record === null) {
    return null;
  }

  const location = hasUsableLocation(record.location) ? record.location : null;
  if (record.timestamp === null && location === null) {
    return null;
  }

  const date = record.timestamp ? formatExifDate(record.timestamp) : '';
  const latitude = roundCoordinate(location?.latitude ?? 0);
  const longitude = roundCoordinate(location?.longitude ?? 0);

  return [date, latitude, longitude].join(KEY_SEPARATOR);
}
