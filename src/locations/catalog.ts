/**
 * Preset location catalog and manual location entry
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

import { env } from '../config/index.js';
import { logger } from '../lib/logger.js';
import { LocationCatalogFileSchema, NamedLocationSchema } from '../lib/validation.js';
import type { RandomSource } from '../timestamps/generator.js';

export interface NamedLocation {
  name: string;
  latitude: number;
  longitude: number;
}

/**
 * Read-only, ordered list of named locations. The first entry is the default.
 */
export type LocationCatalog = readonly NamedLocation[];

export const DEFAULT_CATALOG_PATH = fileURLToPath(
  new URL('../../config/locations.json', import.meta.url)
);

export const MANUAL_LOCATION_NAME = 'Custom Location';

/**
 * Build a catalog from the file layout `{ "<name>": [lat, lng] }`
 */
export function parseLocationCatalog(raw: unknown): LocationCatalog {
  const entries = LocationCatalogFileSchema.parse(raw);
  return Object.freeze(
    Object.entries(entries).map(([name, [latitude, longitude]]) =>
      Object.freeze({ name, latitude, longitude })
    )
  );
}

/**
 * Load the catalog from disk
 *
 * @param path - Defaults to LOCATION_CATALOG_PATH, then the bundled catalog
 */
export async function loadLocationCatalog(path?: string): Promise<LocationCatalog> {
  const source = path ?? env.LOCATION_CATALOG_PATH ?? DEFAULT_CATALOG_PATH;
  const content = await readFile(source, 'utf-8');
  const catalog = parseLocationCatalog(JSON.parse(content));

  logger.debug({ source, locations: catalog.length }, 'Location catalog loaded');
  return catalog;
}

export function findLocation(catalog: LocationCatalog, name: string): NamedLocation | undefined {
  return catalog.find(location => location.name === name);
}

/**
 * Validated, user-entered location
 */
export function manualLocation(
  latitude: number,
  longitude: number,
  name: string = MANUAL_LOCATION_NAME
): NamedLocation {
  return NamedLocationSchema.parse({ name, latitude, longitude });
}

/**
 * Uniform choice over the catalog
 */
export function pickLocation(catalog: LocationCatalog, random: RandomSource = Math.random): NamedLocation {
  if (catalog.length === 0) {
    throw new RangeError('Cannot pick from an empty location catalog');
  }
  const index = Math.min(Math.floor(random() * catalog.length), catalog.length - 1);
  return catalog[index];
}
