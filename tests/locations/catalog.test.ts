import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import {
  findLocation,
  loadLocationCatalog,
  manualLocation,
  MANUAL_LOCATION_NAME,
  parseLocationCatalog,
  pickLocation
} from '../../src/locations/catalog.js';

describe('location catalog', () => {
  it('loads the bundled catalog in file order', async () => {
    const catalog = await loadLocationCatalog();

    expect(catalog).toHaveLength(21);
    expect(catalog[0]).toEqual({ name: 'Wentzville, MO', latitude: 38.8126, longitude: -90.8554 });
    expect(Object.isFrozen(catalog)).toBe(true);
  });

  it('loads a catalog from an explicit path', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'geophoto-catalog-'));
    try {
      const path = join(dir, 'locations.json');
      await writeFile(path, JSON.stringify({ 'Eureka, MO': [38.5026, -90.6279] }));

      const catalog = await loadLocationCatalog(path);
      expect(catalog).toEqual([{ name: 'Eureka, MO', latitude: 38.5026, longitude: -90.6279 }]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('rejects empty catalogs and out-of-range coordinates', () => {
    expect(() => parseLocationCatalog({})).toThrow(ZodError);
    expect(() => parseLocationCatalog({ Nowhere: [95, 0] })).toThrow(ZodError);
    expect(() => parseLocationCatalog({ Nowhere: [0] })).toThrow(ZodError);
  });

  it('finds locations by exact name', () => {
    const catalog = parseLocationCatalog({ 'Troy, MO': [38.9792, -90.9807] });

    expect(findLocation(catalog, 'Troy, MO')?.latitude).toBe(38.9792);
    expect(findLocation(catalog, 'troy, mo')).toBeUndefined();
  });

  it('validates manual locations', () => {
    expect(manualLocation(10, 20)).toEqual({ name: MANUAL_LOCATION_NAME, latitude: 10, longitude: 20 });
    expect(manualLocation(-10, 20, '  Job Site  ').name).toBe('Job Site');
    expect(() => manualLocation(-91, 0)).toThrow(ZodError);
    expect(() => manualLocation(0, 180.5)).toThrow(ZodError);
    expect(() => manualLocation(Number.NaN, 0)).toThrow(ZodError);
  });

  it('picks uniformly by index', () => {
    const catalog = parseLocationCatalog({ A: [1, 1], B: [2, 2], C: [3, 3] });

    expect(pickLocation(catalog, () => 0).name).toBe('A');
    expect(pickLocation(catalog, () => 0.5).name).toBe('B');
    expect(pickLocation(catalog, () => 0.9999).name).toBe('C');
    expect(() => pickLocation([], () => 0)).toThrow(RangeError);
  });
});
