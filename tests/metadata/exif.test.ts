import type { Tags } from 'exiftool-vendored';
import { afterAll, describe, expect, it } from 'vitest';

import { COORDINATE_TOLERANCE } from '../../src/metadata/coordinates.js';
import {
  buildExifDirectories,
  closeExifTool,
  formatRationalTriple,
  readCaptureMetadata,
  recordFromTags,
  toGpsTags,
  writeCaptureMetadata,
  type MetadataRecord
} from '../../src/metadata/exif.js';
import { EncodingError } from '../../src/lib/errors.js';
import {
  createAlphaPng,
  createGreyscaleJpeg,
  createPalettePng,
  createTestImage,
  containsUint32Sequence,
  getImageInfo,
  getRawExif
} from '../helpers/test-images.js';

const TIMESTAMP = { year: 2024, month: 1, day: 5, hour: 9, minute: 30, second: 15 };

describe('capture metadata', () => {
  describe('buildExifDirectories', () => {
    it('sets all three date tags to the same value', () => {
      const directories = buildExifDirectories({ timestamp: TIMESTAMP, location: null });

      expect(directories).toEqual({
        IFD0: { DateTime: '2024:01:05 09:30:15' },
        IFD2: {
          DateTimeOriginal: '2024:01:05 09:30:15',
          DateTimeDigitized: '2024:01:05 09:30:15'
        }
      });
    });

    it('adds the GPS directory only when a location is present', () => {
      const withGps = buildExifDirectories({
        timestamp: null,
        location: { latitude: -33.865143, longitude: 151.209295 }
      });

      expect(Object.keys(withGps)).toEqual(['IFD3']);
      expect(Object.keys(withGps.IFD3 ?? {}).sort()).toEqual([
        'GPSLatitude',
        'GPSLatitudeRef',
        'GPSLongitude',
        'GPSLongitudeRef'
      ]);
      expect(buildExifDirectories({ timestamp: null, location: null })).toEqual({});
    });

    it('rejects impossible timestamps', () => {
      expect(() =>
        buildExifDirectories({ timestamp: { ...TIMESTAMP, month: 2, day: 30 }, location: null })
      ).toThrow(RangeError);
    });
  });

  describe('toGpsTags', () => {
    it('writes the codec rationals with hemisphere references', () => {
      expect(toGpsTags({ latitude: 38.8126, longitude: -90.8554 })).toEqual({
        GPSLatitude: '38/1 48/1 453600/10000',
        GPSLatitudeRef: 'N',
        GPSLongitude: '90/1 51/1 194400/10000',
        GPSLongitudeRef: 'W'
      });
    });

    it('uses the southern and eastern references', () => {
      const tags = toGpsTags({ latitude: -33.865143, longitude: 151.209295 });

      expect(tags.GPSLatitudeRef).toBe('S');
      expect(tags.GPSLongitudeRef).toBe('E');
      expect(tags.GPSLatitude).toMatch(/^33\/1 51\/1 \d+\/10000$/);
      expect(tags.GPSLongitude).toMatch(/^151\/1 12\/1 \d+\/10000$/);
    });

    it('treats the equator and prime meridian as north and east', () => {
      expect(toGpsTags({ latitude: 0, longitude: 0 })).toEqual({
        GPSLatitude: '0/1 0/1 0/10000',
        GPSLatitudeRef: 'N',
        GPSLongitude: '0/1 0/1 0/10000',
        GPSLongitudeRef: 'E'
      });
    });

    it('rejects out-of-range coordinates', () => {
      expect(() => toGpsTags({ latitude: 91, longitude: 0 })).toThrow(RangeError);
      expect(() => toGpsTags({ latitude: 0, longitude: -181 })).toThrow(RangeError);
    });
  });

  describe('formatRationalTriple', () => {
    it('renders degrees and minutes over 1 and seconds over the codec denominator', () => {
      expect(
        formatRationalTriple({
          degrees: 12,
          minutes: 3,
          seconds: { numerator: 45678, denominator: 10000 },
          hemisphere: 'E'
        })
      ).toBe('12/1 3/1 45678/10000');
    });
  });

  describe('recordFromTags', () => {
    it('signs coordinates from spelled-out references and rounds to 4 places', () => {
      const tags: Tags = {
        DateTimeOriginal: '2023:07:04 10:11:12',
        GPSLatitude: 38.81261,
        GPSLatitudeRef: 'North',
        GPSLongitude: 90.85541,
        GPSLongitudeRef: 'West'
      };

      expect(recordFromTags(tags)).toEqual({
        timestamp: { year: 2023, month: 7, day: 4, hour: 10, minute: 11, second: 12 },
        location: { latitude: 38.8126, longitude: -90.8554 }
      });
    });

    it('falls back to CreateDate when DateTimeOriginal is missing', () => {
      const tags: Tags = { CreateDate: '2022:12:31 23:59:59' };

      expect(recordFromTags(tags)).toEqual({
        timestamp: { year: 2022, month: 12, day: 31, hour: 23, minute: 59, second: 59 },
        location: null
      });
    });

    it('keeps a partial record with GPS only', () => {
      const tags: Tags = { GPSLatitude: 10, GPSLatitudeRef: 'S', GPSLongitude: 20 };

      expect(recordFromTags(tags)).toEqual({
        timestamp: null,
        location: { latitude: -10, longitude: 20 }
      });
    });

    it('returns null when neither date nor GPS is usable', () => {
      const tags: Tags = { DateTimeOriginal: '0000:00:00 00:00:00', GPSLatitude: 12 };

      expect(recordFromTags(tags)).toBeNull();
    });
  });

  describe('writeCaptureMetadata / readCaptureMetadata', () => {
    it('round-trips a timestamp and location', async () => {
      const record: MetadataRecord = {
        timestamp: TIMESTAMP,
        location: { latitude: 38.8126, longitude: -90.8554 }
      };

      const stamped = await writeCaptureMetadata(await createTestImage(), record);
      const readBack = await readCaptureMetadata(stamped);

      expect(readBack?.timestamp).toEqual(TIMESTAMP);
      expect(readBack?.location?.latitude).toBeCloseTo(38.8126, 4);
      expect(Math.abs((readBack?.location?.latitude ?? 0) - 38.8126)).toBeLessThan(
        COORDINATE_TOLERANCE
      );
      expect(Math.abs((readBack?.location?.longitude ?? 0) + 90.8554)).toBeLessThan(
        COORDINATE_TOLERANCE
      );
    });

    it('stores the GPS seconds over the codec denominator without reducing them', async () => {
      const stamped = await writeCaptureMetadata(await createTestImage(), {
        timestamp: TIMESTAMP,
        location: { latitude: 38.8126, longitude: -90.8554 }
      });
      const exif = await getRawExif(stamped);

      expect(exif).toBeDefined();
      const raw = exif ?? Buffer.alloc(0);
      expect(containsUint32Sequence(raw, [38, 1, 48, 1, 453600, 10000])).toBe(true);
      expect(containsUint32Sequence(raw, [90, 1, 51, 1, 194400, 10000])).toBe(true);
      // exiftool's own rationalization would have stored 1134/25
      expect(containsUint32Sequence(raw, [1134, 25])).toBe(false);
    });

    it('round-trips southern and eastern coordinates', async () => {
      const stamped = await writeCaptureMetadata(await createTestImage(), {
        timestamp: TIMESTAMP,
        location: { latitude: -33.865143, longitude: 151.209295 }
      });
      const readBack = await readCaptureMetadata(stamped);

      expect(Math.abs((readBack?.location?.latitude ?? 0) + 33.865143)).toBeLessThan(
        COORDINATE_TOLERANCE
      );
      expect(Math.abs((readBack?.location?.longitude ?? 0) - 151.209295)).toBeLessThan(
        COORDINATE_TOLERANCE
      );
    });

    it('omits the GPS block when only a timestamp is given', async () => {
      const stamped = await writeCaptureMetadata(await createTestImage(), {
        timestamp: TIMESTAMP,
        location: null
      });

      expect(await readCaptureMetadata(stamped)).toEqual({ timestamp: TIMESTAMP, location: null });
    });

    it('returns null for an image without embedded metadata', async () => {
      expect(await readCaptureMetadata(await createTestImage())).toBeNull();
    });

    it('returns null for bytes that are not an image', async () => {
      expect(await readCaptureMetadata(Buffer.from('definitely not a jpeg'))).toBeNull();
    });

    it('drops metadata carried by the source image', async () => {
      const first = await writeCaptureMetadata(await createTestImage(), {
        timestamp: TIMESTAMP,
        location: { latitude: 10, longitude: 10 }
      });
      const restamped = await writeCaptureMetadata(first, {
        timestamp: { ...TIMESTAMP, day: 6 },
        location: null
      });

      expect(await readCaptureMetadata(restamped)).toEqual({
        timestamp: { ...TIMESTAMP, day: 6 },
        location: null
      });
    });

    it('normalizes alpha-channel input to an RGB JPEG', async () => {
      const stamped = await writeCaptureMetadata(await createAlphaPng(), {
        timestamp: TIMESTAMP,
        location: null
      });
      const info = await getImageInfo(stamped);

      expect(info.format).toBe('jpeg');
      expect(info.hasAlpha).toBe(false);
      expect(info.channels).toBe(3);
    });

    it('normalizes indexed and greyscale input to sRGB', async () => {
      for (const source of [await createPalettePng(), await createGreyscaleJpeg()]) {
        const stamped = await writeCaptureMetadata(source, { timestamp: TIMESTAMP, location: null });
        const info = await getImageInfo(stamped);

        expect(info.format).toBe('jpeg');
        expect(info.space).toBe('srgb');
        expect(info.channels).toBe(3);
      }
    });

    it('preserves image dimensions', async () => {
      const stamped = await writeCaptureMetadata(await createTestImage({ width: 120, height: 80 }), {
        timestamp: null,
        location: { latitude: 1, longitude: 2 }
      });
      const info = await getImageInfo(stamped);

      expect(info.width).toBe(120);
      expect(info.height).toBe(80);
    });

    it('fails with EncodingError for undecodable input', async () => {
      await expect(
        writeCaptureMetadata(Buffer.from('truncated garbage'), { timestamp: TIMESTAMP, location: null })
      ).rejects.toBeInstanceOf(EncodingError);
    });

    it('fails with EncodingError for a truncated JPEG', async () => {
      const jpeg = await createTestImage({ width: 200, height: 200 });
      const truncated = jpeg.subarray(0, Math.floor(jpeg.length / 2));

      await expect(
        writeCaptureMetadata(truncated, { timestamp: TIMESTAMP, location: null })
      ).rejects.toBeInstanceOf(EncodingError);
    });
  });

  afterAll(async () => {
    // Clean shutdown of ExifTool worker process
    await closeExifTool();
  });
});
