/**
 * Capture Metadata Writer / Reader
 *
 * Embeds a synthetic capture timestamp and GPS position into a JPEG and
 * reads them back from arbitrary uploads.
 *
 * Writing is a single sharp pass: decode, flatten alpha, convert indexed /
 * grey / CMYK colour to sRGB and re-encode a baseline JPEG carrying only
 * the EXIF directories built here (anything the upload carried is
 * dropped). GPS angles are handed to libvips as "n/d n/d n/d" rational
 * strings, so the file stores the codec's rationals unreduced.
 *
 * Reading goes through exiftool, which only works on files, so buffers
 * pass through short-lived temp files.
 */

import { randomBytes } from 'node:crypto';
import { rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { ExifDateTime, ExifTool, type Tags } from 'exiftool-vendored';
import sharp from 'sharp';

import {
  LATITUDE_HEMISPHERES,
  LONGITUDE_HEMISPHERES,
  applyHemisphere,
  isValidCoordinate,
  toSexagesimal,
  type GeoCoordinate,
  type SexagesimalAngle
} from './coordinates.js';
import { env } from '../config/index.js';
import { EncodingError, describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import {
  type CaptureTimestamp,
  formatExifTimestamp,
  isValidTimestamp,
  parseExifTimestamp
} from '../timestamps/capture-timestamp.js';

/**
 * Logical payload embedded in one output image
 */
export interface MetadataRecord {
  timestamp: CaptureTimestamp | null;
  location: GeoCoordinate | null;
}

export interface WriteOptions {
  /** JPEG quality, 1-100 */
  quality?: number;
}

export type MetadataStamper = (
  imageBuffer: Buffer,
  record: MetadataRecord,
  options?: WriteOptions
) => Promise<Buffer>;

/**
 * Tags written for the GPS block, rationals in libvips string form
 */
export interface GpsTags {
  GPSLatitude: string;
  GPSLatitudeRef: 'N' | 'S';
  GPSLongitude: string;
  GPSLongitudeRef: 'E' | 'W';
}

/**
 * EXIF directories by libvips IFD number: 0 = image, 2 = Exif, 3 = GPS
 */
export interface ExifDirectories {
  IFD0?: Record<string, string>;
  IFD2?: Record<string, string>;
  IFD3?: Record<string, string>;
}

/** Flatten transparent pixels onto white */
const FLATTEN_BACKGROUND = { r: 255, g: 255, b: 255 };

const READ_PLACES = 4;

/**
 * Singleton exiftool instance
 */
let exiftool: ExifTool | null = null;

function getExifTool(): ExifTool {
  if (!exiftool) {
    exiftool = new ExifTool({ taskTimeoutMillis: env.EXIFTOOL_TASK_TIMEOUT_MS });
  }
  return exiftool;
}

/**
 * Close exiftool instance (call on shutdown)
 */
export async function closeExifTool(): Promise<void> {
  if (exiftool) {
    await exiftool.end();
    exiftool = null;
  }
}

function tempPath(purpose: string, extension: string): string {
  return join(tmpdir(), `geophoto-${purpose}-${randomBytes(8).toString('hex')}${extension}`);
}

/**
 * "deg/1 min/1 num/den"
 */
export function formatRationalTriple(angle: SexagesimalAngle): string {
  const { degrees, minutes, seconds } = angle;
  return `${degrees}/1 ${minutes}/1 ${seconds.numerator}/${seconds.denominator}`;
}

/**
 * Encode a coordinate as EXIF GPS tags
 */
export function toGpsTags(location: GeoCoordinate): GpsTags {
  if (!isValidCoordinate(location)) {
    throw new RangeError(
      `Coordinate out of range: ${location.latitude}, ${location.longitude}`
    );
  }

  const latitude = toSexagesimal(location.latitude, LATITUDE_HEMISPHERES);
  const longitude = toSexagesimal(location.longitude, LONGITUDE_HEMISPHERES);

  return {
    GPSLatitude: formatRationalTriple(latitude),
    GPSLatitudeRef: latitude.hemisphere === 'S' ? 'S' : 'N',
    GPSLongitude: formatRationalTriple(longitude),
    GPSLongitudeRef: longitude.hemisphere === 'W' ? 'W' : 'E'
  };
}

/**
 * Build the EXIF directories for a record; empty when it carries nothing
 */
export function buildExifDirectories(record: MetadataRecord): ExifDirectories {
  const directories: ExifDirectories = {};

  if (record.timestamp) {
    if (!isValidTimestamp(record.timestamp)) {
      throw new RangeError('Capture timestamp is not a valid calendar timestamp');
    }
    const value = formatExifTimestamp(record.timestamp);
    directories.IFD0 = { DateTime: value };
    directories.IFD2 = { DateTimeOriginal: value, DateTimeDigitized: value };
  }

  if (record.location) {
    directories.IFD3 = { ...toGpsTags(record.location) };
  }

  return directories;
}

/**
 * Decode, normalize to an RGB JPEG and embed `exif` in place of any
 * inherited metadata
 */
export async function normalizeToJpeg(
  imageBuffer: Buffer,
  quality: number,
  exif: ExifDirectories = {}
): Promise<Buffer> {
  try {
    let pipeline = sharp(imageBuffer)
      .flatten({ background: FLATTEN_BACKGROUND })
      .toColourspace('srgb')
      .jpeg({ quality });

    if (Object.keys(exif).length > 0) {
      pipeline = pipeline.withExif(exif);
    }
    return await pipeline.toBuffer();
  } catch (error) {
    throw new EncodingError(`Image could not be re-encoded as JPEG: ${describeError(error)}`, {
      cause: error
    });
  }
}

/**
 * Produce a JPEG carrying the record's timestamp and GPS block
 *
 * The GPS block is omitted entirely when `record.location` is null.
 * Original buffer is not modified.
 *
 * @throws EncodingError when the image cannot be decoded or re-encoded
 */
export async function writeCaptureMetadata(
  imageBuffer: Buffer,
  record: MetadataRecord,
  options: WriteOptions = {}
): Promise<Buffer> {
  const exif = buildExifDirectories(record);
  return normalizeToJpeg(imageBuffer, options.quality ?? env.JPEG_QUALITY, exif);
}

function toCaptureTimestamp(value: unknown): CaptureTimestamp | null {
  if (value instanceof ExifDateTime) {
    const timestamp: CaptureTimestamp = {
      year: value.year,
      month: value.month,
      day: value.day,
      hour: value.hour,
      minute: value.minute,
      second: value.second
    };
    return isValidTimestamp(timestamp) ? timestamp : null;
  }
  if (typeof value === 'string') {
    return parseExifTimestamp(value);
  }
  return null;
}

function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

/**
 * Map raw exiftool tags onto a record; null when neither field is present
 */
export function recordFromTags(tags: Tags): MetadataRecord | null {
  const timestamp =
    toCaptureTimestamp(tags.DateTimeOriginal) ??
    toCaptureTimestamp(tags.CreateDate) ??
    toCaptureTimestamp(tags.ModifyDate);

  let location: GeoCoordinate | null = null;
  if (typeof tags.GPSLatitude === 'number' && typeof tags.GPSLongitude === 'number') {
    const candidate = {
      latitude: roundTo(applyHemisphere(tags.GPSLatitude, tags.GPSLatitudeRef), READ_PLACES),
      longitude: roundTo(applyHemisphere(tags.GPSLongitude, tags.GPSLongitudeRef), READ_PLACES)
    };
    location = isValidCoordinate(candidate) ? candidate : null;
  }

  if (timestamp === null && location === null) {
    return null;
  }
  return { timestamp, location };
}

/**
 * Read the capture timestamp and GPS position of an arbitrary upload
 *
 * Returns null when the image carries neither. Unreadable or malformed
 * metadata also yields null: grouping is best-effort, so a parse failure
 * only means the file is treated as ungrouped.
 */
export async function readCaptureMetadata(imageBuffer: Buffer): Promise<MetadataRecord | null> {
  const tool = getExifTool();
  const tempFile = tempPath('read', '.tmp');

  try {
    await writeFile(tempFile, imageBuffer);
    const tags = await tool.read(tempFile);
    return recordFromTags(tags);
  } catch (error) {
    logger.debug({ error: describeError(error) }, 'Unreadable metadata, treating file as ungrouped');
    return null;
  } finally {
    await rm(tempFile, { force: true });
  }
}
