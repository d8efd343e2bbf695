/**
 * Video frame workflow
 *
 * Samples evenly spaced frames from a decoded video, spreads their capture
 * times with a fixed drift, stamps each with one location and names them
 * before / action-N / after.
 *
 * Decoding is not done here: callers supply a FrameSource backed by
 * whatever decoder they use.
 */

import { env } from '../config/index.js';
import { EncodingError, describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type { NamedLocation } from '../locations/catalog.js';
import {
  writeCaptureMetadata,
  type MetadataRecord,
  type MetadataStamper
} from '../metadata/exif.js';
import { composeFilename, FilenameAllocator, positionalSuffix } from '../naming/filename.js';
import type { CaptureTimestamp } from '../timestamps/capture-timestamp.js';
import { sequentialDrift } from '../timestamps/generator.js';

/**
 * Opaque decoder abstraction
 */
export interface FrameSource {
  readonly totalFrames: number;
  /** Encoded image bytes for a frame position, or null if it cannot be read */
  getFrame(position: number): Promise<Buffer | null>;
}

export interface FrameExtractionOptions {
  service: string;
  location: NamedLocation;
  /** Capture time of the first frame */
  start: CaptureTimestamp;
  frameCount?: number;
  driftMinutes?: number;
  quality?: number;
  /** Defaults to the exiftool-backed writer */
  stamp?: MetadataStamper;
}

export interface FramePhoto {
  filename: string;
  bytes: Buffer;
  /** Index among the sampled positions */
  index: number;
  /** Frame position in the video */
  position: number;
  timestamp: CaptureTimestamp;
}

export interface FrameFailure {
  index: number;
  position: number;
  reason: string;
}

export interface FrameExtractionResult {
  photos: FramePhoto[];
  skipped: number[];
  failures: FrameFailure[];
}

/**
 * `count` evenly spaced integer positions over [0, totalFrames - 1]
 */
export function samplePositions(totalFrames: number, count: number): number[] {
  if (!Number.isInteger(totalFrames) || totalFrames <= 0 || count <= 0) {
    return [];
  }
  if (count === 1) {
    return [0];
  }

  const last = totalFrames - 1;
  const step = last / (count - 1);
  return Array.from({ length: count }, (_, i) => (i === count - 1 ? last : Math.trunc(i * step)));
}

export async function extractFramePhotos(
  source: FrameSource,
  options: FrameExtractionOptions
): Promise<FrameExtractionResult> {
  const frameCount = options.frameCount ?? env.FRAME_SAMPLE_COUNT;
  const driftMinutes = options.driftMinutes ?? env.FRAME_DRIFT_MINUTES;
  const stamp = options.stamp ?? writeCaptureMetadata;
  const positions = samplePositions(source.totalFrames, frameCount);
  const allocator = new FilenameAllocator();

  const result: FrameExtractionResult = { photos: [], skipped: [], failures: [] };

  logger.info(
    { totalFrames: source.totalFrames, frames: positions.length, location: options.location.name },
    'Extracting frame photos'
  );

  for (const [index, position] of positions.entries()) {
    const frame = await source.getFrame(position);
    if (frame === null) {
      result.skipped.push(position);
      continue;
    }

    const timestamp = sequentialDrift(options.start, index, driftMinutes);
    const record: MetadataRecord = {
      timestamp,
      location: { latitude: options.location.latitude, longitude: options.location.longitude }
    };

    try {
      const bytes = await stamp(frame, record, { quality: options.quality });
      const filename = allocator.allocate(
        composeFilename({
          service: options.service,
          locationName: options.location.name,
          date: timestamp,
          sequenceIndex: index,
          suffix: positionalSuffix(index, positions.length)
        })
      );
      result.photos.push({ filename, bytes, index, position, timestamp });
    } catch (error) {
      if (!(error instanceof EncodingError)) {
        throw error;
      }
      logger.warn({ index, position, error: describeError(error) }, 'Frame could not be stamped');
      result.failures.push({ index, position, reason: error.message });
    }
  }

  logger.info(
    {
      photos: result.photos.length,
      skipped: result.skipped.length,
      failures: result.failures.length
    },
    'Frame extraction completed'
  );
  return result;
}
