/**
 * Photo Batch Service
 * Stamps a batch of uploaded photos with grouped synthetic capture metadata
 */

import type { Assignment, BatchAssigner } from '../batch/assigner.js';
import { env } from '../config/index.js';
import { EncodingError, EngineError, describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { validateImageSize } from '../lib/validation.js';
import { writeCaptureMetadata, type MetadataStamper } from '../metadata/exif.js';
import { composeFilename, FilenameAllocator } from '../naming/filename.js';

/**
 * One uploaded photo
 */
export interface UploadedFile {
  name: string;
  bytes: Buffer;
  /** Per-file service label overriding the batch default */
  service?: string;
}

export interface StampedPhoto {
  filename: string;
  bytes: Buffer;
  /** Name of the upload it was produced from */
  source: string;
  assignment: Assignment;
}

export interface UploadFailure {
  source: string;
  code: string;
  reason: string;
}

export interface ProcessUploadsOptions {
  assigner: BatchAssigner;
  serviceDefault?: string;
  quality?: number;
  /** Defaults to the exiftool-backed writer */
  stamp?: MetadataStamper;
}

/**
 * Generated photos under review; discarded photos drop out of delivery
 */
export class PhotoSet {
  private readonly items: StampedPhoto[];

  constructor(
    photos: StampedPhoto[],
    readonly failures: readonly UploadFailure[] = []
  ) {
    this.items = [...photos];
  }

  get photos(): readonly StampedPhoto[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }

  filenames(): string[] {
    return this.items.map(photo => photo.filename);
  }

  /**
   * Remove a photo by filename; returns false when it is not in the set
   */
  discard(filename: string): boolean {
    const index = this.items.findIndex(photo => photo.filename === filename);
    if (index === -1) {
      return false;
    }
    this.items.splice(index, 1);
    return true;
  }
}

type StageResult =
  | { ok: true; file: UploadedFile; assignment: Assignment; bytes: Buffer }
  | { ok: false; failure: UploadFailure };

function toFailure(source: string, error: unknown): UploadFailure {
  return {
    source,
    code: error instanceof EngineError ? error.code : 'UNEXPECTED',
    reason: describeError(error)
  };
}

async function stampUpload(
  file: UploadedFile,
  options: ProcessUploadsOptions,
  serviceDefault: string
): Promise<StageResult> {
  const stamp = options.stamp ?? writeCaptureMetadata;

  try {
    if (!validateImageSize(file.bytes.length)) {
      throw new EncodingError(`Upload ${file.name} is empty or larger than 50MB`);
    }

    const identity = { name: file.name, size: file.bytes.length };
    let assignment = await options.assigner.assign(identity, file.bytes, serviceDefault);
    if (file.service !== undefined && file.service !== assignment.service) {
      assignment = options.assigner.overrideService(identity, file.service);
    }

    const bytes = await stamp(
      file.bytes,
      {
        timestamp: assignment.timestamp,
        location: {
          latitude: assignment.location.latitude,
          longitude: assignment.location.longitude
        }
      },
      { quality: options.quality }
    );

    return { ok: true, file, assignment, bytes };
  } catch (error) {
    logger.error({ file: file.name, error: describeError(error) }, 'Upload could not be processed');
    return { ok: false, failure: toFailure(file.name, error) };
  }
}

/**
 * Process a batch of uploads.
 *
 * Files are stamped concurrently; names are allocated afterwards in input
 * order so that collision counters are deterministic. A failing file is
 * reported in `failures` and never aborts the batch.
 */
export async function processUploads(
  files: readonly UploadedFile[],
  options: ProcessUploadsOptions
): Promise<PhotoSet> {
  const serviceDefault = options.serviceDefault ?? env.DEFAULT_SERVICE;
  logger.info({ files: files.length }, 'Processing upload batch');

  const staged = await Promise.all(files.map(file => stampUpload(file, options, serviceDefault)));

  const allocator = new FilenameAllocator();
  const photos: StampedPhoto[] = [];
  const failures: UploadFailure[] = [];

  for (const result of staged) {
    if (!result.ok) {
      failures.push(result.failure);
      continue;
    }

    const { file, assignment, bytes } = result;
    const filename = allocator.allocate(
      composeFilename({
        service: assignment.service,
        locationName: assignment.location.name,
        date: assignment.timestamp
      })
    );
    photos.push({ filename, bytes, source: file.name, assignment });
  }

  logger.info(
    { photos: photos.length, failures: failures.length, groups: options.assigner.groupCount },
    'Upload batch completed'
  );
  return new PhotoSet(photos, failures);
}
