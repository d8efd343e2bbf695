/**
 * Upload sinks
 *
 * Delivery targets for finished photos. Cloud drives and archive builders
 * implement `UploadSink`; a local directory sink ships here.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';

import { env } from '../config/index.js';
import { describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

export interface UploadSink {
  /**
   * Store one photo
   *
   * @returns Identifier of the stored object (path, drive file id, ...)
   */
  store(bytes: Buffer, filename: string): Promise<string>;
}

export interface PublishablePhoto {
  filename: string;
  bytes: Buffer;
}

export interface PublishResult {
  stored: Array<{ filename: string; id: string }>;
  failed: Array<{ filename: string; reason: string }>;
}

/**
 * Configuration for the local directory sink
 */
export interface LocalSinkConfig {
  /** Target directory */
  basePath: string;
  /** Whether to create the directory automatically */
  autoCreateDirs?: boolean;
}

export class LocalDirectorySink implements UploadSink {
  private config: Required<LocalSinkConfig>;

  constructor(config?: Partial<LocalSinkConfig>) {
    this.config = {
      basePath: resolve(config?.basePath ?? env.OUTPUT_DIR),
      autoCreateDirs: config?.autoCreateDirs ?? true
    };
  }

  async store(bytes: Buffer, filename: string): Promise<string> {
    // Names come from the filename composer, but never let one escape the directory.
    const safeName = basename(filename);
    if (safeName !== filename || safeName.length === 0) {
      throw new Error(`Refusing to store unsafe filename: ${filename}`);
    }

    if (this.config.autoCreateDirs) {
      await mkdir(this.config.basePath, { recursive: true });
    }

    const target = join(this.config.basePath, safeName);
    await writeFile(target, bytes);
    return target;
  }
}

/**
 * Store each photo, continuing past individual failures
 */
export async function publishPhotos(
  sink: UploadSink,
  photos: readonly PublishablePhoto[]
): Promise<PublishResult> {
  const result: PublishResult = { stored: [], failed: [] };

  for (const photo of photos) {
    try {
      const id = await sink.store(photo.bytes, photo.filename);
      result.stored.push({ filename: photo.filename, id });
    } catch (error) {
      logger.error({ filename: photo.filename, error: describeError(error) }, 'Photo upload failed');
      result.failed.push({ filename: photo.filename, reason: describeError(error) });
    }
  }

  logger.info({ stored: result.stored.length, failed: result.failed.length }, 'Photos published');
  return result;
}
