/**
 * Test Image Generator
 *
 * Uses Sharp to create small images in the colour modes uploads arrive in.
 */

import sharp from 'sharp';

export interface TestImageOptions {
  width?: number;
  height?: number;
  format?: 'jpeg' | 'png' | 'webp';
  color?: { r: number; g: number; b: number };
}

/**
 * Create a plain RGB test image
 */
export async function createTestImage(options: TestImageOptions = {}): Promise<Buffer> {
  const {
    width = 64,
    height = 48,
    format = 'jpeg',
    color = { r: 120, g: 180, b: 220 }
  } = options;

  const pipeline = sharp({
    create: {
      width,
      height,
      channels: 3,
      background: color
    }
  });

  switch (format) {
    case 'jpeg':
      return pipeline.jpeg({ quality: 90 }).toBuffer();
    case 'png':
      return pipeline.png({ compressionLevel: 6 }).toBuffer();
    case 'webp':
      return pipeline.webp({ quality: 90 }).toBuffer();
    default:
      return pipeline.jpeg().toBuffer();
  }
}

/**
 * PNG with a half-transparent alpha channel
 */
export async function createAlphaPng(width = 32, height = 32): Promise<Buffer> {
  return sharp({
    create: {
      width,
      height,
      channels: 4,
      background: { r: 200, g: 40, b: 40, alpha: 0.5 }
    }
  })
    .png()
    .toBuffer();
}

/**
 * Indexed (palette) PNG
 */
export async function createPalettePng(width = 32, height = 32): Promise<Buffer> {
  return sharp({
    create: {
      width,
      height,
      channels: 3,
      background: { r: 10, g: 120, b: 60 }
    }
  })
    .png({ palette: true, colours: 8 })
    .toBuffer();
}

/**
 * Single-channel greyscale JPEG
 */
export async function createGreyscaleJpeg(width = 32, height = 32): Promise<Buffer> {
  return sharp({
    create: {
      width,
      height,
      channels: 3,
      background: { r: 128, g: 128, b: 128 }
    }
  })
    .greyscale()
    .jpeg()
    .toBuffer();
}

/**
 * Get image metadata without full decode
 */
export async function getImageInfo(buffer: Buffer): Promise<{
  width: number;
  height: number;
  format: string;
  channels: number;
  hasAlpha: boolean;
  space: string;
}> {
  const metadata = await sharp(buffer).metadata();

  return {
    width: metadata.width || 0,
    height: metadata.height || 0,
    format: metadata.format || 'unknown',
    channels: metadata.channels || 0,
    hasAlpha: metadata.hasAlpha ?? false,
    space: metadata.space || 'unknown'
  };
}

/**
 * Raw EXIF (TIFF) block of a JPEG, if any
 */
export async function getRawExif(buffer: Buffer): Promise<Buffer | undefined> {
  const { exif } = await sharp(buffer).metadata();
  return exif;
}

/**
 * Whether `exif` stores `values` as consecutive uint32s in either byte order
 */
export function containsUint32Sequence(exif: Buffer, values: readonly number[]): boolean {
  const bigEndian = Buffer.alloc(values.length * 4);
  const littleEndian = Buffer.alloc(values.length * 4);
  values.forEach((value, i) => {
    bigEndian.writeUInt32BE(value, i * 4);
    littleEndian.writeUInt32LE(value, i * 4);
  });
  return exif.includes(bigEndian) || exif.includes(littleEndian);
}
