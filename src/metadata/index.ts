/**
 * Metadata module - coordinate encoding and capture metadata I/O
 */

// Coordinate codec
export {
  toSexagesimal,
  toDecimal,
  applyHemisphere,
  rationalValue,
  isValidCoordinate,
  LATITUDE_HEMISPHERES,
  LONGITUDE_HEMISPHERES,
  SECONDS_DENOMINATOR,
  COORDINATE_TOLERANCE,
  type GeoCoordinate,
  type Hemisphere,
  type HemispherePair,
  type Rational,
  type SexagesimalAngle
} from './coordinates.js';

// Capture metadata writer / reader
export {
  writeCaptureMetadata,
  readCaptureMetadata,
  normalizeToJpeg,
  buildExifDirectories,
  formatRationalTriple,
  recordFromTags,
  toGpsTags,
  closeExifTool,
  type MetadataRecord,
  type WriteOptions,
  type MetadataStamper,
  type GpsTags,
  type ExifDirectories
} from './exif.js';
