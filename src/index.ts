// Public API for the geotagged SEO photo toolkit

export { env } from './config/index.js';
export { logger } from './lib/logger.js';
export { EncodingError, InvalidRangeError, EngineError, type EngineErrorCode } from './lib/errors.js';

export * from './metadata/index.js';

export {
  type CalendarDate,
  type CaptureTimestamp,
  formatExifTimestamp,
  parseExifTimestamp,
  fromLocalDate,
  isWeekday,
  weekdayIndex
} from './timestamps/capture-timestamp.js';
export {
  uniformInRange,
  uniformWeekdayInRange,
  sequentialDrift,
  rangeContainsWeekday,
  DEFAULT_BUSINESS_HOURS,
  type BusinessHours,
  type RandomSource
} from './timestamps/generator.js';

export { computeGroupKey, roundCoordinate, type ProvenanceGroupKey } from './grouping/provenance.js';

export {
  BatchAssigner,
  fileIdentityKey,
  type Assignment,
  type BatchAssignerOptions,
  type FileIdentity,
  type TimestampPolicy
} from './batch/assigner.js';

export {
  composeFilename,
  positionalSuffix,
  slugify,
  FilenameAllocator,
  type FilenameParts
} from './naming/filename.js';

export {
  loadLocationCatalog,
  parseLocationCatalog,
  manualLocation,
  pickLocation,
  findLocation,
  type LocationCatalog,
  type NamedLocation
} from './locations/catalog.js';

export {
  extractFramePhotos,
  samplePositions,
  type FrameSource,
  type FramePhoto,
  type FrameExtractionOptions,
  type FrameExtractionResult
} from './video/frames.js';

export {
  processUploads,
  PhotoSet,
  type UploadedFile,
  type StampedPhoto,
  type UploadFailure
} from './services/photo-batch.js';

export {
  LocalDirectorySink,
  publishPhotos,
  type UploadSink,
  type PublishResult
} from './storage/upload-sink.js';
