/**
 * Error types surfaced by the metadata engine.
 *
 * Callers processing a batch catch these per image; one failing image is
 * reported and skipped while the rest of the batch proceeds.
 */

export type EngineErrorCode = 'ENCODING_FAILED' | 'INVALID_RANGE';

/**
 * Base class carrying a stable machine-readable code
 */
export abstract class EngineError extends Error {
  abstract readonly code: EngineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Image could not be decoded, normalized, re-encoded or tagged
 */
export class EncodingError extends EngineError {
  readonly code = 'ENCODING_FAILED' as const;
}

/**
 * Timestamp generator was given a range it cannot sample from
 */
export class InvalidRangeError extends EngineError {
  readonly code = 'INVALID_RANGE' as const;
}

/**
 * Render any thrown value as a log-friendly message
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
