/**
 * Error types raised by the extractor
 */

/**
 * Base class for extraction failures
 */
export class ExtractionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Source is not uncompressed PCM / IEEE float, or its layout is inconsistent
 */
export class FormatError extends ExtractionError {}

/**
 * Channel labels cannot be applied to the source
 */
export class ConfigurationError extends ExtractionError {}

/**
 * Read, write, open or close failure; the underlying error is kept in `cause`
 */
export class IOError extends ExtractionError {}

/**
 * Wrap anything thrown by I/O code so callers always receive an ExtractionError
 */
export function toExtractionError(error: unknown, context: string): ExtractionError {
  if (error instanceof ExtractionError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new IOError(`${context}: ${message}`, { cause: error });
}
