/**
 * Error types for lexicon operations
 *
 * Invariants:
 * - Source and cache errors include the absolute path in the message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all lexicon errors
 */
export abstract class LexiconError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Base class for the fatal startup errors: the dictionary text cannot be used at all
 */
export abstract class SourceTextError extends LexiconError {}

/**
 * Thrown when the dictionary source file does not exist
 */
export class SourceNotFoundError extends SourceTextError {
  readonly code = "ENOENT";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Dictionary source not found: ${filePath}`, options);
  }
}

/**
 * Thrown when the dictionary source file is zero bytes
 */
export class SourceEmptyError extends SourceTextError {
  readonly code = "E_SOURCE_EMPTY";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Dictionary source is empty: ${filePath}`, options);
  }
}

/**
 * Thrown when the dictionary source exists but cannot be read
 */
export class SourceReadError extends SourceTextError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read dictionary source: ${filePath}`, options);
  }
}

/**
 * Thrown while restoring a persisted index that is truncated, of an unknown
 * version, or internally inconsistent. The cache manager always recovers from it.
 */
export class CacheFormatError extends LexiconError {
  readonly code = "E_CACHE_FORMAT";

  constructor(
    public readonly cachePath: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Unusable index cache ${cachePath}: ${reason}`, options);
  }
}

/**
 * Thrown when an atomic write fails
 */
export class CacheWriteError extends LexiconError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write index cache: ${filePath}`, options);
  }
}

/**
 * Thrown by callers that need an entry to exist (the lookup API itself returns null)
 */
export class EntryNotFoundError extends LexiconError {
  readonly code = "E_ENTRY_NOT_FOUND";

  constructor(
    public readonly ref: string | number,
    options?: ErrorOptions
  ) {
    super(`Entry not found: ${typeof ref === "number" ? `#${ref}` : ref}`, options);
  }
}
