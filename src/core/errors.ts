/**
 * Error types raised by parsing and comparison
 *
 * Whole-document failures are thrown. Failures confined to one element
 * (a single table or image) are caught by the comparer and reported as an
 * error-marked change record in that element's category.
 */

export type ComparisonErrorKind = 'UnsupportedFormat' | 'CorruptDocument' | 'ConfigurationError';

export interface ComparisonErrorOptions {
  /** Human-addressable position of the failing element, if any */
  location?: string;
  cause?: unknown;
}

export class ComparisonError extends Error {
  public readonly kind: ComparisonErrorKind;
  public readonly location?: string;

  constructor(kind: ComparisonErrorKind, message: string, options: ComparisonErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ComparisonError';
    this.kind = kind;
    this.location = options.location;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * The input is not in a format this package can parse.
 */
export class UnsupportedFormatError extends ComparisonError {
  constructor(message: string, options: ComparisonErrorOptions = {}) {
    super('UnsupportedFormat', message, options);
    this.name = 'UnsupportedFormatError';
  }
}

/**
 * Malformed structural content: an unreadable package, an undecodable image,
 * a table whose rows or cells are not well formed.
 */
export class CorruptDocumentError extends ComparisonError {
  constructor(message: string, options: ComparisonErrorOptions = {}) {
    super('CorruptDocument', message, options);
    this.name = 'CorruptDocumentError';
  }
}

/**
 * A comparison setting outside its accepted range.
 */
export class ConfigurationError extends ComparisonError {
  constructor(message: string, options: ComparisonErrorOptions = {}) {
    super('ConfigurationError', message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Render any caught value as a message
 */
export function describeFailure(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
