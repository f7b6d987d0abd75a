/**
 * Error types for mimetree
 */

/**
 * Error source categories
 */
export type ErrorSource = 'charset' | 'encoding' | 'field' | 'header';

/**
 * Base MIME error class
 */
export class MimeError extends Error {
  /** Error code */
  code: string;
  /** Error source category */
  source: ErrorSource;

  constructor(message: string, code: string, source: ErrorSource) {
    super(message);
    this.name = 'MimeError';
    this.code = code;
    this.source = source;
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * No transcoder exists for the requested charset pair
 */
export class ConversionUnavailableError extends MimeError {
  override source: 'charset' = 'charset';
  /** Source charset name */
  sourceCharset: string;
  /** Destination charset name */
  destCharset: string;

  constructor(sourceCharset: string, destCharset: string) {
    super(
      `No conversion available from "${sourceCharset}" to "${destCharset}"`,
      'CONVERSION_UNAVAILABLE',
      'charset'
    );
    this.name = 'ConversionUnavailableError';
    this.sourceCharset = sourceCharset;
    this.destCharset = destCharset;
  }
}

/**
 * Content-transfer-encoding name is not registered
 */
export class UnknownEncodingError extends MimeError {
  override source: 'encoding' = 'encoding';
  /** Requested encoding name */
  encoding: string;

  constructor(encoding: string) {
    super(`Unknown content-transfer-encoding "${encoding}"`, 'UNKNOWN_ENCODING', 'encoding');
    this.name = 'UnknownEncodingError';
    this.encoding = encoding;
  }
}

/**
 * Header field accessed or copied as the wrong concrete variant
 */
export class TypeMismatchError extends MimeError {
  override source: 'field' = 'field';
  /** Field name */
  fieldName: string;
  /** Variant that was expected */
  expected: string;
  /** Variant that was found */
  actual: string;

  constructor(fieldName: string, expected: string, actual: string) {
    super(
      `Field "${fieldName}" is a ${actual} field, expected ${expected}`,
      'TYPE_MISMATCH',
      'field'
    );
    this.name = 'TypeMismatchError';
    this.fieldName = fieldName;
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Header lookup by name found nothing
 */
export class NoSuchFieldError extends MimeError {
  override source: 'header' = 'header';
  /** Field name that was looked up */
  fieldName: string;

  constructor(fieldName: string) {
    super(`No field named "${fieldName}"`, 'NO_SUCH_FIELD', 'header');
    this.name = 'NoSuchFieldError';
    this.fieldName = fieldName;
  }
}
