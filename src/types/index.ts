/**
 * Type exports for mimetree
 */

// Configuration types
export type { MimeOptions, ResolvedMimeOptions } from './config.js';

// Result values
export { ok, err, unwrap, unwrapOr } from './result.js';
export type { Ok, Err, Result } from './result.js';

// Error types
export {
  MimeError,
  ConversionUnavailableError,
  UnknownEncodingError,
  TypeMismatchError,
  NoSuchFieldError,
} from './errors.js';

export type { ErrorSource } from './errors.js';
