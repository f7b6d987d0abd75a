/**
 * mimetree - parse, build and generate Internet mail messages
 *
 * @packageDocumentation
 */

// Export all types
export * from './types/index.js';

// Byte streams, progress and tokens
export {
  BufferInputStream,
  BufferOutputStream,
  RangeOutputStream,
  byteStringToBuffer,
  readAll,
} from './utility/stream.js';
export type { InputStream, OutputStream } from './utility/stream.js';
export { ProgressTracker } from './utility/progress.js';
export type { ProgressListener } from './utility/progress.js';
export { TokenGenerator } from './utility/random.js';
export type { TokenSource } from './utility/random.js';

// Charsets and transcoding
export * from './charset/index.js';

// Content-transfer-encodings
export * from './encoding/index.js';

// Message model
export * from './mime/index.js';

// Context
export { createMimeContext, generateMessageId, resolveMimeOptions } from './context.js';
export type { MimeContext } from './context.js';
