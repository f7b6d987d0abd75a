/**
 * Configuration types for mimetree
 */

import type { TranscoderProvider } from '../charset/transcoder.js';

/**
 * Library options; every field is optional
 */
export interface MimeOptions {
  /** Header line length budget (default: 78) */
  maxLineLength?: number;
  /** Charset of text with no declared charset (default: locale charset) */
  defaultCharset?: string;
  /** Line length of base64 and quoted-printable output (default: 76) */
  encoderLineLength?: number;
  /** Transcoder lookup for charset conversion (default: iconv-lite) */
  transcoderProvider?: TranscoderProvider;
  /** Milliseconds since the epoch (default: Date.now) */
  clock?: () => number;
  /** Process id mixed into generated tokens (default: process.pid) */
  processId?: number;
  /** Host name used in generated message ids (default: os.hostname()) */
  hostname?: string;
  /** Initial state of the token generator (default: from the clock) */
  seed?: number;
}

/**
 * Options with defaults applied
 */
export interface ResolvedMimeOptions {
  maxLineLength: number;
  defaultCharset: string;
  encoderLineLength: number;
  transcoderProvider: TranscoderProvider;
  clock: () => number;
  processId: number;
  hostname: string;
  seed?: number;
}
