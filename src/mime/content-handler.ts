/**
 * Content handler: body bytes plus the encoding they are stored in
 *
 * Parsed bodies keep their bytes as they were on the wire, with the declared
 * content-transfer-encoding; nothing is decoded until asked for. Content set
 * by callers is usually stored unencoded (`encoding` null).
 *
 * @packageDocumentation
 */

import type { EncoderProperties } from '../encoding/encoder.js';
import type { Encoding } from '../encoding/encoding.js';
import type { EncoderRegistry } from '../encoding/registry.js';
import type { UnknownEncodingError } from '../types/errors.js';
import { ok, type Result } from '../types/result.js';
import type { ProgressListener } from '../utility/progress.js';
import { BufferInputStream, BufferOutputStream, RangeOutputStream, type OutputStream } from '../utility/stream.js';

/**
 * Byte range and progress for content extraction
 */
export interface ExtractOptions {
  /** First decoded byte to write (default 0) */
  start?: number;
  /** Number of decoded bytes to write (default: to the end) */
  length?: number;
  progress?: ProgressListener;
}

export class ContentHandler {
  private readonly data: Buffer;
  /** Encoding of the stored bytes; null when they are not encoded */
  readonly encoding: Encoding | null;

  constructor(data: Uint8Array | string = Buffer.alloc(0), encoding: Encoding | null = null) {
    this.data = typeof data === 'string' ? Buffer.from(data, 'latin1') : Buffer.from(data);
    this.encoding = encoding ? encoding.clone() : null;
  }

  /** Stored bytes, as they are */
  get raw(): Buffer {
    return this.data;
  }

  /** Length of the stored bytes */
  get length(): number {
    return this.data.length;
  }

  isEmpty(): boolean {
    return this.data.length === 0;
  }

  isEncoded(): boolean {
    return this.encoding !== null;
  }

  /**
   * Writes the stored bytes, without decoding
   *
   * @returns Number of bytes written
   */
  extractRaw(output: OutputStream, progress?: ProgressListener): number {
    progress?.start?.(this.data.length);
    output.write(this.data);
    progress?.progress(this.data.length, this.data.length);
    progress?.stop?.(this.data.length);
    return this.data.length;
  }

  /**
   * Writes the decoded bytes, or the requested range of them
   *
   * @returns Number of bytes written, or UnknownEncodingError
   */
  extract(
    encoders: EncoderRegistry,
    output: OutputStream,
    options: ExtractOptions = {}
  ): Result<number, UnknownEncodingError> {
    const target = options.start !== undefined || options.length !== undefined
      ? new RangeOutputStream(output, options.start ?? 0, options.length ?? -1)
      : null;
    const sink = target ?? output;

    if (!this.encoding) {
      const written = this.extractRaw(sink, options.progress);
      return ok(target ? target.written : written);
    }

    const encoder = encoders.create(this.encoding.name);
    if (!encoder.ok) {
      return encoder;
    }
    const written = encoder.value.decode(new BufferInputStream(this.data), sink, options.progress);
    return ok(target ? target.written : written);
  }

  /**
   * Decoded bytes
   */
  decode(encoders: EncoderRegistry): Result<Buffer, UnknownEncodingError> {
    const out = new BufferOutputStream();
    const result = this.extract(encoders, out);
    return result.ok ? ok(out.toBuffer()) : result;
  }

  /**
   * Bytes in another encoding
   *
   * Returns the stored bytes when they already are in that encoding;
   * otherwise decodes and re-encodes.
   */
  encodeAs(
    encoders: EncoderRegistry,
    encoding: Encoding,
    properties: EncoderProperties = {}
  ): Result<Buffer, UnknownEncodingError> {
    if (this.encoding?.equals(encoding)) {
      return ok(this.data);
    }
    const decoded = this.decode(encoders);
    if (!decoded.ok) {
      return decoded;
    }
    const encoder = encoders.create(encoding.name, properties);
    if (!encoder.ok) {
      return encoder;
    }
    return ok(encoder.value.encodeBuffer(decoded.value));
  }

  clone(): ContentHandler {
    return new ContentHandler(this.data, this.encoding);
  }
}
