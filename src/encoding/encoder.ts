/**
 * Content encoder base
 *
 * An encoder implements one content-transfer-encoding in both directions.
 * Both directions stream through a bounded chunk buffer, so bodies of any
 * size are processed without being held in memory.
 *
 * @packageDocumentation
 */

import { BufferInputStream, BufferOutputStream, type InputStream, type OutputStream } from '../utility/stream.js';
import { ProgressTracker, type ProgressListener } from '../utility/progress.js';

/** Default chunk size for streaming encoders */
export const DEFAULT_CHUNK_SIZE = 16384;

/**
 * Encoder configuration
 */
export interface EncoderProperties {
  /** Maximum output line length for line-oriented encodings */
  maxLineLength?: number;
  /** Input is text: keep line breaks as line breaks (quoted-printable) */
  text?: boolean;
  /** File name written in the header line (uuencode) */
  filename?: string;
  /** Unix file mode written in the header line (uuencode) */
  mode?: string;
  /** Size of the read buffer */
  chunkSize?: number;
}

export abstract class Encoder {
  /** Encoding name this encoder was registered under */
  abstract readonly name: string;

  readonly properties: EncoderProperties;

  constructor(properties: EncoderProperties = {}) {
    this.properties = { ...properties };
  }

  /**
   * Encodes the input stream to the output stream
   *
   * @returns Number of bytes written
   */
  encode(input: InputStream, output: OutputStream, progress?: ProgressListener): number {
    const tracker = new ProgressTracker(progress);
    tracker.begin();
    const written = this.encodeStream(input, output, tracker);
    tracker.end();
    return written;
  }

  /**
   * Decodes the input stream to the output stream
   *
   * Malformed input never throws; it is decoded as well as possible.
   *
   * @returns Number of bytes written
   */
  decode(input: InputStream, output: OutputStream, progress?: ProgressListener): number {
    const tracker = new ProgressTracker(progress);
    tracker.begin();
    const written = this.decodeStream(input, output, tracker);
    tracker.end();
    return written;
  }

  /**
   * Encodes an in-memory buffer
   */
  encodeBuffer(data: Uint8Array | string): Buffer {
    const out = new BufferOutputStream();
    this.encode(new BufferInputStream(data), out);
    return out.toBuffer();
  }

  /**
   * Decodes an in-memory buffer
   */
  decodeBuffer(data: Uint8Array | string): Buffer {
    const out = new BufferOutputStream();
    this.decode(new BufferInputStream(data), out);
    return out.toBuffer();
  }

  protected abstract encodeStream(input: InputStream, output: OutputStream, tracker: ProgressTracker): number;

  protected abstract decodeStream(input: InputStream, output: OutputStream, tracker: ProgressTracker): number;

  protected get chunkSize(): number {
    const size = this.properties.chunkSize ?? DEFAULT_CHUNK_SIZE;
    return size > 0 ? size : DEFAULT_CHUNK_SIZE;
  }

  /**
   * Reads the input chunk by chunk
   */
  protected *chunks(input: InputStream, tracker: ProgressTracker): Generator<Buffer> {
    const buffer = Buffer.alloc(this.chunkSize);
    while (!input.eof()) {
      const count = input.read(buffer, buffer.length);
      if (count === 0) break;
      tracker.advance(count);
      yield buffer.subarray(0, count);
    }
  }
}

/**
 * Counts bytes written through it
 */
export class CountingWriter {
  count = 0;

  constructor(private readonly output: OutputStream) {}

  write(data: Uint8Array | string): void {
    if (data.length === 0) return;
    this.output.write(data);
    this.count += data.length;
  }
}
