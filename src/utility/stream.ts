/**
 * Byte stream adapters
 *
 * The core reads from and writes to these synchronous interfaces. A network
 * or file collaborator supplies its own implementation; the in-memory
 * adapters below cover buffers and strings.
 *
 * @packageDocumentation
 */

/**
 * A synchronous byte source
 */
export interface InputStream {
  /**
   * Copies up to `max` bytes into the start of `buffer`
   *
   * @returns Number of bytes copied (0 at end of data)
   */
  read(buffer: Uint8Array, max: number): number;
  /** Whether the source has no more bytes */
  eof(): boolean;
}

/**
 * A synchronous byte sink
 */
export interface OutputStream {
  /**
   * Writes bytes, or a byte string (one char per byte, Latin-1)
   */
  write(data: Uint8Array | string, length?: number): void;
}

/**
 * Converts a string to bytes with one byte per UTF-16 code unit
 */
export function byteStringToBuffer(data: string): Buffer {
  return Buffer.from(data, 'latin1');
}

/**
 * Reads from an in-memory buffer
 */
export class BufferInputStream implements InputStream {
  private readonly data: Uint8Array;
  private position: number;
  private readonly end: number;

  constructor(data: Uint8Array | string, start: number = 0, end?: number) {
    this.data = typeof data === 'string' ? byteStringToBuffer(data) : data;
    this.position = Math.max(0, Math.min(start, this.data.length));
    this.end = Math.max(this.position, Math.min(end ?? this.data.length, this.data.length));
  }

  read(buffer: Uint8Array, max: number): number {
    const count = Math.min(max, buffer.length, this.end - this.position);
    if (count <= 0) return 0;
    buffer.set(this.data.subarray(this.position, this.position + count), 0);
    this.position += count;
    return count;
  }

  eof(): boolean {
    return this.position >= this.end;
  }
}

/**
 * Collects written bytes in memory
 */
export class BufferOutputStream implements OutputStream {
  private chunks: Buffer[] = [];
  private size = 0;

  write(data: Uint8Array | string, length?: number): void {
    const bytes = typeof data === 'string' ? byteStringToBuffer(data) : data;
    const count = Math.min(length ?? bytes.length, bytes.length);
    if (count <= 0) return;
    // Copy: callers reuse their buffers between writes
    this.chunks.push(Buffer.from(bytes.subarray(0, count)));
    this.size += count;
  }

  /** Number of bytes written so far */
  get length(): number {
    return this.size;
  }

  toBuffer(): Buffer {
    if (this.chunks.length !== 1) {
      this.chunks = [Buffer.concat(this.chunks, this.size)];
    }
    return this.chunks[0] ?? Buffer.alloc(0);
  }

  /**
   * Returns the written bytes as a string
   *
   * @param encoding - Buffer encoding (default: latin1, one char per byte)
   */
  toString(encoding: BufferEncoding = 'latin1'): string {
    return this.toBuffer().toString(encoding);
  }
}

/**
 * Forwards only the bytes that fall inside [start, start + length)
 */
export class RangeOutputStream implements OutputStream {
  private offset = 0;
  private forwarded = 0;

  constructor(
    private readonly inner: OutputStream,
    private readonly start: number,
    private readonly length: number = -1
  ) {}

  write(data: Uint8Array | string, length?: number): void {
    const bytes = typeof data === 'string' ? byteStringToBuffer(data) : data;
    const count = Math.min(length ?? bytes.length, bytes.length);
    const chunkStart = this.offset;
    this.offset += count;

    const from = Math.max(0, this.start - chunkStart);
    let to = count;
    if (this.length >= 0) {
      to = Math.min(to, this.start + this.length - chunkStart);
    }
    if (to > from) {
      this.inner.write(bytes.subarray(from, to));
      this.forwarded += to - from;
    }
  }

  /** Number of bytes forwarded to the inner stream */
  get written(): number {
    return this.forwarded;
  }
}

/**
 * Reads a stream to its end
 */
export function readAll(input: InputStream, chunkSize: number = 16384): Buffer {
  const out = new BufferOutputStream();
  const chunk = Buffer.alloc(chunkSize);
  while (!input.eof()) {
    const n = input.read(chunk, chunk.length);
    if (n === 0) break;
    out.write(chunk, n);
  }
  return out.toBuffer();
}
