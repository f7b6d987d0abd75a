/**
 * Charset Transcoder
 *
 * Streams bytes from one charset to another through a conversion primitive
 * obtained from a provider keyed by charset pair. Input is consumed through a
 * small fixed buffer, so memory use does not grow with content size.
 *
 * A conversion failure at the end of the buffer may only mean that a
 * multi-byte sequence is cut in two. The first failure at a position is
 * therefore tentative: the tail is kept, the buffer refilled and the
 * conversion retried. A second failure at the same position is real: a "?"
 * placeholder is written and one input byte dropped.
 *
 * @packageDocumentation
 */

import iconv from 'iconv-lite';
import { Charset, Charsets } from './charset.js';
import { ConversionUnavailableError } from '../types/errors.js';
import { ok, err, type Result } from '../types/result.js';
import { BufferInputStream, BufferOutputStream, type InputStream, type OutputStream } from '../utility/stream.js';
import { createLogger } from '../utility/logger.js';

const log = createLogger('charset');

const EMPTY = Buffer.alloc(0);

/**
 * Outcome of one conversion attempt over a buffer
 */
export interface ConversionStep {
  /** Converted bytes in the destination charset */
  output: Buffer;
  /** Number of input bytes converted */
  consumed: number;
  /** False when conversion stopped at input[consumed] */
  complete: boolean;
}

/**
 * Conversion primitive for one charset pair
 *
 * A transcoder lives for one stream, so it may carry state between calls.
 */
export interface Transcoder {
  /** Converts the longest convertible prefix of the input */
  transcode(input: Buffer): ConversionStep;
  /** Placeholder for an unconvertible sequence, in the destination charset */
  readonly placeholder: Buffer;
  /** Bytes still held back at the end of the stream */
  finish?(): Buffer;
}

/**
 * Returns a transcoder for a charset pair, or null when none exists
 */
export type TranscoderProvider = (source: string, dest: string) => Transcoder | null;

/**
 * Counters reported by a conversion
 */
export interface ConversionStats {
  bytesRead: number;
  bytesWritten: number;
  /** Number of placeholders written for unconvertible sequences */
  placeholders: number;
}

/**
 * Converter state between two conversion attempts
 */
type ConverterState =
  | { kind: 'fresh' }
  | { kind: 'pendingRetry' };

/**
 * Byte order mark of a charset whose byte order a stream declares up front
 */
interface ByteOrderMarks {
  little: Buffer;
  big: Buffer;
  littleName: string;
  bigName: string;
}

const BYTE_ORDER_MARKS: Record<string, ByteOrderMarks> = {
  utf16: {
    little: Buffer.from([0xff, 0xfe]),
    big: Buffer.from([0xfe, 0xff]),
    littleName: 'utf-16le',
    bigName: 'utf-16be',
  },
  utf32: {
    little: Buffer.from([0xff, 0xfe, 0x00, 0x00]),
    big: Buffer.from([0x00, 0x00, 0xfe, 0xff]),
    littleName: 'utf-32le',
    bigName: 'utf-32be',
  },
};

/** Charsets whose decoding depends on what came before (shift states) */
const STATEFUL_CHARSETS = new Set(['utf7', 'unicode11utf7', 'utf7imap']);

function charsetKey(name: string): string {
  return name.toLowerCase().replace(/[^0-9a-z]/g, '');
}

/**
 * Transcoder built on iconv-lite
 *
 * A prefix counts as convertible when it survives a round trip through the
 * source charset (so truncated or invalid sequences fail) and the
 * destination charset (so unmappable characters fail).
 *
 * UTF-16 and UTF-32 are read and written with an explicit byte order. A byte
 * order mark at the start of the input is consumed and fixes the byte order
 * for the rest of the stream; without one the input is big-endian. Output
 * is little-endian behind a single byte order mark.
 */
class IconvTranscoder implements Transcoder {
  readonly placeholder: Buffer;
  private source: string;
  private readonly dest: string;
  private readonly sourceMarks: ByteOrderMarks | undefined;
  private readonly destMark: Buffer;
  private started = false;

  constructor(source: string, dest: string) {
    this.sourceMarks = BYTE_ORDER_MARKS[charsetKey(source)];
    this.source = this.sourceMarks ? this.sourceMarks.bigName : source;

    const destMarks = BYTE_ORDER_MARKS[charsetKey(dest)];
    this.dest = destMarks ? destMarks.littleName : dest;
    this.destMark = destMarks ? destMarks.little : EMPTY;
    this.placeholder = iconv.encode('?', this.dest, { addBOM: false });
  }

  transcode(input: Buffer): ConversionStep {
    let skipped = 0;
    let prefix: Buffer = EMPTY;
    if (!this.started && input.length > 0) {
      this.started = true;
      skipped = this.readByteOrderMark(input);
      prefix = this.destMark;
    }

    const rest = input.subarray(skipped);
    for (let length = rest.length; length > 0; length--) {
      const output = this.tryConvert(rest.subarray(0, length));
      if (output) {
        return {
          output: prefix.length > 0 ? Buffer.concat([prefix, output]) : output,
          consumed: skipped + length,
          complete: length === rest.length,
        };
      }
    }
    return { output: prefix, consumed: skipped, complete: rest.length === 0 };
  }

  /**
   * Picks the source byte order from a leading mark and returns its length
   */
  private readByteOrderMark(input: Buffer): number {
    const marks = this.sourceMarks;
    if (!marks) {
      return 0;
    }
    if (startsWith(input, marks.little)) {
      this.source = marks.littleName;
      return marks.little.length;
    }
    if (startsWith(input, marks.big)) {
      return marks.big.length;
    }
    return 0;
  }

  private tryConvert(bytes: Buffer): Buffer | null {
    const text = iconv.decode(bytes, this.source, { stripBOM: false });
    if (!iconv.encode(text, this.source, { addBOM: false }).equals(bytes)) {
      return null;
    }
    const output = iconv.encode(text, this.dest, { addBOM: false });
    if (iconv.decode(output, this.dest, { stripBOM: false }) !== text) {
      return null;
    }
    return output;
  }
}

/**
 * Transcoder for charsets with shift states, such as UTF-7
 *
 * Holds one iconv-lite decoder and encoder for the whole stream so that a
 * shift sequence may span buffer refills. Every call consumes all of its
 * input; iconv-lite substitutes what it cannot convert.
 */
class IconvStreamTranscoder implements Transcoder {
  readonly placeholder: Buffer;
  private readonly decoder: ReturnType<typeof iconv.getDecoder>;
  private readonly encoder: ReturnType<typeof iconv.getEncoder>;

  constructor(source: string, dest: string) {
    this.decoder = iconv.getDecoder(source);
    this.encoder = iconv.getEncoder(dest);
    this.placeholder = iconv.encode('?', dest, { addBOM: false });
  }

  transcode(input: Buffer): ConversionStep {
    const text = this.decoder.write(input);
    return { output: this.encoder.write(text), consumed: input.length, complete: true };
  }

  finish(): Buffer {
    const text = this.decoder.end() ?? '';
    const tail = this.encoder.write(text);
    const end = this.encoder.end() ?? EMPTY;
    return Buffer.concat([tail, end]);
  }
}

function startsWith(input: Buffer, mark: Buffer): boolean {
  return input.length >= mark.length && input.subarray(0, mark.length).equals(mark);
}

/**
 * Default provider: any pair of charsets iconv-lite knows
 */
export const iconvTranscoderProvider: TranscoderProvider = (source, dest) => {
  if (!iconv.encodingExists(source) || !iconv.encodingExists(dest)) {
    return null;
  }
  if (STATEFUL_CHARSETS.has(charsetKey(source)) || STATEFUL_CHARSETS.has(charsetKey(dest))) {
    return new IconvStreamTranscoder(source, dest);
  }
  return new IconvTranscoder(source, dest);
};

/** Default input buffer size in bytes */
export const DEFAULT_TRANSCODER_BUFFER_SIZE = 32;

/**
 * Converts byte streams between charsets
 */
export class CharsetConverter {
  constructor(
    private readonly provider: TranscoderProvider = iconvTranscoderProvider,
    private readonly bufferSize: number = DEFAULT_TRANSCODER_BUFFER_SIZE
  ) {}

  /**
   * Whether a transcoder exists for the pair
   */
  canConvert(source: Charset | string, dest: Charset | string): boolean {
    return this.provider(nameOf(source), nameOf(dest)) !== null;
  }

  /**
   * Converts the contents of an input stream and writes them to an output stream
   *
   * @returns Conversion counters, or ConversionUnavailableError
   */
  convert(
    input: InputStream,
    output: OutputStream,
    source: Charset | string,
    dest: Charset | string
  ): Result<ConversionStats, ConversionUnavailableError> {
    const transcoder = this.provider(nameOf(source), nameOf(dest));
    if (!transcoder) {
      return err(new ConversionUnavailableError(nameOf(source), nameOf(dest)));
    }

    const stats: ConversionStats = { bytesRead: 0, bytesWritten: 0, placeholders: 0 };
    const buffer = Buffer.alloc(Math.max(4, this.bufferSize));
    let length = 0;
    let state: ConverterState = { kind: 'fresh' };

    const flush = (bytes: Buffer): void => {
      if (bytes.length > 0) {
        output.write(bytes);
        stats.bytesWritten += bytes.length;
      }
    };

    for (;;) {
      // Fill the buffer behind whatever was retained
      const read = input.read(buffer.subarray(length), buffer.length - length);
      stats.bytesRead += read;
      length += read;

      const step = transcoder.transcode(buffer.subarray(0, length));
      flush(step.output);

      if (step.complete) {
        length = 0;
        state = { kind: 'fresh' };
      } else if (state.kind === 'pendingRetry' && step.consumed === 0) {
        // Failed again at the same position: the sequence is not convertible
        flush(transcoder.placeholder);
        stats.placeholders++;
        length = shiftLeft(buffer, 1, length);
        state = { kind: 'fresh' };
        log('unconvertible byte from %s to %s, wrote placeholder', nameOf(source), nameOf(dest));
      } else {
        // Possibly a sequence cut by the buffer end: keep the tail and retry
        length = shiftLeft(buffer, step.consumed, length);
        state = { kind: 'pendingRetry' };
      }

      // Nothing pending and nothing more to read
      if (length === 0 && (read === 0 || input.eof())) {
        break;
      }
    }

    if (transcoder.finish) {
      flush(transcoder.finish());
    }
    return ok(stats);
  }

  /**
   * Converts an in-memory buffer
   */
  convertBuffer(
    data: Uint8Array | string,
    source: Charset | string,
    dest: Charset | string
  ): Result<Buffer, ConversionUnavailableError> {
    const out = new BufferOutputStream();
    const result = this.convert(new BufferInputStream(data), out, source, dest);
    return result.ok ? ok(out.toBuffer()) : result;
  }
}

/**
 * Moves buffer[offset, length) to the front and returns the new length
 */
function shiftLeft(buffer: Buffer, offset: number, length: number): number {
  const remaining = Math.max(0, length - offset);
  if (remaining > 0 && offset > 0) {
    buffer.copy(buffer, 0, offset, length);
  }
  return remaining;
}

function nameOf(charset: Charset | string): string {
  return typeof charset === 'string' ? charset : charset.name;
}

/**
 * Decodes bytes in a charset to a JavaScript string
 *
 * Unknown charsets decode as Latin-1, which keeps every byte.
 */
export function decodeText(bytes: Uint8Array, charset: Charset | string): string {
  const name = nameOf(charset);
  const buffer = Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes);
  if (!iconv.encodingExists(name)) {
    log('unknown charset "%s", decoding as latin1', name);
    return buffer.toString('latin1');
  }
  return iconv.decode(buffer, name);
}

/**
 * Encodes a JavaScript string in a charset
 *
 * Unknown charsets encode as UTF-8.
 */
export function encodeText(text: string, charset: Charset | string): Buffer {
  const name = nameOf(charset);
  if (!iconv.encodingExists(name)) {
    log('unknown charset "%s", encoding as utf-8', name);
    return Buffer.from(text, 'utf-8');
  }
  return iconv.encode(text, name);
}

/**
 * Splits bytes into the byte sequences of individual characters
 *
 * Used to find split points that never cut a multi-byte character. For
 * unknown charsets every byte is its own unit.
 */
export function splitCharacters(bytes: Uint8Array, charset: Charset | string): Buffer[] {
  const name = nameOf(charset);
  const buffer = Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes);
  if (name.toLowerCase() === Charsets.UTF_8 || name.toLowerCase() === 'utf8') {
    return splitUtf8(buffer);
  }
  if (!iconv.encodingExists(name)) {
    return Array.from(buffer, (byte) => Buffer.from([byte]));
  }
  const text = iconv.decode(buffer, name, { stripBOM: false });
  const units = Array.from(text, (char) => iconv.encode(char, name, { addBOM: false }));
  const total = units.reduce((sum, unit) => sum + unit.length, 0);
  // Stateful or lossy charsets do not re-encode character by character
  if (total !== buffer.length || !Buffer.concat(units).equals(buffer)) {
    return Array.from(buffer, (byte) => Buffer.from([byte]));
  }
  return units;
}

function splitUtf8(buffer: Buffer): Buffer[] {
  const units: Buffer[] = [];
  let i = 0;
  while (i < buffer.length) {
    let j = i + 1;
    // Continuation bytes are 10xxxxxx
    while (j < buffer.length && (buffer[j] & 0xc0) === 0x80 && j - i < 4) {
      j++;
    }
    units.push(buffer.subarray(i, j));
    i = j;
  }
  return units;
}
