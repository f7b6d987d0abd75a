/**
 * Quoted-Printable encoding/decoding
 *
 * Implements RFC 2045 quoted-printable as a streaming content encoder, and
 * the RFC 2047 "Q" variant used inside encoded words.
 */

import { Encoder, CountingWriter } from './encoder.js';
import { BufferInputStream, BufferOutputStream, type InputStream, type OutputStream } from '../utility/stream.js';
import type { ProgressTracker } from '../utility/progress.js';

const DEFAULT_MAX_LINE_LENGTH = 76;

const CR = 0x0d;
const LF = 0x0a;
const SPACE = 0x20;
const TAB = 0x09;
const EQUALS = 0x3d;

const HEX_PAIR = /^[0-9A-Fa-f]{2}$/;

function hexEscape(byte: number): string {
  return '=' + byte.toString(16).toUpperCase().padStart(2, '0');
}

/**
 * Printable ASCII characters (33-126) except '=' can be literal
 */
function isLiteral(byte: number): boolean {
  return byte >= 33 && byte <= 126 && byte !== EQUALS;
}

export class QuotedPrintableEncoder extends Encoder {
  readonly name = 'quoted-printable';

  protected encodeStream(input: InputStream, output: OutputStream, tracker: ProgressTracker): number {
    const writer = new CountingWriter(output);
    const maxLineLength = Math.max(4, this.properties.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH);
    const textMode = this.properties.text === true;
    let linePos = 0;
    // Whitespace may only stay literal when something follows it on the line
    let pendingWs = -1;
    let pendingCr = false;

    const emit = (token: string): void => {
      // Keep room for the '=' of a soft line break
      if (linePos + token.length > maxLineLength - 1) {
        writer.write('=\r\n');
        linePos = 0;
      }
      writer.write(token);
      linePos += token.length;
    };

    const flushWs = (literal: boolean): void => {
      if (pendingWs !== -1) {
        emit(literal ? String.fromCharCode(pendingWs) : hexEscape(pendingWs));
        pendingWs = -1;
      }
    };

    const flushCr = (): void => {
      if (pendingCr) {
        flushWs(true);
        emit(hexEscape(CR));
        pendingCr = false;
      }
    };

    for (const chunk of this.chunks(input, tracker)) {
      for (const byte of chunk) {
        if (textMode && byte === CR) {
          flushCr();
          pendingCr = true;
          continue;
        }
        if (textMode && byte === LF) {
          // Hard line break
          flushWs(false);
          pendingCr = false;
          writer.write('\r\n');
          linePos = 0;
          continue;
        }
        flushCr();
        if (byte === SPACE || byte === TAB) {
          flushWs(true);
          pendingWs = byte;
          continue;
        }
        flushWs(true);
        emit(isLiteral(byte) ? String.fromCharCode(byte) : hexEscape(byte));
      }
    }

    flushCr();
    flushWs(false);
    return writer.count;
  }

  protected decodeStream(input: InputStream, output: OutputStream, tracker: ProgressTracker): number {
    const writer = new CountingWriter(output);
    let carry = '';

    for (const chunk of this.chunks(input, tracker)) {
      const { bytes, rest } = decodeQuotedPrintableText(carry + chunk.toString('latin1'), false);
      writer.write(bytes);
      carry = rest;
    }
    if (carry.length > 0) {
      writer.write(decodeQuotedPrintableText(carry, true).bytes);
    }
    return writer.count;
  }
}

/**
 * Decodes quoted-printable text
 *
 * When `final` is false, an escape cut off at the end of the text is
 * returned in `rest` so the next chunk can complete it.
 */
function decodeQuotedPrintableText(text: string, final: boolean): { bytes: Buffer; rest: string } {
  const bytes: number[] = [];
  let i = 0;

  while (i < text.length) {
    const char = text.charCodeAt(i);

    if (char !== EQUALS) {
      bytes.push(char & 0xff);
      i++;
      continue;
    }

    // Soft line break, possibly with whitespace between '=' and the line end
    let j = i + 1;
    while (j < text.length && (text.charCodeAt(j) === SPACE || text.charCodeAt(j) === TAB)) {
      j++;
    }
    if (j >= text.length || (text.charCodeAt(j) === CR && j + 1 >= text.length)) {
      if (!final) {
        return { bytes: Buffer.from(bytes), rest: text.substring(i) };
      }
      if (j >= text.length) {
        // Trailing '=' at end of data: soft break with nothing after it
        i = j;
        continue;
      }
    }
    if (text.charCodeAt(j) === CR && text.charCodeAt(j + 1) === LF) {
      i = j + 2;
      continue;
    }
    if (text.charCodeAt(j) === LF) {
      i = j + 1;
      continue;
    }

    // Decode hex sequence =XX
    if (i + 3 > text.length && !final) {
      return { bytes: Buffer.from(bytes), rest: text.substring(i) };
    }
    const hex = text.substring(i + 1, i + 3);
    if (HEX_PAIR.test(hex)) {
      bytes.push(parseInt(hex, 16));
      i += 3;
    } else {
      // Invalid sequence, keep the '=' as literal
      bytes.push(EQUALS);
      i++;
    }
  }

  return { bytes: Buffer.from(bytes), rest: '' };
}

/**
 * Encodes a string or Buffer to quoted-printable format
 *
 * @param data - The data to encode (string or Buffer)
 * @param text - Keep line breaks as hard line breaks
 * @returns Quoted-printable encoded string
 */
export function quotedPrintableEncode(data: string | Uint8Array, text: boolean = false): string {
  const buffer = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
  const out = new BufferOutputStream();
  new QuotedPrintableEncoder({ text }).encode(new BufferInputStream(buffer), out);
  return out.toString('latin1');
}

/**
 * Decodes a quoted-printable string to a Buffer
 *
 * @param encoded - The quoted-printable encoded string
 * @returns Decoded Buffer
 */
export function quotedPrintableDecode(encoded: string): Buffer {
  return decodeQuotedPrintableText(encoded, true).bytes;
}

/**
 * Decodes a quoted-printable string to a UTF-8 string
 */
export function quotedPrintableDecodeToString(encoded: string): string {
  return quotedPrintableDecode(encoded).toString('utf-8');
}

/**
 * Characters allowed unescaped in a "Q" encoded word anywhere in a header,
 * including phrases (RFC 2047 section 5, rule 3)
 */
function isQLiteral(byte: number): boolean {
  return (
    (byte >= 0x30 && byte <= 0x39) || // 0-9
    (byte >= 0x41 && byte <= 0x5a) || // A-Z
    (byte >= 0x61 && byte <= 0x7a) || // a-z
    byte === 0x21 || byte === 0x2a || byte === 0x2b || byte === 0x2d || byte === 0x2f // ! * + - /
  );
}

/**
 * Encodes bytes as the text of a "Q" encoded word
 */
export function qEncode(bytes: Uint8Array): string {
  let result = '';
  for (const byte of bytes) {
    if (byte === SPACE) {
      result += '_';
    } else if (isQLiteral(byte)) {
      result += String.fromCharCode(byte);
    } else {
      result += hexEscape(byte);
    }
  }
  return result;
}

/**
 * Length of the "Q" form of the bytes, without building it
 */
export function qEncodedLength(bytes: Uint8Array): number {
  let length = 0;
  for (const byte of bytes) {
    length += byte === SPACE || isQLiteral(byte) ? 1 : 3;
  }
  return length;
}

/**
 * Decodes the text of a "Q" encoded word
 */
export function qDecode(text: string): Buffer {
  // In Q-encoding, underscores represent spaces
  return decodeQuotedPrintableText(text.replace(/_/g, ' '), true).bytes;
}
