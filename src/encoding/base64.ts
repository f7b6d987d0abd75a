/**
 * Base64 content-transfer-encoding (RFC 2045 section 6.8)
 */

import { Encoder, CountingWriter } from './encoder.js';
import type { InputStream, OutputStream } from '../utility/stream.js';
import type { ProgressTracker } from '../utility/progress.js';

const DEFAULT_MAX_LINE_LENGTH = 76;

const NON_ALPHABET = /[^A-Za-z0-9+/=]/g;

/**
 * Encodes a string or Buffer to base64
 * 
 * @param data - The data to encode (string or Buffer)
 * @returns Base64 encoded string
 */
export function base64Encode(data: string | Uint8Array): string {
  const buffer = typeof data === 'string' ? Buffer.from(data, 'utf-8') : Buffer.from(data);
  return buffer.toString('base64');
}

/**
 * Decodes a base64 string to a Buffer
 * 
 * @param encoded - The base64 encoded string
 * @returns Decoded Buffer
 */
export function base64Decode(encoded: string): Buffer {
  // Drop line breaks and anything else outside the alphabet
  return decodeQuanta(encoded.replace(NON_ALPHABET, ''));
}

/**
 * Decodes a base64 string to a UTF-8 string
 */
export function base64DecodeToString(encoded: string): string {
  return base64Decode(encoded).toString('utf-8');
}

/**
 * Length of the base64 form of `byteCount` bytes
 */
export function base64EncodedLength(byteCount: number): number {
  return Math.ceil(byteCount / 3) * 4;
}

/**
 * Decodes base64 characters, one padded quantum at a time where padding
 * appears mid-stream (concatenated base64 runs)
 */
function decodeQuanta(chars: string): Buffer {
  if (chars.indexOf('=') === -1 || /^[^=]*=*$/.test(chars)) {
    return Buffer.from(chars, 'base64');
  }
  const parts: Buffer[] = [];
  let start = 0;
  for (let i = 0; i < chars.length; i += 4) {
    const group = chars.substring(i, i + 4);
    if (group.indexOf('=') !== -1) {
      parts.push(Buffer.from(chars.substring(start, i), 'base64'));
      parts.push(Buffer.from(group.replace(/=+$/, ''), 'base64'));
      start = i + 4;
    }
  }
  parts.push(Buffer.from(chars.substring(start), 'base64'));
  return Buffer.concat(parts);
}

export class Base64Encoder extends Encoder {
  readonly name = 'base64';

  protected encodeStream(input: InputStream, output: OutputStream, tracker: ProgressTracker): number {
    const writer = new CountingWriter(output);
    const requested = this.properties.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH;
    // Whole quanta per line; 0 or less disables wrapping
    const lineLength = requested >= 4 ? requested - (requested % 4) : Infinity;
    let linePos = 0;
    let carry = Buffer.alloc(0);

    const emit = (text: string): void => {
      let offset = 0;
      while (offset < text.length) {
        if (linePos >= lineLength) {
          writer.write('\r\n');
          linePos = 0;
        }
        const take = Math.min(lineLength - linePos, text.length - offset);
        writer.write(text.substring(offset, offset + take));
        linePos += take;
        offset += take;
      }
    };

    for (const chunk of this.chunks(input, tracker)) {
      const data = carry.length > 0 ? Buffer.concat([carry, chunk]) : chunk;
      const usable = data.length - (data.length % 3);
      emit(data.subarray(0, usable).toString('base64'));
      carry = Buffer.from(data.subarray(usable));
    }
    if (carry.length > 0) {
      emit(carry.toString('base64'));
    }
    return writer.count;
  }

  protected decodeStream(input: InputStream, output: OutputStream, tracker: ProgressTracker): number {
    const writer = new CountingWriter(output);
    let carry = '';

    for (const chunk of this.chunks(input, tracker)) {
      const chars = carry + chunk.toString('latin1').replace(NON_ALPHABET, '');
      const usable = chars.length - (chars.length % 4);
      writer.write(decodeQuanta(chars.substring(0, usable)));
      carry = chars.substring(usable);
    }
    if (carry.length > 0) {
      writer.write(decodeQuanta(carry));
    }
    return writer.count;
  }
}
