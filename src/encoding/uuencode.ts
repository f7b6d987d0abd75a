/**
 * UUEncode content-transfer-encoding (x-uuencode)
 *
 * Output is a "begin <mode> <filename>" line, lines of up to 45 input
 * bytes each prefixed by a length character, and a "`" / "end" trailer.
 */

import { Encoder, CountingWriter } from './encoder.js';
import type { InputStream, OutputStream } from '../utility/stream.js';
import type { ProgressTracker } from '../utility/progress.js';

const BYTES_PER_LINE = 45;

function encodeChar(value: number): string {
  // Zero maps to '`' rather than space so lines keep no trailing blanks
  return value === 0 ? '`' : String.fromCharCode(value + 32);
}

function decodeChar(code: number): number {
  return (code - 32) & 0x3f;
}

function encodeLine(bytes: Buffer): string {
  let line = encodeChar(bytes.length);
  for (let i = 0; i < bytes.length; i += 3) {
    const b0 = bytes[i];
    const b1 = i + 1 < bytes.length ? bytes[i + 1] : 0;
    const b2 = i + 2 < bytes.length ? bytes[i + 2] : 0;
    line += encodeChar(b0 >> 2);
    line += encodeChar(((b0 << 4) | (b1 >> 4)) & 0x3f);
    line += encodeChar(((b1 << 2) | (b2 >> 6)) & 0x3f);
    line += encodeChar(b2 & 0x3f);
  }
  return line + '\r\n';
}

/**
 * Decodes one encoded line; malformed lines yield what can be recovered
 */
function decodeLine(line: string): Buffer {
  if (line.length === 0) return Buffer.alloc(0);
  const length = decodeChar(line.charCodeAt(0));
  const bytes: number[] = [];
  for (let i = 1; bytes.length < length && i < line.length; i += 4) {
    const c0 = decodeChar(line.charCodeAt(i));
    const c1 = i + 1 < line.length ? decodeChar(line.charCodeAt(i + 1)) : 0;
    const c2 = i + 2 < line.length ? decodeChar(line.charCodeAt(i + 2)) : 0;
    const c3 = i + 3 < line.length ? decodeChar(line.charCodeAt(i + 3)) : 0;
    bytes.push(((c0 << 2) | (c1 >> 4)) & 0xff);
    if (bytes.length < length) bytes.push(((c1 << 4) | (c2 >> 2)) & 0xff);
    if (bytes.length < length) bytes.push(((c2 << 6) | c3) & 0xff);
  }
  return Buffer.from(bytes);
}

export class UUEncoder extends Encoder {
  readonly name = 'uuencode';

  protected encodeStream(input: InputStream, output: OutputStream, tracker: ProgressTracker): number {
    const writer = new CountingWriter(output);
    const mode = this.properties.mode ?? '644';
    const filename = this.properties.filename ?? 'noname';
    let carry = Buffer.alloc(0);

    writer.write(`begin ${mode} ${filename}\r\n`);

    for (const chunk of this.chunks(input, tracker)) {
      const data = carry.length > 0 ? Buffer.concat([carry, chunk]) : chunk;
      let offset = 0;
      while (data.length - offset >= BYTES_PER_LINE) {
        writer.write(encodeLine(data.subarray(offset, offset + BYTES_PER_LINE)));
        offset += BYTES_PER_LINE;
      }
      carry = Buffer.from(data.subarray(offset));
    }
    if (carry.length > 0) {
      writer.write(encodeLine(carry));
    }

    writer.write('`\r\nend\r\n');
    return writer.count;
  }

  protected decodeStream(input: InputStream, output: OutputStream, tracker: ProgressTracker): number {
    const writer = new CountingWriter(output);
    let pending = '';
    // Lines before "begin" are skipped; without a "begin" line, decode everything
    let state: 'header' | 'body' | 'done' = 'header';

    const handleLine = (line: string): void => {
      if (state === 'done') return;
      if (state === 'header') {
        state = 'body';
        if (/^begin\s/i.test(line)) return;
      }
      if (line === 'end' || line === '`' || line.length === 0) {
        if (line === 'end') state = 'done';
        return;
      }
      writer.write(decodeLine(line));
    };

    for (const chunk of this.chunks(input, tracker)) {
      pending += chunk.toString('latin1');
      let newline = pending.indexOf('\n');
      while (newline !== -1) {
        handleLine(pending.substring(0, newline).replace(/\r$/, ''));
        pending = pending.substring(newline + 1);
        newline = pending.indexOf('\n');
      }
    }
    if (pending.length > 0) {
      handleLine(pending.replace(/\r$/, ''));
    }
    return writer.count;
  }
}
