/**
 * Content-transfer-encoding value
 */

import { isStringEqualNoCase } from '../charset/charset.js';

/**
 * Standard encoding names
 */
export const EncodingTypes = {
  SEVEN_BIT: '7bit',
  EIGHT_BIT: '8bit',
  BINARY: 'binary',
  QUOTED_PRINTABLE: 'quoted-printable',
  BASE64: 'base64',
  UUENCODE: 'uuencode',
} as const;

/** Longest line allowed in 7bit and 8bit data (RFC 2822) */
const MAX_UNENCODED_LINE_LENGTH = 998;

export class Encoding {
  private _name: string;

  constructor(name: string = EncodingTypes.SEVEN_BIT) {
    this._name = name;
  }

  get name(): string {
    return this._name;
  }

  parse(buffer: string, start: number = 0, end: number = buffer.length): void {
    this._name = buffer.substring(start, end).trim();
  }

  generate(): string {
    return this._name;
  }

  equals(other: Encoding | string): boolean {
    return isStringEqualNoCase(this._name, typeof other === 'string' ? other : other.name);
  }

  clone(): Encoding {
    return new Encoding(this._name);
  }

  toString(): string {
    return this._name;
  }

  /**
   * Picks an encoding for content
   *
   * 7bit when the data is ASCII with reasonable lines, quoted-printable when
   * less than 10% of the bytes need escaping, base64 otherwise.
   */
  static decide(data: Uint8Array): Encoding {
    let eightBit = 0;
    let lineLength = 0;
    let longLine = false;
    let control = false;

    for (const byte of data) {
      if (byte === 0x0a) {
        lineLength = 0;
        continue;
      }
      if (++lineLength > MAX_UNENCODED_LINE_LENGTH) longLine = true;
      if (byte >= 0x80) eightBit++;
      else if (byte === 0 || (byte < 0x20 && byte !== 0x09 && byte !== 0x0d)) control = true;
    }

    if (eightBit === 0 && !longLine && !control) {
      return new Encoding(EncodingTypes.SEVEN_BIT);
    }
    if (eightBit * 10 < data.length) {
      return new Encoding(EncodingTypes.QUOTED_PRINTABLE);
    }
    return new Encoding(EncodingTypes.BASE64);
  }
}
