/**
 * Word: a run of bytes in one charset
 *
 * The unit of charset-aware header text.
 */

import { Charset, localeCharset } from '../charset/charset.js';
import { CharsetConverter, decodeText, encodeText } from '../charset/transcoder.js';
import type { ConversionUnavailableError } from '../types/errors.js';
import type { Result } from '../types/result.js';

export class Word {
  private _buffer: Buffer;
  private _charset: Charset;

  /**
   * @param data - Raw bytes, or a string to encode in the charset
   * @param charset - Charset of the bytes (default: locale charset)
   */
  constructor(data: Uint8Array | string = '', charset: Charset | string = localeCharset()) {
    this._charset = typeof charset === 'string' ? new Charset(charset) : charset.clone();
    this._buffer = typeof data === 'string' ? encodeText(data, this._charset) : Buffer.from(data);
  }

  get buffer(): Buffer {
    return this._buffer;
  }

  set buffer(value: Uint8Array) {
    this._buffer = Buffer.from(value);
  }

  get charset(): Charset {
    return this._charset;
  }

  set charset(value: Charset | string) {
    this._charset = typeof value === 'string' ? new Charset(value) : value.clone();
  }

  /**
   * Decodes the bytes to a JavaScript string
   */
  getDecodedText(): string {
    return decodeText(this._buffer, this._charset);
  }

  /**
   * Converts the bytes to another charset
   */
  getConvertedText(
    dest: Charset | string,
    converter: CharsetConverter = new CharsetConverter()
  ): Result<Buffer, ConversionUnavailableError> {
    return converter.convertBuffer(this._buffer, this._charset, dest);
  }

  equals(other: Word): boolean {
    return this._charset.equals(other._charset) && this._buffer.equals(other._buffer);
  }

  clone(): Word {
    return new Word(this._buffer, this._charset);
  }

  toString(): string {
    return this.getDecodedText();
  }
}
