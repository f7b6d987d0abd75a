/**
 * EncodedText: an ordered sequence of Words
 *
 * Represents a header value that may mix charsets. Parsing decodes RFC 2047
 * encoded words; generation lives in the word folder.
 *
 * @packageDocumentation
 */

import { Charset, Charsets } from '../charset/charset.js';
import { CharsetConverter } from '../charset/transcoder.js';
import { base64Decode } from '../encoding/base64.js';
import { qDecode } from '../encoding/quoted-printable.js';
import type { ConversionUnavailableError } from '../types/errors.js';
import { ok, type Result } from '../types/result.js';
import { Word } from './word.js';

/**
 * RFC 2047 encoded word: =?charset?encoding?encoded_text?=
 */
const ENCODED_WORD = /=\?([^?\s]+)\?([BbQq])\?([^?\s]*)\?=/g;

const WHITESPACE_RUN = /[ \t\r\n]+|[^ \t\r\n]+/g;

function isAsciiString(text: string): boolean {
  return /^[\x00-\x7f]*$/.test(text);
}

export class EncodedText {
  private words: Word[] = [];

  constructor(words: readonly Word[] = []) {
    this.words = words.map((word) => word.clone());
  }

  /**
   * Builds text from a string, splitting it into US-ASCII words and words
   * in the given charset
   *
   * Whitespace between two non-ASCII runs stays inside the non-ASCII word;
   * other whitespace goes to the ASCII side.
   */
  static fromString(text: string, charset: Charset | string): EncodedText {
    const runs: { ascii: boolean; text: string }[] = [];
    let pendingWs = '';

    for (const token of text.match(WHITESPACE_RUN) ?? []) {
      if (/^[ \t\r\n]/.test(token)) {
        pendingWs += token;
        continue;
      }
      const ascii = isAsciiString(token);
      const last = runs[runs.length - 1];
      if (!last) {
        runs.push({ ascii, text: pendingWs + token });
      } else if (last.ascii === ascii) {
        last.text += pendingWs + token;
      } else if (ascii) {
        runs.push({ ascii, text: pendingWs + token });
      } else {
        last.text += pendingWs;
        runs.push({ ascii, text: token });
      }
      pendingWs = '';
    }

    if (pendingWs) {
      const last = runs[runs.length - 1];
      if (last) last.text += pendingWs;
      else runs.push({ ascii: true, text: pendingWs });
    }

    return new EncodedText(
      runs.map((run) => new Word(run.text, run.ascii ? Charsets.US_ASCII : charset))
    );
  }

  /**
   * Parses an (unfolded) header value, decoding encoded words
   *
   * Whitespace between two adjacent encoded words is dropped. Malformed
   * encoded words stay as plain text. Raw 8-bit text is taken to be in
   * `defaultCharset`.
   */
  static parse(value: string, defaultCharset: Charset | string = Charsets.UTF_8): EncodedText {
    const text = new EncodedText();
    let position = 0;
    let previousWasEncoded = false;

    const pushPlain = (plain: string): void => {
      const charset = isAsciiString(plain) ? Charsets.US_ASCII : defaultCharset;
      text.appendWord(new Word(Buffer.from(plain, 'latin1'), charset));
    };

    for (const match of value.matchAll(ENCODED_WORD)) {
      const index = match.index ?? 0;
      const between = value.substring(position, index);
      if (between && !(previousWasEncoded && /^[ \t\r\n]+$/.test(between))) {
        pushPlain(between);
      }

      // RFC 2231 language suffix: charset*lang
      const charset = match[1].split('*')[0];
      const bytes = match[2].toUpperCase() === 'B' ? base64Decode(match[3]) : qDecode(match[3]);
      text.appendWord(new Word(bytes, charset));

      previousWasEncoded = true;
      position = index + match[0].length;
    }

    if (position < value.length) {
      pushPlain(value.substring(position));
    }

    text.mergeAdjacentWords();
    return text;
  }

  appendWord(word: Word): void {
    this.words.push(word);
  }

  insertWordBefore(index: number, word: Word): void {
    this.words.splice(Math.max(0, Math.min(index, this.words.length)), 0, word);
  }

  removeWord(index: number): void {
    this.words.splice(index, 1);
  }

  removeAllWords(): void {
    this.words = [];
  }

  getWordAt(index: number): Word | undefined {
    return this.words[index];
  }

  getWordCount(): number {
    return this.words.length;
  }

  getWords(): readonly Word[] {
    return this.words;
  }

  isEmpty(): boolean {
    return this.words.every((word) => word.buffer.length === 0);
  }

  /**
   * Joins neighbouring words that share a charset
   */
  mergeAdjacentWords(): void {
    const merged: Word[] = [];
    for (const word of this.words) {
      const last = merged[merged.length - 1];
      if (last && last.charset.equals(word.charset)) {
        last.buffer = Buffer.concat([last.buffer, word.buffer]);
      } else {
        merged.push(word.clone());
      }
    }
    this.words = merged;
  }

  /**
   * Converts every word to one charset and concatenates the result
   */
  getConvertedText(
    dest: Charset | string,
    converter: CharsetConverter = new CharsetConverter()
  ): Result<Buffer, ConversionUnavailableError> {
    const parts: Buffer[] = [];
    for (const word of this.words) {
      const converted = word.getConvertedText(dest, converter);
      if (!converted.ok) return converted;
      parts.push(converted.value);
    }
    return ok(Buffer.concat(parts));
  }

  equals(other: EncodedText): boolean {
    return (
      this.words.length === other.words.length &&
      this.words.every((word, i) => word.equals(other.words[i]))
    );
  }

  clone(): EncodedText {
    return new EncodedText(this.words);
  }

  /**
   * Decoded text as a JavaScript string
   */
  toString(): string {
    return this.words.map((word) => word.getDecodedText()).join('');
  }
}
