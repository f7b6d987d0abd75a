/**
 * RFC 2047 Word Folder
 *
 * Turns EncodedText into header text: words that cannot appear literally
 * become encoded words (=?charset?Q|B?...?=), and the result is folded with
 * CRLF + whitespace to fit a line-length budget.
 *
 * Folding only ever happens before existing whitespace, or between two
 * encoded words where the whitespace is not significant, so unfolding gives
 * back the same text. A single encoded word or a multi-byte character is
 * never split, even when it alone exceeds the budget.
 *
 * @packageDocumentation
 */

import { Charset, Charsets, isAsciiCompatible } from '../charset/charset.js';
import { splitCharacters } from '../charset/transcoder.js';
import { base64EncodedLength } from '../encoding/base64.js';
import { qEncode, qEncodedLength } from '../encoding/quoted-printable.js';
import { EncodedText } from './encoded-text.js';
import { Word } from './word.js';

/**
 * Line length limits
 */
export const LineLengthLimits = {
  /** Recommended maximum (RFC 2822 section 2.1.1) */
  convenient: 78,
  /** Hard maximum excluding CRLF */
  max: 998,
  infinite: Number.POSITIVE_INFINITY,
} as const;

export interface FoldFlags {
  /** Emit every word literally (structured values such as Received) */
  forceNoEncoding?: boolean;
  /** Encode every word */
  forceEncoding?: boolean;
}

export interface FoldOptions {
  maxLineLength?: number;
  /** Column where the text starts on the current line */
  curLinePos?: number;
  flags?: FoldFlags;
}

export interface FoldResult {
  /** Generated text; continuation lines are preceded by CRLF */
  output: string;
  /** Column after the last character */
  newLinePos: number;
}

type Item =
  | { kind: 'space'; text: string; charset: Charset }
  | { kind: 'plain'; text: string; charset: Charset }
  | { kind: 'encoded'; bytes: Buffer; charset: Charset };

const TOKEN = /[ \t]+|[^ \t]+/g;

/**
 * Whether a word has to be written as an encoded word
 *
 * True for non-ASCII and control bytes, for charsets in which ASCII text is
 * not itself, and for text that would read as an encoded word.
 */
export function wordNeedsEncoding(word: Word): boolean {
  if (!isAsciiCompatible(word.charset)) {
    return word.buffer.length > 0;
  }
  const bytes = word.buffer;
  for (let i = 0; i < bytes.length; i++) {
    const byte = bytes[i];
    if (byte >= 0x7f || (byte < 0x20 && byte !== 0x09)) {
      return true;
    }
    if (byte === 0x3d && bytes[i + 1] === 0x3f) {
      // "=?"
      return true;
    }
  }
  return false;
}

function isAsciiBytes(bytes: Buffer): boolean {
  return bytes.every((byte) => byte < 0x80);
}

/**
 * Splits the words into whitespace, plain and encoded items
 */
function buildItems(text: EncodedText, flags: FoldFlags): Item[] {
  const items: Item[] = [];

  for (const word of text.getWords()) {
    const encode = flags.forceEncoding === true ||
      (flags.forceNoEncoding !== true && wordNeedsEncoding(word));

    if (encode) {
      items.push({ kind: 'encoded', bytes: word.buffer, charset: word.charset });
      continue;
    }

    for (const token of word.buffer.toString('latin1').match(TOKEN) ?? []) {
      const kind = token[0] === ' ' || token[0] === '\t' ? 'space' : 'plain';
      const last = items[items.length - 1];
      if (last && last.kind !== 'encoded' && last.kind === kind) {
        last.text += token;
      } else {
        items.push({ kind, text: token, charset: word.charset });
      }
    }
  }

  return items;
}

/**
 * Picks the charset for plain text absorbed into an encoded neighbour
 */
function absorbingCharset(item: Item, neighbour: Item | undefined): Charset {
  if (
    neighbour?.kind === 'encoded' &&
    item.kind !== 'encoded' &&
    isAsciiBytes(Buffer.from(item.text, 'latin1')) &&
    isAsciiCompatible(neighbour.charset)
  ) {
    return neighbour.charset;
  }
  return item.charset;
}

/**
 * Encoded words must stand alone between whitespace. Plain text glued to an
 * encoded word is encoded too, and so is whitespace between two encoded
 * words (decoders drop it otherwise).
 */
function absorbNeighbours(items: Item[]): Item[] {
  let changed = true;
  while (changed) {
    changed = false;
    for (let i = 0; i < items.length; i++) {
      const item = items[i];
      if (item.kind === 'encoded') continue;

      const previous = items[i - 1];
      const next = items[i + 1];
      const touchesEncoded = item.kind === 'plain'
        ? previous?.kind === 'encoded' || next?.kind === 'encoded'
        : previous?.kind === 'encoded' && next?.kind === 'encoded';

      if (touchesEncoded) {
        const neighbour = previous?.kind === 'encoded' ? previous : next;
        items[i] = {
          kind: 'encoded',
          bytes: Buffer.from(item.text, 'latin1'),
          charset: absorbingCharset(item, neighbour),
        };
        changed = true;
      }
    }
  }
  return items;
}

/**
 * Merges neighbouring encoded items of the same charset; a US-ASCII item
 * merges into an ASCII-compatible neighbour
 */
function mergeEncoded(items: Item[]): Item[] {
  const merged: Item[] = [];
  for (const item of items) {
    const last = merged[merged.length - 1];
    if (last?.kind === 'encoded' && item.kind === 'encoded') {
      const charset = mergedCharset(last, item);
      if (charset) {
        merged[merged.length - 1] = {
          kind: 'encoded',
          bytes: Buffer.concat([last.bytes, item.bytes]),
          charset,
        };
        continue;
      }
    }
    merged.push(item);
  }
  return merged;
}

function mergedCharset(
  a: { bytes: Buffer; charset: Charset },
  b: { bytes: Buffer; charset: Charset }
): Charset | null {
  if (a.charset.equals(b.charset)) return a.charset;
  const asciiOnly = (item: { bytes: Buffer; charset: Charset }): boolean =>
    item.charset.equals(Charsets.US_ASCII) && isAsciiBytes(item.bytes);
  if (asciiOnly(a) && isAsciiCompatible(b.charset)) return b.charset;
  if (asciiOnly(b) && isAsciiCompatible(a.charset)) return a.charset;
  return null;
}

/**
 * Encodes and folds text
 *
 * @param text - Text to generate
 * @param options - Line budget, starting column and flags
 * @returns Generated text and the column after it
 */
export function encodeAndFoldText(text: EncodedText, options: FoldOptions = {}): FoldResult {
  const maxLineLength = options.maxLineLength ?? LineLengthLimits.convenient;
  const flags = options.flags ?? {};

  let items = buildItems(text, flags);
  if (flags.forceNoEncoding !== true) {
    items = mergeEncoded(absorbNeighbours(items));
  }

  let output = '';
  let linePos = options.curLinePos ?? 0;
  let lineHasContent = false;
  let pendingSpace = '';
  let previousEncoded = false;

  const emitToken = (separator: string, token: string): void => {
    const width = separator.length + token.length;
    if (lineHasContent && separator.length > 0 && linePos + width > maxLineLength) {
      output += '\r\n' + separator + token;
      linePos = width;
    } else {
      output += separator + token;
      linePos += width;
    }
    lineHasContent = true;
  };

  const emitEncoded = (bytes: Buffer, charset: Charset, firstSeparator: string): void => {
    const useQ = qEncodedLength(bytes) <= base64EncodedLength(bytes.length);
    const prefix = `=?${charset.name}?${useQ ? 'Q' : 'B'}?`;
    const overhead = prefix.length + 2;
    const units = splitCharacters(bytes, charset);

    const take = (from: number, available: number): Buffer[] => {
      const chunk: Buffer[] = [];
      let qLength = 0;
      let byteCount = 0;
      for (let i = from; i < units.length; i++) {
        const nextQ = qLength + qEncodedLength(units[i]);
        const nextBytes = byteCount + units[i].length;
        if ((useQ ? nextQ : base64EncodedLength(nextBytes)) > available) break;
        chunk.push(units[i]);
        qLength = nextQ;
        byteCount = nextBytes;
      }
      return chunk;
    };

    let index = 0;
    let separator = firstSeparator;
    while (index < units.length) {
      let chunk = take(index, maxLineLength - linePos - separator.length - overhead);
      if (chunk.length === 0 && lineHasContent && separator.length > 0) {
        // Will not fit here: size the word for a fresh continuation line
        chunk = take(index, maxLineLength - separator.length - overhead);
      }
      if (chunk.length === 0) {
        // A single character wider than the budget is written whole
        chunk = [units[index]];
      }
      const data = Buffer.concat(chunk);
      const encoded = useQ ? qEncode(data) : data.toString('base64');
      emitToken(separator, `${prefix}${encoded}?=`);
      index += chunk.length;
      separator = ' ';
    }
  };

  for (const item of items) {
    switch (item.kind) {
      case 'space':
        pendingSpace += item.text;
        break;
      case 'plain':
        emitToken(pendingSpace, item.text);
        pendingSpace = '';
        previousEncoded = false;
        break;
      case 'encoded': {
        const separator = pendingSpace !== '' ? pendingSpace : previousEncoded ? ' ' : '';
        emitEncoded(item.bytes, item.charset, separator);
        pendingSpace = '';
        previousEncoded = item.bytes.length > 0 || previousEncoded;
        break;
      }
    }
  }

  if (pendingSpace) {
    output += pendingSpace;
    linePos += pendingSpace.length;
  }

  return { output, newLinePos: linePos };
}

/**
 * Folds ASCII text at whitespace without encoding anything
 */
export function foldText(value: string, options: Omit<FoldOptions, 'flags'> = {}): FoldResult {
  const text = new EncodedText([new Word(Buffer.from(value, 'latin1'), Charsets.US_ASCII)]);
  return encodeAndFoldText(text, { ...options, flags: { forceNoEncoding: true } });
}

/**
 * Encodes text without line breaks
 *
 * Long encoded words are still split into words that each fit a line, so the
 * result can be folded later at its spaces.
 */
export function encodeWords(text: EncodedText, flags: FoldFlags = {}): string {
  return encodeAndFoldText(text, { flags }).output.replace(/\r\n/g, '');
}
