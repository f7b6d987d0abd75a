/**
 * Header field parameters ("; name=value")
 *
 * Supports RFC 2231 extended values (`name*=charset'lang'%XX`) and
 * continuations (`name*0`, `name*1*`) in both directions.
 *
 * @packageDocumentation
 */

import { Charset, Charsets, isAsciiCompatible, isStringEqualNoCase } from '../../charset/charset.js';
import { EncodedText } from '../encoded-text.js';
import { Word } from '../word.js';
import { quote, splitTopLevel, unfold, unquote } from './structured.js';

/** RFC 2045 token characters */
const TOKEN = /^[!#$%&'*+\-.^_`{|}~0-9A-Za-z]+$/;

/** Longest encoded section before a value is split into continuations */
const MAX_SECTION_LENGTH = 60;

const SECTION_NAME = /^([^*]+)(?:\*(\d+))?(\*)?$/;

/**
 * RFC 2231 attribute-char: token characters except "*", "'" and "%"
 */
function isAttributeChar(byte: number): boolean {
  if (byte <= 0x20 || byte >= 0x7f) return false;
  const char = String.fromCharCode(byte);
  return TOKEN.test(char) && char !== '*' && char !== "'" && char !== '%';
}

function isPrintableAscii(bytes: Buffer): boolean {
  return bytes.every((byte) => (byte >= 0x20 && byte < 0x7f) || byte === 0x09);
}

function percentDecode(text: string): Buffer {
  const bytes: number[] = [];
  for (let i = 0; i < text.length; i++) {
    const hex = text.substring(i + 1, i + 3);
    if (text[i] === '%' && /^[0-9A-Fa-f]{2}$/.test(hex)) {
      bytes.push(parseInt(hex, 16));
      i += 2;
    } else {
      bytes.push(text.charCodeAt(i) & 0xff);
    }
  }
  return Buffer.from(bytes);
}

export class Parameter {
  name: string;
  value: Word;

  /**
   * @param value - Value bytes as a Word, or a string (US-ASCII when it is
   *   ASCII, otherwise encoded in `charset`, default UTF-8)
   */
  constructor(name: string, value: Word | string = '', charset?: Charset | string) {
    this.name = name;
    if (typeof value === 'string') {
      const ascii = /^[\x00-\x7f]*$/.test(value);
      this.value = new Word(value, charset ?? (ascii ? Charsets.US_ASCII : Charsets.UTF_8));
    } else {
      this.value = value.clone();
    }
  }

  /** Decoded value */
  getValue(): string {
    return this.value.getDecodedText();
  }

  /**
   * Generates the "name=value" segments
   *
   * Printable ASCII values give one plain or quoted segment. Other values use
   * the RFC 2231 extended form, split into continuations when long.
   */
  generate(): string[] {
    const bytes = this.value.buffer;
    if (isAsciiCompatible(this.value.charset) && isPrintableAscii(bytes)) {
      const text = bytes.toString('latin1');
      return [`${this.name}=${TOKEN.test(text) ? text : quote(text)}`];
    }

    const prefix = `${this.value.charset.name}''`;
    const units = Array.from(bytes, (byte) =>
      isAttributeChar(byte) ? String.fromCharCode(byte) : '%' + byte.toString(16).toUpperCase().padStart(2, '0')
    );
    const encoded = units.join('');
    if (prefix.length + encoded.length <= MAX_SECTION_LENGTH) {
      return [`${this.name}*=${prefix}${encoded}`];
    }

    const sections: string[] = [];
    let current = prefix;
    for (const unit of units) {
      if (current.length + unit.length > MAX_SECTION_LENGTH && current !== prefix) {
        sections.push(current);
        current = '';
      }
      current += unit;
    }
    sections.push(current);
    return sections.map((section, i) => `${this.name}*${i}*=${section}`);
  }

  equals(other: Parameter): boolean {
    return isStringEqualNoCase(this.name, other.name) && this.value.equals(other.value);
  }

  clone(): Parameter {
    return new Parameter(this.name, this.value);
  }

  toString(): string {
    return `${this.name}=${this.getValue()}`;
  }
}

interface Section {
  index: number;
  extended: boolean;
  text: string;
}

interface SectionGroup {
  name: string;
  sections: Section[];
}

/**
 * Parses "value; name=value; ..." into the leading value and its parameters
 *
 * Items without "=" are ignored. Raw 8-bit values are taken to be in
 * `defaultCharset`.
 */
export function parseParameterList(
  text: string,
  defaultCharset: Charset | string = Charsets.UTF_8
): { value: string; parameters: Parameter[] } {
  const [first = '', ...items] = splitTopLevel(unfold(text), ';');
  const groups = new Map<string, SectionGroup>();

  for (const item of items) {
    const equals = item.indexOf('=');
    if (equals === -1) continue;

    const rawName = item.substring(0, equals).trim();
    const match = SECTION_NAME.exec(rawName);
    if (!match) continue;

    const key = match[1].toLowerCase();
    let group = groups.get(key);
    if (!group) {
      group = { name: match[1], sections: [] };
      groups.set(key, group);
    }
    group.sections.push({
      index: match[2] !== undefined ? parseInt(match[2], 10) : 0,
      extended: match[3] !== undefined,
      text: unquote(item.substring(equals + 1).trim()),
    });
  }

  const parameters = [...groups.values()].map((group) => buildParameter(group, defaultCharset));
  return { value: first.trim(), parameters };
}

function buildParameter(group: SectionGroup, defaultCharset: Charset | string): Parameter {
  const sections = [...group.sections].sort((a, b) => a.index - b.index);
  let charset: string | null = null;
  const parts: Buffer[] = [];

  for (const [i, section] of sections.entries()) {
    if (!section.extended) {
      parts.push(Buffer.from(section.text, 'latin1'));
      continue;
    }
    let data = section.text;
    if (i === 0) {
      // charset'language'value
      const quoteA = data.indexOf("'");
      const quoteB = quoteA === -1 ? -1 : data.indexOf("'", quoteA + 1);
      if (quoteB !== -1) {
        charset = data.substring(0, quoteA) || null;
        data = data.substring(quoteB + 1);
      }
    }
    parts.push(percentDecode(data));
  }

  const bytes = Buffer.concat(parts);
  if (charset) {
    return new Parameter(group.name, new Word(bytes, charset));
  }

  const raw = bytes.toString('latin1');
  const anyExtended = sections.some((section) => section.extended);
  if (!anyExtended && raw.includes('=?')) {
    // Encoded words in parameter values are not standard but common
    const decoded = EncodedText.parse(raw, defaultCharset);
    const word = decoded.getWordAt(0);
    if (decoded.getWordCount() === 1 && word) {
      return new Parameter(group.name, word);
    }
  }

  const ascii = bytes.every((byte) => byte < 0x80);
  return new Parameter(group.name, new Word(bytes, ascii ? Charsets.US_ASCII : defaultCharset));
}

/**
 * Finds a parameter by name, ignoring case
 */
export function findParameter(parameters: readonly Parameter[], name: string): Parameter | undefined {
  return parameters.find((parameter) => isStringEqualNoCase(parameter.name, name));
}
