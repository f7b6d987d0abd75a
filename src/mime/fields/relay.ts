/**
 * Relay field ("Received")
 *
 * Value grammar, loosely: `from X by Y via Z with P1 with P2 id N for A; date`.
 * Parsing is best-effort: text before the first keyword is dropped, and a
 * value without ";" yields no parts (the text is still regenerated as it was).
 * Generation writes the parts in a fixed order and never encodes.
 *
 * @packageDocumentation
 */

import { DateTime } from '../values/date-time.js';
import { HeaderField, sliceValue } from './header-field.js';

type RelayKeyword = 'from' | 'by' | 'via' | 'with' | 'id' | 'for';

/**
 * Keywords with the prefix a word must start with to count as one, in the
 * order they are tried
 */
const KEYWORD_PREFIXES: ReadonlyArray<readonly [RelayKeyword, string]> = [
  ['from', 'from'],
  ['by', 'by'],
  ['via', 'vi'],
  ['with', 'wi'],
  ['id', 'id'],
  ['for', 'fo'],
];

function matchKeyword(word: string): RelayKeyword | null {
  const lower = word.toLowerCase();
  for (const [keyword, prefix] of KEYWORD_PREFIXES) {
    if (lower.startsWith(prefix)) {
      return keyword;
    }
  }
  return null;
}

export class RelayField extends HeaderField {
  readonly kind = 'relay';
  from = '';
  by = '';
  via = '';
  with: string[] = [];
  id = '';
  for = '';
  date: DateTime | null = null;
  /** Value text when it had no parts, or a date that did not parse */
  private raw = '';
  private rawDate = '';

  parseValue(buffer: string, start?: number, end?: number): void {
    this.clear();
    const text = sliceValue(buffer, start, end);
    const semicolon = text.lastIndexOf(';');
    if (semicolon === -1) {
      this.raw = text.trim();
      return;
    }

    const dateText = text.substring(semicolon + 1);
    this.date = DateTime.parse(dateText);
    if (!this.date) {
      this.rawDate = dateText.trim();
    }

    let keyword: RelayKeyword | null = null;
    let words: string[] = [];
    let depth = 0;

    for (const word of text.substring(0, semicolon).split(/\s+/)) {
      if (word === '') continue;
      const matched = depth === 0 ? matchKeyword(word) : null;
      if (matched) {
        this.assign(keyword, words);
        keyword = matched;
        words = [];
        continue;
      }
      words.push(word);
      for (const char of word) {
        if (char === '(') depth++;
        else if (char === ')' && depth > 0) depth--;
      }
    }
    this.assign(keyword, words);
  }

  /**
   * Stores accumulated words in a keyword's slot; "with" accumulates, the
   * others overwrite. A keyword without words stores an empty value.
   */
  private assign(keyword: RelayKeyword | null, words: string[]): void {
    if (keyword === null) {
      return;
    }
    const value = words.join(' ');
    switch (keyword) {
      case 'from':
        this.from = value;
        break;
      case 'by':
        this.by = value;
        break;
      case 'via':
        this.via = value;
        break;
      case 'with':
        this.with.push(value);
        break;
      case 'id':
        this.id = value;
        break;
      case 'for':
        this.for = value;
        break;
    }
  }

  private clear(): void {
    this.from = '';
    this.by = '';
    this.via = '';
    this.with = [];
    this.id = '';
    this.for = '';
    this.date = null;
    this.raw = '';
    this.rawDate = '';
  }

  isEmpty(): boolean {
    return !this.from && !this.by && !this.via && this.with.every((protocol) => !protocol) && !this.id && !this.for;
  }

  generateValue(): string {
    if (this.raw && this.isEmpty()) {
      return this.raw;
    }

    const parts: string[] = [];
    if (this.from) parts.push(`from ${this.from}`);
    if (this.by) parts.push(`by ${this.by}`);
    if (this.via) parts.push(`via ${this.via}`);
    for (const protocol of this.with) if (protocol) parts.push(`with ${protocol}`);
    if (this.id) parts.push(`id ${this.id}`);
    if (this.for) parts.push(`for ${this.for}`);

    const date = this.date ? this.date.generate() : this.rawDate;
    return `${parts.join(' ')}; ${date}`;
  }

  protected copyValue(other: HeaderField): boolean {
    if (!(other instanceof RelayField)) return false;
    this.from = other.from;
    this.by = other.by;
    this.via = other.via;
    this.with = [...other.with];
    this.id = other.id;
    this.for = other.for;
    this.date = other.date ? other.date.clone() : null;
    this.raw = other.raw;
    this.rawDate = other.rawDate;
    return true;
  }

  clone(): RelayField {
    const field = new RelayField(this.name);
    field.copyValue(this);
    return field;
  }
}
