/**
 * Charset names
 *
 * A charset is identified by its name only. Names compare equal when they
 * match ignoring ASCII case; no alias table is applied, so "UTF8" and
 * "UTF-8" are different charsets here even if a transcoder accepts both.
 *
 * @packageDocumentation
 */

/**
 * Well-known charset names
 */
export const Charsets = {
  US_ASCII: 'us-ascii',
  UTF_8: 'utf-8',
  ISO_8859_1: 'iso-8859-1',
  WINDOWS_1252: 'windows-1252',
} as const;

/**
 * Compares two strings ignoring ASCII case
 */
export function isStringEqualNoCase(a: string, b: string): boolean {
  return a.length === b.length && a.toLowerCase() === b.toLowerCase();
}

export class Charset {
  private _name: string;

  constructor(name: string = Charsets.US_ASCII) {
    this._name = name;
  }

  get name(): string {
    return this._name;
  }

  /**
   * Sets the name from a slice of a header buffer, verbatim
   */
  parse(buffer: string, start: number = 0, end: number = buffer.length): void {
    this._name = buffer.substring(start, end);
  }

  generate(): string {
    return this._name;
  }

  equals(other: Charset | string): boolean {
    const name = typeof other === 'string' ? other : other.name;
    return isStringEqualNoCase(this._name, name);
  }

  clone(): Charset {
    return new Charset(this._name);
  }

  toString(): string {
    return this._name;
  }
}

/**
 * Returns the charset of the process locale
 *
 * Reads the codeset from LC_ALL, LC_CTYPE or LANG (e.g. "en_US.UTF-8"),
 * and falls back to UTF-8.
 */
export function localeCharset(env: NodeJS.ProcessEnv = process.env): string {
  const locale = env['LC_ALL'] || env['LC_CTYPE'] || env['LANG'] || '';
  const dot = locale.indexOf('.');
  if (dot === -1) {
    return Charsets.UTF_8;
  }
  const codeset = locale.substring(dot + 1).split('@')[0];
  return codeset ? codeset : Charsets.UTF_8;
}

/**
 * Whether ASCII text is encoded as itself in this charset
 *
 * True for the ISO-8859 family, UTF-8, Windows code pages and most legacy
 * charsets; false for the UTF-16/32 and UTF-7 families.
 */
export function isAsciiCompatible(charset: Charset | string): boolean {
  const name = (typeof charset === 'string' ? charset : charset.name).toLowerCase();
  return !/^(utf-?16|utf-?32|ucs-?2|ucs-?4|utf-?7)/.test(name);
}
