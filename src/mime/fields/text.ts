/**
 * Unstructured text fields (Subject, Comments, ...)
 */

import { EncodedText } from '../encoded-text.js';
import { encodeAndFoldText, encodeWords, type FoldResult } from '../word-folder.js';
import { defaultCharsetOf, HeaderField, sliceValue, type FieldParseOptions } from './header-field.js';

export class TextField extends HeaderField {
  readonly kind = 'text';
  value = new EncodedText();

  parseValue(buffer: string, start?: number, end?: number, options?: FieldParseOptions): void {
    this.value = EncodedText.parse(sliceValue(buffer, start, end), defaultCharsetOf(options));
  }

  generateValue(): string {
    return encodeWords(this.value);
  }

  protected override foldValue(maxLineLength: number, curLinePos: number): FoldResult {
    return encodeAndFoldText(this.value, { maxLineLength, curLinePos });
  }

  /** Decoded text */
  getText(): string {
    return this.value.toString();
  }

  /**
   * Replaces the value with a string; non-ASCII runs go in `charset`
   */
  setText(text: string, charset: string = 'utf-8'): void {
    this.value = EncodedText.fromString(text, charset);
  }

  protected copyValue(other: HeaderField): boolean {
    if (!(other instanceof TextField)) return false;
    this.value = other.value.clone();
    return true;
  }

  clone(): TextField {
    const field = new TextField(this.name);
    field.value = this.value.clone();
    return field;
  }
}
