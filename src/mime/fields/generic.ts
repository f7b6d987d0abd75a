/**
 * Generic field: the raw value, kept verbatim
 */

import { HeaderField } from './header-field.js';
import type { FoldResult } from '../word-folder.js';

export class GenericField extends HeaderField {
  readonly kind = 'generic';
  /** Raw value as a byte string; continuation lines included */
  value = '';

  parseValue(buffer: string, start: number = 0, end: number = buffer.length): void {
    this.value = buffer.substring(start, end).replace(/\r?\n/g, '\r\n');
  }

  generateValue(): string {
    return this.value;
  }

  protected override foldValue(_maxLineLength: number, curLinePos: number): FoldResult {
    const lastBreak = this.value.lastIndexOf('\r\n');
    const newLinePos = lastBreak === -1 ? curLinePos + this.value.length : this.value.length - lastBreak - 2;
    return { output: this.value, newLinePos };
  }

  protected copyValue(other: HeaderField): boolean {
    if (!(other instanceof GenericField)) return false;
    this.value = other.value;
    return true;
  }

  clone(): GenericField {
    const field = new GenericField(this.name);
    field.value = this.value;
    return field;
  }
}
