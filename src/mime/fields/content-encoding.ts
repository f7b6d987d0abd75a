/**
 * Content-Transfer-Encoding field
 */

import { Encoding } from '../../encoding/encoding.js';
import { extractComments } from '../values/structured.js';
import { HeaderField, sliceValue } from './header-field.js';

export class ContentEncodingField extends HeaderField {
  readonly kind = 'content-encoding';
  value = new Encoding();

  parseValue(buffer: string, start?: number, end?: number): void {
    this.value = new Encoding();
    this.value.parse(extractComments(sliceValue(buffer, start, end)).text);
  }

  generateValue(): string {
    return this.value.generate();
  }

  protected copyValue(other: HeaderField): boolean {
    if (!(other instanceof ContentEncodingField)) return false;
    this.value = other.value.clone();
    return true;
  }

  clone(): ContentEncodingField {
    const field = new ContentEncodingField(this.name);
    field.value = this.value.clone();
    return field;
  }
}
