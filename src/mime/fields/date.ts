/**
 * Date fields (Date, Resent-Date)
 */

import { DateTime } from '../values/date-time.js';
import { HeaderField, sliceValue } from './header-field.js';

export class DateField extends HeaderField {
  readonly kind = 'date';
  /** Parsed date, or null when the text was not a date */
  value: DateTime | null = null;
  /** Text that did not parse as a date, regenerated as it was */
  private raw = '';

  parseValue(buffer: string, start?: number, end?: number): void {
    const text = sliceValue(buffer, start, end);
    this.value = DateTime.parse(text);
    this.raw = this.value ? '' : text.trim();
  }

  generateValue(): string {
    return this.value ? this.value.generate() : this.raw;
  }

  protected copyValue(other: HeaderField): boolean {
    if (!(other instanceof DateField)) return false;
    this.value = other.value ? other.value.clone() : null;
    this.raw = other.raw;
    return true;
  }

  clone(): DateField {
    const field = new DateField(this.name);
    field.copyValue(this);
    return field;
  }
}
