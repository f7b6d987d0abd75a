/**
 * Message id fields
 *
 * - MessageId: one id (Message-Id, Content-Id, Resent-Message-Id)
 * - MessageIdSequence: ids separated by whitespace (In-Reply-To, References)
 */

import { MessageId, parseMessageIdList } from '../values/message-id.js';
import { HeaderField, sliceValue } from './header-field.js';

export class MessageIdField extends HeaderField {
  readonly kind = 'message-id';
  value = new MessageId();

  parseValue(buffer: string, start?: number, end?: number): void {
    this.value = MessageId.parse(sliceValue(buffer, start, end));
  }

  generateValue(): string {
    return this.value.generate();
  }

  protected copyValue(other: HeaderField): boolean {
    if (!(other instanceof MessageIdField)) return false;
    this.value = other.value.clone();
    return true;
  }

  clone(): MessageIdField {
    const field = new MessageIdField(this.name);
    field.value = this.value.clone();
    return field;
  }
}

export class MessageIdSequenceField extends HeaderField {
  readonly kind = 'message-id-sequence';
  value: MessageId[] = [];

  parseValue(buffer: string, start?: number, end?: number): void {
    this.value = parseMessageIdList(sliceValue(buffer, start, end));
  }

  generateValue(): string {
    return this.value.map((id) => id.generate()).join(' ');
  }

  protected copyValue(other: HeaderField): boolean {
    if (!(other instanceof MessageIdSequenceField)) return false;
    this.value = other.value.map((id) => id.clone());
    return true;
  }

  clone(): MessageIdSequenceField {
    const field = new MessageIdSequenceField(this.name);
    field.copyValue(this);
    return field;
  }
}
