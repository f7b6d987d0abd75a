/**
 * Address fields
 *
 * - Mailbox: one mailbox (Sender, Return-Path, ...)
 * - MailboxList: mailboxes (From, Resent-From)
 * - AddressList: mailboxes and groups (To, Cc, Bcc, Reply-To, ...)
 */

import {
  generateAddressList,
  Mailbox,
  parseAddressList,
  parseMailboxList,
  type Address,
} from '../values/mailbox.js';
import { defaultCharsetOf, HeaderField, sliceValue, type FieldParseOptions } from './header-field.js';

export class MailboxField extends HeaderField {
  readonly kind = 'mailbox';
  value = new Mailbox();

  parseValue(buffer: string, start?: number, end?: number, options?: FieldParseOptions): void {
    this.value = Mailbox.parse(sliceValue(buffer, start, end), defaultCharsetOf(options));
  }

  generateValue(): string {
    return this.value.generate();
  }

  protected copyValue(other: HeaderField): boolean {
    if (!(other instanceof MailboxField)) return false;
    this.value = other.value.clone();
    return true;
  }

  clone(): MailboxField {
    const field = new MailboxField(this.name);
    field.value = this.value.clone();
    return field;
  }
}

export class MailboxListField extends HeaderField {
  readonly kind = 'mailbox-list';
  value: Mailbox[] = [];

  parseValue(buffer: string, start?: number, end?: number, options?: FieldParseOptions): void {
    this.value = parseMailboxList(sliceValue(buffer, start, end), defaultCharsetOf(options));
  }

  generateValue(): string {
    return generateAddressList(this.value);
  }

  protected copyValue(other: HeaderField): boolean {
    if (!(other instanceof MailboxListField)) return false;
    this.value = other.value.map((mailbox) => mailbox.clone());
    return true;
  }

  clone(): MailboxListField {
    const field = new MailboxListField(this.name);
    field.copyValue(this);
    return field;
  }
}

export class AddressListField extends HeaderField {
  readonly kind = 'address-list';
  value: Address[] = [];

  parseValue(buffer: string, start?: number, end?: number, options?: FieldParseOptions): void {
    this.value = parseAddressList(sliceValue(buffer, start, end), defaultCharsetOf(options));
  }

  generateValue(): string {
    return generateAddressList(this.value);
  }

  /**
   * All mailboxes, with group members flattened
   */
  getMailboxes(): Mailbox[] {
    return this.value.flatMap((address) => (address.kind === 'group' ? address.mailboxes : [address]));
  }

  protected copyValue(other: HeaderField): boolean {
    if (!(other instanceof AddressListField)) return false;
    this.value = other.value.map((address) => address.clone());
    return true;
  }

  clone(): AddressListField {
    const field = new AddressListField(this.name);
    field.copyValue(this);
    return field;
  }
}
