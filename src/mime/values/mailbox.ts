/**
 * Mailboxes, groups and address lists (RFC 2822 section 3.4)
 *
 * @packageDocumentation
 */

import { Charsets } from '../../charset/charset.js';
import { EncodedText } from '../encoded-text.js';
import { encodeWords, wordNeedsEncoding } from '../word-folder.js';
import {
  extractComments,
  indexOfTopLevel,
  normalizeWhitespace,
  quoteIfNeeded,
  splitTopLevel,
  unquote,
} from './structured.js';

/**
 * Decodes a display name: comments removed, quotes removed, encoded words
 * decoded
 */
function parsePhrase(text: string, defaultCharset: string): EncodedText {
  const phrase = normalizeWhitespace(unquote(normalizeWhitespace(extractComments(text).text)));
  return EncodedText.parse(phrase, defaultCharset);
}

/**
 * Generates a display name, quoted or encoded as needed
 */
function generatePhrase(name: EncodedText): string {
  if (name.getWords().some(wordNeedsEncoding)) {
    // Specials in plain words would be taken as syntax outside quotes
    const specials = /[()<>[\]:;@\\,."]/.test(name.toString());
    return encodeWords(name, { forceEncoding: specials });
  }
  return quoteIfNeeded(name.toString());
}

function toEncodedText(name: EncodedText | string): EncodedText {
  return typeof name === 'string' ? EncodedText.fromString(name, Charsets.UTF_8) : name.clone();
}

export class Mailbox {
  readonly kind = 'mailbox';
  /** Display name */
  name: EncodedText;
  /** Address (addr-spec) */
  email: string;

  constructor(email: string = '', name: EncodedText | string = new EncodedText()) {
    this.email = email;
    this.name = toEncodedText(name);
  }

  /**
   * Parses "Name <local@domain>", "<local@domain>" or
   * "local@domain (Name)"
   */
  static parse(text: string, defaultCharset: string = Charsets.UTF_8): Mailbox {
    const open = indexOfTopLevel(text, '<');
    if (open !== -1) {
      const close = text.indexOf('>', open);
      const spec = text.substring(open + 1, close === -1 ? text.length : close);
      return new Mailbox(
        extractComments(spec).text.replace(/\s+/g, ''),
        parsePhrase(text.substring(0, open), defaultCharset)
      );
    }

    const { text: spec, comments } = extractComments(text);
    const mailbox = new Mailbox(unquoteLocalPart(spec.replace(/\s+/g, '')));
    if (comments.length > 0 && comments[0] !== '') {
      mailbox.name = EncodedText.parse(comments[0], defaultCharset);
    }
    return mailbox;
  }

  generate(): string {
    if (this.name.isEmpty()) {
      return this.email;
    }
    return `${generatePhrase(this.name)} <${this.email}>`;
  }

  isEmpty(): boolean {
    return this.email === '';
  }

  /** Compares address (case-insensitively) and decoded display name */
  equals(other: Address): boolean {
    return (
      other.kind === 'mailbox' &&
      this.email.toLowerCase() === other.email.toLowerCase() &&
      this.name.toString() === other.name.toString()
    );
  }

  clone(): Mailbox {
    return new Mailbox(this.email, this.name);
  }

  toString(): string {
    const name = this.name.toString();
    return name ? `${name} <${this.email}>` : this.email;
  }
}

/**
 * Keeps a quoted local part quoted, drops quotes elsewhere
 */
function unquoteLocalPart(spec: string): string {
  return spec.startsWith('"') ? spec : unquote(spec);
}

export class MailboxGroup {
  readonly kind = 'group';
  name: EncodedText;
  mailboxes: Mailbox[];

  constructor(name: EncodedText | string = new EncodedText(), mailboxes: readonly Mailbox[] = []) {
    this.name = toEncodedText(name);
    this.mailboxes = mailboxes.map((mailbox) => mailbox.clone());
  }

  /**
   * Parses "Name: mailbox, mailbox;"
   */
  static parse(text: string, defaultCharset: string = Charsets.UTF_8): MailboxGroup {
    const colon = indexOfTopLevel(text, ':');
    if (colon === -1) {
      return new MailboxGroup(parsePhrase(text, defaultCharset));
    }
    const semicolon = indexOfTopLevel(text, ';', colon + 1);
    const members = text.substring(colon + 1, semicolon === -1 ? text.length : semicolon);
    return new MailboxGroup(
      parsePhrase(text.substring(0, colon), defaultCharset),
      parseMailboxList(members, defaultCharset)
    );
  }

  generate(): string {
    const members = this.mailboxes.map((mailbox) => mailbox.generate()).join(', ');
    return `${generatePhrase(this.name)}:${members ? ' ' + members : ''};`;
  }

  isEmpty(): boolean {
    return this.mailboxes.length === 0;
  }

  equals(other: Address): boolean {
    return (
      other.kind === 'group' &&
      this.name.toString() === other.name.toString() &&
      this.mailboxes.length === other.mailboxes.length &&
      this.mailboxes.every((mailbox, i) => mailbox.equals(other.mailboxes[i]))
    );
  }

  clone(): MailboxGroup {
    return new MailboxGroup(this.name, this.mailboxes);
  }

  toString(): string {
    return `${this.name.toString()}: ${this.mailboxes.map(String).join(', ')};`;
  }
}

export type Address = Mailbox | MailboxGroup;

function isGroup(item: string): boolean {
  return indexOfTopLevel(item, ':') !== -1;
}

/**
 * Parses a comma-separated list of mailboxes and groups
 *
 * Empty items are skipped.
 */
export function parseAddressList(text: string, defaultCharset: string = Charsets.UTF_8): Address[] {
  const addresses: Address[] = [];
  for (const item of splitTopLevel(text, ',', { groups: true })) {
    if (item.trim() === '') continue;
    addresses.push(isGroup(item) ? MailboxGroup.parse(item, defaultCharset) : Mailbox.parse(item, defaultCharset));
  }
  return addresses;
}

/**
 * Parses a comma-separated list of mailboxes; group members are flattened
 */
export function parseMailboxList(text: string, defaultCharset: string = Charsets.UTF_8): Mailbox[] {
  const mailboxes: Mailbox[] = [];
  for (const address of parseAddressList(text, defaultCharset)) {
    if (address.kind === 'group') {
      mailboxes.push(...address.mailboxes);
    } else if (!address.isEmpty()) {
      mailboxes.push(address);
    }
  }
  return mailboxes;
}

/**
 * Generates a comma-separated address list
 */
export function generateAddressList(addresses: readonly Address[]): string {
  return addresses.map((address) => address.generate()).join(', ');
}
