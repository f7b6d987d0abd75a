/**
 * Message identifiers (RFC 2822 section 3.6.4)
 */

import type { TokenGenerator } from '../../utility/random.js';
import { extractComments } from './structured.js';

export class MessageId {
  constructor(
    public left: string = '',
    public right: string = ''
  ) {}

  /**
   * Parses "<left@right>"; brackets are optional
   */
  static parse(text: string): MessageId {
    const value = extractComments(text).text.trim();
    const open = value.indexOf('<');
    const close = value.indexOf('>', open + 1);
    const inner = open === -1 ? value.split(/\s+/)[0] : value.substring(open + 1, close === -1 ? value.length : close);
    return MessageId.fromString(inner.trim());
  }

  /**
   * Splits "left@right" at the last "@"
   */
  static fromString(id: string): MessageId {
    const at = id.lastIndexOf('@');
    return at === -1 ? new MessageId(id, '') : new MessageId(id.substring(0, at), id.substring(at + 1));
  }

  /**
   * Generates a new unique id for a host
   */
  static generateId(tokens: TokenGenerator, hostname: string): MessageId {
    return new MessageId(tokens.messageIdLeft(), hostname);
  }

  /** The id without brackets */
  get id(): string {
    return this.right ? `${this.left}@${this.right}` : this.left;
  }

  generate(): string {
    return `<${this.id}>`;
  }

  isEmpty(): boolean {
    return this.left === '' && this.right === '';
  }

  equals(other: MessageId): boolean {
    return this.left === other.left && this.right === other.right;
  }

  clone(): MessageId {
    return new MessageId(this.left, this.right);
  }

  toString(): string {
    return this.generate();
  }
}

/**
 * Parses a whitespace-separated list of message ids (In-Reply-To, References)
 */
export function parseMessageIdList(text: string): MessageId[] {
  const value = extractComments(text).text;
  const bracketed = value.match(/<[^>]*>/g);
  if (bracketed) {
    return bracketed.map((id) => MessageId.parse(id)).filter((id) => !id.isEmpty());
  }
  return value
    .split(/[\s,]+/)
    .filter((token) => token !== '')
    .map((token) => MessageId.fromString(token));
}
