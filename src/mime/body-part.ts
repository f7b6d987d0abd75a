/**
 * BodyPart: a header and a body
 *
 * The root part of a tree is a whole message. Each part knows its parent
 * (null for the root) without owning it.
 *
 * @packageDocumentation
 */

import type { MimeContext } from '../context.js';
import { BufferOutputStream, type OutputStream } from '../utility/stream.js';
import { Body } from './body.js';
import { Header } from './header.js';

export class BodyPart {
  readonly header: Header;
  readonly body: Body;
  private parent: BodyPart | null = null;

  constructor(readonly context: MimeContext) {
    this.header = new Header(context.fields);
    this.body = new Body(this);
  }

  /**
   * Parses a message or part, replacing the current header and body
   *
   * @param input - Raw bytes, or a byte string (one char per byte)
   * @param start - First byte of the part
   * @param end - Position after the last byte
   */
  parse(input: Uint8Array | string, start: number = 0, end?: number): void {
    const buffer = typeof input === 'string' ? input : Buffer.from(input).toString('latin1');
    const stop = Math.min(end ?? buffer.length, buffer.length);

    this.header.fields.clear();
    const bodyStart = this.header.parse(buffer, start, stop, {
      defaultCharset: this.context.options.defaultCharset,
    });
    this.body.parse(buffer, bodyStart, stop);
  }

  /**
   * Generates the part: header, blank line, body
   *
   * @throws UnknownEncodingError when a body's encoding is not registered
   */
  generate(maxLineLength: number = this.context.options.maxLineLength): Buffer {
    const out = new BufferOutputStream();
    this.generateTo(out, maxLineLength);
    return out.toBuffer();
  }

  generateTo(output: OutputStream, maxLineLength: number = this.context.options.maxLineLength): void {
    // The body may add header fields (boundary, transfer encoding)
    const body = this.body.generate(maxLineLength);
    this.header.generateTo(output, maxLineLength);
    output.write('\r\n');
    output.write(body);
  }

  getParentPart(): BodyPart | null {
    return this.parent;
  }

  /**
   * Sets the parent back-reference
   *
   * @internal Called by Body when the part is added or removed
   */
  attachTo(parent: BodyPart | null): void {
    this.parent = parent;
  }

  /**
   * Creates an empty part sharing this part's context
   */
  createChild(): BodyPart {
    return new BodyPart(this.context);
  }

  /**
   * Deep copy; the copy has no parent
   */
  clone(): BodyPart {
    const part = new BodyPart(this.context);
    part.copyFrom(this);
    return part;
  }

  /**
   * Replaces header and body with copies of another part's
   */
  copyFrom(other: BodyPart): void {
    this.header.copyFrom(other.header);
    this.body.copyFrom(other.body);
  }
}
