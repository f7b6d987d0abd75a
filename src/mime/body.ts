/**
 * Body: leaf content or a list of parts
 *
 * A body with parts is multipart: it is generated as a prolog, the parts
 * between boundary delimiter lines, and an epilog (RFC 2046 section 5.1).
 * Otherwise the body is a leaf holding content bytes.
 *
 * @packageDocumentation
 */

import { Charset } from '../charset/charset.js';
import { decodeText, encodeText } from '../charset/transcoder.js';
import { Encoding, EncodingTypes } from '../encoding/encoding.js';
import type { ConversionUnavailableError, UnknownEncodingError } from '../types/errors.js';
import { ok, unwrap, type Result } from '../types/result.js';
import { createLogger } from '../utility/logger.js';
import type { ProgressListener } from '../utility/progress.js';
import { BufferOutputStream, type OutputStream } from '../utility/stream.js';
import type { BodyPart } from './body-part.js';
import { ContentHandler, type ExtractOptions } from './content-handler.js';
import { FieldNames } from './field-factory.js';
import { ContentEncodingField } from './fields/content-encoding.js';
import { ContentTypeField } from './fields/parameterized.js';

const log = createLogger('body');

/** Found boundary delimiter line */
interface Delimiter {
  /** Position of the leading "--" */
  index: number;
  /** Position after the line end */
  next: number;
  /** "--boundary--" */
  close: boolean;
}

/**
 * Finds the next delimiter line "--boundary" (or "--boundary--") that starts
 * a line at or after `from`; trailing whitespace on the line is allowed
 */
export function findDelimiter(
  buffer: string,
  boundary: string,
  from: number,
  end: number,
  regionStart: number = from
): Delimiter | null {
  const marker = '--' + boundary;
  let search = from;

  for (;;) {
    const index = buffer.indexOf(marker, search);
    if (index === -1 || index + marker.length > end) {
      return null;
    }

    const atLineStart = index === regionStart || buffer[index - 1] === '\n';
    let pos = index + marker.length;
    const close = buffer.startsWith('--', pos) && pos + 2 <= end;
    if (close) pos += 2;
    while (pos < end && (buffer[pos] === ' ' || buffer[pos] === '\t')) pos++;

    if (atLineStart) {
      if (pos >= end) {
        return { index, next: end, close };
      }
      if (buffer[pos] === '\n') {
        return { index, next: pos + 1, close };
      }
      if (buffer[pos] === '\r' && buffer[pos + 1] === '\n' && pos + 1 < end) {
        return { index, next: pos + 2, close };
      }
    }
    search = index + 1;
  }
}

/**
 * End of the content before a delimiter: the line break in front of the
 * delimiter belongs to the delimiter
 */
function contentEnd(buffer: string, delimiterIndex: number, contentStart: number): number {
  let end = delimiterIndex;
  if (end > contentStart && buffer[end - 1] === '\n') {
    end--;
    if (end > contentStart && buffer[end - 1] === '\r') end--;
  }
  return end;
}

/**
 * Takes the boundary from the first line starting with "--"
 */
function guessBoundary(buffer: string, start: number, end: number): string | null {
  const match = /(?:^|\n)--([^\r\n]+)/.exec(buffer.substring(start, end));
  if (!match) {
    return null;
  }
  const boundary = match[1].trim().replace(/--$/, '');
  return boundary === '' ? null : boundary;
}

function isIdentityEncoding(encoding: Encoding): boolean {
  return (
    encoding.equals(EncodingTypes.SEVEN_BIT) ||
    encoding.equals(EncodingTypes.EIGHT_BIT) ||
    encoding.equals(EncodingTypes.BINARY)
  );
}

export class Body {
  private parts: BodyPart[] = [];
  /** Text before the first delimiter (byte string) */
  prolog = '';
  /** Text after the closing delimiter (byte string) */
  epilog = '';
  contents = new ContentHandler();
  /** Charset of leaf text content */
  charset: Charset;

  constructor(private readonly part: BodyPart) {
    this.charset = new Charset(part.context.options.defaultCharset);
  }

  /**
   * Parses the body from a byte string, using the part's header to tell
   * multipart from leaf content
   */
  parse(buffer: string, start: number = 0, end: number = buffer.length): void {
    this.removeAllParts();
    this.prolog = '';
    this.epilog = '';

    const fields = this.part.header.fields;
    const contentType = fields.findAs(FieldNames.CONTENT_TYPE, ContentTypeField);
    this.charset = (contentType.ok ? contentType.value.getCharset() : undefined) ??
      new Charset(this.part.context.options.defaultCharset);

    if (contentType.ok && contentType.value.mediaType.isMultipart()) {
      let boundary = contentType.value.getBoundary() ?? null;
      if (!boundary) {
        boundary = guessBoundary(buffer, start, end);
        log('multipart without boundary parameter, guessed %j', boundary);
      }
      if (boundary && this.parseMultipart(buffer, start, end, boundary)) {
        this.contents = new ContentHandler();
        return;
      }
      log('no boundary delimiter found, parsing multipart body as a leaf');
    }

    const transferEncoding = fields.findAs(FieldNames.CONTENT_TRANSFER_ENCODING, ContentEncodingField);
    const encoding = transferEncoding.ok ? transferEncoding.value.value : new Encoding(EncodingTypes.SEVEN_BIT);
    this.contents = new ContentHandler(buffer.substring(start, end), encoding);
  }

  /**
   * @returns false when no part was found
   */
  private parseMultipart(buffer: string, start: number, end: number, boundary: string): boolean {
    let delimiter = findDelimiter(buffer, boundary, start, end);
    if (!delimiter) {
      return false;
    }

    const prolog = buffer.substring(start, contentEnd(buffer, delimiter.index, start));
    const parts: BodyPart[] = [];
    let epilog = '';

    while (delimiter && !delimiter.close) {
      const partStart = delimiter.next;
      const following = findDelimiter(buffer, boundary, partStart, end, partStart);
      const partEnd = following ? contentEnd(buffer, following.index, partStart) : end;

      const child = this.part.createChild();
      child.parse(buffer, partStart, partEnd);
      parts.push(child);

      if (!following) {
        log('missing closing delimiter for boundary %j', boundary);
      }
      delimiter = following;
    }

    if (delimiter) {
      epilog = buffer.substring(delimiter.next, end);
    }
    if (parts.length === 0) {
      return false;
    }

    this.prolog = prolog;
    this.epilog = epilog;
    for (const child of parts) {
      this.appendPart(child);
    }
    return true;
  }

  /**
   * Generates the body bytes
   *
   * Header fields the body depends on are brought up to date first: a
   * multipart body gets a Content-Type boundary that no part contains, and
   * unencoded leaf content gets a Content-Transfer-Encoding.
   *
   * @throws UnknownEncodingError when the declared encoding is not registered
   * @throws TypeMismatchError when Content-Type or Content-Transfer-Encoding
   *   is registered to another field variant
   */
  generate(maxLineLength: number = this.part.context.options.maxLineLength): Buffer {
    return this.isMultipart() ? this.generateMultipart(maxLineLength) : this.generateLeaf();
  }

  generateTo(output: OutputStream, maxLineLength?: number): void {
    output.write(this.generate(maxLineLength));
  }

  private generateMultipart(maxLineLength: number): Buffer {
    const contentType = unwrap(this.part.header.fields.getOrCreateAs(FieldNames.CONTENT_TYPE, ContentTypeField));
    if (!contentType.mediaType.isMultipart()) {
      contentType.mediaType = 'multipart/mixed';
    }

    const children = this.parts.map((child) => child.generate(maxLineLength).toString('latin1'));
    const current = contentType.getBoundary();
    let boundary = current ?? '';
    while (boundary === '' || this.boundaryCollides(boundary, children)) {
      boundary = this.part.context.tokens.boundary();
    }
    if (boundary !== current) {
      contentType.setBoundary(boundary);
    }

    const out = new BufferOutputStream();
    if (this.prolog) {
      out.write(this.prolog + '\r\n');
    }
    for (const child of children) {
      out.write(`--${boundary}\r\n`);
      out.write(child);
      out.write('\r\n');
    }
    out.write(`--${boundary}--\r\n`);
    out.write(this.epilog);
    return out.toBuffer();
  }

  private boundaryCollides(boundary: string, children: readonly string[]): boolean {
    return [this.prolog, ...children].some((text) => findDelimiter(text, boundary, 0, text.length) !== null);
  }

  private generateLeaf(): Buffer {
    const fields = this.part.header.fields;
    const context = this.part.context;
    const declared = fields.findAs(FieldNames.CONTENT_TRANSFER_ENCODING, ContentEncodingField);

    let target: Encoding;
    if (declared.ok) {
      target = declared.value.value;
    } else if (this.contents.encoding) {
      // No header means 7bit, so encoded content has to declare itself
      if (!isIdentityEncoding(this.contents.encoding)) {
        unwrap(fields.getOrCreateAs(FieldNames.CONTENT_TRANSFER_ENCODING, ContentEncodingField)).value =
          this.contents.encoding.clone();
      }
      return this.contents.raw;
    } else {
      target = Encoding.decide(this.contents.raw);
      unwrap(fields.getOrCreateAs(FieldNames.CONTENT_TRANSFER_ENCODING, ContentEncodingField)).value = target;
    }

    return unwrap(
      this.contents.encodeAs(context.encoders, target, {
        maxLineLength: context.options.encoderLineLength,
        text: this.isText(),
      })
    );
  }

  /**
   * Whether the content is text: Content-Type text/*, or no Content-Type
   */
  isText(): boolean {
    const contentType = this.part.header.fields.findAs(FieldNames.CONTENT_TYPE, ContentTypeField);
    return contentType.ok ? contentType.value.mediaType.isText() : !this.part.header.fields.has(FieldNames.CONTENT_TYPE);
  }

  /**
   * Replaces the content with bytes
   *
   * @param encoding - Encoding the bytes are in; null when not encoded
   */
  setContents(data: Uint8Array | string | ContentHandler, encoding: Encoding | null = null): void {
    this.contents = data instanceof ContentHandler ? data.clone() : new ContentHandler(data, encoding);
  }

  /**
   * Replaces the content with text encoded in a charset, and declares the
   * charset in Content-Type
   */
  setText(text: string, charset: Charset | string = this.charset): void {
    this.charset = typeof charset === 'string' ? new Charset(charset) : charset.clone();
    this.contents = new ContentHandler(encodeText(text, this.charset), null);

    const contentType = unwrap(this.part.header.fields.getOrCreateAs(FieldNames.CONTENT_TYPE, ContentTypeField));
    if (contentType.value === '') {
      contentType.mediaType = 'text/plain';
    }
    contentType.setCharset(this.charset);
  }

  /**
   * Writes the decoded content, or a range of it
   *
   * @returns Bytes written, or UnknownEncodingError
   */
  extract(output: OutputStream, options: ExtractOptions = {}): Result<number, UnknownEncodingError> {
    return this.contents.extract(this.part.context.encoders, output, options);
  }

  /**
   * Writes the content as stored, still encoded
   */
  extractRaw(output: OutputStream, progress?: ProgressListener): number {
    return this.contents.extractRaw(output, progress);
  }

  getDecodedContent(): Result<Buffer, UnknownEncodingError> {
    return this.contents.decode(this.part.context.encoders);
  }

  /**
   * Decoded content as a string, read in the body's charset
   */
  getText(): Result<string, UnknownEncodingError> {
    const decoded = this.getDecodedContent();
    return decoded.ok ? ok(decodeText(decoded.value, this.charset)) : decoded;
  }

  /**
   * Decoded content converted to another charset
   */
  getConvertedText(dest: Charset | string): Result<Buffer, UnknownEncodingError | ConversionUnavailableError> {
    const decoded = this.getDecodedContent();
    if (!decoded.ok) {
      return decoded;
    }
    return this.part.context.converter.convertBuffer(decoded.value, this.charset, dest);
  }

  isMultipart(): boolean {
    return this.parts.length > 0;
  }

  appendPart(part: BodyPart): void {
    part.attachTo(this.part);
    this.parts.push(part);
  }

  insertPartAt(index: number, part: BodyPart): void {
    part.attachTo(this.part);
    this.parts.splice(Math.max(0, Math.min(index, this.parts.length)), 0, part);
  }

  /**
   * Inserts before a part; appends when `before` is not a child
   */
  insertPartBefore(before: BodyPart, part: BodyPart): void {
    const index = this.parts.indexOf(before);
    this.insertPartAt(index === -1 ? this.parts.length : index, part);
  }

  /**
   * Inserts after a part; appends when `after` is not a child
   */
  insertPartAfter(after: BodyPart, part: BodyPart): void {
    const index = this.parts.indexOf(after);
    this.insertPartAt(index === -1 ? this.parts.length : index + 1, part);
  }

  /**
   * Removes a child, detaching it from this part
   *
   * @returns Whether it was a child
   */
  removePart(part: BodyPart): boolean {
    const index = this.parts.indexOf(part);
    if (index === -1) return false;
    this.parts.splice(index, 1);
    part.attachTo(null);
    return true;
  }

  removeAllParts(): void {
    for (const child of this.parts) {
      child.attachTo(null);
    }
    this.parts = [];
  }

  getPartAt(index: number): BodyPart | undefined {
    return this.parts[index];
  }

  getPartCount(): number {
    return this.parts.length;
  }

  getParts(): readonly BodyPart[] {
    return this.parts;
  }

  /**
   * Replaces this body's content and parts with copies of another's
   */
  copyFrom(other: Body): void {
    this.removeAllParts();
    this.prolog = other.prolog;
    this.epilog = other.epilog;
    this.contents = other.contents.clone();
    this.charset = other.charset.clone();
    for (const child of other.parts) {
      this.appendPart(child.clone());
    }
  }
}
