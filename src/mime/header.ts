/**
 * Header: an ordered list of fields
 *
 * Field names may repeat. Lookups ignore case and return the first match.
 *
 * @packageDocumentation
 */

import { NoSuchFieldError, TypeMismatchError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { createLogger } from '../utility/logger.js';
import type { OutputStream } from '../utility/stream.js';
import { HeaderFieldFactory, registerStandardFields } from './field-factory.js';
import type { FieldConstructor, FieldParseOptions, HeaderField } from './fields/header-field.js';
import { LineLengthLimits } from './word-folder.js';

const log = createLogger('header');

const CR = '\r';
const LF = '\n';

function isWhitespace(char: string | undefined): boolean {
  return char === ' ' || char === '\t';
}

/**
 * The fields of a header, in order
 */
export class HeaderFieldList implements Iterable<HeaderField> {
  private fields: HeaderField[] = [];

  constructor(private readonly factory: HeaderFieldFactory) {}

  /**
   * First field with a name
   *
   * @returns The field, or NoSuchFieldError
   */
  find(name: string): Result<HeaderField, NoSuchFieldError> {
    const field = this.fields.find((candidate) => candidate.isNamed(name));
    return field ? ok(field) : err(new NoSuchFieldError(name));
  }

  /**
   * First field with a name, checked to be of a variant
   *
   * @returns The field, NoSuchFieldError or TypeMismatchError
   */
  findAs<T extends HeaderField>(
    name: string,
    fieldClass: FieldConstructor<T>
  ): Result<T, NoSuchFieldError | TypeMismatchError> {
    const found = this.find(name);
    if (!found.ok) {
      return found;
    }
    if (!(found.value instanceof fieldClass)) {
      return err(new TypeMismatchError(found.value.name, fieldClass.name, found.value.kind));
    }
    return ok(found.value);
  }

  /** All fields with a name, in order */
  findAll(name: string): HeaderField[] {
    return this.fields.filter((field) => field.isNamed(name));
  }

  has(name: string): boolean {
    return this.fields.some((field) => field.isNamed(name));
  }

  /**
   * First field with a name; a new one is created and appended when missing
   */
  getOrCreate(name: string): HeaderField {
    const found = this.find(name);
    if (found.ok) {
      return found.value;
    }
    const field = this.factory.create(name);
    this.fields.push(field);
    return field;
  }

  /**
   * Like getOrCreate, checked to be of a variant
   */
  getOrCreateAs<T extends HeaderField>(name: string, fieldClass: FieldConstructor<T>): Result<T, TypeMismatchError> {
    const field = this.getOrCreate(name);
    if (!(field instanceof fieldClass)) {
      return err(new TypeMismatchError(field.name, fieldClass.name, field.kind));
    }
    return ok(field);
  }

  /**
   * Creates a field of the variant registered for a name, without adding it
   */
  create(name: string): HeaderField {
    return this.factory.create(name);
  }

  append(field: HeaderField): void {
    this.fields.push(field);
  }

  /**
   * Inserts before a field; appends when `before` is not in the list
   */
  insertBefore(before: HeaderField, field: HeaderField): void {
    const index = this.fields.indexOf(before);
    this.fields.splice(index === -1 ? this.fields.length : index, 0, field);
  }

  /**
   * Inserts after a field; appends when `after` is not in the list
   */
  insertAfter(after: HeaderField, field: HeaderField): void {
    const index = this.fields.indexOf(after);
    this.fields.splice(index === -1 ? this.fields.length : index + 1, 0, field);
  }

  /**
   * Removes one field
   *
   * @returns Whether it was in the list
   */
  remove(field: HeaderField): boolean {
    const index = this.fields.indexOf(field);
    if (index === -1) return false;
    this.fields.splice(index, 1);
    return true;
  }

  /**
   * Removes every field with a name
   *
   * @returns Number of fields removed
   */
  removeAll(name: string): number {
    const before = this.fields.length;
    this.fields = this.fields.filter((field) => !field.isNamed(name));
    return before - this.fields.length;
  }

  clear(): void {
    this.fields = [];
  }

  count(): number {
    return this.fields.length;
  }

  at(index: number): HeaderField | undefined {
    return this.fields[index];
  }

  toArray(): HeaderField[] {
    return [...this.fields];
  }

  [Symbol.iterator](): Iterator<HeaderField> {
    return this.fields[Symbol.iterator]();
  }
}

export class Header {
  readonly fields: HeaderFieldList;

  constructor(private readonly factory: HeaderFieldFactory = registerStandardFields(new HeaderFieldFactory())) {
    this.fields = new HeaderFieldList(factory);
  }

  /**
   * Parses header lines from a byte string, appending the fields
   *
   * Stops after the blank line that ends the header (CRLF or bare LF), or at
   * `end`. Lines without a colon are skipped.
   *
   * @returns Position after the blank line
   */
  parse(buffer: string, start: number = 0, end: number = buffer.length, options: FieldParseOptions = {}): number {
    let pos = start;

    while (pos < end) {
      if (buffer[pos] === LF) {
        return pos + 1;
      }
      if (buffer[pos] === CR && buffer[pos + 1] === LF && pos + 1 < end) {
        return pos + 2;
      }

      // Extent of the field: the first line plus its continuation lines
      let lineEnd = pos;
      let next = pos;
      for (;;) {
        const lf = buffer.indexOf(LF, next);
        if (lf === -1 || lf >= end) {
          lineEnd = end;
          next = end;
          break;
        }
        lineEnd = lf > pos && buffer[lf - 1] === CR ? lf - 1 : lf;
        next = lf + 1;
        if (next >= end || !isWhitespace(buffer[next])) {
          break;
        }
      }

      this.parseField(buffer, pos, lineEnd, options);
      pos = next;
    }

    return pos;
  }

  private parseField(buffer: string, start: number, end: number, options: FieldParseOptions): void {
    const lineBreak = buffer.indexOf(LF, start);
    const firstLineEnd = lineBreak === -1 || lineBreak > end ? end : lineBreak;
    const colon = buffer.indexOf(':', start);

    if (isWhitespace(buffer[start]) || colon === -1 || colon >= firstLineEnd) {
      log('skipping header line without a field name: %j', buffer.substring(start, firstLineEnd));
      return;
    }

    const name = buffer.substring(start, colon).trim();
    if (name === '') {
      log('skipping header line with an empty field name');
      return;
    }

    let valueStart = colon + 1;
    while (valueStart < end && isWhitespace(buffer[valueStart])) {
      valueStart++;
    }

    const field = this.factory.create(name);
    field.parseValue(buffer, valueStart, end, options);
    this.fields.append(field);
  }

  /**
   * Generates the fields, each line ending in CRLF, without the blank line
   * that ends the header
   */
  generate(maxLineLength: number = LineLengthLimits.convenient): string {
    let output = '';
    for (const field of this.fields) {
      output += field.generate(maxLineLength, 0).output + '\r\n';
    }
    return output;
  }

  generateTo(output: OutputStream, maxLineLength: number = LineLengthLimits.convenient): void {
    output.write(this.generate(maxLineLength));
  }

  /**
   * Replaces the fields with copies of another header's fields
   */
  copyFrom(other: Header): void {
    this.fields.clear();
    for (const field of other.fields) {
      this.fields.append(field.clone());
    }
  }

  clone(): Header {
    const header = new Header(this.factory);
    header.copyFrom(this);
    return header;
  }
}
