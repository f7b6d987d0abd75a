/**
 * Header field base
 *
 * A field has a case-insensitive name and a typed value. Concrete variants
 * parse their value from a slice of the raw header and generate it back;
 * the base class adds the "Name: " prefix and folding.
 *
 * @packageDocumentation
 */

import { Charsets, isStringEqualNoCase } from '../../charset/charset.js';
import { TypeMismatchError } from '../../types/errors.js';
import { err, ok, type Result } from '../../types/result.js';
import { foldText, LineLengthLimits, type FoldResult } from '../word-folder.js';
import { unfold } from '../values/structured.js';

/**
 * Discriminates the field variants
 */
export type FieldKind =
  | 'generic'
  | 'text'
  | 'mailbox'
  | 'mailbox-list'
  | 'address-list'
  | 'date'
  | 'relay'
  | 'message-id'
  | 'message-id-sequence'
  | 'parameterized'
  | 'content-type'
  | 'content-encoding'
  | 'content-disposition';

/**
 * Options for parsing a field value
 */
export interface FieldParseOptions {
  /** Charset assumed for raw 8-bit text (default: utf-8) */
  defaultCharset?: string;
}

/**
 * Constructor of a field variant, as registered with the factory
 */
export type FieldConstructor<T extends HeaderField = HeaderField> = new (name: string) => T;

export abstract class HeaderField {
  abstract readonly kind: FieldKind;
  private _name: string;

  constructor(name: string) {
    this._name = name;
  }

  /** Name as written (case preserved) */
  get name(): string {
    return this._name;
  }

  /**
   * Whether the field has this name, ignoring case
   */
  isNamed(name: string): boolean {
    return isStringEqualNoCase(this._name, name);
  }

  /**
   * Parses the value from a slice of a byte string (one char per byte)
   *
   * Never fails: text that cannot be interpreted is kept as it is.
   */
  abstract parseValue(buffer: string, start?: number, end?: number, options?: FieldParseOptions): void;

  /**
   * Canonical value text, unfolded
   */
  abstract generateValue(): string;

  /**
   * Generates "Name: value", folded
   *
   * @param maxLineLength - Line length budget
   * @param curLinePos - Column where the field starts
   */
  generate(maxLineLength: number = LineLengthLimits.convenient, curLinePos: number = 0): FoldResult {
    const prefix = `${this._name}: `;
    const folded = this.foldValue(maxLineLength, curLinePos + prefix.length);
    return { output: prefix + folded.output, newLinePos: folded.newLinePos };
  }

  /**
   * Folds the generated value; variants holding text encode it here too
   */
  protected foldValue(maxLineLength: number, curLinePos: number): FoldResult {
    return foldText(this.generateValue(), { maxLineLength, curLinePos });
  }

  /**
   * Copies the value of a field of the same variant
   *
   * @returns TypeMismatchError when the variants differ
   */
  copyFrom(other: HeaderField): Result<void, TypeMismatchError> {
    if (other.constructor !== this.constructor || !this.copyValue(other)) {
      return err(new TypeMismatchError(this._name, this.kind, other.kind));
    }
    return ok(undefined);
  }

  /**
   * Copies the value of `other` if it is of this variant
   *
   * @returns false when it is not
   */
  protected abstract copyValue(other: HeaderField): boolean;

  abstract clone(): HeaderField;

  toString(): string {
    return `${this._name}: ${this.generateValue()}`;
  }
}

/**
 * Slices and unfolds a field value
 */
export function sliceValue(buffer: string, start: number = 0, end: number = buffer.length): string {
  return unfold(buffer.substring(start, end));
}

export function defaultCharsetOf(options: FieldParseOptions | undefined): string {
  return options?.defaultCharset ?? Charsets.UTF_8;
}
