/**
 * Parameterized fields: a value followed by "; name=value" parameters
 *
 * @packageDocumentation
 */

import { Charset } from '../../charset/charset.js';
import { MediaType } from '../values/media-type.js';
import { findParameter, Parameter, parseParameterList } from '../values/parameter.js';
import type { Word } from '../word.js';
import { defaultCharsetOf, HeaderField, sliceValue, type FieldParseOptions } from './header-field.js';

export class ParameterizedField extends HeaderField {
  readonly kind: 'parameterized' | 'content-type' | 'content-disposition' = 'parameterized';
  /** Value before the first ";" */
  value = '';
  parameters: Parameter[] = [];

  parseValue(buffer: string, start?: number, end?: number, options?: FieldParseOptions): void {
    const parsed = parseParameterList(sliceValue(buffer, start, end), defaultCharsetOf(options));
    this.value = parsed.value;
    this.parameters = parsed.parameters;
  }

  generateValue(): string {
    return [this.value, ...this.parameters.flatMap((parameter) => parameter.generate())].join('; ');
  }

  getParameter(name: string): Parameter | undefined {
    return findParameter(this.parameters, name);
  }

  /** Decoded value of a parameter */
  getParameterValue(name: string): string | undefined {
    return this.getParameter(name)?.getValue();
  }

  hasParameter(name: string): boolean {
    return this.getParameter(name) !== undefined;
  }

  /**
   * Sets a parameter, replacing the value of an existing one in place
   */
  setParameter(name: string, value: Word | string, charset?: Charset | string): Parameter {
    const parameter = new Parameter(name, value, charset);
    const index = this.parameters.findIndex((existing) => existing.name.toLowerCase() === name.toLowerCase());
    if (index === -1) {
      this.parameters.push(parameter);
    } else {
      this.parameters[index] = parameter;
    }
    return parameter;
  }

  removeParameter(name: string): boolean {
    const before = this.parameters.length;
    this.parameters = this.parameters.filter((parameter) => parameter.name.toLowerCase() !== name.toLowerCase());
    return this.parameters.length !== before;
  }

  protected copyValue(other: HeaderField): boolean {
    if (!(other instanceof ParameterizedField)) return false;
    this.value = other.value;
    this.parameters = other.parameters.map((parameter) => parameter.clone());
    return true;
  }

  clone(): ParameterizedField {
    const field = new ParameterizedField(this.name);
    field.copyValue(this);
    return field;
  }
}

/**
 * Content-Type: media type plus parameters (boundary, charset, ...)
 */
export class ContentTypeField extends ParameterizedField {
  override readonly kind = 'content-type';

  /** Parsed media type; a copy, assign to change it */
  get mediaType(): MediaType {
    return MediaType.parse(this.value);
  }

  set mediaType(mediaType: MediaType | string) {
    this.value = (typeof mediaType === 'string' ? MediaType.parse(mediaType) : mediaType).generate();
  }

  getBoundary(): string | undefined {
    return this.getParameterValue('boundary');
  }

  setBoundary(boundary: string): void {
    this.setParameter('boundary', boundary);
  }

  getCharset(): Charset | undefined {
    const name = this.getParameterValue('charset');
    return name ? new Charset(name) : undefined;
  }

  setCharset(charset: Charset | string): void {
    this.setParameter('charset', typeof charset === 'string' ? charset : charset.name);
  }

  override clone(): ContentTypeField {
    const field = new ContentTypeField(this.name);
    field.copyValue(this);
    return field;
  }
}

/**
 * Content-Disposition (RFC 2183): "inline" or "attachment" plus parameters
 */
export class ContentDispositionField extends ParameterizedField {
  override readonly kind = 'content-disposition';

  get disposition(): string {
    return this.value.toLowerCase();
  }

  set disposition(disposition: string) {
    this.value = disposition;
  }

  getFilename(): string | undefined {
    return this.getParameterValue('filename');
  }

  setFilename(filename: string, charset?: Charset | string): void {
    this.setParameter('filename', filename, charset);
  }

  override clone(): ContentDispositionField {
    const field = new ContentDispositionField(this.name);
    field.copyValue(this);
    return field;
  }
}
