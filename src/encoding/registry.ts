/**
 * Encoder Registry
 *
 * Maps content-transfer-encoding names to encoder factories. Filled once
 * when a context is created and only read afterwards.
 */

import { Encoder, type EncoderProperties } from './encoder.js';
import { Base64Encoder } from './base64.js';
import { QuotedPrintableEncoder } from './quoted-printable.js';
import { UUEncoder } from './uuencode.js';
import { IdentityEncoder } from './identity.js';
import { UnknownEncodingError } from '../types/errors.js';
import { ok, err, type Result } from '../types/result.js';
import { createLogger } from '../utility/logger.js';

const log = createLogger('encoding');

export type EncoderFactory = (properties: EncoderProperties) => Encoder;

export class EncoderRegistry {
  private readonly factories = new Map<string, EncoderFactory>();

  /**
   * Registers a factory under one or more names (case-insensitive)
   */
  register(names: string | readonly string[], factory: EncoderFactory): this {
    for (const name of typeof names === 'string' ? [names] : names) {
      this.factories.set(name.toLowerCase(), factory);
    }
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name.trim().toLowerCase());
  }

  /**
   * Creates an encoder for a name
   *
   * @returns The encoder, or UnknownEncodingError for unregistered names
   */
  create(name: string, properties: EncoderProperties = {}): Result<Encoder, UnknownEncodingError> {
    const factory = this.factories.get(name.trim().toLowerCase());
    if (!factory) {
      log('no encoder registered for %j', name);
      return err(new UnknownEncodingError(name));
    }
    return ok(factory(properties));
  }

  /** Registered names, lower-cased */
  names(): string[] {
    return [...this.factories.keys()];
  }
}

/**
 * Registers the standard content-transfer-encodings
 */
export function registerStandardEncoders(registry: EncoderRegistry): EncoderRegistry {
  return registry
    .register('base64', (properties) => new Base64Encoder(properties))
    .register('quoted-printable', (properties) => new QuotedPrintableEncoder(properties))
    .register(['uuencode', 'x-uuencode', 'x-uue'], (properties) => new UUEncoder(properties))
    .register('7bit', (properties) => new IdentityEncoder('7bit', properties))
    .register('8bit', (properties) => new IdentityEncoder('8bit', properties))
    .register('binary', (properties) => new IdentityEncoder('binary', properties));
}
