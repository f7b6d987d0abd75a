/**
 * MimeContext: the registries and settings shared by a message tree
 *
 * Registries are filled once here and only read afterwards.
 *
 * @packageDocumentation
 */

import { hostname } from 'node:os';
import { localeCharset } from './charset/charset.js';
import { CharsetConverter, iconvTranscoderProvider } from './charset/transcoder.js';
import { EncoderRegistry, registerStandardEncoders } from './encoding/registry.js';
import { HeaderFieldFactory, registerStandardFields } from './mime/field-factory.js';
import { MessageId } from './mime/values/message-id.js';
import type { MimeOptions, ResolvedMimeOptions } from './types/config.js';
import { TokenGenerator } from './utility/random.js';

/**
 * Default configuration values
 */
const DEFAULT_MAX_LINE_LENGTH = 78;
const DEFAULT_ENCODER_LINE_LENGTH = 76;

export interface MimeContext {
  readonly options: ResolvedMimeOptions;
  /** Field variants by name */
  readonly fields: HeaderFieldFactory;
  /** Content-transfer-encodings by name */
  readonly encoders: EncoderRegistry;
  readonly converter: CharsetConverter;
  /** Boundaries and message ids */
  readonly tokens: TokenGenerator;
}

/**
 * Applies defaults to the options
 */
export function resolveMimeOptions(options: MimeOptions = {}): ResolvedMimeOptions {
  return {
    maxLineLength: options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH,
    defaultCharset: options.defaultCharset ?? localeCharset(),
    encoderLineLength: options.encoderLineLength ?? DEFAULT_ENCODER_LINE_LENGTH,
    transcoderProvider: options.transcoderProvider ?? iconvTranscoderProvider,
    clock: options.clock ?? Date.now,
    processId: options.processId ?? process.pid,
    hostname: options.hostname ?? hostname(),
    seed: options.seed,
  };
}

/**
 * Creates a context with the standard fields and encoders registered
 *
 * @example
 * ```typescript
 * const context = createMimeContext({ defaultCharset: 'utf-8' });
 * const message = new BodyPart(context);
 * message.parse(raw);
 * ```
 */
export function createMimeContext(options: MimeOptions = {}): MimeContext {
  const resolved = resolveMimeOptions(options);
  return {
    options: resolved,
    fields: registerStandardFields(new HeaderFieldFactory()),
    encoders: registerStandardEncoders(new EncoderRegistry()),
    converter: new CharsetConverter(resolved.transcoderProvider),
    tokens: new TokenGenerator({
      clock: resolved.clock,
      processId: resolved.processId,
      seed: resolved.seed,
    }),
  };
}

/**
 * Generates a new message id on the context's host name
 */
export function generateMessageId(context: MimeContext): MessageId {
  return MessageId.generateId(context.tokens, context.options.hostname);
}
