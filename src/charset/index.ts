/**
 * Charset names and transcoding
 *
 * @packageDocumentation
 */

export { Charset, Charsets, isStringEqualNoCase, localeCharset, isAsciiCompatible } from './charset.js';
export {
  CharsetConverter,
  iconvTranscoderProvider,
  decodeText,
  encodeText,
  splitCharacters,
  DEFAULT_TRANSCODER_BUFFER_SIZE,
} from './transcoder.js';
export type { ConversionStep, ConversionStats, Transcoder, TranscoderProvider } from './transcoder.js';
