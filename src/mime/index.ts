/**
 * MIME Module
 *
 * The message model and its parse/generate pipeline:
 * - Words, encoded text and RFC 2047 folding
 * - Header fields and the field factory
 * - Header, Body and BodyPart trees
 *
 * @packageDocumentation
 */

export { Word } from './word.js';
export { EncodedText } from './encoded-text.js';
export {
  encodeAndFoldText,
  foldText,
  encodeWords,
  wordNeedsEncoding,
  LineLengthLimits,
} from './word-folder.js';
export type { FoldFlags, FoldOptions, FoldResult } from './word-folder.js';

export * from './values/index.js';
export * from './fields/index.js';

export { HeaderFieldFactory, registerStandardFields, FieldNames } from './field-factory.js';
export { Header, HeaderFieldList } from './header.js';
export { ContentHandler } from './content-handler.js';
export type { ExtractOptions } from './content-handler.js';
export { Body, findDelimiter } from './body.js';
export { BodyPart } from './body-part.js';
