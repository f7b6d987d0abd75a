/**
 * Structured header values
 */

export { Mailbox, MailboxGroup, parseAddressList, parseMailboxList, generateAddressList } from './mailbox.js';
export type { Address } from './mailbox.js';
export { DateTime } from './date-time.js';
export { MediaType, MediaTypes } from './media-type.js';
export { MessageId, parseMessageIdList } from './message-id.js';
export { Parameter, parseParameterList, findParameter } from './parameter.js';
export {
  unfold,
  splitTopLevel,
  indexOfTopLevel,
  extractComments,
  unquote,
  quote,
  quoteIfNeeded,
  normalizeWhitespace,
} from './structured.js';
