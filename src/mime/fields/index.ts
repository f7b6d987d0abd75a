/**
 * Header field variants
 */

export { HeaderField, sliceValue } from './header-field.js';
export type { FieldKind, FieldParseOptions, FieldConstructor } from './header-field.js';
export { GenericField } from './generic.js';
export { TextField } from './text.js';
export { MailboxField, MailboxListField, AddressListField } from './address.js';
export { DateField } from './date.js';
export { RelayField } from './relay.js';
export { MessageIdField, MessageIdSequenceField } from './message-id.js';
export { ParameterizedField, ContentTypeField, ContentDispositionField } from './parameterized.js';
export { ContentEncodingField } from './content-encoding.js';
