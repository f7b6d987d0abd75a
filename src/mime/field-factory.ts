/**
 * Header field factory
 *
 * Maps field names (case-insensitive) to field variants. Names without a
 * registration get the Generic variant.
 *
 * @packageDocumentation
 */

import {
  AddressListField,
  ContentDispositionField,
  ContentEncodingField,
  ContentTypeField,
  DateField,
  GenericField,
  MailboxField,
  MailboxListField,
  MessageIdField,
  MessageIdSequenceField,
  RelayField,
  TextField,
  type FieldConstructor,
  type HeaderField,
} from './fields/index.js';

/**
 * Standard field names
 */
export const FieldNames = {
  FROM: 'From',
  SENDER: 'Sender',
  REPLY_TO: 'Reply-To',
  TO: 'To',
  CC: 'Cc',
  BCC: 'Bcc',
  SUBJECT: 'Subject',
  DATE: 'Date',
  MESSAGE_ID: 'Message-Id',
  IN_REPLY_TO: 'In-Reply-To',
  REFERENCES: 'References',
  RECEIVED: 'Received',
  RETURN_PATH: 'Return-Path',
  DELIVERED_TO: 'Delivered-To',
  COMMENTS: 'Comments',
  ORGANIZATION: 'Organization',
  MIME_VERSION: 'Mime-Version',
  CONTENT_TYPE: 'Content-Type',
  CONTENT_TRANSFER_ENCODING: 'Content-Transfer-Encoding',
  CONTENT_DISPOSITION: 'Content-Disposition',
  CONTENT_DESCRIPTION: 'Content-Description',
  CONTENT_ID: 'Content-Id',
  RESENT_FROM: 'Resent-From',
  RESENT_SENDER: 'Resent-Sender',
  RESENT_TO: 'Resent-To',
  RESENT_CC: 'Resent-Cc',
  RESENT_BCC: 'Resent-Bcc',
  RESENT_DATE: 'Resent-Date',
  RESENT_MESSAGE_ID: 'Resent-Message-Id',
} as const;

export class HeaderFieldFactory {
  private readonly constructors = new Map<string, FieldConstructor>();

  /**
   * Registers a variant under one or more names
   */
  register(names: string | readonly string[], ctor: FieldConstructor): this {
    for (const name of typeof names === 'string' ? [names] : names) {
      this.constructors.set(name.toLowerCase(), ctor);
    }
    return this;
  }

  isRegistered(name: string): boolean {
    return this.constructors.has(name.toLowerCase());
  }

  /**
   * Creates an empty field; unregistered names give a GenericField
   */
  create(name: string): HeaderField {
    const ctor = this.constructors.get(name.toLowerCase()) ?? GenericField;
    return new ctor(name);
  }

  /** Registered names, lower-cased */
  registeredNames(): string[] {
    return [...this.constructors.keys()];
  }
}

/**
 * Registers the standard RFC 2822 and MIME fields
 */
export function registerStandardFields(factory: HeaderFieldFactory): HeaderFieldFactory {
  return factory
    .register(
      [FieldNames.SENDER, FieldNames.DELIVERED_TO, FieldNames.RETURN_PATH, FieldNames.RESENT_SENDER],
      MailboxField
    )
    .register([FieldNames.FROM, FieldNames.RESENT_FROM], MailboxListField)
    .register(
      [
        FieldNames.TO,
        FieldNames.CC,
        FieldNames.BCC,
        FieldNames.REPLY_TO,
        FieldNames.RESENT_TO,
        FieldNames.RESENT_CC,
        FieldNames.RESENT_BCC,
      ],
      AddressListField
    )
    .register([FieldNames.DATE, FieldNames.RESENT_DATE], DateField)
    .register(
      [FieldNames.SUBJECT, FieldNames.COMMENTS, FieldNames.CONTENT_DESCRIPTION, FieldNames.ORGANIZATION],
      TextField
    )
    .register([FieldNames.MESSAGE_ID, FieldNames.CONTENT_ID, FieldNames.RESENT_MESSAGE_ID], MessageIdField)
    .register([FieldNames.IN_REPLY_TO, FieldNames.REFERENCES], MessageIdSequenceField)
    .register(FieldNames.CONTENT_TYPE, ContentTypeField)
    .register(FieldNames.CONTENT_TRANSFER_ENCODING, ContentEncodingField)
    .register(FieldNames.CONTENT_DISPOSITION, ContentDispositionField)
    .register(FieldNames.RECEIVED, RelayField);
}
