/**
 * Media type ("type/subtype")
 */

import { isStringEqualNoCase } from '../../charset/charset.js';

export const MediaTypes = {
  TEXT: 'text',
  MULTIPART: 'multipart',
  MESSAGE: 'message',
  APPLICATION: 'application',
  IMAGE: 'image',
  AUDIO: 'audio',
  VIDEO: 'video',
} as const;

export class MediaType {
  constructor(
    public type: string = MediaTypes.TEXT,
    public subType: string = 'plain'
  ) {}

  /**
   * Parses "type/subtype"; names are lower-cased
   */
  static parse(text: string): MediaType {
    const value = text.trim();
    const slash = value.indexOf('/');
    if (slash === -1) {
      return new MediaType(value.toLowerCase(), '');
    }
    return new MediaType(
      value.substring(0, slash).trim().toLowerCase(),
      value.substring(slash + 1).trim().toLowerCase()
    );
  }

  generate(): string {
    return this.subType ? `${this.type}/${this.subType}` : this.type;
  }

  isMultipart(): boolean {
    return isStringEqualNoCase(this.type, MediaTypes.MULTIPART);
  }

  isText(): boolean {
    return isStringEqualNoCase(this.type, MediaTypes.TEXT);
  }

  equals(other: MediaType | string): boolean {
    const media = typeof other === 'string' ? MediaType.parse(other) : other;
    return isStringEqualNoCase(this.type, media.type) && isStringEqualNoCase(this.subType, media.subType);
  }

  clone(): MediaType {
    return new MediaType(this.type, this.subType);
  }

  toString(): string {
    return this.generate();
  }
}
