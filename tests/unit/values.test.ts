/**
 * Structured header values: addresses, dates, media types, message ids
 * and parameters
 */

import { describe, it, expect } from 'vitest';
import {
  generateAddressList,
  Mailbox,
  MailboxGroup,
  parseAddressList,
  parseMailboxList,
} from '../../src/mime/values/mailbox.js';
import { DateTime } from '../../src/mime/values/date-time.js';
import { MediaType } from '../../src/mime/values/media-type.js';
import { MessageId, parseMessageIdList } from '../../src/mime/values/message-id.js';
import { findParameter, Parameter, parseParameterList } from '../../src/mime/values/parameter.js';
import {
  extractComments,
  quoteIfNeeded,
  splitTopLevel,
  unfold,
  unquote,
} from '../../src/mime/values/structured.js';
import { TokenGenerator } from '../../src/utility/random.js';

describe('Structured value helpers', () => {
  it('should unfold continuation lines', () => {
    expect(unfold('a\r\n b\n\tc')).toBe('a b\tc');
  });

  it('should split outside quotes, comments and brackets', () => {
    expect(splitTopLevel('"a,b" <c,d> (e,f), g', ',')).toEqual(['"a,b" <c,d> (e,f)', ' g']);
  });

  it('should keep address groups together', () => {
    expect(splitTopLevel('G: a@x, b@y;, c@z', ',', { groups: true })).toEqual(['G: a@x, b@y;', ' c@z']);
  });

  it('should extract nested comments', () => {
    const result = extractComments('a (one (two)) b');

    expect(result.text).toBe('a   b');
    expect(result.comments).toEqual(['one (two)']);
  });

  it('should unquote and unescape', () => {
    expect(unquote('"a \\"b\\""')).toBe('a "b"');
  });

  it('should quote phrases with specials', () => {
    expect(quoteIfNeeded('John Doe')).toBe('John Doe');
    expect(quoteIfNeeded('Doe, John')).toBe('"Doe, John"');
    expect(quoteIfNeeded('J. "Jr" Doe')).toBe('"J. \\"Jr\\" Doe"');
  });
});

describe('Mailbox', () => {
  it('should parse a name and an angle address', () => {
    const mailbox = Mailbox.parse('John Doe <john@example.com>');

    expect(mailbox.name.toString()).toBe('John Doe');
    expect(mailbox.email).toBe('john@example.com');
    expect(mailbox.generate()).toBe('John Doe <john@example.com>');
  });

  it('should parse a bare address', () => {
    const mailbox = Mailbox.parse(' jane@example.com ');

    expect(mailbox.email).toBe('jane@example.com');
    expect(mailbox.name.isEmpty()).toBe(true);
    expect(mailbox.generate()).toBe('jane@example.com');
  });

  it('should take the name from a trailing comment', () => {
    const mailbox = Mailbox.parse('john@example.com (John Doe)');

    expect(mailbox.email).toBe('john@example.com');
    expect(mailbox.name.toString()).toBe('John Doe');
  });

  it('should unquote a quoted display name', () => {
    const mailbox = Mailbox.parse('"Smith, Bob" <bob@example.com>');

    expect(mailbox.name.toString()).toBe('Smith, Bob');
    expect(mailbox.generate()).toBe('"Smith, Bob" <bob@example.com>');
  });

  it('should decode and re-encode a non-ASCII display name', () => {
    const mailbox = Mailbox.parse('=?utf-8?Q?Andr=C3=A9?= <andre@example.com>');

    expect(mailbox.name.toString()).toBe('André');
    expect(mailbox.generate()).toBe('=?utf-8?B?QW5kcsOp?= <andre@example.com>');
  });

  it('should build a name from a string', () => {
    const mailbox = new Mailbox('andre@example.com', 'André');
    expect(mailbox.generate()).toBe('=?utf-8?B?QW5kcsOp?= <andre@example.com>');
  });

  it('should compare addresses ignoring case', () => {
    expect(new Mailbox('A@Example.com', 'A').equals(new Mailbox('a@example.com', 'A'))).toBe(true);
    expect(new Mailbox('a@example.com', 'A').equals(new Mailbox('a@example.com', 'B'))).toBe(false);
  });
});

describe('MailboxGroup', () => {
  it('should parse and generate a group', () => {
    const group = MailboxGroup.parse('Friends: a@example.com, B <b@example.com>;');

    expect(group.name.toString()).toBe('Friends');
    expect(group.mailboxes.map((mailbox) => mailbox.email)).toEqual(['a@example.com', 'b@example.com']);
    expect(group.generate()).toBe('Friends: a@example.com, B <b@example.com>;');
  });

  it('should generate an empty group', () => {
    const group = MailboxGroup.parse('undisclosed-recipients:;');

    expect(group.isEmpty()).toBe(true);
    expect(group.generate()).toBe('undisclosed-recipients:;');
  });
});

describe('Address lists', () => {
  it('should parse mailboxes and groups', () => {
    const addresses = parseAddressList('a@example.com, Team: b@example.com, c@example.com;, "D, E" <d@example.com>');

    expect(addresses.map((address) => address.kind)).toEqual(['mailbox', 'group', 'mailbox']);
    expect(generateAddressList(addresses)).toBe(
      'a@example.com, Team: b@example.com, c@example.com;, "D, E" <d@example.com>'
    );
  });

  it('should skip empty items', () => {
    expect(parseAddressList('a@example.com, , b@example.com')).toHaveLength(2);
  });

  it('should flatten groups in a mailbox list', () => {
    const mailboxes = parseMailboxList('Team: b@example.com, c@example.com;, a@example.com');
    expect(mailboxes.map((mailbox) => mailbox.email)).toEqual(['b@example.com', 'c@example.com', 'a@example.com']);
  });
});

describe('DateTime', () => {
  it('should parse an RFC 2822 date', () => {
    const date = DateTime.parse('Wed, 1 Jan 2020 00:00:00 +0000');

    expect(date?.toIsoString()).toBe('2020-01-01T00:00:00+0000');
    expect(date?.generate()).toBe('Wed, 1 Jan 2020 00:00:00 +0000');
  });

  it('should accept obsolete forms', () => {
    const date = DateTime.parse('1 Jan 20 10:05 EST');

    expect(date?.toIsoString()).toBe('2020-01-01T10:05:00-0500');
    expect(date?.generate()).toBe('Wed, 1 Jan 2020 10:05:00 -0500');
  });

  it('should expand two- and three-digit years', () => {
    expect(DateTime.parse('1 Jan 99 00:00:00 +0000')?.year).toBe(1999);
    expect(DateTime.parse('1 Jan 103 00:00:00 +0000')?.year).toBe(2003);
  });

  it('should ignore comments', () => {
    expect(DateTime.parse('Tue, 3 Mar 2020 14:30:15 +0100 (CET)')?.toIsoString()).toBe('2020-03-03T14:30:15+0100');
  });

  it('should keep the unknown-zone form -0000', () => {
    const date = DateTime.parse('Wed, 1 Jan 2020 00:00:00 -0000');

    expect(date?.zone).toBe(0);
    expect(date?.zoneUnknown).toBe(true);
    expect(date?.generate()).toBe('Wed, 1 Jan 2020 00:00:00 -0000');
    expect(date?.clone().generate()).toBe('Wed, 1 Jan 2020 00:00:00 -0000');
    expect(DateTime.parse('Wed, 1 Jan 2020 00:00:00 +0000')?.zoneUnknown).toBe(false);
  });

  it('should treat unknown zones as UTC', () => {
    expect(DateTime.parse('3 Mar 2020 14:30:15 XYZ')?.zone).toBe(0);
  });

  it('should return null for text that is not a date', () => {
    expect(DateTime.parse('not a date')).toBeNull();
    expect(DateTime.parse('32 Jan 2020 00:00:00 +0000')).toBeNull();
    expect(DateTime.parse('1 Foo 2020 00:00:00 +0000')).toBeNull();
  });

  it('should convert to and from Date', () => {
    const date = DateTime.fromDate(new Date(Date.UTC(2020, 0, 1, 12, 0, 0)), 120);

    expect(date.toIsoString()).toBe('2020-01-01T14:00:00+0200');
    expect(date.toDate().toISOString()).toBe('2020-01-01T12:00:00.000Z');
  });

  it('should compare instants across zones', () => {
    const utc = new DateTime(2020, 1, 1, 12, 0, 0, 0);
    const cet = new DateTime(2020, 1, 1, 13, 0, 0, 60);

    expect(utc.compare(cet)).toBe(0);
    expect(utc.equals(cet)).toBe(false);
  });
});

describe('MediaType', () => {
  it('should parse and lower-case', () => {
    const media = MediaType.parse(' Multipart/Mixed ');

    expect(media.type).toBe('multipart');
    expect(media.subType).toBe('mixed');
    expect(media.isMultipart()).toBe(true);
    expect(media.generate()).toBe('multipart/mixed');
  });

  it('should compare ignoring case', () => {
    expect(new MediaType('text', 'plain').equals('TEXT/PLAIN')).toBe(true);
    expect(new MediaType('text', 'plain').isText()).toBe(true);
  });
});

describe('MessageId', () => {
  it('should parse a bracketed id', () => {
    const id = MessageId.parse(' <abc.123@example.com> (comment)');

    expect(id.left).toBe('abc.123');
    expect(id.right).toBe('example.com');
    expect(id.generate()).toBe('<abc.123@example.com>');
  });

  it('should split at the last @', () => {
    const id = MessageId.fromString('a@b@example.com');
    expect(id.left).toBe('a@b');
    expect(id.right).toBe('example.com');
  });

  it('should generate ids from the token generator', () => {
    const tokens = new TokenGenerator({ clock: () => 1577836800000, processId: 1234, seed: 1 });
    const id = MessageId.generateId(tokens, 'test.example');

    expect(id.generate()).toBe('<q3eio0.ya.cyv@test.example>');
  });

  it('should parse id lists', () => {
    const ids = parseMessageIdList('<a@x> <b@y>\r\n <c@z>');
    expect(ids.map((id) => id.id)).toEqual(['a@x', 'b@y', 'c@z']);
  });

  it('should parse id lists without brackets', () => {
    const ids = parseMessageIdList('a@x, b@y');
    expect(ids.map((id) => id.generate())).toEqual(['<a@x>', '<b@y>']);
  });
});

describe('Parameters', () => {
  describe('parseParameterList', () => {
    it('should parse plain and quoted values', () => {
      const { value, parameters } = parseParameterList('text/plain; charset="utf-8"; format=flowed');

      expect(value).toBe('text/plain');
      expect(parameters.map((parameter) => [parameter.name, parameter.getValue()])).toEqual([
        ['charset', 'utf-8'],
        ['format', 'flowed'],
      ]);
    });

    it('should decode RFC 2231 extended values', () => {
      const { parameters } = parseParameterList("attachment; filename*=utf-8''%E2%82%AC%20rates.txt");
      const filename = findParameter(parameters, 'FILENAME');

      expect(filename?.getValue()).toBe('€ rates.txt');
      expect(filename?.value.charset.name).toBe('utf-8');
    });

    it('should join continuations in index order', () => {
      const { parameters } = parseParameterList('attachment; filename*1="name.txt"; filename*0="long"');
      expect(parameters[0]?.getValue()).toBe('longname.txt');
    });

    it('should join extended and plain continuations', () => {
      const { parameters } = parseParameterList("attachment; filename*0*=utf-8''caf%C3%A9; filename*1=\".txt\"");
      expect(parameters[0]?.getValue()).toBe('café.txt');
    });

    it('should decode encoded words in values', () => {
      const { parameters } = parseParameterList('attachment; filename="=?utf-8?B?Y2Fmw6k=?="');
      expect(parameters[0]?.getValue()).toBe('café');
    });

    it('should keep semicolons inside quotes', () => {
      const { parameters } = parseParameterList('attachment; filename="a;b.txt"');
      expect(parameters[0]?.getValue()).toBe('a;b.txt');
    });
  });

  describe('generate', () => {
    it('should write tokens plain', () => {
      expect(new Parameter('charset', 'utf-8').generate()).toEqual(['charset=utf-8']);
    });

    it('should quote values that are not tokens', () => {
      expect(new Parameter('name', 'a b').generate()).toEqual(['name="a b"']);
    });

    it('should use the extended form for non-ASCII values', () => {
      expect(new Parameter('filename', 'café.txt').generate()).toEqual(["filename*=utf-8''caf%C3%A9.txt"]);
    });

    it('should split long extended values into continuations', () => {
      const value = 'é'.repeat(20);
      const segments = new Parameter('filename', value).generate();

      expect(segments).toHaveLength(3);
      expect(segments[0].startsWith("filename*0*=utf-8''%C3%A9")).toBe(true);
      expect(segments[1].startsWith('filename*1*=')).toBe(true);
      expect(segments[2]).toBe('filename*2*=%A9%C3%A9');

      const { parameters } = parseParameterList('attachment; ' + segments.join('; '));
      expect(parameters[0]?.getValue()).toBe(value);
    });
  });
});
