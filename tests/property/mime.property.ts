/**
 * Property-based tests for header fields and multipart bodies
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { Header } from '../../src/mime/header.js';
import { TextField } from '../../src/mime/fields/index.js';
import { BodyPart } from '../../src/mime/body-part.js';
import { CharsetConverter } from '../../src/charset/transcoder.js';
import { createMimeContext } from '../../src/context.js';

function chars(alphabet: string): fc.Arbitrary<string> {
  return fc.constantFrom(...alphabet.split(''));
}

const ALPHANUMERIC = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

/**
 * Words joined by single spaces; each word is plain ASCII or all accented
 */
const textArb = fc
  .array(
    fc.oneof(
      fc.stringOf(chars('abcXYZ019'), { minLength: 1, maxLength: 12 }),
      fc.stringOf(chars('éüßçñ'), { minLength: 1, maxLength: 12 })
    ),
    { minLength: 1, maxLength: 12 }
  )
  .map((words) => words.join(' '));

const asciiTextArb = fc
  .array(fc.stringOf(chars(ALPHANUMERIC), { minLength: 1, maxLength: 20 }), { minLength: 1, maxLength: 30 })
  .map((words) => words.join(' '));

const fieldNameArb = fc
  .tuple(chars('ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz'), fc.stringOf(chars(ALPHANUMERIC + '-'), { maxLength: 15 }))
  .map(([first, rest]) => first + rest);

const boundaryArb = fc.stringOf(chars(ALPHANUMERIC + '_'), { minLength: 1, maxLength: 30 });

const bodyArb = fc.stringOf(chars(ALPHANUMERIC + ' .,'), { minLength: 1, maxLength: 80 });

function subjectHeader(text: string): Header {
  const header = new Header();
  const field = new TextField('Subject');
  field.setText(text);
  header.fields.append(field);
  return header;
}

describe('Header field properties', () => {
  it('parsing a generated text field gives back the text', () => {
    fc.assert(
      fc.property(textArb, (text) => {
        const parsed = new Header();
        parsed.parse(subjectHeader(text).generate() + '\r\n');

        const subject = parsed.fields.findAs('Subject', TextField);
        expect(subject.ok && subject.value.getText()).toBe(text);
      }),
      { numRuns: 100 }
    );
  });

  it('generation is idempotent after one parse', () => {
    fc.assert(
      fc.property(textArb, (text) => {
        const first = subjectHeader(text).generate();
        const parsed = new Header();
        parsed.parse(first + '\r\n');

        expect(parsed.generate()).toBe(first);
      }),
      { numRuns: 100 }
    );
  });

  it('folded lines of short words stay within the line length', () => {
    fc.assert(
      fc.property(asciiTextArb, fc.integer({ min: 40, max: 100 }), (text, maxLineLength) => {
        const output = subjectHeader(text).generate(maxLineLength);

        for (const line of output.split('\r\n').filter((line) => line !== '')) {
          expect(line.length).toBeLessThanOrEqual(maxLineLength);
        }
      }),
      { numRuns: 100 }
    );
  });

  it('field lookup ignores case', () => {
    fc.assert(
      fc.property(fieldNameArb, (name) => {
        const header = new Header();
        const field = header.fields.getOrCreate(name);

        const upper = header.fields.find(name.toUpperCase());
        const lower = header.fields.find(name.toLowerCase());
        expect(upper.ok && upper.value).toBe(field);
        expect(lower.ok && lower.value).toBe(field);
        expect(header.fields.getOrCreate(name.toLowerCase())).toBe(field);
        expect(header.fields.count()).toBe(1);
      }),
      { numRuns: 100 }
    );
  });
});

describe('Multipart properties', () => {
  it('parsing finds one part per body', () => {
    fc.assert(
      fc.property(boundaryArb, fc.array(bodyArb, { minLength: 1, maxLength: 5 }), (boundary, bodies) => {
        const raw =
          `Content-Type: multipart/mixed; boundary=${boundary}\r\n\r\n` +
          bodies.map((body) => `--${boundary}\r\nContent-Type: text/plain\r\n\r\n${body}\r\n`).join('') +
          `--${boundary}--\r\n`;
        const message = new BodyPart(createMimeContext({ defaultCharset: 'us-ascii' }));
        message.parse(raw);

        expect(message.body.getPartCount()).toBe(bodies.length);
        message.body.getParts().forEach((part, index) => {
          const text = part.body.getText();
          expect(text.ok && text.value).toBe(bodies[index]);
        });
        expect(message.generate().toString('latin1')).toBe(raw);
      }),
      { numRuns: 100 }
    );
  });

  it('generated messages parse back to the same parts', () => {
    fc.assert(
      fc.property(fc.array(textArb, { minLength: 1, maxLength: 5 }), (texts) => {
        const context = createMimeContext({ defaultCharset: 'utf-8', seed: 7, clock: () => 0, processId: 1 });
        const message = new BodyPart(context);
        for (const text of texts) {
          const child = message.createChild();
          child.body.setText(text, 'utf-8');
          message.body.appendPart(child);
        }
        const output = message.generate();

        const reparsed = new BodyPart(context);
        reparsed.parse(output);
        expect(reparsed.body.getPartCount()).toBe(texts.length);
        reparsed.body.getParts().forEach((part, index) => {
          const text = part.body.getText();
          expect(text.ok && text.value).toBe(texts[index]);
        });
        expect(reparsed.generate().equals(output)).toBe(true);
      }),
      { numRuns: 50 }
    );
  });
});

describe('Charset conversion properties', () => {
  it('conversion to UTF-16 and back preserves UTF-8 text', () => {
    const converter = new CharsetConverter();

    fc.assert(
      fc.property(fc.fullUnicodeString({ maxLength: 100 }), (text) => {
        const utf8 = Buffer.from(text, 'utf-8');
        const utf16 = converter.convertBuffer(utf8, 'utf-8', 'utf-16le');
        expect(utf16.ok).toBe(true);
        if (utf16.ok) {
          expect(utf16.value.equals(Buffer.from(text, 'utf16le'))).toBe(true);
          const back = converter.convertBuffer(utf16.value, 'utf-16le', 'utf-8');
          expect(back.ok && back.value.equals(utf8)).toBe(true);
        }
      }),
      { numRuns: 100 }
    );
  });

  it('conversion is independent of the buffer size', () => {
    fc.assert(
      fc.property(fc.fullUnicodeString({ maxLength: 60 }), fc.integer({ min: 4, max: 40 }), (text, bufferSize) => {
        const converter = new CharsetConverter(undefined, bufferSize);
        const result = converter.convertBuffer(Buffer.from(text, 'utf-8'), 'utf-8', 'utf-16le');

        expect(result.ok && result.value.equals(Buffer.from(text, 'utf16le'))).toBe(true);
      }),
      { numRuns: 100 }
    );
  });
});
