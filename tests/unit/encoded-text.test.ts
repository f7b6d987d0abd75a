/**
 * RFC 2047 encoded words: Word, EncodedText and the word folder
 */

import { describe, it, expect } from 'vitest';
import { Word } from '../../src/mime/word.js';
import { EncodedText } from '../../src/mime/encoded-text.js';
import {
  encodeAndFoldText,
  encodeWords,
  foldText,
  wordNeedsEncoding,
} from '../../src/mime/word-folder.js';
import { unfold } from '../../src/mime/values/structured.js';

describe('Word', () => {
  it('should encode a string in its charset', () => {
    const word = new Word('é', 'iso-8859-1');

    expect(word.buffer).toEqual(Buffer.from([0xe9]));
    expect(word.charset.name).toBe('iso-8859-1');
    expect(word.getDecodedText()).toBe('é');
  });

  it('should keep raw bytes as given', () => {
    const word = new Word(Buffer.from([0xc3, 0xa9]), 'utf-8');
    expect(word.toString()).toBe('é');
  });

  it('should convert to another charset', () => {
    const result = new Word('é', 'iso-8859-1').getConvertedText('utf-8');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toEqual(Buffer.from([0xc3, 0xa9]));
    }
  });

  it('should compare bytes and charset', () => {
    expect(new Word('a', 'utf-8').equals(new Word('a', 'UTF-8'))).toBe(true);
    expect(new Word('a', 'utf-8').equals(new Word('a', 'us-ascii'))).toBe(false);
  });
});

describe('EncodedText', () => {
  describe('parse', () => {
    it('should decode a base64 encoded word', () => {
      const text = EncodedText.parse('=?utf-8?B?Y2Fmw6k=?=');

      expect(text.toString()).toBe('café');
      expect(text.getWordCount()).toBe(1);
      expect(text.getWordAt(0)?.charset.name).toBe('utf-8');
    });

    it('should drop whitespace between adjacent encoded words', () => {
      const text = EncodedText.parse('=?iso-8859-1?Q?Caf=E9?= =?iso-8859-1?Q?_au_lait?=');

      expect(text.toString()).toBe('Café au lait');
      expect(text.getWordCount()).toBe(1);
    });

    it('should keep plain text around encoded words', () => {
      const text = EncodedText.parse('Hello =?utf-8?Q?W=C3=B6rld?=!');

      expect(text.toString()).toBe('Hello Wörld!');
      expect(text.getWords().map((word) => word.charset.name)).toEqual(['us-ascii', 'utf-8', 'us-ascii']);
    });

    it('should keep malformed encoded words as text', () => {
      expect(EncodedText.parse('=?utf-8?X?abc?=').toString()).toBe('=?utf-8?X?abc?=');
    });

    it('should read raw 8-bit text in the default charset', () => {
      const text = EncodedText.parse('Caf\xe9', 'iso-8859-1');

      expect(text.toString()).toBe('Café');
      expect(text.getWordAt(0)?.charset.name).toBe('iso-8859-1');
    });

    it('should ignore an RFC 2231 language suffix', () => {
      const text = EncodedText.parse('=?utf-8*en?Q?hi?=');
      expect(text.getWordAt(0)?.charset.name).toBe('utf-8');
      expect(text.toString()).toBe('hi');
    });
  });

  describe('fromString', () => {
    it('should split ASCII and non-ASCII runs', () => {
      const text = EncodedText.fromString('Bonjour à tous', 'utf-8');

      expect(text.getWords().map((word) => word.getDecodedText())).toEqual(['Bonjour ', 'à', ' tous']);
      expect(text.getWords().map((word) => word.charset.name)).toEqual(['us-ascii', 'utf-8', 'us-ascii']);
    });

    it('should keep whitespace between non-ASCII runs in one word', () => {
      const text = EncodedText.fromString('à é', 'utf-8');

      expect(text.getWordCount()).toBe(1);
      expect(text.toString()).toBe('à é');
    });
  });

  it('should merge adjacent words with the same charset', () => {
    const text = new EncodedText([new Word('a', 'utf-8'), new Word('b', 'UTF-8'), new Word('c', 'us-ascii')]);
    text.mergeAdjacentWords();

    expect(text.getWordCount()).toBe(2);
    expect(text.getWordAt(0)?.getDecodedText()).toBe('ab');
  });

  it('should edit the word list', () => {
    const text = new EncodedText();
    text.appendWord(new Word('b', 'us-ascii'));
    text.insertWordBefore(0, new Word('a', 'us-ascii'));
    expect(text.toString()).toBe('ab');

    text.removeWord(0);
    expect(text.toString()).toBe('b');

    text.removeAllWords();
    expect(text.isEmpty()).toBe(true);
  });

  it('should convert all words to one charset', () => {
    const text = new EncodedText([new Word('a', 'us-ascii'), new Word('é', 'iso-8859-1')]);
    const result = text.getConvertedText('utf-8');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toEqual(Buffer.from([0x61, 0xc3, 0xa9]));
    }
  });

  it('should clone independently', () => {
    const text = EncodedText.fromString('abc', 'utf-8');
    const copy = text.clone();
    copy.appendWord(new Word('d', 'us-ascii'));

    expect(text.equals(copy)).toBe(false);
    expect(text.toString()).toBe('abc');
  });
});

describe('Word folder', () => {
  describe('wordNeedsEncoding', () => {
    it('should not encode plain ASCII', () => {
      expect(wordNeedsEncoding(new Word('plain text', 'us-ascii'))).toBe(false);
    });

    it('should encode non-ASCII bytes', () => {
      expect(wordNeedsEncoding(new Word('é', 'utf-8'))).toBe(true);
    });

    it('should encode text that reads as an encoded word', () => {
      expect(wordNeedsEncoding(new Word('a=?b', 'us-ascii'))).toBe(true);
    });

    it('should encode charsets that are not ASCII-compatible', () => {
      expect(wordNeedsEncoding(new Word('hi', 'utf-16le'))).toBe(true);
    });
  });

  describe('foldText', () => {
    it('should fold at whitespace to fit the line', () => {
      const result = foldText('aaaa bbbb cccc dddd eeee', { maxLineLength: 20, curLinePos: 9 });

      expect(result.output).toBe('aaaa bbbb\r\n cccc dddd eeee');
      expect(result.newLinePos).toBe(15);
    });

    it('should not split a token longer than the line', () => {
      const result = foldText('x'.repeat(30), { maxLineLength: 20 });

      expect(result.output).toBe('x'.repeat(30));
      expect(result.newLinePos).toBe(30);
    });
  });

  describe('encodeAndFoldText', () => {
    it('should leave ASCII text as it is', () => {
      const result = encodeAndFoldText(EncodedText.fromString('Hello world', 'utf-8'));

      expect(result.output).toBe('Hello world');
      expect(result.newLinePos).toBe(11);
    });

    it('should choose B when it is shorter', () => {
      const result = encodeAndFoldText(EncodedText.fromString('café', 'utf-8'));
      expect(result.output).toBe('=?utf-8?B?Y2Fmw6k=?=');
    });

    it('should choose Q when it is not longer', () => {
      const result = encodeAndFoldText(EncodedText.fromString('abcdefghé', 'utf-8'));
      expect(result.output).toBe('=?utf-8?Q?abcdefgh=C3=A9?=');
    });

    it('should encode only the non-ASCII word', () => {
      const result = encodeAndFoldText(EncodedText.fromString('Bonjour à tous', 'utf-8'));
      expect(result.output).toBe('Bonjour =?utf-8?B?w6A=?= tous');
    });

    it('should encode plain text glued to an encoded word', () => {
      const text = new EncodedText([new Word('foo', 'us-ascii'), new Word('é', 'utf-8')]);
      expect(encodeAndFoldText(text).output).toBe('=?utf-8?B?Zm9vw6k=?=');
    });

    it('should keep whitespace between encoded words inside the encoding', () => {
      const text = new EncodedText([
        new Word('é', 'utf-8'),
        new Word(' ', 'us-ascii'),
        new Word('é', 'iso-8859-1'),
      ]);
      const output = encodeAndFoldText(text).output;

      expect(output).toBe('=?utf-8?B?w6kg?= =?iso-8859-1?Q?=E9?=');
      expect(EncodedText.parse(output).toString()).toBe('é é');
    });

    it('should encode everything when forced', () => {
      const result = encodeAndFoldText(EncodedText.fromString('Hi there', 'utf-8'), {
        flags: { forceEncoding: true },
      });
      expect(result.output).toBe('=?us-ascii?Q?Hi_there?=');
    });

    it('should split long encoded text into words that fit the line', () => {
      const original = 'é'.repeat(40);
      const result = encodeAndFoldText(EncodedText.fromString(original, 'utf-8'), { curLinePos: 9 });
      const lines = result.output.split('\r\n');

      expect(lines.map((line) => line.length)).toEqual([68, 65]);
      expect(result.newLinePos).toBe(65);
      expect(EncodedText.parse(unfold(result.output)).toString()).toBe(original);
    });
  });

  describe('encodeWords', () => {
    it('should encode without line breaks', () => {
      const output = encodeWords(EncodedText.fromString('é'.repeat(40), 'utf-8'));

      expect(output).not.toContain('\r\n');
      expect(output.split(' ')).toHaveLength(2);
    });
  });
});
