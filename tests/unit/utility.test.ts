/**
 * Streams, token generation, progress, results, errors and options
 */

import { describe, it, expect } from 'vitest';
import {
  BufferInputStream,
  BufferOutputStream,
  RangeOutputStream,
  readAll,
} from '../../src/utility/stream.js';
import { TokenGenerator } from '../../src/utility/random.js';
import { ProgressTracker } from '../../src/utility/progress.js';
import { createLogger } from '../../src/utility/logger.js';
import { err, ok, unwrap, unwrapOr } from '../../src/types/result.js';
import {
  ConversionUnavailableError,
  MimeError,
  NoSuchFieldError,
  TypeMismatchError,
  UnknownEncodingError,
} from '../../src/types/errors.js';
import { hostname } from 'node:os';
import { createMimeContext, generateMessageId, resolveMimeOptions } from '../../src/context.js';
import { localeCharset } from '../../src/charset/charset.js';
import { iconvTranscoderProvider } from '../../src/charset/transcoder.js';

describe('Streams', () => {
  it('should read a slice of a buffer', () => {
    const input = new BufferInputStream('abcdef', 2, 4);
    const chunk = Buffer.alloc(10);

    expect(input.read(chunk, 10)).toBe(2);
    expect(chunk.subarray(0, 2).toString('latin1')).toBe('cd');
    expect(input.eof()).toBe(true);
    expect(input.read(chunk, 10)).toBe(0);
  });

  it('should copy written bytes', () => {
    const out = new BufferOutputStream();
    const chunk = Buffer.from('abc');
    out.write(chunk, 2);
    chunk.write('xyz');
    out.write('\xe9');

    expect(out.length).toBe(3);
    expect(out.toBuffer()).toEqual(Buffer.from([0x61, 0x62, 0xe9]));
  });

  it('should forward only a range across writes', () => {
    const inner = new BufferOutputStream();
    const range = new RangeOutputStream(inner, 3, 4);
    range.write('abcde');
    range.write('fghij');
    range.write('k');

    expect(inner.toString()).toBe('defg');
    expect(range.written).toBe(4);
  });

  it('should forward to the end without a length', () => {
    const inner = new BufferOutputStream();
    const range = new RangeOutputStream(inner, 2);
    range.write('abcd');

    expect(inner.toString()).toBe('cd');
  });

  it('should read a stream to its end', () => {
    expect(readAll(new BufferInputStream('hello world'), 3).toString('latin1')).toBe('hello world');
  });
});

describe('TokenGenerator', () => {
  const source = { clock: () => 0, processId: 1234, seed: 1 };

  it('should produce the minimal standard sequence', () => {
    const tokens = new TokenGenerator(source);

    expect(tokens.next()).toBe(16807);
    expect(tokens.next()).toBe(282475249);
    expect(tokens.next()).toBe(1622650073);
  });

  it('should treat a zero seed as one', () => {
    expect(new TokenGenerator({ ...source, seed: 0 }).next()).toBe(16807);
  });

  it('should seed from the clock by default', () => {
    expect(new TokenGenerator({ clock: () => 5, processId: 1 }).next()).toBe(84035);
  });

  it('should build boundaries from base-36 groups', () => {
    expect(new TokenGenerator(source).boundary()).toBe('=_cyv0_4o6fap');
  });

  it('should build message id left-hand sides', () => {
    const tokens = new TokenGenerator({ clock: () => 1577836800000, processId: 1234, seed: 1 });

    expect(tokens.time()).toBe(1577836800);
    expect(tokens.process()).toBe(1234);
    expect(tokens.messageIdLeft()).toBe('q3eio0.ya.cyv');
  });
});

describe('ProgressTracker', () => {
  it('should report start, progress and stop', () => {
    const calls: string[] = [];
    const tracker = new ProgressTracker(
      {
        start: (total) => calls.push(`start ${total}`),
        progress: (current, total) => calls.push(`progress ${current}/${total}`),
        stop: (total) => calls.push(`stop ${total}`),
      },
      10
    );

    tracker.begin();
    tracker.advance(5);
    tracker.advance(7);

    expect(tracker.end()).toBe(12);
    expect(calls).toEqual(['start 10', 'progress 5/10', 'progress 12/12', 'stop 12']);
  });

  it('should count without a listener', () => {
    const tracker = new ProgressTracker(undefined);
    tracker.begin();
    tracker.advance(3);
    expect(tracker.end()).toBe(3);
  });
});

describe('Result', () => {
  it('should unwrap a successful result', () => {
    expect(unwrap(ok(1))).toBe(1);
    expect(unwrapOr(ok(1), 2)).toBe(1);
  });

  it('should throw the error of a failed result', () => {
    const failed = err(new NoSuchFieldError('Subject'));

    expect(() => unwrap(failed)).toThrow(NoSuchFieldError);
    expect(unwrapOr(failed, 2)).toBe(2);
  });
});

describe('Errors', () => {
  it('should carry code, source and details', () => {
    const conversion = new ConversionUnavailableError('utf-8', 'x-none');
    expect(conversion).toBeInstanceOf(MimeError);
    expect(conversion.code).toBe('CONVERSION_UNAVAILABLE');
    expect(conversion.source).toBe('charset');
    expect(conversion.message).toBe('No conversion available from "utf-8" to "x-none"');

    const encoding = new UnknownEncodingError('x-foo');
    expect(encoding.source).toBe('encoding');
    expect(encoding.encoding).toBe('x-foo');
    expect(encoding.message).toBe('Unknown content-transfer-encoding "x-foo"');

    const mismatch = new TypeMismatchError('Date', 'date', 'text');
    expect(mismatch.name).toBe('TypeMismatchError');
    expect(mismatch.message).toBe('Field "Date" is a text field, expected date');

    expect(new NoSuchFieldError('To').source).toBe('header');
  });
});

describe('resolveMimeOptions', () => {
  it('should apply defaults', () => {
    const options = resolveMimeOptions();

    expect(options.maxLineLength).toBe(78);
    expect(options.encoderLineLength).toBe(76);
    expect(options.defaultCharset).toBe(localeCharset());
    expect(options.transcoderProvider).toBe(iconvTranscoderProvider);
    expect(options.clock).toBe(Date.now);
    expect(options.processId).toBe(process.pid);
    expect(options.hostname).toBe(hostname());
    expect(options.seed).toBeUndefined();
  });

  it('should keep given values', () => {
    const clock = (): number => 0;
    const options = resolveMimeOptions({ maxLineLength: 100, defaultCharset: 'iso-8859-1', clock, seed: 7 });

    expect(options.maxLineLength).toBe(100);
    expect(options.defaultCharset).toBe('iso-8859-1');
    expect(options.clock).toBe(clock);
    expect(options.seed).toBe(7);
  });
});

describe('generateMessageId', () => {
  it('should put the configured host name on the right-hand side', () => {
    const context = createMimeContext({ seed: 1, clock: () => 1577836800000, processId: 1234, hostname: 'test.example' });
    const id = generateMessageId(context);

    expect(id.right).toBe('test.example');
    expect(id.generate()).toBe('<q3eio0.ya.cyv@test.example>');
  });
});

describe('createLogger', () => {
  it('should namespace loggers under the library name', () => {
    expect(createLogger('charset').namespace).toBe('mimetree:charset');
  });
});
