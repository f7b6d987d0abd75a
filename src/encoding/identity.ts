/**
 * Pass-through encodings: 7bit, 8bit and binary
 */

import { Encoder, CountingWriter, type EncoderProperties } from './encoder.js';
import type { InputStream, OutputStream } from '../utility/stream.js';
import type { ProgressTracker } from '../utility/progress.js';

export class IdentityEncoder extends Encoder {
  constructor(
    readonly name: string,
    properties: EncoderProperties = {}
  ) {
    super(properties);
  }

  protected encodeStream(input: InputStream, output: OutputStream, tracker: ProgressTracker): number {
    return this.copy(input, output, tracker);
  }

  protected decodeStream(input: InputStream, output: OutputStream, tracker: ProgressTracker): number {
    return this.copy(input, output, tracker);
  }

  private copy(input: InputStream, output: OutputStream, tracker: ProgressTracker): number {
    const writer = new CountingWriter(output);
    for (const chunk of this.chunks(input, tracker)) {
      writer.write(chunk);
    }
    return writer.count;
  }
}
