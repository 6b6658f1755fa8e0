/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Readable, Writable } from 'node:stream';

/** Byte source that yields each chunk as one Buffer (strings as latin1). */
export const bytesInput = (...chunks: Array<string | Buffer>): Readable =>
  Readable.from(chunks.map((chunk) => (typeof chunk === 'string' ? Buffer.from(chunk, 'latin1') : chunk)));

/** Yields `before`, then fails the way a broken pipe or a bad fd would. */
export const failingInput = (before: string, error: Error): AsyncIterable<Buffer> => ({
  async *[Symbol.asyncIterator]() {
    yield Buffer.from(before, 'latin1');
    throw error;
  },
});

/** Counts how many chunks the consumer actually pulled. */
export const countingInput = (chunks: string[]): { input: AsyncIterable<Buffer>; pulled: () => number } => {
  let pulled = 0;
  return {
    input: {
      async *[Symbol.asyncIterator]() {
        for (const chunk of chunks) {
          pulled += 1;
          yield Buffer.from(chunk, 'latin1');
        }
      },
    },
    pulled: () => pulled,
  };
};

export class MemoryOutput extends Writable {
  private readonly chunks: Buffer[] = [];

  _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    this.chunks.push(chunk);
    callback();
  }

  bytes(): Buffer {
    return Buffer.concat(this.chunks);
  }

  text(): string {
    return this.bytes().toString('latin1');
  }
}

export const failingOutput = (error: Error): Writable =>
  new Writable({
    write(_chunk, _encoding, callback) {
      callback(error);
    },
  });
