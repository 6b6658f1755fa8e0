/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DEFAULT_ENCODING, DEFAULT_MAX_LINE_BYTES } from '../config/tabulator-config.js';

export type LineEvent =
  | { kind: 'line'; lineNumber: number; text: string; terminated: boolean }
  | { kind: 'line_too_long'; lineNumber: number };

export interface LineReaderOptions {
  /** Bytes per line, newline included. */
  maxLineBytes?: number;
  encoding?: BufferEncoding;
}

const NEWLINE = 0x0a;

/**
 * Splits a byte stream into lines without ever holding more than one line.
 *
 * A terminated line is yielded with its newline. Bytes after the last
 * newline come out as one unterminated line. As soon as the bytes of the
 * current line reach `maxLineBytes` without a newline, `line_too_long` is
 * yielded and the input is released.
 *
 * @param input - Any byte source; string chunks are encoded with `encoding`
 * @yields One event per line
 */
export async function* streamLines(
  input: AsyncIterable<Buffer | string>,
  options: LineReaderOptions = {},
): AsyncGenerator<LineEvent> {
  const maxLineBytes = options.maxLineBytes ?? DEFAULT_MAX_LINE_BYTES;
  const encoding = options.encoding ?? DEFAULT_ENCODING;
  let pending: Buffer[] = [];
  let pendingBytes = 0;
  let lineNumber = 0;

  for await (const chunk of input) {
    let data = typeof chunk === 'string' ? Buffer.from(chunk, encoding) : chunk;
    while (data.length > 0) {
      const newline = data.indexOf(NEWLINE);
      if (newline === -1) {
        pending.push(data);
        pendingBytes += data.length;
        if (pendingBytes >= maxLineBytes) {
          yield { kind: 'line_too_long', lineNumber: lineNumber + 1 };
          return;
        }
        break;
      }

      const piece = data.subarray(0, newline + 1);
      if (pendingBytes + piece.length > maxLineBytes) {
        yield { kind: 'line_too_long', lineNumber: lineNumber + 1 };
        return;
      }
      lineNumber += 1;
      const bytes = pending.length === 0 ? piece : Buffer.concat([...pending, piece]);
      pending = [];
      pendingBytes = 0;
      yield { kind: 'line', lineNumber, text: bytes.toString(encoding), terminated: true };
      data = data.subarray(newline + 1);
    }
  }

  if (pendingBytes > 0) {
    yield {
      kind: 'line',
      lineNumber: lineNumber + 1,
      text: Buffer.concat(pending).toString(encoding),
      terminated: false,
    };
  }
}
