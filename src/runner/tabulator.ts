/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Writable } from 'node:stream';
import { resolveTabulatorConfig, type TabulatorConfig } from '../config/tabulator-config.js';
import { TabulatorError, type ErrorCode } from '../core/errors.js';
import { OUTPUT_HEADER, TsvRecordWriter } from '../core/fields.js';
import { err, ok, type Failure, type Result } from '../core/result.js';
import { convertLine } from '../core/tokenizer.js';
import type { TabulationObserver } from '../types/observer.js';
import { streamLines, type LineEvent } from './line-reader.js';

export interface TabulatorOptions {
  input: AsyncIterable<Buffer | string>;
  output: Writable;
  config?: Partial<TabulatorConfig>;
  observer?: TabulationObserver;
}

export interface TabulationSummary {
  linesRead: number;
  recordsWritten: number;
  blankLines: number;
}

type WriteResult = Result<void, TabulatorError>;

const writeChunk = (
  output: Writable,
  chunk: string,
  encoding: BufferEncoding,
): Promise<WriteResult> =>
  new Promise((resolve) => {
    output.write(chunk, encoding, (error) => {
      resolve(
        error ? err(new TabulatorError('ERR_OUTPUT_WRITE_ERROR', { cause: error })) : ok(undefined),
      );
    });
  });

async function nextLine(
  lines: AsyncGenerator<LineEvent>,
  lineNumber: number,
): Promise<Result<IteratorResult<LineEvent>, TabulatorError>> {
  try {
    return ok(await lines.next());
  } catch (error) {
    return err(new TabulatorError('ERR_INPUT_READ_ERROR', { lineNumber, cause: error }));
  }
}

/**
 * Header first, then one record per input line, each converted and
 * written before the next line is read. The first failure ends the run:
 * the failing line contributes no output, and records already written
 * stay written.
 */
export async function runTabulator(
  options: TabulatorOptions,
): Promise<Result<TabulationSummary, TabulatorError>> {
  const config = resolveTabulatorConfig(options.config);
  const { output, observer } = options;

  // An output stream can fail between writes (EPIPE once the reader has
  // gone); the next write reports it. A failed write emits 'error' only
  // after its callback has run, so after such a failure the listener stays
  // until that event arrives.
  let outputError: Error | undefined;
  let writeFailed = false;
  let finished = false;
  const onOutputError = (error: Error) => {
    outputError ??= error;
    if (finished) {
      output.off('error', onOutputError);
    }
  };
  output.on('error', onOutputError);

  const write = async (chunk: string): Promise<WriteResult> => {
    if (outputError) {
      return err(new TabulatorError('ERR_OUTPUT_WRITE_ERROR', { cause: outputError }));
    }
    const written = await writeChunk(output, chunk, config.encoding);
    writeFailed ||= !written.ok;
    return written;
  };

  try {
    return await tabulate({ input: options.input, write, config, observer });
  } finally {
    finished = true;
    if (!writeFailed || outputError) {
      output.off('error', onOutputError);
    }
  }
}

interface TabulationRun {
  input: AsyncIterable<Buffer | string>;
  write: (chunk: string) => Promise<WriteResult>;
  config: TabulatorConfig;
  observer?: TabulationObserver;
}

async function tabulate({
  input,
  write,
  config,
  observer,
}: TabulationRun): Promise<Result<TabulationSummary, TabulatorError>> {
  const summary: TabulationSummary = { linesRead: 0, recordsWritten: 0, blankLines: 0 };

  const failWith = (error: TabulatorError): Failure<TabulatorError> => {
    observer?.onFailure?.(error);
    return err(error);
  };
  const failAt = (code: ErrorCode, lineNumber: number): Failure<TabulatorError> =>
    failWith(new TabulatorError(code, { lineNumber }));

  const header = await write(OUTPUT_HEADER);
  if (!header.ok) {
    return failWith(header.error);
  }

  const record = new TsvRecordWriter();
  const lines = streamLines(input, {
    maxLineBytes: config.maxLineBytes,
    encoding: config.encoding,
  });

  try {
    for (;;) {
      const next = await nextLine(lines, summary.linesRead + 1);
      if (!next.ok) {
        return failWith(next.error);
      }
      if (next.value.done) {
        return ok(summary);
      }

      const event = next.value.value;
      // Every line must carry its newline within the buffer; a tail cut
      // off by end of input is no different from an overlong one.
      if (event.kind === 'line_too_long' || !event.terminated) {
        return failAt('ERR_LINE_IS_TOO_LONG', event.lineNumber);
      }
      summary.linesRead += 1;

      const outcome = convertLine(event.text, record, { timeBufferSize: config.timeBufferSize });
      const text = record.take();
      if (!outcome.ok) {
        return failWith(outcome.error.atLine(event.lineNumber));
      }

      const written = await write(text);
      if (!written.ok) {
        return failWith(written.error.atLine(event.lineNumber));
      }

      if (outcome.value === 'blank') {
        summary.blankLines += 1;
        observer?.onBlankLine?.({ lineNumber: event.lineNumber });
      } else {
        summary.recordsWritten += 1;
        observer?.onRecord?.({ lineNumber: event.lineNumber });
      }
    }
  } finally {
    await lines.return(undefined);
  }
}
