/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DEFAULT_TIME_BUFFER_SIZE } from '../config/tabulator-config.js';
import { isSpace } from './chars.js';
import { fail, type TabulatorError } from './errors.js';
import { TsvRecordWriter, type FieldName, type RecordSink } from './fields.js';
import { ok, type Result } from './result.js';
import { normalizeApacheTimestamp } from './timestamp.js';

export type LineOutcome = 'record' | 'blank';

export interface TokenizerOptions {
  timeBufferSize?: number;
}

const LINE_END = '\n';
const QUOTE = '"';
const TIME_OPEN = '[';
const TIME_CLOSE = ']';

/**
 * Forward-only cursor over one input line. `charAt` past the end returns
 * '', which plays the part of the end-of-line sentinel.
 */
class LineCursor {
  position = 0;

  constructor(
    private readonly line: string,
    private readonly sink: RecordSink,
    private readonly options: TokenizerOptions,
  ) {}

  peek(): string {
    return this.line.charAt(this.position);
  }

  /**
   * Maximal run of non-space characters. A run that would start with the
   * opening delimiter of the next field is empty.
   */
  nonSpace(name: FieldName, nextOpening?: string): void {
    const start = this.position;
    if (nextOpening === undefined || this.peek() !== nextOpening) {
      while (this.peek() !== '' && !isSpace(this.peek())) {
        this.position += 1;
      }
    }
    this.sink.field(name, this.line.slice(start, this.position));
  }

  /** `"` ... `"` with the body copied verbatim; no escapes. */
  enclosed(name: FieldName): Result<void, TabulatorError> {
    if (this.peek() !== QUOTE) {
      return fail('ERR_WRONG_LINE_FORMAT', this.position);
    }
    const bodyStart = this.position + 1;
    const close = this.line.indexOf(QUOTE, bodyStart);
    if (close === -1) {
      return fail('ERR_WRONG_LINE_FORMAT', this.line.length);
    }
    this.sink.field(name, this.line.slice(bodyStart, close));
    this.position = close + 1;
    return ok(undefined);
  }

  time(): Result<void, TabulatorError> {
    if (this.peek() !== TIME_OPEN) {
      return fail('ERR_WRONG_LINE_FORMAT', this.position);
    }
    const normalized = normalizeApacheTimestamp(this.line, this.position + 1, {
      timeBufferSize: this.options.timeBufferSize ?? DEFAULT_TIME_BUFFER_SIZE,
    });
    if (!normalized.ok) {
      return normalized;
    }
    this.position = normalized.value.end;
    if (this.peek() !== TIME_CLOSE) {
      return fail('ERR_WRONG_LINE_FORMAT', this.position);
    }
    this.position += 1;
    this.sink.field('time', normalized.value.iso);
    return ok(undefined);
  }

  skipSpaces(): void {
    while (this.peek() !== '' && isSpace(this.peek())) {
      this.position += 1;
    }
  }
}

/**
 * Converts one Common/Combined Log Format line (newline included) into the
 * nine output columns, handing each to `sink` as soon as it is recognised:
 *
 *   host identity user [time] "request" status bytes "referrer" "agent"
 *
 * On failure the sink may already have seen the leading columns; the
 * caller decides what to do with them.
 */
export function convertLine(
  line: string,
  sink: RecordSink,
  options: TokenizerOptions = {},
): Result<LineOutcome, TabulatorError> {
  if (line === LINE_END) {
    sink.end();
    return ok('blank');
  }

  const cursor = new LineCursor(line, sink, options);

  cursor.nonSpace('host');
  cursor.skipSpaces();
  cursor.nonSpace('identity');
  cursor.skipSpaces();
  cursor.nonSpace('user', TIME_OPEN);
  cursor.skipSpaces();

  const time = cursor.time();
  if (!time.ok) return time;
  cursor.skipSpaces();

  const request = cursor.enclosed('request');
  if (!request.ok) return request;
  cursor.skipSpaces();

  cursor.nonSpace('status');
  cursor.skipSpaces();
  cursor.nonSpace('bytes', QUOTE);
  cursor.skipSpaces();

  const referrer = cursor.enclosed('referrer');
  if (!referrer.ok) return referrer;
  cursor.skipSpaces();

  const agent = cursor.enclosed('agent');
  if (!agent.ok) return agent;

  if (cursor.peek() !== LINE_END) {
    return fail('ERR_WRONG_LINE_FORMAT', cursor.position);
  }
  sink.end();
  return ok('record');
}

/** Runs {@link convertLine} into a TSV string for a single line. */
export function formatLine(
  line: string,
  options: TokenizerOptions = {},
): Result<string, TabulatorError> {
  const writer = new TsvRecordWriter();
  const outcome = convertLine(line, writer, options);
  if (!outcome.ok) {
    return outcome;
  }
  return ok(writer.take());
}
