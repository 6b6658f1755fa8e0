/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { err, type Failure } from './result.js';

export const ERROR_CODES = [
  'ERR_TOO_MANY_ARGS',
  'ERR_LINE_IS_TOO_LONG',
  'ERR_WRONG_LINE_FORMAT',
  'ERR_INPUT_READ_ERROR',
  'ERR_WRONG_TIME_FORMAT',
  'ERR_TIME_BUFFER_SIZE_EXCEEDED',
  'ERR_FAILED_TO_PARSE_MONTH',
  'ERR_FAILED_TO_PARSE_APACHE_DATETIME',
  'ERR_OUTPUT_WRITE_ERROR',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export interface TabulatorErrorDetails {
  /** 1-based input line the failure was detected on. */
  lineNumber?: number;
  /** 0-based character offset inside that line. */
  column?: number;
  cause?: unknown;
}

/**
 * The single failure type of a run. Everything below the CLI returns it
 * inside a Result; only the CLI turns it into output and an exit status.
 */
export class TabulatorError extends Error {
  readonly code: ErrorCode;
  readonly lineNumber?: number;
  readonly column?: number;

  constructor(code: ErrorCode, details: TabulatorErrorDetails = {}) {
    super(code, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'TabulatorError';
    this.code = code;
    this.lineNumber = details.lineNumber;
    this.column = details.column;
  }

  /** Same code and column, pinned to the line it came from. */
  atLine(lineNumber: number): TabulatorError {
    return new TabulatorError(this.code, {
      lineNumber,
      column: this.column,
      cause: this.cause,
    });
  }
}

export const fail = (code: ErrorCode, column?: number): Failure<TabulatorError> =>
  err(new TabulatorError(code, { column }));

