/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Writable } from 'node:stream';
import type { ErrorCode, TabulatorError } from './errors.js';

export const formatErrorLine = (code: ErrorCode): string => `Error: ${code}\n`;

/**
 * Writes the one-line failure report. Only the code is printed; line and
 * column stay on the error object for library callers.
 */
export const reportError = (stream: Writable, error: TabulatorError): void => {
  stream.write(formatErrorLine(error.code));
};
