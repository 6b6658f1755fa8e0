/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export interface TabulatorConfig {
  /** Longest accepted input line in bytes, newline included. */
  maxLineBytes: number;
  /** Capacity of the ISO datetime render buffer, terminator included. */
  timeBufferSize: number;
  /** Byte-to-text mapping used on both input and output. */
  encoding: BufferEncoding;
}

export const DEFAULT_MAX_LINE_BYTES = 4096;
export const DEFAULT_TIME_BUFFER_SIZE = 32;

// latin1 maps every byte to one code unit, so output bytes equal input bytes.
export const DEFAULT_ENCODING: BufferEncoding = 'latin1';

export const DEFAULT_TABULATOR_CONFIG: Readonly<TabulatorConfig> = Object.freeze({
  maxLineBytes: DEFAULT_MAX_LINE_BYTES,
  timeBufferSize: DEFAULT_TIME_BUFFER_SIZE,
  encoding: DEFAULT_ENCODING,
});

const requirePositiveInteger = (name: string, value: number): number => {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, received ${value}.`);
  }
  return value;
};

export function resolveTabulatorConfig(
  overrides: Partial<TabulatorConfig> = {},
): TabulatorConfig {
  const maxLineBytes = overrides.maxLineBytes ?? DEFAULT_MAX_LINE_BYTES;
  const timeBufferSize = overrides.timeBufferSize ?? DEFAULT_TIME_BUFFER_SIZE;
  const encoding = overrides.encoding ?? DEFAULT_ENCODING;

  if (!Buffer.isEncoding(encoding)) {
    throw new Error(`Unsupported encoding: ${encoding}`);
  }

  return {
    maxLineBytes: requirePositiveInteger('maxLineBytes', maxLineBytes),
    timeBufferSize: requirePositiveInteger('timeBufferSize', timeBufferSize),
    encoding,
  };
}
