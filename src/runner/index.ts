/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export {
  runTabulator,
  type TabulatorOptions,
  type TabulationSummary,
} from './tabulator.js';

export {
  streamLines,
  type LineEvent,
  type LineReaderOptions,
} from './line-reader.js';
