/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './errors.js';
export * from './result.js';
export * from './fields.js';
export * from './timestamp.js';
export * from './tokenizer.js';
export { formatErrorLine, reportError } from './logging.js';
