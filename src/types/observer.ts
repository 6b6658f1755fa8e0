/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { TabulatorError } from '../core/errors.js';

/**
 * Optional progress hooks for library callers of the runner. Line numbers
 * are 1-based.
 */
export interface TabulationObserver {
  onRecord?(info: { lineNumber: number }): void;
  onBlankLine?(info: { lineNumber: number }): void;
  onFailure?(error: TabulatorError): void;
}
