/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { fail, type TabulatorError } from '../core/errors.js';
import { ok, type Result } from '../core/result.js';

/**
 * The converter is a pure stdin-to-stdout filter: it takes no flags, no
 * positional arguments and no input paths.
 */
export const parseArgs = (argv: string[]): Result<void, TabulatorError> => {
  if (argv.length > 0) {
    return fail('ERR_TOO_MANY_ARGS');
  }
  return ok(undefined);
};
