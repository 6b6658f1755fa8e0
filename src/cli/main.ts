/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Writable } from 'node:stream';
import { reportError } from '../core/logging.js';
import { runTabulator } from '../runner/index.js';
import { parseArgs } from './args.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

export interface CliStreams {
  stdin: AsyncIterable<Buffer | string>;
  stdout: Writable;
  stderr: Writable;
}

const processStreams = (): CliStreams => ({
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
});

/**
 * Runs the converter and resolves with the exit status. Arguments are
 * checked before anything reaches stdout.
 */
export const main = async (
  argv: string[] = process.argv.slice(2),
  streams: CliStreams = processStreams(),
): Promise<number> => {
  const args = parseArgs(argv);
  if (!args.ok) {
    reportError(streams.stderr, args.error);
    return EXIT_FAILURE;
  }

  const result = await runTabulator({ input: streams.stdin, output: streams.stdout });
  if (!result.ok) {
    reportError(streams.stderr, result.error);
    return EXIT_FAILURE;
  }
  return EXIT_SUCCESS;
};
