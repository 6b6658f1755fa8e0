/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './core/index.js';
export * from './config/tabulator-config.js';
export type { TabulationObserver } from './types/observer.js';
export { runTabulator, streamLines } from './runner/index.js';
export type { TabulatorOptions, TabulationSummary, LineEvent, LineReaderOptions } from './runner/index.js';
export { main as runCli, type CliStreams } from './cli/main.js';
