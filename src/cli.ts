#!/usr/bin/env node
/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { main } from './cli/main.js';

main()
  .then((status) => {
    process.exitCode = status;
  })
  .catch((error) => {
    console.error('Failed to run access-log-tsv:', error);
    process.exit(1);
  });
