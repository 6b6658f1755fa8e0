/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/** The C-locale `isspace` set. Non-ASCII blanks such as NBSP are data. */
const SPACE_CHARS = new Set([' ', '\t', '\n', '\v', '\f', '\r']);

export const isSpace = (ch: string): boolean => SPACE_CHARS.has(ch);

export const isDigit = (ch: string): boolean => ch.length === 1 && ch >= '0' && ch <= '9';
