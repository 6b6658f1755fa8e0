/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DEFAULT_TIME_BUFFER_SIZE } from '../config/tabulator-config.js';
import { isDigit, isSpace } from './chars.js';
import { fail, type TabulatorError } from './errors.js';
import { ok, type Result } from './result.js';

export const MONTH_NAMES = [
  'Jan',
  'Feb',
  'Mar',
  'Apr',
  'May',
  'Jun',
  'Jul',
  'Aug',
  'Sep',
  'Oct',
  'Nov',
  'Dec',
] as const;

/**
 * Calendar fields of an Apache `%t` value. `offset` is the zone as
 * written (`-0700` is -700); it is carried through, never applied.
 */
export interface ApacheTimestamp {
  day: number;
  /** 0-based: Jan is 0, Dec is 11. */
  month: number;
  year: number;
  hour: number;
  minute: number;
  second: number;
  offset: number;
}

export interface ScannedDatetime {
  timestamp: ApacheTimestamp;
  /** Index just past the offset. */
  end: number;
}

export interface NormalizedTimestamp {
  iso: string;
  end: number;
}

export interface TimestampOptions {
  timeBufferSize?: number;
}

const OFFSET_MAX_WIDTH = 5;

const isBlank = (ch: string): boolean => ch === ' ' || ch === '\t';

/**
 * Fixed-arity reader over the datetime text. Every method either consumes
 * exactly what it recognised and returns it, or leaves the position alone
 * and returns undefined / false.
 */
class DatetimeScanner {
  constructor(
    private readonly text: string,
    public position: number,
  ) {}

  digits(width: number): number | undefined {
    const end = this.position + width;
    for (let i = this.position; i < end; i += 1) {
      if (!isDigit(this.text.charAt(i))) {
        return undefined;
      }
    }
    const value = Number(this.text.slice(this.position, end));
    this.position = end;
    return value;
  }

  word(width: number): string | undefined {
    const end = this.position + width;
    for (let i = this.position; i < end; i += 1) {
      const ch = this.text.charAt(i);
      if (ch === '' || isSpace(ch)) {
        return undefined;
      }
    }
    const value = this.text.slice(this.position, end);
    this.position = end;
    return value;
  }

  literal(expected: string): boolean {
    if (this.text.charAt(this.position) !== expected) {
      return false;
    }
    this.position += 1;
    return true;
  }

  blanks(): boolean {
    let i = this.position;
    while (isBlank(this.text.charAt(i))) {
      i += 1;
    }
    if (i === this.position) {
      return false;
    }
    this.position = i;
    return true;
  }

  signedNumber(maxWidth: number): number | undefined {
    const start = this.position;
    let i = start;
    const sign = this.text.charAt(i);
    if (sign === '+' || sign === '-') {
      i += 1;
    }
    const digitsStart = i;
    while (i - start < maxWidth && isDigit(this.text.charAt(i))) {
      i += 1;
    }
    if (i === digitsStart) {
      return undefined;
    }
    const value = Number(this.text.slice(start, i));
    this.position = i;
    // `-0000` scans as negative zero
    return value === 0 ? 0 : value;
  }
}

export function parseMonth(name: string): Result<number, TabulatorError> {
  const index = MONTH_NAMES.findIndex((month) => month === name);
  if (index === -1) {
    return fail('ERR_FAILED_TO_PARSE_MONTH');
  }
  return ok(index);
}

/**
 * Scans `dd/Mon/yyyy:HH:MM:SS ±HHMM` starting at `start`. The surrounding
 * brackets belong to the caller. The month name is resolved only once all
 * seven sub-fields have scanned.
 */
export function parseApacheDatetime(
  text: string,
  start = 0,
): Result<ScannedDatetime, TabulatorError> {
  const scanner = new DatetimeScanner(text, start);
  const malformed = () => fail('ERR_FAILED_TO_PARSE_APACHE_DATETIME', scanner.position);

  const day = scanner.digits(2);
  if (day === undefined || !scanner.literal('/')) return malformed();

  const monthStart = scanner.position;
  const monthName = scanner.word(3);
  if (monthName === undefined || !scanner.literal('/')) return malformed();

  const year = scanner.digits(4);
  if (year === undefined || !scanner.literal(':')) return malformed();

  const hour = scanner.digits(2);
  if (hour === undefined || !scanner.literal(':')) return malformed();

  const minute = scanner.digits(2);
  if (minute === undefined || !scanner.literal(':')) return malformed();

  const second = scanner.digits(2);
  if (second === undefined || !scanner.blanks()) return malformed();

  const offset = scanner.signedNumber(OFFSET_MAX_WIDTH);
  if (offset === undefined) return malformed();

  const month = parseMonth(monthName);
  if (!month.ok) {
    return fail(month.error.code, monthStart);
  }

  return ok({
    timestamp: { day, month: month.value, year, hour, minute, second, offset },
    end: scanner.position,
  });
}

const pad = (value: number, width: number): string => String(value).padStart(width, '0');

/**
 * Renders the calendar part as `YYYY-MM-DDTHH:MM:SS`. The text plus a
 * terminator has to fit `bufferSize`.
 */
export function formatIsoDatetime(
  timestamp: ApacheTimestamp,
  bufferSize: number = DEFAULT_TIME_BUFFER_SIZE,
): Result<string, TabulatorError> {
  const date = `${pad(timestamp.year, 4)}-${pad(timestamp.month + 1, 2)}-${pad(timestamp.day, 2)}`;
  const time = `${pad(timestamp.hour, 2)}:${pad(timestamp.minute, 2)}:${pad(timestamp.second, 2)}`;
  const iso = `${date}T${time}`;
  if (iso.length + 1 > bufferSize) {
    return fail('ERR_TIME_BUFFER_SIZE_EXCEEDED');
  }
  return ok(iso);
}

export const formatUtcOffset = (offset: number): string =>
  offset >= 0 ? `+${pad(offset, 4)}` : `-${pad(-offset, 4)}`;

export function normalizeApacheTimestamp(
  text: string,
  start = 0,
  options: TimestampOptions = {},
): Result<NormalizedTimestamp, TabulatorError> {
  const scanned = parseApacheDatetime(text, start);
  if (!scanned.ok) {
    return scanned;
  }
  const { timestamp, end } = scanned.value;
  const calendar = formatIsoDatetime(timestamp, options.timeBufferSize);
  if (!calendar.ok) {
    return fail(calendar.error.code, start);
  }
  return ok({ iso: `${calendar.value}${formatUtcOffset(timestamp.offset)}`, end });
}
