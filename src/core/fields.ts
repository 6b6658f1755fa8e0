/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Output columns, in the order the Combined Log Format lists them:
 * `%h %l %u %t "%r" %>s %b "%{Referer}i" "%{User-agent}i"`.
 */
export const OUTPUT_FIELDS = [
  'host',
  'identity',
  'user',
  'time',
  'request',
  'status',
  'bytes',
  'referrer',
  'agent',
] as const;

export type FieldName = (typeof OUTPUT_FIELDS)[number];

export const FIELD_SEPARATOR = '\t';
export const RECORD_TERMINATOR = '\n';

export const OUTPUT_HEADER = `${OUTPUT_FIELDS.join(FIELD_SEPARATOR)}${RECORD_TERMINATOR}`;

/**
 * Receives one record as the tokenizer recognises it. `field` is called
 * once per column, in column order, then `end` closes the record. A blank
 * input line produces a lone `end`.
 */
export interface RecordSink {
  field(name: FieldName, text: string): void;
  end(): void;
}

/**
 * Sink that renders the record as TSV text. The tab goes in front of
 * every column but the first, so a blank line renders as a bare newline.
 */
export class TsvRecordWriter implements RecordSink {
  private readonly parts: string[] = [];

  field(name: FieldName, text: string): void {
    if (name !== OUTPUT_FIELDS[0]) {
      this.parts.push(FIELD_SEPARATOR);
    }
    this.parts.push(text);
  }

  end(): void {
    this.parts.push(RECORD_TERMINATOR);
  }

  /** Text emitted so far; empties the writer. */
  take(): string {
    const text = this.parts.join('');
    this.parts.length = 0;
    return text;
  }
}
