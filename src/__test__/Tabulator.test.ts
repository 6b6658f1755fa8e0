/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { TabulatorError } from '../core/errors.js';
import { runTabulator } from '../runner/tabulator.js';
import type { TabulationObserver } from '../types/observer.js';
import {
  FRANK_LINE,
  FRANK_RECORD,
  HEADER,
  LOGIN_LINE,
  LOGIN_RECORD,
  UNCLOSED_REQUEST_LINE,
} from './helpers/fixtures.js';
import { bytesInput, failingInput, failingOutput, MemoryOutput } from './helpers/streams.js';

const recordingObserver = () => {
  const events: string[] = [];
  const failures: TabulatorError[] = [];
  const observer: TabulationObserver = {
    onRecord: ({ lineNumber }) => events.push(`record:${lineNumber}`),
    onBlankLine: ({ lineNumber }) => events.push(`blank:${lineNumber}`),
    onFailure: (error) => failures.push(error),
  };
  return { observer, events, failures };
};

describe('runTabulator', () => {
  it('writes only the header for empty input', async () => {
    const output = new MemoryOutput();
    const result = await runTabulator({ input: bytesInput(), output });
    expect(result).toEqual({ ok: true, value: { linesRead: 0, recordsWritten: 0, blankLines: 0 } });
    expect(output.text()).toBe(HEADER);
  });

  it('writes one record per input line, in order', async () => {
    const output = new MemoryOutput();
    const { observer, events } = recordingObserver();
    const result = await runTabulator({
      input: bytesInput(FRANK_LINE, '\n', LOGIN_LINE),
      output,
      observer,
    });
    expect(result).toEqual({ ok: true, value: { linesRead: 3, recordsWritten: 2, blankLines: 1 } });
    expect(output.text()).toBe(`${HEADER}${FRANK_RECORD}\n${LOGIN_RECORD}`);
    expect(events).toEqual(['record:1', 'blank:2', 'record:3']);
  });

  it('handles lines split across arbitrary chunk boundaries', async () => {
    const output = new MemoryOutput();
    const text = `${FRANK_LINE}${LOGIN_LINE}`;
    const result = await runTabulator({
      input: bytesInput(text.slice(0, 7), text.slice(7, 120), text.slice(120)),
      output,
    });
    expect(result.ok).toBe(true);
    expect(output.text()).toBe(`${HEADER}${FRANK_RECORD}${LOGIN_RECORD}`);
  });

  it('stops at the first malformed line and writes nothing for it', async () => {
    const output = new MemoryOutput();
    const { observer, events, failures } = recordingObserver();
    const result = await runTabulator({
      input: bytesInput(FRANK_LINE, UNCLOSED_REQUEST_LINE, LOGIN_LINE),
      output,
      observer,
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('ERR_WRONG_LINE_FORMAT');
      expect(result.error.lineNumber).toBe(2);
      expect(failures).toEqual([result.error]);
    }
    expect(output.text()).toBe(`${HEADER}${FRANK_RECORD}`);
    expect(events).toEqual(['record:1']);
  });

  it('fails on a line longer than the buffer before converting it', async () => {
    const output = new MemoryOutput();
    const result = await runTabulator({
      input: bytesInput(FRANK_LINE, `${'a'.repeat(5000)}\n`, LOGIN_LINE),
      output,
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('ERR_LINE_IS_TOO_LONG');
      expect(result.error.lineNumber).toBe(2);
    }
    expect(output.text()).toBe(`${HEADER}${FRANK_RECORD}`);
  });

  it('honours a configured line limit', async () => {
    const output = new MemoryOutput();
    const result = await runTabulator({
      input: bytesInput(FRANK_LINE),
      output,
      config: { maxLineBytes: 64 },
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('ERR_LINE_IS_TOO_LONG');
    }
    expect(output.text()).toBe(HEADER);
  });

  it('treats a final line without a newline as too long', async () => {
    const output = new MemoryOutput();
    const { observer, failures } = recordingObserver();
    const result = await runTabulator({
      input: bytesInput(FRANK_LINE, LOGIN_LINE.trimEnd()),
      output,
      observer,
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('ERR_LINE_IS_TOO_LONG');
      expect(result.error.lineNumber).toBe(2);
      expect(failures).toEqual([result.error]);
    }
    expect(output.text()).toBe(`${HEADER}${FRANK_RECORD}`);
  });

  it('ends cleanly when the input stops right after a newline', async () => {
    const output = new MemoryOutput();
    const result = await runTabulator({ input: bytesInput(FRANK_LINE, ''), output });
    expect(result).toEqual({ ok: true, value: { linesRead: 1, recordsWritten: 1, blankLines: 0 } });
  });

  it('reports an input stream error as a read error', async () => {
    const output = new MemoryOutput();
    const cause = new Error('read EIO');
    const result = await runTabulator({ input: failingInput(FRANK_LINE, cause), output });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('ERR_INPUT_READ_ERROR');
      expect(result.error.lineNumber).toBe(2);
      expect(result.error.cause).toBe(cause);
    }
    expect(output.text()).toBe(`${HEADER}${FRANK_RECORD}`);
  });

  it('reports a rejected write as an output error', async () => {
    const cause = new Error('write EPIPE');
    const result = await runTabulator({ input: bytesInput(FRANK_LINE), output: failingOutput(cause) });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('ERR_OUTPUT_WRITE_ERROR');
      expect(result.error.cause).toBe(cause);
    }
  });

  it('leaves no error listener behind on a reused output', async () => {
    const output = new MemoryOutput();
    await runTabulator({ input: bytesInput(FRANK_LINE), output });
    await runTabulator({ input: bytesInput(UNCLOSED_REQUEST_LINE), output });
    expect(output.listenerCount('error')).toBe(0);
  });

  it('releases the error listener once a failed output has reported', async () => {
    const output = failingOutput(new Error('write EPIPE'));
    const result = await runTabulator({ input: bytesInput(FRANK_LINE), output });
    expect(result.ok).toBe(false);
    await new Promise((resolve) => setImmediate(resolve));
    expect(output.listenerCount('error')).toBe(0);
  });

  it('passes non-ASCII bytes through unchanged', async () => {
    const output = new MemoryOutput();
    const line =
      '::1 - józef [02/Mar/2024:08:00:00 +0100] "GET /straße HTTP/2" 200 17 "-" "Agent ☃"\n';
    const record =
      '::1\t-\tjózef\t2024-03-02T08:00:00+0100\tGET /straße HTTP/2\t200\t17\t-\tAgent ☃\n';
    const result = await runTabulator({ input: bytesInput(Buffer.from(line, 'utf8')), output });
    expect(result.ok).toBe(true);
    expect(output.bytes().equals(Buffer.from(`${HEADER}${record}`, 'utf8'))).toBe(true);
  });
});
