/**
 * Stint Core — Interval Mutator Tests
 *
 * Tests:
 *   M-1: begin on an empty log writes exactly one open record
 *   M-2: begin over an open tail warns when lenient, fails when strict
 *   M-3: begin refuses any other malformation
 *   M-4: end closes the open tail in place and keeps its start byte-identical
 *   M-5: end with nothing open is no-open-interval
 *   M-6: end tolerates extra bad lines when lenient only
 *   M-7: end refuses a bad last row that is not an open record
 *   M-8: the rewrite aborts when the log changed after validation
 *   M-9: stream failures surface as io errors
 *   M-10: next alternates between begin and end
 */

import { describe, it, expect } from 'vitest';
import { beginInterval, endInterval, nextInterval, readRecords } from '../src/index.js';
import type { IntervalOptions } from '../src/index.js';
import { BufferStream, RecordingReporter, T0, T1, clockAt } from './helpers.js';

const encoder = new TextEncoder();

function options(iso: string, reporter: RecordingReporter, strict = false): IntervalOptions {
  return { clock: clockAt(iso), zone: 'utc', reporter, strict };
}

const AT_T0 = '2026-03-01T09:00:00Z';
const AT_T1 = '2026-03-01T10:30:15Z';

describe('beginInterval', () => {
  it('M-1: writes one open record to an empty log', () => {
    const stream = new BufferStream();
    const reporter = new RecordingReporter();

    const result = beginInterval(stream, options(AT_T0, reporter));

    expect(result).toEqual({ ok: true, value: { action: 'begin', record: { start: T0, end: null } } });
    expect(stream.text()).toBe(`${T0}\n`);
    expect(reporter.informed).toEqual(['BEGIN']);
    expect(readRecords(stream, false)).toMatchObject({ ok: true, value: { records: [{ start: T0, end: null }] } });
  });

  it('M-1: adds a line terminator first when the log lacks one', () => {
    const stream = new BufferStream('a,b');
    beginInterval(stream, options(AT_T0, new RecordingReporter()));
    expect(stream.text()).toBe(`a,b\n${T0}\n`);
  });

  it('M-2: begins again over an open tail with a warning when lenient', () => {
    const stream = new BufferStream();
    const reporter = new RecordingReporter();

    beginInterval(stream, options(AT_T0, reporter));
    const second = beginInterval(stream, options(AT_T1, reporter));

    expect(second.ok).toBe(true);
    expect(stream.text()).toBe(`${T0}\n${T1}\n`);
    expect(reporter.warned).toEqual(['last entry is incomplete']);
    expect(reporter.informed).toEqual(['BEGIN', 'BEGIN']);
  });

  it('M-2: refuses to begin over an open tail when strict', () => {
    const stream = new BufferStream(`${T0}\n`);
    const reporter = new RecordingReporter();

    const result = beginInterval(stream, options(AT_T1, reporter, true));

    expect(result).toEqual({ ok: false, error: { kind: 'format', report: { badLines: [1], lastIsBad: true } } });
    expect(stream.text()).toBe(`${T0}\n`);
    expect(reporter.informed).toEqual([]);
  });

  it('M-3: refuses an interior malformed row even when lenient', () => {
    const stream = new BufferStream('a,b,c\nx,y\n');
    const result = beginInterval(stream, options(AT_T0, new RecordingReporter()));

    expect(result).toEqual({ ok: false, error: { kind: 'format', report: { badLines: [1], lastIsBad: false } } });
    expect(stream.text()).toBe('a,b,c\nx,y\n');
  });
});

describe('endInterval', () => {
  it('M-4: closes the interval opened by begin', () => {
    const stream = new BufferStream();
    const reporter = new RecordingReporter();

    beginInterval(stream, options(AT_T0, reporter));
    const result = endInterval(stream, options(AT_T1, reporter));

    expect(result).toEqual({ ok: true, value: { action: 'end', record: { start: T0, end: T1 } } });
    expect(stream.text()).toBe(`${T0},${T1}\n`);
    expect(reporter.informed).toEqual(['BEGIN', 'END']);
  });

  it('M-4: leaves earlier CRLF lines untouched', () => {
    const stream = new BufferStream(`a,b\r\n${T0}\r\n`);
    endInterval(stream, options(AT_T1, new RecordingReporter()));
    expect(stream.text()).toBe(`a,b\r\n${T0},${T1}\n`);
  });

  it('M-4: closes a tail that has no line terminator', () => {
    const stream = new BufferStream(T0);
    endInterval(stream, options(AT_T1, new RecordingReporter()));
    expect(stream.text()).toBe(`${T0},${T1}\n`);
  });

  it('M-4: drops trailing blank lines after the open record', () => {
    const stream = new BufferStream(`${T0}\n\n\n`);
    endInterval(stream, options(AT_T1, new RecordingReporter()));
    expect(stream.text()).toBe(`${T0},${T1}\n`);
  });

  it('M-5: reports no open interval on an empty log', () => {
    const stream = new BufferStream();
    expect(endInterval(stream, options(AT_T1, new RecordingReporter()))).toEqual({
      ok: false,
      error: { kind: 'no-open-interval' },
    });
  });

  it('M-5: reports no open interval when the last record is closed', () => {
    const stream = new BufferStream(`${T0},${T1}\n`);
    expect(endInterval(stream, options(AT_T1, new RecordingReporter()))).toEqual({
      ok: false,
      error: { kind: 'no-open-interval' },
    });
    expect(stream.text()).toBe(`${T0},${T1}\n`);
  });

  it('M-6: closes the tail over other bad lines with a warning when lenient', () => {
    const stream = new BufferStream(`a,b,c\n${T0}\n`);
    const reporter = new RecordingReporter();

    const result = endInterval(stream, options(AT_T1, reporter));

    expect(result.ok).toBe(true);
    expect(stream.text()).toBe(`a,b,c\n${T0},${T1}\n`);
    expect(reporter.warned).toEqual(['incomplete or invalid entries on lines 1 and 2']);
  });

  it('M-6: refuses other bad lines when strict', () => {
    const stream = new BufferStream(`a,b,c\n${T0}\n`);
    const result = endInterval(stream, options(AT_T1, new RecordingReporter(), true));

    expect(result).toEqual({ ok: false, error: { kind: 'format', report: { badLines: [1, 2], lastIsBad: true } } });
    expect(stream.text()).toBe(`a,b,c\n${T0}\n`);
  });

  it('M-6: closes a just-incomplete tail even when strict', () => {
    const stream = new BufferStream(`${T0}\n`);
    expect(endInterval(stream, options(AT_T1, new RecordingReporter(), true)).ok).toBe(true);
  });

  it('M-7: refuses a last row with too many fields', () => {
    const stream = new BufferStream('x,y\na,b,c\n');
    expect(endInterval(stream, options(AT_T1, new RecordingReporter()))).toEqual({
      ok: false,
      error: { kind: 'format', report: { badLines: [2], lastIsBad: true } },
    });
  });

  it('M-7: refuses when a bad interior row precedes a closed last row', () => {
    const stream = new BufferStream('a,b,c\nx,y\n');
    expect(endInterval(stream, options(AT_T1, new RecordingReporter()))).toEqual({
      ok: false,
      error: { kind: 'format', report: { badLines: [1], lastIsBad: false } },
    });
  });
});

/** Appends a record the first time the mutator asks for the size. */
class AppendingStream extends BufferStream {
  private appended = false;

  override size(): number {
    if (!this.appended) {
      this.appended = true;
      this.append('2026-03-01 09:05:00 UTC\n');
    }
    return super.size();
  }
}

/** Overwrites the open record with one of the same length the first time the size is asked for. */
class EditingStream extends BufferStream {
  private edited = false;

  override size(): number {
    if (!this.edited) {
      this.edited = true;
      this.write(48, encoder.encode('2026-03-01 09:05:00 UTC'));
    }
    return super.size();
  }
}

/** A stream whose truncate does nothing. */
class StuckStream extends BufferStream {
  override truncate(): void {}
}

describe('endInterval byte accounting', () => {
  it('M-8: aborts when the log grew after validation', () => {
    const stream = new AppendingStream(`${T0}\n`);
    const result = endInterval(stream, options(AT_T1, new RecordingReporter()));

    expect(result).toMatchObject({
      ok: false,
      error: { kind: 'io', message: 'log changed while closing interval: expected 24 bytes, found 48' },
    });
    expect(stream.text()).toBe(`${T0}\n2026-03-01 09:05:00 UTC\n`);
  });

  it('M-8: aborts when the open record changed after validation', () => {
    const stream = new EditingStream(`${T0},${T1}\n${T0}\n`);
    const result = endInterval(stream, options(AT_T1, new RecordingReporter()));

    expect(result).toMatchObject({
      ok: false,
      error: {
        kind: 'io',
        message: 'log changed while closing interval: last entry at byte 48 differs from what was validated',
      },
    });
  });

  it('M-8: reports a size mismatch after the rewrite', () => {
    const stream = new StuckStream(T0 + '\n'.repeat(41));
    const result = endInterval(stream, options(AT_T1, new RecordingReporter()));

    expect(result).toMatchObject({
      ok: false,
      error: { kind: 'io', message: 'log changed while closing interval: expected 48 bytes after rewrite, found 64' },
    });
  });
});

class FailingStream extends BufferStream {
  constructor(private readonly failOn: 'read' | 'write') {
    super();
  }

  override read(position?: number, length?: number): Uint8Array {
    if (this.failOn === 'read') throw new Error('EIO: i/o error, read');
    return super.read(position, length);
  }

  override write(position: number, data: Uint8Array): void {
    if (this.failOn === 'write') throw new Error('ENOSPC: no space left on device, write');
    super.write(position, data);
  }
}

describe('stream failures', () => {
  it('M-9: surfaces a failed read as an io error', () => {
    const result = endInterval(new FailingStream('read'), options(AT_T1, new RecordingReporter()));
    expect(result).toMatchObject({ ok: false, error: { kind: 'io', message: 'EIO: i/o error, read' } });
  });

  it('M-9: surfaces a failed write as an io error and does not report success', () => {
    const reporter = new RecordingReporter();
    const result = beginInterval(new FailingStream('write'), options(AT_T0, reporter));

    expect(result).toMatchObject({
      ok: false,
      error: { kind: 'io', message: 'ENOSPC: no space left on device, write' },
    });
    expect(reporter.informed).toEqual([]);
  });
});

describe('nextInterval', () => {
  it('M-10: begins on an idle log and ends on an open one', () => {
    const stream = new BufferStream();
    const reporter = new RecordingReporter();

    const first = nextInterval(stream, options(AT_T0, reporter));
    const second = nextInterval(stream, options(AT_T1, reporter));

    expect(first).toMatchObject({ ok: true, value: { action: 'begin' } });
    expect(second).toMatchObject({ ok: true, value: { action: 'end' } });
    expect(stream.text()).toBe(`${T0},${T1}\n`);
    expect(reporter.informed).toEqual(['BEGIN', 'END']);
  });

  it('M-10: refuses to begin over an interior malformed row', () => {
    const stream = new BufferStream('a,b,c\nx,y\n');
    expect(nextInterval(stream, options(AT_T0, new RecordingReporter()))).toEqual({
      ok: false,
      error: { kind: 'format', report: { badLines: [1], lastIsBad: false } },
    });
  });
});
