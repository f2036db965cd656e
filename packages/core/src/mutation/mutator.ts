/**
 * Stint Core — Interval Mutator
 *
 * The two write operations on an interval log:
 *
 *   beginInterval — append a new open record at end-of-file
 *   endInterval   — stamp the open trailing record with an end time,
 *                   rewriting only that record's line in place
 *
 * plus nextInterval, which picks one of the two from the log's state.
 *
 * Anomaly policy:
 *   - the just-incomplete case (one open record at the tail) is the only
 *     anomaly begin will proceed over, with a warning, and only when not strict
 *   - end tolerates extra bad lines before the open tail with a warning when
 *     not strict
 *   - everything else is returned as an error and nothing is written
 *
 * In-place rewrite invariant (end):
 *   The rewrite region is [offset of the open row, end-of-file), where the
 *   offset was captured while validating. Immediately before writing, the
 *   stream size and the region's bytes must equal the snapshot. After writing
 *   and truncating, the stream size must be exactly offset + replacement
 *   length. Any mismatch is reported as an `io` error.
 */

import type { LogStream } from './log-stream.js';
import type { Reporter } from '../reporting/reporter.js';
import { SILENT_REPORTER } from '../reporting/reporter.js';
import type { Clock, TimeZoneMode } from '../codec/timestamp.js';
import { formatTimestamp, systemClock } from '../codec/timestamp.js';
import { LINE_TERMINATOR, encodeRecord } from '../codec/record-codec.js';
import type { IntervalRecord, LogSnapshot } from '../types/record.js';
import { justIncomplete } from '../types/record.js';
import type { Result } from '../types/errors.js';
import { NO_OPEN_INTERVAL, fail, formatError, ioError, succeed } from '../types/errors.js';
import { describeReport } from '../reporting/diagnostics.js';
import { takeSnapshot } from '../validation/snapshot.js';
import { lastRow } from '../validation/validator.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface IntervalOptions {
  /** Treat every anomaly, including the just-incomplete one, as a failure. */
  readonly strict?: boolean | undefined;
  /** Default: systemClock. */
  readonly clock?: Clock | undefined;
  /** Clock face for new timestamps. Default: 'local'. */
  readonly zone?: TimeZoneMode | undefined;
  /** Default: SILENT_REPORTER. */
  readonly reporter?: Reporter | undefined;
}

/** What a successful mutation did. */
export interface MutationOutcome {
  readonly action: 'begin' | 'end';
  /** The record as it now stands in the log. */
  readonly record: IntervalRecord;
}

/**
 * Thrown inside the rewrite when the log no longer matches the snapshot.
 * Surfaces to callers as an `io` error carrying this instance as its cause.
 */
export class LogChangedError extends Error {
  constructor(detail: string) {
    super(`log changed while closing interval: ${detail}`);
    this.name = 'LogChangedError';
  }
}

const encoder = new TextEncoder();

function now(options: IntervalOptions): string {
  return formatTimestamp((options.clock ?? systemClock)(), options.zone ?? 'local');
}

// ---------------------------------------------------------------------------
// begin
// ---------------------------------------------------------------------------

function beginFrom(
  stream: LogStream,
  snapshot: LogSnapshot,
  options: IntervalOptions,
): Result<MutationOutcome> {
  const reporter = options.reporter ?? SILENT_REPORTER;
  const { report } = snapshot;

  if (report !== null) {
    if (options.strict === true || !justIncomplete(report)) {
      return fail(formatError(report));
    }
    reporter.warn(describeReport(report));
  }

  const record: IntervalRecord = { start: now(options), end: null };
  // A log whose last line lacks a terminator gets one first, so the new
  // record always starts on its own line.
  const text = (snapshot.endsWithNewline ? '' : LINE_TERMINATOR) + encodeRecord(record) + LINE_TERMINATOR;

  try {
    stream.write(snapshot.size, encoder.encode(text));
  } catch (err: unknown) {
    return fail(ioError(err));
  }

  reporter.inform('BEGIN');
  return succeed<MutationOutcome>({ action: 'begin', record });
}

/**
 * Append a new open record stamped with the current time.
 */
export function beginInterval(stream: LogStream, options: IntervalOptions = {}): Result<MutationOutcome> {
  const snapshot = takeSnapshot(stream);
  if (!snapshot.ok) return snapshot;
  return beginFrom(stream, snapshot.value, options);
}

// ---------------------------------------------------------------------------
// end
// ---------------------------------------------------------------------------

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Replace [offset, end-of-file) with `replacement`, enforcing the byte
 * accounting described in the module header. Throws on any mismatch.
 */
function rewriteTail(
  stream: LogStream,
  snapshot: LogSnapshot,
  offset: number,
  replacement: Uint8Array,
): void {
  const sizeBefore = stream.size();
  if (sizeBefore !== snapshot.size) {
    throw new LogChangedError(`expected ${snapshot.size} bytes, found ${sizeBefore}`);
  }
  const region = stream.read(offset);
  if (!sameBytes(region, snapshot.tail)) {
    throw new LogChangedError(`last entry at byte ${offset} differs from what was validated`);
  }

  stream.write(offset, replacement);
  const expected = offset + replacement.length;
  stream.truncate(expected);

  const sizeAfter = stream.size();
  if (sizeAfter !== expected) {
    throw new LogChangedError(`expected ${expected} bytes after rewrite, found ${sizeAfter}`);
  }
}

function endFrom(
  stream: LogStream,
  snapshot: LogSnapshot,
  options: IntervalOptions,
): Result<MutationOutcome> {
  const reporter = options.reporter ?? SILENT_REPORTER;
  const { report } = snapshot;

  if (report === null) return fail(NO_OPEN_INTERVAL);
  if (!report.lastIsBad) return fail(formatError(report));

  if (report.badLines.length > 1) {
    if (options.strict === true) return fail(formatError(report));
    reporter.warn(describeReport(report));
  }

  // The last row is bad; it can only be completed if it is an open record.
  // Three fields or broken quoting leave no start time to complete.
  const last = lastRow(snapshot);
  if (last === undefined || last.record === null || last.record.end !== null) {
    return fail(formatError(report));
  }

  const record: IntervalRecord = { start: last.record.start, end: now(options) };
  const replacement = encoder.encode(encodeRecord(record) + LINE_TERMINATOR);

  try {
    rewriteTail(stream, snapshot, last.offset, replacement);
  } catch (err: unknown) {
    return fail(ioError(err));
  }

  reporter.inform('END');
  return succeed<MutationOutcome>({ action: 'end', record });
}

/**
 * Close the open trailing record with the current time.
 *
 * Fails with `no-open-interval` when the log is empty or already ends in a
 * closed record.
 */
export function endInterval(stream: LogStream, options: IntervalOptions = {}): Result<MutationOutcome> {
  const snapshot = takeSnapshot(stream);
  if (!snapshot.ok) return snapshot;
  return endFrom(stream, snapshot.value, options);
}

// ---------------------------------------------------------------------------
// next
// ---------------------------------------------------------------------------

/**
 * End the interval if the log's last row is bad, otherwise begin one.
 */
export function nextInterval(stream: LogStream, options: IntervalOptions = {}): Result<MutationOutcome> {
  const snapshot = takeSnapshot(stream);
  if (!snapshot.ok) return snapshot;
  if (snapshot.value.report?.lastIsBad === true) {
    return endFrom(stream, snapshot.value, options);
  }
  return beginFrom(stream, snapshot.value, options);
}
