/**
 * Stint Core — Duration Aggregator and Readers
 *
 * Read-only entry points over a LogStream:
 *
 *   readRecords     — records plus the malformation report, filtered or not
 *   totalDuration   — sum of end - start over every closed record
 *   summarizeStatus — whether an interval is open and for how long
 *
 * totalDuration always reads in filtering mode, so an open tail never
 * contributes. A just-incomplete log is warned about and summed; any other
 * anomaly, including a closed row whose timestamps do not parse, is warned
 * about and skipped in lenient mode and returned as an error in strict mode.
 */

import type { LogStream } from '../mutation/log-stream.js';
import type { Reporter } from '../reporting/reporter.js';
import { SILENT_REPORTER } from '../reporting/reporter.js';
import { describeReport } from '../reporting/diagnostics.js';
import { parseTimestamp } from '../codec/timestamp.js';
import type { ClosedRecord, IntervalRecord, LogRow, MalformationReport } from '../types/record.js';
import { isClosed, justIncomplete } from '../types/record.js';
import type { Result } from '../types/errors.js';
import { fail, formatError, succeed } from '../types/errors.js';
import { takeSnapshot } from '../validation/snapshot.js';
import { lastRow, readEntries } from '../validation/validator.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RecordsRead {
  readonly records: ReadonlyArray<IntervalRecord>;
  /** Null when every row is a closed record. */
  readonly report: MalformationReport | null;
  /** Every non-blank row, including undecodable ones, in file order. */
  readonly rows: ReadonlyArray<LogRow>;
}

export interface TotalSummary {
  /** Sum of closed-interval durations in milliseconds. */
  readonly elapsedMs: number;
  /** Number of closed records summed. */
  readonly intervals: number;
}

export interface StatusSummary {
  /** Start of the open trailing interval, or null when idle. */
  readonly openSince: string | null;
  /** Time since openSince, in milliseconds. Null when idle or unparseable. */
  readonly openForMs: number | null;
  readonly closedIntervals: number;
  readonly report: MalformationReport | null;
}

export interface AggregateOptions {
  readonly strict?: boolean | undefined;
  readonly reporter?: Reporter | undefined;
}

// ---------------------------------------------------------------------------
// Pure aggregation
// ---------------------------------------------------------------------------

/**
 * Duration of one closed record in milliseconds, or null if either timestamp
 * does not parse.
 */
export function recordDuration(record: ClosedRecord): number | null {
  const start = parseTimestamp(record.start);
  const end = parseTimestamp(record.end);
  if (start === null || end === null) return null;
  return end.getTime() - start.getTime();
}

/** Sum over closed records, plus the records that could not be summed. */
export interface DurationSum {
  /** Milliseconds over every record whose timestamps parse. */
  readonly elapsedMs: number;
  /** 1-based indexes (within the input) of records whose timestamps do not parse. */
  readonly unparseable: ReadonlyArray<number>;
}

/**
 * Sum the durations of closed records. Records whose timestamps do not parse
 * contribute nothing and are listed in `unparseable`.
 */
export function sumDurations(records: ReadonlyArray<ClosedRecord>): DurationSum {
  let elapsedMs = 0;
  const unparseable: number[] = [];
  records.forEach((record, i) => {
    const ms = recordDuration(record);
    if (ms === null) {
      unparseable.push(i + 1);
    } else {
      elapsedMs += ms;
    }
  });
  return { elapsedMs, unparseable };
}

// ---------------------------------------------------------------------------
// Stream entry points
// ---------------------------------------------------------------------------

/**
 * Read all records. With `filter`, only closed records are returned.
 *
 * A malformation report is not an error here: it is handed back alongside the
 * records so each caller applies its own tolerance policy.
 */
export function readRecords(stream: LogStream, filter: boolean): Result<RecordsRead> {
  const snapshot = takeSnapshot(stream);
  if (!snapshot.ok) return snapshot;
  const { rows, report } = snapshot.value;
  return succeed<RecordsRead>({ records: readEntries(snapshot.value, filter), report, rows });
}

/**
 * Total elapsed time over every closed record.
 */
export function totalDuration(stream: LogStream, options: AggregateOptions = {}): Result<TotalSummary> {
  const reporter = options.reporter ?? SILENT_REPORTER;
  const read = readRecords(stream, true);
  if (!read.ok) return read;

  const { report, rows } = read.value;
  if (report !== null) {
    if (options.strict === true && !justIncomplete(report)) {
      return fail(formatError(report));
    }
    reporter.warn(describeReport(report));
  }

  const closed: Array<{ line: number; record: ClosedRecord }> = [];
  for (const row of rows) {
    if (row.record !== null && isClosed(row.record)) closed.push({ line: row.line, record: row.record });
  }

  const sum = sumDurations(closed.map((c) => c.record));
  if (sum.unparseable.length > 0) {
    const badLines = sum.unparseable.flatMap((i) => {
      const entry = closed[i - 1];
      return entry === undefined ? [] : [entry.line];
    });
    // These rows are complete, so the report never reads as an open tail.
    const unreadable = formatError({ badLines, lastIsBad: false });
    if (options.strict === true) return fail(unreadable);
    reporter.warn(describeReport(unreadable.report));
  }

  return succeed<TotalSummary>({
    elapsedMs: sum.elapsedMs,
    intervals: closed.length - sum.unparseable.length,
  });
}

/**
 * Describe the current state of the log relative to `now`.
 */
export function summarizeStatus(stream: LogStream, now: Date): Result<StatusSummary> {
  const snapshot = takeSnapshot(stream);
  if (!snapshot.ok) return snapshot;

  const { report } = snapshot.value;
  const closedIntervals = readEntries(snapshot.value, true).length;
  const last = lastRow(snapshot.value);
  const open = last !== undefined && last.record !== null && !isClosed(last.record) ? last.record : null;

  let openForMs: number | null = null;
  if (open !== null) {
    const start = parseTimestamp(open.start);
    openForMs = start === null ? null : now.getTime() - start.getTime();
  }

  return succeed<StatusSummary>({
    openSince: open?.start ?? null,
    openForMs,
    closedIntervals,
    report,
  });
}
