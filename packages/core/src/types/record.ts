/**
 * Stint Core — Record Types
 *
 * An interval log is a flat comma-separated file with one record per line.
 * A record has a start timestamp and, once completed, an end timestamp.
 *
 * Timestamps are kept as the exact strings found in (or written to) the log.
 * Parsing happens only for duration arithmetic, so rewriting a record never
 * alters the bytes of a field that was already persisted.
 */

// ---------------------------------------------------------------------------
// Interval Record
// ---------------------------------------------------------------------------

/**
 * One logical time interval.
 *
 * `end === null` marks an open record (begun, not yet ended).
 * Only the last record of a well-formed log may be open.
 */
export interface IntervalRecord {
  /** Serialized start timestamp, verbatim. */
  readonly start: string;
  /** Serialized end timestamp, verbatim. Null while the interval is open. */
  readonly end: string | null;
}

/** A record whose end timestamp has been stamped. */
export interface ClosedRecord extends IntervalRecord {
  readonly end: string;
}

export function isClosed(record: IntervalRecord): record is ClosedRecord {
  return record.end !== null;
}

// ---------------------------------------------------------------------------
// Log Rows
// ---------------------------------------------------------------------------

/**
 * One non-blank physical line of the log, as seen by the validator.
 *
 * `record` is null when the field count (or quoting) is invalid.
 * Open records are decoded into a record but still count as a bad line in the
 * malformation report, because an open record is only legitimate at the tail.
 */
export interface LogRow {
  /** 1-based physical line number. Blank lines are counted. */
  readonly line: number;
  /** Byte offset of the first byte of this line in the UTF-8 log. */
  readonly offset: number;
  /** Decoded fields, or null if the line could not be split. */
  readonly fields: ReadonlyArray<string> | null;
  readonly record: IntervalRecord | null;
}

/**
 * The structural anomalies of a log snapshot.
 *
 * Present only when at least one row is not a closed record.
 */
export interface MalformationReport {
  /** Line numbers (1-based, ascending) of every row that is not a closed record. */
  readonly badLines: ReadonlyArray<number>;
  /** True when the final row is one of the bad rows. */
  readonly lastIsBad: boolean;
}

/**
 * The benign anomaly: the only bad row is the last one.
 *
 * This is what a log with one interval awaiting `end` looks like. It is the
 * expected precondition for ending an interval and is tolerated by `begin`
 * unless the caller asked for strict mode.
 */
export function justIncomplete(report: MalformationReport): boolean {
  return report.badLines.length === 1 && report.lastIsBad;
}

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

/**
 * A validated view of the whole log at one point in time.
 *
 * `tail` holds the bytes from the start of the last row to end-of-file.
 * The mutator compares it against a fresh read before rewriting in place.
 */
export interface LogSnapshot {
  readonly rows: ReadonlyArray<LogRow>;
  readonly report: MalformationReport | null;
  /** Total size of the log in bytes at validation time. */
  readonly size: number;
  readonly tail: Uint8Array;
  /** True when the log is empty or its last byte is a line feed. */
  readonly endsWithNewline: boolean;
}
