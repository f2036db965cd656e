/**
 * Stint Core — Log Validator
 *
 * Pure function over the raw bytes of a log. Produces a LogSnapshot: every
 * non-blank row with its byte offset and decoded record, plus a
 * MalformationReport when any row is not a closed record.
 *
 * Guarantees:
 *   - rows are in file order; line numbers are physical (blank lines counted)
 *   - a trailing '\r' is stripped before decoding, so CRLF logs validate
 *   - offsets are byte offsets into the UTF-8 input, not string indices
 *   - `tail` is a copy of the bytes from the last row's offset to end-of-file
 *
 * This module has no I/O. Callers obtain bytes through LogStream.read().
 */

import type { IntervalRecord, LogRow, LogSnapshot, MalformationReport } from '../types/record.js';
import { isClosed } from '../types/record.js';
import { recordFromFields, splitFields } from '../codec/record-codec.js';

const LF = 0x0a;
const CR = 0x0d;

const decoder = new TextDecoder('utf-8');

/**
 * Validate the full content of a log.
 */
export function validateLog(content: Uint8Array): LogSnapshot {
  const rows: LogRow[] = [];
  const badLines: number[] = [];

  let line = 0;
  let offset = 0;
  while (offset < content.length) {
    line++;
    const lf = content.indexOf(LF, offset);
    const end = lf === -1 ? content.length : lf;
    const textEnd = end > offset && content[end - 1] === CR ? end - 1 : end;
    const text = decoder.decode(content.subarray(offset, textEnd));

    if (text.trim().length > 0) {
      const fields = splitFields(text);
      const record = fields === null ? null : recordFromFields(fields);
      rows.push({ line, offset, fields, record });
      if (record === null || !isClosed(record)) {
        badLines.push(line);
      }
    }

    offset = end + 1;
  }

  const last = rows.at(-1);
  const report: MalformationReport | null =
    badLines.length === 0
      ? null
      : { badLines, lastIsBad: last !== undefined && badLines.at(-1) === last.line };

  return {
    rows,
    report,
    size: content.length,
    tail: content.slice(last?.offset ?? content.length),
    endsWithNewline: content.length === 0 || content[content.length - 1] === LF,
  };
}

/**
 * Select records from a snapshot.
 *
 * filter = true: closed records only, for aggregation.
 * filter = false: every decodable record, including an open tail, for mutation.
 * Rows that could not be decoded at all are never returned; their line numbers
 * are in the report.
 */
export function readEntries(snapshot: LogSnapshot, filter: boolean): IntervalRecord[] {
  const records: IntervalRecord[] = [];
  for (const row of snapshot.rows) {
    if (row.record === null) continue;
    if (filter && !isClosed(row.record)) continue;
    records.push(row.record);
  }
  return records;
}

/** The last row of the snapshot, if any. */
export function lastRow(snapshot: LogSnapshot): LogRow | undefined {
  return snapshot.rows.at(-1);
}
