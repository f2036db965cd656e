/**
 * Stint Core — Record Codec
 *
 * Converts between one log line (without its terminator) and an IntervalRecord.
 *
 *   "2026-03-01 09:15:00 UTC"                          → open record
 *   "2026-03-01 09:15:00 UTC,2026-03-01 10:00:00 UTC"  → closed record
 *   anything else                                      → malformed (null)
 *
 * Fields follow ordinary comma-separated quoting: a field containing a comma,
 * a double quote or a line break is wrapped in double quotes, with inner
 * quotes doubled. Timestamps never need quoting, so the encoder's output for
 * a record is fully determined by its two strings.
 */

import type { IntervalRecord } from '../types/record.js';

export const FIELD_SEPARATOR = ',';
export const LINE_TERMINATOR = '\n';

const QUOTE = '"';

/**
 * Split one line into fields.
 *
 * Returns null when a quoted field is not terminated, or when a closing quote
 * is followed by anything other than a separator.
 */
export function splitFields(line: string): string[] | null {
  const fields: string[] = [];
  let i = 0;

  for (;;) {
    if (line[i] === QUOTE) {
      let value = '';
      i++;
      for (;;) {
        const next = line.indexOf(QUOTE, i);
        if (next === -1) return null;
        value += line.slice(i, next);
        if (line[next + 1] === QUOTE) {
          value += QUOTE;
          i = next + 2;
          continue;
        }
        i = next + 1;
        break;
      }
      fields.push(value);
      if (i === line.length) return fields;
      if (line[i] !== FIELD_SEPARATOR) return null;
      i++;
    } else {
      const next = line.indexOf(FIELD_SEPARATOR, i);
      if (next === -1) {
        fields.push(line.slice(i));
        return fields;
      }
      fields.push(line.slice(i, next));
      i = next + 1;
    }
  }
}

/**
 * Interpret already-split fields: one field is open, two are closed.
 */
export function recordFromFields(fields: ReadonlyArray<string>): IntervalRecord | null {
  const [start, end] = fields;
  if (start === undefined) return null;
  if (fields.length === 1) return { start, end: null };
  if (fields.length === 2 && end !== undefined) return { start, end };
  return null;
}

export function decodeLine(line: string): IntervalRecord | null {
  const fields = splitFields(line);
  return fields === null ? null : recordFromFields(fields);
}

function encodeField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return QUOTE + value.replaceAll(QUOTE, QUOTE + QUOTE) + QUOTE;
  }
  return value;
}

/**
 * Serialize a record to one line. No line terminator is appended.
 */
export function encodeRecord(record: IntervalRecord): string {
  const start = encodeField(record.start);
  return record.end === null ? start : start + FIELD_SEPARATOR + encodeField(record.end);
}
