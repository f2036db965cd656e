/**
 * Stint Core — Diagnostics
 *
 * Human-readable text for errors and durations. Used for presentation only;
 * nothing in the core branches on these strings.
 */

import type { IntervalError } from '../types/errors.js';
import type { MalformationReport } from '../types/record.js';
import { justIncomplete } from '../types/record.js';
import { spokenList } from './spoken-list.js';

export function describeReport(report: MalformationReport): string {
  if (justIncomplete(report)) return 'last entry is incomplete';
  const [only] = report.badLines;
  if (report.badLines.length === 1 && only !== undefined) {
    return `incomplete or invalid entry on line ${only}`;
  }
  return `incomplete or invalid entries on lines ${spokenList(report.badLines)}`;
}

export function describeIntervalError(error: IntervalError): string {
  switch (error.kind) {
    case 'format':
      return describeReport(error.report);
    case 'no-open-interval':
      return 'no incomplete entry to end';
    case 'io':
      return error.message;
    default: {
      const unreachable: never = error;
      return String(unreachable);
    }
  }
}

/**
 * Format a duration in milliseconds as "1h 02m 03s", "4m 05s" or "7s".
 * Sub-second remainders are dropped; negative durations keep their sign.
 */
export function formatElapsed(ms: number): string {
  const sign = ms < 0 ? '-' : '';
  const totalSeconds = Math.floor(Math.abs(ms) / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if (hours > 0) {
    return `${sign}${hours}h ${String(minutes).padStart(2, '0')}m ${String(seconds).padStart(2, '0')}s`;
  }
  if (minutes > 0) {
    return `${sign}${minutes}m ${String(seconds).padStart(2, '0')}s`;
  }
  return `${sign}${seconds}s`;
}
