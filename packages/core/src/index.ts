/**
 * @stint/core
 *
 * Interval log engine: record codec, log validator, interval mutator,
 * duration aggregator and diagnostics.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process or any other I/O API. Storage is reached only through
 * the injected LogStream; concrete streams live in @stint/runtime-host.
 */

// Types
export type {
  ClosedRecord,
  IntervalRecord,
  LogRow,
  LogSnapshot,
  MalformationReport,
} from './types/record.js';
export { isClosed, justIncomplete } from './types/record.js';

export type {
  FormatError,
  IntervalError,
  LogIOError,
  NoOpenIntervalError,
  Result,
} from './types/errors.js';
export { NO_OPEN_INTERVAL, fail, formatError, ioError, succeed } from './types/errors.js';

// Codec
export type { Clock, TimeZoneMode } from './codec/timestamp.js';
export { formatTimestamp, parseTimestamp, systemClock } from './codec/timestamp.js';
export {
  FIELD_SEPARATOR,
  LINE_TERMINATOR,
  decodeLine,
  encodeRecord,
  recordFromFields,
  splitFields,
} from './codec/record-codec.js';

// Validation
export { lastRow, readEntries, validateLog } from './validation/validator.js';
export { takeSnapshot } from './validation/snapshot.js';

// Storage and output injection points (implementations live in runtime-host / cli)
export type { LogStream } from './mutation/log-stream.js';
export type { Reporter } from './reporting/reporter.js';
export { SILENT_REPORTER } from './reporting/reporter.js';

// Mutation
export type { IntervalOptions, MutationOutcome } from './mutation/mutator.js';
export { LogChangedError, beginInterval, endInterval, nextInterval } from './mutation/mutator.js';

// Aggregation
export type {
  AggregateOptions,
  DurationSum,
  RecordsRead,
  StatusSummary,
  TotalSummary,
} from './aggregation/aggregator.js';
export {
  readRecords,
  recordDuration,
  sumDurations,
  summarizeStatus,
  totalDuration,
} from './aggregation/aggregator.js';

// Diagnostics
export { spokenList } from './reporting/spoken-list.js';
export { describeIntervalError, describeReport, formatElapsed } from './reporting/diagnostics.js';
