/**
 * Stint Core — Snapshot Acquisition
 *
 * Reads the whole log from a LogStream and validates it. This is the only
 * place where validation meets I/O; every entry point starts here, so the
 * log is always read fresh for each command.
 */

import type { LogStream } from '../mutation/log-stream.js';
import type { LogSnapshot } from '../types/record.js';
import type { Result } from '../types/errors.js';
import { fail, ioError, succeed } from '../types/errors.js';
import { validateLog } from './validator.js';

export function takeSnapshot(stream: LogStream): Result<LogSnapshot> {
  let content: Uint8Array;
  try {
    content = stream.read(0);
  } catch (err: unknown) {
    return fail(ioError(err));
  }
  return succeed(validateLog(content));
}
