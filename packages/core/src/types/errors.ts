/**
 * Stint Core — Error and Result Types
 *
 * Every core entry point returns a Result. Expected failures never throw:
 * the caller receives one of the IntervalError kinds below and decides how
 * to present it. Exhaustive handling is enforced with a `never` guard in
 * describeIntervalError().
 */

import type { MalformationReport } from './record.js';

// ---------------------------------------------------------------------------
// Error Kinds
// ---------------------------------------------------------------------------

/** The log contains rows that are not closed records. */
export interface FormatError {
  readonly kind: 'format';
  readonly report: MalformationReport;
}

/** `end` was invoked but the log has no open trailing record. */
export interface NoOpenIntervalError {
  readonly kind: 'no-open-interval';
}

/**
 * A read, write, seek, truncate or size call on the log failed, or the
 * rewrite region no longer matches what validation saw.
 *
 * The message is the underlying message, unchanged.
 */
export interface LogIOError {
  readonly kind: 'io';
  readonly message: string;
  readonly cause: unknown;
}

export type IntervalError = FormatError | NoOpenIntervalError | LogIOError;

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

/**
 * Discriminated success/failure union.
 *
 * - `Result<void>`: success carries no value
 * - `Result<T>`: success carries a typed value
 */
export type Result<T = void> =
  | (T extends void ? { readonly ok: true } : { readonly ok: true; readonly value: T })
  | { readonly ok: false; readonly error: IntervalError };

export function succeed(): { readonly ok: true };
export function succeed<T>(value: T): { readonly ok: true; readonly value: T };
export function succeed<T>(value?: T): { readonly ok: true; readonly value?: T } {
  return value === undefined ? { ok: true } : { ok: true, value };
}

export function fail(error: IntervalError): { readonly ok: false; readonly error: IntervalError } {
  return { ok: false, error };
}

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function formatError(report: MalformationReport): FormatError {
  return { kind: 'format', report };
}

export const NO_OPEN_INTERVAL: NoOpenIntervalError = { kind: 'no-open-interval' };

/** Wrap anything thrown by a stream call. Errors keep their message verbatim. */
export function ioError(cause: unknown): LogIOError {
  const message = cause instanceof Error ? cause.message : String(cause);
  return { kind: 'io', message, cause };
}
