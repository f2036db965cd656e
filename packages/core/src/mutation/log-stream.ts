/**
 * Stint Core — Log Stream Interface
 *
 * The injection point for log storage. The core owns this contract;
 * concrete implementations (file descriptor, in-memory buffer) live in
 * @stint/runtime-host. Core code never touches the filesystem directly.
 *
 * All calls are synchronous and may throw. The core converts any throw into
 * an `io` IntervalError and never retries.
 */
export interface LogStream {
  /** Current size of the log in bytes. */
  size(): number;

  /** Read `length` bytes starting at `position`, or to end-of-log if omitted. */
  read(position?: number, length?: number): Uint8Array;

  /**
   * Write `data` starting at `position`, overwriting existing bytes and
   * extending the log when writing past its end.
   */
  write(position: number, data: Uint8Array): void;

  /** Shrink (or extend with zero bytes) the log to exactly `length` bytes. */
  truncate(length: number): void;
}
