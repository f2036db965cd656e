/**
 * Stint Runtime Host — MemoryLogStream
 *
 * In-memory LogStream for tests and embedded (non-persistent) use.
 * Semantics match FileLogStream: positional writes overwrite, writes past the
 * end extend the log, and truncate() to a larger length pads with zero bytes.
 */

import type { LogStream } from '@stint/core';

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8');

export class MemoryLogStream implements LogStream {
  private bytes: Uint8Array;

  constructor(initial: string | Uint8Array = '') {
    this.bytes = typeof initial === 'string' ? encoder.encode(initial) : initial.slice();
  }

  size(): number {
    return this.bytes.length;
  }

  read(position = 0, length?: number): Uint8Array {
    const end = length === undefined ? this.bytes.length : Math.min(this.bytes.length, position + length);
    return this.bytes.slice(position, end);
  }

  write(position: number, data: Uint8Array): void {
    const needed = position + data.length;
    if (needed > this.bytes.length) {
      const grown = new Uint8Array(needed);
      grown.set(this.bytes);
      this.bytes = grown;
    }
    this.bytes.set(data, position);
  }

  truncate(length: number): void {
    const next = new Uint8Array(length);
    next.set(this.bytes.subarray(0, Math.min(length, this.bytes.length)));
    this.bytes = next;
  }

  /**
   * The whole log decoded as UTF-8.
   *
   * Specific to MemoryLogStream; not part of the LogStream interface. Use it
   * in tests to assert on exact log content.
   */
  text(): string {
    return decoder.decode(this.bytes);
  }
}
