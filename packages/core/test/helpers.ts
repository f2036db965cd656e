/**
 * Test helpers for @stint/core.
 *
 * BufferStream is a minimal LogStream over a byte array. The core package does
 * not depend on @stint/runtime-host, so its tests carry their own stream.
 */

import type { Clock, LogStream, Reporter } from '../src/index.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8');

export class BufferStream implements LogStream {
  protected bytes: Uint8Array;

  constructor(initial = '') {
    this.bytes = encoder.encode(initial);
  }

  size(): number {
    return this.bytes.length;
  }

  read(position = 0, length?: number): Uint8Array {
    const end = length === undefined ? this.bytes.length : position + length;
    return this.bytes.slice(position, end);
  }

  write(position: number, data: Uint8Array): void {
    if (position + data.length > this.bytes.length) {
      const grown = new Uint8Array(position + data.length);
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

  text(): string {
    return decoder.decode(this.bytes);
  }

  /** Append raw text, as another writer would. */
  append(text: string): void {
    this.write(this.bytes.length, encoder.encode(text));
  }
}

/** Reporter that records every message, for assertions. */
export class RecordingReporter implements Reporter {
  readonly informed: string[] = [];
  readonly warned: string[] = [];

  inform(message: string): void {
    this.informed.push(message);
  }

  warn(message: string): void {
    this.warned.push(message);
  }
}

/** A clock frozen at the given ISO instant. */
export function clockAt(iso: string): Clock {
  return () => new Date(iso);
}

export const T0 = '2026-03-01 09:00:00 UTC';
export const T1 = '2026-03-01 10:30:15 UTC';
