/**
 * Stint Runtime Host — File-backed LogStream
 *
 * Implements the LogStream interface from @stint/core over a file descriptor
 * using synchronous positional I/O (readSync / writeSync / ftruncateSync).
 * Synchronous I/O matches the CLI's single-invocation, single-writer design.
 *
 * withLogFile() is the only way the CLI acquires a log: it opens the file,
 * hands the stream to a callback, and closes the descriptor in a finally
 * block, on success, on a returned error and on a throw alike.
 *
 * There is no locking. Two processes writing the same log at once can
 * corrupt it; the core's rewrite check detects an append that lands between
 * validation and rewrite but cannot prevent one.
 */

import { closeSync, constants, fstatSync, ftruncateSync, openSync, readSync, writeSync } from 'node:fs';
import type { LogStream } from '@stint/core';

/**
 * read  — the file must exist; writes fail with EBADF
 * write — the file is created (mode 0666, before umask) if absent
 */
export type LogFileMode = 'read' | 'write';

export class FileLogStream implements LogStream {
  constructor(private readonly fd: number) {}

  size(): number {
    return fstatSync(this.fd).size;
  }

  read(position = 0, length?: number): Uint8Array {
    const wanted = length ?? Math.max(0, this.size() - position);
    const buffer = Buffer.alloc(wanted);
    let filled = 0;
    while (filled < wanted) {
      const n = readSync(this.fd, buffer, filled, wanted - filled, position + filled);
      if (n === 0) break;
      filled += n;
    }
    return new Uint8Array(buffer.buffer, buffer.byteOffset, filled);
  }

  write(position: number, data: Uint8Array): void {
    let written = 0;
    while (written < data.length) {
      written += writeSync(this.fd, data, written, data.length - written, position + written);
    }
  }

  truncate(length: number): void {
    ftruncateSync(this.fd, length);
  }
}

/**
 * Open the log at `path`, run `use` with a stream over it, and close it.
 *
 * Errors from opening propagate as thrown; the callback's own return value
 * (typically a core Result) is passed through unchanged.
 */
export function withLogFile<T>(path: string, mode: LogFileMode, use: (stream: LogStream) => T): T {
  const flags = mode === 'write' ? constants.O_RDWR | constants.O_CREAT : constants.O_RDONLY;
  const fd = openSync(path, flags, 0o666);
  try {
    return use(new FileLogStream(fd));
  } finally {
    closeSync(fd);
  }
}
