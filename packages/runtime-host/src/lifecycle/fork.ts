/**
 * Stint Runtime Host — Detached Waiter
 *
 * `stint fork` begins an interval and returns immediately, leaving a detached
 * child process that runs `stint wait <file>` and ends the interval when it
 * is signalled. The child has no stdio attached and is unref'd, so the parent
 * exits without waiting for it.
 */

import { spawn } from 'node:child_process';

export interface DetachedWaiterOptions {
  /** Absolute path of the log the child will close. */
  readonly file: string;
  /** Extra CLI flags forwarded to the child (e.g. --fail, --utc). */
  readonly flags?: ReadonlyArray<string> | undefined;
  /** Entry script to re-execute. Default: process.argv[1]. */
  readonly script?: string | undefined;
  /** Default: process.execPath. */
  readonly execPath?: string | undefined;
  /** Node flags for the child (loaders etc.). Default: process.execArgv. */
  readonly execArgv?: ReadonlyArray<string> | undefined;
  /**
   * Called if spawning fails after this function has returned.
   * Default: emit a process warning.
   */
  readonly onError?: ((err: Error) => void) | undefined;
}

/**
 * Spawn the detached `wait` child and return its PID.
 *
 * @throws {Error} If no entry script is known or the child has no PID
 */
export function spawnDetachedWaiter(opts: DetachedWaiterOptions): number {
  const script = opts.script ?? process.argv[1];
  if (script === undefined || script === '') {
    throw new Error('cannot fork: entry script path is unknown');
  }

  const child = spawn(
    opts.execPath ?? process.execPath,
    [...(opts.execArgv ?? process.execArgv), script, ...(opts.flags ?? []), 'wait', opts.file],
    { detached: true, stdio: 'ignore' },
  );
  child.on('error', opts.onError ?? ((err: Error) => { process.emitWarning(err); }));
  child.unref();

  if (child.pid === undefined) {
    throw new Error('cannot fork: waiter process did not start');
  }
  return child.pid;
}
