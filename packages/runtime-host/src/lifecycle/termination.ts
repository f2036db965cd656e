/**
 * Stint Runtime Host — Termination Wait
 *
 * `stint run` and `stint wait` begin (or find) an open interval, then block
 * until the operating system asks the process to stop. On the first
 * catchable termination signal the caller ends the interval and exits.
 *
 * SIGKILL (and SIGSTOP) cannot be observed by a Node.js process. A waiter
 * that is killed that way never reaches the end step and leaves the interval
 * open; `stint end` closes it afterwards.
 */

export const TERMINATION_SIGNALS: ReadonlyArray<NodeJS.Signals> =
  process.platform === 'win32'
    ? ['SIGINT', 'SIGTERM', 'SIGBREAK']
    : ['SIGINT', 'SIGTERM', 'SIGHUP', 'SIGQUIT'];

/**
 * The subset of an event emitter needed to listen for signals.
 * `process` satisfies it; tests pass an EventEmitter.
 */
export interface SignalSource {
  once(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  removeListener(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface WaitForTerminationOptions {
  /** Default: TERMINATION_SIGNALS. */
  readonly signals?: ReadonlyArray<NodeJS.Signals> | undefined;
  /** Default: process. */
  readonly source?: SignalSource | undefined;
  /** Aborting rejects the wait with the signal's reason and removes the listeners. */
  readonly abort?: AbortSignal | undefined;
}

/**
 * Resolve with the first termination signal received.
 *
 * Listeners are removed as soon as one signal arrives, so a second Ctrl+C
 * falls back to the default behaviour and terminates the process.
 */
export function waitForTermination(opts: WaitForTerminationOptions = {}): Promise<NodeJS.Signals> {
  const signals = opts.signals ?? TERMINATION_SIGNALS;
  const source = opts.source ?? process;
  const abort = opts.abort;

  return new Promise<NodeJS.Signals>((resolve, reject) => {
    const cleanup = (): void => {
      for (const signal of signals) source.removeListener(signal, onSignal);
      abort?.removeEventListener('abort', onAbort);
    };
    const onSignal = (signal: NodeJS.Signals): void => {
      cleanup();
      resolve(signal);
    };
    const onAbort = (): void => {
      cleanup();
      reject(abort?.reason);
    };

    if (abort?.aborted === true) {
      reject(abort.reason);
      return;
    }
    for (const signal of signals) source.once(signal, onSignal);
    abort?.addEventListener('abort', onAbort, { once: true });
  });
}
