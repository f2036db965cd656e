/**
 * @stint/runtime-host
 *
 * Side-effectful implementations for the interval log engine: file and
 * in-memory LogStreams, configuration resolution, termination-signal wait and
 * the detached waiter process. Depends on @stint/core (interfaces); no core
 * code imports from this package.
 */

// Storage
export type { LogFileMode } from './storage/file-log-stream.js';
export { FileLogStream, withLogFile } from './storage/file-log-stream.js';
export { MemoryLogStream } from './storage/memory-log-stream.js';

// Configuration
export type { ResolveConfigOptions, StintConfig } from './config.js';
export { ConfigError, DEFAULT_LOG_FILE, resolveConfig } from './config.js';

// Lifecycle
export type { SignalSource, WaitForTerminationOptions } from './lifecycle/termination.js';
export { TERMINATION_SIGNALS, waitForTermination } from './lifecycle/termination.js';
export type { DetachedWaiterOptions } from './lifecycle/fork.js';
export { spawnDetachedWaiter } from './lifecycle/fork.js';
