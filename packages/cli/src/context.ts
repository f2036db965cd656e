/**
 * CLI context: everything a command handler touches outside its arguments.
 *
 * Commands never reach for process, the filesystem or the clock directly;
 * they go through this object. createNodeContext() wires the real
 * implementations from @stint/runtime-host. Tests build their own context
 * with in-memory logs, a fixed clock and captured output.
 */

import chalk, { type ColorSupportLevel } from 'chalk'
import type { Clock, LogStream } from '@stint/core'
import { systemClock } from '@stint/core'
import type { LogFileMode } from '@stint/runtime-host'
import { spawnDetachedWaiter, waitForTermination, withLogFile } from '@stint/runtime-host'

export interface CliContext {
  readonly env: NodeJS.ProcessEnv
  readonly cwd: string
  readonly clock: Clock
  readonly colorLevel: ColorSupportLevel
  /** Raw writes; callers add their own line terminators. */
  readonly stdout: (text: string) => void
  readonly stderr: (text: string) => void
  /** Acquire the log for the duration of `use`, releasing it on every path. */
  openLog<T>(path: string, mode: LogFileMode, use: (stream: LogStream) => T): T
  /** Resolve when the process is asked to terminate. */
  waitForTermination(): Promise<NodeJS.Signals>
  /** Start a detached `stint wait` child for `file`; returns its PID. */
  spawnWaiter(file: string, flags: ReadonlyArray<string>): number
  setExitCode(code: number): void
}

export function createNodeContext(): CliContext {
  return {
    env: process.env,
    cwd: process.cwd(),
    clock: systemClock,
    colorLevel: chalk.level,
    stdout: (text) => { process.stdout.write(text) },
    stderr: (text) => { process.stderr.write(text) },
    openLog: withLogFile,
    waitForTermination: () => waitForTermination(),
    spawnWaiter: (file, flags) => spawnDetachedWaiter({ file, flags }),
    setExitCode: (code) => { process.exitCode = code },
  }
}
