/**
 * Shared plumbing for command handlers.
 *
 * Every handler follows the same shape:
 *   1. prepare()  — resolve configuration from flags, [file] and environment
 *   2. onLog()    — acquire the log, run one core entry point, release it
 *   3. failWith() — map a failed Result to "Error: ..." and exit code 1
 *
 * Exit codes: 0 success, 1 operation failed, 2 usage or configuration error.
 */

import type { Command } from 'commander';
import type { IntervalError, IntervalOptions, LogStream, MalformationReport, TimeZoneMode } from '@stint/core';
import { describeIntervalError, describeReport, fail, formatError, ioError, justIncomplete } from '@stint/core';
import type { LogFileMode, StintConfig } from '@stint/runtime-host';
import { ConfigError, resolveConfig } from '@stint/runtime-host';
import type { CliContext } from '../context.js';
import { ConsoleReporter } from '../output/console-reporter.js';
import type { Theme } from '../output/theme.js';
import { createTheme } from '../output/theme.js';

export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/** Program-level flags, visible to every command through optsWithGlobals(). */
export type GlobalFlags = {
  fail?: boolean;
  quiet?: boolean;
  utc?: boolean;
  local?: boolean;
};

/** Everything a handler needs once configuration has been resolved. */
export interface Invocation {
  readonly ctx: CliContext;
  readonly config: StintConfig;
  readonly theme: Theme;
  readonly reporter: ConsoleReporter;
  /** Options for the core mutators, derived from config and context. */
  readonly options: IntervalOptions;
}

function zoneFrom(flags: GlobalFlags): TimeZoneMode | undefined {
  if (flags.utc === true) return 'utc';
  if (flags.local === true) return 'local';
  return undefined;
}

/**
 * Resolve the invocation, or print the configuration error, set exit code 2
 * and return null.
 */
export function prepare(ctx: CliContext, command: Command, file: string | undefined): Invocation | null {
  const flags = command.optsWithGlobals<GlobalFlags>();
  const theme = createTheme(ctx.colorLevel);

  let config: StintConfig;
  try {
    config = resolveConfig(
      { file, strict: flags.fail, quiet: flags.quiet, zone: zoneFrom(flags), cwd: ctx.cwd },
      ctx.env,
    );
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      ctx.stderr(theme.error(`Error: ${err.message}`) + '\n');
      ctx.setExitCode(EXIT_USAGE);
      return null;
    }
    throw err;
  }

  const reporter = new ConsoleReporter(ctx.stdout, ctx.stderr, theme, config.quiet);
  return {
    ctx,
    config,
    theme,
    reporter,
    options: { strict: config.strict, clock: ctx.clock, zone: config.zone, reporter },
  };
}

/**
 * Run `use` against the configured log. A failure to open the log becomes an
 * `io` error, the same as any failure inside the core.
 */
export function onLog<R extends { readonly ok: boolean }>(
  inv: Invocation,
  mode: LogFileMode,
  use: (stream: LogStream) => R,
): R | { readonly ok: false; readonly error: IntervalError } {
  try {
    return inv.ctx.openLog(inv.config.file, mode, use);
  } catch (err: unknown) {
    return fail(ioError(err));
  }
}

/** Report a failed operation and set exit code 1. */
export function failWith(inv: Invocation, error: IntervalError): void {
  inv.reporter.error(describeIntervalError(error));
  inv.ctx.setExitCode(EXIT_FAILURE);
}

/**
 * Read-side tolerance for list and status: an open last entry is normal and
 * passes silently; anything else is a warning, or a failure under --fail.
 * Returns false when the command should stop.
 */
export function tolerate(inv: Invocation, report: MalformationReport | null): boolean {
  if (report === null || justIncomplete(report)) return true;
  if (inv.config.strict) {
    failWith(inv, formatError(report));
    return false;
  }
  inv.reporter.warn(describeReport(report));
  return true;
}

/** Flags that make a child `stint` process behave like this one. */
export function forwardedFlags(config: StintConfig): string[] {
  const flags: string[] = [];
  if (config.strict) flags.push('--fail');
  if (config.quiet) flags.push('--quiet');
  flags.push(config.zone === 'utc' ? '--utc' : '--local');
  return flags;
}

export function println(write: (text: string) => void, line: string): void {
  write(line + '\n');
}
