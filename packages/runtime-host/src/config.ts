/**
 * Stint Runtime Host — Configuration Resolution
 *
 * Resolves the per-invocation configuration using the following precedence:
 *
 *   1. Explicit options (from command-line flags and the [file] argument)
 *   2. Environment variables: STINT_FILE, STINT_FAIL, STINT_QUIET, STINT_TIMEZONE
 *   3. Defaults: TIMES.csv in the working directory, lenient, verbose, local time
 *
 * The result is frozen and passed explicitly to every command handler.
 * Nothing here is cached between invocations, and log contents are never part
 * of the configuration.
 */

import { resolve } from 'node:path';
import type { TimeZoneMode } from '@stint/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StintConfig {
  /** Absolute path of the interval log. */
  readonly file: string;
  /** Fail on any anomaly, including an open trailing record. */
  readonly strict: boolean;
  /** Suppress informational lines (BEGIN, END, WAIT, FORK). */
  readonly quiet: boolean;
  /** Clock face for new timestamps. */
  readonly zone: TimeZoneMode;
}

export interface ResolveConfigOptions {
  readonly file?: string | undefined;
  readonly strict?: boolean | undefined;
  readonly quiet?: boolean | undefined;
  readonly zone?: TimeZoneMode | undefined;
  /** Base for relative paths. Default: process.cwd(). */
  readonly cwd?: string | undefined;
}

export const DEFAULT_LOG_FILE = 'TIMES.csv';

/** Raised for an environment value that cannot be interpreted. */
export class ConfigError extends Error {
  constructor(variable: string, value: string, expected: string) {
    super(`invalid ${variable}=${JSON.stringify(value)} (expected ${expected})`);
    this.name = 'ConfigError';
  }
}

// ---------------------------------------------------------------------------
// Environment parsing
// ---------------------------------------------------------------------------

function envString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function envBoolean(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const value = envString(env, name);
  if (value === undefined) return undefined;
  switch (value.toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
      return true;
    case '0':
    case 'false':
    case 'no':
      return false;
    default:
      throw new ConfigError(name, value, '1, true, yes, 0, false or no');
  }
}

function envZone(env: NodeJS.ProcessEnv, name: string): TimeZoneMode | undefined {
  const value = envString(env, name);
  if (value === undefined) return undefined;
  const lower = value.toLowerCase();
  if (lower === 'utc' || lower === 'local') return lower;
  throw new ConfigError(name, value, 'utc or local');
}

// ---------------------------------------------------------------------------
// Primary resolution function
// ---------------------------------------------------------------------------

/**
 * Resolve the configuration for one invocation.
 *
 * @throws {ConfigError} If an environment variable holds an unusable value
 */
export function resolveConfig(
  opts: ResolveConfigOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): StintConfig {
  const cwd = opts.cwd ?? process.cwd();
  const file = opts.file ?? envString(env, 'STINT_FILE') ?? DEFAULT_LOG_FILE;

  return Object.freeze({
    file: resolve(cwd, file),
    strict: opts.strict ?? envBoolean(env, 'STINT_FAIL') ?? false,
    quiet: opts.quiet ?? envBoolean(env, 'STINT_QUIET') ?? false,
    zone: opts.zone ?? envZone(env, 'STINT_TIMEZONE') ?? 'local',
  });
}
