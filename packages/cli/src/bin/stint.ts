#!/usr/bin/env node
/**
 * bin/stint.ts — entry point for the `stint` CLI command.
 *
 * Builds the program against the real process context and maps Commander's
 * usage errors to exit code 2. Help and --version exit 0.
 */

import { CommanderError } from 'commander'
import { buildProgram } from '../commands/index.js'
import { EXIT_USAGE } from '../commands/shared.js'
import { createNodeContext } from '../context.js'

try {
  await buildProgram(createNodeContext()).parseAsync(process.argv)
} catch (err: unknown) {
  if (!(err instanceof CommanderError)) throw err
  process.exitCode = err.exitCode === 0 ? 0 : EXIT_USAGE
}
