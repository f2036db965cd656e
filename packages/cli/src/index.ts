/**
 * @stint/cli
 *
 * Programmatic access to the `stint` command-line program. The executable
 * entry point is src/bin/stint.ts.
 */

export type { CliContext } from './context.js';
export { createNodeContext } from './context.js';
export type { CommandFactory, CommandName, CommandTable } from './commands/index.js';
export { DEFAULT_COMMAND, VERSION, buildProgram, defaultCommandTable } from './commands/index.js';
export { EXIT_FAILURE, EXIT_USAGE } from './commands/shared.js';
