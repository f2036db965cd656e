/**
 * commands/index.ts — Commander program, configured and returned without .parse().
 *
 * The command table is built fresh for every program: there is no
 * module-level registry to mutate. Callers (the bin entry point, tests)
 * pass their own CliContext, and may pass their own table.
 *
 * Imported by:
 *   src/bin/stint.ts
 *   test/commands.test.ts
 */

import { Command, Option } from 'commander';
import type { CliContext } from '../context.js';
import { EXIT_USAGE } from './shared.js';
import { createBeginCommand } from './begin.js';
import { createEndCommand } from './end.js';
import { createForkCommand } from './fork.js';
import { createListCommand } from './list.js';
import { createNextCommand } from './next.js';
import { createRunCommand } from './run.js';
import { createStatusCommand } from './status.js';
import { createTotalCommand } from './total.js';
import { createVerifyCommand } from './verify.js';
import { createWaitCommand } from './wait.js';

export const VERSION = '0.1.0';

export type CommandName =
  | 'begin'
  | 'end'
  | 'fork'
  | 'list'
  | 'next'
  | 'run'
  | 'status'
  | 'total'
  | 'verify'
  | 'wait';

export type CommandFactory = (ctx: CliContext) => Command;

export type CommandTable = Readonly<Record<CommandName, CommandFactory>>;

/** The command run when none is named. */
export const DEFAULT_COMMAND: CommandName = 'status';

export function defaultCommandTable(): CommandTable {
  return {
    begin: createBeginCommand,
    end: createEndCommand,
    fork: createForkCommand,
    list: createListCommand,
    next: createNextCommand,
    run: createRunCommand,
    status: createStatusCommand,
    total: createTotalCommand,
    verify: createVerifyCommand,
    wait: createWaitCommand,
  };
}

/**
 * Build the `stint` program.
 *
 * Commander is told to throw instead of exiting (exitOverride) on every
 * command, so the caller decides the process exit code.
 *
 * The first operand is always a command name. With none, DEFAULT_COMMAND
 * runs; anything else is a usage error, never a log path.
 */
export function buildProgram(ctx: CliContext, table: CommandTable = defaultCommandTable()): Command {
  const output = {
    writeOut: ctx.stdout,
    writeErr: ctx.stderr,
  };

  const program = new Command('stint')
    .description(
      'Track the time you spend on a project by storing\n' +
      'start and end times in a CSV file (default: TIMES.csv).',
    )
    .version(VERSION)
    .option('--fail', 'fail if there are any invalid time entries')
    .option('--quiet', 'do not print any informative messages')
    .addOption(new Option('--utc', 'write new timestamps in UTC').conflicts('local'))
    .option('--local', 'write new timestamps in local time with a numeric offset')
    .exitOverride()
    .configureOutput(output)
    .action(async (_options: unknown, command: Command) => {
      const [first] = command.args;
      if (first !== undefined) {
        command.error(`error: unknown command '${first}' (see 'stint --help')`, {
          exitCode: EXIT_USAGE,
          code: 'commander.unknownCommand',
        });
      }
      const fallback = command.commands.find((sub) => sub.name() === DEFAULT_COMMAND);
      await fallback?.parseAsync([], { from: 'user' });
    });

  for (const factory of Object.values(table)) {
    program.addCommand(factory(ctx).exitOverride().configureOutput(output));
  }

  return program;
}
