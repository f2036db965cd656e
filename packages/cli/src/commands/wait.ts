/**
 * stint wait — Complete the begun time entry upon termination
 *
 * Prints WAIT, blocks until SIGINT, SIGTERM, SIGHUP or SIGQUIT arrives, then
 * ends the open entry. SIGKILL cannot be intercepted: a waiter killed that
 * way leaves the entry open.
 */

import { Command } from 'commander';
import { endInterval } from '@stint/core';
import type { CliContext } from '../context.js';
import type { Invocation } from './shared.js';
import { failWith, onLog, prepare } from './shared.js';

/** Shared with `stint run`. */
export async function waitThenEnd(inv: Invocation): Promise<void> {
  inv.reporter.inform('WAIT');
  await inv.ctx.waitForTermination();
  const result = onLog(inv, 'write', (stream) => endInterval(stream, inv.options));
  if (!result.ok) failWith(inv, result.error);
}

export function createWaitCommand(ctx: CliContext): Command {
  return new Command('wait')
    .description('Upon termination, complete the begun time entry')
    .argument('[file]', 'interval log (default: TIMES.csv)')
    .action(async (file: string | undefined, _options: unknown, command: Command) => {
      const inv = prepare(ctx, command, file);
      if (inv === null) return;
      await waitThenEnd(inv);
    });
}
