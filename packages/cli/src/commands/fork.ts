/**
 * stint fork — Begin a new time entry and fork a waiter to complete it later
 *
 * The detached child runs `stint wait <file>` with the same --fail, --quiet
 * and time zone flags. Send it SIGTERM (kill <pid>) to end the entry.
 */

import { Command } from 'commander';
import { beginInterval, ioError } from '@stint/core';
import type { CliContext } from '../context.js';
import { failWith, forwardedFlags, onLog, prepare } from './shared.js';

export function createForkCommand(ctx: CliContext): Command {
  return new Command('fork')
    .description('Begin a new time entry and fork to terminate later')
    .argument('[file]', 'interval log (default: TIMES.csv)')
    .action((file: string | undefined, _options: unknown, command: Command) => {
      const inv = prepare(ctx, command, file);
      if (inv === null) return;

      const begun = onLog(inv, 'write', (stream) => beginInterval(stream, inv.options));
      if (!begun.ok) {
        failWith(inv, begun.error);
        return;
      }

      inv.reporter.inform('FORK');
      let pid: number;
      try {
        pid = ctx.spawnWaiter(inv.config.file, forwardedFlags(inv.config));
      } catch (err: unknown) {
        failWith(inv, ioError(err));
        return;
      }
      inv.reporter.inform(`waiter pid ${pid}`);
    });
}
