/**
 * stint total — Print the sum of all the times
 *
 * Only closed entries count. An open last entry is mentioned as a warning.
 */

import { Command } from 'commander';
import { formatElapsed, totalDuration } from '@stint/core';
import type { CliContext } from '../context.js';
import { failWith, onLog, prepare, println } from './shared.js';

export function createTotalCommand(ctx: CliContext): Command {
  return new Command('total')
    .description('Print the sum of all the times')
    .argument('[file]', 'interval log (default: TIMES.csv)')
    .action((file: string | undefined, _options: unknown, command: Command) => {
      const inv = prepare(ctx, command, file);
      if (inv === null) return;

      const result = onLog(inv, 'read', (stream) =>
        totalDuration(stream, { strict: inv.config.strict, reporter: inv.reporter }),
      );
      if (!result.ok) {
        failWith(inv, result.error);
        return;
      }
      println(ctx.stdout, formatElapsed(result.value.elapsedMs));
    });
}
