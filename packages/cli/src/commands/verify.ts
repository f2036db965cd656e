/**
 * stint verify — Verify the validity of the times
 *
 * Exit 0 with `ok` for a well-formed log. A log whose only anomaly is an open
 * last entry also passes, noted as such, unless --fail is given.
 */

import { Command } from 'commander';
import { formatError, justIncomplete, readRecords } from '@stint/core';
import type { CliContext } from '../context.js';
import { failWith, onLog, prepare, println } from './shared.js';

export function createVerifyCommand(ctx: CliContext): Command {
  return new Command('verify')
    .description('Verify the validity of the times')
    .argument('[file]', 'interval log (default: TIMES.csv)')
    .action((file: string | undefined, _options: unknown, command: Command) => {
      const inv = prepare(ctx, command, file);
      if (inv === null) return;

      const result = onLog(inv, 'read', (stream) => readRecords(stream, false));
      if (!result.ok) {
        failWith(inv, result.error);
        return;
      }

      const { report } = result.value;
      if (report === null) {
        println(ctx.stdout, inv.theme.ok('ok'));
      } else if (justIncomplete(report) && !inv.config.strict) {
        println(ctx.stdout, inv.theme.ok('ok') + ' (last entry is incomplete)');
      } else {
        failWith(inv, formatError(report));
      }
    });
}
