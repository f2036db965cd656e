/**
 * stint run — Begin a new time entry and complete it upon termination
 */

import { Command } from 'commander';
import { beginInterval } from '@stint/core';
import type { CliContext } from '../context.js';
import { failWith, onLog, prepare } from './shared.js';
import { waitThenEnd } from './wait.js';

export function createRunCommand(ctx: CliContext): Command {
  return new Command('run')
    .description('Begin a new time entry and complete it upon termination')
    .argument('[file]', 'interval log (default: TIMES.csv)')
    .action(async (file: string | undefined, _options: unknown, command: Command) => {
      const inv = prepare(ctx, command, file);
      if (inv === null) return;

      const begun = onLog(inv, 'write', (stream) => beginInterval(stream, inv.options));
      if (!begun.ok) {
        failWith(inv, begun.error);
        return;
      }
      await waitThenEnd(inv);
    });
}
