/**
 * stint end — Complete the begun time entry
 *
 * Stamps the open last entry with the current time. Only that entry's line
 * is rewritten; every earlier byte of the log is left untouched.
 * Fails when there is no open entry.
 */

import { Command } from 'commander';
import { endInterval } from '@stint/core';
import type { CliContext } from '../context.js';
import { failWith, onLog, prepare } from './shared.js';

export function createEndCommand(ctx: CliContext): Command {
  return new Command('end')
    .description('Complete the begun time entry')
    .argument('[file]', 'interval log (default: TIMES.csv)')
    .action((file: string | undefined, _options: unknown, command: Command) => {
      const inv = prepare(ctx, command, file);
      if (inv === null) return;
      const result = onLog(inv, 'write', (stream) => endInterval(stream, inv.options));
      if (!result.ok) failWith(inv, result.error);
    });
}
