/**
 * stint begin — Append a new open entry
 *
 * An already-open last entry is overridden with a warning, unless --fail.
 */

import { Command } from 'commander';
import { beginInterval } from '@stint/core';
import type { CliContext } from '../context.js';
import { failWith, onLog, prepare } from './shared.js';

export function createBeginCommand(ctx: CliContext): Command {
  return new Command('begin')
    .description('Begin a new time entry')
    .argument('[file]', 'interval log (default: TIMES.csv)')
    .action((file: string | undefined, _options: unknown, command: Command) => {
      const inv = prepare(ctx, command, file);
      if (inv === null) return;
      const result = onLog(inv, 'write', (stream) => beginInterval(stream, inv.options));
      if (!result.ok) failWith(inv, result.error);
    });
}
