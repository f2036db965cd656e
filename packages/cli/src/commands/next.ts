/**
 * stint next — Toggle: end the open entry if there is one, else begin a new one.
 */

import { Command } from 'commander';
import { nextInterval } from '@stint/core';
import type { CliContext } from '../context.js';
import { failWith, onLog, prepare } from './shared.js';

export function createNextCommand(ctx: CliContext): Command {
  return new Command('next')
    .description('Begin or end the entry depending on the contents')
    .argument('[file]', 'interval log (default: TIMES.csv)')
    .action((file: string | undefined, _options: unknown, command: Command) => {
      const inv = prepare(ctx, command, file);
      if (inv === null) return;
      const result = onLog(inv, 'write', (stream) => nextInterval(stream, inv.options));
      if (!result.ok) failWith(inv, result.error);
    });
}
