/**
 * stint status — Show the current status of the times
 *
 * Default command. Prints either
 *
 *   open since <start> (<elapsed>)
 *
 * or `idle`, followed by the number of closed intervals.
 */

import { Command } from 'commander';
import { formatElapsed, summarizeStatus } from '@stint/core';
import type { CliContext } from '../context.js';
import { failWith, onLog, prepare, println, tolerate } from './shared.js';

export function createStatusCommand(ctx: CliContext): Command {
  return new Command('status')
    .description('Show the current status of the times')
    .argument('[file]', 'interval log (default: TIMES.csv)')
    .action((file: string | undefined, _options: unknown, command: Command) => {
      const inv = prepare(ctx, command, file);
      if (inv === null) return;

      const result = onLog(inv, 'read', (stream) => summarizeStatus(stream, ctx.clock()));
      if (!result.ok) {
        failWith(inv, result.error);
        return;
      }
      const { openSince, openForMs, closedIntervals, report } = result.value;
      if (!tolerate(inv, report)) return;

      if (openSince === null) {
        println(ctx.stdout, 'idle');
      } else {
        const elapsed = openForMs === null ? '' : ` (${formatElapsed(openForMs)})`;
        println(ctx.stdout, inv.theme.open(`open since ${openSince}`) + elapsed);
      }
      println(ctx.stdout, `${closedIntervals} closed interval${closedIntervals === 1 ? '' : 's'}`);
    });
}
