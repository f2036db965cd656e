/**
 * stint list — List all the times
 *
 * One line per entry, in file order:
 *
 *   <start>  <end>  <elapsed>
 *   <start>  (open)
 *   line <n>: invalid entry
 */

import { Command } from 'commander';
import type { LogRow } from '@stint/core';
import { formatElapsed, isClosed, readRecords, recordDuration } from '@stint/core';
import type { CliContext } from '../context.js';
import type { Invocation } from './shared.js';
import { failWith, onLog, prepare, println, tolerate } from './shared.js';

function renderRow(inv: Invocation, row: LogRow): string {
  const { theme } = inv;
  if (row.record === null) {
    return theme.error(`line ${row.line}: invalid entry`);
  }
  if (!isClosed(row.record)) {
    return `${row.record.start}  ${theme.open('(open)')}`;
  }
  const ms = recordDuration(row.record);
  return `${row.record.start}  ${row.record.end}  ${theme.muted(ms === null ? '?' : formatElapsed(ms))}`;
}

export function createListCommand(ctx: CliContext): Command {
  return new Command('list')
    .description('List all the times')
    .argument('[file]', 'interval log (default: TIMES.csv)')
    .action((file: string | undefined, _options: unknown, command: Command) => {
      const inv = prepare(ctx, command, file);
      if (inv === null) return;

      const result = onLog(inv, 'read', (stream) => readRecords(stream, false));
      if (!result.ok) {
        failWith(inv, result.error);
        return;
      }
      if (!tolerate(inv, result.value.report)) return;

      for (const row of result.value.rows) {
        println(ctx.stdout, renderRow(inv, row));
      }
    });
}
