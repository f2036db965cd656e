/**
 * Stint Runtime Host — Detached Waiter Tests
 *
 *   FK-1: the child runs `<script> ...flags wait <file>` and the PID is returned
 *   FK-2: an unknown entry script is refused before spawning
 *   FK-3: a child that cannot start throws, and the late spawn error reaches onError
 *
 * The waiter script is a stand-in written to a temp dir: it records its
 * arguments next to the log and exits.
 */

import { describe, it, expect, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { spawnDetachedWaiter } from '../src/index.js';

const RECORD_ARGV = [
  "const { writeFileSync } = require('node:fs');",
  'const args = process.argv.slice(2);',
  "writeFileSync(args[args.length - 1] + '.argv', JSON.stringify(args));",
].join('\n');

function waiterFixture(): { dir: string; script: string; file: string } {
  const dir = mkdtempSync(join(tmpdir(), 'stint-fork-'));
  const script = join(dir, 'waiter.cjs');
  writeFileSync(script, RECORD_ARGV);
  return { dir, script, file: join(dir, 'TIMES.csv') };
}

describe('spawnDetachedWaiter', () => {
  it('FK-1: runs the script with the forwarded flags, then wait and the log path', async () => {
    const { script, file } = waiterFixture();

    const pid = spawnDetachedWaiter({
      file,
      script,
      flags: ['--fail', '--utc'],
      execPath: process.execPath,
      execArgv: [],
    });

    expect(Number.isInteger(pid)).toBe(true);
    expect(pid).toBeGreaterThan(0);

    await vi.waitFor(() => {
      expect(existsSync(`${file}.argv`)).toBe(true);
    }, { timeout: 10_000, interval: 50 });
    await vi.waitFor(() => {
      expect(JSON.parse(readFileSync(`${file}.argv`, 'utf-8'))).toEqual(['--fail', '--utc', 'wait', file]);
    }, { timeout: 2_000, interval: 50 });
  });

  it('FK-2: refuses an empty entry script path', () => {
    const { file } = waiterFixture();
    expect(() => spawnDetachedWaiter({ file, script: '' })).toThrow('cannot fork: entry script path is unknown');
  });

  it('FK-3: throws when the child does not start and reports the spawn error', async () => {
    const { dir, script, file } = waiterFixture();
    const errors: Error[] = [];

    expect(() =>
      spawnDetachedWaiter({
        file,
        script,
        execPath: join(dir, 'no-such-node'),
        execArgv: [],
        onError: (err) => {
          errors.push(err);
        },
      }),
    ).toThrow('cannot fork: waiter process did not start');

    await vi.waitFor(() => {
      expect(errors).toHaveLength(1);
    }, { timeout: 2_000, interval: 20 });
    expect(errors[0]?.message).toMatch(/ENOENT/);
  });
});
