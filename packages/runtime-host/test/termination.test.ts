import { describe, it, expect } from 'vitest';
import { EventEmitter } from 'node:events';
import { TERMINATION_SIGNALS, waitForTermination } from '../src/index.js';

describe('waitForTermination', () => {
  it('resolves with the first signal received', async () => {
    const source = new EventEmitter();
    const waiting = waitForTermination({ source, signals: ['SIGINT', 'SIGTERM'] });

    source.emit('SIGTERM', 'SIGTERM');

    await expect(waiting).resolves.toBe('SIGTERM');
  });

  it('removes every listener once a signal arrives', async () => {
    const source = new EventEmitter();
    const waiting = waitForTermination({ source, signals: ['SIGINT', 'SIGTERM'] });

    source.emit('SIGINT', 'SIGINT');
    await waiting;

    expect(source.listenerCount('SIGINT')).toBe(0);
    expect(source.listenerCount('SIGTERM')).toBe(0);
  });

  it('rejects with the abort reason and stops listening', async () => {
    const source = new EventEmitter();
    const controller = new AbortController();
    const waiting = waitForTermination({ source, signals: ['SIGTERM'], abort: controller.signal });

    controller.abort(new Error('shutting down'));

    await expect(waiting).rejects.toThrow('shutting down');
    expect(source.listenerCount('SIGTERM')).toBe(0);
  });

  it('rejects at once when already aborted', async () => {
    const source = new EventEmitter();
    const controller = new AbortController();
    controller.abort(new Error('too late'));

    await expect(waitForTermination({ source, abort: controller.signal })).rejects.toThrow('too late');
    expect(source.listenerCount('SIGINT')).toBe(0);
  });

  it('listens for the interrupt and terminate signals by default', () => {
    expect(TERMINATION_SIGNALS).toContain('SIGINT');
    expect(TERMINATION_SIGNALS).toContain('SIGTERM');
  });
});
