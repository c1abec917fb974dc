import { describe, it, expect } from 'vitest';
import { SerialQueue } from './serial-queue.js';

describe('SerialQueue', () => {
  it('runs tasks one at a time in submission order', async () => {
    const queue = new SerialQueue();
    const log: string[] = [];

    const slow = queue.run(async () => {
      log.push('slow:start');
      await new Promise((resolve) => setTimeout(resolve, 10));
      log.push('slow:end');
    });
    const fast = queue.run(async () => {
      log.push('fast');
    });

    await Promise.all([slow, fast]);
    expect(log).toEqual(['slow:start', 'slow:end', 'fast']);
  });

  it('keeps running after a task rejects', async () => {
    const queue = new SerialQueue();

    const failing = queue.run(async () => {
      throw new Error('boom');
    });
    const next = queue.run(async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});
