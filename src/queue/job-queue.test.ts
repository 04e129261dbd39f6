import { describe, expect, it } from 'vitest';
import { JobQueue } from './job-queue.js';
import { createSilentLogger } from '../logger.js';
import { delay } from '../utils/delay.js';

describe('JobQueue', () => {
  const logger = createSilentLogger();

  it('runs higher priorities first once a slot frees', async () => {
    const queue = new JobQueue(logger, 1);
    const order: string[] = [];
    const job = (name: string) => async (): Promise<void> => {
      order.push(name);
    };

    queue.submit('blocker', 'normal', () => delay(30));
    queue.submit('low', 'low', job('low'));
    queue.submit('high', 'high', job('high'));
    queue.submit('normal', 'normal', job('normal'));
    await queue.onIdle();

    expect(order).toEqual(['high', 'normal', 'low']);
  });

  it('never exceeds its concurrency', async () => {
    const queue = new JobQueue(logger, 3);
    let running = 0;
    let peak = 0;

    for (let i = 0; i < 10; i++) {
      queue.submit(`job-${i}`, 'normal', async () => {
        running += 1;
        peak = Math.max(peak, running);
        await delay(10);
        running -= 1;
      });
    }
    await queue.onIdle();

    expect(peak).toBe(3);
  });

  it('skips a job cancelled before it starts', async () => {
    const queue = new JobQueue(logger, 1);
    let ran = false;

    queue.submit('blocker', 'normal', () => delay(20));
    const handle = queue.submit('skipped', 'normal', async () => {
      ran = true;
    });
    queue.cancel('skipped');
    await handle.done;

    expect(ran).toBe(false);
    expect(handle.finished).toBe(true);
    expect(handle.error).toBeUndefined();
    expect(queue.get('skipped')).toBeUndefined();
  });

  it('aborts the signal of a running job', async () => {
    const queue = new JobQueue(logger, 1);
    const handle = queue.submit('slow', 'normal', signal => delay(5000, signal));

    await delay(10);
    queue.cancel('slow');
    await handle.done;

    expect(handle.started).toBe(true);
    expect(handle.error).toBeInstanceOf(Error);
    expect(handle.controller.signal.aborted).toBe(true);
  });

  it('keeps the error a job ended with', async () => {
    const queue = new JobQueue(logger, 1);
    const handle = queue.submit('broken', 'normal', async () => {
      throw new Error('boom');
    });
    await handle.done;

    expect(handle.error).toEqual(new Error('boom'));
  });

  it('rejects a duplicate id while the first is tracked', () => {
    const queue = new JobQueue(logger, 1);
    queue.submit('same', 'normal', () => delay(10));

    expect(() => queue.submit('same', 'normal', () => delay(10))).toThrow(
      'Job same is already queued'
    );
  });

  it('reports queue statistics', async () => {
    const queue = new JobQueue(logger, 2);
    for (let i = 0; i < 5; i++) {
      queue.submit(`job-${i}`, 'normal', () => delay(20));
    }

    expect(queue.getStats()).toEqual({ queued: 3, running: 2, tracked: 5, concurrency: 2 });
    await queue.close();
    expect(queue.getStats().tracked).toBe(0);
  });
});
