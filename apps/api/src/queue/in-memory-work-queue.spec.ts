import { Logger } from '@nestjs/common';
import type { WorkUnit } from '../jobs/jobs.types';
import { InMemoryWorkQueue } from './in-memory-work-queue';

function unit(mediaId: string): WorkUnit {
  return { jobId: 'job-1', generation: 0, postId: 'p1', mediaId };
}

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('InMemoryWorkQueue', () => {
  beforeAll(() => Logger.overrideLogger(false));

  it('delivers every published unit to the handler', async () => {
    const queue = new InMemoryWorkQueue({ workerConcurrency: 2, maxDeliveries: 1 });
    const seen: string[] = [];
    queue.start(async (u) => {
      seen.push(u.mediaId);
    });

    await queue.publish(unit('a'));
    await queue.publish(unit('b'));
    await queue.publish(unit('c'));
    await queue.onIdle();

    expect(seen.sort()).toEqual(['a', 'b', 'c']);
  });

  it('holds units published before start', async () => {
    const queue = new InMemoryWorkQueue({ workerConcurrency: 1, maxDeliveries: 1 });
    const seen: string[] = [];
    await queue.publish(unit('a'));

    queue.start(async (u) => {
      seen.push(u.mediaId);
    });
    await queue.onIdle();

    expect(seen).toEqual(['a']);
  });

  it('never runs more handlers than the concurrency bound', async () => {
    const queue = new InMemoryWorkQueue({ workerConcurrency: 2, maxDeliveries: 1 });
    const gate = deferred();
    let running = 0;
    let peak = 0;
    queue.start(async () => {
      running++;
      peak = Math.max(peak, running);
      await gate.promise;
      running--;
    });

    for (const id of ['a', 'b', 'c', 'd', 'e']) await queue.publish(unit(id));
    await new Promise((r) => setImmediate(r));
    expect(running).toBe(2);

    gate.resolve();
    await queue.onIdle();
    expect(peak).toBe(2);
  });

  it('redelivers a failed unit up to maxDeliveries', async () => {
    const queue = new InMemoryWorkQueue({ workerConcurrency: 1, maxDeliveries: 3 });
    let attempts = 0;
    queue.start(async () => {
      attempts++;
      if (attempts < 3) throw new Error('transient');
    });

    await queue.publish(unit('a'));
    await queue.onIdle();

    expect(attempts).toBe(3);
  });

  it('gives up after maxDeliveries', async () => {
    const queue = new InMemoryWorkQueue({ workerConcurrency: 1, maxDeliveries: 2 });
    let attempts = 0;
    queue.start(async () => {
      attempts++;
      throw new Error('permanent');
    });

    await queue.publish(unit('a'));
    await queue.onIdle();

    expect(attempts).toBe(2);
  });

  it('waits for in-flight units on stop and then refuses publishes', async () => {
    const queue = new InMemoryWorkQueue({ workerConcurrency: 1, maxDeliveries: 1 });
    const gate = deferred();
    let finished = false;
    queue.start(async () => {
      await gate.promise;
      finished = true;
    });
    await queue.publish(unit('a'));
    await new Promise((r) => setImmediate(r));

    const stopping = queue.stop();
    gate.resolve();
    await stopping;

    expect(finished).toBe(true);
    await expect(queue.publish(unit('b'))).rejects.toThrow('Queue has been stopped');
  });
});
