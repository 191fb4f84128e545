import { CallQueue } from '../src/utils/call-queue';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe('CallQueue', () => {
  it('runs calls on the same key one at a time in arrival order', async () => {
    const queue = new CallQueue();
    const log: string[] = [];
    const gate = deferred();

    const first = queue.run('room', async () => {
      log.push('first:start');
      await gate.promise;
      log.push('first:end');
      return 1;
    });
    const second = queue.run('room', async () => {
      log.push('second:start');
      return 2;
    });

    await Promise.resolve();
    expect(log).toEqual(['first:start']);

    gate.resolve();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(log).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('does not hold calls on other keys', async () => {
    const queue = new CallQueue();
    const gate = deferred();

    const blocked = queue.run('a', () => gate.promise.then(() => 'a'));
    await expect(queue.run('b', async () => 'b')).resolves.toBe('b');

    gate.resolve();
    await expect(blocked).resolves.toBe('a');
  });

  it('keeps running after a failed call', async () => {
    const queue = new CallQueue();

    const failed = queue.run('room', async () => {
      throw new Error('rejected');
    });
    const next = queue.run('room', async () => 'next');

    await expect(failed).rejects.toThrow('rejected');
    await expect(next).resolves.toBe('next');
  });

  it('reports idle once every queued call has settled', async () => {
    const queue = new CallQueue();
    let finished = false;

    void queue.run('room', async () => {
      finished = true;
    });

    await queue.idle();
    expect(finished).toBe(true);
  });
});
