import { parallelMap, Semaphore } from './concurrency';
import { delay } from './retry';

describe('Semaphore', () => {
  it('never runs more tasks than it has permits', async () => {
    const semaphore = new Semaphore(2);
    let running = 0;
    let peak = 0;

    const task = async () => {
      running++;
      peak = Math.max(peak, running);
      await delay(5);
      running--;
    };

    await Promise.all(Array.from({ length: 6 }, () => semaphore.run(task)));

    expect(peak).toBe(2);
    expect(semaphore.inUse).toBe(0);
    expect(semaphore.pending).toBe(0);
  });

  it('serves waiters in arrival order', async () => {
    const semaphore = new Semaphore(1);
    const order: number[] = [];
    const release = await semaphore.acquire();

    const waiters = [1, 2, 3].map((n) =>
      semaphore.run(async () => {
        order.push(n);
      }),
    );
    expect(semaphore.pending).toBe(3);

    release();
    await Promise.all(waiters);
    expect(order).toEqual([1, 2, 3]);
  });

  it('releases the permit when a task throws', async () => {
    const semaphore = new Semaphore(1);

    await expect(
      semaphore.run(async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(semaphore.inUse).toBe(0);
  });
});

describe('parallelMap', () => {
  it('keeps input order under bounded concurrency', async () => {
    let running = 0;
    let peak = 0;

    const results = await parallelMap(
      [30, 5, 20, 1],
      async (ms, index) => {
        running++;
        peak = Math.max(peak, running);
        await delay(ms);
        running--;
        return `${index}:${ms}`;
      },
      2,
    );

    expect(results).toEqual(['0:30', '1:5', '2:20', '3:1']);
    expect(peak).toBe(2);
  });

  it('returns an empty list for no items', async () => {
    await expect(parallelMap([], async () => 1, 4)).resolves.toEqual([]);
  });
});
