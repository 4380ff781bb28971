import { CacheInconsistencyError } from '../common/errors/pipeline.errors';
import { EmbeddingCache } from './embedding-cache';
import {
  EmbeddingCacheEntry,
  EmbeddingCacheStore,
} from './interfaces/embedding-cache.interface';
import { InMemoryEmbeddingCacheStore } from './stores/in-memory-embedding-cache.store';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('EmbeddingCache', () => {
  let store: InMemoryEmbeddingCacheStore;
  let cache: EmbeddingCache;

  beforeEach(() => {
    store = new InMemoryEmbeddingCacheStore(100);
    cache = new EmbeddingCache({ name: 'test', ttlMs: 1_000, store });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('coalesces concurrent requests for one fingerprint into one compute', async () => {
    const pending = deferred<number[]>();
    const compute = jest.fn(() => pending.promise);

    const calls = Array.from({ length: 5 }, () =>
      cache.getOrComputeDetailed('seg_a', compute),
    );
    pending.resolve([0.6, 0.8]);
    const outcomes = await Promise.all(calls);

    expect(compute).toHaveBeenCalledTimes(1);
    expect(outcomes.map((o) => o.coalesced)).toEqual([false, true, true, true, true]);
    for (const outcome of outcomes) {
      expect(outcome.vector).toBe(outcomes[0].vector);
      expect(outcome.cacheHit).toBe(false);
    }
    expect(outcomes[0].vector).toEqual([0.6, 0.8]);
    expect(Object.isFrozen(outcomes[0].vector)).toBe(true);

    const stats = await cache.stats();
    expect(stats).toMatchObject({ misses: 1, coalesced: 4, entries: 1, inFlight: 0 });
  });

  it('serves later requests from the store', async () => {
    const compute = jest.fn(async () => [1, 0]);
    await cache.getOrCompute('seg_a', compute);

    const outcome = await cache.getOrComputeDetailed('seg_a', compute);

    expect(outcome).toEqual({ vector: [1, 0], cacheHit: true, coalesced: false });
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('does not contend across fingerprints', async () => {
    const slow = deferred<number[]>();
    const slowCall = cache.getOrCompute('seg_slow', () => slow.promise);

    await expect(cache.getOrCompute('seg_fast', async () => [0, 1])).resolves.toEqual([
      0, 1,
    ]);

    slow.resolve([1, 0]);
    await expect(slowCall).resolves.toEqual([1, 0]);
  });

  it('shares a failure with every waiter and stores nothing', async () => {
    const pending = deferred<number[]>();
    const failure = new Error('provider down');
    const compute = jest.fn(() => pending.promise);

    const calls = [
      cache.getOrCompute('seg_a', compute),
      cache.getOrCompute('seg_a', compute),
    ];
    pending.reject(failure);

    await Promise.all(calls.map((call) => expect(call).rejects.toBe(failure)));
    await expect(store.size()).resolves.toBe(0);

    await expect(cache.getOrCompute('seg_a', async () => [1, 0])).resolves.toEqual([
      1, 0,
    ]);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('recomputes once the entry expires', async () => {
    const now = jest.spyOn(Date, 'now');
    const compute = jest
      .fn<Promise<number[]>, []>()
      .mockResolvedValueOnce([1, 0])
      .mockResolvedValueOnce([0, 1]);

    now.mockReturnValue(10_000);
    await cache.getOrCompute('seg_a', compute);

    now.mockReturnValue(10_999);
    await expect(cache.getOrCompute('seg_a', compute)).resolves.toEqual([1, 0]);

    now.mockReturnValue(11_000);
    await expect(cache.getOrCompute('seg_a', compute)).resolves.toEqual([0, 1]);
    expect(compute).toHaveBeenCalledTimes(2);
  });

  it('refuses content whose digest differs from the stored one', async () => {
    await cache.getOrCompute('seg_a', async () => [1, 0], { contentDigest: 'aaa' });
    const compute = jest.fn(async () => [0, 1]);

    await expect(
      cache.getOrCompute('seg_a', compute, {
        contentDigest: 'bbb',
        context: { segmentId: 'seg-2' },
      }),
    ).rejects.toBeInstanceOf(CacheInconsistencyError);
    expect(compute).not.toHaveBeenCalled();

    await expect(
      cache.getOrCompute('seg_a', compute, { contentDigest: 'aaa' }),
    ).resolves.toEqual([1, 0]);
    await expect(cache.stats()).resolves.toMatchObject({ inconsistencies: 1 });
  });

  it('checks the digest of coalesced callers too', async () => {
    const pending = deferred<number[]>();
    const first = cache.getOrCompute('seg_a', () => pending.promise, {
      contentDigest: 'aaa',
    });
    const second = cache.getOrCompute('seg_a', async () => [0, 1], {
      contentDigest: 'bbb',
    });
    pending.resolve([1, 0]);

    await Promise.all([
      expect(first).resolves.toEqual([1, 0]),
      expect(second).rejects.toBeInstanceOf(CacheInconsistencyError),
    ]);
  });

  it('still returns the vector when the store write fails', async () => {
    const failingStore: EmbeddingCacheStore = {
      get: async () => null,
      set: async () => {
        throw new Error('disk full');
      },
      delete: async () => undefined,
      size: async () => 0,
    };
    const flaky = new EmbeddingCache({ name: 'flaky', ttlMs: 1_000, store: failingStore });

    await expect(flaky.getOrCompute('seg_a', async () => [1, 0])).resolves.toEqual([
      1, 0,
    ]);
  });
});

describe('InMemoryEmbeddingCacheStore', () => {
  it('evicts the least recently used entry', async () => {
    const store = new InMemoryEmbeddingCacheStore(2);
    const entry = (fingerprint: string): EmbeddingCacheEntry => ({
      fingerprint,
      vector: [1],
      createdAt: 0,
      expiresAt: 1_000,
    });

    await store.set(entry('a'));
    await store.set(entry('b'));
    await store.get('a');
    await store.set(entry('c'));

    await expect(store.get('b')).resolves.toBeNull();
    await expect(store.get('a')).resolves.not.toBeNull();
    await expect(store.get('c')).resolves.not.toBeNull();
  });
});
