import { ConfigService } from '@nestjs/config';
import { compileFilters } from '../vector-index/filters';
import { SearchResultItem } from './interfaces/search.interface';
import { SearchResultCacheService } from './search-result-cache.service';

const item: SearchResultItem = {
  segmentId: 'seg-1',
  pointId: 'point-1',
  score: 0.9,
  videoId: 'video-1',
  cameraId: 'CAM-1',
  location: 'lobby',
  startTime: 1_000,
  endTime: 16_000,
  startOffset: 0,
  endOffset: 15,
  contentFlags: { hasFaces: false, hasVehicles: false, motionDetected: true },
};

describe('SearchResultCacheService', () => {
  const parameters = { topK: 10, scoreThreshold: 0.5 };
  let cache: SearchResultCacheService;

  beforeEach(() => {
    cache = new SearchResultCacheService(
      new ConfigService({ SEARCH_CACHE_TTL_MS: 1_000, SEARCH_CACHE_MAX_ENTRIES: 2 }),
    );
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('keys equivalent searches the same way', () => {
    const a = compileFilters({
      cameraId: 'CAM-1',
      contentFlags: { hasFaces: false, motionDetected: true },
    });
    const b = compileFilters({
      contentFlags: { motionDetected: true, hasFaces: false },
      cameraId: 'CAM-1',
    });

    expect(cache.keyFor('Person in  RED jacket', a, parameters)).toBe(
      cache.keyFor('person in red jacket', b, parameters),
    );
    expect(cache.keyFor('person in red jacket', a, parameters)).not.toBe(
      cache.keyFor('person in red jacket', a, { ...parameters, topK: 5 }),
    );
  });

  it('returns copies of what was stored', () => {
    cache.store('red jacket', [], parameters, [item]);

    const first = cache.lookup('red jacket', [], parameters);
    expect(first).toEqual([item]);
    if (first) first[0].contentFlags.hasFaces = true;

    expect(cache.lookup('red jacket', [], parameters)).toEqual([item]);
    expect(cache.stats()).toEqual({ entries: 1, hits: 2, misses: 0 });
  });

  it('expires entries after the TTL', () => {
    const now = jest.spyOn(Date, 'now').mockReturnValue(50_000);
    cache.store('red jacket', [], parameters, [item]);

    now.mockReturnValue(50_999);
    expect(cache.lookup('red jacket', [], parameters)).toHaveLength(1);

    now.mockReturnValue(51_000);
    expect(cache.lookup('red jacket', [], parameters)).toBeUndefined();
  });

  it('evicts the oldest entries beyond the bound', () => {
    cache.store('first', [], parameters, [item]);
    cache.store('second', [], parameters, [item]);
    cache.store('third', [], parameters, [item]);

    expect(cache.lookup('first', [], parameters)).toBeUndefined();
    expect(cache.lookup('third', [], parameters)).toHaveLength(1);
    expect(cache.stats().entries).toBe(2);
  });
});
