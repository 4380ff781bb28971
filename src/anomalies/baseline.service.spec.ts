import { lingering, makeTrack, MINUTE, SECOND } from '../testing/track-fixtures';
import { BaselineService, DWELL_WINDOW } from './baseline.service';

describe('BaselineService', () => {
  let baselines: BaselineService;

  beforeEach(() => {
    baselines = new BaselineService();
  });

  it('averages dwell over a rolling window', () => {
    baselines.recordDwell('lobby', 0);
    expect(baselines.averageDwell('lobby')).toBeUndefined();

    for (let i = 0; i < DWELL_WINDOW; i++) {
      baselines.recordDwell('lobby', MINUTE);
    }
    baselines.recordDwell('lobby', 51 * MINUTE);

    // the window now holds 49 one-minute stays and one 51-minute stay
    expect(baselines.averageDwell('lobby')).toBe(2 * MINUTE);
  });

  it('replaces history with a seeded average', () => {
    baselines.recordDwell('lobby', 10 * MINUTE);

    expect(baselines.seedDwell('lobby', 3 * MINUTE)).toBe(3 * MINUTE);
    expect(baselines.averageDwell('lobby')).toBe(3 * MINUTE);
    expect(() => baselines.seedDwell('lobby', 0)).toThrow('Dwell baseline must be positive, got 0');
  });

  it('keeps running movement statistics per camera', () => {
    baselines.recordMovement('CAM-A', 'speed', 1);
    baselines.recordMovement('CAM-A', 'speed', 2);
    baselines.recordMovement('CAM-A', 'speed', 3);

    const camera = baselines.snapshot().movement.get('CAM-A');
    expect(camera?.speed).toEqual({ count: 3, mean: 2, stdDev: 1 });
    expect(camera?.turn_rate).toEqual({ count: 0, mean: 0, stdDev: 0 });
  });

  it('learns dwell and movement from a track', () => {
    const track = makeTrack(
      'trk-1',
      [
        ...lingering('CAM-A', 0, 2 * MINUTE, MINUTE, 'lobby'),
        ['CAM-A', 2 * MINUTE + 10 * SECOND, 20.5, 0, 'lobby'],
      ],
      { state: 'closed' },
    );

    baselines.learnFromTrack(track, 5);

    expect(baselines.averageDwell('lobby')).toBe(2 * MINUTE);
    expect(baselines.snapshot().movement.get('CAM-A')?.speed.count).toBe(3);
    expect(baselines.describe().dwell).toEqual([
      { location: 'lobby', averageMs: 2 * MINUTE, samples: 1 },
    ]);
  });
});
