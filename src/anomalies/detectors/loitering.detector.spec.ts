import {
  lingering,
  makeContext,
  makeTrack,
  MINUTE,
  SECOND,
  T0,
} from '../../testing/track-fixtures';
import { AnomalyType } from '../interfaces/anomaly.interface';
import { detectLoitering, longestDwell } from './loitering.detector';

describe('longestDwell', () => {
  it('starts a new run when the track leaves the radius', () => {
    const track = makeTrack('trk-1', [
      ['CAM-A', 0, 0, 0],
      ['CAM-A', 1 * MINUTE, 1, 0],
      ['CAM-A', 2 * MINUTE, 10, 0],
      ['CAM-A', 5 * MINUTE, 10, 1],
      ['CAM-A', 6 * MINUTE, 10, 0],
    ]);

    expect(longestDwell(track.observations, 5)).toEqual({
      cameraId: 'CAM-A',
      location: 'CAM-A',
      startAt: T0 + 2 * MINUTE,
      endAt: T0 + 6 * MINUTE,
      durationMs: 4 * MINUTE,
      observations: 3,
    });
  });

  it('starts a new run on another camera even at the same position', () => {
    const track = makeTrack('trk-1', [
      ['CAM-A', 0, 0, 0],
      ['CAM-A', 2 * MINUTE, 0, 0],
      ['CAM-B', 3 * MINUTE, 0, 0],
      ['CAM-B', 4 * MINUTE, 0, 0],
    ]);

    expect(longestDwell(track.observations, 5)).toMatchObject({
      cameraId: 'CAM-A',
      durationMs: 2 * MINUTE,
    });
  });

  it('keeps the earlier run on a tie', () => {
    const track = makeTrack('trk-1', [
      ['CAM-A', 0, 0, 0],
      ['CAM-A', MINUTE, 0, 0],
      ['CAM-B', 2 * MINUTE, 0, 0],
      ['CAM-B', 3 * MINUTE, 0, 0],
    ]);

    expect(longestDwell(track.observations, 5)?.cameraId).toBe('CAM-A');
  });
});

describe('detectLoitering', () => {
  it('flags a 16 minute stay against the 15 minute floor when there is no baseline', () => {
    const track = makeTrack('trk-1', lingering('CAM-A', 0, 16 * MINUTE, MINUTE, 'lobby'));

    const [candidate, ...rest] = detectLoitering(
      [track],
      makeContext({ now: T0 + 16 * MINUTE }),
    );

    expect(rest).toEqual([]);
    expect(candidate).toMatchObject({
      dedupeKey: `loitering:trk-1:${T0}`,
      type: AnomalyType.LOITERING,
      source: { kind: 'track', trackId: 'trk-1', streamId: 'stream-1' },
      detectedAt: T0 + 16 * MINUTE,
      cameraId: 'CAM-A',
      location: 'lobby',
      description: 'Track trk-1 stayed at lobby for 16m 0s (threshold 15m 0s)',
    });
    expect(candidate.confidence).toBeCloseTo(0.5 + 0.5 / 15, 10);
    expect(candidate.evidence).toMatchObject({
      dwellMs: 16 * MINUTE,
      thresholdMs: 15 * MINUTE,
      baselineMs: null,
      observations: 17,
    });
  });

  it('uses a multiple of the location baseline', () => {
    const long = makeTrack('trk-1', lingering('CAM-A', 0, 16 * MINUTE, MINUTE, 'lobby'));
    const short = makeTrack('trk-2', lingering('CAM-A', 0, 8 * MINUTE, MINUTE, 'lobby'));
    const ctx = makeContext({ now: T0 + 16 * MINUTE, dwellMs: { lobby: 3 * MINUTE } });

    const candidates = detectLoitering([long, short], ctx);

    expect(candidates.map((c) => c.source)).toEqual([
      { kind: 'track', trackId: 'trk-1', streamId: 'stream-1' },
    ]);
    expect(candidates[0].evidence.baselineMs).toBe(3 * MINUTE);
  });

  it('does not flag a stay of exactly the threshold', () => {
    const track = makeTrack('trk-1', lingering('CAM-A', 0, 15 * MINUTE, MINUTE));

    expect(detectLoitering([track], makeContext({ now: T0 + 15 * MINUTE }))).toEqual([]);
  });

  it('ignores tracks that closed before the recent window', () => {
    const track = makeTrack('trk-1', lingering('CAM-A', 0, 20 * MINUTE, MINUTE), {
      state: 'closed',
      closedAt: T0 + 21 * MINUTE,
    });

    expect(detectLoitering([track], makeContext({ now: T0 + 30 * MINUTE }))).toHaveLength(1);
    expect(
      detectLoitering([track], makeContext({ now: T0 + 31 * MINUTE + SECOND })),
    ).toEqual([]);
  });
});
