import { makeContext, makeTrack, SECOND, T0 } from '../../testing/track-fixtures';
import { AnomalyType, MovementStats } from '../interfaces/anomaly.interface';
import { detectUnusualMovement, movementSamples } from './unusual-movement.detector';

const calm: MovementStats = { count: 30, mean: 1, stdDev: 0.5 };
const noTurns: MovementStats = { count: 0, mean: 0, stdDev: 0 };

describe('movementSamples', () => {
  it('measures speed per step and turn rate per triple', () => {
    const track = makeTrack('trk-1', [
      ['CAM-A', 0, 0, 0],
      ['CAM-A', SECOND, 1, 0],
      ['CAM-A', 2 * SECOND, 1, 1],
    ]);

    const samples = movementSamples(track.observations);

    expect(samples.map((s) => [s.metric, s.at])).toEqual([
      ['speed', T0 + SECOND],
      ['speed', T0 + 2 * SECOND],
      ['turn_rate', T0 + 2 * SECOND],
    ]);
    expect(samples[0].value).toBe(1);
    expect(samples[1].value).toBe(1);
    // a quarter turn over two seconds
    expect(samples[2].value).toBeCloseTo(Math.PI / 4, 10);
  });

  it('does not measure across a camera change', () => {
    const track = makeTrack('trk-1', [
      ['CAM-A', 0, 0, 0],
      ['CAM-B', SECOND, 50, 0],
      ['CAM-B', 2 * SECOND, 52, 0],
    ]);

    expect(movementSamples(track.observations)).toEqual([
      { cameraId: 'CAM-B', metric: 'speed', value: 2, at: T0 + 2 * SECOND },
    ]);
  });
});

describe('detectUnusualMovement', () => {
  const sprint = makeTrack('trk-1', [
    ['CAM-A', 0, 0, 0],
    ['CAM-A', SECOND, 4, 0],
    ['CAM-A', 2 * SECOND, 8, 0],
    ['CAM-A', 3 * SECOND, 12, 0],
  ]);

  it('flags a track far above the camera speed baseline', () => {
    const ctx = makeContext({
      now: T0 + 3 * SECOND,
      movement: { 'CAM-A': { speed: calm, turn_rate: noTurns } },
    });

    const candidates = detectUnusualMovement([sprint], ctx);

    expect(candidates).toEqual([
      {
        dedupeKey: 'movement:trk-1:speed',
        type: AnomalyType.UNUSUAL_MOVEMENT,
        confidence: 1,
        source: { kind: 'track', trackId: 'trk-1', streamId: 'stream-1' },
        detectedAt: T0 + 3 * SECOND,
        cameraId: 'CAM-A',
        location: 'CAM-A',
        description: 'Track trk-1 speed is 6.0 standard deviations above normal on CAM-A',
        evidence: { metric: 'speed', zScore: 6, trackMean: 4, samples: 3 },
      },
    ]);
  });

  it('needs enough baseline samples', () => {
    const ctx = makeContext({
      now: T0 + 3 * SECOND,
      movement: { 'CAM-A': { speed: { ...calm, count: 29 }, turn_rate: noTurns } },
    });

    expect(detectUnusualMovement([sprint], ctx)).toEqual([]);
  });

  it('stays quiet without a baseline for the camera', () => {
    const ctx = makeContext({
      now: T0 + 3 * SECOND,
      movement: { 'CAM-B': { speed: calm, turn_rate: noTurns } },
    });

    expect(detectUnusualMovement([sprint], ctx)).toEqual([]);
  });

  it('stays quiet within the z threshold', () => {
    const stroll = makeTrack('trk-2', [
      ['CAM-A', 0, 0, 0],
      ['CAM-A', SECOND, 2, 0],
      ['CAM-A', 2 * SECOND, 4, 0],
    ]);
    const ctx = makeContext({
      now: T0 + 2 * SECOND,
      movement: { 'CAM-A': { speed: calm, turn_rate: noTurns } },
    });

    expect(detectUnusualMovement([stroll], ctx)).toEqual([]);
  });
});
