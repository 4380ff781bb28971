import { makeContext, makeTrack, MINUTE, SECOND, T0 } from '../../testing/track-fixtures';
import { AnomalyType } from '../interfaces/anomaly.interface';
import { detectCrowdFormation } from './crowd-formation.detector';

function arrival(id: string, offsetMs: number) {
  return makeTrack(id, [['CAM-A', offsetMs, 0, 0, 'atrium']]);
}

describe('detectCrowdFormation', () => {
  it('fires when a crowd gathers within the rise window', () => {
    const tracks = [
      ...['a', 'b', 'c', 'd'].map((id) => arrival(id, 0)),
      ...[1, 2, 3, 4, 5, 6, 7, 8].map((k) => arrival(`e${k}`, k * 5 * SECOND)),
    ];

    const candidates = detectCrowdFormation(tracks, makeContext({ now: T0 + MINUTE }));

    expect(candidates).toHaveLength(1);
    expect(candidates[0]).toMatchObject({
      dedupeKey: `crowd:stream-1:atrium:${T0 + 35 * SECOND}`,
      type: AnomalyType.CROWD_FORMATION,
      source: { kind: 'location', location: 'atrium', streamId: 'stream-1' },
      detectedAt: T0 + 35 * SECOND,
      location: 'atrium',
      description: '11 tracks gathered at atrium within 25s',
    });
    expect(candidates[0].confidence).toBeCloseTo(0.55, 10);
    expect(candidates[0].evidence).toMatchObject({
      count: 11,
      threshold: 10,
      lowUntil: T0 + 10 * SECOND,
      riseMs: 25 * SECOND,
    });
  });

  // four tracks already present, eight more arriving evenly until `spanMs`
  function gathering(spanMs: number) {
    return [
      ...['a', 'b', 'c', 'd'].map((id) => arrival(id, 0)),
      ...[1, 2, 3, 4, 5, 6, 7, 8].map((k) => arrival(`e${k}`, (k * spanMs) / 8)),
    ];
  }

  it('fires once when 4 tracks become 12 within 45 seconds', () => {
    const candidates = detectCrowdFormation(
      gathering(45 * SECOND),
      makeContext({ now: T0 + MINUTE }),
    );

    // 10 → 11 at the seventh arrival; the count last sat at the watermark at the second
    expect(candidates).toHaveLength(1);
    expect(candidates[0].detectedAt).toBe(T0 + 39_375);
    expect(candidates[0].evidence).toMatchObject({
      count: 11,
      lowUntil: T0 + 11_250,
      riseMs: 28_125,
    });
  });

  it('does not fire when 4 tracks become 12 over 2 hours', () => {
    expect(
      detectCrowdFormation(
        gathering(2 * 60 * MINUTE),
        makeContext({ now: T0 + 2 * 60 * MINUTE }),
      ),
    ).toEqual([]);
  });

  it('counts a track once however often it is seen', () => {
    const busy = makeTrack('busy', [
      ['CAM-A', 0, 0, 0, 'atrium'],
      ['CAM-A', SECOND, 1, 0, 'atrium'],
      ['CAM-A', 2 * SECOND, 2, 0, 'atrium'],
    ]);
    const others = Array.from({ length: 9 }, (_, i) => arrival(`t${i}`, 3 * SECOND));

    expect(
      detectCrowdFormation([busy, ...others], makeContext({ now: T0 + 10 * SECOND })),
    ).toEqual([]);
  });

  it('stops counting a track once it is seen elsewhere', () => {
    const leaving = Array.from({ length: 6 }, (_, i) =>
      makeTrack(`l${i}`, [
        ['CAM-A', 0, 0, 0, 'atrium'],
        ['CAM-B', 10 * SECOND, 0, 0, 'corridor'],
      ]),
    );
    const arriving = Array.from({ length: 5 }, (_, i) => arrival(`a${i}`, 20 * SECOND));

    expect(
      detectCrowdFormation([...leaving, ...arriving], makeContext({ now: T0 + 30 * SECOND })),
    ).toEqual([]);
  });
});
