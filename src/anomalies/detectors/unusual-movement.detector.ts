import {
  Track,
  TrackObservation,
} from '../../tracking/interfaces/track.interface';
import {
  AnomalyCandidate,
  AnomalyType,
  DetectionContext,
  MovementMetric,
} from '../interfaces/anomaly.interface';
import { exceedanceConfidence, isEligible } from './detector.utils';

export interface MovementSample {
  cameraId: string;
  metric: MovementMetric;
  value: number;
  /** Timestamp of the observation that completed the sample */
  at: number;
}

function headingChange(
  a: TrackObservation,
  b: TrackObservation,
  c: TrackObservation,
): number | undefined {
  const h1 = Math.atan2(b.position.y - a.position.y, b.position.x - a.position.x);
  const h2 = Math.atan2(c.position.y - b.position.y, c.position.x - b.position.x);
  const moved =
    (a.position.x !== b.position.x || a.position.y !== b.position.y) &&
    (b.position.x !== c.position.x || b.position.y !== c.position.y);
  if (!moved) return undefined;

  const turn = Math.abs(h2 - h1);
  return turn > Math.PI ? 2 * Math.PI - turn : turn;
}

/**
 * Speed (units/s) between consecutive same-camera observations and turn
 * rate (rad/s) across consecutive same-camera triples
 */
export function movementSamples(
  observations: readonly TrackObservation[],
): MovementSample[] {
  const samples: MovementSample[] = [];

  for (let i = 1; i < observations.length; i++) {
    const prev = observations[i - 1];
    const curr = observations[i];
    if (prev.cameraId !== curr.cameraId) continue;

    const seconds = (curr.timestamp - prev.timestamp) / 1000;
    if (seconds <= 0) continue;

    const dx = curr.position.x - prev.position.x;
    const dy = curr.position.y - prev.position.y;
    samples.push({
      cameraId: curr.cameraId,
      metric: 'speed',
      value: Math.hypot(dx, dy) / seconds,
      at: curr.timestamp,
    });

    const before = observations[i - 2];
    if (!before || before.cameraId !== curr.cameraId) continue;
    const turn = headingChange(before, prev, curr);
    const span = (curr.timestamp - before.timestamp) / 1000;
    if (turn === undefined || span <= 0) continue;
    samples.push({
      cameraId: curr.cameraId,
      metric: 'turn_rate',
      value: turn / span,
      at: curr.timestamp,
    });
  }
  return samples;
}

/**
 * Tracks whose mean speed or turn rate on a camera sits more than the
 * z threshold above that camera's learned baseline. Baselines with too
 * few samples are not used.
 */
export function detectUnusualMovement(
  tracks: readonly Track[],
  ctx: DetectionContext,
): AnomalyCandidate[] {
  const { movementZThreshold, movementMinSamples } = ctx.config;
  const candidates: AnomalyCandidate[] = [];

  for (const track of tracks) {
    if (!isEligible(track, ctx)) continue;

    const grouped = new Map<string, MovementSample[]>();
    for (const sample of movementSamples(track.observations)) {
      const key = `${sample.cameraId}|${sample.metric}`;
      const group = grouped.get(key) ?? [];
      group.push(sample);
      grouped.set(key, group);
    }

    const worst = new Map<
      MovementMetric,
      { z: number; mean: number; samples: MovementSample[] }
    >();
    for (const samples of grouped.values()) {
      const { cameraId, metric } = samples[0];
      const baseline = ctx.baselines.movement.get(cameraId)?.[metric];
      if (!baseline || baseline.count < movementMinSamples || baseline.stdDev <= 0) {
        continue;
      }

      const mean = samples.reduce((sum, s) => sum + s.value, 0) / samples.length;
      const z = (mean - baseline.mean) / baseline.stdDev;
      if (z <= movementZThreshold) continue;

      const current = worst.get(metric);
      if (!current || z > current.z) {
        worst.set(metric, { z, mean, samples });
      }
    }

    for (const [metric, { z, mean, samples }] of worst) {
      const last = samples[samples.length - 1];
      const observation = track.observations.find((o) => o.timestamp === last.at);
      candidates.push({
        dedupeKey: `movement:${track.id}:${metric}`,
        type: AnomalyType.UNUSUAL_MOVEMENT,
        confidence: exceedanceConfidence(z, movementZThreshold),
        source: { kind: 'track', trackId: track.id, streamId: track.streamId },
        detectedAt: last.at,
        cameraId: last.cameraId,
        location: observation?.location,
        description: `Track ${track.id} ${metric === 'speed' ? 'speed' : 'turn rate'} is ${z.toFixed(1)} standard deviations above normal on ${last.cameraId}`,
        evidence: {
          metric,
          zScore: z,
          trackMean: mean,
          samples: samples.length,
        },
      });
    }
  }
  return candidates;
}
