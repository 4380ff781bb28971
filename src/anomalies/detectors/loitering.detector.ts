import { distance } from '../../common/utils/vector-math';
import {
  Track,
  TrackObservation,
} from '../../tracking/interfaces/track.interface';
import {
  AnomalyCandidate,
  AnomalyType,
  DetectionContext,
} from '../interfaces/anomaly.interface';
import {
  exceedanceConfidence,
  formatDuration,
  isEligible,
} from './detector.utils';

export interface DwellRun {
  cameraId: string;
  location: string;
  startAt: number;
  endAt: number;
  durationMs: number;
  observations: number;
}

/**
 * Longest run of consecutive same-camera observations that stay within
 * `radius` of the run's first position. Ties keep the earlier run.
 */
export function longestDwell(
  observations: readonly TrackObservation[],
  radius: number,
): DwellRun | undefined {
  let longest: DwellRun | undefined;
  let start = 0;

  for (let i = 0; i < observations.length; i++) {
    const anchor = observations[start];
    const current = observations[i];
    if (
      current.cameraId !== anchor.cameraId ||
      distance(anchor.position, current.position) > radius
    ) {
      start = i;
    }

    const first = observations[start];
    const durationMs = current.timestamp - first.timestamp;
    if (!longest || durationMs > longest.durationMs) {
      longest = {
        cameraId: first.cameraId,
        location: first.location,
        startAt: first.timestamp,
        endAt: current.timestamp,
        durationMs,
        observations: i - start + 1,
      };
    }
  }
  return longest;
}

/**
 * Dwell beyond a multiple of the location's average dwell, or beyond the
 * absolute floor while the location has no baseline yet
 */
export function detectLoitering(
  tracks: readonly Track[],
  ctx: DetectionContext,
): AnomalyCandidate[] {
  const { config } = ctx;
  const candidates: AnomalyCandidate[] = [];

  for (const track of tracks) {
    if (!isEligible(track, ctx)) continue;

    const dwell = longestDwell(track.observations, config.loiterRadius);
    if (!dwell) continue;

    const baselineMs = ctx.baselines.dwellMs.get(dwell.location);
    const thresholdMs =
      baselineMs === undefined
        ? config.loiterFloorMs
        : config.loiterBaselineMultiple * baselineMs;
    if (dwell.durationMs <= thresholdMs) continue;

    candidates.push({
      dedupeKey: `loitering:${track.id}:${dwell.startAt}`,
      type: AnomalyType.LOITERING,
      confidence: exceedanceConfidence(dwell.durationMs, thresholdMs),
      source: { kind: 'track', trackId: track.id, streamId: track.streamId },
      detectedAt: dwell.endAt,
      cameraId: dwell.cameraId,
      location: dwell.location,
      description: `Track ${track.id} stayed at ${dwell.location} for ${formatDuration(dwell.durationMs)} (threshold ${formatDuration(thresholdMs)})`,
      evidence: {
        dwellMs: dwell.durationMs,
        thresholdMs,
        baselineMs: baselineMs ?? null,
        radius: config.loiterRadius,
        runStartedAt: dwell.startAt,
        observations: dwell.observations,
      },
    });
  }
  return candidates;
}
