import { Track } from '../../tracking/interfaces/track.interface';
import {
  AnomalyCandidate,
  AnomalyType,
  DetectionContext,
} from '../interfaces/anomaly.interface';
import { exceedanceConfidence, formatDuration } from './detector.utils';

interface PresenceEvent {
  at: number;
  trackId: string;
  delta: 1 | -1;
}

interface LocationHistory {
  streamId: string;
  events: PresenceEvent[];
}

/**
 * A track is present at a location from its first observation there until
 * it is seen elsewhere, its last observation there once closed, or `now`
 * while it is still open.
 */
function presenceByLocation(
  tracks: readonly Track[],
  now: number,
): Map<string, LocationHistory> {
  const byLocation = new Map<string, LocationHistory>();

  for (const track of tracks) {
    const { observations } = track;
    let i = 0;
    while (i < observations.length) {
      const location = observations[i].location;
      let j = i;
      while (j + 1 < observations.length && observations[j + 1].location === location) {
        j++;
      }

      const enter = observations[i].timestamp;
      const next = observations[j + 1];
      const exit = next
        ? next.timestamp
        : track.state === 'open'
          ? Math.max(now, observations[j].timestamp)
          : observations[j].timestamp;

      let history = byLocation.get(location);
      if (!history) {
        history = { streamId: track.streamId, events: [] };
        byLocation.set(location, history);
      }
      history.events.push(
        { at: enter, trackId: track.id, delta: 1 },
        { at: exit, trackId: track.id, delta: -1 },
      );
      i = j + 1;
    }
  }
  return byLocation;
}

/**
 * A crowd forms when the number of distinct tracks at a location climbs
 * past the threshold within the rise window of last being at or below the
 * low watermark. A slow build-up never fires. One anomaly per episode: the
 * count has to drop back to the threshold before another can fire.
 */
export function detectCrowdFormation(
  tracks: readonly Track[],
  ctx: DetectionContext,
): AnomalyCandidate[] {
  const { crowdThreshold, crowdLowWatermark, crowdRiseWindowMs } = ctx.config;
  const candidates: AnomalyCandidate[] = [];

  for (const [location, history] of presenceByLocation(tracks, ctx.now)) {
    // entries before exits at the same instant
    const events = history.events.sort((a, b) => a.at - b.at || b.delta - a.delta);
    const present = new Map<string, number>();
    let lowUntil = Number.NEGATIVE_INFINITY;
    let count = 0;

    let i = 0;
    while (i < events.length) {
      const at = events[i].at;
      const previous = count;
      for (; i < events.length && events[i].at === at; i++) {
        const { trackId, delta } = events[i];
        const visits = (present.get(trackId) ?? 0) + delta;
        if (visits > 0) present.set(trackId, visits);
        else present.delete(trackId);
      }
      count = present.size;

      if (previous <= crowdLowWatermark || count <= crowdLowWatermark) {
        lowUntil = at;
      }
      if (previous > crowdThreshold || count <= crowdThreshold) continue;

      const riseMs = at - lowUntil;
      if (riseMs > crowdRiseWindowMs) continue;

      candidates.push({
        dedupeKey: `crowd:${history.streamId}:${location}:${at}`,
        type: AnomalyType.CROWD_FORMATION,
        confidence: exceedanceConfidence(count, crowdThreshold),
        source: { kind: 'location', location, streamId: history.streamId },
        detectedAt: at,
        location,
        description: `${count} tracks gathered at ${location} within ${formatDuration(riseMs)}`,
        evidence: {
          count,
          threshold: crowdThreshold,
          lowWatermark: crowdLowWatermark,
          lowUntil,
          riseMs,
          trackIds: [...present.keys()].sort(),
        },
      });
    }
  }
  return candidates;
}
