import { distance } from '../../common/utils/vector-math';
import {
  StationaryObject,
  Track,
  TrackObservation,
} from '../../tracking/interfaces/track.interface';
import {
  AnomalyCandidate,
  AnomalyType,
  DetectionContext,
} from '../interfaces/anomaly.interface';
import { formatDuration } from './detector.utils';

/**
 * Start of the owner's current separation from the object, or undefined
 * while the owner is still beside it. An ended owner track counts as
 * separated from its last sighting.
 */
export function separatedSince(
  object: StationaryObject,
  owner: Track,
  maxDistance: number,
): number | undefined {
  const isApart = (observation: TrackObservation) =>
    observation.cameraId !== object.cameraId ||
    distance(observation.position, object.position) > maxDistance;

  let since: number | undefined;
  for (const observation of owner.observations) {
    if (observation.timestamp < object.firstSeenAt) continue;
    if (isApart(observation)) {
      since ??= observation.timestamp;
    } else {
      since = undefined;
    }
  }

  if (since === undefined && owner.state === 'closed') {
    return Math.max(owner.lastSeenAt, object.firstSeenAt);
  }
  return since;
}

/**
 * Objects still being sighted while their owner has been apart for at
 * least the abandonment duration
 */
export function detectAbandonment(
  objects: readonly StationaryObject[],
  tracks: readonly Track[],
  ctx: DetectionContext,
): AnomalyCandidate[] {
  const { abandonDistance, abandonDurationMs } = ctx.config;
  const tracksById = new Map(tracks.map((track) => [track.id, track]));
  const candidates: AnomalyCandidate[] = [];

  for (const object of objects) {
    if (!object.ownerTrackId) continue;
    const owner = tracksById.get(object.ownerTrackId);
    if (!owner) continue;

    const since = separatedSince(object, owner, abandonDistance);
    if (since === undefined) continue;

    const unattendedMs = object.lastSeenAt - since;
    if (unattendedMs < abandonDurationMs) continue;

    const excess =
      abandonDurationMs > 0
        ? Math.min(1, (unattendedMs - abandonDurationMs) / abandonDurationMs)
        : 1;

    candidates.push({
      dedupeKey: `abandon:${object.objectId}:${owner.id}`,
      type: AnomalyType.OBJECT_ABANDONMENT,
      confidence: 0.6 + 0.4 * excess,
      source: { kind: 'track', trackId: owner.id, streamId: owner.streamId },
      detectedAt: since + abandonDurationMs,
      cameraId: object.cameraId,
      location: object.location,
      description: `Object ${object.objectId} left unattended at ${object.location} for ${formatDuration(unattendedMs)}`,
      evidence: {
        objectId: object.objectId,
        ownerTrackId: owner.id,
        separatedSince: since,
        unattendedMs,
        ownerTrackClosed: owner.state === 'closed',
      },
    });
  }
  return candidates;
}
