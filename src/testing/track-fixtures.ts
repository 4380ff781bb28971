import { DEFAULT_ANOMALY_CONFIG } from '../anomalies/anomaly.config';
import {
  AnomalyConfig,
  CameraMovementBaseline,
  DetectionContext,
} from '../anomalies/interfaces/anomaly.interface';
import {
  StationaryObject,
  Track,
  TrackObservation,
} from '../tracking/interfaces/track.interface';

export const T0 = Date.UTC(2024, 2, 4, 12, 0, 0);
export const SECOND = 1000;
export const MINUTE = 60 * SECOND;

/** [cameraId, offset from T0 in ms, x, y, location?] */
export type Sighting = [string, number, number, number, string?];

export interface TrackFixtureOptions {
  streamId?: string;
  state?: 'open' | 'closed';
  closedAt?: number;
}

export function observation([cameraId, offsetMs, x, y, location]: Sighting): TrackObservation {
  return {
    cameraId,
    location: location ?? cameraId,
    timestamp: T0 + offsetMs,
    position: { x, y },
    similarity: 1,
  };
}

export function makeTrack(
  id: string,
  sightings: Sighting[],
  options: TrackFixtureOptions = {},
): Track {
  const observations = sightings.map(observation);
  const first = observations[0];
  const last = observations[observations.length - 1];
  const state = options.state ?? 'open';
  return Object.freeze({
    id,
    streamId: options.streamId ?? 'stream-1',
    state,
    observations,
    handoffs: [],
    confidence: 1,
    appearance: [1, 0, 0],
    openedAt: first.timestamp,
    lastSeenAt: last.timestamp,
    closedAt: state === 'closed' ? (options.closedAt ?? last.timestamp) : undefined,
  });
}

export function makeObject(
  objectId: string,
  overrides: Partial<StationaryObject> = {},
): StationaryObject {
  return {
    objectId,
    streamId: 'stream-1',
    cameraId: 'CAM-A',
    location: 'CAM-A',
    position: { x: 0, y: 0 },
    firstSeenAt: T0,
    lastSeenAt: T0,
    sightings: 1,
    ...overrides,
  };
}

export interface ContextFixture {
  now: number;
  config?: Partial<AnomalyConfig>;
  dwellMs?: Record<string, number>;
  movement?: Record<string, CameraMovementBaseline>;
}

export function makeContext(fixture: ContextFixture): DetectionContext {
  return {
    now: fixture.now,
    config: { ...DEFAULT_ANOMALY_CONFIG, ...fixture.config },
    baselines: {
      dwellMs: new Map(Object.entries(fixture.dwellMs ?? {})),
      movement: new Map(Object.entries(fixture.movement ?? {})),
    },
  };
}

/**
 * Sightings every `stepMs` on one camera, alternating slightly in x
 */
export function lingering(
  cameraId: string,
  fromMs: number,
  toMs: number,
  stepMs: number,
  location?: string,
): Sighting[] {
  const sightings: Sighting[] = [];
  for (let at = fromMs, i = 0; at <= toMs; at += stepMs, i++) {
    sightings.push([cameraId, at, (i % 2) * 0.5, 0, location]);
  }
  return sightings;
}
