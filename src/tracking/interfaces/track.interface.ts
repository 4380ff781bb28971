import { Point2D } from '../../common/utils/vector-math';

/**
 * An entity sighting from the external detector
 */
export interface Detection {
  cameraId: string;
  /** Epoch ms */
  timestamp: number;
  position: Point2D;
  /** Appearance descriptor; compared by cosine similarity */
  appearance: number[];
  segmentId?: string;
  /** Defaults to the camera id */
  location?: string;
}

/**
 * A stationary object sighting (bag, parcel) from the external detector
 */
export interface StationaryObjectDetection {
  objectId: string;
  cameraId: string;
  timestamp: number;
  position: Point2D;
  ownerTrackId?: string;
  segmentId?: string;
  location?: string;
}

export type CorrelatorInput =
  | ({ kind: 'detection' } & Detection)
  | ({ kind: 'object' } & StationaryObjectDetection);

export interface TrackObservation {
  segmentId?: string;
  cameraId: string;
  location: string;
  timestamp: number;
  position: Point2D;
  /** Appearance similarity of the match; 1 for the opening detection */
  similarity: number;
}

export interface CameraHandoff {
  fromCameraId: string;
  toCameraId: string;
  /** Time of the first detection on the new camera */
  at: number;
  gapMs: number;
}

export type TrackState = 'open' | 'closed';

/**
 * Read-only view of a track. Closed tracks never change again.
 */
export interface Track {
  id: string;
  streamId: string;
  state: TrackState;
  observations: readonly TrackObservation[];
  handoffs: readonly CameraHandoff[];
  /** Mean appearance similarity of the detections that extended the track */
  confidence: number;
  /** Running mean appearance descriptor */
  appearance: readonly number[];
  openedAt: number;
  lastSeenAt: number;
  closedAt?: number;
}

export interface StationaryObject {
  objectId: string;
  streamId: string;
  cameraId: string;
  location: string;
  position: Point2D;
  firstSeenAt: number;
  lastSeenAt: number;
  ownerTrackId?: string;
  sightings: number;
}

export interface TrackingConfig {
  reorderGraceMs: number;
  similarityThreshold: number;
  /** Position units per second */
  maxSpeed: number;
  positionTolerance: number;
  maxHandoffDelayMs: number;
  trackTimeoutMs: number;
  ownerAssociationRadius: number;
}

/**
 * What one ingest or flush changed
 */
export interface CorrelatorUpdate {
  streamId: string;
  released: number;
  dropped: number;
  buffered: number;
  tracksOpened: string[];
  tracksExtended: string[];
  tracksClosed: string[];
  objectsUpdated: string[];
  /** Stream data clock after the update, epoch ms */
  clock: number | null;
}
