import { Logger } from '@nestjs/common';
import { cosineSimilarity, distance } from '../common/utils/vector-math';
import {
  CameraHandoff,
  CorrelatorInput,
  CorrelatorUpdate,
  Detection,
  StationaryObject,
  StationaryObjectDetection,
  Track,
  TrackingConfig,
  TrackObservation,
} from './interfaces/track.interface';
import { ReorderBuffer } from './reorder-buffer';

interface MutableTrack {
  id: string;
  observations: TrackObservation[];
  handoffs: CameraHandoff[];
  appearance: number[];
  similaritySum: number;
  extensions: number;
  openedAt: number;
  lastSeenAt: number;
}

interface ChangeSet {
  opened: Set<string>;
  extended: Set<string>;
  closed: Set<string>;
  objects: Set<string>;
}

function lastOf<T>(items: readonly T[]): T | undefined {
  return items[items.length - 1];
}

/**
 * Correlates detections of one stream into tracks.
 *
 * Detections pass through a reorder buffer, then each one extends the open
 * track it matches best (appearance similarity plus a plausibility check
 * on the position jump or the camera handoff delay) or opens a new one.
 * Tracks close once the stream's data clock moves past their timeout, and
 * are frozen from then on.
 */
export class TrackCorrelator {
  private readonly logger: Logger;
  private readonly buffer: ReorderBuffer<CorrelatorInput>;
  private readonly openTracks = new Map<string, MutableTrack>();
  private readonly closedTracks = new Map<string, Track>();
  private readonly objects = new Map<string, StationaryObject>();
  private clock: number | null = null;
  private sequence = 0;

  constructor(
    readonly streamId: string,
    private readonly config: TrackingConfig,
  ) {
    this.logger = new Logger(`TrackCorrelator:${streamId}`);
    this.buffer = new ReorderBuffer(config.reorderGraceMs);
  }

  ingest(inputs: CorrelatorInput[]): CorrelatorUpdate {
    const droppedBefore = this.buffer.dropped;
    for (const input of inputs) {
      if (!this.buffer.push(input)) {
        this.logger.warn(
          `Dropped late ${input.kind} from ${input.cameraId} at ${new Date(input.timestamp).toISOString()}`,
        );
      }
    }
    return this.process(this.buffer.drain(), this.buffer.dropped - droppedBefore);
  }

  /**
   * Release everything still buffered, then move the data clock to `now`
   * so tracks of a camera that went quiet can close. Without `now` the
   * clock moves just past the track timeout and every open track closes.
   */
  flush(now?: number): CorrelatorUpdate {
    return this.process(this.buffer.flush(), 0, { now });
  }

  getTracks(): Track[] {
    return [
      ...[...this.openTracks.values()].map((track) => this.snapshot(track, null)),
      ...this.closedTracks.values(),
    ];
  }

  getTrack(id: string): Track | undefined {
    const open = this.openTracks.get(id);
    return open ? this.snapshot(open, null) : this.closedTracks.get(id);
  }

  getObjects(): StationaryObject[] {
    return [...this.objects.values()];
  }

  getClock(): number | null {
    return this.clock;
  }

  get droppedTotal(): number {
    return this.buffer.dropped;
  }

  get bufferedCount(): number {
    return this.buffer.size;
  }

  private process(
    released: CorrelatorInput[],
    dropped: number,
    endOfInput?: { now?: number },
  ): CorrelatorUpdate {
    const changes: ChangeSet = {
      opened: new Set(),
      extended: new Set(),
      closed: new Set(),
      objects: new Set(),
    };

    for (const input of released) {
      this.clock =
        this.clock === null ? input.timestamp : Math.max(this.clock, input.timestamp);
      this.closeStale(this.clock, changes);

      if (input.kind === 'detection') {
        this.correlate(input, changes);
      } else {
        this.recordObject(input, changes);
      }
    }

    if (endOfInput && this.clock !== null) {
      this.clock = Math.max(
        this.clock,
        endOfInput.now ?? this.clock + this.config.trackTimeoutMs + 1,
      );
      this.closeStale(this.clock, changes);
    }

    return {
      streamId: this.streamId,
      released: released.length,
      dropped,
      buffered: this.buffer.size,
      tracksOpened: [...changes.opened],
      tracksExtended: [...changes.extended].filter((id) => !changes.opened.has(id)),
      tracksClosed: [...changes.closed],
      objectsUpdated: [...changes.objects],
      clock: this.clock,
    };
  }

  private correlate(detection: Detection, changes: ChangeSet): void {
    let best: { track: MutableTrack; similarity: number } | null = null;

    for (const track of this.openTracks.values()) {
      if (track.appearance.length !== detection.appearance.length) continue;

      const similarity = cosineSimilarity(track.appearance, detection.appearance);
      if (similarity < this.config.similarityThreshold) continue;
      if (!this.isPlausible(track, detection)) continue;

      if (
        !best ||
        similarity > best.similarity ||
        (similarity === best.similarity && track.id < best.track.id)
      ) {
        best = { track, similarity };
      }
    }

    if (best) {
      this.extend(best.track, detection, best.similarity);
      changes.extended.add(best.track.id);
    } else {
      const track = this.open(detection);
      changes.opened.add(track.id);
    }
  }

  /**
   * Same camera: the jump must be reachable at the maximum speed.
   * Another camera: the handoff gap must be short enough.
   */
  private isPlausible(track: MutableTrack, detection: Detection): boolean {
    const last = lastOf(track.observations);
    if (!last) return false;

    const elapsedMs = detection.timestamp - last.timestamp;
    if (elapsedMs < 0) return false;

    if (last.cameraId === detection.cameraId) {
      // one detection per instant per camera
      if (elapsedMs === 0) return false;
      const reachable =
        (this.config.maxSpeed * elapsedMs) / 1000 + this.config.positionTolerance;
      return distance(last.position, detection.position) <= reachable;
    }

    return elapsedMs <= this.config.maxHandoffDelayMs;
  }

  private open(detection: Detection): MutableTrack {
    this.sequence++;
    const track: MutableTrack = {
      id: `${this.streamId}:trk-${this.sequence}`,
      observations: [this.observe(detection, 1)],
      handoffs: [],
      appearance: [...detection.appearance],
      similaritySum: 0,
      extensions: 0,
      openedAt: detection.timestamp,
      lastSeenAt: detection.timestamp,
    };
    this.openTracks.set(track.id, track);
    this.logger.debug(`Opened track ${track.id} on ${detection.cameraId}`);
    return track;
  }

  private extend(track: MutableTrack, detection: Detection, similarity: number): void {
    const last = lastOf(track.observations);
    if (last && last.cameraId !== detection.cameraId) {
      track.handoffs.push({
        fromCameraId: last.cameraId,
        toCameraId: detection.cameraId,
        at: detection.timestamp,
        gapMs: detection.timestamp - last.timestamp,
      });
      this.logger.debug(
        `Track ${track.id} handed off ${last.cameraId} → ${detection.cameraId}`,
      );
    }

    const count = track.observations.length;
    track.appearance = track.appearance.map(
      (value, i) => (value * count + detection.appearance[i]) / (count + 1),
    );
    track.observations.push(this.observe(detection, similarity));
    track.similaritySum += similarity;
    track.extensions++;
    track.lastSeenAt = detection.timestamp;
  }

  private closeStale(now: number, changes: ChangeSet): void {
    for (const track of [...this.openTracks.values()]) {
      if (now - track.lastSeenAt <= this.config.trackTimeoutMs) continue;

      const closedAt = track.lastSeenAt + this.config.trackTimeoutMs;
      this.openTracks.delete(track.id);
      this.closedTracks.set(track.id, this.snapshot(track, closedAt));
      changes.closed.add(track.id);
      this.logger.debug(
        `Closed track ${track.id} after ${track.observations.length} observations`,
      );
    }
  }

  private recordObject(sighting: StationaryObjectDetection, changes: ChangeSet): void {
    const existing = this.objects.get(sighting.objectId);
    const location = sighting.location ?? sighting.cameraId;

    const updated: StationaryObject = existing
      ? {
          ...existing,
          cameraId: sighting.cameraId,
          location,
          position: { ...sighting.position },
          lastSeenAt: Math.max(existing.lastSeenAt, sighting.timestamp),
          ownerTrackId: existing.ownerTrackId ?? sighting.ownerTrackId,
          sightings: existing.sightings + 1,
        }
      : {
          objectId: sighting.objectId,
          streamId: this.streamId,
          cameraId: sighting.cameraId,
          location,
          position: { ...sighting.position },
          firstSeenAt: sighting.timestamp,
          lastSeenAt: sighting.timestamp,
          ownerTrackId: sighting.ownerTrackId ?? this.nearestOwner(sighting),
          sightings: 1,
        };

    this.objects.set(sighting.objectId, Object.freeze(updated));
    changes.objects.add(sighting.objectId);
  }

  /**
   * Nearest open track last seen on the same camera within the
   * association radius
   */
  private nearestOwner(sighting: StationaryObjectDetection): string | undefined {
    let best: { id: string; distance: number } | undefined;

    for (const track of this.openTracks.values()) {
      const last = lastOf(track.observations);
      if (!last || last.cameraId !== sighting.cameraId) continue;

      const gap = distance(last.position, sighting.position);
      if (gap > this.config.ownerAssociationRadius) continue;
      if (!best || gap < best.distance) {
        best = { id: track.id, distance: gap };
      }
    }
    return best?.id;
  }

  private observe(detection: Detection, similarity: number): TrackObservation {
    const observation: TrackObservation = {
      segmentId: detection.segmentId,
      cameraId: detection.cameraId,
      location: detection.location ?? detection.cameraId,
      timestamp: detection.timestamp,
      position: Object.freeze({ ...detection.position }),
      similarity,
    };
    return Object.freeze(observation);
  }

  private snapshot(track: MutableTrack, closedAt: number | null): Track {
    const snapshot: Track = {
      id: track.id,
      streamId: this.streamId,
      state: closedAt === null ? 'open' : 'closed',
      observations: Object.freeze([...track.observations]),
      handoffs: Object.freeze(track.handoffs.map((h) => Object.freeze({ ...h }))),
      confidence: track.extensions === 0 ? 1 : track.similaritySum / track.extensions,
      appearance: Object.freeze([...track.appearance]),
      openedAt: track.openedAt,
      lastSeenAt: track.lastSeenAt,
      closedAt: closedAt ?? undefined,
    };
    return Object.freeze(snapshot);
  }
}
