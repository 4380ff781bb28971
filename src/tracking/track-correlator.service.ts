import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  CorrelatorInput,
  CorrelatorUpdate,
  StationaryObject,
  Track,
  TrackingConfig,
  TrackState,
} from './interfaces/track.interface';
import { TrackCorrelator } from './track-correlator';
import { loadTrackingConfig } from './tracking.config';

export interface TrackQuery {
  streamId?: string;
  cameraId?: string;
  state?: TrackState;
  /** Epoch ms; tracks last seen before this are excluded */
  from?: number;
  /** Epoch ms; tracks opened after this are excluded */
  to?: number;
}

/**
 * One correlator per logical stream. Streams share nothing, so no
 * locking is needed across them.
 */
@Injectable()
export class TrackCorrelatorService {
  private readonly logger = new Logger(TrackCorrelatorService.name);
  private readonly correlators = new Map<string, TrackCorrelator>();
  private readonly config: TrackingConfig;

  constructor(private readonly configService: ConfigService) {
    this.config = loadTrackingConfig(this.configService);
  }

  ingest(streamId: string, inputs: CorrelatorInput[]): CorrelatorUpdate {
    const update = this.correlatorFor(streamId).ingest(inputs);
    this.logger.debug(
      `Stream ${streamId}: ${inputs.length} received, ${update.released} released, ${update.buffered} buffered, ${update.dropped} dropped`,
    );
    return update;
  }

  flush(streamId: string, now?: number): CorrelatorUpdate {
    const update = this.correlatorFor(streamId).flush(now);
    this.logger.log(
      `Stream ${streamId} flushed: ${update.released} released, ${update.tracksClosed.length} tracks closed`,
    );
    return update;
  }

  /**
   * Tracks and stationary objects of one stream, as frozen snapshots
   */
  streamSnapshot(streamId: string): {
    tracks: Track[];
    objects: StationaryObject[];
    clock: number | null;
  } {
    const correlator = this.correlators.get(streamId);
    if (!correlator) {
      return { tracks: [], objects: [], clock: null };
    }
    return {
      tracks: correlator.getTracks(),
      objects: correlator.getObjects(),
      clock: correlator.getClock(),
    };
  }

  listTracks(query: TrackQuery = {}): Track[] {
    const correlators = query.streamId
      ? [this.correlators.get(query.streamId)]
      : [...this.correlators.values()];

    return correlators
      .flatMap((correlator) => (correlator ? correlator.getTracks() : []))
      .filter(
        (track) =>
          (query.state === undefined || track.state === query.state) &&
          (query.cameraId === undefined ||
            track.observations.some((o) => o.cameraId === query.cameraId)) &&
          (query.from === undefined || track.lastSeenAt >= query.from) &&
          (query.to === undefined || track.openedAt <= query.to),
      )
      .sort((a, b) => a.openedAt - b.openedAt || (a.id < b.id ? -1 : 1));
  }

  getTrack(trackId: string): Track | undefined {
    for (const correlator of this.correlators.values()) {
      const track = correlator.getTrack(trackId);
      if (track) return track;
    }
    return undefined;
  }

  listObjects(streamId?: string): StationaryObject[] {
    const correlators = streamId
      ? [this.correlators.get(streamId)]
      : [...this.correlators.values()];
    return correlators.flatMap((c) => (c ? c.getObjects() : []));
  }

  stats() {
    let open = 0;
    let closed = 0;
    let dropped = 0;
    let buffered = 0;
    for (const correlator of this.correlators.values()) {
      for (const track of correlator.getTracks()) {
        if (track.state === 'open') open++;
        else closed++;
      }
      dropped += correlator.droppedTotal;
      buffered += correlator.bufferedCount;
    }
    return {
      streams: this.correlators.size,
      openTracks: open,
      closedTracks: closed,
      droppedDetections: dropped,
      bufferedDetections: buffered,
    };
  }

  private correlatorFor(streamId: string): TrackCorrelator {
    let correlator = this.correlators.get(streamId);
    if (!correlator) {
      correlator = new TrackCorrelator(streamId, this.config);
      this.correlators.set(streamId, correlator);
      this.logger.log(`Started correlator for stream ${streamId}`);
    }
    return correlator;
  }
}
