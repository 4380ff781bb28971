import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Segment } from '../segments/interfaces/segment.interface';
import {
  StationaryObject,
  Track,
} from '../tracking/interfaces/track.interface';
import { loadAnomalyConfig } from './anomaly.config';
import { AnomalyStoreService } from './anomaly-store.service';
import { BaselineService } from './baseline.service';
import {
  detectAbandonment,
  detectAfterHoursSegment,
  detectAfterHoursTracks,
  detectCrowdFormation,
  detectLoitering,
  detectUnusualMovement,
} from './detectors';
import {
  Anomaly,
  AnomalyConfig,
  AnomalyType,
  DetectionContext,
} from './interfaces/anomaly.interface';

export interface StreamEvaluation {
  streamId: string;
  tracks: readonly Track[];
  objects: readonly StationaryObject[];
  /** Stream data clock, epoch ms */
  now: number;
}

const BASELINE_EXCLUDED: readonly AnomalyType[] = [
  AnomalyType.LOITERING,
  AnomalyType.UNUSUAL_MOVEMENT,
];

/**
 * Runs every detector over a stream snapshot, appends what is new and
 * then learns baselines from tracks that closed without raising anything
 * that would skew them.
 */
@Injectable()
export class AnomalyEngineService {
  private readonly logger = new Logger(AnomalyEngineService.name);
  private readonly config: AnomalyConfig;
  private readonly learnedTracks = new Set<string>();
  private evaluations = 0;

  constructor(
    private readonly store: AnomalyStoreService,
    private readonly baselines: BaselineService,
    private readonly configService: ConfigService,
  ) {
    this.config = loadAnomalyConfig(this.configService);
  }

  evaluateStream(evaluation: StreamEvaluation): Anomaly[] {
    const startTime = Date.now();
    const { tracks, objects } = evaluation;
    const ctx = this.context(evaluation.now);

    const created = this.store.append([
      ...detectLoitering(tracks, ctx),
      ...detectCrowdFormation(tracks, ctx),
      ...detectAbandonment(objects, tracks, ctx),
      ...detectAfterHoursTracks(tracks, ctx),
      ...detectUnusualMovement(tracks, ctx),
    ]);

    this.learnFromClosedTracks(tracks);
    this.evaluations++;

    this.logger.debug(
      `Evaluated stream ${evaluation.streamId} (${tracks.length} tracks, ${objects.length} objects) in ${Date.now() - startTime}ms: ${created.length} new anomalies`,
    );
    return created;
  }

  recordSegment(segment: Segment): Anomaly[] {
    return this.store.append(
      detectAfterHoursSegment(segment, this.context(segment.timestamp)),
    );
  }

  getConfig(): AnomalyConfig {
    return this.config;
  }

  stats() {
    return {
      evaluations: this.evaluations,
      anomalies: this.store.count(),
      byStatus: this.store.countsByStatus(),
      learnedTracks: this.learnedTracks.size,
    };
  }

  private context(now: number): DetectionContext {
    return { now, config: this.config, baselines: this.baselines.snapshot() };
  }

  private learnFromClosedTracks(tracks: readonly Track[]): void {
    for (const track of tracks) {
      if (track.state !== 'closed' || this.learnedTracks.has(track.id)) continue;
      this.learnedTracks.add(track.id);

      if (this.store.hasAnomalyForTrack(track.id, BASELINE_EXCLUDED)) {
        this.logger.debug(`Track ${track.id} left out of baselines`);
        continue;
      }
      this.baselines.learnFromTrack(track, this.config.loiterRadius);
    }
  }
}
