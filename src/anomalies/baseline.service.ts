import { Injectable, Logger } from '@nestjs/common';
import { Track } from '../tracking/interfaces/track.interface';
import { longestDwell } from './detectors/loitering.detector';
import { movementSamples } from './detectors/unusual-movement.detector';
import {
  BaselineSnapshot,
  CameraMovementBaseline,
  MovementMetric,
  MovementStats,
} from './interfaces/anomaly.interface';

export const DWELL_WINDOW = 50;

/**
 * Welford running mean and variance
 */
class RunningStats {
  private n = 0;
  private mean = 0;
  private m2 = 0;

  add(value: number): void {
    this.n++;
    const delta = value - this.mean;
    this.mean += delta / this.n;
    this.m2 += delta * (value - this.mean);
  }

  toStats(): MovementStats {
    return {
      count: this.n,
      mean: this.mean,
      stdDev: this.n > 1 ? Math.sqrt(this.m2 / (this.n - 1)) : 0,
    };
  }
}

/**
 * Per-location dwell and per-camera movement baselines, learned from
 * closed tracks that raised nothing
 */
@Injectable()
export class BaselineService {
  private readonly logger = new Logger(BaselineService.name);
  private readonly dwell = new Map<string, number[]>();
  private readonly movement = new Map<string, Record<MovementMetric, RunningStats>>();

  recordDwell(location: string, dwellMs: number): void {
    if (!(dwellMs > 0)) return;
    const samples = this.dwell.get(location) ?? [];
    samples.push(dwellMs);
    if (samples.length > DWELL_WINDOW) {
      samples.splice(0, samples.length - DWELL_WINDOW);
    }
    this.dwell.set(location, samples);
  }

  /**
   * Replace a location's dwell history with an operator-supplied average
   */
  seedDwell(location: string, averageMs: number): number {
    if (!(averageMs > 0)) {
      throw new Error(`Dwell baseline must be positive, got ${averageMs}`);
    }
    this.dwell.set(location, [averageMs]);
    this.logger.log(`Seeded dwell baseline for ${location}: ${averageMs}ms`);
    return averageMs;
  }

  recordMovement(cameraId: string, metric: MovementMetric, value: number): void {
    let stats = this.movement.get(cameraId);
    if (!stats) {
      stats = { speed: new RunningStats(), turn_rate: new RunningStats() };
      this.movement.set(cameraId, stats);
    }
    stats[metric].add(value);
  }

  /**
   * Feed a closed track's dwell and movement into the baselines
   */
  learnFromTrack(track: Track, loiterRadius: number): void {
    const dwell = longestDwell(track.observations, loiterRadius);
    if (dwell) {
      this.recordDwell(dwell.location, dwell.durationMs);
    }
    for (const sample of movementSamples(track.observations)) {
      this.recordMovement(sample.cameraId, sample.metric, sample.value);
    }
  }

  averageDwell(location: string): number | undefined {
    const samples = this.dwell.get(location);
    if (!samples || samples.length === 0) return undefined;
    return samples.reduce((sum, value) => sum + value, 0) / samples.length;
  }

  snapshot(): BaselineSnapshot {
    const dwellMs = new Map<string, number>();
    for (const location of this.dwell.keys()) {
      const average = this.averageDwell(location);
      if (average !== undefined) dwellMs.set(location, average);
    }

    const movement = new Map<string, CameraMovementBaseline>();
    for (const [cameraId, stats] of this.movement) {
      movement.set(
        cameraId,
        Object.freeze({
          speed: stats.speed.toStats(),
          turn_rate: stats.turn_rate.toStats(),
        }),
      );
    }
    return { dwellMs, movement };
  }

  /**
   * Plain-object view for the HTTP layer
   */
  describe() {
    const { dwellMs, movement } = this.snapshot();
    return {
      dwell: [...dwellMs].map(([location, averageMs]) => ({
        location,
        averageMs,
        samples: this.dwell.get(location)?.length ?? 0,
      })),
      movement: [...movement].map(([cameraId, stats]) => ({ cameraId, ...stats })),
    };
  }
}
