import {
  HttpException,
  HttpStatus,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
  Inject,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AnomalyEngineService } from '../anomalies/anomaly-engine.service';
import { IndexCapacityError } from '../common/errors/pipeline.errors';
import { parallelMap } from '../common/utils/concurrency';
import { errorMessage, errorStack } from '../common/utils/errors';
import { getNumber } from '../config/config.helpers';
import {
  EmbeddingPipelineService,
  SegmentContent,
} from '../embedding/embedding-pipeline.service';
import { EmbeddingVector } from '../embedding/interfaces/embedding-cache.interface';
import {
  IndexPoint,
  VECTOR_INDEX,
  VectorIndex,
} from '../vector-index/interfaces/vector-index.interface';
import {
  BatchItemResult,
  IndexSegmentResult,
  RemoveSegmentResult,
  RetryQueueResult,
  Segment,
  segmentEndTime,
} from './interfaces/segment.interface';
import { SegmentRegistryService } from './segment-registry.service';

export interface SegmentIndexRequest {
  segment: Segment;
  content: SegmentContent;
}

interface PendingInsert {
  segment: Segment;
  point: IndexPoint;
  fingerprint: string;
  queuedAt: number;
}

export function toIndexPoint(
  pointId: string,
  segment: Segment,
  vector: EmbeddingVector,
): IndexPoint {
  return {
    id: pointId,
    vector: [...vector],
    metadata: {
      segmentId: segment.id,
      videoId: segment.videoId,
      cameraId: segment.cameraId,
      location: segment.location,
      startTime: segment.timestamp,
      endTime: segmentEndTime(segment),
      hasFaces: segment.contentFlags.hasFaces,
      hasVehicles: segment.contentFlags.hasVehicles,
      motionDetected: segment.contentFlags.motionDetected,
    },
  };
}

/**
 * Write path: embed a segment, insert its point, register it.
 *
 * A full index does not lose work: the embedded point is queued and
 * re-inserted by a timer or on demand, without another embedding call.
 */
@Injectable()
export class SegmentIndexService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SegmentIndexService.name);
  private readonly retryQueue = new Map<string, PendingInsert>();
  private readonly concurrency: number;
  private readonly retryIntervalMs: number;
  private retryTimer: NodeJS.Timeout | null = null;
  private draining: Promise<RetryQueueResult> | null = null;

  constructor(
    private readonly embeddingPipeline: EmbeddingPipelineService,
    @Inject(VECTOR_INDEX) private readonly vectorIndex: VectorIndex,
    private readonly registry: SegmentRegistryService,
    private readonly anomalyEngine: AnomalyEngineService,
    private readonly configService: ConfigService,
  ) {
    this.concurrency = getNumber(this.configService, 'INGEST_CONCURRENCY', 4);
    this.retryIntervalMs = getNumber(
      this.configService,
      'INGEST_RETRY_INTERVAL_MS',
      60000,
    );
  }

  onModuleInit() {
    if (this.retryIntervalMs <= 0) {
      return;
    }
    this.retryTimer = setInterval(() => {
      if (this.retryQueue.size === 0) return;
      this.retryQueued().catch((error: unknown) =>
        this.logger.error(
          `Scheduled retry failed: ${errorMessage(error)}`,
          errorStack(error),
        ),
      );
    }, this.retryIntervalMs);
    this.retryTimer.unref();
  }

  onModuleDestroy() {
    if (this.retryTimer) {
      clearInterval(this.retryTimer);
      this.retryTimer = null;
    }
  }

  /**
   * Index one segment. Re-indexing replaces the segment's existing point.
   */
  async indexSegment(
    segment: Segment,
    content: SegmentContent,
  ): Promise<IndexSegmentResult> {
    const startTime = Date.now();
    this.logger.log(
      `Indexing segment ${segment.id} (${segment.cameraId}, ${content.data.length} bytes)`,
    );

    const embedding = await this.embeddingPipeline.embedSegment(
      segment,
      content,
    );
    const pointId = this.registry.pointIdFor(segment.id);
    const point = toIndexPoint(pointId, segment, embedding.vector);

    try {
      await this.vectorIndex.insert(point);
    } catch (error) {
      if (error instanceof IndexCapacityError) {
        this.retryQueue.set(segment.id, {
          segment,
          point,
          fingerprint: embedding.fingerprint,
          queuedAt: Date.now(),
        });
        this.logger.warn(
          `Index full, segment ${segment.id} queued for retry (${this.retryQueue.size} waiting)`,
        );
        throw error.queued();
      }
      throw error;
    }

    this.retryQueue.delete(segment.id);
    this.onIndexed(segment, pointId, embedding.fingerprint);
    const latencyMs = Date.now() - startTime;
    this.logger.log(
      `Segment ${segment.id} indexed as ${pointId} in ${latencyMs}ms (cache ${
        embedding.cacheHit ? 'hit' : 'miss'
      })`,
    );

    return {
      status: 'indexed',
      segmentId: segment.id,
      pointId,
      fingerprint: embedding.fingerprint,
      cacheHit: embedding.cacheHit,
      latencyMs,
    };
  }

  /**
   * Index many segments with bounded concurrency. One failure does not
   * fail the batch; results keep the request order.
   */
  async indexBatch(requests: SegmentIndexRequest[]): Promise<BatchItemResult[]> {
    const startTime = Date.now();
    const results = await parallelMap(
      requests,
      async ({ segment, content }): Promise<BatchItemResult> => {
        const itemStart = Date.now();
        try {
          return await this.indexSegment(segment, content);
        } catch (error) {
          if (error instanceof IndexCapacityError) {
            return {
              status: 'queued',
              segmentId: segment.id,
              pointId: this.registry.pointIdFor(segment.id),
              fingerprint: this.retryQueue.get(segment.id)?.fingerprint ?? '',
              cacheHit: false,
              latencyMs: Date.now() - itemStart,
            };
          }
          this.logger.error(
            `Failed to index segment ${segment.id}: ${errorMessage(error)}`,
          );
          return {
            status: 'failed',
            segmentId: segment.id,
            error: errorMessage(error),
            statusCode:
              error instanceof HttpException
                ? error.getStatus()
                : HttpStatus.INTERNAL_SERVER_ERROR,
          };
        }
      },
      this.concurrency,
    );

    const indexed = results.filter((r) => r.status === 'indexed').length;
    this.logger.log(
      `Batch of ${requests.length} segments: ${indexed} indexed in ${Date.now() - startTime}ms`,
    );
    return results;
  }

  /**
   * Re-insert queued points in arrival order. Stops at the first capacity
   * failure since the index is still full.
   */
  retryQueued(): Promise<RetryQueueResult> {
    if (!this.draining) {
      this.draining = this.drainRetryQueue().finally(() => {
        this.draining = null;
      });
    }
    return this.draining;
  }

  /**
   * Remove a segment's point, registration and any queued insert, then
   * let queued segments take the freed capacity
   */
  async removeSegment(segmentId: string): Promise<RemoveSegmentResult> {
    const registered = this.registry.get(segmentId);
    const dequeued = this.retryQueue.delete(segmentId);
    if (!registered && !dequeued) {
      throw new NotFoundException(`Segment ${segmentId} is not indexed`);
    }

    if (registered) {
      await this.vectorIndex.remove(registered.pointId);
    }
    this.registry.remove(segmentId);
    this.logger.log(
      `Removed segment ${segmentId}${registered ? ` (point ${registered.pointId})` : ''}${
        dequeued ? ' from the retry queue' : ''
      }`,
    );

    const retry =
      registered && this.retryQueue.size > 0 ? await this.retryQueued() : undefined;
    return { segmentId, pointId: registered?.pointId, dequeued, retry };
  }

  queuedCount(): number {
    return this.retryQueue.size;
  }

  private async drainRetryQueue(): Promise<RetryQueueResult> {
    const indexed: string[] = [];
    let attempted = 0;

    for (const [segmentId, pending] of [...this.retryQueue.entries()]) {
      attempted++;
      try {
        await this.vectorIndex.insert(pending.point);
      } catch (error) {
        if (error instanceof IndexCapacityError) {
          this.logger.warn(
            `Index still full, ${this.retryQueue.size} segments remain queued`,
          );
          break;
        }
        this.logger.error(
          `Retry of segment ${segmentId} failed: ${errorMessage(error)}`,
        );
        continue;
      }

      this.retryQueue.delete(segmentId);
      this.onIndexed(pending.segment, pending.point.id, pending.fingerprint);
      indexed.push(segmentId);
    }

    if (attempted > 0) {
      this.logger.log(
        `Retried ${attempted} queued segments, ${indexed.length} indexed`,
      );
    }
    return { attempted, indexed, remaining: this.retryQueue.size };
  }

  private onIndexed(segment: Segment, pointId: string, fingerprint: string) {
    this.registry.register(segment, pointId, fingerprint);
    this.anomalyEngine.recordSegment(segment);
  }
}
