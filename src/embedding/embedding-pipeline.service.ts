import { HttpException, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  EmbeddingServiceError,
  FailureContext,
  PermanentExternalError,
  TransientExternalError,
} from '../common/errors/pipeline.errors';
import { Semaphore } from '../common/utils/concurrency';
import { errorMessage, errorStack } from '../common/utils/errors';
import {
  executeWithRetry,
  OperationTimeoutError,
  raceAbort,
  RetryExhaustedError,
} from '../common/utils/retry';
import { isFiniteVector, l2Norm, normalize } from '../common/utils/vector-math';
import { getNumber } from '../config/config.helpers';
import {
  EMBEDDING_PROVIDER,
  EmbeddingInput,
  IEmbeddingProvider,
} from '../providers/interfaces';
import { Segment } from '../segments/interfaces/segment.interface';
import { EmbeddingCache } from './embedding-cache';
import {
  digestContent,
  fingerprintContent,
  fingerprintQuery,
  normalizeQueryText,
} from './fingerprint';
import {
  EmbeddingVector,
  QUERY_EMBEDDING_CACHE,
  SEGMENT_EMBEDDING_CACHE,
} from './interfaces/embedding-cache.interface';

/**
 * Raw segment content as delivered by the segmentation step
 */
export interface SegmentContent {
  data: Buffer;
  mimeType: string;
}

export interface SegmentEmbedding {
  vector: EmbeddingVector;
  fingerprint: string;
  cacheHit: boolean;
  coalesced: boolean;
  latencyMs: number;
}

export interface QueryEmbedding {
  vector: EmbeddingVector;
  normalizedText: string;
  cacheHit: boolean;
  latencyMs: number;
}

function isTransient(error: unknown): boolean {
  if (error instanceof OperationTimeoutError) {
    return true;
  }
  return error instanceof EmbeddingServiceError && error.kind === 'transient';
}

/**
 * Turns segment content and query text into normalized vectors, paying
 * for an external call only on a cache miss.
 *
 * External calls share one semaphore, get a per-attempt timeout and are
 * retried with exponential backoff while the failure is transient.
 */
@Injectable()
export class EmbeddingPipelineService {
  private readonly logger = new Logger(EmbeddingPipelineService.name);
  private readonly dimension: number;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly retryBaseDelayMs: number;
  private readonly externalCalls: Semaphore;

  constructor(
    @Inject(EMBEDDING_PROVIDER)
    private readonly provider: IEmbeddingProvider,
    @Inject(SEGMENT_EMBEDDING_CACHE)
    private readonly segmentCache: EmbeddingCache,
    @Inject(QUERY_EMBEDDING_CACHE)
    private readonly queryCache: EmbeddingCache,
    private readonly configService: ConfigService,
  ) {
    this.dimension = getNumber(this.configService, 'EMBEDDING_DIMENSION', 1024);
    this.timeoutMs = getNumber(this.configService, 'EMBEDDING_TIMEOUT_MS', 30000);
    this.maxAttempts = getNumber(this.configService, 'EMBEDDING_MAX_ATTEMPTS', 3);
    this.retryBaseDelayMs = getNumber(
      this.configService,
      'EMBEDDING_RETRY_BASE_DELAY_MS',
      500,
    );
    this.externalCalls = new Semaphore(
      getNumber(this.configService, 'EMBEDDING_MAX_CONCURRENCY', 4),
    );
  }

  getDimension(): number {
    return this.dimension;
  }

  /**
   * Embed one segment's content, keyed by its content fingerprint
   */
  async embedSegment(
    segment: Segment,
    content: SegmentContent,
  ): Promise<SegmentEmbedding> {
    const startTime = Date.now();

    if (content.data.length === 0) {
      throw new PermanentExternalError('Segment content is empty', {
        segmentId: segment.id,
      });
    }

    const fingerprint = fingerprintContent(content.data);
    const context: FailureContext = { segmentId: segment.id, fingerprint };
    const input: EmbeddingInput = content.mimeType.startsWith('text/')
      ? { kind: 'text', text: content.data.toString('utf8') }
      : { kind: 'media', data: content.data, mimeType: content.mimeType };

    const outcome = await this.segmentCache.getOrComputeDetailed(
      fingerprint,
      () => this.callProvider(input, context),
      { contentDigest: digestContent(content.data), context },
    );

    const latencyMs = Date.now() - startTime;
    this.logger.debug(
      `Segment ${segment.id} embedding ${outcome.cacheHit ? 'hit' : 'miss'}${
        outcome.coalesced ? ' (coalesced)' : ''
      } in ${latencyMs}ms`,
    );
    return { ...outcome, fingerprint, latencyMs };
  }

  /**
   * Embed query text. Equivalent phrasings that differ only in case or
   * whitespace share one cache entry.
   */
  async embedQuery(
    text: string,
    queryId: string,
    signal?: AbortSignal,
  ): Promise<QueryEmbedding> {
    const startTime = Date.now();
    const normalizedText = normalizeQueryText(text);
    if (normalizedText === '') {
      throw new PermanentExternalError('Query text is empty', { queryId });
    }

    const fingerprint = fingerprintQuery(normalizedText);
    const context: FailureContext = { queryId, fingerprint };

    // a cancelled caller stops waiting; the shared compute keeps going
    const outcome = await raceAbort(
      this.queryCache.getOrComputeDetailed(
        fingerprint,
        () => this.callProvider({ kind: 'text', text: normalizedText }, context),
        { context },
      ),
      signal,
      'Query embedding',
    );

    const latencyMs = Date.now() - startTime;
    this.logger.debug(
      `Query ${queryId} embedding ${outcome.cacheHit ? 'hit' : 'miss'} in ${latencyMs}ms`,
    );
    return {
      vector: outcome.vector,
      normalizedText,
      cacheHit: outcome.cacheHit,
      latencyMs,
    };
  }

  private async callProvider(
    input: EmbeddingInput,
    context: FailureContext,
  ): Promise<EmbeddingVector> {
    if (!this.provider.supportsInput(input)) {
      throw new PermanentExternalError(
        `Provider ${this.provider.getProviderName()} cannot embed ${
          input.kind === 'media' ? input.mimeType : 'text'
        } content`,
        context,
      );
    }

    const startTime = Date.now();
    try {
      const raw = await this.externalCalls.run(() =>
        executeWithRetry(
          (signal) =>
            this.provider.embed(input, { dimension: this.dimension, signal }),
          {
            maxAttempts: this.maxAttempts,
            baseDelayMs: this.retryBaseDelayMs,
            timeoutMs: this.timeoutMs,
            operationName: 'Embedding request',
            isRetryable: isTransient,
            onRetry: (attempt, delayMs, error) =>
              this.logger.warn(
                `Embedding request failed (attempt ${attempt}/${this.maxAttempts}): ${errorMessage(error)}. Retrying in ${Math.round(delayMs)}ms...`,
              ),
          },
        ),
      );

      this.logger.debug(
        `Embedding request completed in ${Date.now() - startTime}ms`,
      );
      return this.validateVector(raw, context);
    } catch (error) {
      throw this.toPipelineError(error, context);
    }
  }

  private validateVector(
    raw: number[],
    context: FailureContext,
  ): EmbeddingVector {
    if (raw.length !== this.dimension) {
      throw new PermanentExternalError(
        `Embedding has ${raw.length} dimensions, expected ${this.dimension}`,
        context,
      );
    }
    if (!isFiniteVector(raw) || l2Norm(raw) === 0) {
      throw new PermanentExternalError(
        'Embedding contains non-finite values or is all zeros',
        context,
      );
    }
    return normalize(raw);
  }

  private toPipelineError(error: unknown, context: FailureContext): Error {
    if (error instanceof HttpException) {
      return error;
    }

    if (error instanceof RetryExhaustedError) {
      this.logger.error(
        `Embedding failed after ${error.attempts} attempts: ${errorMessage(error.lastError)}`,
      );
      return new TransientExternalError(
        errorMessage(error.lastError),
        context,
        error.attempts,
      );
    }

    this.logger.error(
      `Embedding failed permanently: ${errorMessage(error)}`,
      errorStack(error),
    );
    return new PermanentExternalError(errorMessage(error), context);
  }
}
