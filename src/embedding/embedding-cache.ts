import { Logger } from '@nestjs/common';
import {
  CacheInconsistencyError,
  FailureContext,
} from '../common/errors/pipeline.errors';
import { errorMessage } from '../common/utils/errors';
import {
  EmbeddingCacheStats,
  EmbeddingCacheStore,
  EmbeddingVector,
} from './interfaces/embedding-cache.interface';

export interface EmbeddingCacheOptions {
  /** Used in logs and stats */
  name: string;
  ttlMs: number;
  store: EmbeddingCacheStore;
}

export interface GetOrComputeOptions {
  /** Full-content digest to check against the stored one */
  contentDigest?: string;
  context?: FailureContext;
}

export interface CacheOutcome {
  vector: EmbeddingVector;
  cacheHit: boolean;
  /** Joined a compute that another caller started */
  coalesced: boolean;
}

interface ResolvedEntry {
  vector: EmbeddingVector;
  cacheHit: boolean;
  contentDigest?: string;
}

/**
 * Fingerprint-keyed embedding cache with request coalescing.
 *
 * At most one compute runs per fingerprint; every caller that arrives
 * while it runs gets the same vector or the same error. A failed compute
 * stores nothing, so the next call starts over.
 */
export class EmbeddingCache {
  private readonly logger: Logger;
  private readonly inFlight = new Map<string, Promise<ResolvedEntry>>();
  private hits = 0;
  private misses = 0;
  private coalesced = 0;
  private computeFailures = 0;
  private inconsistencies = 0;

  constructor(private readonly options: EmbeddingCacheOptions) {
    this.logger = new Logger(`EmbeddingCache:${options.name}`);
  }

  async getOrCompute(
    fingerprint: string,
    computeFn: () => Promise<EmbeddingVector>,
    options: GetOrComputeOptions = {},
  ): Promise<EmbeddingVector> {
    const outcome = await this.getOrComputeDetailed(
      fingerprint,
      computeFn,
      options,
    );
    return outcome.vector;
  }

  async getOrComputeDetailed(
    fingerprint: string,
    computeFn: () => Promise<EmbeddingVector>,
    options: GetOrComputeOptions = {},
  ): Promise<CacheOutcome> {
    const pending = this.inFlight.get(fingerprint);
    if (pending) {
      this.coalesced++;
      const resolved = await pending;
      this.assertSameContent(fingerprint, resolved.contentDigest, options);
      return {
        vector: resolved.vector,
        cacheHit: resolved.cacheHit,
        coalesced: true,
      };
    }

    const resolution = this.resolve(fingerprint, computeFn, options).finally(
      () => {
        this.inFlight.delete(fingerprint);
      },
    );
    this.inFlight.set(fingerprint, resolution);

    const resolved = await resolution;
    return {
      vector: resolved.vector,
      cacheHit: resolved.cacheHit,
      coalesced: false,
    };
  }

  async stats(): Promise<EmbeddingCacheStats> {
    return {
      name: this.options.name,
      entries: await this.options.store.size(),
      inFlight: this.inFlight.size,
      hits: this.hits,
      misses: this.misses,
      coalesced: this.coalesced,
      computeFailures: this.computeFailures,
      inconsistencies: this.inconsistencies,
    };
  }

  private async resolve(
    fingerprint: string,
    computeFn: () => Promise<EmbeddingVector>,
    options: GetOrComputeOptions,
  ): Promise<ResolvedEntry> {
    const lookupStart = Date.now();
    const entry = await this.options.store.get(fingerprint);
    const now = Date.now();

    if (entry && entry.expiresAt > now) {
      this.assertSameContent(fingerprint, entry.contentDigest, options);
      this.hits++;
      this.logger.debug(
        `Hit for ${fingerprint} in ${now - lookupStart}ms`,
      );
      return {
        vector: entry.vector,
        cacheHit: true,
        contentDigest: entry.contentDigest,
      };
    }
    if (entry) {
      await this.options.store.delete(fingerprint);
    }

    this.misses++;
    const computeStart = Date.now();
    let vector: EmbeddingVector;
    try {
      vector = Object.freeze([...(await computeFn())]);
    } catch (error) {
      this.computeFailures++;
      this.logger.debug(
        `Compute for ${fingerprint} failed after ${Date.now() - computeStart}ms: ${errorMessage(error)}`,
      );
      throw error;
    }

    const createdAt = Date.now();
    try {
      await this.options.store.set({
        fingerprint,
        vector,
        createdAt,
        expiresAt: createdAt + this.options.ttlMs,
        contentDigest: options.contentDigest,
      });
    } catch (error) {
      this.logger.error(
        `Failed to store embedding ${fingerprint}: ${errorMessage(error)}`,
      );
    }

    this.logger.debug(
      `Miss for ${fingerprint}, computed in ${createdAt - computeStart}ms`,
    );
    return { vector, cacheHit: false, contentDigest: options.contentDigest };
  }

  private assertSameContent(
    fingerprint: string,
    storedDigest: string | undefined,
    options: GetOrComputeOptions,
  ): void {
    if (
      storedDigest === undefined ||
      options.contentDigest === undefined ||
      storedDigest === options.contentDigest
    ) {
      return;
    }

    this.inconsistencies++;
    this.logger.error(
      `Fingerprint ${fingerprint} matched content with a different digest; keeping the stored embedding`,
    );
    throw new CacheInconsistencyError(fingerprint, options.context ?? {});
  }
}
