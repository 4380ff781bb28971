import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { SearchAbortedError } from '../common/errors/pipeline.errors';
import { OperationAbortedError, raceAbort } from '../common/utils/retry';
import { getNumber } from '../config/config.helpers';
import { EmbeddingPipelineService } from '../embedding/embedding-pipeline.service';
import { SegmentRegistryService } from '../segments/segment-registry.service';
import {
  compileFilters,
  validateSearchParameters,
} from '../vector-index/filters';
import {
  VECTOR_INDEX,
  VectorIndex,
  VectorSearchHit,
} from '../vector-index/interfaces/vector-index.interface';
import {
  SearchRequest,
  SearchResponse,
  SearchResultItem,
} from './interfaces/search.interface';
import { SearchResultCacheService } from './search-result-cache.service';

/**
 * Read path: validate → result cache → embed query and ready the index in
 * parallel → filtered search → enrich → cache.
 */
@Injectable()
export class SearchService {
  private readonly logger = new Logger(SearchService.name);
  private readonly maxTopK: number;

  constructor(
    private readonly embeddingPipeline: EmbeddingPipelineService,
    @Inject(VECTOR_INDEX) private readonly vectorIndex: VectorIndex,
    private readonly resultCache: SearchResultCacheService,
    private readonly registry: SegmentRegistryService,
    private readonly configService: ConfigService,
  ) {
    this.maxTopK = getNumber(this.configService, 'SEARCH_MAX_TOP_K', 100);
  }

  /**
   * Run a semantic search. Invalid filters are rejected before any
   * embedding cost; an aborted signal stops the request.
   */
  async search(
    request: SearchRequest,
    signal?: AbortSignal,
  ): Promise<SearchResponse> {
    const startTime = Date.now();
    const queryId = uuidv4();
    const { query, topK, scoreThreshold } = request;

    const predicates = compileFilters(request.filters);
    validateSearchParameters(topK, scoreThreshold, this.maxTopK);
    const parameters = { topK, scoreThreshold };

    const cached = this.resultCache.lookup(query, predicates, parameters);
    if (cached) {
      const latencyMs = Date.now() - startTime;
      this.logger.log(
        `Search ${queryId} served from cache in ${latencyMs}ms (${cached.length} results)`,
      );
      return { queryId, results: cached, cacheHit: true, latencyMs };
    }

    try {
      const [embedding] = await Promise.all([
        this.embeddingPipeline.embedQuery(query, queryId, signal),
        raceAbort(this.vectorIndex.ready(), signal, 'Index preparation'),
      ]);

      const searchStart = Date.now();
      const hits = await this.vectorIndex.search({
        queryVector: [...embedding.vector],
        filters: predicates,
        topK,
        scoreThreshold,
        signal,
      });
      this.logger.debug(
        `Search ${queryId} index lookup took ${Date.now() - searchStart}ms`,
      );

      const results = hits.map((hit) => this.enrich(hit));
      this.resultCache.store(query, predicates, parameters, results);

      const latencyMs = Date.now() - startTime;
      this.logger.log(
        `Search ${queryId} completed in ${latencyMs}ms (cache miss, ${results.length} results)`,
      );
      return { queryId, results, cacheHit: false, latencyMs };
    } catch (error) {
      if (error instanceof OperationAbortedError) {
        this.logger.log(
          `Search ${queryId} cancelled after ${Date.now() - startTime}ms`,
        );
        throw new SearchAbortedError(queryId);
      }
      throw error;
    }
  }

  private enrich(hit: VectorSearchHit): SearchResultItem {
    const { metadata } = hit;
    const registered = this.registry.get(metadata.segmentId);

    return {
      segmentId: metadata.segmentId,
      pointId: hit.id,
      score: hit.score,
      videoId: metadata.videoId,
      cameraId: metadata.cameraId,
      location: metadata.location,
      startTime: metadata.startTime,
      endTime: metadata.endTime,
      startOffset: registered?.segment.startOffset,
      endOffset: registered?.segment.endOffset,
      contentFlags: {
        hasFaces: metadata.hasFaces,
        hasVehicles: metadata.hasVehicles,
        motionDetected: metadata.motionDetected,
      },
    };
  }
}
