import { ContentFlags } from '../../segments/interfaces/segment.interface';
import { SearchFilters } from '../../vector-index/filters';

export interface SearchRequest {
  query: string;
  filters?: SearchFilters;
  topK: number;
  scoreThreshold: number;
}

/**
 * One ranked hit, enriched with segment detail
 */
export interface SearchResultItem {
  segmentId: string;
  pointId: string;
  /** Cosine similarity */
  score: number;
  videoId: string;
  cameraId: string;
  location: string;
  /** Epoch ms */
  startTime: number;
  /** Epoch ms */
  endTime: number;
  /** Seconds within the video, when the segment is registered */
  startOffset?: number;
  endOffset?: number;
  contentFlags: ContentFlags;
}

export interface SearchResponse {
  queryId: string;
  results: SearchResultItem[];
  cacheHit: boolean;
  latencyMs: number;
}
