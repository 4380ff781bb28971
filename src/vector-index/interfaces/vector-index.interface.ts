/**
 * Metadata stored alongside each vector. Mirrors the segment fields needed
 * for filtering so no join is required at query time.
 */
export interface IndexPointMetadata {
  segmentId: string;
  videoId: string;
  cameraId: string;
  location: string;
  /** Segment wall-clock start, epoch ms */
  startTime: number;
  /** Segment wall-clock end, epoch ms */
  endTime: number;
  hasFaces: boolean;
  hasVehicles: boolean;
  motionDetected: boolean;
}

/**
 * A vector record in the similarity index. The id is distinct from the
 * segment id so a segment can be re-indexed.
 */
export interface IndexPoint {
  id: string;
  vector: number[];
  metadata: IndexPointMetadata;
}

export type EqualityField = 'cameraId' | 'location' | 'videoId';
export type FlagField = 'hasFaces' | 'hasVehicles' | 'motionDetected';
export type RangeField = 'startTime' | 'endTime';

/**
 * One conjunct of a metadata filter
 */
export type FilterPredicate =
  | { kind: 'eq'; field: EqualityField; value: string }
  | { kind: 'flag'; field: FlagField; value: boolean }
  | { kind: 'range'; field: RangeField; gte?: number; lte?: number };

export interface VectorSearchHit {
  id: string;
  /** Cosine similarity */
  score: number;
  metadata: IndexPointMetadata;
}

export interface VectorSearchRequest {
  queryVector: number[];
  filters: FilterPredicate[];
  topK: number;
  scoreThreshold: number;
  signal?: AbortSignal;
}

export interface VectorIndexStats {
  backend: 'memory' | 'lancedb';
  pointCount: number;
  capacity: number;
  annIndexBuilt: boolean;
}

/**
 * Contract shared by the exact and the approximate index.
 *
 * - insert is idempotent per point id and atomic for readers
 * - search pre-filters, ranks by descending cosine similarity, breaks ties
 *   by earliest startTime, drops hits under the threshold and never pads
 */
export interface VectorIndex {
  /** Resolve once the index can serve queries */
  ready(): Promise<void>;
  insert(point: IndexPoint): Promise<void>;
  remove(id: string): Promise<boolean>;
  search(request: VectorSearchRequest): Promise<VectorSearchHit[]>;
  count(): Promise<number>;
  stats(): Promise<VectorIndexStats>;
}

export const VECTOR_INDEX = Symbol('VECTOR_INDEX');
