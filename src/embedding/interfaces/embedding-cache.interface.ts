/**
 * L2-normalized embedding. Never mutated after creation.
 */
export type EmbeddingVector = readonly number[];

/**
 * One cached embedding. Exactly one entry exists per fingerprint.
 */
export interface EmbeddingCacheEntry {
  fingerprint: string;
  vector: EmbeddingVector;
  /** Epoch ms */
  createdAt: number;
  /** Epoch ms */
  expiresAt: number;
  /** Digest of the full content, used to detect fingerprint collisions */
  contentDigest?: string;
}

/**
 * Persistence behind an embedding cache
 */
export interface EmbeddingCacheStore {
  get(fingerprint: string): Promise<EmbeddingCacheEntry | null>;
  /** Insert or refresh the entry for its fingerprint */
  set(entry: EmbeddingCacheEntry): Promise<void>;
  delete(fingerprint: string): Promise<void>;
  size(): Promise<number>;
}

export interface EmbeddingCacheStats {
  name: string;
  entries: number;
  inFlight: number;
  hits: number;
  misses: number;
  coalesced: number;
  computeFailures: number;
  inconsistencies: number;
}

export const SEGMENT_EMBEDDING_CACHE = Symbol('SEGMENT_EMBEDDING_CACHE');
export const QUERY_EMBEDDING_CACHE = Symbol('QUERY_EMBEDDING_CACHE');
