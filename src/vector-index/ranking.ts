import { VectorSearchHit } from './interfaces/vector-index.interface';

/**
 * Descending score; equal scores put the earliest segment first, then id
 * so the order is reproducible.
 */
export function compareHits(a: VectorSearchHit, b: VectorSearchHit): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  if (a.metadata.startTime !== b.metadata.startTime) {
    return a.metadata.startTime - b.metadata.startTime;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Sort, drop hits under the threshold and cut to topK. Never pads.
 */
export function rankHits(
  hits: VectorSearchHit[],
  topK: number,
  scoreThreshold: number,
): VectorSearchHit[] {
  return hits
    .filter((hit) => hit.score >= scoreThreshold)
    .sort(compareHits)
    .slice(0, topK);
}
