export function dot(a: readonly number[], b: readonly number[]): number {
  const length = Math.min(a.length, b.length);
  let sum = 0;
  for (let i = 0; i < length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function l2Norm(vector: readonly number[]): number {
  return Math.sqrt(dot(vector, vector));
}

/**
 * Unit-length copy of the vector. A zero vector is returned unchanged.
 */
export function normalize(vector: readonly number[]): number[] {
  const norm = l2Norm(vector);
  if (norm === 0) {
    return [...vector];
  }
  return vector.map((value) => value / norm);
}

/**
 * Cosine similarity in [-1, 1]; 0 when either side is a zero vector
 */
export function cosineSimilarity(
  a: readonly number[],
  b: readonly number[],
): number {
  const denominator = l2Norm(a) * l2Norm(b);
  if (denominator === 0) {
    return 0;
  }
  const similarity = dot(a, b) / denominator;
  return Math.max(-1, Math.min(1, similarity));
}

export function isFiniteVector(vector: readonly number[]): boolean {
  return vector.every((value) => Number.isFinite(value));
}

export interface Point2D {
  x: number;
  y: number;
}

export function distance(a: Point2D, b: Point2D): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}
