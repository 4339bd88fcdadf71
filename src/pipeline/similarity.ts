/**
 * Maps a distance to a score in [0, 100]. Implementations must be
 * deterministic and never increase as the distance grows.
 */
export interface SimilarityPolicy {
  readonly name: string;
  score(distance: number): number;
}

/** 100 at distance 0, halving every `scale * ln 2`. Never reaches 0. */
export class ExponentialSimilarity implements SimilarityPolicy {
  readonly name = "exponential";

  constructor(private scale: number = 1) {}

  score(distance: number): number {
    return 100 * Math.exp(-distance / this.scale);
  }
}

/** 100 - distance * scale, floored at 0. */
export class LinearSimilarity implements SimilarityPolicy {
  readonly name = "linear";

  constructor(private scale: number = 100) {}

  score(distance: number): number {
    return Math.min(100, Math.max(0, 100 - distance * this.scale));
  }
}

export function createSimilarityPolicy(kind: "exponential" | "linear", scale?: number): SimilarityPolicy {
  return kind === "linear" ? new LinearSimilarity(scale) : new ExponentialSimilarity(scale);
}

export function euclideanDistance(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vectors must have the same length (${a.length} vs ${b.length})`);
  }

  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}
