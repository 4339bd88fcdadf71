import type { CelebrityDatabase } from "../db/celebrities";
import type { Embedding } from "../embedding/types";
import { EmptyDatabaseError, ValidationError } from "../errors";
import { ExponentialSimilarity, euclideanDistance, type SimilarityPolicy } from "./similarity";
import type { MatchResult } from "./types";

export const DEFAULT_TOP_K = 10;

/**
 * Ranks every identity with an embedding by Euclidean distance to a query.
 * Each query reads a single snapshot, so a scan completing mid-query does not
 * mix identity sets.
 */
export class MatchEngine {
  private database: CelebrityDatabase;
  private similarity: SimilarityPolicy;

  constructor(database: CelebrityDatabase, similarity: SimilarityPolicy = new ExponentialSimilarity()) {
    this.database = database;
    this.similarity = similarity;
  }

  match(query: Embedding, k: number = DEFAULT_TOP_K): MatchResult[] {
    if (!Number.isInteger(k) || k < 1) {
      throw new ValidationError(`k must be a positive integer, got ${k}`);
    }
    if (query.some((value) => !Number.isFinite(value))) {
      throw new ValidationError("Query embedding contains non-finite values");
    }

    const candidates = this.database.snapshot().identities.filter(
      (identity) => identity.embedding !== null
    );
    if (candidates.length === 0) {
      throw new EmptyDatabaseError();
    }

    const ranked: MatchResult[] = [];
    for (const identity of candidates) {
      const embedding = identity.embedding ?? [];
      if (embedding.length !== query.length) {
        throw new ValidationError(
          `Query embedding has ${query.length} dimensions, ${identity.name} has ${embedding.length}`
        );
      }

      const distance = euclideanDistance(query, embedding);
      ranked.push({
        name: identity.name,
        imagePath: identity.imagePath,
        distance,
        similarityScore: this.similarity.score(distance),
      });
    }

    ranked.sort((a, b) => {
      if (a.distance !== b.distance) return a.distance - b.distance;
      if (a.name < b.name) return -1;
      if (a.name > b.name) return 1;
      return 0;
    });

    return ranked.slice(0, k);
  }
}
