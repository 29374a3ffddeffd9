import type { BitVector } from "./bit-vector";
import { InvalidArgumentError, ShapeError } from "./errors";
import { documentIn, type Predicate } from "./filter";
import { selectTopK, type Scorer } from "./scorer";
import type { RetrievedChunk } from "./store";

/**
 * Ranks stored chunks against a multi-vector query with MaxSim.
 */
export class SimilarityEngine {
  constructor(
    private scorer: Scorer,
    readonly dimensions: number,
  ) {}

  get scoringMode(): Scorer["mode"] {
    return this.scorer.mode;
  }

  useScorer(scorer: Scorer): void {
    this.scorer = scorer;
  }

  /**
   * Top-k chunks by MaxSim, score descending.
   *
   * `documentIds` absent or null means every chunk is a candidate; an empty
   * collection means none is. An empty query scores every candidate 0.
   */
  async rank(
    queryVectors: readonly BitVector[],
    k: number,
    documentIds?: Iterable<string> | null,
    signal?: AbortSignal,
  ): Promise<RetrievedChunk[]> {
    if (!Number.isSafeInteger(k) || k <= 0) {
      throw new InvalidArgumentError(`k must be a positive integer, got ${k}`);
    }
    queryVectors.forEach((vector, i) => {
      if (vector.length !== this.dimensions) {
        throw new ShapeError(
          `Query vector ${i} has ${vector.length} bits, expected ${this.dimensions}`,
          this.dimensions,
          vector.length,
        );
      }
    });

    let predicate: Predicate | null = null;
    if (documentIds !== undefined && documentIds !== null) {
      const filter = documentIn(documentIds);
      if (filter.documentIds.length === 0) return [];
      predicate = filter;
    }

    const ranked = await this.scorer.rank(queryVectors, predicate, k, signal);
    return selectTopK(ranked, k).map(({ chunk }) => chunk);
  }
}
