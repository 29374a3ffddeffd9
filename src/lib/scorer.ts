import type { BitVector } from "./bit-vector";
import type { ChunkRepository, RankedCandidate } from "./chunk-repository";
import { maxSim } from "./colbert-math";
import { SchemaError } from "./errors";
import type { Predicate } from "./filter";

export type ScoringMode = "in-backend" | "in-process";

/**
 * Produces up to `k` MaxSim-ranked candidates. Implementations differ only in
 * where the scoring runs.
 */
export interface Scorer {
  readonly mode: ScoringMode;
  rank(
    query: readonly BitVector[],
    predicate: Predicate | null,
    k: number,
    signal?: AbortSignal,
  ): Promise<RankedCandidate[]>;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Score descending, then document id, chunk number and row id ascending.
 */
export function compareRanked(a: RankedCandidate, b: RankedCandidate): number {
  return (
    b.chunk.score - a.chunk.score ||
    compareText(a.chunk.documentId, b.chunk.documentId) ||
    a.chunk.chunkNumber - b.chunk.chunkNumber ||
    compareText(a.id, b.id)
  );
}

export function selectTopK(candidates: RankedCandidate[], k: number): RankedCandidate[] {
  return [...candidates].sort(compareRanked).slice(0, k);
}

// How many candidates to score between abort checks.
const ABORT_CHECK_INTERVAL = 256;

/**
 * Pulls every candidate's vectors through the repository and scores them here.
 */
export class InProcessScorer implements Scorer {
  readonly mode = "in-process";

  constructor(private readonly repository: ChunkRepository) {}

  async rank(
    query: readonly BitVector[],
    predicate: Predicate | null,
    k: number,
    signal?: AbortSignal,
  ): Promise<RankedCandidate[]> {
    const candidates = await this.repository.scan(predicate, signal);

    const scored: RankedCandidate[] = [];
    for (let i = 0; i < candidates.length; i++) {
      if (i % ABORT_CHECK_INTERVAL === 0) signal?.throwIfAborted();
      const { id, vectors, ...chunk } = candidates[i];
      scored.push({ id, chunk: { ...chunk, vectors: [], score: maxSim(query, vectors) } });
    }

    return selectTopK(scored, k);
  }
}

/**
 * Delegates scoring to the backend's stored MaxSim routine.
 */
export class BackendScorer implements Scorer {
  readonly mode = "in-backend";

  constructor(private readonly repository: ChunkRepository) {}

  async rank(
    query: readonly BitVector[],
    predicate: Predicate | null,
    k: number,
    signal?: AbortSignal,
  ): Promise<RankedCandidate[]> {
    const ranked = await this.repository.rankInBackend(query, predicate, k, signal);
    if (ranked === null) {
      throw new SchemaError("Backend has no max_sim routine; use in-process scoring");
    }
    return ranked;
  }
}
