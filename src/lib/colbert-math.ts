// src/lib/colbert-math.ts
import { type BitVector, hammingDistance } from "./bit-vector";

/**
 * Normalized Hamming similarity in [0, 1]. The divisor is the bit length of
 * the document vector.
 */
export function hammingSim(query: BitVector, doc: BitVector): number {
  return 1 - hammingDistance(query, doc) / Math.max(doc.length, 1);
}

/**
 * Computes the MaxSim score between a Query and a Document.
 * Late Interaction mechanism:
 * 1. For every token in the Query...
 * 2. Find the maximum Hamming similarity with ANY token in the Document.
 * 3. Sum those maximums.
 *
 * An empty query is the empty sum (0). A document without vectors has
 * nothing to match, so it also scores 0.
 */
export function maxSim(queryVectors: readonly BitVector[], docVectors: readonly BitVector[]): number {
  if (queryVectors.length === 0 || docVectors.length === 0) {
    return 0;
  }

  let totalScore = 0;

  for (const qVec of queryVectors) {
    let best = 0;
    for (const dVec of docVectors) {
      const sim = hammingSim(qVec, dVec);
      if (sim > best) {
        best = sim;
        // Nothing beats an exact match
        if (best === 1) break;
      }
    }
    totalScore += best;
  }

  return totalScore;
}
