export { BitVector, hammingDistance, fromHex, toHex } from "./bit-vector";
export type { BackendConnection, ChunkRow, MaxSimRoutine } from "./backend";
export { ChunkRepository } from "./chunk-repository";
export type { RankedCandidate, StoredChunk } from "./chunk-repository";
export { hammingSim, maxSim } from "./colbert-math";
export { ResilientConnector } from "./connector";
export type { RetryPolicy } from "./connector";
export { createConnector, createStore } from "./context";
export * from "./errors";
export { documentIn, keyIn, toSqlFilter } from "./filter";
export type { Predicate } from "./filter";
export { LanceConnection } from "./lance-backend";
export { decodeMetadata, encodeMetadata } from "./metadata";
export { MultiVectorStore } from "./multi-vector-store";
export { quantize } from "./quantizer";
export type { EmbeddingInput, FloatVector } from "./quantizer";
export { BackendScorer, InProcessScorer } from "./scorer";
export type { Scorer, ScoringMode } from "./scorer";
export { SimilarityEngine } from "./similarity-engine";
export * from "./store";
