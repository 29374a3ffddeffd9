import type { BitVector } from "./bit-vector";
import type { ChunkMetadata } from "./metadata";
import type { EmbeddingInput } from "./quantizer";

export type { ChunkMetadata, MetadataValue } from "./metadata";

/**
 * Natural key of a chunk.
 */
export interface ChunkKey {
  documentId: string;
  chunkNumber: number;
}

/**
 * Chunk as handed to the store by a caller, with float embeddings.
 */
export interface DocumentChunk extends ChunkKey {
  content: string;
  metadata?: ChunkMetadata;
  /** One vector, or one vector per token. Absent means "not embedded". */
  embedding?: EmbeddingInput | null;
}

/**
 * Chunk after quantization, as the repository persists it.
 */
export interface QuantizedChunk extends ChunkKey {
  content: string;
  metadata: ChunkMetadata;
  vectors: BitVector[];
}

/**
 * Chunk as returned to callers. Embeddings are never sent back.
 */
export interface RetrievedChunk extends ChunkKey {
  content: string;
  metadata: ChunkMetadata;
  vectors: [];
  /** MaxSim score for ranked results, 0 for direct lookups. */
  score: number;
}

export interface StoreResult {
  success: boolean;
  /** `"<document_id>-<chunk_number>"` for every chunk actually written. */
  storedKeys: string[];
}

export interface QueryOptions {
  /** Restrict candidates to these documents. An empty set matches nothing. */
  documentIds?: Iterable<string> | null;
  signal?: AbortSignal;
}

/**
 * Interface for multi-vector store operations
 */
export interface Store {
  /**
   * Create or upgrade the table, its index and scoring routine.
   * Resolves to false instead of throwing when setup fails.
   */
  initialize(): Promise<boolean>;

  /**
   * Quantize and store a batch of chunks
   */
  storeEmbeddings(chunks: DocumentChunk[]): Promise<StoreResult>;

  /**
   * Top-k chunks by MaxSim against the query embeddings
   */
  querySimilar(
    queryEmbedding: EmbeddingInput,
    k: number,
    options?: QueryOptions,
  ): Promise<RetrievedChunk[]>;

  /**
   * Batch point lookup; unknown keys are omitted
   */
  getChunksById(keys: ChunkKey[]): Promise<RetrievedChunk[]>;

  /**
   * Delete every chunk of a document. Never throws.
   */
  deleteChunksByDocumentId(documentId: string): Promise<boolean>;

  /**
   * True when the table exists with every expected column
   */
  checkSchema(): Promise<boolean>;

  close(): Promise<void>;
}

export function formatChunkKey(key: ChunkKey): string {
  return `${key.documentId}-${key.chunkNumber}`;
}

/**
 * Inverse of `formatChunkKey`. The chunk number follows the last `-`, so
 * document ids may contain dashes.
 */
export function parseChunkKey(value: string): ChunkKey | null {
  const sep = value.lastIndexOf("-");
  if (sep <= 0) return null;
  const documentId = value.slice(0, sep);
  const numberPart = value.slice(sep + 1);
  if (!/^\d+$/.test(numberPart)) return null;
  const chunkNumber = Number.parseInt(numberPart, 10);
  return Number.isSafeInteger(chunkNumber) ? { documentId, chunkNumber } : null;
}
