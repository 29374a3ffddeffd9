import type { DuplicateKeyPolicy } from "../config";
import type { BackendConnection } from "./backend";
import { ChunkRepository } from "./chunk-repository";
import type { ResilientConnector } from "./connector";
import { errorMessage } from "./errors";
import { createLogger, type Logger } from "./logger";
import { type EmbeddingInput, quantize } from "./quantizer";
import { BackendScorer, InProcessScorer, type ScoringMode } from "./scorer";
import { SimilarityEngine } from "./similarity-engine";
import type {
  ChunkKey,
  DocumentChunk,
  QuantizedChunk,
  QueryOptions,
  RetrievedChunk,
  Store,
  StoreResult,
} from "./store";

export interface MultiVectorStoreOptions {
  connector: ResilientConnector<BackendConnection>;
  tableName: string;
  dimensions: number;
  duplicatePolicy?: DuplicateKeyPolicy;
  insertConcurrency?: number;
  /** `auto` switches to in-backend scoring once `initialize` installs the routine. */
  scoring?: ScoringMode | "auto";
  logger?: Logger;
}

/**
 * Multi-vector chunk store: quantizes float embeddings, persists them through
 * the repository and ranks with the similarity engine.
 */
export class MultiVectorStore implements Store {
  readonly repository: ChunkRepository;
  readonly engine: SimilarityEngine;
  private readonly scoring: ScoringMode | "auto";
  private readonly log: Logger;

  constructor(options: MultiVectorStoreOptions) {
    this.log = options.logger ?? createLogger("MultiVectorStore");
    this.repository = new ChunkRepository({
      connector: options.connector,
      tableName: options.tableName,
      dimensions: options.dimensions,
      duplicatePolicy: options.duplicatePolicy,
      insertConcurrency: options.insertConcurrency,
      logger: options.logger,
    });
    this.scoring = options.scoring ?? "auto";
    const scorer =
      this.scoring === "in-backend"
        ? new BackendScorer(this.repository)
        : new InProcessScorer(this.repository);
    this.engine = new SimilarityEngine(scorer, options.dimensions);
  }

  get dimensions(): number {
    return this.repository.dimensions;
  }

  async initialize(): Promise<boolean> {
    try {
      const setup = await this.repository.ensureSchema();
      if (this.scoring === "auto" && setup.routineInstalled) {
        this.engine.useScorer(new BackendScorer(this.repository));
      }
      this.log.info(`Initialized (${this.engine.scoringMode} scoring)`);
      return true;
    } catch (err) {
      this.log.error(`Error initializing store: ${errorMessage(err)}`);
      return false;
    }
  }

  async storeEmbeddings(chunks: DocumentChunk[]): Promise<StoreResult> {
    const quantized: QuantizedChunk[] = chunks.map((chunk) => ({
      documentId: chunk.documentId,
      chunkNumber: chunk.chunkNumber,
      content: chunk.content,
      metadata: chunk.metadata ?? {},
      vectors: chunk.embedding ? quantize(chunk.embedding, this.dimensions) : [],
    }));
    return this.repository.insert(quantized);
  }

  async querySimilar(
    queryEmbedding: EmbeddingInput,
    k: number,
    options: QueryOptions = {},
  ): Promise<RetrievedChunk[]> {
    const query = quantize(queryEmbedding, this.dimensions);
    return this.engine.rank(query, k, options.documentIds, options.signal);
  }

  async getChunksById(keys: ChunkKey[]): Promise<RetrievedChunk[]> {
    return this.repository.getByKeys(keys);
  }

  async deleteChunksByDocumentId(documentId: string): Promise<boolean> {
    return this.repository.deleteByDocument(documentId);
  }

  async checkSchema(): Promise<boolean> {
    return this.repository.existsAndMatchesSchema();
  }

  async close(): Promise<void> {
    // Connections are opened and closed per operation.
  }
}
