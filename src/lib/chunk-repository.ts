import pLimit from "p-limit";
import { v4 as uuidv4 } from "uuid";
import type { DuplicateKeyPolicy } from "../config";
import type {
  BackendConnection,
  ChunkColumn,
  ChunkRecordRow,
  ChunkRow,
  ScoredRow,
} from "./backend";
import { CHUNK_COLUMNS } from "./backend";
import { BitVector, fromHex, toHex } from "./bit-vector";
import type { ResilientConnector } from "./connector";
import {
  errorMessage,
  InvalidArgumentError,
  MvStoreError,
  SchemaError,
  ShapeError,
} from "./errors";
import { documentIn, keyIn, type Predicate } from "./filter";
import { createLogger, type Logger } from "./logger";
import { decodeMetadata, encodeMetadata, type ChunkMetadata } from "./metadata";
import {
  type ChunkKey,
  formatChunkKey,
  type QuantizedChunk,
  type RetrievedChunk,
  type StoreResult,
} from "./store";

/**
 * Chunk read back with its vectors, as the in-process scorer needs it.
 */
export interface StoredChunk extends ChunkKey {
  id: string;
  content: string;
  metadata: ChunkMetadata;
  vectors: BitVector[];
}

export interface RankedCandidate {
  /** Synthetic row id, the last tie-breaker. */
  id: string;
  chunk: RetrievedChunk;
}

export interface SchemaSetupResult {
  created: boolean;
  addedColumns: ChunkColumn[];
  indexed: boolean;
  routineInstalled: boolean;
}

export interface ChunkRepositoryOptions {
  connector: ResilientConnector<BackendConnection>;
  tableName: string;
  dimensions: number;
  duplicatePolicy?: DuplicateKeyPolicy;
  insertConcurrency?: number;
  logger?: Logger;
  idFactory?: () => string;
}

const INDEXED_COLUMN: ChunkColumn = "document_id";

type DefaultedColumn = Exclude<ChunkColumn, "id" | "vectors">;

function isDefaultedColumn(column: ChunkColumn): column is DefaultedColumn {
  return column !== "id" && column !== "vectors";
}

function naturalKey(key: ChunkKey): string {
  return JSON.stringify([key.documentId, key.chunkNumber]);
}

function assertChunkKey(key: ChunkKey): void {
  if (typeof key.documentId !== "string" || key.documentId.length === 0) {
    throw new InvalidArgumentError("document_id must be a non-empty string");
  }
  if (!Number.isSafeInteger(key.chunkNumber) || key.chunkNumber < 0) {
    throw new InvalidArgumentError(
      `chunk_number must be a non-negative integer, got ${key.chunkNumber} for document ${key.documentId}`,
    );
  }
}

/**
 * Owns the persisted chunk table: identity, content, metadata and the ragged
 * list of quantized vectors per chunk.
 */
export class ChunkRepository {
  private readonly connector: ResilientConnector<BackendConnection>;
  private readonly log: Logger;
  private readonly newId: () => string;
  readonly tableName: string;
  readonly dimensions: number;
  readonly duplicatePolicy: DuplicateKeyPolicy;
  readonly insertConcurrency: number;

  constructor(options: ChunkRepositoryOptions) {
    if (!Number.isSafeInteger(options.dimensions) || options.dimensions <= 0) {
      throw new InvalidArgumentError(`dimensions must be a positive integer, got ${options.dimensions}`);
    }
    this.connector = options.connector;
    this.tableName = options.tableName;
    this.dimensions = options.dimensions;
    this.duplicatePolicy = options.duplicatePolicy ?? "upsert";
    this.insertConcurrency = Math.max(1, options.insertConcurrency ?? 4);
    this.log = options.logger ?? createLogger("ChunkRepository");
    this.newId = options.idFactory ?? uuidv4;
  }

  private seedRow(): ChunkRow {
    return {
      id: "seed",
      document_id: "",
      chunk_number: 0,
      content: "",
      metadata: "",
      dimensions: this.dimensions,
      vectors: [toHex(BitVector.fromBits(new Array<boolean>(this.dimensions).fill(false)))],
    };
  }

  private columnDefault(column: DefaultedColumn): string | number {
    switch (column) {
      case "document_id":
      case "content":
      case "metadata":
        return "";
      case "chunk_number":
        return 0;
      case "dimensions":
        return this.dimensions;
    }
  }

  private toRetrieved(row: ChunkRecordRow, score: number): RetrievedChunk {
    return {
      documentId: row.document_id,
      chunkNumber: row.chunk_number,
      content: row.content,
      metadata: decodeMetadata(row.metadata),
      vectors: [],
      score,
    };
  }

  private toStored(row: ChunkRow): StoredChunk {
    if (row.dimensions !== this.dimensions) {
      throw new SchemaError(
        `Row ${row.id} stores ${row.dimensions}-bit vectors; the store uses ${this.dimensions} bits`,
      );
    }
    return {
      id: row.id,
      documentId: row.document_id,
      chunkNumber: row.chunk_number,
      content: row.content,
      metadata: decodeMetadata(row.metadata),
      vectors: row.vectors.map((hex) => fromHex(hex, this.dimensions)),
    };
  }

  private toRow(chunk: QuantizedChunk): ChunkRow {
    return {
      id: this.newId(),
      document_id: chunk.documentId,
      chunk_number: chunk.chunkNumber,
      content: chunk.content,
      metadata: encodeMetadata(chunk.metadata),
      dimensions: this.dimensions,
      vectors: chunk.vectors.map(toHex),
    };
  }

  async existsAndMatchesSchema(): Promise<boolean> {
    return this.connector.withConnection(async (conn) => {
      if (!(await conn.tableExists(this.tableName))) return false;
      const columns = new Set(await conn.listColumns(this.tableName));
      return CHUNK_COLUMNS.every((column) => columns.has(column));
    });
  }

  /**
   * Idempotent setup: table, missing columns, `document_id` index and, where
   * the backend can hold one, the MaxSim routine.
   */
  async ensureSchema(): Promise<SchemaSetupResult> {
    try {
      return await this.connector.withConnection(async (conn) => {
        const result: SchemaSetupResult = {
          created: false,
          addedColumns: [],
          indexed: false,
          routineInstalled: false,
        };

        if (await conn.tableExists(this.tableName)) {
          const existing = new Set(await conn.listColumns(this.tableName));
          const missing = CHUNK_COLUMNS.filter((column) => !existing.has(column));
          const required = missing.filter((column) => !isDefaultedColumn(column));
          if (required.length > 0) {
            throw new SchemaError(
              `Table ${this.tableName} lacks ${required.join(", ")} and cannot be upgraded in place`,
            );
          }
          const additions = missing.filter(isDefaultedColumn);
          if (additions.length > 0) {
            this.log.info(`Updating ${this.tableName} with columns: ${additions.join(", ")}`);
            await conn.addColumns(
              this.tableName,
              additions.map((name) => ({ name, value: this.columnDefault(name) })),
            );
            result.addedColumns = additions;
          }
        } else {
          this.log.info(`Creating table ${this.tableName}`);
          await conn.createTable(this.tableName, this.seedRow(), [INDEXED_COLUMN]);
          result.created = true;
        }

        try {
          if (!(await conn.hasIndex(this.tableName, INDEXED_COLUMN))) {
            await conn.createIndex(this.tableName, INDEXED_COLUMN);
          }
          result.indexed = true;
        } catch (err) {
          this.log.warn(`Failed to create index on ${INDEXED_COLUMN}: ${errorMessage(err)}`);
        }

        if (conn.maxSim) {
          try {
            await conn.maxSim.install(this.tableName);
            result.routineInstalled = true;
            this.log.info("Installed max_sim routine");
          } catch (err) {
            this.log.error(`Error creating max_sim routine: ${errorMessage(err)}`);
          }
        } else {
          this.log.debug("Backend has no stored routines; MaxSim runs in process");
        }

        return result;
      });
    } catch (err) {
      if (err instanceof MvStoreError) throw err;
      throw new SchemaError(`Schema setup for ${this.tableName} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  /**
   * Applies the duplicate-key policy inside one batch: `upsert` keeps the
   * last occurrence of a key, `reject` the first, `append` every one.
   */
  private dedupeBatch(chunks: QuantizedChunk[]): QuantizedChunk[] {
    if (this.duplicatePolicy === "append") return chunks;

    const positions = new Map<string, number>();
    chunks.forEach((chunk, index) => {
      const key = naturalKey(chunk);
      if (this.duplicatePolicy === "upsert" || !positions.has(key)) {
        positions.set(key, index);
      }
    });

    return chunks.filter((chunk, index) => {
      const kept = positions.get(naturalKey(chunk)) === index;
      if (!kept && this.duplicatePolicy === "reject") {
        this.log.warn(`Rejected duplicate chunk ${formatChunkKey(chunk)} in batch`);
      }
      return kept;
    });
  }

  private async writeOne(chunk: QuantizedChunk): Promise<boolean> {
    const key = formatChunkKey(chunk);
    try {
      const row = this.toRow(chunk);
      return await this.connector.withConnection(async (conn) => {
        switch (this.duplicatePolicy) {
          case "append":
            await conn.insert(this.tableName, [row]);
            return true;
          case "upsert":
            await conn.upsert(this.tableName, row);
            return true;
          case "reject":
            if ((await conn.count(this.tableName, keyIn([chunk]))) > 0) {
              this.log.warn(`Rejected chunk ${key}: key already stored`);
              return false;
            }
            await conn.insert(this.tableName, [row]);
            return true;
        }
      });
    } catch (err) {
      this.log.error(`Failed to store chunk ${key}: ${errorMessage(err)}`);
      return false;
    }
  }

  /**
   * Best-effort batch insert. Shape and key violations fail the whole call
   * before any write; per-row backend failures are logged and skipped.
   */
  async insert(chunks: QuantizedChunk[]): Promise<StoreResult> {
    for (const chunk of chunks) {
      assertChunkKey(chunk);
      for (const vector of chunk.vectors) {
        if (vector.length !== this.dimensions) {
          throw new ShapeError(
            `Chunk ${formatChunkKey(chunk)} has a ${vector.length}-bit vector, expected ${this.dimensions}`,
            this.dimensions,
            vector.length,
          );
        }
      }
    }

    const embedded = chunks.filter((chunk) => {
      if (chunk.vectors.length > 0) return true;
      this.log.error(`Missing embeddings for chunk ${formatChunkKey(chunk)}`);
      return false;
    });

    const limit = pLimit(this.insertConcurrency);
    const batch = this.dedupeBatch(embedded);
    const written = await Promise.all(batch.map((chunk) => limit(() => this.writeOne(chunk))));

    const storedKeys = batch.filter((_, i) => written[i]).map(formatChunkKey);
    this.log.debug(`${storedKeys.length} multi-vector chunks stored`);
    return { success: storedKeys.length > 0, storedKeys };
  }

  /**
   * Batch point lookup in a single round-trip. Unknown keys are omitted.
   */
  async getByKeys(keys: Iterable<ChunkKey>): Promise<RetrievedChunk[]> {
    const predicate = keyIn(keys);
    if (predicate.keys.length === 0) return [];
    predicate.keys.forEach(assertChunkKey);

    this.log.debug(`Batch retrieving ${predicate.keys.length} chunks`);
    const rows = await this.connector.withConnection((conn) =>
      conn.select(this.tableName, predicate),
    );
    this.log.debug(`Found ${rows.length} chunks in batch retrieval`);
    return rows.map((row) => this.toRetrieved(row, 0));
  }

  /**
   * Removes every chunk of a document. Returns false instead of throwing.
   */
  async deleteByDocument(documentId: string): Promise<boolean> {
    try {
      await this.connector.withConnection((conn) =>
        conn.delete(this.tableName, documentIn([documentId])),
      );
      this.log.info(`Deleted all chunks for document ${documentId}`);
      return true;
    } catch (err) {
      this.log.error(`Error deleting chunks for document ${documentId}: ${errorMessage(err)}`);
      return false;
    }
  }

  async count(predicate: Predicate | null = null): Promise<number> {
    return this.connector.withConnection((conn) => conn.count(this.tableName, predicate));
  }

  /**
   * Candidate pull for in-process scoring, vectors included.
   */
  async scan(predicate: Predicate | null, signal?: AbortSignal): Promise<StoredChunk[]> {
    const rows = await this.connector.withConnection(
      (conn, scanSignal) => conn.scan(this.tableName, predicate, scanSignal),
      signal,
    );
    return rows.map((row) => this.toStored(row));
  }

  /**
   * Runs the backend's MaxSim routine, or resolves to null when the backend
   * has none.
   */
  async rankInBackend(
    query: readonly BitVector[],
    predicate: Predicate | null,
    limit: number,
    signal?: AbortSignal,
  ): Promise<RankedCandidate[] | null> {
    const scored = await this.connector.withConnection(async (conn): Promise<ScoredRow[] | null> => {
      if (!conn.maxSim) return null;
      return conn.maxSim.rank(this.tableName, query, predicate, limit);
    }, signal);
    if (scored === null) return null;
    return scored.map(({ row, score }) => ({ id: row.id, chunk: this.toRetrieved(row, score) }));
  }
}
