import type { BitVector } from "./bit-vector";
import type { Predicate } from "./filter";

/**
 * Physical row of the chunk table.
 */
export interface ChunkRow {
  id: string;
  document_id: string;
  chunk_number: number;
  content: string;
  /** Encoded with `encodeMetadata`. */
  metadata: string;
  /** Bits per vector in `vectors`. */
  dimensions: number;
  /** Ordered bit-vectors, one hex string each. */
  vectors: string[];
}

export type ChunkColumn = keyof ChunkRow;

export type ChunkRecordRow = Pick<ChunkRow, "id" | "document_id" | "chunk_number" | "content" | "metadata">;

export const CHUNK_COLUMNS: readonly ChunkColumn[] = [
  "id",
  "document_id",
  "chunk_number",
  "content",
  "metadata",
  "dimensions",
  "vectors",
];

/** Value given to existing rows when a missing column is added. */
export interface ColumnDefault {
  name: ChunkColumn;
  value: string | number;
}

export interface ScoredRow {
  row: ChunkRecordRow;
  score: number;
}

/**
 * Stored MaxSim routine for backends that can score next to the data.
 */
export interface MaxSimRoutine {
  install(table: string): Promise<void>;
  rank(
    table: string,
    query: readonly BitVector[],
    predicate: Predicate | null,
    limit: number,
  ): Promise<ScoredRow[]>;
}

/**
 * One live backend session, handed out by the connector for a single unit
 * of work and closed afterwards.
 */
export interface BackendConnection {
  tableExists(table: string): Promise<boolean>;
  listColumns(table: string): Promise<string[]>;
  /**
   * Creates the table with the seed row's shape and a scalar index on each
   * of `indexed`. The seed is not kept.
   */
  createTable(table: string, seed: ChunkRow, indexed: readonly ChunkColumn[]): Promise<void>;
  addColumns(table: string, columns: readonly ColumnDefault[]): Promise<void>;
  hasIndex(table: string, column: ChunkColumn): Promise<boolean>;
  createIndex(table: string, column: ChunkColumn): Promise<void>;
  insert(table: string, rows: readonly ChunkRow[]): Promise<void>;
  /** Replaces every row with the same `(document_id, chunk_number)`. */
  upsert(table: string, row: ChunkRow): Promise<void>;
  count(table: string, predicate: Predicate | null): Promise<number>;
  select(table: string, predicate: Predicate): Promise<ChunkRecordRow[]>;
  /** Full rows, vectors included. Rejects with the signal's reason once aborted. */
  scan(table: string, predicate: Predicate | null, signal?: AbortSignal): Promise<ChunkRow[]>;
  delete(table: string, predicate: Predicate): Promise<void>;
  close(): Promise<void>;
  readonly maxSim?: MaxSimRoutine;
}
