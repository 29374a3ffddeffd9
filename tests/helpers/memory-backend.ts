import { vi } from "vitest";
import type {
  BackendConnection,
  ChunkColumn,
  ChunkRecordRow,
  ChunkRow,
  ColumnDefault,
  MaxSimRoutine,
  ScoredRow,
} from "../../src/lib/backend";
import { CHUNK_COLUMNS } from "../../src/lib/backend";
import { type BitVector, fromHex } from "../../src/lib/bit-vector";
import { maxSim } from "../../src/lib/colbert-math";
import { ResilientConnector } from "../../src/lib/connector";
import { matchesPredicate, type Predicate } from "../../src/lib/filter";
import type { Logger } from "../../src/lib/logger";

type Operation = Exclude<keyof BackendConnection, "maxSim" | "close">;

interface MemoryTable {
  columns: Set<string>;
  rows: ChunkRow[];
  indices: Set<ChunkColumn>;
  routineInstalled: boolean;
}

/**
 * In-process stand-in for the database: tables survive across connections
 * the way rows survive across LanceDB sessions.
 */
export class MemoryDatabase {
  readonly tables = new Map<string, MemoryTable>();
  readonly operations: Operation[] = [];
  connects = 0;
  closes = 0;
  failNextConnects = 0;
  /** Runs inside every scan, before the first row is read. */
  onScan?: () => void;
  readonly failingOperations = new Set<Operation>();

  constructor(readonly supportsRoutines = false) {}

  connect = async (): Promise<MemoryConnection> => {
    this.connects++;
    if (this.failNextConnects > 0) {
      this.failNextConnects--;
      throw new Error("connection refused");
    }
    return new MemoryConnection(this);
  };

  /** A table created by an older release, before some columns existed. */
  addLegacyTable(name: string, columns: ChunkColumn[], rows: ChunkRow[]): void {
    this.tables.set(name, {
      columns: new Set(columns),
      rows: rows.map((row) => ({ ...row })),
      indices: new Set(),
      routineInstalled: false,
    });
  }

  rows(name: string): ChunkRow[] {
    return this.tables.get(name)?.rows ?? [];
  }
}

function keyOf(row: ChunkRow): string {
  return `${row.document_id}\u0000${row.chunk_number}`;
}

function recordOf(row: ChunkRow): ChunkRecordRow {
  return {
    id: row.id,
    document_id: row.document_id,
    chunk_number: row.chunk_number,
    content: row.content,
    metadata: row.metadata,
  };
}

export class MemoryConnection implements BackendConnection {
  closed = false;
  readonly maxSim?: MaxSimRoutine;

  constructor(private readonly db: MemoryDatabase) {
    if (db.supportsRoutines) {
      this.maxSim = {
        install: async (table) => {
          this.table(table).routineInstalled = true;
        },
        rank: async (table, query, predicate, limit) => this.rankRows(table, query, predicate, limit),
      };
    }
  }

  private enter(operation: Operation): void {
    if (this.closed) throw new Error("connection is closed");
    this.db.operations.push(operation);
    if (this.db.failingOperations.has(operation)) {
      throw new Error(`${operation} failed`);
    }
  }

  private table(name: string): MemoryTable {
    const table = this.db.tables.get(name);
    if (!table) throw new Error(`Table not found: ${name}`);
    return table;
  }

  private rankRows(
    name: string,
    query: readonly BitVector[],
    predicate: Predicate | null,
    limit: number,
  ): ScoredRow[] {
    const table = this.table(name);
    if (!table.routineInstalled) throw new Error("max_sim does not exist");
    return table.rows
      .filter((row) => matchesPredicate(predicate, row))
      .map((row) => ({
        row: recordOf(row),
        score: maxSim(
          query,
          row.vectors.map((hex) => fromHex(hex, row.dimensions)),
        ),
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, limit);
  }

  async tableExists(name: string): Promise<boolean> {
    this.enter("tableExists");
    return this.db.tables.has(name);
  }

  async listColumns(name: string): Promise<string[]> {
    this.enter("listColumns");
    return [...this.table(name).columns];
  }

  async createTable(name: string, _seed: ChunkRow, indexed: readonly ChunkColumn[]): Promise<void> {
    this.enter("createTable");
    this.db.tables.set(name, {
      columns: new Set(CHUNK_COLUMNS),
      rows: [],
      indices: new Set(indexed),
      routineInstalled: false,
    });
  }

  async addColumns(name: string, columns: readonly ColumnDefault[]): Promise<void> {
    this.enter("addColumns");
    const table = this.table(name);
    for (const column of columns) {
      table.columns.add(column.name);
      for (const row of table.rows) {
        Object.assign(row, { [column.name]: column.value });
      }
    }
  }

  async hasIndex(name: string, column: ChunkColumn): Promise<boolean> {
    this.enter("hasIndex");
    return this.table(name).indices.has(column);
  }

  async createIndex(name: string, column: ChunkColumn): Promise<void> {
    this.enter("createIndex");
    const table = this.table(name);
    // Same refusal as LanceDB's scalar index builder
    if (table.rows.length === 0) throw new Error("empty page table");
    table.indices.add(column);
  }

  async insert(name: string, rows: readonly ChunkRow[]): Promise<void> {
    this.enter("insert");
    this.table(name).rows.push(...rows.map((row) => ({ ...row, vectors: [...row.vectors] })));
  }

  async upsert(name: string, row: ChunkRow): Promise<void> {
    this.enter("upsert");
    const table = this.table(name);
    table.rows = table.rows.filter((existing) => keyOf(existing) !== keyOf(row));
    table.rows.push({ ...row, vectors: [...row.vectors] });
  }

  async count(name: string, predicate: Predicate | null): Promise<number> {
    this.enter("count");
    return this.table(name).rows.filter((row) => matchesPredicate(predicate, row)).length;
  }

  async select(name: string, predicate: Predicate): Promise<ChunkRecordRow[]> {
    this.enter("select");
    return this.table(name)
      .rows.filter((row) => matchesPredicate(predicate, row))
      .map(recordOf);
  }

  async scan(name: string, predicate: Predicate | null, signal?: AbortSignal): Promise<ChunkRow[]> {
    this.enter("scan");
    this.db.onScan?.();
    const rows: ChunkRow[] = [];
    for (const row of this.table(name).rows) {
      signal?.throwIfAborted();
      if (matchesPredicate(predicate, row)) rows.push({ ...row, vectors: [...row.vectors] });
    }
    return rows;
  }

  async delete(name: string, predicate: Predicate): Promise<void> {
    this.enter("delete");
    const table = this.table(name);
    table.rows = table.rows.filter((row) => !matchesPredicate(predicate, row));
  }

  async close(): Promise<void> {
    this.closed = true;
    this.db.closes++;
  }
}

export function silentLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function memoryConnector(
  db: MemoryDatabase,
  logger: Logger = silentLogger(),
): ResilientConnector<BackendConnection> {
  return new ResilientConnector<BackendConnection>({
    connect: db.connect,
    maxRetries: 3,
    retryDelayMs: 0,
    logger,
  });
}
