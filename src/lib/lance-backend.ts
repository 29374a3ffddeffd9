import * as fs from "node:fs";
import * as lancedb from "@lancedb/lancedb";
import type {
    BackendConnection,
    ChunkColumn,
    ChunkRecordRow,
    ChunkRow,
    ColumnDefault,
} from "./backend";
import { SchemaError } from "./errors";
import { type Predicate, sqlString, toSqlFilter } from "./filter";

const NATURAL_KEY: ChunkColumn[] = ["document_id", "chunk_number"];
const RECORD_COLUMNS: ChunkColumn[] = ["id", "document_id", "chunk_number", "content", "metadata"];

function isIterable(value: unknown): value is Iterable<unknown> {
    return (
        typeof value === "object" &&
        value !== null &&
        typeof Reflect.get(value, Symbol.iterator) === "function"
    );
}

function readString(record: Record<string, unknown>, column: ChunkColumn): string {
    const value = record[column];
    if (value === null || value === undefined) return "";
    return String(value);
}

function readNumber(record: Record<string, unknown>, column: ChunkColumn): number {
    const value = record[column];
    if (typeof value === "number") return value;
    if (typeof value === "bigint") return Number(value);
    throw new SchemaError(`Column ${column} holds a non-numeric value`);
}

// List columns come back as Arrow vectors rather than plain arrays.
function readStringList(record: Record<string, unknown>, column: ChunkColumn): string[] {
    const value = record[column];
    if (value === null || value === undefined) return [];
    if (!isIterable(value) || typeof value === "string") {
        throw new SchemaError(`Column ${column} is not a list`);
    }
    return Array.from(value, (item) => String(item));
}

function toChunkRecordRow(record: Record<string, unknown>): ChunkRecordRow {
    return {
        id: readString(record, "id"),
        document_id: readString(record, "document_id"),
        chunk_number: readNumber(record, "chunk_number"),
        content: readString(record, "content"),
        metadata: readString(record, "metadata"),
    };
}

function toChunkRow(record: Record<string, unknown>): ChunkRow {
    return {
        ...toChunkRecordRow(record),
        dimensions: readNumber(record, "dimensions"),
        vectors: readStringList(record, "vectors"),
    };
}

function toRecord(row: ChunkRow): Record<string, unknown> {
    return {
        id: row.id,
        document_id: row.document_id,
        chunk_number: row.chunk_number,
        content: row.content,
        metadata: row.metadata,
        dimensions: row.dimensions,
        vectors: [...row.vectors],
    };
}

function defaultValueSql(column: ColumnDefault): string {
    // Inferred numeric columns are Float64
    return typeof column.value === "number"
        ? `CAST(${column.value} AS DOUBLE)`
        : sqlString(column.value);
}

/**
 * Embedded LanceDB session. LanceDB has no user-defined aggregates, so this
 * backend exposes no `maxSim` routine and scoring runs in process.
 */
export class LanceConnection implements BackendConnection {
    private tables = new Map<string, lancedb.Table>();

    private constructor(private readonly db: lancedb.Connection) {}

    static async open(uri: string): Promise<LanceConnection> {
        if (!uri.includes("://") && !fs.existsSync(uri)) {
            fs.mkdirSync(uri, { recursive: true });
        }
        return new LanceConnection(await lancedb.connect(uri));
    }

    private async getTable(name: string): Promise<lancedb.Table> {
        const cached = this.tables.get(name);
        if (cached) return cached;
        if (!(await this.tableExists(name))) {
            throw new SchemaError(`Table "${name}" does not exist; initialize the store first`);
        }
        const table = await this.db.openTable(name);
        this.tables.set(name, table);
        return table;
    }

    async tableExists(name: string): Promise<boolean> {
        return (await this.db.tableNames()).includes(name);
    }

    async listColumns(name: string): Promise<string[]> {
        const table = await this.getTable(name);
        const schema = await table.schema();
        return schema.fields.map((field) => field.name);
    }

    async createTable(name: string, seed: ChunkRow, indexed: readonly ChunkColumn[]): Promise<void> {
        const table = await this.db.createTable(name, [toRecord(seed)]);
        // LanceDB cannot train a scalar index on an empty table
        for (const column of indexed) {
            await table.createIndex(column, { config: lancedb.Index.btree() });
        }
        await table.delete(`id = ${sqlString(seed.id)}`);
        this.tables.set(name, table);
    }

    async addColumns(name: string, columns: readonly ColumnDefault[]): Promise<void> {
        if (columns.length === 0) return;
        const table = await this.getTable(name);
        await table.addColumns(
            columns.map((column) => ({ name: column.name, valueSql: defaultValueSql(column) })),
        );
    }

    async hasIndex(name: string, column: ChunkColumn): Promise<boolean> {
        const table = await this.getTable(name);
        const indices = await table.listIndices();
        return indices.some((index) => index.columns.includes(column));
    }

    async createIndex(name: string, column: ChunkColumn): Promise<void> {
        const table = await this.getTable(name);
        await table.createIndex(column, { config: lancedb.Index.btree() });
    }

    async insert(name: string, rows: readonly ChunkRow[]): Promise<void> {
        if (rows.length === 0) return;
        const table = await this.getTable(name);
        await table.add(rows.map(toRecord));
    }

    async upsert(name: string, row: ChunkRow): Promise<void> {
        const table = await this.getTable(name);
        await table
            .mergeInsert(NATURAL_KEY)
            .whenMatchedUpdateAll()
            .whenNotMatchedInsertAll()
            .execute([toRecord(row)]);
    }

    async count(name: string, predicate: Predicate | null): Promise<number> {
        const table = await this.getTable(name);
        return table.countRows(predicate ? toSqlFilter(predicate) : undefined);
    }

    async select(name: string, predicate: Predicate): Promise<ChunkRecordRow[]> {
        const table = await this.getTable(name);
        const records: Record<string, unknown>[] = await table
            .query()
            .where(toSqlFilter(predicate))
            .select(RECORD_COLUMNS)
            .toArray();
        return records.map(toChunkRecordRow);
    }

    async scan(name: string, predicate: Predicate | null, signal?: AbortSignal): Promise<ChunkRow[]> {
        signal?.throwIfAborted();
        const table = await this.getTable(name);
        let query = table.query();
        if (predicate) {
            query = query.where(toSqlFilter(predicate));
        }
        const rows: ChunkRow[] = [];
        for await (const batch of query) {
            signal?.throwIfAborted();
            const records: Record<string, unknown>[] = batch.toArray();
            for (const record of records) rows.push(toChunkRow(record));
        }
        return rows;
    }

    async delete(name: string, predicate: Predicate): Promise<void> {
        const table = await this.getTable(name);
        await table.delete(toSqlFilter(predicate));
    }

    async close(): Promise<void> {
        for (const table of this.tables.values()) {
            table.close();
        }
        this.tables.clear();
        this.db.close();
    }
}
