import type { ChunkKey } from "./store";

/**
 * Structured row predicates. Backends either evaluate them directly or
 * compile them with `toSqlFilter`, which quotes every literal.
 */
export interface DocumentInPredicate {
  op: "documentIn";
  documentIds: readonly string[];
}

export interface KeyInPredicate {
  op: "keyIn";
  keys: readonly ChunkKey[];
}

export type Predicate = DocumentInPredicate | KeyInPredicate;

export interface KeyedRow {
  document_id: string;
  chunk_number: number;
}

export function documentIn(documentIds: Iterable<string>): DocumentInPredicate {
  return { op: "documentIn", documentIds: [...new Set(documentIds)] };
}

export function keyIn(keys: Iterable<ChunkKey>): KeyInPredicate {
  const seen = new Set<string>();
  const unique: ChunkKey[] = [];
  for (const key of keys) {
    const id = JSON.stringify([key.documentId, key.chunkNumber]);
    if (seen.has(id)) continue;
    seen.add(id);
    unique.push({ documentId: key.documentId, chunkNumber: key.chunkNumber });
  }
  return { op: "keyIn", keys: unique };
}

export function isEmptyPredicate(predicate: Predicate): boolean {
  return predicate.op === "documentIn"
    ? predicate.documentIds.length === 0
    : predicate.keys.length === 0;
}

export function matchesPredicate(predicate: Predicate | null, row: KeyedRow): boolean {
  if (!predicate) return true;
  switch (predicate.op) {
    case "documentIn":
      return predicate.documentIds.includes(row.document_id);
    case "keyIn":
      return predicate.keys.some(
        (key) => key.documentId === row.document_id && key.chunkNumber === row.chunk_number,
      );
  }
}

export function sqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function sqlInteger(value: number): string {
  if (!Number.isSafeInteger(value)) {
    throw new TypeError(`Not an integer literal: ${value}`);
  }
  return String(value);
}

/**
 * Compiles a predicate to a SQL `WHERE` expression. Keys are grouped by
 * document so N keys of one document become a single `IN` list.
 */
export function toSqlFilter(predicate: Predicate): string {
  if (isEmptyPredicate(predicate)) return "false";

  if (predicate.op === "documentIn") {
    return `document_id IN (${predicate.documentIds.map(sqlString).join(", ")})`;
  }

  const byDocument = new Map<string, number[]>();
  for (const key of predicate.keys) {
    const numbers = byDocument.get(key.documentId) ?? [];
    numbers.push(key.chunkNumber);
    byDocument.set(key.documentId, numbers);
  }

  return [...byDocument.entries()]
    .map(
      ([documentId, numbers]) =>
        `(document_id = ${sqlString(documentId)} AND chunk_number IN (${numbers.map(sqlInteger).join(", ")}))`,
    )
    .join(" OR ");
}
