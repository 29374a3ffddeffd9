import * as os from "node:os";
import * as path from "node:path";

export type DuplicateKeyPolicy = "upsert" | "reject" | "append";
export type LogLevel = "debug" | "info" | "warn" | "error";

const DUPLICATE_POLICIES: readonly DuplicateKeyPolicy[] = ["upsert", "reject", "append"];
const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function readInt(name: string, fallback: number, min: number): number {
  const parsed = Number.parseInt(process.env[name] || "", 10);
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}

function readChoice<T extends string>(name: string, choices: readonly T[], fallback: T): T {
  const raw = (process.env[name] || "").trim().toLowerCase();
  return choices.find((choice) => choice === raw) ?? fallback;
}

export const DEFAULT_DB_PATH = path.join(os.homedir(), ".mvstore", "data");

export const CONFIG = {
  DB_PATH: process.env.MVSTORE_DB_PATH || DEFAULT_DB_PATH,
  TABLE_NAME: process.env.MVSTORE_TABLE || "multi_vector_embeddings",
  // Bits per quantized vector; every stored and query vector must match.
  DIMENSIONS: readInt("MVSTORE_DIMENSIONS", 128, 1),
  MAX_RETRIES: readInt("MVSTORE_MAX_RETRIES", 3, 1),
  RETRY_DELAY_MS: readInt("MVSTORE_RETRY_DELAY_MS", 1000, 0),
  INSERT_CONCURRENCY: readInt("MVSTORE_INSERT_CONCURRENCY", 4, 1),
  DUPLICATE_POLICY: readChoice("MVSTORE_DUPLICATE_POLICY", DUPLICATE_POLICIES, "upsert"),
};

export const LOG_LEVEL: LogLevel = readChoice("MVSTORE_LOG_LEVEL", LOG_LEVELS, "info");

/**
 * Accepts a bare path, a `file://` URI or a `~`-relative path.
 */
export function normalizeDatabaseUri(uri: string): string {
  let normalized = uri.trim();
  if (normalized.startsWith("file://")) {
    normalized = normalized.slice("file://".length);
  }
  if (normalized === "~" || normalized.startsWith("~/")) {
    normalized = path.join(os.homedir(), normalized.slice(1));
  }
  return normalized;
}
