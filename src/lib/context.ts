import { CONFIG, normalizeDatabaseUri } from "../config";
import type { BackendConnection } from "./backend";
import { ResilientConnector } from "./connector";
import { LanceConnection } from "./lance-backend";
import { MultiVectorStore } from "./multi-vector-store";
import type { Store } from "./store";

export interface StoreContextOptions {
  dbPath?: string;
  tableName?: string;
}

export function createConnector(dbPath: string = CONFIG.DB_PATH): ResilientConnector<BackendConnection> {
  const uri = normalizeDatabaseUri(dbPath);
  return new ResilientConnector<BackendConnection>({
    connect: () => LanceConnection.open(uri),
    maxRetries: CONFIG.MAX_RETRIES,
    retryDelayMs: CONFIG.RETRY_DELAY_MS,
  });
}

/**
 * Creates a store backed by the local LanceDB database
 */
export async function createStore(options: StoreContextOptions = {}): Promise<Store> {
  return new MultiVectorStore({
    connector: createConnector(options.dbPath),
    tableName: options.tableName ?? CONFIG.TABLE_NAME,
    dimensions: CONFIG.DIMENSIONS,
    duplicatePolicy: CONFIG.DUPLICATE_POLICY,
    insertConcurrency: CONFIG.INSERT_CONCURRENCY,
  });
}
