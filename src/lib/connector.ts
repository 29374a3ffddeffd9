import { errorMessage, isContractError, TransientBackendError } from "./errors";
import { createLogger, type Logger } from "./logger";

export interface Closable {
  close(): Promise<void>;
}

export interface RetryPolicy {
  /** Total connection attempts, at least 1. */
  maxRetries: number;
  /** Fixed wait between attempts. */
  retryDelayMs: number;
}

export interface ConnectorOptions<C extends Closable> extends RetryPolicy {
  connect: () => Promise<C>;
  /** Which establishment failures are worth another attempt. */
  isTransient?: (err: unknown) => boolean;
  logger?: Logger;
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error("The operation was aborted");
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!signal) {
      setTimeout(resolve, ms);
      return;
    }
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Scoped access to a backend: every `withConnection` call opens its own
 * connection, retries opening it, and closes it on every exit path.
 */
export class ResilientConnector<C extends Closable> {
  private readonly connect: () => Promise<C>;
  private readonly isTransient: (err: unknown) => boolean;
  private readonly log: Logger;
  readonly maxRetries: number;
  readonly retryDelayMs: number;

  constructor(options: ConnectorOptions<C>) {
    this.connect = options.connect;
    this.isTransient = options.isTransient ?? ((err) => !isContractError(err));
    this.log = options.logger ?? createLogger("Connector");
    this.maxRetries = Math.max(1, Math.floor(options.maxRetries));
    this.retryDelayMs = Math.max(0, options.retryDelayMs);
  }

  private async establish(signal?: AbortSignal): Promise<C> {
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      signal?.throwIfAborted();
      try {
        return await this.connect();
      } catch (err) {
        if (!this.isTransient(err)) throw err;
        lastError = err;
        if (attempt < this.maxRetries) {
          this.log.warn(
            `Connection attempt ${attempt} failed: ${errorMessage(err)}. Retrying in ${this.retryDelayMs}ms...`,
          );
          await sleep(this.retryDelayMs, signal);
        }
      }
    }

    this.log.error(
      `All connection attempts failed after ${this.maxRetries} retries: ${errorMessage(lastError)}`,
    );
    throw new TransientBackendError(
      `Could not connect after ${this.maxRetries} attempts: ${errorMessage(lastError)}`,
      this.maxRetries,
      lastError,
    );
  }

  async withConnection<T>(
    body: (connection: C, signal?: AbortSignal) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const connection = await this.establish(signal);
    try {
      signal?.throwIfAborted();
      return await body(connection, signal);
    } finally {
      try {
        await connection.close();
      } catch (err) {
        this.log.warn(`Error closing connection: ${errorMessage(err)}`);
      }
    }
  }
}
