/**
 * Base class for every error mvstore raises on purpose.
 */
export class MvStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A vector whose dimension does not match the store's configured dimension.
 */
export class ShapeError extends MvStoreError {
  constructor(
    message: string,
    readonly expected?: number,
    readonly actual?: number,
  ) {
    super(message);
  }
}

export class InvalidArgumentError extends MvStoreError {}

/**
 * Backend failure that survived every retry attempt of the connector.
 */
export class TransientBackendError extends MvStoreError {
  constructor(
    message: string,
    readonly attempts: number,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export class SchemaError extends MvStoreError {}

/**
 * Contract violations are never retried and always reach the caller.
 */
export function isContractError(err: unknown): boolean {
  return (
    err instanceof ShapeError ||
    err instanceof InvalidArgumentError ||
    err instanceof SchemaError
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
