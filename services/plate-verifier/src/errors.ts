export type DuplicateKeyField = "ownerId" | "plateKey";

export class DuplicateKeyError extends Error {
  constructor(
    readonly field: DuplicateKeyField,
    readonly value: string,
  ) {
    super(`${field} ${value} is already registered`);
    this.name = "DuplicateKeyError";
  }
}

/**
 * The backing store was unreachable or a read/write did not complete.
 * Never retried inside the service; callers decide.
 */
export class PersistenceFailureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceFailureError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
