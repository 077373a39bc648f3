export type ErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "CONTRACT_VIOLATION"
  | "STORAGE_ERROR"
  | "EMBEDDING_UNAVAILABLE";

/** Typed error for knowledge pipeline operations */
export class CarryoverError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = "CarryoverError";
    this.code = code;
  }

  static validation(message: string): CarryoverError {
    return new CarryoverError("VALIDATION_ERROR", message);
  }

  static notFound(entity: string, id: string): CarryoverError {
    return new CarryoverError("NOT_FOUND", `${entity} not found: ${id}`);
  }

  static contract(message: string): CarryoverError {
    return new CarryoverError("CONTRACT_VIOLATION", message);
  }

  static storage(message: string): CarryoverError {
    return new CarryoverError("STORAGE_ERROR", message);
  }

  static embeddingUnavailable(message: string): CarryoverError {
    return new CarryoverError("EMBEDDING_UNAVAILABLE", message);
  }
}

export function isContractViolation(err: unknown): err is CarryoverError {
  return err instanceof CarryoverError && err.code === "CONTRACT_VIOLATION";
}

/**
 * Result type for fallible operations.
 * Expected failures (bad input, storage trouble) travel as values.
 */
export type Result<T, E = CarryoverError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
