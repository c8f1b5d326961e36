/**
 * Registry / discovery error taxonomy.
 *
 * Every error carries a stable snake_case `code` so the API layer can map it
 * without matching on messages.
 */

export const ErrorCode = {
  NotFound: "not_found",
  Conflict: "conflict",
  ValidationError: "validation_error",
  EmbeddingUnavailable: "embedding_unavailable",
  IndexCorruption: "index_corruption",
  ConcurrentModification: "concurrent_modification",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export class RegistryError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends RegistryError {
  constructor(readonly entityId: string, what = "Entity") {
    super(ErrorCode.NotFound, `${what} "${entityId}" not found`);
  }
}

export class ConflictError extends RegistryError {
  constructor(readonly entityId: string) {
    super(ErrorCode.Conflict, `Entity "${entityId}" already exists`);
  }
}

export class ValidationError extends RegistryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.ValidationError, message, options);
  }
}

export class EmbeddingUnavailableError extends RegistryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.EmbeddingUnavailable, message, options);
  }
}

export class IndexCorruptionError extends RegistryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.IndexCorruption, message, options);
  }
}

export class ConcurrentModificationError extends RegistryError {
  constructor(readonly entityId: string, message: string) {
    super(ErrorCode.ConcurrentModification, message);
  }
}

export function isRegistryError(error: unknown): error is RegistryError {
  return error instanceof RegistryError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
