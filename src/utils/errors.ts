export class RagError extends Error {
  constructor(message: string, public code: string = 'INTERNAL_ERROR', public status: number = 500) {
    super(message);
    this.name = 'RagError';
  }
}

export class ConfigurationError extends RagError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class DatabaseError extends RagError {
  constructor(message: string) {
    super(message, 'DATABASE_ERROR');
    this.name = 'DatabaseError';
  }
}

/**
 * A single provider call failed. Raised by providers and consumed by the router,
 * which turns it into a fallback or one of the request-level errors below.
 */
export class ApiError extends RagError {
  constructor(message: string, public provider?: string, public httpStatus?: number) {
    super(message, 'API_ERROR', 502);
    this.name = 'ApiError';
  }
}

export class ValidationError extends RagError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends RagError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

export class FileError extends RagError {
  constructor(message: string) {
    super(message, 'FILE_ERROR');
    this.name = 'FileError';
  }
}

export class UnsupportedFormatError extends RagError {
  constructor(message: string) {
    super(message, 'UnsupportedFormat', 415);
    this.name = 'UnsupportedFormatError';
  }
}

export class EmbeddingUnavailableError extends RagError {
  constructor(message: string, public backend?: string) {
    super(message, 'EmbeddingUnavailable', 503);
    this.name = 'EmbeddingUnavailableError';
  }
}

export class NoProviderAvailableError extends RagError {
  constructor(message: string, public attempted: string[] = []) {
    super(message, 'NoProviderAvailable', 503);
    this.name = 'NoProviderAvailableError';
  }
}

export class StreamInterruptedError extends RagError {
  constructor(message: string, public provider: string, public partial: string) {
    super(message, 'StreamInterrupted', 502);
    this.name = 'StreamInterruptedError';
  }
}

export class IndexCorruptionError extends RagError {
  constructor(message: string, public documentId?: string) {
    super(message, 'IndexCorruption');
    this.name = 'IndexCorruptionError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'APIUserAbortError');
}
