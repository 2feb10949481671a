/**
 * Error taxonomy.
 *
 * Every failure the core raises is an AppError carrying a stable `code`
 * and the HTTP status the API answers with.
 */

export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, statusCode: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/** Malformed input. Never retried. */
export class ValidationError extends AppError {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super('VALIDATION_ERROR', 400, message);
    this.issues = issues;
  }
}

export class EmbeddingError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EMBEDDING_ERROR', 502, message, options);
  }
}

export class IndexQueryError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INDEX_QUERY_ERROR', 502, message, options);
  }
}

export class IndexUpsertError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INDEX_UPSERT_ERROR', 502, message, options);
  }
}

/** Upsert batch too large for the index; the caller shrinks the batch instead of retrying as-is. */
export class PayloadTooLargeError extends AppError {
  readonly recordCount: number;

  constructor(recordCount: number, message = `Upsert payload of ${recordCount} records exceeds the index limit`) {
    super('PAYLOAD_TOO_LARGE', 413, message);
    this.recordCount = recordCount;
  }
}

export class GenerationError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('GENERATION_ERROR', 502, message, options);
  }
}

export class TimeoutError extends AppError {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super('TIMEOUT', 504, `${operation} timed out after ${timeoutMs}ms`);
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/** The caller went away (client disconnect, script interrupted). */
export class CancelledError extends AppError {
  constructor(operation: string) {
    super('CANCELLED', 499, `${operation} was cancelled`);
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super('CONFIG_ERROR', 500, message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

type AppErrorClass = new (message: string, options?: { cause?: unknown }) => AppError;

/**
 * Typed errors pass through; anything else becomes `Wrap` with the
 * original as cause.
 */
export function toAppError(error: unknown, Wrap: AppErrorClass, message: string): AppError {
  if (error instanceof AppError) {
    return error;
  }
  return new Wrap(`${message}: ${errorMessage(error)}`, { cause: error });
}
