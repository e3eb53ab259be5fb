export type ErrorCode =
  | "CLASSIFICATION_FAILED"
  | "EMPTY_QUERY"
  | "INDEX_UNAVAILABLE"
  | "EMBEDDING_FAILED"
  | "EXPANSION_LOOKUP_FAILED"
  | "VALIDATION_ERROR";

export interface ErrorDetail {
  field?: string;
  message: string;
}

export interface SerializedError {
  code: ErrorCode;
  message: string;
  details?: ErrorDetail[];
}

/**
 * Base class for errors the service reports to its callers.
 * `statusCode` is what the REST surface answers with.
 */
export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: ErrorDetail[],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

/** A document's type could not be determined. Fatal for that document only. */
export class ClassificationError extends AppError {
  constructor(message: string) {
    super("CLASSIFICATION_FAILED", message, 422);
  }
}

export class EmptyQueryError extends AppError {
  constructor(message = "Question must not be empty.") {
    super("EMPTY_QUERY", message, 400);
  }
}

export class IndexUnavailableError extends AppError {
  constructor(message = "Vector index is unavailable.", cause?: unknown) {
    super("INDEX_UNAVAILABLE", message, 503, undefined, { cause });
  }
}

export class EmbeddingFailedError extends AppError {
  constructor(message = "Query embedding failed.", cause?: unknown) {
    super("EMBEDDING_FAILED", message, 502, undefined, { cause });
  }
}

/** Raised inside citation expansion; logged and never surfaced to callers. */
export class ExpansionLookupError extends AppError {
  constructor(
    public readonly citationKey: string,
    cause?: unknown,
  ) {
    super(
      "EXPANSION_LOOKUP_FAILED",
      `Cross-reference lookup failed for ${citationKey}.`,
      500,
      undefined,
      { cause },
    );
  }
}

export class ValidationError extends AppError {
  constructor(message = "Validation failed", details?: ErrorDetail[]) {
    super("VALIDATION_ERROR", message, 400, details);
  }

  static fromZodError(error: {
    issues: Array<{ path: Array<string | number>; message: string }>;
  }): ValidationError {
    const details = error.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
    }));
    return new ValidationError("Validation failed", details);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
