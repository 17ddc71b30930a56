export type ErrorKind = "unauthorized" | "not_found" | "conflict" | "invalid_request" | "internal";

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  unauthorized: 401,
  not_found: 404,
  conflict: 409,
  invalid_request: 400,
  internal: 500,
};

export class AppError extends Error {
  readonly kind: ErrorKind;
  readonly details?: unknown;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown; details?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "AppError";
    this.kind = kind;
    this.details = options?.details;
  }

  get statusCode(): number {
    return STATUS_BY_KIND[this.kind];
  }

  toPayload(): { error: ErrorKind; message: string; issues?: unknown } {
    if (this.details === undefined) return { error: this.kind, message: this.message };
    return { error: this.kind, message: this.message, issues: this.details };
  }
}

export type StoreErrorReason = "unique_violation" | "foreign_key_violation";

/** Raised by store implementations for constraint failures the caller can act on. */
export class StoreError extends Error {
  readonly reason: StoreErrorReason;
  readonly constraint: string | null;

  constructor(reason: StoreErrorReason, constraint: string | null, options?: { cause?: unknown }) {
    super(`${reason}${constraint ? ` (${constraint})` : ""}`, { cause: options?.cause });
    this.name = "StoreError";
    this.reason = reason;
    this.constraint = constraint;
  }
}

/**
 * Maps anything thrown below the HTTP layer onto the public taxonomy.
 * Messages of internal failures are replaced; callers log the original.
 */
export function toAppError(e: unknown): AppError {
  if (e instanceof AppError) return e;
  if (e instanceof StoreError) {
    if (e.reason === "unique_violation") {
      return new AppError("conflict", "Resource already exists", { cause: e });
    }
    return new AppError("not_found", "Not found", { cause: e });
  }
  return new AppError("internal", "Internal server error", { cause: e });
}
