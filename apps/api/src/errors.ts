// ─── Error taxonomy ───────────────────────────────────────
// Anything that is not an AppError is unclassified and becomes a 500.
export class AppError extends Error {
  constructor(
    message: string,
    readonly status: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Duplicate unique key, e.g. an e-mail that is already registered. */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

/** Input rejected before any work or mutation happens. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class StoreUnavailableError extends AppError {
  constructor(cause: unknown) {
    super("Database connection failed", 503, { cause });
  }
}

// Postgres SQLSTATE codes the repository translates
export const PG_UNIQUE_VIOLATION = "23505";
export const PG_FOREIGN_KEY_VIOLATION = "23503";

export function pgErrorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
