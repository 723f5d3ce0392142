// src/lib/errors.ts
import type { ApiError } from "../middleware/errorHandler";

export class ValidationError extends Error implements ApiError {
  readonly statusCode = 400;

  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends Error implements ApiError {
  readonly statusCode = 404;

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

// On "save" the in-memory mutation has already happened
export class IOError extends Error implements ApiError {
  readonly statusCode = 500;
  details: { year: string; operation: "load" | "save"; cause: string };

  constructor(year: string, operation: "load" | "save", cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      operation === "save"
        ? `Failed to save ${year}; the last change may not survive a restart`
        : `Failed to load ${year}`
    );
    this.name = "IOError";
    this.details = { year, operation, cause: reason };
  }
}
