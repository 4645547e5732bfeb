// src/lib/errors.ts
export type FieldErrors = Record<string, string>;

export class AppError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.details = details;
  }
}

/** Malformed input or a broken invariant. `details` maps field → message. */
export class ValidationError extends AppError {
  declare readonly details: FieldErrors;

  constructor(details: FieldErrors, message = "Validation failed") {
    super(400, message, details);
  }
}

export class AuthenticationError extends AppError {
  constructor(message = "Not authenticated") {
    super(401, message);
  }
}

export class AuthorizationError extends AppError {
  constructor(message = "Forbidden") {
    super(403, message);
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string) {
    super(404, `${entity} not found`);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(409, message);
  }
}

/** An illegal state-machine transition, e.g. resubmitting a graded submission. */
export class InvalidStateError extends AppError {
  constructor(message: string, details?: { from: string; to: string }) {
    super(409, message, details);
  }
}

// MongoServerError E11000
export const isDuplicateKeyError = (err: unknown): boolean =>
  typeof err === "object" &&
  err !== null &&
  "code" in err &&
  err.code === 11000;
