/**
 * @file packages/orchestrator/src/domain/errors/app-error.ts
 * @description Error taxonomy surfaced by the request pipeline and the HTTP layer.
 */

export const INTERNAL_ERROR_MESSAGE = 'Internal processing error';

/**
 * Base class for errors that carry an HTTP status. Operational errors are
 * expected outcomes (bad input, throttling) whose message is safe to return;
 * anything else is reported as a generic internal error.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly isOperational: boolean = true,
  ) {
    super(message);
    this.name = new.target.name;
  }

  /** The message a client may see. */
  get publicMessage(): string {
    return this.isOperational ? this.message : INTERNAL_ERROR_MESSAGE;
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Invalid JSON payload') {
    super(message, 400);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Unauthorized session access') {
    super(message, 403);
  }
}

export class FeatureDisabledError extends AppError {
  constructor(message: string) {
    super(message, 403);
  }
}

export class SessionNotFoundError extends AppError {
  constructor(message = 'Session not found') {
    super(message, 404);
  }
}

export class RateLimitError extends AppError {
  constructor(message = 'Rate limit exceeded') {
    super(message, 429);
  }
}

/** 440 is nonstandard ("login time-out") and kept for existing clients. */
export class SessionExpiredError extends AppError {
  constructor(message = 'Session expired') {
    super(message, 440);
  }
}

/** The session store could not answer; the message is still safe to return. */
export class SessionValidationError extends AppError {
  constructor(message = 'Session validation failed') {
    super(message, 500);
  }
}

export class ClassificationError extends AppError {
  constructor(message: string) {
    super(message, 502);
  }
}

export class InternalError extends AppError {
  constructor(message = INTERNAL_ERROR_MESSAGE) {
    super(message, 500, false);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
