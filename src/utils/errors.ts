/**
 * Custom Application Errors
 * Domain-specific error classes for better error handling.
 */

/**
 * Base application error class.
 * All domain errors should extend this.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Resource not found error (404).
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} with id '${identifier}' not found`
      : `${resource} not found`;
    super(message, 404);
  }
}

/**
 * Bad request error (400).
 */
export class BadRequestError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Request validation error (400) with per-field details.
 */
export class ValidationError extends BadRequestError {
  constructor(public details: ValidationIssue[]) {
    super("Validation failed");
  }
}

/**
 * Access denied error (403).
 */
export class ForbiddenError extends AppError {
  constructor(message = "Access denied") {
    super(message, 403);
  }
}

/**
 * yt-dlp exited with an error. The message carries its stderr.
 */
export class ExtractorError extends AppError {
  constructor(
    message: string,
    public exitCode: number | null = null
  ) {
    super(message, 502);
  }
}

/**
 * A task was asked to move backwards or out of a terminal state.
 */
export class InvalidTaskTransitionError extends AppError {
  constructor(taskId: string, from: string, to: string) {
    super(`Task ${taskId} cannot move from ${from} to ${to}`, 409);
  }
}

/**
 * Reads a message out of anything thrown.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
