/**
 * Error Handler Middleware
 * Centralized error handling for Express application.
 */

import type { Request, Response, NextFunction } from "express";
import { AppError, NotFoundError, ValidationError, type ValidationIssue } from "../utils/errors.js";
import { NODE_ENV } from "../config/env.js";

interface ErrorResponse {
  error: string;
  details?: ValidationIssue[];
  stack?: string;
}

/**
 * Status for errors raised outside our own classes
 * (body-parser sets `status` on malformed JSON).
 */
function statusOf(error: Error): number {
  if (error instanceof AppError) {
    return error.statusCode;
  }
  if ("status" in error && typeof error.status === "number" && error.status >= 400 && error.status < 600) {
    return error.status;
  }
  return 500;
}

/**
 * Fallback for requests that matched no route.
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route ${req.method} ${req.path}`));
}

/**
 * Global error handler middleware.
 * Catches all errors and returns appropriate responses.
 * MUST be registered last in middleware chain.
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  // Express recognises error handlers by arity
  _next: NextFunction
): void {
  const statusCode = statusOf(error);
  const message = error.message || "Internal server error";

  console.error(`[Error] ${statusCode} - ${message}`, {
    error: error.name,
    path: req.path,
    method: req.method,
    ...(statusCode >= 500 ? { stack: error.stack } : {}),
  });

  const response: ErrorResponse = {
    error: message,
  };

  if (error instanceof ValidationError) {
    response.details = error.details;
  }

  // Include stack trace in development
  if (NODE_ENV !== "production" && statusCode >= 500) {
    response.stack = error.stack;
  }

  res.status(statusCode).json(response);
}
