/**
 * Validation Middleware
 * Validates request bodies and query strings against Zod schemas.
 */

import type { Request, Response, NextFunction } from "express";
import { ZodError, type ZodSchema, type ZodTypeDef } from "zod";
import { ValidationError } from "../utils/errors.js";

function formatIssues(error: ZodError) {
  return error.issues.map((e) => ({
    path: e.path.join("."),
    message: e.message,
  }));
}

/**
 * Validates request body against a Zod schema.
 * Returns 400 with validation errors if invalid.
 */
export function validateBody(schema: ZodSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      req.body = schema.parse(req.body);
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        res.status(400).json({
          error: "Validation failed",
          details: formatIssues(error),
        });
      } else {
        next(error);
      }
    }
  };
}

/**
 * Parses a query string with a Zod schema.
 * Throws a 400 ValidationError for the error handler if invalid.
 */
export function parseQuery<T>(schema: ZodSchema<T, ZodTypeDef, unknown>, query: unknown): T {
  const parsed = schema.safeParse(query);
  if (!parsed.success) {
    throw new ValidationError(formatIssues(parsed.error));
  }
  return parsed.data;
}
