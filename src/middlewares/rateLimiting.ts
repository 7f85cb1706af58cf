/**
 * Rate Limiting Middleware
 * Prevents API abuse by limiting request rates.
 * Each app instance gets its own limiters (and counters).
 */

import rateLimit from "express-rate-limit";

/**
 * General API rate limiter.
 * Limits: 200 requests per 15 minutes per IP.
 */
export function createApiLimiter() {
  return rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    limit: 200,
    message: { error: "Too many requests from this IP, please try again later." },
    standardHeaders: true, // Return rate limit info in `RateLimit-*` headers
    legacyHeaders: false, // Disable `X-RateLimit-*` headers
  });
}

/**
 * Strict rate limiter for task submissions.
 * Limits: 20 requests per 15 minutes per IP.
 */
export function createStrictLimiter() {
  return rateLimit({
    windowMs: 15 * 60 * 1000,
    limit: 20,
    message: { error: "Too many requests, please slow down." },
    standardHeaders: true,
    legacyHeaders: false,
  });
}
