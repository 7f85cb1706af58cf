import express, { type Express } from "express";
import helmet from "helmet";
import cors from "cors";
import { createRouter } from "./routes/index.js";
import { createApiLimiter, createStrictLimiter } from "./middlewares/rateLimiting.js";
import { errorHandler, notFoundHandler } from "./middlewares/errorHandler.js";
import type { TaskService } from "./services/business/taskService.js";

export interface AppDeps {
  tasks: TaskService;
  downloadDir: string;
  videoInfoWaitMs: number;
}

/**
 * Builds the Express application.
 * Configures global middleware and routes.
 */
export function createApp(deps: AppDeps): Express {
  const app = express();

  /** Disable the X-Powered-By header to reduce fingerprinting. */
  app.disable("x-powered-by");

  /** Adds standard security headers. */
  app.use(helmet());
  /** Enables CORS for cross-origin requests. */
  app.use(cors());
  /** Parses JSON request bodies with a 1MB limit. */
  app.use(express.json({ limit: "1mb" }));

  /** Rate limiting for all routes. */
  app.use(createApiLimiter());

  /** Application routes. */
  app.use(createRouter({ ...deps, strictLimiter: createStrictLimiter() }));

  app.use(notFoundHandler);

  /** Global error handler - MUST be last. */
  app.use(errorHandler);

  return app;
}
