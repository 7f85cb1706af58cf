/**
 * Route Aggregator
 * Combines all routers into a single router.
 */

import { Router, type RequestHandler } from "express";
import { createHealthRouter } from "./health.js";
import { createDownloadRouter } from "./downloads.js";
import { createTaskRouter } from "./tasks.js";
import { createFileRouter } from "./files.js";
import type { TaskService } from "../services/business/taskService.js";

export interface RouterDeps {
  tasks: TaskService;
  downloadDir: string;
  videoInfoWaitMs: number;
  strictLimiter: RequestHandler;
}

export function createRouter(deps: RouterDeps): Router {
  const router = Router();

  /** Register all route modules */
  router.use(createHealthRouter(deps.downloadDir));
  router.use(
    createDownloadRouter({ tasks: deps.tasks, videoInfoWaitMs: deps.videoInfoWaitMs }, deps.strictLimiter)
  );
  router.use(createTaskRouter(deps.tasks));
  router.use("/files", createFileRouter(deps.downloadDir));

  return router;
}
