/**
 * Health Check Routes
 * Infrastructure endpoints for monitoring and orchestration.
 */

import { Router } from "express";

export const API_NAME = "Social Video Downloader API";
export const API_VERSION = "2.0.0";

export function createHealthRouter(downloadDir: string): Router {
  const healthRouter = Router();

  /** API information and endpoint list. */
  healthRouter.get("/", (_req, res) => {
    res.json({
      name: API_NAME,
      version: API_VERSION,
      endpoints: {
        "GET /": "API information",
        "GET /health": "Health check",
        "POST /download": "Download single video",
        "POST /download/batch": "Download multiple videos",
        "GET /task/:taskId": "Check task status",
        "DELETE /task/:taskId": "Delete task result",
        "GET /tasks": "List tasks",
        "POST /video-info": "Get video information",
        "GET /files/:date/:folder/:filename": "Download file",
      },
    });
  });

  /** Simple health check endpoint. */
  healthRouter.get("/health", (_req, res) => {
    res.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      downloadDir,
    });
  });

  return healthRouter;
}
