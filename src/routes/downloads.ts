/**
 * Download Routes
 * Task submission endpoints.
 */

import { Router, type RequestHandler } from "express";
import { createDownloadController, type DownloadControllerDeps } from "../controllers/downloadController.js";
import { validateBody } from "../middlewares/validation.js";
import { batchDownloadSchema, downloadSchema } from "../middlewares/schemas/downloadSchemas.js";

export function createDownloadRouter(deps: DownloadControllerDeps, strictLimiter: RequestHandler): Router {
  const downloadRouter = Router();
  const controller = createDownloadController(deps);

  /** Download a single video */
  downloadRouter.post("/download", strictLimiter, validateBody(downloadSchema), controller.downloadSingle);

  /** Download several videos in one task */
  downloadRouter.post("/download/batch", strictLimiter, validateBody(batchDownloadSchema), controller.downloadBatch);

  /** Metadata without downloading */
  downloadRouter.post("/video-info", strictLimiter, controller.videoInfo);

  return downloadRouter;
}
