/**
 * File Routes
 * Read-only access to the download directory.
 */

import { Router } from "express";
import { createFileController, rejectTraversal } from "../controllers/fileController.js";

export function createFileRouter(downloadDir: string): Router {
  const fileRouter = Router();
  const controller = createFileController(downloadDir);

  fileRouter.use(rejectTraversal);
  fileRouter.get("/:date/:folder/:filename", controller.downloadFile);

  return fileRouter;
}
