/**
 * Download Controller
 * Accepts download and metadata requests and hands them to the task queue.
 */

import type { Request, Response, NextFunction } from "express";
import { setTimeout as sleep } from "timers/promises";
import type { TaskService } from "../services/business/taskService.js";
import type { Task } from "../types/task.js";
import type { BatchDownloadBody, DownloadBody } from "../middlewares/schemas/downloadSchemas.js";
import { videoInfoQuerySchema } from "../middlewares/schemas/downloadSchemas.js";
import { parseQuery } from "../middlewares/validation.js";

export interface DownloadControllerDeps {
  tasks: TaskService;
  /** Upper bound on how long POST /video-info waits for the probe */
  videoInfoWaitMs: number;
}

type RouteParams = Record<string, string>;

const POLL_INTERVAL_MS = 100;

function isFinished(task: Task | undefined): boolean {
  return task?.status === "completed" || task?.status === "failed";
}

export function createDownloadController({ tasks, videoInfoWaitMs }: DownloadControllerDeps) {
  /**
   * Polls the task until it finishes or the wait runs out.
   */
  async function waitForTask(taskId: string): Promise<Task | undefined> {
    const deadline = Date.now() + videoInfoWaitMs;
    let task = await tasks.findTask(taskId);

    while (!isFinished(task) && Date.now() < deadline) {
      await sleep(Math.min(POLL_INTERVAL_MS, Math.max(deadline - Date.now(), 0)));
      task = await tasks.findTask(taskId);
    }
    return task;
  }

  return {
    /**
     * POST /download
     * Creates a single-item download task.
     */
    async downloadSingle(
      req: Request<RouteParams, unknown, DownloadBody>,
      res: Response,
      next: NextFunction
    ): Promise<void> {
      try {
        const { url, video, audio, subtitles } = req.body;
        const task = await tasks.submitTask({ kind: "download", url, options: { video, audio, subtitles } });

        res.status(202).json({
          task_id: task.id,
          status: "pending",
          message: `Download task created for ${url}`,
          run_id: task.runId,
        });
      } catch (error) {
        next(error);
      }
    },

    /**
     * POST /download/batch
     * Creates one task covering every URL, processed in order.
     */
    async downloadBatch(
      req: Request<RouteParams, unknown, BatchDownloadBody>,
      res: Response,
      next: NextFunction
    ): Promise<void> {
      try {
        const { urls, video, audio, subtitles } = req.body;
        const task = await tasks.submitTask({ kind: "batch", urls, options: { video, audio, subtitles } });

        res.status(202).json({
          task_id: task.id,
          status: "pending",
          message: `Batch download task created for ${urls.length} URLs`,
          run_id: task.runId,
        });
      } catch (error) {
        next(error);
      }
    },

    /**
     * POST /video-info?url=...
     * Answers inline when the probe is quick, otherwise points at the task.
     */
    async videoInfo(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const { url } = parseQuery(videoInfoQuerySchema, req.query);
        const submitted = await tasks.submitTask({ kind: "info", url });
        const task = await waitForTask(submitted.id);

        if (task?.status === "completed") {
          res.status(200).json({ success: true, info: task.result, task_id: submitted.id });
          return;
        }

        if (task?.status === "failed") {
          res.status(200).json({
            success: false,
            message: "Could not extract video information",
            error: task.error,
            task_id: submitted.id,
          });
          return;
        }

        res.status(200).json({
          success: false,
          message: "Processing, check task status",
          task_id: submitted.id,
          run_id: submitted.runId,
        });
      } catch (error) {
        next(error);
      }
    },
  };
}
