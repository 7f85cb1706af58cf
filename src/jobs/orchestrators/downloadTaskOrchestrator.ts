/**
 * Download Task Orchestrator
 * Runs one queued task end to end and records its terminal state:
 * processing → run payload → completed | failed
 */

import { downloadFromUrls } from "../../services/business/batchDownloadService.js";
import { downloadSingleVideo, type DownloadContext } from "../../services/business/downloadVideoService.js";
import { getVideoInfo } from "../../services/business/videoInfoService.js";
import type { TaskService } from "../../services/business/taskService.js";
import { toDownloadRequest } from "../../types/download.js";
import type { Task, TaskJobData } from "../../types/task.js";
import { errorMessage } from "../../utils/errors.js";

export interface DownloadTaskDeps {
  tasks: TaskService;
  context: DownloadContext;
}

/**
 * Executes a task payload. Resolves with the task in its terminal state;
 * rejects only when the task record itself cannot be updated.
 */
export async function runDownloadTask(data: TaskJobData, deps: DownloadTaskDeps): Promise<Task> {
  const { taskId, payload } = data;
  const { tasks, context } = deps;

  await tasks.markProcessing(taskId);

  try {
    switch (payload.kind) {
      case "download": {
        console.log(`[orchestrator] download task ${taskId}: ${payload.url}`);
        const result = await downloadSingleVideo(context, toDownloadRequest(payload.url, payload.options));
        if (result.success) {
          return await tasks.markCompleted(taskId, result);
        }
        return await tasks.markFailed(taskId, result.error ?? "Download failed", result);
      }

      case "batch": {
        console.log(`[orchestrator] batch task ${taskId}: ${payload.urls.length} URLs`);
        const result = await downloadFromUrls(context, payload.urls, payload.options);
        console.log(
          `[orchestrator] batch task ${taskId}: ${result.successfulDownloads}/${result.totalVideos} successful`
        );
        return await tasks.markCompleted(taskId, result);
      }

      case "info": {
        console.log(`[orchestrator] info task ${taskId}: ${payload.url}`);
        const info = await getVideoInfo(context.extractor, payload.url);
        return await tasks.markCompleted(taskId, info);
      }
    }
  } catch (error) {
    const message = errorMessage(error);
    console.error(`[orchestrator] ✗ task ${taskId} failed: ${message}`);
    return await tasks.markFailed(taskId, message);
  }
}
