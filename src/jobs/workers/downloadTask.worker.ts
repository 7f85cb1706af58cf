/**
 * Download Task Worker (BullMQ)
 * Consumes the download queue and runs each task through the orchestrator.
 */

import { Worker, type Job } from "bullmq";
import type { Redis } from "ioredis";
import { DOWNLOAD_QUEUE_NAME } from "../../config/queues.js";
import type { Task, TaskJobData } from "../../types/task.js";
import { runDownloadTask, type DownloadTaskDeps } from "../orchestrators/downloadTaskOrchestrator.js";

export interface DownloadWorkerOptions extends DownloadTaskDeps {
  connection: Redis;
  concurrency: number;
}

export function startDownloadWorker(options: DownloadWorkerOptions): Worker<TaskJobData, Task> {
  const { connection, concurrency, ...deps } = options;

  const handleJob = async (job: Job<TaskJobData, Task>): Promise<Task> => {
    console.log("[worker] processing", { jobId: job.id, taskId: job.data.taskId, kind: job.name });
    return runDownloadTask(job.data, deps);
  };

  const worker = new Worker<TaskJobData, Task>(DOWNLOAD_QUEUE_NAME, handleJob, {
    connection,
    concurrency,
    // Downloads with a recode can run for minutes
    lockDuration: 600000,
  });

  console.log("[worker] Starting worker for queue:", DOWNLOAD_QUEUE_NAME);
  console.log("[worker] Concurrency:", concurrency);

  worker.on("completed", (job, task) => {
    console.log(`[worker] ✓ completed ${job.id} (task ${task.status})`);
  });

  worker.on("failed", (job, err) => {
    console.error("[worker] ✗ failed", job?.id, err);
  });

  worker.on("error", (err) => {
    console.error("[worker] Worker error:", err);
  });

  return worker;
}
