/**
 * Background task types.
 */

import type { BatchResult, DownloadOptions, DownloadResult, VideoInfo } from "./download.js";

export const TASK_STATUSES = ["pending", "processing", "completed", "failed"] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export type TaskPayload =
  | { kind: "download"; url: string; options: DownloadOptions }
  | { kind: "batch"; urls: string[]; options: DownloadOptions }
  | { kind: "info"; url: string };

export type TaskResult = DownloadResult | BatchResult | VideoInfo;

export interface Task {
  id: string;
  status: TaskStatus;
  payload: TaskPayload;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  /** Queue job id, set once the task has been enqueued */
  runId: string | null;
  result: TaskResult | null;
  error: string | null;
}

/** Message carried by the queue for one task. */
export interface TaskJobData {
  taskId: string;
  payload: TaskPayload;
}
