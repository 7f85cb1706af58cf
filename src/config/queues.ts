/**
 * BullMQ queues
 */

import { Queue } from "bullmq";
import type { Redis } from "ioredis";
import type { TaskJobData } from "../types/task.js";

export const DOWNLOAD_QUEUE_NAME = "downloadTasks";

export function createDownloadQueue(connection: Redis): Queue<TaskJobData> {
  return new Queue<TaskJobData>(DOWNLOAD_QUEUE_NAME, { connection });
}
