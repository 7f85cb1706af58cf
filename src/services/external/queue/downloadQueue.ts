/**
 * Download task queue.
 * Uses BullMQ with Redis (TCP) for real workers.
 */

import type { Queue } from "bullmq";
import type { TaskJobData } from "../../../types/task.js";

export interface TaskQueue {
  /** Hands a task to the worker pool; resolves the queue's run id */
  enqueue(data: TaskJobData): Promise<string>;
  close(): Promise<void>;
}

export class BullTaskQueue implements TaskQueue {
  constructor(private readonly queue: Queue<TaskJobData>) {}

  async enqueue(data: TaskJobData): Promise<string> {
    const job = await this.queue.add(data.payload.kind, data, {
      // One task, one job: the task id doubles as the BullMQ job id
      jobId: data.taskId,
      attempts: 1,
      removeOnComplete: { age: 86400, count: 1000 },
      removeOnFail: { age: 86400, count: 100 },
    });

    const runId = job.id ?? data.taskId;
    console.log(`[enqueue] Task ${data.taskId} enqueued as ${data.payload.kind} (run ${runId})`);
    return runId;
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}
