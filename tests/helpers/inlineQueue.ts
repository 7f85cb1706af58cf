/**
 * In-process TaskQueue: runs each job right after it is enqueued.
 */

import type { TaskQueue } from "../../src/services/external/queue/downloadQueue.js";
import type { TaskJobData } from "../../src/types/task.js";

export class InlineTaskQueue implements TaskQueue {
  readonly jobs: TaskJobData[] = [];
  private readonly running: Promise<unknown>[] = [];
  private handler: ((data: TaskJobData) => Promise<unknown>) | null = null;

  constructor(private readonly failure: Error | null = null) {}

  /** Registers the worker function; without one, jobs just sit in `jobs` */
  process(handler: (data: TaskJobData) => Promise<unknown>): void {
    this.handler = handler;
  }

  async enqueue(data: TaskJobData): Promise<string> {
    if (this.failure) {
      throw this.failure;
    }
    this.jobs.push(data);
    const handler = this.handler;
    if (handler) {
      this.running.push(Promise.resolve().then(() => handler(data)));
    }
    return `run-${this.jobs.length}`;
  }

  /** Waits for every job started so far */
  async drain(): Promise<void> {
    await Promise.all(this.running);
  }

  async close(): Promise<void> {
    await this.drain();
  }
}
