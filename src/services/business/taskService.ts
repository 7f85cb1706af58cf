/**
 * Task Service
 * Creates background tasks, hands them to the queue and moves them
 * through pending → processing → completed | failed.
 */

import { randomUUID } from "crypto";
import type { ListTasksFilter, ListTasksResult, TaskStore } from "../../repositories/taskRepository.js";
import type { TaskQueue } from "../external/queue/downloadQueue.js";
import type { Task, TaskPayload, TaskResult, TaskStatus } from "../../types/task.js";
import { AppError, errorMessage, InvalidTaskTransitionError, NotFoundError } from "../../utils/errors.js";

/** Allowed next states; terminal states have none */
const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["processing", "failed"],
  processing: ["completed", "failed"],
  completed: [],
  failed: [],
};

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export class TaskService {
  constructor(
    private readonly store: TaskStore,
    private readonly queue: TaskQueue,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Stores a pending task and enqueues it.
   * If the queue rejects it the task is marked failed and a 500 is thrown.
   */
  async submitTask(payload: TaskPayload): Promise<Task> {
    const task: Task = {
      id: randomUUID(),
      status: "pending",
      payload,
      createdAt: this.now().toISOString(),
      startedAt: null,
      completedAt: null,
      runId: null,
      result: null,
      error: null,
    };
    await this.store.put(task);

    let runId: string;
    try {
      runId = await this.queue.enqueue({ taskId: task.id, payload });
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[task] ✗ Failed to enqueue task ${task.id}: ${message}`);
      await this.markFailed(task.id, message);
      throw new AppError(`Failed to create task: ${message}`, 500);
    }

    const queued = await this.store.update(task.id, (current) => ({ ...current, runId }));
    return queued ?? { ...task, runId };
  }

  async getTask(id: string): Promise<Task> {
    const task = await this.store.get(id);
    if (!task) {
      throw new NotFoundError("Task", id);
    }
    return task;
  }

  /** Resolves undefined instead of throwing when the task is gone */
  async findTask(id: string): Promise<Task | undefined> {
    return this.store.get(id);
  }

  async deleteTask(id: string): Promise<void> {
    const deleted = await this.store.delete(id);
    if (!deleted) {
      throw new NotFoundError("Task", id);
    }
  }

  async listTasks(filter: ListTasksFilter): Promise<ListTasksResult> {
    return this.store.list(filter);
  }

  async markProcessing(id: string): Promise<Task> {
    return this.transition(id, "processing", (task) => ({
      ...task,
      startedAt: this.now().toISOString(),
    }));
  }

  async markCompleted(id: string, result: TaskResult): Promise<Task> {
    return this.transition(id, "completed", (task) => ({
      ...task,
      result,
      completedAt: this.now().toISOString(),
    }));
  }

  async markFailed(id: string, error: string, result: TaskResult | null = null): Promise<Task> {
    return this.transition(id, "failed", (task) => ({
      ...task,
      result: result ?? task.result,
      error,
      completedAt: this.now().toISOString(),
    }));
  }

  private async transition(id: string, to: TaskStatus, apply: (task: Task) => Task): Promise<Task> {
    const updated = await this.store.update(id, (task) => {
      if (!canTransition(task.status, to)) {
        throw new InvalidTaskTransitionError(id, task.status, to);
      }
      return { ...apply(task), status: to };
    });

    if (!updated) {
      throw new NotFoundError("Task", id);
    }
    console.log(`[task] ${id} → ${to}`);
    return updated;
  }
}
