/**
 * Task Repository
 * Storage for background task records.
 */

import type { Task, TaskStatus } from "../types/task.js";
import { KeyedLock } from "../utils/keyedLock.js";

export interface ListTasksFilter {
  status?: TaskStatus;
  limit: number;
}

export interface ListTasksResult {
  /** Number of stored tasks before filtering */
  total: number;
  tasks: Task[];
}

export interface TaskStore {
  get(id: string): Promise<Task | undefined>;
  put(task: Task): Promise<void>;
  /**
   * Applies `mutate` to the stored task and saves the outcome.
   * Writers for the same id run one after another.
   * Resolves undefined when the task does not exist.
   */
  update(id: string, mutate: (task: Task) => Task): Promise<Task | undefined>;
  /** False when nothing was stored under the id */
  delete(id: string): Promise<boolean>;
  list(filter: ListTasksFilter): Promise<ListTasksResult>;
}

function sortKey(task: Task): string {
  return task.createdAt || task.startedAt || "";
}

/**
 * Process-local store. Records are lost on restart.
 */
export class InMemoryTaskStore implements TaskStore {
  private readonly tasks = new Map<string, Task>();
  private readonly lock = new KeyedLock();

  async get(id: string): Promise<Task | undefined> {
    const task = this.tasks.get(id);
    return task ? structuredClone(task) : undefined;
  }

  async put(task: Task): Promise<void> {
    this.tasks.set(task.id, structuredClone(task));
  }

  async update(id: string, mutate: (task: Task) => Task): Promise<Task | undefined> {
    return this.lock.run(id, async () => {
      const current = this.tasks.get(id);
      if (!current) {
        return undefined;
      }
      const next = mutate(structuredClone(current));
      this.tasks.set(id, structuredClone(next));
      return next;
    });
  }

  async delete(id: string): Promise<boolean> {
    return this.tasks.delete(id);
  }

  async list(filter: ListTasksFilter): Promise<ListTasksResult> {
    const all = Array.from(this.tasks.values());
    const tasks = all
      .filter((task) => !filter.status || task.status === filter.status)
      .sort((a, b) => sortKey(b).localeCompare(sortKey(a)))
      .slice(0, filter.limit)
      .map((task) => structuredClone(task));

    return { total: all.length, tasks };
  }

}
