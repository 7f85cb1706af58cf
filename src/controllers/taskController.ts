/**
 * Task Controller
 * Status lookups, listing and deletion of background tasks.
 */

import type { Request, Response, NextFunction } from "express";
import type { TaskService } from "../services/business/taskService.js";
import type { Task } from "../types/task.js";
import { listTasksQuerySchema } from "../middlewares/schemas/downloadSchemas.js";
import { parseQuery } from "../middlewares/validation.js";

function taskUrl(task: Task): string | string[] {
  return task.payload.kind === "batch" ? task.payload.urls : task.payload.url;
}

export function createTaskController(tasks: TaskService) {
  return {
    /**
     * GET /task/:taskId
     */
    async getTask(req: Request<{ taskId: string }>, res: Response, next: NextFunction): Promise<void> {
      try {
        const task = await tasks.getTask(req.params.taskId);
        res.status(200).json(task);
      } catch (error) {
        next(error);
      }
    },

    /**
     * DELETE /task/:taskId
     * Removes the record; a running task still finishes in the background.
     */
    async deleteTask(req: Request<{ taskId: string }>, res: Response, next: NextFunction): Promise<void> {
      try {
        const { taskId } = req.params;
        await tasks.deleteTask(taskId);
        res.status(200).json({ success: true, message: `Task ${taskId} deleted` });
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /tasks?status=&limit=
     * Newest first.
     */
    async listTasks(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const filter = parseQuery(listTasksQuerySchema, req.query);
        const { total, tasks: page } = await tasks.listTasks(filter);

        res.status(200).json({
          total,
          filtered: page.length,
          tasks: page.map((task) => ({
            task_id: task.id,
            kind: task.payload.kind,
            status: task.status,
            created_at: task.createdAt,
            completed_at: task.completedAt,
            url: taskUrl(task),
          })),
        });
      } catch (error) {
        next(error);
      }
    },
  };
}
