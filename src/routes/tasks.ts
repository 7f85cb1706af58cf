/**
 * Task Routes
 */

import { Router } from "express";
import { createTaskController } from "../controllers/taskController.js";
import type { TaskService } from "../services/business/taskService.js";

export function createTaskRouter(tasks: TaskService): Router {
  const taskRouter = Router();
  const controller = createTaskController(tasks);

  taskRouter.get("/task/:taskId", controller.getTask);
  taskRouter.delete("/task/:taskId", controller.deleteTask);
  taskRouter.get("/tasks", controller.listTasks);

  return taskRouter;
}
