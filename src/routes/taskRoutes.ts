/**
 * @file taskRoutes.ts
 * @description Express routes for task orchestration
 */

import express from "express";
import { TaskController } from "../controllers/taskController";

/**
 * @function createTaskRoutes
 * @description Mounts every handler of the controller. Literal task paths
 * come before `/tasks/:taskId` so they are not taken for ids.
 */
export function createTaskRoutes(controller: TaskController): express.Router {
  const router = express.Router();

  // Health check
  router.get("/health", controller.healthCheck);

  // Task management
  router.get("/tasks", controller.listTasks);
  router.post("/tasks", controller.submitTasks);
  router.get("/tasks/export", controller.exportTasks);
  router.post("/tasks/export", controller.exportTasksToFile);
  router.post("/tasks/import", controller.importTasks);
  router.get("/tasks/:taskId", controller.getTask);
  router.delete("/tasks/:taskId", controller.deleteTask);
  router.post("/tasks/:taskId/open-folder", controller.openFolder);
  router.post("/tasks/:taskId/open-file", controller.openFile);
  router.get("/tasks/:taskId/file-status", controller.fileStatus);
  router.get("/tasks/:taskId/resume-status", controller.resumeStatus);
  router.post("/tasks/:taskId/resume", controller.resumeTask);
  router.post("/tasks/:taskId/force-resume", controller.forceResumeTask);
  router.post("/open-path", controller.openPath);

  // Profiles
  router.get("/profiles", controller.listProfiles);
  router.get("/profiles/active", controller.getActiveProfile);
  router.put("/profiles/active", controller.setActiveProfile);

  // Notifications
  router.get("/events", controller.subscribeSSE);
  router.post("/events/webhooks", controller.subscribeWebhook);
  router.delete("/events/webhooks", controller.unsubscribeWebhook);

  return router;
}
