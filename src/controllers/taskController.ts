/**
 * @file taskController.ts
 * @description HTTP handlers delegating to the task service
 */

import { Request, Response } from "express";
import { TaskService } from "../core/taskService";
import { TaskQueue } from "../core/taskQueue";
import { WorkerPool } from "../core/workerPool";
import { ErrorHandler } from "../core/errorHandler";
import { TaskError, TaskErrorCode } from "../errors/taskError";
import { PushNotificationService } from "../services/pushNotificationService";
import { StreamingService } from "../services/streamingService";
import { Logger } from "../utils/logger";

/**
 * @interface TaskControllerDeps
 * @description Collaborators the controller reads from
 */
export interface TaskControllerDeps {
  service: TaskService;
  queue: TaskQueue;
  pool: WorkerPool;
  streamingService: StreamingService;
  pushNotificationService: PushNotificationService;
}

function readBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return typeof body === "object" && body !== null && !Array.isArray(body)
    ? Object.fromEntries(Object.entries(body))
    : {};
}

function requireString(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  if (typeof value !== "string") {
    throw new TaskError(TaskErrorCode.INVALID_PAYLOAD, `Field "${key}" must be a string`);
  }
  return value;
}

/**
 * @class TaskController
 * @description Handlers are arrow properties so they can be mounted directly
 */
export class TaskController {
  private readonly service: TaskService;
  private readonly queue: TaskQueue;
  private readonly pool: WorkerPool;
  private readonly streamingService: StreamingService;
  private readonly pushNotificationService: PushNotificationService;

  constructor(deps: TaskControllerDeps) {
    this.service = deps.service;
    this.queue = deps.queue;
    this.pool = deps.pool;
    this.streamingService = deps.streamingService;
    this.pushNotificationService = deps.pushNotificationService;
  }

  /**
   * @method healthCheck
   * @description Check service health
   */
  public healthCheck = async (_req: Request, res: Response): Promise<void> => {
    res.json({
      status: "healthy",
      queue: {
        queued: this.queue.getQueueStatus().queuedTasks,
        running: this.pool.runningCount(),
        peak: this.pool.peakRunning(),
      },
    });
  };

  public submitTasks = async (req: Request, res: Response): Promise<void> => {
    try {
      const text = requireString(readBody(req), "text");
      const tasks = await this.service.submit(text);
      Logger.info(`Submitted ${tasks.length} task(s)`);
      res.status(201).json(tasks);
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };

  public listTasks = async (_req: Request, res: Response): Promise<void> => {
    res.json(this.service.listTasks());
  };

  public getTask = async (req: Request, res: Response): Promise<void> => {
    try {
      res.json(this.service.getTask(req.params.taskId));
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };

  public deleteTask = async (req: Request, res: Response): Promise<void> => {
    try {
      await this.service.deleteTask(req.params.taskId);
      res.status(204).end();
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };

  public openFolder = async (req: Request, res: Response): Promise<void> => {
    try {
      const path = await this.service.openFolder(req.params.taskId);
      res.json({ path });
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };

  public openFile = async (req: Request, res: Response): Promise<void> => {
    try {
      const path = await this.service.openFile(req.params.taskId);
      res.json({ path });
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };

  public openPath = async (req: Request, res: Response): Promise<void> => {
    try {
      const target = requireString(readBody(req), "path");
      const path = await this.service.openPath(target);
      res.json({ path });
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };

  public fileStatus = async (req: Request, res: Response): Promise<void> => {
    try {
      res.json({ status: await this.service.fileStatus(req.params.taskId) });
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };

  public resumeStatus = async (req: Request, res: Response): Promise<void> => {
    try {
      res.json({ status: await this.service.resumeStatus(req.params.taskId) });
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };

  public resumeTask = async (req: Request, res: Response): Promise<void> => {
    try {
      res.json(await this.service.resume(req.params.taskId));
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };

  public forceResumeTask = async (req: Request, res: Response): Promise<void> => {
    try {
      res.json(await this.service.forceResume(req.params.taskId));
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };

  public listProfiles = async (_req: Request, res: Response): Promise<void> => {
    res.json(this.service.listProfiles());
  };

  public getActiveProfile = async (_req: Request, res: Response): Promise<void> => {
    try {
      res.json(this.service.getActiveProfile());
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };

  public setActiveProfile = async (req: Request, res: Response): Promise<void> => {
    try {
      const id = requireString(readBody(req), "id");
      res.json(await this.service.setActiveProfile(id));
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };

  public exportTasks = async (_req: Request, res: Response): Promise<void> => {
    res.type("application/json").send(this.service.exportTasks());
  };

  public exportTasksToFile = async (_req: Request, res: Response): Promise<void> => {
    try {
      res.json({ path: await this.service.exportTasksToFile() });
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };

  public importTasks = async (req: Request, res: Response): Promise<void> => {
    try {
      const body = readBody(req);
      const tasks = await this.service.importTasks({
        payload: body.payload,
        mode: body.mode,
        overwriteDownloaded: body.overwriteDownloaded === true,
      });
      res.json(tasks);
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };

  /**
   * @method subscribeSSE
   * @description Opens the task-update stream, optionally for one task
   */
  public subscribeSSE = async (req: Request, res: Response): Promise<void> => {
    const taskId = typeof req.query.taskId === "string" ? req.query.taskId : undefined;
    this.streamingService.subscribe(res, taskId || undefined);
  };

  public subscribeWebhook = async (req: Request, res: Response): Promise<void> => {
    try {
      const url = requireString(readBody(req), "url");
      this.pushNotificationService.subscribeWebhook(url);
      res.status(201).json({ url });
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };

  public unsubscribeWebhook = async (req: Request, res: Response): Promise<void> => {
    try {
      const url = requireString(readBody(req), "url");
      if (!this.pushNotificationService.unsubscribeWebhook(url)) {
        throw TaskError.notFound("Webhook", url);
      }
      res.status(204).end();
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };
}
