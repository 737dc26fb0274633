/**
 * @file server.ts
 * @description Wiring of the orchestrator and its Express surface
 */

import path from "path";
import express from "express";
import cors from "cors";
import { EnvConfig } from "./config/env";
import { EngineClient, EngineRunner, parseExtraArgs, resolveEnginePath } from "./clients/engineClient";
import { ConfigStore } from "./core/configStore";
import { ErrorHandler } from "./core/errorHandler";
import { MetadataResolver } from "./core/metadataResolver";
import { TaskSnapshotStore } from "./core/persistence";
import { TaskProcessor } from "./core/taskProcessor";
import { TaskQueue } from "./core/taskQueue";
import { TaskService } from "./core/taskService";
import { TaskStore } from "./core/taskStore";
import { WorkerPool } from "./core/workerPool";
import { TaskController } from "./controllers/taskController";
import { TaskError, TaskErrorCode } from "./errors/taskError";
import { Clock, Task, systemClock } from "./interfaces/task";
import { createTaskRoutes } from "./routes/taskRoutes";
import { PlatformShell, SystemShell } from "./services/platformShell";
import { PushNotificationService } from "./services/pushNotificationService";
import { StreamingService } from "./services/streamingService";

export const TASKS_FILE = "tasks.json";
export const CONFIG_FILE = "config.json";

/**
 * @interface AppContext
 * @description Every long-lived collaborator of one running service
 */
export interface AppContext {
  config: EnvConfig;
  store: TaskStore;
  snapshots: TaskSnapshotStore;
  configStore: ConfigStore;
  queue: TaskQueue;
  pool: WorkerPool;
  engine: EngineRunner;
  processor: TaskProcessor;
  service: TaskService;
  streamingService: StreamingService;
  pushNotificationService: PushNotificationService;
}

/**
 * @interface ContextOverrides
 * @description Replaceable collaborators, used by tests
 */
export interface ContextOverrides {
  engine?: EngineRunner;
  shell?: PlatformShell;
  clock?: Clock;
  prefetchMetadata?: boolean;
}

/**
 * @function createContext
 * @description Builds the object graph; nothing is loaded or started yet
 */
export function createContext(
  config: EnvConfig,
  overrides: ContextOverrides = {}
): AppContext {
  const clock = overrides.clock ?? systemClock;
  const engine =
    overrides.engine ??
    new EngineClient({
      enginePath: resolveEnginePath(config.ENGINE_PATH, config.DATA_DIR),
      extraArgs: parseExtraArgs(config.ENGINE_ARGS),
    });

  const snapshots = new TaskSnapshotStore(path.join(config.DATA_DIR, TASKS_FILE));
  const store = new TaskStore({ snapshots, clock });
  const configStore = new ConfigStore(path.join(config.DATA_DIR, CONFIG_FILE));
  const queue = new TaskQueue(config.QUEUE_CAPACITY);
  const resolver = new MetadataResolver(engine);

  const processor = new TaskProcessor({
    store,
    engine,
    resolver,
    profiles: configStore,
    downloadDir: config.DOWNLOAD_DIR,
    clock,
  });
  const pool = new WorkerPool(queue, processor, config.MAX_CONCURRENT_TASKS);

  const service = new TaskService({
    store,
    queue,
    resolver,
    configStore,
    shell: overrides.shell ?? new SystemShell(),
    downloadDir: config.DOWNLOAD_DIR,
    exportDir: config.EXPORT_DIR,
    clock,
    runningGraceMs: config.RUNNING_GRACE_MS,
    partialWindowMs: config.PARTIAL_WINDOW_MS,
    prefetchMetadata: overrides.prefetchMetadata,
  });

  const streamingService = new StreamingService();
  const pushNotificationService = new PushNotificationService();
  store.addStatusListener((task: Task) => {
    streamingService.notifyTaskUpdate(task);
    pushNotificationService.notifyTaskUpdate(task);
  });

  return {
    config,
    store,
    snapshots,
    configStore,
    queue,
    pool,
    engine,
    processor,
    service,
    streamingService,
    pushNotificationService,
  };
}

/**
 * @function createApp
 * @description Express app over an existing context
 */
export function createApp(context: AppContext): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: "10mb" }));

  const controller = new TaskController({
    service: context.service,
    queue: context.queue,
    pool: context.pool,
    streamingService: context.streamingService,
    pushNotificationService: context.pushNotificationService,
  });
  app.use(createTaskRoutes(controller));

  // Error handling middleware
  app.use(
    (
      err: unknown,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      if (err instanceof SyntaxError) {
        ErrorHandler.handleHttpError(
          new TaskError(TaskErrorCode.INVALID_PAYLOAD, "Request body is not valid JSON"),
          res
        );
        return;
      }
      ErrorHandler.handleHttpError(err, res);
    }
  );

  return app;
}
