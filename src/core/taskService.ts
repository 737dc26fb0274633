/**
 * @file taskService.ts
 * @description Every operation the outside world can invoke on the orchestrator
 */

import fs from "fs/promises";
import path from "path";
import {
  Clock,
  FileStatus,
  ImportMode,
  Profile,
  ResumeStatus,
  Task,
  TaskStage,
  TaskStatus,
  systemClock,
} from "../interfaces/task";
import { TaskError, TaskErrorCode } from "../errors/taskError";
import { PlatformShell } from "../services/platformShell";
import { Logger } from "../utils/logger";
import { extractUrls } from "../utils/urls";
import { ConfigStore } from "./configStore";
import {
  parseImportMode,
  parseImportPayload,
  reconcileImport,
  resetDownloaded,
} from "./importReconciler";
import { MetadataResolver } from "./metadataResolver";
import {
  dateBucket,
  isDirectory,
  isOutputMissing,
  isRegularFile,
  taskOutputDir,
} from "./outputFiles";
import { errorText, serializeJson, writeFileAtomic } from "./persistence";
import {
  DEFAULT_PARTIAL_WINDOW_MS,
  DEFAULT_RUNNING_GRACE_MS,
  inspectResumeStatus,
  isActivelyRunning,
} from "./resumeHeuristic";
import { applyMetadata } from "./taskProcessor";
import { TaskQueue } from "./taskQueue";
import { TaskStore } from "./taskStore";

export interface TaskServiceDeps {
  store: TaskStore;
  queue: TaskQueue;
  resolver: MetadataResolver;
  configStore: ConfigStore;
  shell: PlatformShell;
  downloadDir: string;
  exportDir: string;
  clock?: Clock;
  runningGraceMs?: number;
  partialWindowMs?: number;
  /** Resolve titles in the background right after submit (default true) */
  prefetchMetadata?: boolean;
}

export interface ImportOptions {
  payload: unknown;
  mode: unknown;
  overwriteDownloaded?: boolean;
}

/**
 * @class TaskService
 * @description Facade over the store, queue and collaborators
 */
export class TaskService {
  private readonly store: TaskStore;
  private readonly queue: TaskQueue;
  private readonly resolver: MetadataResolver;
  private readonly configStore: ConfigStore;
  private readonly shell: PlatformShell;
  private readonly downloadDir: string;
  private readonly exportDir: string;
  private readonly clock: Clock;
  private readonly runningGraceMs: number;
  private readonly partialWindowMs: number;
  private readonly prefetchMetadata: boolean;
  private readonly prefetches = new Set<Promise<void>>();

  constructor(deps: TaskServiceDeps) {
    this.store = deps.store;
    this.queue = deps.queue;
    this.resolver = deps.resolver;
    this.configStore = deps.configStore;
    this.shell = deps.shell;
    this.downloadDir = deps.downloadDir;
    this.exportDir = deps.exportDir;
    this.clock = deps.clock ?? systemClock;
    this.runningGraceMs = deps.runningGraceMs ?? DEFAULT_RUNNING_GRACE_MS;
    this.partialWindowMs = deps.partialWindowMs ?? DEFAULT_PARTIAL_WINDOW_MS;
    this.prefetchMetadata = deps.prefetchMetadata ?? true;
  }

  /**
   * @method submit
   * @description Creates one task per distinct locator found in the text
   * and queues them
   */
  public async submit(text: string): Promise<Task[]> {
    const urls = extractUrls(text);
    if (urls.length === 0) {
      return [];
    }

    const created = await this.store.createTasks(urls);
    if (this.prefetchMetadata) {
      created.forEach((task) => this.prefetch(task.id, task.url));
    }
    for (const task of created) {
      await this.enqueue(task.id);
    }
    return created.map((task) => this.store.getTask(task.id) ?? task);
  }

  /**
   * @method prefetch
   * @description Background title lookup; only a placeholder title changes
   */
  private prefetch(taskId: string, url: string): void {
    const job = this.resolver
      .resolve(url)
      .then(async (metadata) => {
        if (metadata) {
          await this.store.updateTask(taskId, (task) => applyMetadata(task, metadata, true));
        }
      })
      .catch((error: unknown) => {
        Logger.warn(`Metadata prefetch failed for ${taskId}: ${errorText(error)}`);
      })
      .finally(() => {
        this.prefetches.delete(job);
      });
    this.prefetches.add(job);
  }

  /**
   * @method settlePrefetches
   * @description Waits for background lookups started so far
   */
  public async settlePrefetches(): Promise<void> {
    await Promise.all(Array.from(this.prefetches));
  }

  /**
   * @method enqueue
   * @description Queues a task; a full queue marks it Failed so it can be
   * resumed later
   * @returns {Promise<boolean>} Whether the id was queued
   */
  private async enqueue(taskId: string): Promise<boolean> {
    try {
      this.queue.enqueueTask(taskId);
      return true;
    } catch (error) {
      if (error instanceof TaskError && error.code === TaskErrorCode.QUEUE_FULL) {
        const reason = error.message;
        Logger.warn(`Task ${taskId} not queued: ${reason}`);
        await this.store.updateTask(taskId, (task) => {
          task.status = TaskStatus.FAILED;
          task.errorMessage = reason;
        });
        return false;
      }
      throw error;
    }
  }

  public listTasks(): Task[] {
    return this.store.listTasks();
  }

  /**
   * @method getTask
   * @throws {TaskError} NOT_FOUND
   */
  public getTask(taskId: string): Task {
    const task = this.store.getTask(taskId);
    if (!task) {
      throw TaskError.notFound("Task", taskId);
    }
    return task;
  }

  /**
   * @method deleteTask
   * @description Trashes the downloaded file, then forgets the task
   * @throws {TaskError} NOT_FOUND, or DELETION_FAILED leaving the task intact
   */
  public async deleteTask(taskId: string): Promise<void> {
    const task = this.getTask(taskId);
    if (task.outputPath && (await isRegularFile(task.outputPath))) {
      try {
        await this.shell.trash(task.outputPath);
      } catch (error) {
        throw new TaskError(
          TaskErrorCode.DELETION_FAILED,
          `Failed to move ${task.outputPath} to trash: ${errorText(error)}`
        );
      }
    }
    if (!(await this.store.deleteTask(taskId))) {
      throw TaskError.notFound("Task", taskId);
    }
  }

  /**
   * @method outputDirFor
   * @description Parent of the output file, else the task's date bucket
   */
  public outputDirFor(task: Task): string {
    return task.outputPath
      ? path.dirname(task.outputPath)
      : taskOutputDir(this.downloadDir, task.createdAt);
  }

  public async openFolder(taskId: string): Promise<string> {
    const dir = this.outputDirFor(this.getTask(taskId));
    if (!(await isDirectory(dir))) {
      throw new TaskError(TaskErrorCode.NOT_FOUND, `Output directory ${dir} not found`);
    }
    await this.shell.open(dir);
    return dir;
  }

  /**
   * @method openFile
   * @throws {TaskError} OUTPUT_PENDING before success, FILE_MISSING when gone
   */
  public async openFile(taskId: string): Promise<string> {
    const { outputPath } = this.getTask(taskId);
    if (!outputPath) {
      throw new TaskError(TaskErrorCode.OUTPUT_PENDING, "Output file not available yet");
    }
    if (!(await isRegularFile(outputPath))) {
      throw new TaskError(TaskErrorCode.FILE_MISSING, `File ${outputPath} not found`);
    }
    await this.shell.open(outputPath);
    return outputPath;
  }

  /**
   * @method openPath
   * @description Opens a directory, or the directory containing a file
   */
  public async openPath(target: string): Promise<string> {
    if (!target.trim()) {
      throw new TaskError(TaskErrorCode.INVALID_PAYLOAD, "Path is required");
    }
    if (await isDirectory(target)) {
      await this.shell.open(target);
      return target;
    }
    if (await isRegularFile(target)) {
      const dir = path.dirname(target);
      await this.shell.open(dir);
      return dir;
    }
    throw new TaskError(TaskErrorCode.NOT_FOUND, `Path ${target} not found`);
  }

  public async fileStatus(taskId: string): Promise<FileStatus> {
    const { outputPath } = this.getTask(taskId);
    if (!outputPath) {
      return "pending";
    }
    return (await isRegularFile(outputPath)) ? "ok" : "missing";
  }

  public async resumeStatus(taskId: string): Promise<ResumeStatus> {
    const task = this.getTask(taskId);
    return inspectResumeStatus(task, taskOutputDir(this.downloadDir, task.createdAt), {
      now: this.clock(),
      graceMs: this.runningGraceMs,
      partialWindowMs: this.partialWindowMs,
    });
  }

  /**
   * @method resume
   * @throws {TaskError} NOT_FOUND, ALREADY_RUNNING
   */
  public resume(taskId: string): Promise<Task> {
    return this.requeue(taskId, TaskStage.RESUME, true);
  }

  /**
   * @method forceResume
   * @description Requeues even a task that looks actively running
   */
  public forceResume(taskId: string): Promise<Task> {
    return this.requeue(taskId, TaskStage.FORCE_RESUME, false);
  }

  private async requeue(taskId: string, stage: TaskStage, guard: boolean): Promise<Task> {
    const now = this.clock();
    const updated = await this.store.updateTask(taskId, (task) => {
      if (guard && isActivelyRunning(task, now, this.runningGraceMs)) {
        throw new TaskError(TaskErrorCode.ALREADY_RUNNING, `Task ${taskId} is already running`);
      }
      task.status = TaskStatus.QUEUED;
      task.stage = stage;
      task.progress = "";
      task.errorMessage = "";
      task.resume = true;
    });
    if (!updated) {
      throw TaskError.notFound("Task", taskId);
    }
    await this.enqueue(taskId);
    return this.store.getTask(taskId) ?? updated;
  }

  public listProfiles(): Profile[] {
    return this.configStore.listProfiles();
  }

  public getActiveProfile(): Profile {
    return this.configStore.getActiveProfile();
  }

  public setActiveProfile(profileId: string): Promise<Profile> {
    return this.configStore.setActiveProfile(profileId);
  }

  /**
   * @method exportTasks
   * @description Same JSON text as the persisted snapshot
   */
  public exportTasks(): string {
    return serializeJson(this.store.listTasks());
  }

  /**
   * @method exportTasksToFile
   * @returns {Promise<string>} Path of the written export
   */
  public async exportTasksToFile(): Promise<string> {
    const filePath = path.join(
      this.exportDir,
      `tasks-export-${dateBucket(this.clock())}.json`
    );
    await fs.mkdir(this.exportDir, { recursive: true });
    await writeFileAtomic(filePath, this.exportTasks());
    Logger.info(`Exported ${this.store.size} task(s) to ${filePath}`);
    return filePath;
  }

  /**
   * @method importTasks
   * @description Validates the whole payload, then merges or replaces
   * @throws {TaskError} INVALID_PAYLOAD
   */
  public async importTasks(options: ImportOptions): Promise<Task[]> {
    const mode: ImportMode = parseImportMode(options.mode);
    const incoming = parseImportPayload(options.payload, this.clock());

    for (const task of incoming) {
      if (options.overwriteDownloaded) {
        resetDownloaded(task);
      }
      task.missingOutput = await isOutputMissing(task.outputPath);
    }

    let enqueueIds: string[] = [];
    const tasks = await this.store.rebuild((current) => {
      const result = reconcileImport(current, incoming, mode);
      enqueueIds = result.enqueueIds;
      return result;
    });
    for (const id of enqueueIds) {
      await this.enqueue(id);
    }
    Logger.info(`Imported ${incoming.length} task(s) in ${mode} mode`);
    return enqueueIds.length > 0 ? this.store.listTasks() : tasks;
  }
}
