/**
 * @file taskProcessor.ts
 * @description Drives one task through its run: metadata, download, finalize
 */

import fs from "fs/promises";
import path from "path";
import { EngineRunner } from "../clients/engineClient";
import {
  Clock,
  Profile,
  Task,
  TaskMetadata,
  TaskStage,
  TaskStatus,
  systemClock,
} from "../interfaces/task";
import { Logger } from "../utils/logger";
import { MetadataResolver } from "./metadataResolver";
import { findOutputFile, isOutputMissing, regularFileSize, taskOutputDir } from "./outputFiles";
import { errorText } from "./persistence";
import { PROGRESS_TEMPLATE, applyProgress, parseProgressLine } from "./progressParser";
import { TaskStore } from "./taskStore";
import { isPlaceholderTitle, titleFromFileName } from "./titles";
import { TaskHandler } from "./workerPool";

export const OUTPUT_DIR_FAILURE = "failed to create output directory";

/**
 * @interface ProfileSource
 * @description Supplies the preset applied to the next run
 */
export interface ProfileSource {
  getActiveProfile(): Profile;
}

export interface TaskProcessorDeps {
  store: TaskStore;
  engine: EngineRunner;
  resolver: MetadataResolver;
  profiles: ProfileSource;
  downloadDir: string;
  clock?: Clock;
}

/**
 * @function applyMetadata
 * @description Copies resolved metadata onto a task. The title is only
 * replaced while it is a placeholder; numbers only when positive. A
 * non-empty source label replaces the host taken from the URL.
 * @returns {boolean} Whether any field changed
 */
export function applyMetadata(
  task: Task,
  metadata: TaskMetadata,
  titleOnly = false
): boolean {
  let changed = false;
  if (isPlaceholderTitle(task.title) && metadata.title && metadata.title !== task.title) {
    task.title = metadata.title;
    changed = true;
  }
  if (titleOnly) {
    return changed;
  }
  if (metadata.sourceHost && metadata.sourceHost !== task.sourceHost) {
    task.sourceHost = metadata.sourceHost;
    changed = true;
  }
  for (const key of ["duration", "filesize", "width", "height"] as const) {
    if (metadata[key] > 0 && task[key] !== metadata[key]) {
      task[key] = metadata[key];
      changed = true;
    }
  }
  return changed;
}

/**
 * @function buildDownloadArgs
 * @description Engine arguments for a download run, in fixed order
 */
export function buildDownloadArgs(options: {
  url: string;
  outputDir: string;
  profileArgs: string[];
  extraArgs: string[];
  resume: boolean;
}): string[] {
  const args = ["--newline", "--progress-template", PROGRESS_TEMPLATE];
  args.push(...options.profileArgs, ...options.extraArgs);
  if (options.resume) {
    args.push("--continue");
  }
  args.push("-o", path.join(options.outputDir, "%(title)s.%(ext)s"), options.url);
  return args;
}

/**
 * @class TaskProcessor
 * @description Handles the processing of individual tasks. Every failure
 * ends as a Failed task; nothing escapes to the worker.
 */
export class TaskProcessor implements TaskHandler {
  private readonly store: TaskStore;
  private readonly engine: EngineRunner;
  private readonly resolver: MetadataResolver;
  private readonly profiles: ProfileSource;
  private readonly downloadDir: string;
  private readonly clock: Clock;

  constructor(deps: TaskProcessorDeps) {
    this.store = deps.store;
    this.engine = deps.engine;
    this.resolver = deps.resolver;
    this.profiles = deps.profiles;
    this.downloadDir = deps.downloadDir;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * @method processTask
   * @description Process a single task; an id deleted meanwhile is skipped
   */
  public async processTask(taskId: string): Promise<void> {
    const before = this.store.getTask(taskId);
    if (!before) {
      Logger.debug(`Skipping deleted task ${taskId}`);
      return;
    }
    const resume = before.resume;
    const started = await this.store.updateTask(taskId, (task) => {
      task.status = TaskStatus.RUNNING;
      task.stage = TaskStage.RESOLVE_METADATA;
      task.resume = false;
      task.progress = "";
      task.speed = "";
      task.eta = "";
    });
    if (!started) return;
    Logger.info(`Processing task ${taskId}`);

    const metadata = await this.resolver.resolve(started.url);
    if (metadata) {
      const enriched = await this.store.updateTask(taskId, (task) =>
        applyMetadata(task, metadata)
      );
      if (!enriched) return;
    }

    const outputDir = taskOutputDir(this.downloadDir, started.createdAt);
    try {
      await fs.mkdir(outputDir, { recursive: true });
    } catch (error) {
      Logger.error(`Cannot create ${outputDir}: ${errorText(error)}`);
      await this.failTask(taskId, OUTPUT_DIR_FAILURE);
      return;
    }

    const downloading = await this.store.updateTask(taskId, (task) => {
      task.stage = TaskStage.DOWNLOAD;
    });
    if (!downloading) return;

    const args = buildDownloadArgs({
      url: started.url,
      outputDir,
      profileArgs: this.profiles.getActiveProfile().args,
      extraArgs: this.engine.extraArgs,
      resume,
    });
    Logger.info(`Task ${taskId}: ${this.engine.commandLine(args)}`);

    const runStart = this.clock();
    let progressUpdates: Promise<unknown> = Promise.resolve();
    try {
      await this.engine.run(args, (line) => {
        const sample = parseProgressLine(line);
        if (!sample) return;
        progressUpdates = progressUpdates.then(() =>
          this.store.updateTask(taskId, (task) => applyProgress(task, sample))
        );
      });
    } catch (error) {
      await progressUpdates;
      Logger.warn(`Task ${taskId} failed: ${errorText(error).split("\n")[0]}`);
      await this.failTask(taskId, errorText(error));
      return;
    }
    await progressUpdates;

    await this.finalize(taskId, outputDir, runStart);
  }

  private async finalize(taskId: string, outputDir: string, runStart: Date): Promise<void> {
    const finalizing = await this.store.updateTask(taskId, (task) => {
      task.stage = TaskStage.FINALIZE;
    });
    if (!finalizing) return;

    const output = await findOutputFile(outputDir, runStart);
    const outputPath = output ? output.path : "";
    const size = await regularFileSize(outputPath);
    const missingOutput = await isOutputMissing(outputPath);

    const done = await this.store.updateTask(taskId, (task) => {
      task.status = TaskStatus.SUCCESS;
      task.stage = TaskStage.FINALIZE;
      task.outputPath = outputPath;
      task.errorMessage = "";
      if (outputPath && isPlaceholderTitle(task.title)) {
        task.title = titleFromFileName(outputPath);
      }
      if (size !== null) {
        task.filesize = size;
      }
      task.missingOutput = missingOutput;
      task.progress = "100%";
    });
    if (done) {
      Logger.success(`Task ${taskId} finished: ${outputPath || "(no output file)"}`);
    }
  }

  private async failTask(taskId: string, message: string): Promise<void> {
    await this.store.updateTask(taskId, (task) => {
      task.status = TaskStatus.FAILED;
      task.stage = TaskStage.FINALIZE;
      task.errorMessage = message;
    });
  }
}
