/**
 * @file workerPool.ts
 * @description Fixed set of executors draining the task queue
 */

import { Logger } from "../utils/logger";
import { errorText } from "./persistence";
import { TaskQueue } from "./taskQueue";

export const DEFAULT_POOL_SIZE = 3;

/**
 * @interface TaskHandler
 * @description Drives one task through its whole run
 */
export interface TaskHandler {
  processTask(taskId: string): Promise<void>;
}

/**
 * @class WorkerPool
 * @description Each slot takes one id, runs it to completion, then takes the
 * next. No more than `size` tasks run at once.
 */
export class WorkerPool {
  private readonly size: number;
  private readonly runningBySlot = new Map<number, string>();
  private loops: Promise<void>[] = [];
  private peak = 0;

  constructor(
    private readonly queue: TaskQueue,
    private readonly handler: TaskHandler,
    size: number = DEFAULT_POOL_SIZE
  ) {
    this.size = Math.max(1, Math.floor(size));
  }

  /**
   * @method start
   * @description Spawns the executors; calling it twice is a no-op
   */
  public start(): void {
    if (this.loops.length > 0) return;
    for (let slot = 0; slot < this.size; slot += 1) {
      this.loops.push(this.runWorker(slot));
    }
    Logger.info(`Worker pool started with ${this.size} executor(s)`);
  }

  /**
   * @method stop
   * @description Closes the queue and waits for in-flight runs to finish
   */
  public async stop(): Promise<void> {
    this.queue.close();
    await Promise.all(this.loops);
    this.loops = [];
    Logger.info("Worker pool stopped");
  }

  private async runWorker(slot: number): Promise<void> {
    for (;;) {
      const taskId = await this.queue.take();
      if (taskId === null) {
        return;
      }
      if (this.runningTaskIds().includes(taskId)) {
        Logger.warn(`Worker ${slot} skipped task ${taskId}: already running`);
        continue;
      }

      this.runningBySlot.set(slot, taskId);
      this.peak = Math.max(this.peak, this.runningBySlot.size);
      try {
        await this.handler.processTask(taskId);
      } catch (error) {
        Logger.error(`Worker ${slot} failed on task ${taskId}: ${errorText(error)}`);
      } finally {
        this.runningBySlot.delete(slot);
      }
    }
  }

  public capacity(): number {
    return this.size;
  }

  public runningCount(): number {
    return this.runningBySlot.size;
  }

  /**
   * @method peakRunning
   * @description Highest number of simultaneously running tasks seen
   */
  public peakRunning(): number {
    return this.peak;
  }

  public runningTaskIds(): string[] {
    return Array.from(this.runningBySlot.values());
  }
}
