/**
 * @file taskQueue.ts
 * @description Bounded FIFO of task ids shared by the worker pool
 */

import { TaskError, TaskErrorCode } from "../errors/taskError";
import { Logger } from "../utils/logger";

export const DEFAULT_QUEUE_CAPACITY = 100;

/**
 * @interface QueueStatus
 * @description Status information about the task queue
 */
export interface QueueStatus {
  queuedTasks: number;
  idleWorkers: number;
  capacity: number;
  closed: boolean;
}

type Waiter = () => void;

/**
 * @class TaskQueue
 * @description Enqueue never blocks: a full queue rejects with QUEUE_FULL.
 * take() suspends until an id arrives or the queue is closed.
 */
export class TaskQueue {
  private items: string[] = [];
  private waiters: Waiter[] = [];
  private closed = false;

  constructor(private readonly capacity: number = DEFAULT_QUEUE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error("Queue capacity must be a positive integer");
    }
  }

  /**
   * @method enqueueTask
   * @description Add a task id to the tail of the queue. An id that is
   * already waiting keeps its place and is not added again.
   * @returns {boolean} false when the id was already waiting
   * @throws {TaskError} QUEUE_FULL when at capacity or closed
   */
  public enqueueTask(taskId: string): boolean {
    if (!taskId) {
      throw new Error("Invalid task: missing task ID");
    }
    if (this.closed) {
      throw new TaskError(TaskErrorCode.QUEUE_FULL, "Task queue is closed");
    }
    if (this.items.includes(taskId)) {
      Logger.debug(`Task ${taskId} is already waiting in the queue`);
      return false;
    }
    if (this.items.length >= this.capacity) {
      throw new TaskError(
        TaskErrorCode.QUEUE_FULL,
        `Task queue is full (capacity ${this.capacity})`
      );
    }

    this.items.push(taskId);
    Logger.debug(`Enqueued task ${taskId} (${this.items.length} waiting)`);
    this.waiters.shift()?.();
    return true;
  }

  /**
   * @method take
   * @description Next task id in FIFO order; null once the queue is closed.
   * The id stays in the queue until a taker actually resumes.
   */
  public async take(): Promise<string | null> {
    for (;;) {
      const next = this.items.shift();
      if (next !== undefined) {
        return next;
      }
      if (this.closed) {
        return null;
      }
      await new Promise<void>((wake) => {
        this.waiters.push(wake);
      });
    }
  }

  /**
   * @method close
   * @description Rejects further enqueues, drops waiting ids and wakes idle takers
   */
  public close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.items.length > 0) {
      Logger.warn(`Closing queue with ${this.items.length} task(s) not started`);
    }
    this.items = [];
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach((wake) => wake());
  }

  /**
   * @method getQueueStatus
   * @description Get current status of the queue
   */
  public getQueueStatus(): QueueStatus {
    return {
      queuedTasks: this.items.length,
      idleWorkers: this.waiters.length,
      capacity: this.capacity,
      closed: this.closed,
    };
  }
}
