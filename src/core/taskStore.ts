/**
 * @file taskStore.ts
 * @description Authoritative in-memory registry of tasks and their order
 */

import { v4 as uuidv4 } from "uuid";
import { Clock, Task, systemClock } from "../interfaces/task";
import { Logger } from "../utils/logger";
import { TaskSnapshotStore, errorText } from "./persistence";
import { cloneTask, newTask, touchTask } from "./taskRecord";

/**
 * @typedef {Function} StatusListener
 * @description Function type for task update listeners
 */
export type StatusListener = (task: Task) => void | Promise<void>;

/**
 * @typedef {Function} TaskMutation
 * @description Synchronous edit of the live record. Returning false means
 * nothing changed, so no event is emitted and nothing is persisted.
 */
export type TaskMutation = (task: Task) => boolean | void;

/**
 * @interface RebuildResult
 * @description New store contents produced from a snapshot of the current ones
 */
export interface RebuildResult {
  tasks: Task[];
  /** Ids whose records were inserted or replaced */
  changedIds: string[];
}

export interface TaskStoreOptions {
  snapshots?: TaskSnapshotStore;
  clock?: Clock;
  idFactory?: () => string;
}

/**
 * @class TaskStore
 * @description Owns every Task. The critical section of each mutation is
 * synchronous: the map and order are never touched across an await, and
 * listeners and disk writes run only after the copy is taken.
 */
export class TaskStore {
  private tasks: Map<string, Task> = new Map();
  private order: string[] = [];
  private statusListeners: Set<StatusListener> = new Set();
  private readonly snapshots?: TaskSnapshotStore;
  private readonly clock: Clock;
  private readonly idFactory: () => string;

  constructor(options: TaskStoreOptions = {}) {
    this.snapshots = options.snapshots;
    this.clock = options.clock ?? systemClock;
    this.idFactory = options.idFactory ?? uuidv4;
  }

  /**
   * @method addStatusListener
   * @description Add a listener for task updates
   */
  public addStatusListener(listener: StatusListener): void {
    this.statusListeners.add(listener);
    Logger.debug("Added new status listener");
  }

  /**
   * @method removeStatusListener
   * @description Remove a task update listener
   */
  public removeStatusListener(listener: StatusListener): void {
    this.statusListeners.delete(listener);
    Logger.debug("Removed status listener");
  }

  /**
   * @method notifyStatusListeners
   * @description Notify all listeners about a task update
   */
  private async notifyStatusListeners(task: Task): Promise<void> {
    const listeners = Array.from(this.statusListeners);
    const results = await Promise.allSettled(
      listeners.map(async (listener) => listener(cloneTask(task)))
    );
    for (const result of results) {
      if (result.status === "rejected") {
        Logger.error(
          `Error notifying status listeners: ${errorText(result.reason)}`
        );
      }
    }
  }

  /**
   * @method load
   * @description Restores the persisted snapshot, replacing current contents
   * @returns {Promise<number>} Number of restored tasks
   */
  public async load(): Promise<number> {
    if (!this.snapshots) {
      return 0;
    }
    const restored = await this.snapshots.load(this.clock());
    this.tasks = new Map(restored.map((task) => [task.id, task]));
    this.order = restored.map((task) => task.id);
    return this.order.length;
  }

  /**
   * @method createTasks
   * @description One Queued task per locator, appended in the given order
   */
  public async createTasks(urls: string[]): Promise<Task[]> {
    const now = this.clock();
    const created: Task[] = [];

    for (const url of urls) {
      let id = this.idFactory();
      while (this.tasks.has(id)) {
        id = this.idFactory();
      }
      const task = newTask(id, url, now);
      this.tasks.set(id, task);
      this.order.push(id);
      created.push(cloneTask(task));
    }

    for (const task of created) {
      Logger.info(`Created task ${task.id} for ${task.url}`);
      await this.notifyStatusListeners(task);
    }
    if (created.length > 0) {
      await this.save();
    }
    return created;
  }

  /**
   * @method getTask
   * @description Copy of a task, or null
   */
  public getTask(taskId: string): Task | null {
    const task = this.tasks.get(taskId);
    return task ? cloneTask(task) : null;
  }

  public hasTask(taskId: string): boolean {
    return this.tasks.has(taskId);
  }

  /**
   * @method listTasks
   * @description Copies of all tasks in creation order
   */
  public listTasks(): Task[] {
    const out: Task[] = [];
    for (const id of this.order) {
      const task = this.tasks.get(id);
      if (task) {
        out.push(cloneTask(task));
      }
    }
    return out;
  }

  public get size(): number {
    return this.order.length;
  }

  /**
   * @method updateTask
   * @description Applies a mutation to the latest record, then emits and persists
   * @returns {Promise<Task | null>} The updated copy; the unchanged copy when
   * the mutation reported no change; null when the task no longer exists
   */
  public async updateTask(
    taskId: string,
    mutate: TaskMutation
  ): Promise<Task | null> {
    const task = this.tasks.get(taskId);
    if (!task) {
      Logger.debug(`Task ${taskId} not found for update`);
      return null;
    }
    if (mutate(task) === false) {
      return cloneTask(task);
    }
    touchTask(task, this.clock());
    const updated = cloneTask(task);

    await this.notifyStatusListeners(updated);
    await this.save();
    return updated;
  }

  /**
   * @method deleteTask
   * @description Removes a task from the registry and the order
   */
  public async deleteTask(taskId: string): Promise<boolean> {
    const deleted = this.tasks.delete(taskId);
    if (!deleted) {
      Logger.warn(`Task ${taskId} not found for deletion`);
      return false;
    }
    this.order = this.order.filter((id) => id !== taskId);
    Logger.info(`Deleted task ${taskId}`);
    await this.save();
    return true;
  }

  /**
   * @method rebuild
   * @description Replaces the whole contents with a plan computed from a
   * snapshot of the current tasks. A repeated id keeps its first position
   * and the later record wins.
   * @returns {Promise<Task[]>} The new ordered contents
   */
  public async rebuild(
    plan: (current: Task[]) => RebuildResult
  ): Promise<Task[]> {
    const result = plan(this.listTasks());

    const tasks = new Map<string, Task>();
    for (const task of result.tasks) {
      tasks.set(task.id, cloneTask(task));
    }
    this.tasks = tasks;
    this.order = Array.from(tasks.keys());
    const snapshot = this.listTasks();

    const changed = new Set(result.changedIds);
    for (const task of snapshot) {
      if (changed.has(task.id)) {
        await this.notifyStatusListeners(task);
      }
    }
    await this.save();
    return snapshot;
  }

  /**
   * @method save
   * @description Persists the current ordered snapshot (best effort)
   */
  public async save(): Promise<void> {
    if (!this.snapshots) {
      return;
    }
    await this.snapshots.save(this.listTasks());
  }
}
