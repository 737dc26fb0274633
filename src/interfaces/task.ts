/**
 * @file task.ts
 * @description Type definitions for download tasks and the events they produce
 */

/**
 * @enum TaskStatus
 * @description Coarse lifecycle status of a task
 */
export enum TaskStatus {
  QUEUED = "Queued",
  RUNNING = "Running",
  SUCCESS = "Success",
  FAILED = "Failed",
}

/**
 * @enum TaskStage
 * @description Human readable label of the current lifecycle phase
 */
export enum TaskStage {
  PARSE_URL = "Parse URL",
  RESOLVE_METADATA = "Resolve metadata",
  DOWNLOAD = "Download",
  FINALIZE = "Finalize",
  RESUME = "Resume",
  FORCE_RESUME = "Force Resume",
}

/**
 * @interface Task
 * @description One request to retrieve a resource. Field names double as
 * the persisted and exported JSON format.
 */
export interface Task {
  id: string;
  url: string;
  title: string;
  sourceHost: string;
  status: TaskStatus;
  /** Free text; normally one of {@link TaskStage} */
  stage: string;
  progress: string;
  speed: string;
  eta: string;
  outputPath: string;
  missingOutput: boolean;
  errorMessage: string;
  /** Set by resume; read and cleared when the next run starts */
  resume: boolean;
  /** Seconds */
  duration: number;
  /** Bytes */
  filesize: number;
  width: number;
  height: number;
  /** ISO-8601; also selects the output date bucket */
  createdAt: string;
  /** ISO-8601; never moves backwards */
  updatedAt: string;
}

/**
 * @interface TaskMetadata
 * @description Best-effort media description returned by the engine
 */
export interface TaskMetadata {
  title: string;
  sourceHost: string;
  duration: number;
  filesize: number;
  width: number;
  height: number;
}

/**
 * @interface ProgressSample
 * @description Fields parsed from one progress line of the engine
 */
export interface ProgressSample {
  percent: string;
  speed: string;
  eta: string;
}

/**
 * @interface Profile
 * @description Named preset of extra engine arguments
 */
export interface Profile {
  id: string;
  name: string;
  args: string[];
}

export type FileStatus = "ok" | "pending" | "missing";

export type ResumeStatus = "ready" | "none";

export type ImportMode = "merge" | "replace";

export const TASK_UPDATE_EVENT = "task-update";

/**
 * @interface TaskUpdateEvent
 * @description Emitted once per task mutation with the full current record
 */
export interface TaskUpdateEvent {
  type: typeof TASK_UPDATE_EVENT;
  task: Task;
}

/**
 * @type Clock
 * @description Source of the current time, injectable for tests
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
