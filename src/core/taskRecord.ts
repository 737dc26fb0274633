/**
 * @file taskRecord.ts
 * @description Construction, copying and normalisation of task records
 */

import { Task, TaskStage, TaskStatus } from "../interfaces/task";
import { TaskError, TaskErrorCode } from "../errors/taskError";
import { defaultTitleFromUrl, sourceHostFromUrl } from "../utils/urls";

const EPOCH = new Date(0).toISOString();

const STATUSES: readonly string[] = Object.values(TaskStatus);

function isTaskStatus(value: string): value is TaskStatus {
  return STATUSES.includes(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * @function newTask
 * @description Fresh Queued task for a locator
 */
export function newTask(id: string, url: string, now: Date): Task {
  const timestamp = now.toISOString();
  return {
    id,
    url,
    title: defaultTitleFromUrl(url),
    sourceHost: sourceHostFromUrl(url),
    status: TaskStatus.QUEUED,
    stage: TaskStage.PARSE_URL,
    progress: "",
    speed: "",
    eta: "",
    outputPath: "",
    missingOutput: false,
    errorMessage: "",
    resume: false,
    duration: 0,
    filesize: 0,
    width: 0,
    height: 0,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

/**
 * @function cloneTask
 * @description Detached copy; tasks hold only primitives
 */
export function cloneTask(task: Task): Task {
  return { ...task };
}

/**
 * @function touchTask
 * @description Advances updatedAt to now without ever moving it backwards
 */
export function touchTask(task: Task, now: Date): void {
  const previous = Date.parse(task.updatedAt);
  const next = Number.isNaN(previous)
    ? now.getTime()
    : Math.max(previous, now.getTime());
  task.updatedAt = new Date(next).toISOString();
}

/**
 * @function timeOf
 * @description Milliseconds of an ISO timestamp, 0 when unparsable
 */
export function timeOf(timestamp: string): number {
  const value = Date.parse(timestamp);
  return Number.isNaN(value) ? 0 : value;
}

function invalid(message: string): TaskError {
  return new TaskError(TaskErrorCode.INVALID_PAYLOAD, message);
}

function readString(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === "string" ? value : "";
}

function readInteger(record: Record<string, unknown>, key: string): number {
  const value = record[key];
  return typeof value === "number" && Number.isFinite(value)
    ? Math.trunc(value)
    : 0;
}

function readTimestamp(
  record: Record<string, unknown>,
  key: string,
  fallback: string
): string {
  const value = record[key];
  if (value === undefined || value === null || value === "") {
    return fallback;
  }
  if (typeof value !== "string" || Number.isNaN(Date.parse(value))) {
    throw invalid(`Task ${String(record.id)} has an invalid ${key}`);
  }
  return new Date(value).toISOString();
}

/**
 * @function normalizeTaskRecord
 * @description Turns a loosely typed record (snapshot file or import
 * payload) into a Task. Missing fields take neutral defaults; a missing
 * status means Queued; a missing updatedAt is the epoch so it never wins
 * a merge.
 * @throws {TaskError} INVALID_PAYLOAD when the id is missing or a field is malformed
 */
export function normalizeTaskRecord(raw: unknown, now: Date): Task {
  if (!isRecord(raw)) {
    throw invalid("Task record must be an object");
  }

  const id = raw.id;
  if (typeof id !== "string" || id.trim() === "") {
    throw invalid("Task id is required");
  }

  const rawStatus = raw.status;
  let status = TaskStatus.QUEUED;
  if (rawStatus !== undefined && rawStatus !== null && rawStatus !== "") {
    if (typeof rawStatus !== "string" || !isTaskStatus(rawStatus)) {
      throw invalid(`Task ${id} has an unknown status`);
    }
    status = rawStatus;
  }

  return {
    id,
    url: readString(raw, "url"),
    title: readString(raw, "title"),
    sourceHost: readString(raw, "sourceHost"),
    status,
    stage: readString(raw, "stage"),
    progress: readString(raw, "progress"),
    speed: readString(raw, "speed"),
    eta: readString(raw, "eta"),
    outputPath: readString(raw, "outputPath"),
    missingOutput: raw.missingOutput === true,
    errorMessage: readString(raw, "errorMessage"),
    resume: raw.resume === true,
    duration: readInteger(raw, "duration"),
    filesize: readInteger(raw, "filesize"),
    width: readInteger(raw, "width"),
    height: readInteger(raw, "height"),
    createdAt: readTimestamp(raw, "createdAt", now.toISOString()),
    updatedAt: readTimestamp(raw, "updatedAt", EPOCH),
  };
}
