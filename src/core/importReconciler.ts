/**
 * @file importReconciler.ts
 * @description Validation of import payloads and merge/replace planning
 */

import { ImportMode, Task, TaskStatus } from "../interfaces/task";
import { TaskError, TaskErrorCode } from "../errors/taskError";
import { RebuildResult } from "./taskStore";
import { cloneTask, normalizeTaskRecord, timeOf } from "./taskRecord";

const IMPORT_MODES: readonly string[] = ["merge", "replace"];

/**
 * @interface ReconcileResult
 * @description New store contents plus the ids that must be queued
 */
export interface ReconcileResult extends RebuildResult {
  enqueueIds: string[];
}

function invalid(message: string): TaskError {
  return new TaskError(TaskErrorCode.INVALID_PAYLOAD, message);
}

/**
 * @function parseImportMode
 * @throws {TaskError} INVALID_PAYLOAD for anything but merge or replace
 */
export function parseImportMode(mode: unknown): ImportMode {
  if (typeof mode !== "string" || !IMPORT_MODES.includes(mode)) {
    throw invalid(`Invalid import mode: ${String(mode)}`);
  }
  return mode === "merge" ? "merge" : "replace";
}

/**
 * @function parseImportPayload
 * @description Accepts JSON text or an already parsed array. One bad
 * record rejects the whole payload.
 */
export function parseImportPayload(payload: unknown, now: Date): Task[] {
  let records: unknown = payload;
  if (typeof payload === "string") {
    if (!payload.trim()) {
      throw invalid("Empty import payload");
    }
    try {
      records = JSON.parse(payload);
    } catch {
      throw invalid("Invalid JSON");
    }
  }
  if (!Array.isArray(records)) {
    throw invalid("Import payload must be an array of tasks");
  }
  return records.map((record) => normalizeTaskRecord(record, now));
}

/**
 * @function resetDownloaded
 * @description Turns a finished record back into a fresh queued one
 */
export function resetDownloaded(task: Task): void {
  if (task.status !== TaskStatus.SUCCESS) {
    return;
  }
  task.status = TaskStatus.QUEUED;
  task.progress = "";
  task.outputPath = "";
  task.missingOutput = false;
  task.errorMessage = "";
}

function mergeInto(existing: Task[], incoming: Task[]): ReconcileResult {
  const byId = new Map<string, Task>();
  for (const task of existing) {
    byId.set(task.id, cloneTask(task));
  }
  const changedIds = new Set<string>();
  const enqueueIds: string[] = [];

  for (const item of incoming) {
    const current = byId.get(item.id);
    if (current) {
      if (timeOf(item.updatedAt) > timeOf(current.updatedAt)) {
        byId.set(item.id, { ...cloneTask(item), createdAt: current.createdAt });
        changedIds.add(item.id);
      }
      continue;
    }
    byId.set(item.id, cloneTask(item));
    changedIds.add(item.id);
    if (item.status === TaskStatus.QUEUED) {
      enqueueIds.push(item.id);
    }
  }

  return {
    tasks: Array.from(byId.values()),
    changedIds: Array.from(changedIds),
    // a later duplicate in the payload may have finished the inserted record
    enqueueIds: enqueueIds.filter((id) => byId.get(id)?.status === TaskStatus.QUEUED),
  };
}

function replaceWith(incoming: Task[]): ReconcileResult {
  const byId = new Map<string, Task>();
  for (const item of incoming) {
    byId.set(item.id, cloneTask(item));
  }
  const tasks = Array.from(byId.values());
  return {
    tasks,
    changedIds: tasks.map((task) => task.id),
    enqueueIds: tasks
      .filter((task) => task.status === TaskStatus.QUEUED)
      .map((task) => task.id),
  };
}

/**
 * @function reconcileImport
 * @description Plans the store contents after an import.
 * merge: existing ids are replaced only by a strictly newer updatedAt and
 * keep their createdAt; new ids are appended. replace: payload order wins.
 */
export function reconcileImport(
  existing: Task[],
  incoming: Task[],
  mode: ImportMode
): ReconcileResult {
  return mode === "merge" ? mergeInto(existing, incoming) : replaceWith(incoming);
}
