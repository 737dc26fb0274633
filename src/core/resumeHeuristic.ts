/**
 * @file resumeHeuristic.ts
 * @description Decides whether a task has partial data worth continuing
 */

import { ResumeStatus, Task, TaskStatus } from "../interfaces/task";
import { timeOf } from "./taskRecord";
import { isPlaceholderTitle } from "./titles";
import { FileEntry, listFilesRecursive, regularFileSize } from "./outputFiles";

export const DEFAULT_RUNNING_GRACE_MS = 30_000;
export const DEFAULT_PARTIAL_WINDOW_MS = 60_000;

/**
 * @function isPartialFileName
 * @description Engine leftovers: `.part` anywhere or a `.ytdl` suffix
 */
export function isPartialFileName(name: string): boolean {
  const lower = name.toLowerCase();
  return lower.includes(".part") || lower.endsWith(".ytdl");
}

/**
 * @function normalizeForMatch
 * @description Lowercase with only ASCII letters and digits kept
 */
export function normalizeForMatch(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]/g, "");
}

/**
 * @function isActivelyRunning
 * @description Running and touched within the grace window
 */
export function isActivelyRunning(
  task: Pick<Task, "status" | "updatedAt">,
  now: Date,
  graceMs: number = DEFAULT_RUNNING_GRACE_MS
): boolean {
  return (
    task.status === TaskStatus.RUNNING &&
    now.getTime() - timeOf(task.updatedAt) < graceMs
  );
}

export interface ResumeInput {
  task: Pick<Task, "status" | "updatedAt" | "title" | "filesize" | "createdAt">;
  now: Date;
  /** Size of the recorded output file, null when it is not a regular file */
  outputFileSize: number | null;
  partialFiles: Pick<FileEntry, "name" | "mtimeMs">[];
  graceMs?: number;
  partialWindowMs?: number;
}

/**
 * @function decideResumeStatus
 * @description Pure rule chain; the first rule that matches decides
 */
export function decideResumeStatus(input: ResumeInput): ResumeStatus {
  const { task, now } = input;
  const graceMs = input.graceMs ?? DEFAULT_RUNNING_GRACE_MS;
  const windowMs = input.partialWindowMs ?? DEFAULT_PARTIAL_WINDOW_MS;

  if (isActivelyRunning(task, now, graceMs)) {
    return "none";
  }

  if (
    input.outputFileSize !== null &&
    task.filesize > 0 &&
    input.outputFileSize < task.filesize
  ) {
    return "ready";
  }

  const wanted = normalizeForMatch(task.title);
  if (isPlaceholderTitle(task.title) || !wanted) {
    return "none";
  }

  const partials = input.partialFiles.filter((file) => isPartialFileName(file.name));
  if (partials.some((file) => normalizeForMatch(file.name).includes(wanted))) {
    return "ready";
  }

  const threshold = timeOf(task.createdAt) - windowMs;
  return partials.some((file) => file.mtimeMs >= threshold) ? "ready" : "none";
}

export interface ResumeInspectionOptions {
  now: Date;
  graceMs?: number;
  partialWindowMs?: number;
}

/**
 * @function inspectResumeStatus
 * @description Gathers the file facts for {@link decideResumeStatus}
 */
export async function inspectResumeStatus(
  task: Task,
  outputDir: string,
  options: ResumeInspectionOptions
): Promise<ResumeStatus> {
  const outputFileSize = await regularFileSize(task.outputPath);
  const files = await listFilesRecursive(outputDir);
  return decideResumeStatus({
    task,
    now: options.now,
    outputFileSize,
    partialFiles: files.filter((file) => isPartialFileName(file.name)),
    graceMs: options.graceMs,
    partialWindowMs: options.partialWindowMs,
  });
}
