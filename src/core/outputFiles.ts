/**
 * @file outputFiles.ts
 * @description Output directory layout and file inspection helpers
 */

import fs from "fs/promises";
import path from "path";
import { isErrnoException } from "./persistence";

/**
 * @interface FileEntry
 * @description A regular file found under an output directory
 */
export interface FileEntry {
  path: string;
  name: string;
  mtimeMs: number;
  size: number;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * @function dateBucket
 * @description `YYYY-MM-DD` of a timestamp in local time
 */
export function dateBucket(timestamp: string | Date): string {
  const date = typeof timestamp === "string" ? new Date(timestamp) : timestamp;
  const valid = Number.isNaN(date.getTime()) ? new Date() : date;
  return `${valid.getFullYear()}-${pad(valid.getMonth() + 1)}-${pad(valid.getDate())}`;
}

/**
 * @function taskOutputDir
 * @description Per-day directory a task downloads into
 */
export function taskOutputDir(downloadRoot: string, createdAt: string): string {
  return path.join(downloadRoot, dateBucket(createdAt));
}

/**
 * @function listFilesRecursive
 * @description Every regular file below `root`; a missing root yields []
 */
export async function listFilesRecursive(root: string): Promise<FileEntry[]> {
  let entries;
  try {
    entries = await fs.readdir(root, { withFileTypes: true });
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return [];
    }
    throw error;
  }

  const files: FileEntry[] = [];
  for (const entry of entries) {
    const fullPath = path.join(root, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFilesRecursive(fullPath)));
    } else if (entry.isFile()) {
      const stat = await statOrNull(fullPath);
      if (stat) {
        files.push({
          path: fullPath,
          name: entry.name,
          mtimeMs: stat.mtimeMs,
          size: stat.size,
        });
      }
    }
  }
  return files;
}

function newest(files: FileEntry[]): FileEntry | null {
  let best: FileEntry | null = null;
  for (const file of files) {
    if (!best || file.mtimeMs > best.mtimeMs) {
      best = file;
    }
  }
  return best;
}

/**
 * @function findOutputFile
 * @description Newest file modified at or after `startedAt`; falls back to
 * the newest file overall when the engine kept an older mtime
 */
export async function findOutputFile(
  dir: string,
  startedAt: Date
): Promise<FileEntry | null> {
  const files = await listFilesRecursive(dir);
  const fresh = files.filter((file) => file.mtimeMs >= startedAt.getTime());
  return newest(fresh) ?? newest(files);
}

async function statOrNull(filePath: string) {
  try {
    return await fs.stat(filePath);
  } catch (error) {
    if (isErrnoException(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * @function regularFileSize
 * @description Size of a regular file, or null when absent or not a file
 */
export async function regularFileSize(filePath: string): Promise<number | null> {
  if (!filePath) return null;
  const stat = await statOrNull(filePath);
  return stat && stat.isFile() ? stat.size : null;
}

export async function isRegularFile(filePath: string): Promise<boolean> {
  return (await regularFileSize(filePath)) !== null;
}

export async function isDirectory(dirPath: string): Promise<boolean> {
  if (!dirPath) return false;
  const stat = await statOrNull(dirPath);
  return stat !== null && stat.isDirectory();
}

/**
 * @function isOutputMissing
 * @description True when an output path is recorded but is not a regular file
 */
export async function isOutputMissing(outputPath: string): Promise<boolean> {
  if (!outputPath) return false;
  return !(await isRegularFile(outputPath));
}
