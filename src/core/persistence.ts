/**
 * @file persistence.ts
 * @description Atomic JSON files and the task snapshot
 */

import { promises as fs } from "fs";
import path from "path";
import { Task } from "../interfaces/task";
import { Logger } from "../utils/logger";
import { normalizeTaskRecord } from "./taskRecord";

let tempSequence = 0;

/**
 * @function writeFileAtomic
 * @description Writes to a unique sibling temp file, then renames it over
 * the target so readers only ever see a complete file
 */
export async function writeFileAtomic(
  filePath: string,
  data: string
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  tempSequence += 1;
  const tempPath = `${filePath}.${process.pid}.${tempSequence}.tmp`;
  try {
    await fs.writeFile(tempPath, data, "utf8");
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      Logger.debug(`Could not remove ${tempPath}: ${String(cleanupError)}`);
    });
    throw error;
  }
}

/**
 * @class AtomicJsonFile
 * @description JSON document on disk. Writes are chained so they land in
 * call order and the newest content wins.
 */
export class AtomicJsonFile {
  private writes: Promise<void> = Promise.resolve();

  constructor(public readonly filePath: string) {}

  /**
   * @method read
   * @description Parsed content, or null when the file is absent or not valid JSON
   */
  public async read(): Promise<unknown> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return null;
      }
      Logger.warn(`Could not read ${this.filePath}: ${errorText(error)}`);
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      Logger.warn(`Ignoring malformed ${this.filePath}: ${errorText(error)}`);
      return null;
    }
  }

  /**
   * @method write
   * @description Serialises and atomically replaces the file
   */
  public write(value: unknown): Promise<void> {
    const data = serializeJson(value);
    const next = this.writes.then(() => writeFileAtomic(this.filePath, data));
    this.writes = next.catch(() => undefined);
    return next;
  }

  /**
   * @method flush
   * @description Resolves once every queued write has settled
   */
  public flush(): Promise<void> {
    return this.writes;
  }
}

/**
 * @function serializeJson
 * @description The on-disk format: two-space indented JSON
 */
export function serializeJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/**
 * @class TaskSnapshotStore
 * @description Best-effort durability of the ordered task list
 */
export class TaskSnapshotStore {
  private readonly file: AtomicJsonFile;

  constructor(filePath: string) {
    this.file = new AtomicJsonFile(filePath);
  }

  get filePath(): string {
    return this.file.filePath;
  }

  /**
   * @method load
   * @description Restores tasks in their saved order. An absent or malformed
   * file yields an empty list; individual bad records are skipped.
   */
  public async load(now: Date = new Date()): Promise<Task[]> {
    const content = await this.file.read();
    if (content === null) {
      return [];
    }
    if (!Array.isArray(content)) {
      Logger.warn(`Ignoring ${this.filePath}: expected a JSON array`);
      return [];
    }

    const byId = new Map<string, Task>();
    for (const raw of content) {
      try {
        const task = normalizeTaskRecord(raw, now);
        // Map keeps the first insertion position; the later record wins
        byId.set(task.id, task);
      } catch (error) {
        Logger.warn(`Skipping stored task record: ${errorText(error)}`);
      }
    }
    Logger.info(`Loaded ${byId.size} task(s) from ${this.filePath}`);
    return Array.from(byId.values());
  }

  /**
   * @method save
   * @description Writes the snapshot; failures are logged and swallowed
   */
  public async save(tasks: Task[]): Promise<void> {
    try {
      await this.file.write(tasks);
    } catch (error) {
      Logger.warn(`Failed to save task snapshot: ${errorText(error)}`);
    }
  }

  public flush(): Promise<void> {
    return this.file.flush();
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}

export function errorText(error: unknown): string {
  if (typeof error === "object" && error !== null && "message" in error) {
    const { message } = error;
    if (typeof message === "string") return message;
  }
  return String(error);
}
