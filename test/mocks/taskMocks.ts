/**
 * @file taskMocks.ts
 * @description Shared fixtures: task records, a scripted engine and temp dirs
 */

import { promises as fs } from "fs";
import os from "os";
import path from "path";
import {
  EngineRunResult,
  EngineRunner,
  LineHandler,
} from "../../src/clients/engineClient";
import { Task, TaskStage, TaskStatus } from "../../src/interfaces/task";

/**
 * @function createMockTask
 * @description Creates a mock task with the given overrides
 */
export const createMockTask = (overrides: Partial<Task> = {}): Task => ({
  id: "test-task-id",
  url: "https://media.example.com/watch/clip-one.mp4",
  title: "clip-one",
  sourceHost: "media.example.com",
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
  createdAt: "2024-03-05T10:00:00.000Z",
  updatedAt: "2024-03-05T10:00:00.000Z",
  ...overrides,
});

export type FakeRun = (args: string[], onLine?: LineHandler) => Promise<EngineRunResult>;

/**
 * @class FakeEngine
 * @description EngineRunner whose behaviour is a plain function; records calls
 */
export class FakeEngine implements EngineRunner {
  public readonly calls: string[][] = [];

  constructor(
    private handler: FakeRun,
    public readonly extraArgs: string[] = []
  ) {}

  public commandLine(args: string[]): string {
    return ["yt-dlp", ...args].join(" ");
  }

  public run(args: string[], onLine?: LineHandler): Promise<EngineRunResult> {
    this.calls.push(args);
    return this.handler(args, onLine);
  }

  public setHandler(handler: FakeRun): void {
    this.handler = handler;
  }

  public downloadCalls(): string[][] {
    return this.calls.filter((args) => !isMetadataCall(args));
  }
}

export const ok = (stdout = ""): EngineRunResult => ({ stdout, stderr: "", exitCode: 0 });

export function isMetadataCall(args: string[]): boolean {
  return args.includes("-J");
}

/**
 * @function outputDirOf
 * @description Directory of the `-o` template of a download call
 */
export function outputDirOf(args: string[]): string {
  const index = args.indexOf("-o");
  if (index < 0) {
    throw new Error(`No output template in ${args.join(" ")}`);
  }
  return path.dirname(args[index + 1]);
}

/**
 * @function fakeDownload
 * @description Handler that answers metadata calls with `metadata` and
 * download calls by printing progress and writing `<fileName>`
 */
export function fakeDownload(options: {
  fileName: string;
  content?: string;
  metadata?: Record<string, unknown> | null;
  progressLines?: string[];
}): FakeRun {
  return async (args, onLine) => {
    if (isMetadataCall(args)) {
      if (options.metadata === null || options.metadata === undefined) {
        throw new Error("no metadata");
      }
      return ok(JSON.stringify(options.metadata));
    }
    for (const line of options.progressLines ?? []) {
      onLine?.(line, "stdout");
    }
    const dir = outputDirOf(args);
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(path.join(dir, options.fileName), options.content ?? "media-bytes");
    return ok((options.progressLines ?? []).map((line) => `${line}\n`).join(""));
  };
}

/**
 * @function makeTempDir
 * @description Fresh directory under the OS temp dir
 */
export function makeTempDir(prefix = "clipqueue-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): Promise<void> {
  return fs.rm(dir, { recursive: true, force: true });
}

/**
 * @function waitFor
 * @description Polls a predicate until it holds or the timeout elapses
 */
export async function waitFor(
  predicate: () => boolean,
  timeoutMs = 3000,
  intervalMs = 10
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error("Timed out waiting for condition");
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}
