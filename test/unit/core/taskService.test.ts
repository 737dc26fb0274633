/**
 * @file taskService.test.ts
 * @description Tests for the task service facade
 */

import { promises as fs } from "fs";
import path from "path";
import { ConfigStore } from "../../../src/core/configStore";
import { MetadataResolver } from "../../../src/core/metadataResolver";
import { dateBucket, taskOutputDir } from "../../../src/core/outputFiles";
import { TaskQueue } from "../../../src/core/taskQueue";
import { TaskService } from "../../../src/core/taskService";
import { TaskStore } from "../../../src/core/taskStore";
import { TaskError, TaskErrorCode } from "../../../src/errors/taskError";
import { TaskStage, TaskStatus } from "../../../src/interfaces/task";
import { FakeEngine, makeTempDir, ok, removeDir } from "../../mocks/taskMocks";

jest.mock("../../../src/utils/logger");

async function expectTaskError(
  promise: Promise<unknown>,
  code: TaskErrorCode,
  message: string
): Promise<void> {
  await expect(promise).rejects.toBeInstanceOf(TaskError);
  await expect(promise).rejects.toMatchObject({ code, message });
}

describe("TaskService", () => {
  let root: string;
  let downloadDir: string;
  let exportDir: string;
  let now: Date;
  let nextId: number;
  let taskStore: TaskStore;
  let queue: TaskQueue;
  let engine: FakeEngine;
  let shell: {
    open: jest.Mock<Promise<void>, [string]>;
    trash: jest.Mock<Promise<void>, [string]>;
  };
  let service: TaskService;

  function buildService(options: { capacity?: number; prefetchMetadata?: boolean } = {}): TaskService {
    queue = new TaskQueue(options.capacity ?? 10);
    return new TaskService({
      store: taskStore,
      queue,
      resolver: new MetadataResolver(engine),
      configStore: new ConfigStore(path.join(root, "config.json")),
      shell,
      downloadDir,
      exportDir,
      clock: () => now,
      prefetchMetadata: options.prefetchMetadata ?? false,
    });
  }

  beforeEach(async () => {
    root = await makeTempDir();
    downloadDir = path.join(root, "downloads");
    exportDir = path.join(root, "exports");
    now = new Date("2024-03-05T10:00:00.000Z");
    nextId = 0;
    taskStore = new TaskStore({ clock: () => now, idFactory: () => `task-${++nextId}` });
    engine = new FakeEngine(async () => ok("{}"));
    shell = {
      open: jest.fn<Promise<void>, [string]>().mockResolvedValue(undefined),
      trash: jest.fn<Promise<void>, [string]>().mockResolvedValue(undefined),
    };
    service = buildService();
  });

  afterEach(async () => {
    await service.settlePrefetches();
    await removeDir(root);
  });

  async function writeOutput(name: string): Promise<string> {
    const dir = path.join(downloadDir, "2024-03-05");
    await fs.mkdir(dir, { recursive: true });
    const filePath = path.join(dir, name);
    await fs.writeFile(filePath, "media-bytes");
    return filePath;
  }

  describe("submit", () => {
    it("should create and queue one task per distinct locator", async () => {
      const created = await service.submit(
        "see https://v.example/a.mp4 and https://v.example/b.mp4 again https://v.example/a.mp4"
      );

      expect(created.map((task) => [task.id, task.url, task.status])).toEqual([
        ["task-1", "https://v.example/a.mp4", TaskStatus.QUEUED],
        ["task-2", "https://v.example/b.mp4", TaskStatus.QUEUED],
      ]);
      expect(queue.getQueueStatus().queuedTasks).toBe(2);
    });

    it("should do nothing for text without locators", async () => {
      expect(await service.submit("no links here")).toEqual([]);
      expect(service.listTasks()).toEqual([]);
    });

    it("should mark a task Failed when the queue is full", async () => {
      service = buildService({ capacity: 1 });

      const created = await service.submit("https://v.example/a https://v.example/b");

      expect(created[0].status).toBe(TaskStatus.QUEUED);
      expect(created[1]).toMatchObject({
        status: TaskStatus.FAILED,
        errorMessage: "Task queue is full (capacity 1)",
      });
    });

    it("should resolve placeholder titles in the background", async () => {
      engine.setHandler(async () => ok(JSON.stringify({ title: "Resolved", filesize: 500 })));
      service = buildService({ prefetchMetadata: true });

      await service.submit("https://v.example/v/987654 https://v.example/watch/named-clip");
      await service.settlePrefetches();

      expect(service.listTasks().map((task) => [task.title, task.filesize])).toEqual([
        ["Resolved", 0],
        ["named-clip", 0],
      ]);
    });
  });

  describe("lookups and files", () => {
    it("should report an unknown task as not found", () => {
      expect(() => service.getTask("ghost")).toThrow("Task ghost not found");
    });

    it("should report the file status of a task", async () => {
      const [task] = await service.submit("https://v.example/a.mp4");
      expect(await service.fileStatus(task.id)).toBe("pending");

      const output = await writeOutput("a.mp4");
      await taskStore.updateTask(task.id, (record) => {
        record.outputPath = output;
      });
      expect(await service.fileStatus(task.id)).toBe("ok");

      await fs.rm(output);
      expect(await service.fileStatus(task.id)).toBe("missing");
    });

    it("should open an existing output file", async () => {
      const [task] = await service.submit("https://v.example/a.mp4");
      await expectTaskError(
        service.openFile(task.id),
        TaskErrorCode.OUTPUT_PENDING,
        "Output file not available yet"
      );

      const output = await writeOutput("a.mp4");
      await taskStore.updateTask(task.id, (record) => {
        record.outputPath = output;
      });
      expect(await service.openFile(task.id)).toBe(output);
      expect(shell.open).toHaveBeenCalledWith(output);

      await fs.rm(output);
      await expectTaskError(
        service.openFile(task.id),
        TaskErrorCode.FILE_MISSING,
        `File ${output} not found`
      );
    });

    it("should open the output folder only when it exists", async () => {
      const [task] = await service.submit("https://v.example/a.mp4");
      const dir = taskOutputDir(downloadDir, task.createdAt);

      await expectTaskError(
        service.openFolder(task.id),
        TaskErrorCode.NOT_FOUND,
        `Output directory ${dir} not found`
      );

      await fs.mkdir(dir, { recursive: true });
      expect(await service.openFolder(task.id)).toBe(dir);
      expect(shell.open).toHaveBeenCalledWith(dir);
    });

    it("should open a directory or the directory of a file", async () => {
      const output = await writeOutput("a.mp4");

      expect(await service.openPath(downloadDir)).toBe(downloadDir);
      expect(await service.openPath(output)).toBe(path.dirname(output));
      await expectTaskError(service.openPath("  "), TaskErrorCode.INVALID_PAYLOAD, "Path is required");
      const ghost = path.join(root, "ghost");
      await expectTaskError(service.openPath(ghost), TaskErrorCode.NOT_FOUND, `Path ${ghost} not found`);
      expect(shell.open.mock.calls).toEqual([[downloadDir], [path.dirname(output)]]);
    });

    it("should find partial data for resume status", async () => {
      const [task] = await service.submit("https://v.example/watch/my-clip");
      await taskStore.updateTask(task.id, (record) => {
        record.status = TaskStatus.FAILED;
      });
      const dir = taskOutputDir(downloadDir, task.createdAt);
      await fs.mkdir(dir, { recursive: true });

      expect(await service.resumeStatus(task.id)).toBe("none");

      await fs.writeFile(path.join(dir, "My Clip.mp4.part"), "partial");
      expect(await service.resumeStatus(task.id)).toBe("ready");
    });
  });

  describe("deleteTask", () => {
    it("should trash the output file and forget the task", async () => {
      const [task] = await service.submit("https://v.example/a.mp4");
      const output = await writeOutput("a.mp4");
      await taskStore.updateTask(task.id, (record) => {
        record.outputPath = output;
      });

      await service.deleteTask(task.id);

      expect(shell.trash).toHaveBeenCalledWith(output);
      expect(service.listTasks()).toEqual([]);
    });

    it("should skip the trash when there is no file", async () => {
      const [task] = await service.submit("https://v.example/a.mp4");

      await service.deleteTask(task.id);

      expect(shell.trash).not.toHaveBeenCalled();
      await expectTaskError(service.deleteTask(task.id), TaskErrorCode.NOT_FOUND, `Task ${task.id} not found`);
    });

    it("should keep the task when the trash fails", async () => {
      const [task] = await service.submit("https://v.example/a.mp4");
      const output = await writeOutput("a.mp4");
      await taskStore.updateTask(task.id, (record) => {
        record.outputPath = output;
      });
      shell.trash.mockRejectedValueOnce(new Error("permission denied"));

      await expectTaskError(
        service.deleteTask(task.id),
        TaskErrorCode.DELETION_FAILED,
        `Failed to move ${output} to trash: permission denied`
      );
      expect(service.getTask(task.id).outputPath).toBe(output);
    });
  });

  describe("resume", () => {
    it("should requeue a failed task with the resume flag", async () => {
      const [task] = await service.submit("https://v.example/a.mp4");
      await queue.take();
      await taskStore.updateTask(task.id, (record) => {
        record.status = TaskStatus.FAILED;
        record.progress = "40%";
        record.errorMessage = "network down";
      });

      const resumed = await service.resume(task.id);

      expect(resumed).toMatchObject({
        status: TaskStatus.QUEUED,
        stage: TaskStage.RESUME,
        progress: "",
        errorMessage: "",
        resume: true,
      });
      expect(await queue.take()).toBe(task.id);
    });

    it("should refuse to resume a task that is actively running", async () => {
      const [task] = await service.submit("https://v.example/a.mp4");
      await taskStore.updateTask(task.id, (record) => {
        record.status = TaskStatus.RUNNING;
      });

      await expectTaskError(
        service.resume(task.id),
        TaskErrorCode.ALREADY_RUNNING,
        `Task ${task.id} is already running`
      );
      expect(service.getTask(task.id).status).toBe(TaskStatus.RUNNING);
    });

    it("should force-resume a running task", async () => {
      const [task] = await service.submit("https://v.example/a.mp4");
      await taskStore.updateTask(task.id, (record) => {
        record.status = TaskStatus.RUNNING;
      });

      const resumed = await service.forceResume(task.id);

      expect(resumed.stage).toBe(TaskStage.FORCE_RESUME);
      expect(resumed.status).toBe(TaskStatus.QUEUED);
    });

    it("should resume a stale running task", async () => {
      const [task] = await service.submit("https://v.example/a.mp4");
      await taskStore.updateTask(task.id, (record) => {
        record.status = TaskStatus.RUNNING;
      });
      now = new Date("2024-03-05T10:01:00.000Z");

      expect((await service.resume(task.id)).stage).toBe(TaskStage.RESUME);
    });

    it("should queue a task only once when resumed twice before it starts", async () => {
      const [task] = await service.submit("https://v.example/a.mp4");
      await queue.take();
      await taskStore.updateTask(task.id, (record) => {
        record.status = TaskStatus.FAILED;
      });

      await Promise.all([service.resume(task.id), service.resume(task.id)]);

      expect(queue.getQueueStatus().queuedTasks).toBe(1);
      expect(service.getTask(task.id).status).toBe(TaskStatus.QUEUED);
    });

    it("should report an unknown task", async () => {
      await expectTaskError(service.resume("ghost"), TaskErrorCode.NOT_FOUND, "Task ghost not found");
    });
  });

  describe("profiles", () => {
    it("should switch the active profile", async () => {
      expect(service.getActiveProfile().id).toBe("default");

      await service.setActiveProfile("audio-only");

      expect(service.getActiveProfile().id).toBe("audio-only");
      expect(service.listProfiles().map((profile) => profile.id)).toEqual([
        "default",
        "audio-only",
        "best-quality",
      ]);
    });
  });

  describe("export and import", () => {
    it("should write the export under the export directory", async () => {
      await service.submit("https://v.example/a.mp4");

      const filePath = await service.exportTasksToFile();

      expect(filePath).toBe(path.join(exportDir, `tasks-export-${dateBucket(now)}.json`));
      expect(await fs.readFile(filePath, "utf8")).toBe(service.exportTasks());
    });

    it("should restore an export into an empty store with replace", async () => {
      await service.submit("https://v.example/a.mp4 https://v.example/b.mp4");
      const exported = service.exportTasks();

      taskStore = new TaskStore({ clock: () => now });
      const other = buildService();
      const imported = await other.importTasks({ payload: exported, mode: "replace" });

      expect(imported.map((task) => task.id)).toEqual(["task-1", "task-2"]);
      expect(queue.getQueueStatus().queuedTasks).toBe(2);
    });

    it("should reset finished records when asked to overwrite downloads", async () => {
      const payload = [
        {
          id: "done",
          url: "https://v.example/done.mp4",
          status: "Success",
          outputPath: path.join(root, "gone.mp4"),
          progress: "100%",
          updatedAt: "2024-03-04T00:00:00.000Z",
        },
      ];

      const kept = await service.importTasks({ payload, mode: "merge" });
      expect(kept[0]).toMatchObject({ status: TaskStatus.SUCCESS, missingOutput: true });
      expect(queue.getQueueStatus().queuedTasks).toBe(0);

      const reset = await service.importTasks({
        payload: [{ ...payload[0], updatedAt: "2024-03-05T00:00:00.000Z" }],
        mode: "merge",
        overwriteDownloaded: true,
      });
      expect(reset[0]).toMatchObject({
        status: TaskStatus.QUEUED,
        outputPath: "",
        progress: "",
        missingOutput: false,
      });
    });

    it("should queue a new finished record reset by overwrite", async () => {
      const imported = await service.importTasks({
        payload: '[{"id":"x","status":"Success","outputPath":"/gone"}]',
        mode: "merge",
        overwriteDownloaded: true,
      });

      expect(imported).toHaveLength(1);
      expect(imported[0]).toMatchObject({
        id: "x",
        status: TaskStatus.QUEUED,
        outputPath: "",
        errorMessage: "",
      });
      expect(await queue.take()).toBe("x");
    });

    it("should keep one entry per id when a merge repeats existing ids", async () => {
      await service.submit("https://v.example/a.mp4 https://v.example/b.mp4");

      const imported = await service.importTasks({
        payload: [
          {
            id: "task-1",
            status: "Failed",
            errorMessage: "first",
            updatedAt: "2024-03-05T11:00:00.000Z",
          },
          { id: "task-3", url: "https://v.example/c.mp4", status: "Failed" },
          {
            id: "task-1",
            status: "Failed",
            errorMessage: "second",
            updatedAt: "2024-03-05T12:00:00.000Z",
          },
        ],
        mode: "merge",
      });

      expect(imported.map((task) => task.id)).toEqual(["task-1", "task-2", "task-3"]);
      expect(service.listTasks().map((task) => task.id)).toEqual(["task-1", "task-2", "task-3"]);
      expect(service.getTask("task-1").errorMessage).toBe("second");
    });

    it("should leave the store alone for an invalid payload", async () => {
      await service.submit("https://v.example/a.mp4");

      await expectTaskError(
        service.importTasks({ payload: "[1]", mode: "replace" }),
        TaskErrorCode.INVALID_PAYLOAD,
        "Task record must be an object"
      );
      await expectTaskError(
        service.importTasks({ payload: "[]", mode: "overwrite" }),
        TaskErrorCode.INVALID_PAYLOAD,
        "Invalid import mode: overwrite"
      );
      expect(service.listTasks()).toHaveLength(1);
    });
  });
});
