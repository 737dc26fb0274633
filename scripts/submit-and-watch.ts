/**
 * Script to submit links to a running clipqueue server
 * It checks the server health, submits the text given on the command line
 * and polls every created task until it has finished
 */

import axios from "axios";
import { Task, TaskStatus } from "../src/interfaces/task";

// Configuration
const CONFIG = {
  serverUrl: process.env.SERVER_URL || "http://localhost:8080",
  pollingInterval: 2000, // 2 seconds
  maxRetries: 900, // 30 minutes maximum waiting time
};

const FINISHED: readonly string[] = [TaskStatus.SUCCESS, TaskStatus.FAILED];

/**
 * Checks if the server is running by making a health check request
 */
async function isServerRunning(): Promise<boolean> {
  try {
    const response = await axios.get(`${CONFIG.serverUrl}/health`);
    return response.status === 200;
  } catch (error) {
    if (axios.isAxiosError(error)) {
      console.error("Server connection error:", {
        message: error.message,
        code: error.code,
      });
    } else {
      console.error("Unknown error:", error);
    }
    return false;
  }
}

async function submit(text: string): Promise<Task[]> {
  const response = await axios.post<Task[]>(`${CONFIG.serverUrl}/tasks`, { text });
  return response.data;
}

async function fetchTask(id: string): Promise<Task> {
  const response = await axios.get<Task>(`${CONFIG.serverUrl}/tasks/${id}`);
  return response.data;
}

/**
 * Polls until every task is Success or Failed, printing changes as they happen
 */
async function waitForTasks(ids: string[]): Promise<Task[]> {
  const lastLine = new Map<string, string>();
  for (let attempt = 0; attempt < CONFIG.maxRetries; attempt++) {
    const tasks = await Promise.all(ids.map(fetchTask));
    for (const task of tasks) {
      const line = `${task.status.padEnd(8)} ${task.stage.padEnd(16)} ${task.progress.padEnd(7)} ${task.title}`;
      if (lastLine.get(task.id) !== line) {
        lastLine.set(task.id, line);
        console.log(`[${task.id.slice(0, 8)}] ${line}`);
      }
    }
    if (tasks.every((task) => FINISHED.includes(task.status))) {
      return tasks;
    }
    await new Promise((resolve) => setTimeout(resolve, CONFIG.pollingInterval));
  }
  throw new Error("Tasks did not finish in time");
}

async function main(): Promise<void> {
  const text = process.argv.slice(2).join(" ");
  if (!text.trim()) {
    console.error("Usage: npm run submit -- <text containing links>");
    process.exit(1);
  }

  if (!(await isServerRunning())) {
    console.error(`No server at ${CONFIG.serverUrl}`);
    process.exit(1);
  }

  const created = await submit(text);
  if (created.length === 0) {
    console.log("No links found in the text");
    return;
  }
  console.log(`Created ${created.length} task(s)`);

  const finished = await waitForTasks(created.map((task) => task.id));
  for (const task of finished) {
    if (task.status === TaskStatus.SUCCESS) {
      console.log(`✓ ${task.title}: ${task.outputPath}`);
    } else {
      console.log(`✗ ${task.title}:\n${task.errorMessage}`);
    }
  }
  if (finished.some((task) => task.status === TaskStatus.FAILED)) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error("Error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
