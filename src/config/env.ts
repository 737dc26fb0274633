/**
 * @file env.ts
 * @description Environment configuration shape and defaults
 */

import dotenv from "dotenv";
import os from "os";
import path from "path";

dotenv.config();

export interface EnvConfig {
  PORT: number;
  HOST: string;
  NODE_ENV: string;
  LOG_LEVEL: string;
  MAX_CONCURRENT_TASKS: number;
  QUEUE_CAPACITY: number;
  /** Directory holding tasks.json, config.json and the bundled engine */
  DATA_DIR: string;
  /** Root of the date-bucketed output directories */
  DOWNLOAD_DIR: string;
  /** Destination of exported task files */
  EXPORT_DIR: string;
  /** Explicit engine binary; used only when it points at an existing file */
  ENGINE_PATH: string;
  /** Raw extra arguments appended to every engine invocation */
  ENGINE_ARGS: string;
  RUNNING_GRACE_MS: number;
  PARTIAL_WINDOW_MS: number;
}

const DEFAULT_DATA_DIR = path.join(os.homedir(), ".clipqueue");

/**
 * @constant defaultConfig
 * @description Default configuration values
 */
export const defaultConfig: EnvConfig = {
  PORT: 8080,
  HOST: "localhost",
  NODE_ENV: "development",
  LOG_LEVEL: "info",
  MAX_CONCURRENT_TASKS: 3,
  QUEUE_CAPACITY: 100,
  DATA_DIR: DEFAULT_DATA_DIR,
  DOWNLOAD_DIR: path.join(DEFAULT_DATA_DIR, "downloads"),
  EXPORT_DIR: path.join(os.homedir(), "Downloads"),
  ENGINE_PATH: "",
  ENGINE_ARGS: "",
  RUNNING_GRACE_MS: 30_000, // 30 seconds
  PARTIAL_WINDOW_MS: 60_000, // 1 minute
};

