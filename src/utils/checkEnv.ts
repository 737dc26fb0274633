/**
 * @file checkEnv.ts
 * @description Environment validation utilities
 */

import path from "path";
import { EnvConfig, defaultConfig } from "../config/env";
import { Logger } from "./logger";

/**
 * @function readInt
 * @description Parses an integer variable, falling back to the default when unset
 * @throws {Error} If the value is set but not an integer
 */
function readInt(
  env: NodeJS.ProcessEnv,
  name: keyof EnvConfig,
  fallback: number
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`Environment variable ${name} must be an integer`);
  }
  return value;
}

/**
 * @function readString
 * @description Reads a trimmed string variable, falling back to the default when blank
 */
function readString(
  env: NodeJS.ProcessEnv,
  name: keyof EnvConfig,
  fallback: string
): string {
  const raw = env[name]?.trim();
  return raw ? raw : fallback;
}

/**
 * @function validateEnv
 * @description Validates environment variables and returns a complete config
 * @returns {EnvConfig} Complete configuration with defaults
 * @throws {Error} If a value is out of range
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const dataDir = path.resolve(
    readString(env, "DATA_DIR", defaultConfig.DATA_DIR)
  );

  const config: EnvConfig = {
    PORT: readInt(env, "PORT", defaultConfig.PORT),
    HOST: readString(env, "HOST", defaultConfig.HOST),
    NODE_ENV: readString(env, "NODE_ENV", defaultConfig.NODE_ENV),
    LOG_LEVEL: readString(env, "LOG_LEVEL", defaultConfig.LOG_LEVEL),
    MAX_CONCURRENT_TASKS: readInt(
      env,
      "MAX_CONCURRENT_TASKS",
      defaultConfig.MAX_CONCURRENT_TASKS
    ),
    QUEUE_CAPACITY: readInt(env, "QUEUE_CAPACITY", defaultConfig.QUEUE_CAPACITY),
    DATA_DIR: dataDir,
    // The download root follows DATA_DIR unless it is set on its own
    DOWNLOAD_DIR: path.resolve(
      readString(env, "DOWNLOAD_DIR", path.join(dataDir, "downloads"))
    ),
    EXPORT_DIR: path.resolve(
      readString(env, "EXPORT_DIR", defaultConfig.EXPORT_DIR)
    ),
    ENGINE_PATH: readString(env, "ENGINE_PATH", defaultConfig.ENGINE_PATH),
    ENGINE_ARGS: readString(env, "ENGINE_ARGS", defaultConfig.ENGINE_ARGS),
    RUNNING_GRACE_MS: readInt(
      env,
      "RUNNING_GRACE_MS",
      defaultConfig.RUNNING_GRACE_MS
    ),
    PARTIAL_WINDOW_MS: readInt(
      env,
      "PARTIAL_WINDOW_MS",
      defaultConfig.PARTIAL_WINDOW_MS
    ),
  };

  if (config.MAX_CONCURRENT_TASKS < 1) {
    throw new Error("MAX_CONCURRENT_TASKS must be at least 1");
  }
  if (config.QUEUE_CAPACITY < 1) {
    throw new Error("QUEUE_CAPACITY must be at least 1");
  }

  Logger.debug("Environment configuration:", config);
  return config;
}

/**
 * @function getEnvConfig
 * @description Gets the validated environment configuration
 * @returns {EnvConfig} Complete configuration
 */
export function getEnvConfig(): EnvConfig {
  return validateEnv();
}
