/**
 * @file engineClient.ts
 * @description Subprocess client for the external download engine (yt-dlp CLI contract)
 */

import { spawn } from "child_process";
import fs from "fs";
import path from "path";
import { EngineError } from "../errors/taskError";
import { Logger } from "../utils/logger";

export const DEFAULT_ENGINE_NAME = "yt-dlp";

export type OutputStream = "stdout" | "stderr";

export type LineHandler = (line: string, stream: OutputStream) => void;

/**
 * @interface EngineRunResult
 * @description Captured output of a successful invocation
 */
export interface EngineRunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * @interface EngineRunner
 * @description What the metadata resolver and the task processor need from the engine
 */
export interface EngineRunner {
  /** Tokens of the environment-supplied argument string */
  readonly extraArgs: string[];
  commandLine(args: string[]): string;
  /**
   * Runs the engine to completion. Resolves after the process exited and
   * both streams are drained.
   * @throws {EngineError} on spawn failure, signal or non-zero exit
   */
  run(args: string[], onLine?: LineHandler): Promise<EngineRunResult>;
}

export interface EngineClientConfig {
  enginePath: string;
  extraArgs?: string[];
}

/**
 * @function parseExtraArgs
 * @description Whitespace-split tokens of a raw argument string
 */
export function parseExtraArgs(raw: string | undefined): string[] {
  const trimmed = (raw ?? "").trim();
  return trimmed ? trimmed.split(/\s+/) : [];
}

function isFile(candidate: string): boolean {
  if (!candidate.trim()) return false;
  try {
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}

/**
 * @function resolveEnginePath
 * @description Explicit override, then PATH, then well-known install
 * locations, then the bare command name
 */
export function resolveEnginePath(
  override: string,
  dataDir: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  const explicit = override.trim();
  if (explicit && isFile(explicit)) {
    return explicit;
  }
  if (explicit) {
    Logger.warn(`ENGINE_PATH ${explicit} does not exist, searching instead`);
  }

  const binary =
    process.platform === "win32" ? `${DEFAULT_ENGINE_NAME}.exe` : DEFAULT_ENGINE_NAME;
  const searchPath = (env.PATH ?? "").split(path.delimiter).filter(Boolean);
  for (const dir of searchPath) {
    const candidate = path.join(dir, binary);
    if (isFile(candidate)) {
      return candidate;
    }
  }

  const candidates = [
    "/opt/homebrew/bin/yt-dlp",
    "/usr/local/bin/yt-dlp",
    "/usr/bin/yt-dlp",
    path.join(dataDir, "bin", binary),
  ];
  return candidates.find(isFile) ?? DEFAULT_ENGINE_NAME;
}

/**
 * @function createLineCollector
 * @description Splits a chunked stream into lines, keeping every line
 * (with its newline) in the capture buffer
 */
function createLineCollector(onLine: (line: string) => void): {
  push: (chunk: string) => void;
  flush: () => void;
  text: () => string;
} {
  let pending = "";
  let captured = "";
  const emit = (line: string) => {
    captured += `${line}\n`;
    onLine(line);
  };
  return {
    push: (chunk: string) => {
      pending += chunk;
      const lines = pending.split(/\r?\n/);
      pending = lines.pop() ?? "";
      lines.forEach(emit);
    },
    flush: () => {
      if (pending) {
        emit(pending);
        pending = "";
      }
    },
    text: () => captured,
  };
}

/**
 * @class EngineClient
 * @description Spawns the engine binary and streams its output line by line
 */
export class EngineClient implements EngineRunner {
  public readonly enginePath: string;
  public readonly extraArgs: string[];

  constructor(config: EngineClientConfig) {
    this.enginePath = config.enginePath || DEFAULT_ENGINE_NAME;
    this.extraArgs = config.extraArgs ?? [];
  }

  get engineName(): string {
    return path.basename(this.enginePath);
  }

  public commandLine(args: string[]): string {
    return [this.enginePath, ...args].join(" ");
  }

  public run(args: string[], onLine?: LineHandler): Promise<EngineRunResult> {
    const commandLine = this.commandLine(args);
    Logger.debug(`Running: ${commandLine}`);

    return new Promise<EngineRunResult>((resolve, reject) => {
      const child = spawn(this.enginePath, args, {
        stdio: ["ignore", "pipe", "pipe"],
        windowsHide: true,
      });

      const stdout = createLineCollector((line) => onLine?.(line, "stdout"));
      const stderr = createLineCollector((line) => onLine?.(line, "stderr"));
      child.stdout.setEncoding("utf8");
      child.stderr.setEncoding("utf8");
      child.stdout.on("data", (chunk: string) => stdout.push(chunk));
      child.stderr.on("data", (chunk: string) => stderr.push(chunk));

      let settled = false;
      const fail = (exitCode: number | null, cause?: string) => {
        if (settled) return;
        settled = true;
        reject(
          new EngineError({
            engineName: this.engineName,
            commandLine,
            exitCode,
            stdout: stdout.text(),
            stderr: stderr.text(),
            cause,
          })
        );
      };

      child.on("error", (error) => {
        fail(null, error.message);
      });

      // "close" fires only after the process exited and both pipes ended
      child.on("close", (code, signal) => {
        stdout.flush();
        stderr.flush();
        if (code === 0) {
          if (settled) return;
          settled = true;
          resolve({ stdout: stdout.text(), stderr: stderr.text(), exitCode: 0 });
          return;
        }
        fail(code, signal ? `terminated by ${signal}` : undefined);
      });
    });
  }
}
