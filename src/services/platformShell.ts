/**
 * @file platformShell.ts
 * @description Desktop collaborators: open a path, move a file to the trash
 */

import { spawn } from "child_process";
import { Logger } from "../utils/logger";

/**
 * @interface PlatformShell
 * @description Host integrations the task service delegates to
 */
export interface PlatformShell {
  /** Opens a file or directory with the default application */
  open(target: string): Promise<void>;
  /** Moves a file to the platform trash; rejects when that fails */
  trash(filePath: string): Promise<void>;
}

interface ShellCommand {
  command: string;
  args: string[];
}

function quoted(value: string): string {
  return JSON.stringify(value);
}

export function openCommand(target: string, platform: NodeJS.Platform = process.platform): ShellCommand {
  switch (platform) {
    case "darwin":
      return { command: "open", args: [target] };
    case "win32":
      return { command: "cmd", args: ["/c", "start", "", target] };
    default:
      return { command: "xdg-open", args: [target] };
  }
}

export function trashCommand(filePath: string, platform: NodeJS.Platform = process.platform): ShellCommand {
  switch (platform) {
    case "darwin":
      return {
        command: "osascript",
        args: ["-e", `tell application "Finder" to delete POSIX file ${quoted(filePath)}`],
      };
    case "win32": {
      const literal = `'${filePath.replace(/'/g, "''")}'`;
      return {
        command: "powershell",
        args: [
          "-NoProfile",
          "-Command",
          `Add-Type -AssemblyName Microsoft.VisualBasic; [Microsoft.VisualBasic.FileIO.FileSystem]::DeleteFile(${literal},'OnlyErrorDialogs','SendToRecycleBin')`,
        ],
      };
    }
    default:
      return { command: "gio", args: ["trash", filePath] };
  }
}

/**
 * @class SystemShell
 * @description Spawns the host's own tools
 */
export class SystemShell implements PlatformShell {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  public open(target: string): Promise<void> {
    const { command, args } = openCommand(target, this.platform);
    return new Promise<void>((resolve, reject) => {
      const child = spawn(command, args, { detached: true, stdio: "ignore" });
      child.once("error", reject);
      child.once("spawn", () => {
        child.unref();
        Logger.debug(`Opened ${target}`);
        resolve();
      });
    });
  }

  public trash(filePath: string): Promise<void> {
    const { command, args } = trashCommand(filePath, this.platform);
    return new Promise<void>((resolve, reject) => {
      const child = spawn(command, args, { stdio: "ignore", windowsHide: true });
      child.once("error", reject);
      child.once("close", (code) => {
        if (code === 0) {
          resolve();
        } else {
          reject(new Error(`${command} exited with code ${code}`));
        }
      });
    });
  }
}
