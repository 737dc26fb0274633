/**
 * @file progressParser.ts
 * @description Parsing of the engine's machine-readable progress lines
 */

import { ProgressSample, Task } from "../interfaces/task";

export const PROGRESS_PREFIX = "progress:";

/**
 * @constant PROGRESS_TEMPLATE
 * @description Template handed to the engine so it prints
 * `progress:<percent>|<speed>|<eta>` on its own line
 */
export const PROGRESS_TEMPLATE = `${PROGRESS_PREFIX}%(progress._percent_str)s|%(progress._speed_str)s|%(progress._eta_str)s`;

/**
 * @function parseProgressLine
 * @description Splits a progress line into at most three trimmed fields.
 * Anything after the second `|` belongs to the eta.
 * @returns {ProgressSample | null} null for ordinary output lines
 */
export function parseProgressLine(line: string): ProgressSample | null {
  if (!line.startsWith(PROGRESS_PREFIX)) {
    return null;
  }
  const body = line.slice(PROGRESS_PREFIX.length).trim();
  if (!body) {
    return null;
  }

  const first = body.indexOf("|");
  if (first < 0) {
    return { percent: body.trim(), speed: "", eta: "" };
  }
  const second = body.indexOf("|", first + 1);
  const percent = body.slice(0, first).trim();
  if (second < 0) {
    return { percent, speed: body.slice(first + 1).trim(), eta: "" };
  }
  return {
    percent,
    speed: body.slice(first + 1, second).trim(),
    eta: body.slice(second + 1).trim(),
  };
}

/**
 * @function isProgressChange
 * @description Whether the sample differs from what the task already shows
 */
export function isProgressChange(
  task: Pick<Task, "progress" | "speed" | "eta">,
  sample: ProgressSample
): boolean {
  return (
    task.progress !== sample.percent ||
    task.speed !== sample.speed ||
    task.eta !== sample.eta
  );
}

/**
 * @function applyProgress
 * @description Copies the sample onto the task; false when nothing changed
 */
export function applyProgress(task: Task, sample: ProgressSample): boolean {
  if (!isProgressChange(task, sample)) {
    return false;
  }
  task.progress = sample.percent;
  task.speed = sample.speed;
  task.eta = sample.eta;
  return true;
}
