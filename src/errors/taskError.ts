/**
 * @enum {string}
 * @description Error codes surfaced by task operations
 */
export enum TaskErrorCode {
  NOT_FOUND = "NOT_FOUND",
  PROFILE_NOT_FOUND = "PROFILE_NOT_FOUND",
  ALREADY_RUNNING = "ALREADY_RUNNING",
  INVALID_PAYLOAD = "INVALID_PAYLOAD",
  DELETION_FAILED = "DELETION_FAILED",
  ENGINE_FAILURE = "ENGINE_FAILURE",
  FILE_MISSING = "FILE_MISSING",
  OUTPUT_PENDING = "OUTPUT_PENDING",
  QUEUE_FULL = "QUEUE_FULL",
}

/**
 * @constant TASK_ERROR_STATUS
 * @description HTTP status used when an error code reaches the API layer
 */
export const TASK_ERROR_STATUS: Record<TaskErrorCode, number> = {
  [TaskErrorCode.NOT_FOUND]: 404,
  [TaskErrorCode.PROFILE_NOT_FOUND]: 404,
  [TaskErrorCode.ALREADY_RUNNING]: 409,
  [TaskErrorCode.INVALID_PAYLOAD]: 400,
  [TaskErrorCode.DELETION_FAILED]: 500,
  [TaskErrorCode.ENGINE_FAILURE]: 502,
  [TaskErrorCode.FILE_MISSING]: 410,
  [TaskErrorCode.OUTPUT_PENDING]: 409,
  [TaskErrorCode.QUEUE_FULL]: 503,
};

/**
 * @class TaskError
 * @description Typed failure of a task operation
 * @extends Error
 */
export class TaskError extends Error {
  /**
   * @constructor
   * @param {TaskErrorCode} code - The error code
   * @param {string} message - Human readable description
   */
  constructor(public readonly code: TaskErrorCode, message: string) {
    super(message);
    this.name = "TaskError";
    Object.setPrototypeOf(this, TaskError.prototype);
  }

  /**
   * @property status
   * @description HTTP status mapped from the error code
   */
  get status(): number {
    return TASK_ERROR_STATUS[this.code];
  }

  static notFound(what: string, id: string): TaskError {
    return new TaskError(TaskErrorCode.NOT_FOUND, `${what} ${id} not found`);
  }
}

/**
 * @interface EngineFailureDetails
 * @description What is known about a failed engine invocation
 */
export interface EngineFailureDetails {
  engineName: string;
  commandLine: string;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Raw error text (spawn failure or signal) */
  cause?: string;
}

/**
 * @function formatEngineFailure
 * @description Composes the diagnostic stored on a failed task: a headline
 * with the exit code, the full command line, then the captured streams.
 * The raw error text is included only when both streams are empty.
 */
export function formatEngineFailure(details: EngineFailureDetails): string {
  const stdout = details.stdout.trim();
  const stderr = details.stderr.trim();

  let headline = `${details.engineName} failed`;
  if (details.exitCode !== null) {
    headline += ` (exit code ${details.exitCode})`;
  }

  const parts = [headline, `Command: ${details.commandLine}`];
  if (stdout) {
    parts.push(`Stdout:\n${stdout}`);
  }
  if (stderr) {
    parts.push(`Stderr:\n${stderr}`);
  }
  if (!stdout && !stderr) {
    parts.push(`Error: ${details.cause || "unknown error"}`);
  }
  return parts.join("\n");
}

/**
 * @class EngineError
 * @description Non-zero exit or invocation error of the download engine
 * @extends TaskError
 */
export class EngineError extends TaskError {
  public readonly exitCode: number | null;
  public readonly commandLine: string;
  public readonly stdout: string;
  public readonly stderr: string;

  constructor(details: EngineFailureDetails) {
    super(TaskErrorCode.ENGINE_FAILURE, formatEngineFailure(details));
    this.name = "EngineError";
    this.exitCode = details.exitCode;
    this.commandLine = details.commandLine;
    this.stdout = details.stdout;
    this.stderr = details.stderr;
    Object.setPrototypeOf(this, EngineError.prototype);
  }
}
