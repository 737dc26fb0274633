/**
 * @file logger.ts
 * @description Leveled console logging utility
 */

/**
 * @type LogLevel
 * @description Supported log levels, most severe first
 */
export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_WEIGHT, value);
}

/**
 * @class Logger
 * @description Provides logging functionality with different levels.
 * The threshold is read from LOG_LEVEL on every call so tests and the
 * server can change it at runtime.
 */
export class Logger {
  private static readonly LOG_LEVELS = {
    ERROR: "ERROR",
    WARN: "WARN",
    INFO: "INFO",
    DEBUG: "DEBUG",
    SUCCESS: "SUCCESS",
  };

  /**
   * @method isEnabled
   * @description Whether messages of the given level pass the LOG_LEVEL threshold
   */
  public static isEnabled(level: LogLevel): boolean {
    const configured = (process.env.LOG_LEVEL || "info").toLowerCase();
    const threshold = isLogLevel(configured)
      ? LEVEL_WEIGHT[configured]
      : LEVEL_WEIGHT.info;
    return LEVEL_WEIGHT[level] <= threshold;
  }

  /**
   * @method error
   * @description Log error messages
   */
  public static error(message: string, ...args: unknown[]): void {
    if (!this.isEnabled("error")) return;
    console.error(`[${this.LOG_LEVELS.ERROR}] ${message}`, ...args);
  }

  /**
   * @method warn
   * @description Log warning messages
   */
  public static warn(message: string, ...args: unknown[]): void {
    if (!this.isEnabled("warn")) return;
    console.warn(`[${this.LOG_LEVELS.WARN}] ${message}`, ...args);
  }

  /**
   * @method info
   * @description Log info messages
   */
  public static info(message: string, ...args: unknown[]): void {
    if (!this.isEnabled("info")) return;
    console.info(`[${this.LOG_LEVELS.INFO}] ${message}`, ...args);
  }

  /**
   * @method success
   * @description Log milestone messages at info level
   */
  public static success(message: string, ...args: unknown[]): void {
    if (!this.isEnabled("info")) return;
    console.info(`[${this.LOG_LEVELS.SUCCESS}] ${message}`, ...args);
  }

  /**
   * @method debug
   * @description Log debug messages
   */
  public static debug(message: string, ...args: unknown[]): void {
    if (!this.isEnabled("debug")) return;
    console.debug(`[${this.LOG_LEVELS.DEBUG}] ${message}`, ...args);
  }
}
