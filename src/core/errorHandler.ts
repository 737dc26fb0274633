/**
 * @file errorHandler.ts
 * @description Maps operation errors onto HTTP responses
 */

import { Response } from "express";
import { TaskError } from "../errors/taskError";
import { Logger } from "../utils/logger";
import { errorText } from "./persistence";

/**
 * @class ErrorHandler
 * @description Single place where errors leave the service
 */
export class ErrorHandler {
  /**
   * @static
   * @method handleHttpError
   * @description TaskErrors keep their code and mapped status; anything else is a 500
   */
  public static handleHttpError(error: unknown, res: Response): void {
    if (error instanceof TaskError) {
      const log = error.status >= 500 ? Logger.error : Logger.warn;
      log.call(Logger, `HTTP ${error.status} ${error.code}: ${error.message}`);
      res.status(error.status).json({ error: error.message, code: error.code });
      return;
    }
    Logger.error(`HTTP Error: ${errorText(error)}`);
    res.status(500).json({ error: "Internal server error" });
  }
}
