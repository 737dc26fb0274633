/**
 * @file streamingService.ts
 * @description Service for streaming task updates using Server-Sent Events (SSE)
 */

import { Response } from "express";
import { Logger } from "../utils/logger";
import { TASK_UPDATE_EVENT, Task, TaskUpdateEvent } from "../interfaces/task";
import { errorText } from "../core/persistence";

/**
 * @type SseClient
 * @description The part of an Express response the stream writes to
 */
export type SseClient = Pick<Response, "writeHead" | "write" | "end" | "on">;

/**
 * @interface StreamingConnection
 * @description One open SSE response, optionally limited to a single task
 */
interface StreamingConnection {
  response: SseClient;
  taskId?: string;
}

/**
 * @class StreamingService
 * @description Fans every task-update out to the connected SSE clients
 */
export class StreamingService {
  private connections: Set<StreamingConnection> = new Set();

  /**
   * @method subscribe
   * @description Subscribe a client to task updates
   * @param {string} [taskId] - Only stream updates of this task
   */
  public subscribe(res: SseClient, taskId?: string): void {
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });

    const connection: StreamingConnection = { response: res, taskId };
    this.connections.add(connection);
    res.write(": connected\n\n");

    Logger.info(
      taskId
        ? `Client subscribed to updates of task ${taskId}`
        : "Client subscribed to all task updates"
    );

    res.on("close", () => {
      this.unsubscribe(res);
    });
  }

  /**
   * @method unsubscribe
   * @description Drops every connection using this response
   */
  public unsubscribe(res: SseClient): void {
    for (const connection of this.connections) {
      if (connection.response === res) {
        this.connections.delete(connection);
        Logger.debug("Client unsubscribed from task updates");
      }
    }
  }

  /**
   * @method closeAll
   * @description Ends every open stream so the HTTP server can close
   */
  public closeAll(): void {
    const connections = Array.from(this.connections);
    this.connections.clear();
    for (const { response } of connections) {
      try {
        response.end();
      } catch (error) {
        Logger.warn(`Error closing event stream: ${errorText(error)}`);
      }
    }
    if (connections.length > 0) {
      Logger.info(`Closed ${connections.length} event stream(s)`);
    }
  }

  public connectionCount(): number {
    return this.connections.size;
  }

  /**
   * @method notifyTaskUpdate
   * @description Send a task update to all matching clients
   */
  public notifyTaskUpdate(task: Task): void {
    const event: TaskUpdateEvent = { type: TASK_UPDATE_EVENT, task };
    for (const connection of this.connections) {
      if (connection.taskId && connection.taskId !== task.id) {
        continue;
      }
      this.sendEventToClient(connection, event);
    }
  }

  private sendEventToClient(connection: StreamingConnection, event: TaskUpdateEvent): void {
    try {
      connection.response.write(`data: ${JSON.stringify(event)}\n\n`);
    } catch (error) {
      Logger.error(`Error sending event to client: ${errorText(error)}`);
      this.unsubscribe(connection.response);
    }
  }
}
