/**
 * @file pushNotificationService.ts
 * @description Delivers task updates to registered webhooks
 */

import axios from "axios";
import { Logger } from "../utils/logger";
import { TASK_UPDATE_EVENT, Task, TaskUpdateEvent } from "../interfaces/task";
import { errorText } from "../core/persistence";
import { TaskError, TaskErrorCode } from "../errors/taskError";

export const WEBHOOK_TIMEOUT_MS = 5000;

/**
 * @class PushNotificationService
 * @description POSTs each task-update as JSON to every webhook. Delivery is
 * best effort: failures are logged and the event is dropped.
 */
export class PushNotificationService {
  private webhooks: Set<string> = new Set();
  private pending: Set<Promise<void>> = new Set();

  /**
   * @method subscribeWebhook
   * @throws {TaskError} INVALID_PAYLOAD when the url is not http(s)
   */
  public subscribeWebhook(webhookUrl: string): void {
    let parsed: URL;
    try {
      parsed = new URL(webhookUrl);
    } catch {
      throw new TaskError(TaskErrorCode.INVALID_PAYLOAD, `Invalid webhook URL: ${webhookUrl}`);
    }
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      throw new TaskError(TaskErrorCode.INVALID_PAYLOAD, `Invalid webhook URL: ${webhookUrl}`);
    }
    this.webhooks.add(webhookUrl);
    Logger.info(`Webhook configured: ${webhookUrl}`);
  }

  /**
   * @method unsubscribeWebhook
   * @returns {boolean} Whether the url was registered
   */
  public unsubscribeWebhook(webhookUrl: string): boolean {
    const removed = this.webhooks.delete(webhookUrl);
    if (removed) {
      Logger.info(`Webhook removed: ${webhookUrl}`);
    }
    return removed;
  }

  public listWebhooks(): string[] {
    return Array.from(this.webhooks);
  }

  /**
   * @method notifyTaskUpdate
   * @description Starts a delivery per webhook without waiting for it
   */
  public notifyTaskUpdate(task: Task): void {
    const event: TaskUpdateEvent = { type: TASK_UPDATE_EVENT, task };
    for (const webhookUrl of this.webhooks) {
      const delivery = this.sendWebhookNotification(webhookUrl, event).finally(() => {
        this.pending.delete(delivery);
      });
      this.pending.add(delivery);
    }
  }

  /**
   * @method flush
   * @description Resolves once every started delivery has settled
   */
  public async flush(): Promise<void> {
    await Promise.all(Array.from(this.pending));
  }

  private async sendWebhookNotification(
    webhookUrl: string,
    event: TaskUpdateEvent
  ): Promise<void> {
    try {
      await axios.post(webhookUrl, event, {
        headers: { "Content-Type": "application/json" },
        timeout: WEBHOOK_TIMEOUT_MS,
      });
    } catch (error) {
      Logger.error(`Error sending webhook notification to ${webhookUrl}: ${errorText(error)}`);
    }
  }
}
