/**
 * @file pushNotificationService.test.ts
 * @description Tests for PushNotificationService implementation
 */

import axios from "axios";
import {
  PushNotificationService,
  WEBHOOK_TIMEOUT_MS,
} from "../../../src/services/pushNotificationService";
import { TaskErrorCode } from "../../../src/errors/taskError";
import { Logger } from "../../../src/utils/logger";
import { createMockTask } from "../../mocks/taskMocks";

jest.mock("axios");
jest.mock("../../../src/utils/logger");

const mockedPost = jest.mocked(axios.post);

describe("PushNotificationService", () => {
  let service: PushNotificationService;

  beforeEach(() => {
    jest.clearAllMocks();
    service = new PushNotificationService();
  });

  it("should register http and https webhooks only", () => {
    service.subscribeWebhook("http://hooks.example/a");
    service.subscribeWebhook("https://hooks.example/b");

    expect(service.listWebhooks()).toEqual(["http://hooks.example/a", "https://hooks.example/b"]);
    expect(() => service.subscribeWebhook("ftp://hooks.example/c")).toThrow(
      "Invalid webhook URL: ftp://hooks.example/c"
    );
    try {
      service.subscribeWebhook("not a url");
      throw new Error("expected a failure");
    } catch (error) {
      expect(error).toMatchObject({ code: TaskErrorCode.INVALID_PAYLOAD });
    }
  });

  it("should POST the event to every webhook", async () => {
    const task = createMockTask();
    service.subscribeWebhook("https://hooks.example/a");
    service.subscribeWebhook("https://hooks.example/b");

    service.notifyTaskUpdate(task);
    await service.flush();

    const options = {
      headers: { "Content-Type": "application/json" },
      timeout: WEBHOOK_TIMEOUT_MS,
    };
    expect(mockedPost.mock.calls).toEqual([
      ["https://hooks.example/a", { type: "task-update", task }, options],
      ["https://hooks.example/b", { type: "task-update", task }, options],
    ]);
  });

  it("should log and drop a failed delivery", async () => {
    mockedPost.mockRejectedValueOnce(new Error("connect ECONNREFUSED"));
    service.subscribeWebhook("https://hooks.example/a");

    service.notifyTaskUpdate(createMockTask());
    await expect(service.flush()).resolves.toBeUndefined();

    expect(Logger.error).toHaveBeenCalledWith(
      "Error sending webhook notification to https://hooks.example/a: connect ECONNREFUSED"
    );
  });

  it("should stop delivering after unsubscribe", async () => {
    service.subscribeWebhook("https://hooks.example/a");

    expect(service.unsubscribeWebhook("https://hooks.example/a")).toBe(true);
    expect(service.unsubscribeWebhook("https://hooks.example/a")).toBe(false);
    service.notifyTaskUpdate(createMockTask());
    await service.flush();

    expect(mockedPost).not.toHaveBeenCalled();
  });
});
