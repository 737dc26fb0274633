/**
 * @file progressParser.test.ts
 * @description Tests for engine progress line parsing
 */

import {
  PROGRESS_TEMPLATE,
  applyProgress,
  parseProgressLine,
} from "../../../src/core/progressParser";
import { createMockTask } from "../../mocks/taskMocks";

describe("parseProgressLine", () => {
  it("should split the three fields and trim them", () => {
    expect(parseProgressLine("progress:  42.0%| 1.2MiB/s |00:10")).toEqual({
      percent: "42.0%",
      speed: "1.2MiB/s",
      eta: "00:10",
    });
  });

  it("should give everything after the second separator to the eta", () => {
    expect(parseProgressLine("progress:5%|1KiB/s|00:01|extra")).toEqual({
      percent: "5%",
      speed: "1KiB/s",
      eta: "00:01|extra",
    });
  });

  it("should leave missing fields empty", () => {
    expect(parseProgressLine("progress:7%")).toEqual({ percent: "7%", speed: "", eta: "" });
    expect(parseProgressLine("progress:7%|2KiB/s")).toEqual({
      percent: "7%",
      speed: "2KiB/s",
      eta: "",
    });
  });

  it("should ignore ordinary output and empty progress lines", () => {
    expect(parseProgressLine("[download] Destination: clip.mp4")).toBeNull();
    expect(parseProgressLine("progress:   ")).toBeNull();
    expect(parseProgressLine(" progress:5%|a|b")).toBeNull();
  });

  it("should match the template handed to the engine", () => {
    expect(PROGRESS_TEMPLATE).toBe(
      "progress:%(progress._percent_str)s|%(progress._speed_str)s|%(progress._eta_str)s"
    );
  });
});

describe("applyProgress", () => {
  it("should report a change only when a field differs", () => {
    const task = createMockTask();
    const sample = { percent: "10%", speed: "1MiB/s", eta: "00:30" };

    expect(applyProgress(task, sample)).toBe(true);
    expect(task.progress).toBe("10%");
    expect(applyProgress(task, { ...sample })).toBe(false);
    expect(applyProgress(task, { ...sample, eta: "00:29" })).toBe(true);
    expect(task.eta).toBe("00:29");
  });
});
