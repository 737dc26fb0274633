/**
 * @file titles.test.ts
 * @description Tests for title quality predicates
 */

import { isPlaceholderTitle, titleFromFileName } from "../../../src/core/titles";
import { PLACEHOLDER_TITLE } from "../../../src/utils/urls";

describe("isPlaceholderTitle", () => {
  it.each([
    ["", true],
    ["   ", true],
    [PLACEHOLDER_TITLE, true],
    ["1234567", true],
    ["0123456789abcdef", true],
    ["ABCDEF123456", true],
    ["abcdef12", false],
    ["My Holiday", false],
    ["clip-one", false],
  ])("should classify %p as %p", (title, expected) => {
    expect(isPlaceholderTitle(title)).toBe(expected);
  });
});

describe("titleFromFileName", () => {
  it("should drop the directory and the last extension", () => {
    expect(titleFromFileName("/downloads/2024-03-05/My Clip.f137.mp4")).toBe("My Clip.f137");
  });

  it("should keep a name without an extension", () => {
    expect(titleFromFileName("notes")).toBe("notes");
  });
});
