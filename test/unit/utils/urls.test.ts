/**
 * @file urls.test.ts
 * @description Tests for locator extraction and URL-derived titles
 */

import {
  PLACEHOLDER_TITLE,
  defaultTitleFromUrl,
  extractUrls,
  sourceHostFromUrl,
} from "../../../src/utils/urls";

describe("extractUrls", () => {
  it("should return distinct locators in first-appearance order", () => {
    const text = "see https://a.example/x and http://b.example/y\nhttps://a.example/x again";
    expect(extractUrls(text)).toEqual(["https://a.example/x", "http://b.example/y"]);
  });

  it("should stop a locator at whitespace", () => {
    expect(extractUrls("https://a.example/x\thttps://a.example/z")).toEqual([
      "https://a.example/x",
      "https://a.example/z",
    ]);
  });

  it("should return an empty list for blank or link-free text", () => {
    expect(extractUrls("")).toEqual([]);
    expect(extractUrls("   ")).toEqual([]);
    expect(extractUrls("ftp://files.example/a www.example.com")).toEqual([]);
  });
});

describe("defaultTitleFromUrl", () => {
  it("should use the last path segment without its extension", () => {
    expect(defaultTitleFromUrl("https://cdn.example.com/media/holiday%20clip.mp4")).toBe(
      "holiday clip"
    );
  });

  it("should ignore a trailing slash", () => {
    expect(defaultTitleFromUrl("https://cdn.example.com/videos/abc/")).toBe("abc");
  });

  it("should fall back to the host when the path is empty", () => {
    expect(defaultTitleFromUrl("https://cdn.example.com/")).toBe("cdn.example.com");
  });

  it("should fall back to the placeholder for an unparsable locator", () => {
    expect(defaultTitleFromUrl("https://")).toBe(PLACEHOLDER_TITLE);
  });
});

describe("sourceHostFromUrl", () => {
  it("should strip a leading www.", () => {
    expect(sourceHostFromUrl("https://www.example.org/watch?v=1")).toBe("example.org");
  });

  it("should return an empty string when unparsable", () => {
    expect(sourceHostFromUrl("not a url")).toBe("");
  });
});
