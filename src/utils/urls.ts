/**
 * @file urls.ts
 * @description Locator extraction and URL-derived display values
 */

export const PLACEHOLDER_TITLE = "Pending title";

const URL_PATTERN = /https?:\/\/\S+/g;

/**
 * @function extractUrls
 * @description Distinct http(s) locators in order of first appearance
 */
export function extractUrls(text: string): string[] {
  const matches = text.match(URL_PATTERN) ?? [];
  return Array.from(new Set(matches));
}

function parseUrl(rawUrl: string): URL | null {
  try {
    return new URL(rawUrl);
  } catch {
    return null;
  }
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * @function defaultTitleFromUrl
 * @description Initial title: last path segment without its extension,
 * else the host, else the placeholder
 */
export function defaultTitleFromUrl(rawUrl: string): string {
  const parsed = parseUrl(rawUrl);
  if (!parsed) {
    return PLACEHOLDER_TITLE;
  }

  const segments = parsed.pathname.split("/").filter((part) => part !== "");
  const segment = decodeSegment(segments[segments.length - 1] ?? "").trim();
  if (!segment) {
    return parsed.host || PLACEHOLDER_TITLE;
  }

  const dot = segment.lastIndexOf(".");
  const name = dot >= 0 ? segment.slice(0, dot) : segment;
  return name || PLACEHOLDER_TITLE;
}

/**
 * @function sourceHostFromUrl
 * @description Hostname without a leading "www.", or "" when unparsable
 */
export function sourceHostFromUrl(rawUrl: string): string {
  const parsed = parseUrl(rawUrl);
  if (!parsed) {
    return "";
  }
  return parsed.hostname.replace(/^www\./, "");
}
