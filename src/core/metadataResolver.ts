/**
 * @file metadataResolver.ts
 * @description Best-effort media metadata from the engine's JSON dump
 */

import { EngineRunner } from "../clients/engineClient";
import { TaskMetadata } from "../interfaces/task";
import { Logger } from "../utils/logger";
import { sourceHostFromUrl } from "../utils/urls";
import { errorText } from "./persistence";

export const METADATA_ARGS = [
  "--skip-download",
  "--no-warnings",
  "--no-playlist",
  "-J",
];

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function numberOf(source: JsonObject, key: string): number {
  const value = source[key];
  return typeof value === "number" && Number.isFinite(value) ? Math.trunc(value) : 0;
}

function stringOf(source: JsonObject, key: string): string {
  const value = source[key];
  return typeof value === "string" ? value.trim() : "";
}

/**
 * @function parseResolution
 * @description Parses `WIDTHxHEIGHT`; anything else yields zeros
 */
export function parseResolution(value: string): { width: number; height: number } {
  const match = /^\s*(\d+)\s*[xX]\s*(\d+)\s*$/.exec(value);
  if (!match) {
    return { width: 0, height: 0 };
  }
  return { width: parseInt(match[1], 10), height: parseInt(match[2], 10) };
}

interface FormatDimensions {
  filesize: number;
  width: number;
  height: number;
}

function formatDimensions(format: JsonObject): FormatDimensions {
  let width = numberOf(format, "width");
  let height = numberOf(format, "height");
  if (width <= 0 || height <= 0) {
    const parsed = parseResolution(stringOf(format, "resolution"));
    if (parsed.width > 0 && parsed.height > 0) {
      width = parsed.width;
      height = parsed.height;
    }
  }
  const filesize = numberOf(format, "filesize") || numberOf(format, "filesize_approx");
  return { filesize, width, height };
}

/**
 * @function pickBestFormat
 * @description Scores each variant by filesize, else by pixel area. The
 * highest strictly positive score wins; ties keep the earlier entry.
 */
export function pickBestFormat(formats: unknown): FormatDimensions | null {
  if (!Array.isArray(formats)) {
    return null;
  }
  let best: FormatDimensions | null = null;
  let bestScore = 0;
  for (const entry of formats) {
    if (!isObject(entry)) continue;
    const dims = formatDimensions(entry);
    const score = dims.filesize > 0 ? dims.filesize : dims.width * dims.height;
    if (score > bestScore) {
      best = dims;
      bestScore = score;
    }
  }
  return best;
}

/**
 * @function parseEngineMetadata
 * @description Maps the engine's JSON document onto TaskMetadata
 * @returns {TaskMetadata | null} null when the text is not a JSON object
 */
export function parseEngineMetadata(json: string, url: string): TaskMetadata | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return null;
  }
  if (!isObject(parsed)) {
    return null;
  }

  const best = pickBestFormat(parsed.formats);

  let filesize = numberOf(parsed, "filesize") || numberOf(parsed, "filesize_approx");
  if (filesize <= 0 && best) {
    filesize = best.filesize;
  }

  let width = numberOf(parsed, "width");
  let height = numberOf(parsed, "height");
  if (width <= 0 || height <= 0) {
    const resolution = parseResolution(stringOf(parsed, "resolution"));
    width = resolution.width;
    height = resolution.height;
  }
  if ((width <= 0 || height <= 0) && best) {
    width = best.width;
    height = best.height;
  }

  return {
    title: stringOf(parsed, "title"),
    sourceHost: stringOf(parsed, "extractor") || sourceHostFromUrl(url),
    duration: numberOf(parsed, "duration"),
    filesize,
    width,
    height,
  };
}

/**
 * @class MetadataResolver
 * @description Runs the engine in dump mode. Every failure means "no metadata".
 */
export class MetadataResolver {
  constructor(private readonly engine: EngineRunner) {}

  public buildArgs(url: string): string[] {
    return [...METADATA_ARGS, ...this.engine.extraArgs, url];
  }

  public async resolve(url: string): Promise<TaskMetadata | null> {
    let stdout: string;
    try {
      ({ stdout } = await this.engine.run(this.buildArgs(url)));
    } catch (error) {
      Logger.debug(`Metadata lookup failed for ${url}: ${errorText(error)}`);
      return null;
    }
    const metadata = parseEngineMetadata(stdout, url);
    if (!metadata) {
      Logger.debug(`Metadata for ${url} is not a JSON object`);
    }
    return metadata;
  }
}
