/**
 * @file titles.ts
 * @description Title quality predicates
 */

import path from "path";
import { PLACEHOLDER_TITLE } from "../utils/urls";

const NUMERIC = /^[0-9]+$/;
const HEX = /^[0-9a-fA-F]+$/;
const MIN_HEX_ID_LENGTH = 12;

/**
 * @function isPlaceholderTitle
 * @description True when the title carries no human information yet: empty,
 * the placeholder literal, all digits, or a hex id of 12+ characters.
 * Only placeholder titles may be overwritten by resolved metadata.
 */
export function isPlaceholderTitle(title: string): boolean {
  const trimmed = title.trim();
  if (trimmed === "" || trimmed === PLACEHOLDER_TITLE) {
    return true;
  }
  if (NUMERIC.test(trimmed)) {
    return true;
  }
  return HEX.test(trimmed) && trimmed.length >= MIN_HEX_ID_LENGTH;
}

/**
 * @function titleFromFileName
 * @description File name without directory and extension
 */
export function titleFromFileName(filePath: string): string {
  const base = path.basename(filePath);
  const ext = path.extname(base);
  return ext ? base.slice(0, -ext.length) : base;
}
