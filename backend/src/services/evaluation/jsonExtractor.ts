/**
 * Recover a single JSON object from free text (model output with preambles, fences or trailing prose).
 * Total: never throws, returns null when nothing parses.
 */

import type { JsonObject } from "../../../../packages/shared/src/types";

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParseObject(text: string): JsonObject | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Index of the brace closing the object opened at `start`, or -1 if it never closes.
 * Braces inside string literals do not count.
 */
export function findClosingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Top-level balanced `{...}` spans in order, found in a single pass. Braces inside string literals
 * do not count. An opening brace that never closes is dropped and does not hide the objects after it.
 */
function findObjectSpans(text: string): Array<[number, number]> {
  const pairs: Array<[number, number]> = [];
  const open: number[] = [];
  let inString = false;
  let escaped = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') {
      // quotes in prose outside any object are not string delimiters
      if (open.length > 0) inString = true;
    } else if (ch === "{") {
      open.push(i);
    } else if (ch === "}") {
      const start = open.pop();
      if (start !== undefined) pairs.push([start, i]);
    }
  }

  pairs.sort((a, b) => a[0] - b[0]);
  const spans: Array<[number, number]> = [];
  let lastEnd = -1;
  for (const [start, end] of pairs) {
    if (start > lastEnd) {
      spans.push([start, end]);
      lastEnd = end;
    }
  }
  return spans;
}

export function extractJsonObject(text: string): JsonObject | null {
  if (!text || text.trim() === "") return null;

  const direct = tryParseObject(text);
  if (direct) return direct;

  // Last complete object first: models put the answer after their reasoning.
  const spans = findObjectSpans(text);
  for (let i = spans.length - 1; i >= 0; i--) {
    const [start, end] = spans[i];
    const parsed = tryParseObject(text.slice(start, end + 1));
    if (parsed) return parsed;
  }

  const lastOpen = text.lastIndexOf("{");
  if (lastOpen === -1) return null;
  const end = findClosingBrace(text, lastOpen);
  return end === -1 ? null : tryParseObject(text.slice(lastOpen, end + 1));
}
