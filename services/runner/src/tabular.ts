import { parse } from "csv-parse/sync";
import type { JsonValue } from "../../../packages/shared/src/types";

export interface ParsedTable {
  columns: string[];
  /** Data rows only; the first line is the header. */
  rows: string[][];
}

/** An answer is tabular when it is text with at least one line break (delimited rows). */
export function isTabularAnswer(answer: JsonValue): answer is string {
  return typeof answer === "string" && answer.includes("\n");
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((cell) => typeof cell === "string");
}

/**
 * Parse delimited text into header + rows. Blank lines are skipped and short rows are kept as they are.
 * Throws on malformed input (a row wider than the header, an unclosed quote); callers record that as a failed check.
 */
export function parseTable(text: string): ParsedTable {
  const parsed: unknown = parse(text, {
    skip_empty_lines: true,
    trim: true,
    relax_column_count_less: true
  });
  if (!Array.isArray(parsed)) {
    throw new Error("Table parser returned no records");
  }
  const records = parsed.filter(isStringArray);
  if (records.length === 0) {
    return { columns: [], rows: [] };
  }
  const [header, ...rows] = records;
  return { columns: header, rows };
}
