/**
 * Provider-defined checks declared on a question spec (`spec.checks`).
 * They run after the baseline checks; an unknown or malformed definition is a failed check, never an error.
 */

import { z } from "zod";
import type { JsonValue, RunnerCheck } from "../../../packages/shared/src/types";
import type { ParsedTable } from "./tabular";

const CheckDefSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("expected_columns"),
    columns: z.array(z.string()).min(1)
  }),
  z.object({
    kind: z.literal("min_rows"),
    min: z.number().int().min(0)
  }),
  z.object({
    kind: z.literal("contains"),
    terms: z.array(z.string()).min(1),
    case_sensitive: z.boolean().optional()
  })
]);

export type CheckDef = z.infer<typeof CheckDefSchema>;

const KNOWN_KINDS = new Set(["expected_columns", "min_rows", "contains"]);

function isRecord(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function answerText(answer: JsonValue): string {
  return typeof answer === "string" ? answer : JSON.stringify(answer);
}

function runCheck(def: CheckDef, answer: JsonValue, table: ParsedTable | null): RunnerCheck {
  switch (def.kind) {
    case "expected_columns": {
      if (!table) return { name: def.kind, passed: false, error: "answer is not tabular" };
      const present = new Set(table.columns.map((c) => c.toLowerCase()));
      const missing = def.columns.filter((c) => !present.has(c.toLowerCase()));
      return { name: def.kind, passed: missing.length === 0, missing };
    }
    case "min_rows": {
      if (!table) return { name: def.kind, passed: false, error: "answer is not tabular" };
      return { name: def.kind, passed: table.rows.length >= def.min, rows: table.rows.length, min: def.min };
    }
    case "contains": {
      const text = answerText(answer);
      const haystack = def.case_sensitive ? text : text.toLowerCase();
      const missing = def.terms.filter((t) => !haystack.includes(def.case_sensitive ? t : t.toLowerCase()));
      return { name: def.kind, passed: missing.length === 0, missing };
    }
  }
}

export function runProviderChecks(spec: JsonValue, answer: JsonValue, table: ParsedTable | null): RunnerCheck[] {
  if (!isRecord(spec) || !Array.isArray(spec.checks)) return [];

  return spec.checks.map((raw, index) => {
    const parsed = CheckDefSchema.safeParse(raw);
    if (parsed.success) return runCheck(parsed.data, answer, table);

    const kind = isRecord(raw) && typeof raw.kind === "string" ? raw.kind : `check_${index}`;
    const error = KNOWN_KINDS.has(kind) ? "invalid check definition" : "unknown check kind";
    return { name: kind, passed: false, error };
  });
}
