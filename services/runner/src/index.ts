import type { JsonValue, RunnerCheck, RunnerResult } from "../../../packages/shared/src/types";
import { CHECK_NAMES, RUNNER_CONFIG } from "./config";
import { runProviderChecks } from "./checks";
import { isTabularAnswer, parseTable } from "./tabular";

export type { ParsedTable } from "./tabular";
export type { CheckDef } from "./checks";
export { RUNNER_CONFIG, CHECK_NAMES } from "./config";

function sanitizeError(error: unknown): string {
  const msg = error instanceof Error ? error.message : String(error);
  return msg.replace(/\s+/g, " ").trim().slice(0, RUNNER_CONFIG.MAX_ERROR_CHARS);
}

export function isEmptyAnswer(answer: JsonValue): boolean {
  if (answer === null || answer === false) return true;
  if (typeof answer === "string") return answer.trim() === "";
  if (Array.isArray(answer)) return answer.length === 0;
  if (typeof answer === "object") return Object.keys(answer).length === 0;
  return false;
}

function summarize(checks: RunnerCheck[]): RunnerResult {
  const passed = checks.length > 0 && checks.every((c) => c.passed);
  return { passed, checks, scoreRunner: passed ? RUNNER_CONFIG.PASS_SCORE : 0 };
}

/**
 * Deterministic checks for a submitted answer. Never throws: an internal fault becomes an
 * `exception` check and the result fails with score 0.
 */
export function runChecks(spec: JsonValue, answer: JsonValue): RunnerResult {
  const checks: RunnerCheck[] = [];
  try {
    const bytes = Buffer.byteLength(JSON.stringify(answer) ?? "", "utf8");
    if (bytes > RUNNER_CONFIG.MAX_ANSWER_BYTES) {
      checks.push({ name: CHECK_NAMES.ANSWER_SIZE, passed: false, bytes, limit: RUNNER_CONFIG.MAX_ANSWER_BYTES });
      return summarize(checks);
    }

    if (isEmptyAnswer(answer)) {
      checks.push({ name: CHECK_NAMES.NON_EMPTY, passed: false });
      return summarize(checks);
    }

    const table = isTabularAnswer(answer) ? parseTable(answer) : null;
    if (table) {
      checks.push({ name: CHECK_NAMES.ROWS_PRESENT, passed: table.rows.length > 0, rows: table.rows.length });
    } else {
      checks.push({ name: CHECK_NAMES.NON_EMPTY, passed: true });
    }

    checks.push(...runProviderChecks(spec, answer, table));
    return summarize(checks);
  } catch (error) {
    checks.push({ name: CHECK_NAMES.EXCEPTION, passed: false, error: sanitizeError(error) });
    return { passed: false, checks, scoreRunner: 0 };
  }
}
