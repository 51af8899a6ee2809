/**
 * Shared domain types for the evaluation core (questions, submissions, runner/judge results, grades).
 * Used by backend and runner; `spec`, `rubric` and `answer` stay opaque JSON since providers define their shape.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type QuestionType = "theory" | "practical";

export interface Question {
  id: string;
  title: string;
  qtype: QuestionType;
  spec: JsonValue;
  rubric: JsonValue;
  idealAnswer: string | null;
  version: number;
}

export interface Submission {
  id: string;
  assignmentId: string;
  questionId: string;
  answer: JsonValue;
  /** Pointer to externally stored bytes; not owned by the pipeline. */
  fileRef: string | null;
  createdAt: string;
}

/** One deterministic check. Extra keys carry detail (e.g. `rows`, `error`). */
export type RunnerCheck = {
  name: string;
  passed: boolean;
  [detail: string]: JsonValue;
};

export interface RunnerResult {
  passed: boolean;
  checks: RunnerCheck[];
  /** 0-100 */
  scoreRunner: number;
}

export type DegradedReason = "no_api_key" | "network_error" | "unparsable_response";

export interface JudgeFields {
  /** Always within [0, 100]. */
  score: number;
  verdict: string;
  mistakes: string[];
  improvements: string[];
  citations: string[];
  debug?: JsonObject;
}

export type JudgeResult =
  | (JudgeFields & { status: "ok" })
  | (JudgeFields & { status: "degraded"; reason: DegradedReason });

export interface Grade {
  id: string;
  submissionId: string;
  /** 0-100 */
  score: number;
  runner: RunnerResult;
  judge: JudgeResult;
  createdAt: string;
}

export interface Candidate {
  id: string;
  email: string;
  name: string;
}

export interface Pack {
  id: string;
  name: string;
  version: number;
}

export interface PackItem {
  id: string;
  packId: string;
  questionId: string;
  position: number;
  timerSeconds: number;
}

export interface Assignment {
  id: string;
  candidateId: string;
  packId: string;
  startedAt: string | null;
  finishedAt: string | null;
}

export const MIN_TIMER_SECONDS = 10;
export const DEFAULT_TIMER_SECONDS = 180;
