/**
 * LLM judge for a single submission. Calls the reasoning endpoint, recovers the JSON object from its reply
 * and normalizes it into a JudgeResult. Never rejects: missing credential, transport failure and
 * unparsable output all come back as a degraded result with score 0.
 * Guardrails: temperature 0, single-object JSON contract, explicit alias table, score clamped to [0, 100].
 */

import type OpenAI from "openai";
import type {
  DegradedReason,
  JsonObject,
  JsonValue,
  JudgeFields,
  JudgeResult,
  Question,
  RunnerResult,
  Submission
} from "../../../../packages/shared/src/types";
import { child } from "../../logger";
import { extractJsonObject } from "./jsonExtractor";
import { createChatClient, describeError, excerpt, extractMessageText, parseBody } from "./llm";
import { buildJudgeMessages } from "./prompts";
import {
  DEGRADED_VERDICTS,
  JudgeConfigSchema,
  type ChatTransport,
  type Judge,
  type JudgeConfig
} from "./types";

const log = child({ component: "judge" });

type NormalizedField = "score" | "verdict" | "mistakes" | "improvements" | "citations";

/** Accepted keys per field, primary first. The first alias holding a non-null value wins. */
export const FIELD_ALIASES: Record<NormalizedField, readonly string[]> = {
  score: ["score", "grade"],
  verdict: ["verdict", "summary"],
  mistakes: ["mistakes", "errors"],
  improvements: ["improvements", "advice"],
  citations: ["citations", "sources"]
};

function pick(obj: JsonObject, field: NormalizedField): JsonValue | undefined {
  for (const key of FIELD_ALIASES[field]) {
    const value = obj[key];
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

function toText(value: JsonValue): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

export function clampScore(n: number): number {
  return Math.max(0, Math.min(100, n));
}

/** Numbers and numeric strings; booleans count as 1/0; anything else scores 0. */
export function coerceScore(value: JsonValue | undefined): number {
  let n = 0;
  if (typeof value === "number") n = value;
  else if (typeof value === "boolean") n = value ? 1 : 0;
  else if (typeof value === "string" && value.trim() !== "") n = Number(value.trim());
  return Number.isNaN(n) ? 0 : clampScore(n);
}

/** Arrays keep their items (stringified); a lone value becomes a one-element list; absence is []. */
export function coerceList(value: JsonValue | undefined): string[] {
  if (value === undefined || value === null || value === "") return [];
  if (Array.isArray(value)) return value.filter((v) => v !== null).map(toText);
  return [toText(value)];
}

export function normalizeJudgeFields(parsed: JsonObject): Omit<JudgeFields, "debug"> {
  const verdict = pick(parsed, "verdict");
  return {
    score: coerceScore(pick(parsed, "score")),
    verdict: verdict === undefined ? "" : toText(verdict),
    mistakes: coerceList(pick(parsed, "mistakes")),
    improvements: coerceList(pick(parsed, "improvements")),
    citations: coerceList(pick(parsed, "citations"))
  };
}

export function degradedResult(
  reason: DegradedReason,
  detail: { improvements: string[]; debug: JsonObject }
): JudgeResult {
  return {
    status: "degraded",
    reason,
    score: 0,
    verdict: DEGRADED_VERDICTS[reason],
    mistakes: [],
    improvements: detail.improvements,
    citations: [],
    debug: detail.debug
  };
}

type CallOutcome =
  | { success: true; body: unknown; httpStatus: number }
  | { success: false; error: string };

export class JudgeClient implements Judge {
  private readonly config: JudgeConfig;
  private client: OpenAI | null = null;

  constructor(config: JudgeConfig, private readonly transport: ChatTransport = {}) {
    // Invalid configuration is a programmer error; fail at startup.
    this.config = JudgeConfigSchema.parse(config);
  }

  get hasCredential(): boolean {
    return this.config.credential !== undefined;
  }

  private getClient(credential: string): OpenAI {
    if (!this.client) {
      this.client = createChatClient(this.config, credential, this.transport);
    }
    return this.client;
  }

  /**
   * Raw response instead of the SDK's parsed body: a 2xx reply whose JSON is broken must reach the
   * extractor, not surface as a transport error.
   */
  private async call(credential: string, question: Question, submission: Submission, runner: RunnerResult): Promise<CallOutcome> {
    try {
      const response = await this.getClient(credential)
        .chat.completions.create({
          model: this.config.model,
          temperature: 0,
          messages: buildJudgeMessages(question, submission, runner)
        })
        .asResponse();
      if (!response.ok) {
        return { success: false, error: `HTTP ${response.status}` };
      }
      return { success: true, body: parseBody(await response.text()), httpStatus: response.status };
    } catch (error) {
      return { success: false, error: describeError(error) };
    }
  }

  async judge(question: Question, submission: Submission, runner: RunnerResult): Promise<JudgeResult> {
    const credential = this.config.credential;
    if (!credential) {
      return degradedResult("no_api_key", {
        improvements: ["Judge API key not configured on server."],
        debug: { reason: "no_api_key" }
      });
    }

    const outcome = await this.call(credential, question, submission, runner);
    if (!outcome.success) {
      log.warn({ submissionId: submission.id, error: outcome.error }, "Judge request failed");
      return degradedResult("network_error", {
        improvements: [`network_error: ${outcome.error}`],
        debug: { exception: outcome.error }
      });
    }

    const text = extractMessageText(outcome.body);
    const debug: JsonObject = { http_status: outcome.httpStatus, raw_excerpt: excerpt(text) };
    const parsed = extractJsonObject(text);
    if (!parsed) {
      log.warn({ submissionId: submission.id, httpStatus: outcome.httpStatus }, "Judge returned no parseable JSON");
      return degradedResult("unparsable_response", {
        improvements: ["Judge returned an unparsable response."],
        debug
      });
    }

    return { status: "ok", ...normalizeJudgeFields(parsed), debug };
  }
}
