/**
 * Draft question generation from an admin prompt. Same endpoint and SDK as the judge, lower stakes:
 * no credential gives a stub draft, any failure gives a fallback draft. Never rejects.
 */

import type OpenAI from "openai";
import type { JsonObject, JsonValue, QuestionType } from "../../../../packages/shared/src/types";
import { child } from "../../logger";
import { extractJsonObject } from "../evaluation/jsonExtractor";
import { createChatClient, describeError, extractMessageText } from "../evaluation/llm";
import { GENERATOR_SYSTEM_PROMPT } from "../evaluation/prompts";
import { JudgeConfigSchema, type ChatTransport, type JudgeConfig } from "../evaluation/types";

const log = child({ component: "generator" });

export type GeneratedQuestion = {
  qtype: QuestionType;
  title: string;
  spec: JsonValue;
  rubric: JsonValue;
  idealAnswer: string;
  version: number;
  source: "model" | "stub" | "fallback";
};

const TITLE_PREFIX_CHARS = 40;

function first(obj: JsonObject, keys: readonly string[]): JsonValue | undefined {
  for (const key of keys) {
    const value = obj[key];
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

function fallbackDraft(prompt: string, source: "stub" | "fallback", error?: string): GeneratedQuestion {
  const spec: JsonObject = { prompt };
  if (error) spec.error = error;
  return {
    qtype: "theory",
    title: `Generated: ${prompt.slice(0, TITLE_PREFIX_CHARS)}`,
    spec,
    rubric: {},
    idealAnswer: "",
    version: 1,
    source
  };
}

export function normalizeGeneratedQuestion(parsed: JsonObject, prompt: string): GeneratedQuestion {
  const qtype = first(parsed, ["type", "qtype"]);
  const title = first(parsed, ["title", "name"]);
  const ideal = first(parsed, ["ideal_answer", "answer"]);
  const version = Number(first(parsed, ["version"]) ?? 1);
  return {
    qtype: qtype === "practical" ? "practical" : "theory",
    title: typeof title === "string" && title.trim() ? title : "Untitled Question",
    spec: first(parsed, ["spec", "prompt"]) ?? { prompt },
    rubric: first(parsed, ["rubric"]) ?? {},
    idealAnswer: typeof ideal === "string" ? ideal : "",
    version: Number.isInteger(version) && version >= 1 ? version : 1,
    source: "model"
  };
}

export class QuestionGenerator {
  private readonly config: JudgeConfig;
  private client: OpenAI | null = null;

  constructor(config: JudgeConfig, private readonly transport: ChatTransport = {}) {
    this.config = JudgeConfigSchema.parse(config);
  }

  async generate(prompt: string): Promise<GeneratedQuestion> {
    const credential = this.config.credential;
    if (!credential) return fallbackDraft(prompt, "stub");
    if (!this.client) {
      this.client = createChatClient(this.config, credential, this.transport);
    }

    try {
      const completion: unknown = await this.client.chat.completions.create({
        model: this.config.model,
        temperature: 0.2,
        messages: [
          { role: "system", content: GENERATOR_SYSTEM_PROMPT },
          { role: "user", content: prompt }
        ]
      });
      const parsed = extractJsonObject(extractMessageText(completion));
      if (!parsed) return fallbackDraft(prompt, "fallback", "unparsable response");
      return normalizeGeneratedQuestion(parsed, prompt);
    } catch (error) {
      const detail = describeError(error);
      log.warn({ error: detail }, "Question generation failed");
      return fallbackDraft(prompt, "fallback", detail);
    }
  }
}
