import type OpenAI from "openai";
import { APIError } from "openai";
import { createChatClient, describeError, excerpt, parseBody } from "./llm";
import { PROBE_SYSTEM_PROMPT } from "./prompts";
import { DEFAULT_PROBE_TIMEOUT_MS, JudgeConfigSchema, type ChatTransport, type JudgeConfig } from "./types";

export type ProbeInfo = {
  error?: "no_api_key";
  http_status?: number;
  time_ms?: number;
  /** A JSON body came back (liveness only; the judge schema is not checked). */
  parsed?: boolean;
  /** Diagnostic only; stripped outside debugging contexts. */
  raw_excerpt?: string;
  exception?: string;
};

export type ProbeResult = { ok: boolean; info: ProbeInfo };

/**
 * Liveness check against the judge endpoint: one tiny completion, ok when the transport is 2xx
 * and the body is JSON.
 */
export class HealthProbe {
  private readonly config: JudgeConfig;
  private client: OpenAI | null = null;

  constructor(
    config: JudgeConfig,
    private readonly transport: ChatTransport = {},
    private readonly now: () => number = Date.now
  ) {
    this.config = JudgeConfigSchema.parse(config);
  }

  async ping(timeoutMs: number = DEFAULT_PROBE_TIMEOUT_MS): Promise<ProbeResult> {
    const credential = this.config.credential;
    if (!credential) {
      return { ok: false, info: { error: "no_api_key" } };
    }
    if (!this.client) {
      this.client = createChatClient(this.config, credential, this.transport);
    }
    const client = this.client;

    const started = this.now();
    try {
      const response = await client.chat.completions
        .create(
          {
            model: this.config.model,
            temperature: 0,
            max_tokens: 8,
            messages: [
              { role: "system", content: PROBE_SYSTEM_PROMPT },
              { role: "user", content: "health-check" }
            ]
          },
          { timeout: timeoutMs }
        )
        .asResponse();
      const text = await response.text();
      const time_ms = this.now() - started;
      const body = parseBody(text);
      const parsed = typeof body === "object" && body !== null;
      return {
        ok: response.ok && parsed,
        info: { http_status: response.status, time_ms, parsed, raw_excerpt: excerpt(text) }
      };
    } catch (error) {
      const time_ms = this.now() - started;
      const info: ProbeInfo = { exception: describeError(error), time_ms };
      if (error instanceof APIError && typeof error.status === "number") {
        info.http_status = error.status;
      }
      return { ok: false, info };
    }
  }
}
