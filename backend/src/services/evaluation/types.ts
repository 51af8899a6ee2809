/**
 * Judge configuration and the judge seam used by the pipeline.
 * Configuration is passed in at construction; nothing in the judging path reads the environment.
 */

import { z } from "zod";
import type { Env } from "../../config/env";
import type { Question, RunnerResult, Submission, JudgeResult } from "../../../../packages/shared/src/types";

export const JudgeConfigSchema = z.object({
  endpoint: z.string().url(),
  model: z.string().min(1),
  /** Absent credential is a valid state: the judge answers "unavailable" without calling out. */
  credential: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive()
});

export type JudgeConfig = z.infer<typeof JudgeConfigSchema>;

/** Test seam: the SDK sends every request through this fetch when given. */
export type ChatTransport = {
  fetch?: typeof fetch;
};

export interface Judge {
  /** Never rejects; failures come back as a degraded JudgeResult. */
  judge(question: Question, submission: Submission, runner: RunnerResult): Promise<JudgeResult>;
}

export const RAW_EXCERPT_MAX_CHARS = 400;
export const DEFAULT_PROBE_TIMEOUT_MS = 8_000;

export const DEGRADED_VERDICTS = {
  no_api_key: "unavailable (no credential)",
  network_error: "unavailable (network error)",
  unparsable_response: "unavailable (unparsable response)"
} as const;

export function judgeConfigFromEnv(env: Env, model: string = env.JUDGE_MODEL): JudgeConfig {
  const credential = env.JUDGE_API_KEY?.trim();
  return {
    endpoint: env.JUDGE_ENDPOINT,
    model,
    credential: credential ? credential : undefined,
    timeoutMs: env.JUDGE_TIMEOUT_MS
  };
}
