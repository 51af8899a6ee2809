/**
 * Evaluation service: deterministic runner + LLM judge, combined into one Grade per submission.
 * The judge and the health probe take an explicit JudgeConfig; see judgeConfigFromEnv for the env mapping.
 */

export { EvaluationPipeline, combineScores, DEFAULT_SIGNED_URL_TTL_SECONDS } from "./pipeline";
export type { PipelineDeps } from "./pipeline";
export { JudgeClient, FIELD_ALIASES, normalizeJudgeFields, coerceScore, coerceList, degradedResult } from "./judgeClient";
export { HealthProbe } from "./healthProbe";
export type { ProbeInfo, ProbeResult } from "./healthProbe";
export { extractJsonObject } from "./jsonExtractor";
export { toGradingResponse, toPublicJudge, toPublicProbe, toPublicRunner } from "./serialize";
export type { GradingResponse, PublicJudge, PublicRunner } from "./serialize";
export { judgeConfigFromEnv, JudgeConfigSchema, DEGRADED_VERDICTS } from "./types";
export type { Judge, JudgeConfig, ChatTransport } from "./types";
