/**
 * Public (wire) shapes. Debug bags are dropped here, at the boundary, unless debugging is on.
 */

import type { Grade, JsonObject, JudgeResult, RunnerResult, RunnerCheck } from "../../../../packages/shared/src/types";
import type { ProbeInfo, ProbeResult } from "./healthProbe";

export type PublicJudge = {
  score: number;
  verdict: string;
  mistakes: string[];
  improvements: string[];
  citations: string[];
  debug?: JsonObject;
};

export type PublicRunner = {
  passed: boolean;
  checks: RunnerCheck[];
  score_runner: number;
};

export type GradingResponse = {
  ok: true;
  submission_id: string;
  grade_id: string;
  score: number;
  runner: PublicRunner;
  judge: PublicJudge;
  file_url: string | null;
};

export function toPublicJudge(judge: JudgeResult, debug: boolean): PublicJudge {
  const out: PublicJudge = {
    score: judge.score,
    verdict: judge.verdict,
    mistakes: judge.mistakes,
    improvements: judge.improvements,
    citations: judge.citations
  };
  if (debug && judge.debug) out.debug = judge.debug;
  return out;
}

export function toPublicRunner(runner: RunnerResult): PublicRunner {
  return { passed: runner.passed, checks: runner.checks, score_runner: runner.scoreRunner };
}

export function toGradingResponse(grade: Grade, fileUrl: string | null, debug: boolean): GradingResponse {
  return {
    ok: true,
    submission_id: grade.submissionId,
    grade_id: grade.id,
    score: grade.score,
    runner: toPublicRunner(grade.runner),
    judge: toPublicJudge(grade.judge, debug),
    file_url: fileUrl
  };
}

export function toPublicProbe(result: ProbeResult, debug: boolean): ProbeResult {
  if (debug) return result;
  const { raw_excerpt: _omitted, ...info }: ProbeInfo = result.info;
  return { ok: result.ok, info };
}
