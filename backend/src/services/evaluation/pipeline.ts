/**
 * Evaluation pipeline for one submission: deterministic runner -> LLM judge -> one persisted Grade.
 * Stateless; uniqueness (one Grade per Submission) is enforced by the grade writer, not here.
 */

import type { Grade, JsonValue, JudgeResult, Question, RunnerResult, Submission } from "../../../../packages/shared/src/types";
import { runChecks } from "../../../../services/runner/src/index";
import type { GradeWriter } from "../../db/store";
import { child } from "../../logger";
import type { ObjectStorage } from "../storage/objectStorage";
import { clampScore } from "./judgeClient";
import type { Judge } from "./types";

const log = child({ component: "pipeline" });

export const DEFAULT_SIGNED_URL_TTL_SECONDS = 300;

export type PipelineDeps = {
  judge: Judge;
  grades: GradeWriter;
  storage?: ObjectStorage | null;
  signedUrlTtlSeconds?: number;
  runner?: (spec: JsonValue, answer: JsonValue) => RunnerResult;
};

/**
 * Judge-only policy: the runner result is kept on the Grade for audit but carries no weight.
 */
export function combineScores(_runner: RunnerResult, judge: JudgeResult): number {
  return clampScore(judge.score);
}

export class EvaluationPipeline {
  private readonly runner: (spec: JsonValue, answer: JsonValue) => RunnerResult;

  constructor(private readonly deps: PipelineDeps) {
    this.runner = deps.runner ?? runChecks;
  }

  /** Signed URL for the attachment when storage is configured; the original reference on any failure. */
  async resolveFileUrl(fileRef: string | null): Promise<string | null> {
    const storage = this.deps.storage;
    if (!fileRef || !storage) return fileRef;
    try {
      return await storage.sign(fileRef, this.deps.signedUrlTtlSeconds ?? DEFAULT_SIGNED_URL_TTL_SECONDS);
    } catch (error) {
      log.warn({ err: error, fileRef }, "Signing attachment failed; using unsigned reference");
      return fileRef;
    }
  }

  async evaluate(question: Question, submission: Submission): Promise<Grade> {
    const runner = this.runner(question.spec, submission.answer);
    const fileUrl = await this.resolveFileUrl(submission.fileRef);
    const judge = await this.deps.judge.judge(question, { ...submission, fileRef: fileUrl }, runner);

    const grade = await this.deps.grades.createGrade({
      submissionId: submission.id,
      score: combineScores(runner, judge),
      runner,
      judge
    });
    log.info({ submissionId: submission.id, score: grade.score, judgeStatus: judge.status }, "Submission graded");
    return grade;
  }
}
