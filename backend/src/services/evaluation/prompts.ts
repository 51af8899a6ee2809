import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type { Question, RunnerResult, Submission } from "../../../../packages/shared/src/types";

export const JUDGE_SYSTEM_PROMPT = `You are an interview answer judge. RETURN ONLY a single valid JSON object and nothing else.
The JSON must contain keys: score (number 0..100), verdict (string), mistakes (array of strings), improvements (array of strings), citations (array of strings).
Do not include any commentary, analysis, or text outside the JSON.
If you cannot produce values for a key, return an empty array or empty string as appropriate.`;

export const PROBE_SYSTEM_PROMPT = 'You are a diagnostic helper. Reply quickly with the single JSON: {"ok": true} (no extra text).';

export const GENERATOR_SYSTEM_PROMPT = `You are a question generator for technical interviews.
Return only valid JSON with these fields: {"type":"theory"|"practical","title":string,"spec":object,"rubric":object,"ideal_answer":string,"version":integer}.
If you cannot produce a dataset for a practical question, set spec.dataset to null.`;

/** Wire shapes sent to the judge; snake_case like the public API. */
export function questionPayload(q: Question) {
  return {
    id: q.id,
    title: q.title,
    qtype: q.qtype,
    spec: q.spec,
    rubric: q.rubric,
    ideal_answer: q.idealAnswer,
    version: q.version
  };
}

export function submissionPayload(s: Submission) {
  return {
    submission_id: s.id,
    answer: s.answer,
    file_url: s.fileRef,
    created_at: s.createdAt
  };
}

export function runnerPayload(r: RunnerResult) {
  return { passed: r.passed, checks: r.checks, score_runner: r.scoreRunner };
}

export function buildJudgeMessages(
  question: Question,
  submission: Submission,
  runner: RunnerResult
): ChatCompletionMessageParam[] {
  const user = [
    `Question:\n${JSON.stringify(questionPayload(question))}`,
    `Submission:\n${JSON.stringify(submissionPayload(submission))}`,
    `Runner checks:\n${JSON.stringify(runnerPayload(runner))}`,
    "Return ONLY the JSON object with keys: score, verdict, mistakes, improvements, citations."
  ].join("\n\n");

  return [
    { role: "system", content: JUDGE_SYSTEM_PROMPT },
    { role: "user", content: user }
  ];
}
