import { NotFoundError, type RecordStore } from "../../db/store";
import { toPublicJudge, toPublicRunner, type PublicJudge, type PublicRunner } from "../evaluation/serialize";

export type ReportEntry = {
  submission_id: string;
  question_id: string;
  created_at: string;
  file_url: string | null;
  /** null while the submission has no grade */
  score: number | null;
  judge: PublicJudge | null;
  runner: PublicRunner | null;
};

export type AssignmentReport = {
  ok: true;
  assignment_id: string;
  candidate: { id: string; name: string; email: string };
  pack: { id: string; name: string };
  started_at: string | null;
  finished_at: string | null;
  submissions: ReportEntry[];
  average_score: number;
};

/** Per-assignment review: submissions in creation order with their grades; average over graded ones. */
export async function buildAssignmentReport(
  store: RecordStore,
  assignmentId: string,
  debug: boolean
): Promise<AssignmentReport> {
  const assignment = await store.getAssignment(assignmentId);
  if (!assignment) throw new NotFoundError("Assignment", assignmentId);

  const [candidate, pack, submissions] = await Promise.all([
    store.getCandidate(assignment.candidateId),
    store.getPack(assignment.packId),
    store.listSubmissions(assignment.id)
  ]);
  if (!candidate) throw new NotFoundError("Candidate", assignment.candidateId);
  if (!pack) throw new NotFoundError("Pack", assignment.packId);

  const entries: ReportEntry[] = [];
  const scores: number[] = [];
  for (const submission of submissions) {
    const grade = await store.getGradeBySubmission(submission.id);
    if (grade) scores.push(grade.score);
    entries.push({
      submission_id: submission.id,
      question_id: submission.questionId,
      created_at: submission.createdAt,
      file_url: submission.fileRef,
      score: grade ? grade.score : null,
      judge: grade ? toPublicJudge(grade.judge, debug) : null,
      runner: grade ? toPublicRunner(grade.runner) : null
    });
  }

  const average = scores.length ? scores.reduce((sum, s) => sum + s, 0) / scores.length : 0;
  return {
    ok: true,
    assignment_id: assignment.id,
    candidate: { id: candidate.id, name: candidate.name, email: candidate.email },
    pack: { id: pack.id, name: pack.name },
    started_at: assignment.startedAt,
    finished_at: assignment.finishedAt,
    submissions: entries,
    average_score: Math.round(average * 100) / 100
  };
}
