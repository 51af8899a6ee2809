/**
 * Record store contract. Routes and the evaluation pipeline depend on this interface only;
 * PgRecordStore is the production implementation.
 */

import type {
  Assignment,
  Candidate,
  Grade,
  JsonValue,
  JudgeResult,
  Pack,
  PackItem,
  Question,
  QuestionType,
  RunnerResult,
  Submission
} from "../../../packages/shared/src/types";

export type NewCandidate = { email: string; name: string };

export type NewQuestion = {
  title: string;
  qtype: QuestionType;
  spec: JsonValue;
  rubric: JsonValue;
  idealAnswer?: string | null;
};

export type QuestionRevision = Partial<NewQuestion>;

export type NewPackItem = { questionId: string; timerSeconds?: number };

export type NewPack = { name: string; version?: number; items?: NewPackItem[] };

export type NewAssignment = { candidateId: string; packId: string };

export type NewSubmission = {
  assignmentId: string;
  questionId: string;
  answer: JsonValue;
  fileRef?: string | null;
};

export type NewGrade = {
  submissionId: string;
  score: number;
  runner: RunnerResult;
  judge: JudgeResult;
};

export class NotFoundError extends Error {
  constructor(
    public readonly entity: string,
    public readonly id: string
  ) {
    super(`${entity} ${id} not found`);
    this.name = "NotFoundError";
  }
}

export class UniqueViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UniqueViolationError";
  }
}

/** A submission already has a grade; grades are one-to-one and immutable. */
export class GradeConflictError extends Error {
  constructor(public readonly submissionId: string) {
    super(`Submission ${submissionId} has already been graded`);
    this.name = "GradeConflictError";
  }
}

export interface GradeWriter {
  /** Single insert. Rejects with GradeConflictError when the submission is already graded. */
  createGrade(grade: NewGrade): Promise<Grade>;
}

export interface RecordStore extends GradeWriter {
  /** Rejects with UniqueViolationError on a duplicate email. */
  createCandidate(input: NewCandidate): Promise<Candidate>;
  getCandidate(id: string): Promise<Candidate | null>;

  createQuestion(input: NewQuestion): Promise<Question>;
  getQuestion(id: string): Promise<Question | null>;
  /** Creates a new question row with `version + 1`; the original stays untouched. */
  reviseQuestion(id: string, patch: QuestionRevision): Promise<Question>;

  createPack(input: NewPack): Promise<{ pack: Pack; items: PackItem[] }>;
  getPack(id: string): Promise<Pack | null>;
  addPackItem(packId: string, item: NewPackItem): Promise<PackItem>;
  listPackItems(packId: string): Promise<PackItem[]>;

  createAssignment(input: NewAssignment): Promise<Assignment>;
  getAssignment(id: string): Promise<Assignment | null>;
  /** Sets started_at if not already set. */
  markAssignmentStarted(id: string): Promise<Assignment>;
  markAssignmentFinished(id: string): Promise<Assignment>;

  createSubmission(input: NewSubmission): Promise<Submission>;
  /** Ordered by created_at ascending. */
  listSubmissions(assignmentId: string): Promise<Submission[]>;

  getGradeBySubmission(submissionId: string): Promise<Grade | null>;
}
