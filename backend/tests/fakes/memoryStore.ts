/**
 * In-process RecordStore with the same constraint behavior as PgRecordStore
 * (unique candidate email, one grade per submission, FK-style NotFoundError).
 */

import { randomUUID } from "node:crypto";
import {
  DEFAULT_TIMER_SECONDS,
  type Assignment,
  type Candidate,
  type Grade,
  type Pack,
  type PackItem,
  type Question,
  type Submission
} from "../../../packages/shared/src/types";
import {
  GradeConflictError,
  NotFoundError,
  UniqueViolationError,
  type NewAssignment,
  type NewCandidate,
  type NewGrade,
  type NewPack,
  type NewPackItem,
  type NewQuestion,
  type NewSubmission,
  type QuestionRevision,
  type RecordStore
} from "../../src/db/store";

export class MemoryRecordStore implements RecordStore {
  readonly candidates = new Map<string, Candidate>();
  readonly questions = new Map<string, Question>();
  readonly packs = new Map<string, Pack>();
  readonly packItems: PackItem[] = [];
  readonly assignments = new Map<string, Assignment>();
  readonly submissions: Submission[] = [];
  readonly grades: Grade[] = [];
  private tick = 0;

  /** Strictly increasing timestamps so creation order is stable. */
  private now(): string {
    this.tick += 1;
    return new Date(Date.UTC(2025, 0, 1, 0, 0, this.tick)).toISOString();
  }

  async createCandidate(input: NewCandidate): Promise<Candidate> {
    for (const c of this.candidates.values()) {
      if (c.email === input.email) throw new UniqueViolationError(`Candidate with email ${input.email} already exists`);
    }
    const candidate = { id: randomUUID(), email: input.email, name: input.name };
    this.candidates.set(candidate.id, candidate);
    return candidate;
  }

  async getCandidate(id: string): Promise<Candidate | null> {
    return this.candidates.get(id) ?? null;
  }

  async createQuestion(input: NewQuestion): Promise<Question> {
    const question: Question = {
      id: randomUUID(),
      title: input.title,
      qtype: input.qtype,
      spec: input.spec,
      rubric: input.rubric,
      idealAnswer: input.idealAnswer ?? null,
      version: 1
    };
    this.questions.set(question.id, question);
    return question;
  }

  async getQuestion(id: string): Promise<Question | null> {
    return this.questions.get(id) ?? null;
  }

  async reviseQuestion(id: string, patch: QuestionRevision): Promise<Question> {
    const current = this.questions.get(id);
    if (!current) throw new NotFoundError("Question", id);
    const revised: Question = {
      id: randomUUID(),
      title: patch.title ?? current.title,
      qtype: patch.qtype ?? current.qtype,
      spec: patch.spec ?? current.spec,
      rubric: patch.rubric ?? current.rubric,
      idealAnswer: patch.idealAnswer !== undefined ? patch.idealAnswer : current.idealAnswer,
      version: current.version + 1
    };
    this.questions.set(revised.id, revised);
    return revised;
  }

  async createPack(input: NewPack): Promise<{ pack: Pack; items: PackItem[] }> {
    for (const item of input.items ?? []) {
      if (!this.questions.has(item.questionId)) throw new NotFoundError("Pack or question", item.questionId);
    }
    const pack: Pack = { id: randomUUID(), name: input.name, version: input.version ?? 1 };
    this.packs.set(pack.id, pack);
    const items: PackItem[] = [];
    for (const item of input.items ?? []) {
      items.push(await this.addPackItem(pack.id, item));
    }
    return { pack, items };
  }

  async getPack(id: string): Promise<Pack | null> {
    return this.packs.get(id) ?? null;
  }

  async addPackItem(packId: string, item: NewPackItem): Promise<PackItem> {
    if (!this.packs.has(packId) || !this.questions.has(item.questionId)) {
      throw new NotFoundError("Pack or question", `${packId}/${item.questionId}`);
    }
    const existing = this.packItems.filter((i) => i.packId === packId);
    const packItem: PackItem = {
      id: randomUUID(),
      packId,
      questionId: item.questionId,
      position: existing.reduce((max, i) => Math.max(max, i.position), 0) + 1,
      timerSeconds: item.timerSeconds ?? DEFAULT_TIMER_SECONDS
    };
    this.packItems.push(packItem);
    return packItem;
  }

  async listPackItems(packId: string): Promise<PackItem[]> {
    return this.packItems.filter((i) => i.packId === packId).sort((a, b) => a.position - b.position);
  }

  async createAssignment(input: NewAssignment): Promise<Assignment> {
    if (!this.candidates.has(input.candidateId) || !this.packs.has(input.packId)) {
      throw new NotFoundError("Candidate or pack", `${input.candidateId}/${input.packId}`);
    }
    const assignment: Assignment = {
      id: randomUUID(),
      candidateId: input.candidateId,
      packId: input.packId,
      startedAt: null,
      finishedAt: null
    };
    this.assignments.set(assignment.id, assignment);
    return assignment;
  }

  async getAssignment(id: string): Promise<Assignment | null> {
    return this.assignments.get(id) ?? null;
  }

  async markAssignmentStarted(id: string): Promise<Assignment> {
    const current = this.assignments.get(id);
    if (!current) throw new NotFoundError("Assignment", id);
    const updated = { ...current, startedAt: current.startedAt ?? this.now() };
    this.assignments.set(id, updated);
    return updated;
  }

  async markAssignmentFinished(id: string): Promise<Assignment> {
    const current = this.assignments.get(id);
    if (!current) throw new NotFoundError("Assignment", id);
    const updated = { ...current, finishedAt: current.finishedAt ?? this.now() };
    this.assignments.set(id, updated);
    return updated;
  }

  async createSubmission(input: NewSubmission): Promise<Submission> {
    if (!this.assignments.has(input.assignmentId) || !this.questions.has(input.questionId)) {
      throw new NotFoundError("Assignment or question", `${input.assignmentId}/${input.questionId}`);
    }
    const submission: Submission = {
      id: randomUUID(),
      assignmentId: input.assignmentId,
      questionId: input.questionId,
      answer: input.answer,
      fileRef: input.fileRef ?? null,
      createdAt: this.now()
    };
    this.submissions.push(submission);
    return submission;
  }

  async listSubmissions(assignmentId: string): Promise<Submission[]> {
    return this.submissions.filter((s) => s.assignmentId === assignmentId);
  }

  async createGrade(input: NewGrade): Promise<Grade> {
    if (this.grades.some((g) => g.submissionId === input.submissionId)) {
      throw new GradeConflictError(input.submissionId);
    }
    const grade: Grade = { id: randomUUID(), createdAt: this.now(), ...input };
    this.grades.push(grade);
    return grade;
  }

  async getGradeBySubmission(submissionId: string): Promise<Grade | null> {
    return this.grades.find((g) => g.submissionId === submissionId) ?? null;
  }
}
