import type { QueryResult, QueryResultRow } from "pg";
import {
  DEFAULT_TIMER_SECONDS,
  type Assignment,
  type Candidate,
  type Grade,
  type JsonValue,
  type JudgeResult,
  type Pack,
  type PackItem,
  type Question,
  type QuestionType,
  type RunnerResult,
  type Submission
} from "../../../packages/shared/src/types";
import { pool } from "./pool";
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
} from "./store";

/** The slice of a pg connection the store uses; `Pool` and `PoolClient` both satisfy it. */
export interface PgQueryable {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface PgClient extends PgQueryable {
  release(): void;
}

export interface PgDatabase extends PgQueryable {
  connect(): Promise<PgClient>;
}

type CandidateRow = { id: string; email: string; name: string };
type QuestionRow = {
  id: string;
  title: string;
  qtype: QuestionType;
  spec: JsonValue;
  rubric: JsonValue;
  ideal_answer: string | null;
  version: number;
};
type PackRow = { id: string; name: string; version: number };
type PackItemRow = { id: string; pack_id: string; question_id: string; position: number; timer_seconds: number };
type AssignmentRow = {
  id: string;
  candidate_id: string;
  pack_id: string;
  started_at: Date | null;
  finished_at: Date | null;
};
type SubmissionRow = {
  id: string;
  assignment_id: string;
  question_id: string;
  answer: JsonValue;
  file_url: string | null;
  created_at: Date;
};
type GradeRow = {
  id: string;
  submission_id: string;
  score: number;
  runner_json: RunnerResult;
  judge_json: JudgeResult;
  created_at: Date;
};

const QUESTION_COLUMNS = "id, title, qtype, spec, rubric, ideal_answer, version";
const PACK_ITEM_COLUMNS = "id, pack_id, question_id, position, timer_seconds";
const ASSIGNMENT_COLUMNS = "id, candidate_id, pack_id, started_at, finished_at";
const SUBMISSION_COLUMNS = "id, assignment_id, question_id, answer, file_url, created_at";
const GRADE_COLUMNS = "id, submission_id, score, runner_json, judge_json, created_at";

function pgErrorCode(e: unknown): string | null {
  if (typeof e === "object" && e !== null && "code" in e && typeof e.code === "string") return e.code;
  return null;
}

const isPgUniqueError = (e: unknown): boolean => pgErrorCode(e) === "23505";
const isPgFkError = (e: unknown): boolean => pgErrorCode(e) === "23503";

function toIso(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

const toQuestion = (r: QuestionRow): Question => ({
  id: r.id,
  title: r.title,
  qtype: r.qtype,
  spec: r.spec,
  rubric: r.rubric,
  idealAnswer: r.ideal_answer,
  version: r.version
});

const toPackItem = (r: PackItemRow): PackItem => ({
  id: r.id,
  packId: r.pack_id,
  questionId: r.question_id,
  position: r.position,
  timerSeconds: r.timer_seconds
});

const toAssignment = (r: AssignmentRow): Assignment => ({
  id: r.id,
  candidateId: r.candidate_id,
  packId: r.pack_id,
  startedAt: toIso(r.started_at),
  finishedAt: toIso(r.finished_at)
});

const toSubmission = (r: SubmissionRow): Submission => ({
  id: r.id,
  assignmentId: r.assignment_id,
  questionId: r.question_id,
  answer: r.answer,
  fileRef: r.file_url,
  createdAt: r.created_at.toISOString()
});

const toGrade = (r: GradeRow): Grade => ({
  id: r.id,
  submissionId: r.submission_id,
  score: Number(r.score),
  runner: r.runner_json,
  judge: r.judge_json,
  createdAt: r.created_at.toISOString()
});

export class PgRecordStore implements RecordStore {
  constructor(private readonly db: PgDatabase = pool) {}

  async createCandidate(input: NewCandidate): Promise<Candidate> {
    try {
      const result = await this.db.query<CandidateRow>(
        "INSERT INTO candidates (email, name) VALUES ($1, $2) RETURNING id, email, name",
        [input.email, input.name]
      );
      return result.rows[0];
    } catch (e) {
      if (isPgUniqueError(e)) throw new UniqueViolationError(`Candidate with email ${input.email} already exists`);
      throw e;
    }
  }

  async getCandidate(id: string): Promise<Candidate | null> {
    const result = await this.db.query<CandidateRow>("SELECT id, email, name FROM candidates WHERE id = $1", [id]);
    return result.rows[0] ?? null;
  }

  async createQuestion(input: NewQuestion): Promise<Question> {
    const result = await this.db.query<QuestionRow>(
      `INSERT INTO questions (title, qtype, spec, rubric, ideal_answer)
       VALUES ($1, $2, $3::jsonb, $4::jsonb, $5)
       RETURNING ${QUESTION_COLUMNS}`,
      [input.title, input.qtype, JSON.stringify(input.spec), JSON.stringify(input.rubric), input.idealAnswer ?? null]
    );
    return toQuestion(result.rows[0]);
  }

  async getQuestion(id: string): Promise<Question | null> {
    const result = await this.db.query<QuestionRow>(`SELECT ${QUESTION_COLUMNS} FROM questions WHERE id = $1`, [id]);
    const row = result.rows[0];
    return row ? toQuestion(row) : null;
  }

  async reviseQuestion(id: string, patch: QuestionRevision): Promise<Question> {
    const current = await this.getQuestion(id);
    if (!current) throw new NotFoundError("Question", id);

    const result = await this.db.query<QuestionRow>(
      `INSERT INTO questions (title, qtype, spec, rubric, ideal_answer, version, previous_version_id)
       VALUES ($1, $2, $3::jsonb, $4::jsonb, $5, $6, $7)
       RETURNING ${QUESTION_COLUMNS}`,
      [
        patch.title ?? current.title,
        patch.qtype ?? current.qtype,
        JSON.stringify(patch.spec ?? current.spec),
        JSON.stringify(patch.rubric ?? current.rubric),
        patch.idealAnswer !== undefined ? patch.idealAnswer : current.idealAnswer,
        current.version + 1,
        current.id
      ]
    );
    return toQuestion(result.rows[0]);
  }

  async createPack(input: NewPack): Promise<{ pack: Pack; items: PackItem[] }> {
    const client = await this.db.connect();
    try {
      await client.query("BEGIN");
      const packResult = await client.query<PackRow>(
        "INSERT INTO packs (name, version) VALUES ($1, $2) RETURNING id, name, version",
        [input.name, input.version ?? 1]
      );
      const pack = packResult.rows[0];
      const items: PackItem[] = [];
      for (const item of input.items ?? []) {
        items.push(await this.insertPackItem(client, pack.id, item));
      }
      await client.query("COMMIT");
      return { pack, items };
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async getPack(id: string): Promise<Pack | null> {
    const result = await this.db.query<PackRow>("SELECT id, name, version FROM packs WHERE id = $1", [id]);
    return result.rows[0] ?? null;
  }

  async addPackItem(packId: string, item: NewPackItem): Promise<PackItem> {
    const client = await this.db.connect();
    try {
      return await this.insertPackItem(client, packId, item);
    } finally {
      client.release();
    }
  }

  private async insertPackItem(client: PgQueryable, packId: string, item: NewPackItem): Promise<PackItem> {
    try {
      const result = await client.query<PackItemRow>(
        `INSERT INTO pack_items (pack_id, question_id, position, timer_seconds)
         VALUES ($1, $2, COALESCE((SELECT MAX(position) FROM pack_items WHERE pack_id = $1), 0) + 1, $3)
         RETURNING ${PACK_ITEM_COLUMNS}`,
        [packId, item.questionId, item.timerSeconds ?? DEFAULT_TIMER_SECONDS]
      );
      return toPackItem(result.rows[0]);
    } catch (e) {
      if (isPgFkError(e)) throw new NotFoundError("Pack or question", `${packId}/${item.questionId}`);
      throw e;
    }
  }

  async listPackItems(packId: string): Promise<PackItem[]> {
    const result = await this.db.query<PackItemRow>(
      `SELECT ${PACK_ITEM_COLUMNS} FROM pack_items WHERE pack_id = $1 ORDER BY position`,
      [packId]
    );
    return result.rows.map(toPackItem);
  }

  async createAssignment(input: NewAssignment): Promise<Assignment> {
    try {
      const result = await this.db.query<AssignmentRow>(
        `INSERT INTO assignments (candidate_id, pack_id) VALUES ($1, $2) RETURNING ${ASSIGNMENT_COLUMNS}`,
        [input.candidateId, input.packId]
      );
      return toAssignment(result.rows[0]);
    } catch (e) {
      if (isPgFkError(e)) throw new NotFoundError("Candidate or pack", `${input.candidateId}/${input.packId}`);
      throw e;
    }
  }

  async getAssignment(id: string): Promise<Assignment | null> {
    const result = await this.db.query<AssignmentRow>(
      `SELECT ${ASSIGNMENT_COLUMNS} FROM assignments WHERE id = $1`,
      [id]
    );
    const row = result.rows[0];
    return row ? toAssignment(row) : null;
  }

  async markAssignmentStarted(id: string): Promise<Assignment> {
    return this.updateAssignment(id, "started_at = COALESCE(started_at, NOW())");
  }

  async markAssignmentFinished(id: string): Promise<Assignment> {
    return this.updateAssignment(id, "finished_at = COALESCE(finished_at, NOW())");
  }

  private async updateAssignment(id: string, setClause: string): Promise<Assignment> {
    const result = await this.db.query<AssignmentRow>(
      `UPDATE assignments SET ${setClause} WHERE id = $1 RETURNING ${ASSIGNMENT_COLUMNS}`,
      [id]
    );
    const row = result.rows[0];
    if (!row) throw new NotFoundError("Assignment", id);
    return toAssignment(row);
  }

  async createSubmission(input: NewSubmission): Promise<Submission> {
    try {
      const result = await this.db.query<SubmissionRow>(
        `INSERT INTO submissions (assignment_id, question_id, answer, file_url)
         VALUES ($1, $2, $3::jsonb, $4)
         RETURNING ${SUBMISSION_COLUMNS}`,
        [input.assignmentId, input.questionId, JSON.stringify(input.answer), input.fileRef ?? null]
      );
      return toSubmission(result.rows[0]);
    } catch (e) {
      if (isPgFkError(e)) throw new NotFoundError("Assignment or question", `${input.assignmentId}/${input.questionId}`);
      throw e;
    }
  }

  async listSubmissions(assignmentId: string): Promise<Submission[]> {
    const result = await this.db.query<SubmissionRow>(
      `SELECT ${SUBMISSION_COLUMNS} FROM submissions WHERE assignment_id = $1 ORDER BY created_at, id`,
      [assignmentId]
    );
    return result.rows.map(toSubmission);
  }

  async createGrade(grade: NewGrade): Promise<Grade> {
    try {
      const result = await this.db.query<GradeRow>(
        `INSERT INTO grades (submission_id, score, runner_json, judge_json)
         VALUES ($1, $2, $3::jsonb, $4::jsonb)
         RETURNING ${GRADE_COLUMNS}`,
        [grade.submissionId, grade.score, JSON.stringify(grade.runner), JSON.stringify(grade.judge)]
      );
      return toGrade(result.rows[0]);
    } catch (e) {
      if (isPgUniqueError(e)) throw new GradeConflictError(grade.submissionId);
      if (isPgFkError(e)) throw new NotFoundError("Submission", grade.submissionId);
      throw e;
    }
  }

  async getGradeBySubmission(submissionId: string): Promise<Grade | null> {
    const result = await this.db.query<GradeRow>(
      `SELECT ${GRADE_COLUMNS} FROM grades WHERE submission_id = $1`,
      [submissionId]
    );
    const row = result.rows[0];
    return row ? toGrade(row) : null;
  }
}
