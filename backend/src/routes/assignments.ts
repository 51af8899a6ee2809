import { Router } from "express";
import { z } from "zod";
import type { AppDeps } from "../deps";
import { validateParams } from "../middlewares/validate";
import { HttpError } from "../utils/httpError";

const assignmentParams = z.object({
  assignment_id: z.string().uuid("Assignment not found")
});

const questionParams = assignmentParams.extend({
  question_id: z.string().uuid("Question not found")
});

/** Candidate-facing assignment flow: start, view one question, finish. */
export function createAssignmentsRouter(deps: AppDeps): Router {
  const { store } = deps;
  const router = Router();

  router.post("/:assignment_id/start", validateParams(assignmentParams), async (req, res, next) => {
    try {
      const id = req.params.assignment_id;
      const existing = await store.getAssignment(id);
      if (!existing) throw new HttpError(404, "Assignment not found");
      const assignment = await store.markAssignmentStarted(id);
      const [candidate, pack] = await Promise.all([
        store.getCandidate(assignment.candidateId),
        store.getPack(assignment.packId)
      ]);
      res.json({
        ok: true,
        assignment_id: assignment.id,
        candidate: candidate ? { id: candidate.id, name: candidate.name } : null,
        pack: pack ? { id: pack.id, name: pack.name } : null,
        started_at: assignment.startedAt
      });
    } catch (e) {
      next(e);
    }
  });

  router.get("/:assignment_id/questions/:question_id", validateParams(questionParams), async (req, res, next) => {
    try {
      const id = req.params.assignment_id;
      const questionId = req.params.question_id;
      const assignment = await store.getAssignment(id);
      if (!assignment) throw new HttpError(404, "Assignment not found");

      const items = await store.listPackItems(assignment.packId);
      const item = items.find((i) => i.questionId === questionId);
      const question = item ? await store.getQuestion(questionId) : null;
      if (!item || !question) throw new HttpError(404, "Question not found in this assignment");

      // rubric and ideal answer stay server-side
      res.json({
        ok: true,
        assignment_id: assignment.id,
        question: {
          id: question.id,
          title: question.title,
          qtype: question.qtype,
          spec: question.spec,
          version: question.version,
          timer_seconds: item.timerSeconds
        }
      });
    } catch (e) {
      next(e);
    }
  });

  router.post("/:assignment_id/finish", validateParams(assignmentParams), async (req, res, next) => {
    try {
      const id = req.params.assignment_id;
      const existing = await store.getAssignment(id);
      if (!existing) throw new HttpError(404, "Assignment not found");
      const assignment = await store.markAssignmentFinished(id);
      res.json({ ok: true, assignment_id: assignment.id, status: "finished", finished_at: assignment.finishedAt });
    } catch (e) {
      next(e);
    }
  });

  return router;
}
