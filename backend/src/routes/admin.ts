/**
 * Admin API: candidates, questions (incl. generation and revisions), packs, assignments, judge health.
 * No auth layer; deploy behind the operator network.
 */

import { Router } from "express";
import { z } from "zod";
import { DEFAULT_TIMER_SECONDS, MIN_TIMER_SECONDS, type Question } from "../../../packages/shared/src/types";
import type { AppDeps } from "../deps";
import { validateBody, validateParams } from "../middlewares/validate";
import { toPublicProbe } from "../services/evaluation";
import { buildAssignmentReport } from "../services/reports/assignmentReport";
import { HttpError } from "../utils/httpError";
import { jsonValueSchema } from "../utils/jsonSchema";

const candidateSchema = z.object({
  email: z.string().email(),
  name: z.string().trim().min(1, "name is required").max(120)
});

const questionSchema = z.object({
  title: z.string().trim().min(1, "title is required").max(200),
  qtype: z.enum(["theory", "practical"]),
  spec: jsonValueSchema.default({}),
  rubric: jsonValueSchema.default({}),
  ideal_answer: z.string().nullable().optional()
});

const revisionSchema = z
  .object({
    title: z.string().trim().min(1).max(200),
    qtype: z.enum(["theory", "practical"]),
    spec: jsonValueSchema,
    rubric: jsonValueSchema,
    ideal_answer: z.string().nullable()
  })
  .partial();

const generateSchema = z.object({
  prompt: z.string().trim().min(1).default("Default spreadsheet interview question")
});

const packItemSchema = z.object({
  question_id: z.string().uuid(),
  timer_seconds: z
    .number()
    .int()
    .min(MIN_TIMER_SECONDS, `timer_seconds must be at least ${MIN_TIMER_SECONDS}`)
    .default(DEFAULT_TIMER_SECONDS)
});

const packSchema = z.object({
  name: z.string().trim().min(1).max(120).default("Unnamed Pack"),
  version: z.number().int().min(1).default(1),
  items: z.array(packItemSchema).default([])
});

const questionParams = z.object({ question_id: z.string().uuid("Question not found") });
const packParams = z.object({ pack_id: z.string().uuid("Pack not found") });
const assignmentParams = z.object({ assignment_id: z.string().uuid("Assignment not found") });

const assignmentSchema = z.object({
  candidate_id: z.string().uuid(),
  pack_id: z.string().uuid()
});

export function toPublicQuestion(q: Question) {
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

export function createAdminRouter(deps: AppDeps): Router {
  const { store } = deps;
  const router = Router();

  router.post("/candidates", validateBody(candidateSchema), async (req, res, next) => {
    try {
      const body: z.infer<typeof candidateSchema> = req.body;
      const candidate = await store.createCandidate(body);
      res.status(201).json({ ok: true, candidate_id: candidate.id });
    } catch (e) {
      next(e);
    }
  });

  router.post("/questions", validateBody(questionSchema), async (req, res, next) => {
    try {
      const body: z.infer<typeof questionSchema> = req.body;
      const question = await store.createQuestion({
        title: body.title,
        qtype: body.qtype,
        spec: body.spec,
        rubric: body.rubric,
        idealAnswer: body.ideal_answer ?? null
      });
      res.status(201).json({ ok: true, question: toPublicQuestion(question) });
    } catch (e) {
      next(e);
    }
  });

  router.post("/questions/generate", validateBody(generateSchema), async (req, res, next) => {
    try {
      const body: z.infer<typeof generateSchema> = req.body;
      const draft = await deps.generator.generate(body.prompt);
      res.json({
        ok: true,
        question: {
          type: draft.qtype,
          title: draft.title,
          spec: draft.spec,
          rubric: draft.rubric,
          ideal_answer: draft.idealAnswer,
          version: draft.version,
          source: draft.source
        }
      });
    } catch (e) {
      next(e);
    }
  });

  router.post("/questions/:question_id/revisions", validateParams(questionParams), validateBody(revisionSchema), async (req, res, next) => {
    try {
      const body: z.infer<typeof revisionSchema> = req.body;
      const revised = await store.reviseQuestion(req.params.question_id, {
        title: body.title,
        qtype: body.qtype,
        spec: body.spec,
        rubric: body.rubric,
        idealAnswer: body.ideal_answer
      });
      res.status(201).json({ ok: true, question: toPublicQuestion(revised) });
    } catch (e) {
      next(e);
    }
  });

  router.post("/packs", validateBody(packSchema), async (req, res, next) => {
    try {
      const body: z.infer<typeof packSchema> = req.body;
      const { pack, items } = await store.createPack({
        name: body.name,
        version: body.version,
        items: body.items.map((i) => ({ questionId: i.question_id, timerSeconds: i.timer_seconds }))
      });
      res.status(201).json({
        ok: true,
        pack_id: pack.id,
        items: items.map((i) => ({ id: i.id, question_id: i.questionId, position: i.position, timer_seconds: i.timerSeconds }))
      });
    } catch (e) {
      next(e);
    }
  });

  router.post("/packs/:pack_id/items", validateParams(packParams), validateBody(packItemSchema), async (req, res, next) => {
    try {
      const body: z.infer<typeof packItemSchema> = req.body;
      const pack = await store.getPack(req.params.pack_id);
      if (!pack) throw new HttpError(404, "Pack not found");
      const item = await store.addPackItem(pack.id, { questionId: body.question_id, timerSeconds: body.timer_seconds });
      res.status(201).json({
        ok: true,
        item: { id: item.id, question_id: item.questionId, position: item.position, timer_seconds: item.timerSeconds }
      });
    } catch (e) {
      next(e);
    }
  });

  router.post("/assignments", validateBody(assignmentSchema), async (req, res, next) => {
    try {
      const body: z.infer<typeof assignmentSchema> = req.body;
      const [candidate, pack] = await Promise.all([store.getCandidate(body.candidate_id), store.getPack(body.pack_id)]);
      if (!candidate || !pack) throw new HttpError(400, "Invalid candidate_id or pack_id");
      const assignment = await store.createAssignment({ candidateId: candidate.id, packId: pack.id });
      res.status(201).json({ ok: true, assignment_id: assignment.id });
    } catch (e) {
      next(e);
    }
  });

  router.get("/assignments/:assignment_id/report", validateParams(assignmentParams), async (req, res, next) => {
    try {
      res.json(await buildAssignmentReport(store, req.params.assignment_id, deps.debug));
    } catch (e) {
      next(e);
    }
  });

  router.get("/judge/health", async (_req, res, next) => {
    try {
      const result = await deps.probe.ping(deps.healthTimeoutMs);
      res.json(toPublicProbe(result, deps.debug));
    } catch (e) {
      next(e);
    }
  });

  return router;
}
