import express, { Router } from "express";
import { z } from "zod";
import type { AppDeps } from "../deps";
import { validateBody } from "../middlewares/validate";
import { toGradingResponse } from "../services/evaluation";
import { HttpError } from "../utils/httpError";
import { jsonValueSchema } from "../utils/jsonSchema";

const MAX_UPLOAD_BYTES = "10mb";

const submissionSchema = z.object({
  assignment_id: z.string().trim().min(1),
  question_id: z.string().trim().min(1),
  answer: jsonValueSchema.optional(),
  file_url: z.string().trim().min(1).nullable().optional()
});

const uploadQuerySchema = z.object({
  path: z.string().trim().min(1, "path is required")
});

export function createSubmissionsRouter(deps: AppDeps): Router {
  const { store, pipeline } = deps;
  const router = Router();

  /** Store the answer, then grade it synchronously; responds with the grading result. */
  router.post("/", validateBody(submissionSchema), async (req, res, next) => {
    try {
      const body: z.infer<typeof submissionSchema> = req.body;
      const uuid = z.string().uuid();
      if (!uuid.safeParse(body.assignment_id).success || !uuid.safeParse(body.question_id).success) {
        throw new HttpError(400, "Invalid assignment or question id");
      }
      const [assignment, question] = await Promise.all([
        store.getAssignment(body.assignment_id),
        store.getQuestion(body.question_id)
      ]);
      if (!assignment || !question) throw new HttpError(400, "Invalid assignment or question id");

      const submission = await store.createSubmission({
        assignmentId: assignment.id,
        questionId: question.id,
        answer: body.answer ?? null,
        fileRef: body.file_url ?? null
      });
      const grade = await pipeline.evaluate(question, submission);
      // stored reference, never the signed URL
      res.status(201).json(toGradingResponse(grade, submission.fileRef, deps.debug));
    } catch (e) {
      next(e);
    }
  });

  router.post(
    "/upload",
    express.raw({ type: () => true, limit: MAX_UPLOAD_BYTES }),
    async (req, res, next) => {
      try {
        if (!deps.storage) throw new HttpError(503, "Object storage is not configured");
        const { path } = uploadQuerySchema.parse(req.query);
        const bytes: unknown = req.body;
        if (!(bytes instanceof Buffer) || bytes.length === 0) throw new HttpError(400, "Empty upload body");
        const contentType = req.headers["content-type"] ?? "application/octet-stream";
        const fileUrl = await deps.storage.put(bytes, path, contentType);
        res.status(201).json({ ok: true, file_url: fileUrl });
      } catch (e) {
        next(e);
      }
    }
  );

  return router;
}
