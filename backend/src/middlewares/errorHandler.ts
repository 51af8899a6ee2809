import { type NextFunction, type Request, type Response } from "express";
import { ZodError } from "zod";
import { HttpError } from "../utils/httpError";
import { GradeConflictError, NotFoundError, UniqueViolationError } from "../db/store";
import { logger } from "../logger";

export function notFoundHandler(_req: Request, _res: Response, next: NextFunction): void {
  next(new HttpError(404, "Route not found"));
}

export function errorHandler(
  error: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (error instanceof HttpError) {
    res.status(error.statusCode).json({ error: error.message });
    return;
  }

  if (error instanceof ZodError) {
    res.status(400).json({ error: error.issues.map((i) => i.message).join(", ") });
    return;
  }

  if (error instanceof GradeConflictError || error instanceof UniqueViolationError) {
    res.status(409).json({ error: error.message });
    return;
  }

  if (error instanceof NotFoundError) {
    res.status(404).json({ error: error.message });
    return;
  }

  logger.error({ err: error }, "Unhandled request error");
  res.status(500).json({ error: "Internal server error" });
}
