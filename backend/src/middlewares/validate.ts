import { type NextFunction, type Request, type Response } from "express";
import type { ZodTypeAny } from "zod";
import { HttpError } from "../utils/httpError";

type RequestPart = "body" | "params";

function validatePart(part: RequestPart, schema: ZodTypeAny, statusCode: number) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req[part]);
    if (!result.success) {
      const message = result.error.issues.map((i) => i.message).join(", ");
      next(new HttpError(statusCode, message));
      return;
    }
    req[part] = result.data;
    next();
  };
}

export function validateBody(schema: ZodTypeAny) {
  return validatePart("body", schema, 400);
}

/** A malformed path id cannot name a row, so it is a 404 rather than a driver cast error. */
export function validateParams(schema: ZodTypeAny) {
  return validatePart("params", schema, 404);
}
