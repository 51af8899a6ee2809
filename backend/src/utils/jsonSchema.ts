import { z } from "zod";
import type { JsonValue } from "../../../packages/shared/src/types";

/** Any JSON value; used for the opaque `spec`, `rubric` and `answer` payloads. */
export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);
