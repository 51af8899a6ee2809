import express from "express";
import { env } from "./config/env";
import type { AppDeps } from "./deps";
import { errorHandler, notFoundHandler } from "./middlewares/errorHandler";
import { createAdminRouter } from "./routes/admin";
import { createAssignmentsRouter } from "./routes/assignments";
import { createSubmissionsRouter } from "./routes/submissions";

const ALLOWED_ORIGINS = env.FRONTEND_ORIGIN
  .split(",")
  .map((o) => o.trim())
  .filter(Boolean);

export function createApp(deps: AppDeps) {
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.use((req, res, next) => {
    const origin = req.headers.origin;
    if (origin && ALLOWED_ORIGINS.includes(origin)) {
      res.setHeader("Access-Control-Allow-Origin", origin);
    }
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");
    if (req.method === "OPTIONS") {
      return res.sendStatus(204);
    }
    next();
  });

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.use("/api/admin", createAdminRouter(deps));
  app.use("/api/assignments", createAssignmentsRouter(deps));
  app.use("/api/submissions", createSubmissionsRouter(deps));
  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
