
import express from "express";
import type { Assistant } from "./core/assistant";
import { studentRouter } from "./web/chat";
import { errorHandler } from "./web/errors";
import { interviewRouter } from "./web/interview";
import { reportRouter } from "./web/report";
import { describeModes, sessionRouter } from "./web/sessions";

export interface AppOptions {
  maxUploadBytes: number;
}

export function createApp(assistant: Assistant, opts: AppOptions) {
  const app = express();
  app.use(express.json());

  app.get("/health", (_req, res) => res.status(200).send("ok"));

  app.get("/api/modes", (_req, res) => res.json(describeModes()));

  app.use("/api/sessions", sessionRouter(assistant));
  app.use("/api/sessions", studentRouter(assistant));
  app.use("/api/sessions", interviewRouter(assistant));
  app.use("/api/reports", reportRouter(assistant, opts.maxUploadBytes));

  app.use((_req, res) => res.status(404).json({ error: "not_found" }));
  app.use(errorHandler);
  return app;
}
