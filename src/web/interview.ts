
import { Router } from "express";
import { z } from "zod";
import type { Assistant } from "../core/assistant";
import { asyncHandler } from "./errors";

// validated, not rewritten: the raw answer goes into the summary
const AnswerBody = z.object({ answer: z.string().refine((s) => s.trim().length > 0) });

export function interviewRouter(assistant: Assistant): Router {
  const router = Router();

  router.get("/:sessionId/interview", asyncHandler(async (req, res) => {
    return res.json(await assistant.viewInterview(req.params.sessionId));
  }));

  router.post("/:sessionId/interview/answers", asyncHandler(async (req, res) => {
    const body = AnswerBody.safeParse(req.body);
    if (!body.success) {
      return res.status(400).json({ error: "invalid_request", message: "Missing answer" });
    }
    return res.json(await assistant.answerInterview(req.params.sessionId, body.data.answer));
  }));

  router.post("/:sessionId/interview/diagnosis", asyncHandler(async (req, res) => {
    return res.json(await assistant.requestDiagnosis(req.params.sessionId));
  }));

  router.post("/:sessionId/interview/restart", asyncHandler(async (req, res) => {
    return res.json(await assistant.restartInterview(req.params.sessionId));
  }));

  return router;
}
