
import { Router } from "express";
import type { Assistant } from "../core/assistant";
import { MODES } from "../types/session";
import { asyncHandler } from "./errors";

const MODE_DESCRIPTIONS = {
  "Student Help": "Ask medical questions and get clear answers. Non-medical queries will not be answered.",
  "Doctor Analysis": "Simulated doctor: step-by-step medical history and possible diagnosis. Strictly medical only.",
  "Report Result": "Upload a medical report (PDF, JPG, PNG) for AI analysis. Non-medical documents will not be processed.",
} as const;

const DISCLAIMER =
  "This tool is for informational and educational purposes only. It does not provide medical advice, " +
  "diagnosis, or treatment. Always consult a qualified healthcare professional for your health concerns.";

export function describeModes() {
  return {
    modes: ["unset", ...MODES],
    descriptions: MODE_DESCRIPTIONS,
    disclaimer: DISCLAIMER,
  };
}

export function sessionRouter(assistant: Assistant): Router {
  const router = Router();

  router.post("/", asyncHandler(async (_req, res) => {
    const s = await assistant.startSession();
    return res.status(201).json({ sessionId: s.id });
  }));

  router.delete("/:sessionId", asyncHandler(async (req, res) => {
    await assistant.endSession(req.params.sessionId);
    return res.status(204).end();
  }));

  return router;
}
