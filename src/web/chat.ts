
import { Router } from "express";
import { z } from "zod";
import type { Assistant } from "../core/assistant";
import { asyncHandler } from "./errors";

const StudentBody = z.object({ message: z.string().refine((s) => s.trim().length > 0) });

export function studentRouter(assistant: Assistant): Router {
  const router = Router();

  router.post("/:sessionId/student", asyncHandler(async (req, res) => {
    const body = StudentBody.safeParse(req.body);
    if (!body.success) {
      return res.status(400).json({ error: "invalid_request", message: "Missing message" });
    }
    const result = await assistant.askStudent(req.params.sessionId, body.data.message);
    return res.json(result);
  }));

  return router;
}
