
import path from "path";
import { Router } from "express";
import multer from "multer";
import type { Assistant } from "../core/assistant";
import { UploadError } from "../core/errors";
import { asyncHandler } from "./errors";

export const REPORT_EXTENSIONS = ["pdf", "jpg", "jpeg", "png"] as const;

const REPORT_DISCLAIMER =
  "Disclaimer: This is an AI-generated summary for informational purposes only. " +
  "For medical decisions, consult a licensed healthcare provider.";

function hasReportExtension(fileName: string): boolean {
  const ext = path.extname(fileName).slice(1).toLowerCase();
  return REPORT_EXTENSIONS.some((e) => e === ext);
}

export function reportRouter(assistant: Assistant, maxUploadBytes: number): Router {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes, files: 1 },
    fileFilter: (_req, file, cb) => {
      if (hasReportExtension(file.originalname)) return cb(null, true);
      cb(new UploadError(`Unsupported file type; expected one of ${REPORT_EXTENSIONS.join(", ")}`));
    },
  });

  const router = Router();

  router.post("/", upload.single("file"), asyncHandler(async (req, res) => {
    if (!req.file) throw new UploadError("No file");
    const result = await assistant.analyzeReport({
      fileName: req.file.originalname,
      mimeType: req.file.mimetype,
      bytes: req.file.buffer,
    });
    // a failed analysis is reported, not raised
    return res.json({ ...result, disclaimer: REPORT_DISCLAIMER });
  }));

  return router;
}
