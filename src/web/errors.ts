
import type { NextFunction, Request, RequestHandler, Response } from "express";
import multer from "multer";
import { AppError } from "../core/errors";
import { logError } from "../utils/logger";

/** Lets async handlers hand their failures to errorHandler. */
export function asyncHandler(
  fn: (req: Request, res: Response) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof AppError) {
    if (err.status >= 500) logError(err.code, err.message);
    return res.status(err.status).json({ error: err.code, message: err.message });
  }
  if (err instanceof multer.MulterError) {
    const status = err.code === "LIMIT_FILE_SIZE" ? 413 : 400;
    return res.status(status).json({ error: "invalid_upload", message: err.message });
  }
  if (err instanceof SyntaxError) {
    // express.json() on a malformed body
    return res.status(400).json({ error: "invalid_request", message: "Malformed JSON body" });
  }
  logError("http", err);
  return res.status(500).json({ error: "internal_error" });
}
