
/**
 * Base class for failures the service knows how to report.
 * - status: HTTP status the web layer answers with
 * - code: stable machine-readable identifier sent as `error`
 */
export class AppError extends Error {
  constructor(message: string, readonly status: number, readonly code: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing or malformed environment. Fatal at startup. */
export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 500, "config_error");
  }
}

export class ScriptError extends AppError {
  constructor(message: string) {
    super(message, 500, "script_error");
  }
}

export class SessionNotFoundError extends AppError {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} not found`, 404, "session_not_found");
  }
}

export class InterviewStateError extends AppError {
  constructor(message: string) {
    super(message, 409, "interview_state");
  }
}

export class UploadError extends AppError {
  constructor(message: string) {
    super(message, 400, "invalid_upload");
  }
}

/**
 * The remote model call failed (network, quota, content policy) or came back empty.
 * Callers keep their state untouched so the user can simply re-submit.
 */
export class GenerationError extends AppError {
  constructor(message: string, readonly upstreamStatus?: number, options?: { cause?: unknown }) {
    super(message, 502, "generation_failed");
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}
