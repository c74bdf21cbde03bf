export const ChatRole = {
  User: "user",
  Model: "model",
} as const;

export type ChatRole = (typeof ChatRole)[keyof typeof ChatRole];

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export const MODES = ["Student Help", "Doctor Analysis", "Report Result"] as const;

export type Mode = (typeof MODES)[number];

/** One scripted intake question. */
export interface InterviewStep {
  stepId: string;
  question: string;
}

export type InterviewScript = readonly InterviewStep[];

/**
 * Progress of one intake interview.
 * - answers are filled in script order, so currentStep === number of answers
 */
export interface InterviewState {
  /** Identifies this interview instance; changes on restart */
  interviewId: string;

  currentStep: number;

  /** stepId → raw answer */
  answers: Record<string, string>;

  /** Completion-time response, cached so it is requested once per instance */
  diagnosis?: string;
}

/**
 * Everything one user session owns.
 * - created at session start, removed at session end
 */
export interface SessionData {
  id: string;

  /** ISO timestamp */
  createdAt: string;

  /** Student Help conversation, append-only */
  student: ChatMessage[];

  /** Doctor Analysis interview */
  interview: InterviewState;
}
