import { GenerationError, InterviewStateError } from "./errors";
import { isMedical } from "./intentFilter";
import { IntakeInterview, type InterviewStatus } from "./interview";
import { CLINICAL_STEPS } from "./interviewScript";
import type { Attachment, GenerationClient } from "./llmClient";
import {
  composeDiagnosticMessages,
  composeDocumentMessages,
  composeStudentMessages,
  mediaTypeFor,
} from "./promptComposer";
import type { SessionStore } from "./stateStore";
import type { AnsweredStep } from "./summary";
import { type ChatMessage, ChatRole, type InterviewScript, type SessionData } from "../types/session";
import { logInfo, logWarn } from "../utils/logger";

export const STUDENT_REJECTION = "Please ask only medical-related questions. Non-medical queries are not supported.";

export type StudentReply =
  | { kind: "rejected"; message: string }
  | { kind: "answered"; reply: string; history: ChatMessage[] };

export interface InterviewView {
  interviewId: string;
  status: InterviewStatus;
  answered: AnsweredStep[];
  /** Present once the interview is completed */
  summary?: string;
  diagnosis?: string;
}

export type InterviewAnswerResult =
  | { kind: "rejected"; message: string; view: InterviewView }
  | { kind: "advanced"; view: InterviewView }
  /** error is set when the diagnostic call failed; the interview stays completed */
  | { kind: "completed"; view: InterviewView; error?: string }
  /** the interview was restarted before its diagnosis arrived; view shows the new one */
  | { kind: "superseded"; view: InterviewView };

export interface ReportFile {
  fileName: string;
  mimeType?: string;
  bytes: Buffer;
}

export type ReportResult =
  | { kind: "analyzed"; analysis: string }
  | { kind: "failed"; message: string };

export interface AssistantDeps {
  store: SessionStore;
  llm: GenerationClient;
  script?: InterviewScript;
}

/**
 * Handlers for the three modes. Each call is one user action; nothing here
 * runs because a view was rendered.
 */
export class Assistant {
  private readonly store: SessionStore;
  private readonly llm: GenerationClient;
  private readonly script: InterviewScript;
  /** sessionId:interviewId → diagnosis run in flight (generate, then save) */
  private readonly pendingDiagnoses = new Map<string, Promise<SessionData>>();

  constructor(deps: AssistantDeps) {
    this.store = deps.store;
    this.llm = deps.llm;
    this.script = deps.script ?? CLINICAL_STEPS;
  }

  async startSession(): Promise<SessionData> {
    const s = await this.store.create();
    logInfo("session", { event: "start", sessionId: s.id });
    return s;
  }

  async endSession(sessionId: string): Promise<void> {
    await this.store.delete(sessionId);
    logInfo("session", { event: "end", sessionId });
  }

  // ---- Student Help ----

  async askStudent(sessionId: string, question: string): Promise<StudentReply> {
    const s = await this.store.get(sessionId);
    if (!isMedical(question)) {
      return { kind: "rejected", message: STUDENT_REJECTION };
    }

    const userMessage: ChatMessage = { role: ChatRole.User, content: question };
    const reply = await this.llm.generate(composeStudentMessages([...s.student, userMessage]));

    s.student.push(userMessage, { role: ChatRole.Model, content: reply });
    await this.store.save(s);
    return { kind: "answered", reply, history: s.student };
  }

  // ---- Doctor Analysis ----

  async viewInterview(sessionId: string): Promise<InterviewView> {
    const s = await this.store.get(sessionId);
    return this.view(s);
  }

  async answerInterview(sessionId: string, answer: string): Promise<InterviewAnswerResult> {
    const s = await this.store.get(sessionId);
    const interview = this.interviewOf(s);
    const result = interview.submitAnswer(answer);

    if (result.kind === "rejected") {
      return { kind: "rejected", message: result.message, view: this.view(s) };
    }

    await this.store.save(s);
    if (result.kind === "advanced") {
      return { kind: "advanced", view: this.view(s) };
    }

    logInfo("interview", { event: "completed", sessionId, interviewId: s.interview.interviewId });
    try {
      const view = this.view(await this.diagnose(s));
      if (view.interviewId !== s.interview.interviewId) return { kind: "superseded", view };
      return { kind: "completed", view };
    } catch (err) {
      if (!(err instanceof GenerationError)) throw err;
      logWarn("interview", { event: "diagnosis_failed", sessionId, reason: err.message });
      return { kind: "completed", view: this.view(s), error: err.message };
    }
  }

  /** Cached diagnosis, or the one call for this interview instance. */
  async requestDiagnosis(sessionId: string): Promise<InterviewView> {
    const s = await this.store.get(sessionId);
    return this.view(await this.diagnose(s));
  }

  async restartInterview(sessionId: string): Promise<InterviewView> {
    const s = await this.store.get(sessionId);
    this.interviewOf(s).restart();
    await this.store.save(s);
    return this.view(s);
  }

  // ---- Report Result ----

  async analyzeReport(file: ReportFile): Promise<ReportResult> {
    const attachment: Attachment = {
      bytes: file.bytes,
      mediaType: mediaTypeFor(file.fileName, file.mimeType),
      fileName: file.fileName,
    };
    try {
      const analysis = await this.llm.generate(composeDocumentMessages(), attachment);
      return { kind: "analyzed", analysis };
    } catch (err) {
      if (!(err instanceof GenerationError)) throw err;
      return { kind: "failed", message: `Failed to analyze the report: ${err.message}` };
    }
  }

  private interviewOf(s: SessionData): IntakeInterview {
    return new IntakeInterview(this.script, s.interview);
  }

  private view(s: SessionData): InterviewView {
    const interview = this.interviewOf(s);
    const view: InterviewView = {
      interviewId: s.interview.interviewId,
      status: interview.status(),
      answered: interview.answeredSteps(),
    };
    if (interview.isCompleted) {
      view.summary = interview.summary();
      if (s.interview.diagnosis !== undefined) view.diagnosis = s.interview.diagnosis;
    }
    return view;
  }

  /**
   * Returns the session with its diagnosis filled in.
   * Concurrent callers for the same interview share one run, and the run stays
   * shared until its result is saved.
   */
  private diagnose(s: SessionData): Promise<SessionData> {
    const interview = this.interviewOf(s);
    if (!interview.isCompleted) {
      return Promise.reject(
        new InterviewStateError("Diagnosis is available once every interview question is answered")
      );
    }
    if (s.interview.diagnosis !== undefined) return Promise.resolve(s);

    const k = `${s.id}:${s.interview.interviewId}`;
    let pending = this.pendingDiagnoses.get(k);
    if (!pending) {
      pending = this.runDiagnosis(s.id, s.interview.interviewId).finally(() => this.pendingDiagnoses.delete(k));
      this.pendingDiagnoses.set(k, pending);
    }
    return pending;
  }

  private async runDiagnosis(sessionId: string, interviewId: string): Promise<SessionData> {
    // a run that just finished may already have saved its result
    const current = await this.store.get(sessionId);
    if (current.interview.interviewId !== interviewId || current.interview.diagnosis !== undefined) {
      return current;
    }

    const diagnosis = await this.llm.generate(composeDiagnosticMessages(this.interviewOf(current).summary()));

    // the interview may have been restarted while we waited
    const latest = await this.store.get(sessionId);
    if (latest.interview.interviewId !== interviewId) return latest;
    if (latest.interview.diagnosis === undefined) {
      latest.interview.diagnosis = diagnosis;
      await this.store.save(latest);
    }
    return latest;
  }
}
