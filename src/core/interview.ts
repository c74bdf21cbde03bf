import { v4 as uuid } from "uuid";
import { InterviewStateError } from "./errors";
import { isMedical } from "./intentFilter";
import { stepLabel } from "./interviewScript";
import { type AnsweredStep, answeredSteps, buildInterviewSummary } from "./summary";
import type { InterviewScript, InterviewState } from "../types/session";

export const CHIEF_COMPLAINT_REJECTION = "Please answer with your main medical concern.";

export type InterviewStatus =
  | { kind: "active"; step: number; total: number; stepId: string; label: string; question: string }
  | { kind: "completed"; total: number };

export type SubmitResult =
  | { kind: "rejected"; message: string; status: InterviewStatus }
  | { kind: "advanced"; status: InterviewStatus }
  | { kind: "completed"; summary: string };

export function newInterviewState(): InterviewState {
  return { interviewId: uuid(), currentStep: 0, answers: {} };
}

/**
 * Walks a fixed script one accepted answer at a time.
 * Works on the state object it is given, so the caller persists that same object.
 *
 *   Active(0) → Active(1) → … → Completed
 *
 * Only the first step is gated by the medical keyword filter.
 */
export class IntakeInterview {
  constructor(readonly script: InterviewScript, readonly state: InterviewState) {
    if (state.currentStep < 0 || state.currentStep > script.length) {
      throw new InterviewStateError(`Step ${state.currentStep} is outside a ${script.length}-step script`);
    }
  }

  get isCompleted(): boolean {
    return this.state.currentStep >= this.script.length;
  }

  status(): InterviewStatus {
    const total = this.script.length;
    if (this.isCompleted) return { kind: "completed", total };
    const step = this.state.currentStep;
    const { stepId, question } = this.script[step];
    return { kind: "active", step, total, stepId, label: stepLabel(stepId), question };
  }

  submitAnswer(text: string): SubmitResult {
    if (this.isCompleted) {
      throw new InterviewStateError("Interview is already completed; restart to begin a new one");
    }

    const step = this.state.currentStep;
    if (step === 0 && !isMedical(text)) {
      return { kind: "rejected", message: CHIEF_COMPLAINT_REJECTION, status: this.status() };
    }

    this.state.answers[this.script[step].stepId] = text;
    this.state.currentStep = step + 1;

    if (this.isCompleted) return { kind: "completed", summary: this.summary() };
    return { kind: "advanced", status: this.status() };
  }

  /** Back to Active(0). A pristine interview is left as is. */
  restart(): void {
    const pristine =
      this.state.currentStep === 0 &&
      Object.keys(this.state.answers).length === 0 &&
      this.state.diagnosis === undefined;
    if (pristine) return;

    Object.assign(this.state, newInterviewState());
    delete this.state.diagnosis;
  }

  answeredSteps(): AnsweredStep[] {
    return answeredSteps(this.script, this.state.answers);
  }

  summary(): string {
    return buildInterviewSummary(this.script, this.state.answers);
  }
}
