import { stepLabel } from "./interviewScript";
import type { InterviewScript } from "../types/session";

export interface AnsweredStep {
  stepId: string;
  label: string;
  question: string;
  answer: string;
}

/**
 * Answered steps in script order. Stops at the first unanswered step.
 */
export function answeredSteps(script: InterviewScript, answers: Record<string, string>): AnsweredStep[] {
  const out: AnsweredStep[] = [];
  for (const { stepId, question } of script) {
    if (!Object.hasOwn(answers, stepId)) break;
    out.push({ stepId, label: stepLabel(stepId), question, answer: answers[stepId] });
  }
  return out;
}

/**
 * Patient history handed to the diagnostic prompt, e.g.
 *
 *   Chief Complaint: I have a headache
 *   HPI Onset: since yesterday
 */
export function buildInterviewSummary(script: InterviewScript, answers: Record<string, string>): string {
  return answeredSteps(script, answers)
    .map((s) => `${s.label}: ${s.answer}`)
    .join("\n");
}
