import { ScriptError } from "./errors";
import type { InterviewScript, InterviewStep } from "../types/session";

/** Ids that collide with Object.prototype when used as answer keys. */
const RESERVED_STEP_IDS = new Set(["__proto__", "constructor", "prototype"]);

/**
 * Clinical history taking, one question per step.
 * CC → HPI (onset … associated) → PMH → meds/allergy → FH → SH → ROS
 */
export const CLINICAL_STEPS: InterviewScript = defineScript([
  { stepId: "Chief Complaint", question: "What brings you in today? What is your main concern?" },
  { stepId: "HPI_Onset", question: "When did this problem start?" },
  { stepId: "HPI_Location", question: "Where is the symptom located?" },
  { stepId: "HPI_Duration", question: "How long does it last? Is it constant or intermittent?" },
  { stepId: "HPI_Character", question: "What does it feel like (e.g., sharp, dull, throbbing, burning)?" },
  { stepId: "HPI_Aggravating", question: "What makes it worse?" },
  { stepId: "HPI_Relieving", question: "What makes it better?" },
  { stepId: "HPI_Timing", question: "Does it occur at a specific time of day?" },
  { stepId: "HPI_Severity", question: "On a scale of 0-10, how bad is it?" },
  { stepId: "HPI_Associated", question: "Are there any other symptoms accompanying the main problem?" },
  { stepId: "PMH", question: "Do you have any chronic conditions, past illnesses, surgeries, or hospitalizations?" },
  { stepId: "Medications", question: "What medications are you currently taking? Any allergies?" },
  { stepId: "Family History", question: "Any significant diseases in your family (e.g., heart disease, diabetes)?" },
  {
    stepId: "Social History",
    question: "Do you smoke, drink alcohol, use recreational drugs? What is your occupation and living situation?",
  },
  {
    stepId: "Review of Systems",
    question: "Do you have any other symptoms in other body systems (e.g., fever, cough, rashes, joint pain, etc.)?",
  },
]);

export function defineScript(steps: readonly InterviewStep[]): InterviewScript {
  if (steps.length === 0) throw new ScriptError("Interview script has no steps");
  const seen = new Set<string>();
  for (const { stepId } of steps) {
    if (!stepId.trim()) throw new ScriptError("Interview step id must not be empty");
    if (RESERVED_STEP_IDS.has(stepId) || stepId in Object.prototype) {
      throw new ScriptError(`Reserved interview step id: ${stepId}`);
    }
    if (seen.has(stepId)) throw new ScriptError(`Duplicate interview step id: ${stepId}`);
    seen.add(stepId);
  }
  return Object.freeze(steps.map((s) => Object.freeze({ ...s })));
}

/** "HPI_Onset" → "HPI Onset" */
export function stepLabel(stepId: string): string {
  return stepId.replace(/_/g, " ");
}
