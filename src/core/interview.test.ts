import { describe, expect, it } from "vitest";
import { InterviewStateError } from "./errors";
import { CHIEF_COMPLAINT_REJECTION, IntakeInterview, newInterviewState } from "./interview";
import { CLINICAL_STEPS, defineScript } from "./interviewScript";

const TWO_STEPS = defineScript([
  { stepId: "Chief Complaint", question: "What brings you in today?" },
  { stepId: "HPI_Onset", question: "When did this problem start?" },
]);

function fresh(script = TWO_STEPS) {
  return new IntakeInterview(script, newInterviewState());
}

describe("IntakeInterview", () => {
  it("starts at the first step with no answers", () => {
    const interview = fresh();
    expect(interview.status()).toEqual({
      kind: "active",
      step: 0,
      total: 2,
      stepId: "Chief Complaint",
      label: "Chief Complaint",
      question: "What brings you in today?",
    });
    expect(interview.state.answers).toEqual({});
  });

  it("runs a two-step interview to completion", () => {
    const interview = fresh();

    const first = interview.submitAnswer("I have a headache");
    expect(first.kind).toBe("advanced");
    expect(interview.state.currentStep).toBe(1);
    expect(interview.status()).toMatchObject({ kind: "active", step: 1, label: "HPI Onset" });

    // only the first step is gated
    const second = interview.submitAnswer("since yesterday");
    expect(second).toEqual({
      kind: "completed",
      summary: "Chief Complaint: I have a headache\nHPI Onset: since yesterday",
    });
    expect(interview.isCompleted).toBe(true);
    expect(interview.status()).toEqual({ kind: "completed", total: 2 });
  });

  it("rejects a non-medical chief complaint without changing state", () => {
    const interview = fresh();
    const result = interview.submitAnswer("What is the capital of France?");
    expect(result).toEqual({
      kind: "rejected",
      message: CHIEF_COMPLAINT_REJECTION,
      status: interview.status(),
    });
    expect(interview.state.currentStep).toBe(0);
    expect(interview.state.answers).toEqual({});
  });

  it("records every step of the clinical script in order", () => {
    const interview = fresh(CLINICAL_STEPS);
    const submitted = CLINICAL_STEPS.map((s, i) => (i === 0 ? "chest pain" : `answer ${i}`));
    for (let i = 0; i < submitted.length; i++) {
      expect(interview.state.currentStep).toBe(i);
      interview.submitAnswer(submitted[i]);
    }
    expect(interview.isCompleted).toBe(true);
    expect(Object.keys(interview.state.answers)).toEqual(CLINICAL_STEPS.map((s) => s.stepId));
    expect(Object.values(interview.state.answers)).toEqual(submitted);

    const lines = interview.summary().split("\n");
    expect(lines).toHaveLength(15);
    expect(lines[0]).toBe("Chief Complaint: chest pain");
    expect(lines[5]).toBe("HPI Aggravating: answer 5");
    expect(lines[14]).toBe("Review of Systems: answer 14");
  });

  it("refuses answers once completed", () => {
    const interview = fresh();
    interview.submitAnswer("fever");
    interview.submitAnswer("two days");
    expect(() => interview.submitAnswer("more")).toThrow(InterviewStateError);
    expect(interview.state.answers).toEqual({ "Chief Complaint": "fever", HPI_Onset: "two days" });
  });

  it("restarts from any step", () => {
    const interview = fresh();
    interview.submitAnswer("fever");
    const before = interview.state.interviewId;

    interview.restart();
    expect(interview.state.currentStep).toBe(0);
    expect(interview.state.answers).toEqual({});
    expect(interview.state.interviewId).not.toBe(before);
  });

  it("restarts a completed interview and drops its diagnosis", () => {
    const interview = fresh();
    interview.submitAnswer("fever");
    interview.submitAnswer("two days");
    interview.state.diagnosis = "cached";

    interview.restart();
    expect(interview.isCompleted).toBe(false);
    expect(interview.state.diagnosis).toBeUndefined();
    expect(interview.state.answers).toEqual({});
  });

  it("treats a second restart as a no-op", () => {
    const interview = fresh();
    interview.submitAnswer("fever");
    interview.restart();
    const once = { ...interview.state, answers: { ...interview.state.answers } };
    interview.restart();
    expect(interview.state).toEqual(once);
  });

  it("lists prior answers with their questions", () => {
    const interview = fresh();
    interview.submitAnswer("sore throat and fever");
    expect(interview.answeredSteps()).toEqual([
      {
        stepId: "Chief Complaint",
        label: "Chief Complaint",
        question: "What brings you in today?",
        answer: "sore throat and fever",
      },
    ]);
  });

  it("rejects a state that does not fit the script", () => {
    expect(() => new IntakeInterview(TWO_STEPS, { interviewId: "x", currentStep: 3, answers: {} })).toThrow(
      InterviewStateError
    );
  });
});
