import { describe, expect, it } from "vitest";
import {
  composeDiagnosticMessages,
  composeDocumentMessages,
  composeStudentMessages,
  mediaTypeFor,
  NON_MEDICAL_REPORT_REPLY,
  STUDENT_INSTRUCTION,
} from "./promptComposer";
import { type ChatMessage, ChatRole } from "../types/session";

describe("composeStudentMessages", () => {
  it("puts the instruction in front of the whole history", () => {
    const history: ChatMessage[] = [
      { role: ChatRole.User, content: "What causes fever?" },
      { role: ChatRole.Model, content: "Usually an infection." },
      { role: ChatRole.User, content: "And a high fever?" },
    ];
    const messages = composeStudentMessages(history);
    expect(messages).toHaveLength(4);
    expect(messages[0]).toEqual({ role: "user", content: STUDENT_INSTRUCTION });
    expect(messages.slice(1)).toEqual(history);
  });

  it("does not modify the history", () => {
    const history: ChatMessage[] = [{ role: ChatRole.User, content: "pain" }];
    composeStudentMessages(history);
    expect(history).toHaveLength(1);
  });
});

describe("composeDiagnosticMessages", () => {
  it("lists the five tasks and ends with the patient history", () => {
    const [message] = composeDiagnosticMessages("Chief Complaint: cough");
    expect(message.role).toBe("user");
    expect(message.content).toContain("2. List the most likely differential diagnoses (with reasoning).\n");
    expect(message.content).toContain(
      "5. Remind the user that this is not a real diagnosis and they must consult a healthcare provider.\n\n"
    );
    expect(message.content.endsWith("Patient history:\nChief Complaint: cough")).toBe(true);
  });
});

describe("composeDocumentMessages", () => {
  it("asks for a summary with the non-medical fallback reply", () => {
    const messages = composeDocumentMessages();
    expect(messages).toHaveLength(1);
    expect(messages[0].content).toContain(`respond: '${NON_MEDICAL_REPORT_REPLY}'`);
  });
});

describe("mediaTypeFor", () => {
  it("maps report extensions", () => {
    expect(mediaTypeFor("scan.JPG")).toBe("image/jpeg");
    expect(mediaTypeFor("scan.jpeg")).toBe("image/jpeg");
    expect(mediaTypeFor("xray.png")).toBe("image/png");
    expect(mediaTypeFor("labs.pdf")).toBe("application/pdf");
  });

  it("falls back to the declared type when the name has no extension", () => {
    expect(mediaTypeFor("upload", "image/png")).toBe("image/png");
    expect(mediaTypeFor("upload", "application/pdf")).toBe("application/pdf");
  });

  it("uses octet-stream for anything else", () => {
    expect(mediaTypeFor("notes.docx")).toBe("application/octet-stream");
    expect(mediaTypeFor("upload")).toBe("application/octet-stream");
  });
});
