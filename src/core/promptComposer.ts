import path from "path";
import { type ChatMessage, ChatRole } from "../types/session";

export const STUDENT_INSTRUCTION =
  "You are a helpful medical assistant. Only answer medical, health, or doctor-related questions. " +
  "If the query is not medical, politely refuse to answer.";

export const NON_MEDICAL_REPORT_REPLY = "Sorry, I can only analyze medical reports.";

export const REPORT_INSTRUCTION =
  "This is a medical report. Please analyze and summarize the key medical findings, " +
  "tests, and any notable results. If this is not a medical report, respond: " +
  `'${NON_MEDICAL_REPORT_REPLY}'`;

export type MediaType = "image/jpeg" | "image/png" | "application/pdf" | "application/octet-stream";

/** Instruction line first, then the whole running conversation. */
export function composeStudentMessages(history: readonly ChatMessage[]): ChatMessage[] {
  return [{ role: ChatRole.User, content: STUDENT_INSTRUCTION }, ...history];
}

export function composeDiagnosticMessages(summary: string): ChatMessage[] {
  const prompt =
    "You are a careful, expert medical AI. Given the following patient history, " +
    "please do the following:\n" +
    "1. Summarize the key findings.\n" +
    "2. List the most likely differential diagnoses (with reasoning).\n" +
    "3. Suggest the most appropriate next diagnostic tests (with justification).\n" +
    "4. Suggest a general plan for management and follow-up.\n" +
    "5. Remind the user that this is not a real diagnosis and they must consult a healthcare provider.\n\n" +
    `Patient history:\n${summary}`;
  return [{ role: ChatRole.User, content: prompt }];
}

/** The uploaded file travels with this message as an attachment. */
export function composeDocumentMessages(): ChatMessage[] {
  return [{ role: ChatRole.User, content: REPORT_INSTRUCTION }];
}

/**
 * Media type for an upload, from its extension, falling back to the declared MIME type.
 */
export function mediaTypeFor(fileName: string, declaredType?: string): MediaType {
  const ext = path.extname(fileName).slice(1).toLowerCase();
  const sub = ext || (declaredType ?? "").split("/").pop()?.toLowerCase() || "";
  switch (sub) {
    case "jpg":
    case "jpeg":
      return "image/jpeg";
    case "png":
      return "image/png";
    case "pdf":
      return "application/pdf";
    default:
      return "application/octet-stream";
  }
}
