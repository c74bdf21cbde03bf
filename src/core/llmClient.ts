
import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionContentPart,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from "openai/resources/chat/completions";
import { GenerationError } from "./errors";
import type { MediaType } from "./promptComposer";
import { type ChatMessage, ChatRole } from "../types/session";
import { logError } from "../utils/logger";

export interface Attachment {
  bytes: Buffer;
  mediaType: MediaType;
  fileName: string;
}

/**
 * Anything that turns an ordered message history (plus an optional file) into text.
 * Implementations throw GenerationError on any failure.
 */
export interface GenerationClient {
  generate(messages: readonly ChatMessage[], attachment?: Attachment): Promise<string>;
}

/** The slice of the SDK this client calls. */
export interface ChatCompletionsApi {
  create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
}

export interface OpenAIGenerationOptions {
  apiKey: string;
  model: string;
  temperature?: number;
  completions?: ChatCompletionsApi;
}

export class OpenAIGenerationClient implements GenerationClient {
  private readonly completions: ChatCompletionsApi;
  private readonly model: string;
  private readonly temperature: number;

  constructor(opts: OpenAIGenerationOptions) {
    this.completions = opts.completions ?? new OpenAI({ apiKey: opts.apiKey }).chat.completions;
    this.model = opts.model;
    this.temperature = opts.temperature ?? 0.4;
  }

  async generate(messages: readonly ChatMessage[], attachment?: Attachment): Promise<string> {
    let completion: ChatCompletion;
    try {
      completion = await this.completions.create({
        model: this.model,
        messages: toOpenAIMessages(messages, attachment),
        temperature: this.temperature,
      });
    } catch (err: unknown) {
      const status = err instanceof OpenAI.APIError ? err.status : undefined;
      const reason = err instanceof Error ? err.message : String(err);
      logError("llm", { status, reason });
      throw new GenerationError(reason, status, { cause: err });
    }

    const text = completion.choices[0]?.message?.content?.trim();
    if (!text) throw new GenerationError("The model returned an empty response");
    return text;
  }
}

export function toOpenAIMessages(
  messages: readonly ChatMessage[],
  attachment?: Attachment
): ChatCompletionMessageParam[] {
  const out: ChatCompletionMessageParam[] = messages.map((m) =>
    m.role === ChatRole.Model
      ? { role: "assistant", content: m.content }
      : { role: "user", content: m.content }
  );
  if (!attachment) return out;

  // the file rides along with the last user message
  const idx = lastUserIndex(messages);
  const text = idx >= 0 ? messages[idx].content : "";
  const merged: ChatCompletionMessageParam = {
    role: "user",
    content: [{ type: "text", text }, attachmentPart(attachment)],
  };
  if (idx >= 0) out[idx] = merged;
  else out.push(merged);
  return out;
}

function lastUserIndex(messages: readonly ChatMessage[]): number {
  for (let i = messages.length - 1; i >= 0; i--) {
    if (messages[i].role === ChatRole.User) return i;
  }
  return -1;
}

function attachmentPart(a: Attachment): ChatCompletionContentPart {
  const dataUrl = `data:${a.mediaType};base64,${a.bytes.toString("base64")}`;
  if (a.mediaType.startsWith("image/")) {
    return { type: "image_url", image_url: { url: dataUrl } };
  }
  return { type: "file", file: { filename: a.fileName, file_data: dataUrl } };
}
