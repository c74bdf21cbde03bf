import { z } from "zod";
import { ConfigError } from "./core/errors";

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().trim().min(1, "OPENAI_API_KEY is required"),
  OPENAI_MODEL: z.string().trim().min(1).default("gpt-4o-mini"),
  PORT: z.coerce.number().int().positive().default(3000),
  REDIS_URL: z.string().trim().min(1).optional(),
  SESSION_TTL: z.coerce.number().int().positive().default(86400),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
});

export interface AppConfig {
  openaiApiKey: string;
  openaiModel: string;
  port: number;
  redisUrl?: string;
  sessionTtlSeconds: number;
  maxUploadBytes: number;
}

/**
 * Reads settings from the environment. Throws ConfigError when the API key
 * (or any other value) is missing or malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // treat blank values as unset
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }
  const e = parsed.data;
  return {
    openaiApiKey: e.OPENAI_API_KEY,
    openaiModel: e.OPENAI_MODEL,
    port: e.PORT,
    redisUrl: e.REDIS_URL,
    sessionTtlSeconds: e.SESSION_TTL,
    maxUploadBytes: e.MAX_UPLOAD_BYTES,
  };
}
