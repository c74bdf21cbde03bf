import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";
import { ConfigError } from "./core/errors";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({ OPENAI_API_KEY: "test-key" })).toEqual({
      openaiApiKey: "test-key",
      openaiModel: "gpt-4o-mini",
      port: 3000,
      redisUrl: undefined,
      sessionTtlSeconds: 86400,
      maxUploadBytes: 10 * 1024 * 1024,
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      OPENAI_API_KEY: "test-key",
      OPENAI_MODEL: "gpt-4o",
      PORT: "8080",
      REDIS_URL: "redis://localhost:6379",
      SESSION_TTL: "600",
    });
    expect(config).toMatchObject({
      openaiModel: "gpt-4o",
      port: 8080,
      redisUrl: "redis://localhost:6379",
      sessionTtlSeconds: 600,
    });
  });

  it("fails without an API key", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ OPENAI_API_KEY: "" })).toThrow(/OPENAI_API_KEY/);
  });

  it("rejects malformed numbers", () => {
    expect(() => loadConfig({ OPENAI_API_KEY: "test-key", PORT: "abc" })).toThrow(/PORT/);
  });
});
