
import "dotenv/config";
import { createApp } from "./app";
import { AppConfig, loadConfig } from "./config";
import { Assistant } from "./core/assistant";
import { OpenAIGenerationClient } from "./core/llmClient";
import { createSessionStore } from "./core/stateStore";
import { logError, logInfo } from "./utils/logger";

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    // no credential, no service
    logError("config", err instanceof Error ? err.message : err);
    process.exit(1);
  }
}

const config = readConfig();

const assistant = new Assistant({
  store: createSessionStore(config.redisUrl, config.sessionTtlSeconds),
  llm: new OpenAIGenerationClient({ apiKey: config.openaiApiKey, model: config.openaiModel }),
});

const app = createApp(assistant, { maxUploadBytes: config.maxUploadBytes });
app.listen(config.port, () => logInfo("server", `✅ Server on :${config.port}`));
