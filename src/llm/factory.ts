import { config, type AppConfig } from "../config";
import { DeepSeekClient } from "./deepseek_client";
import { GeminiClient } from "./gemini_client";
import { PollinationsClient } from "./pollinations_client";
import type { LlmClient } from "./types";

export function createLlmClientFromConfig(appConfig: AppConfig = config): LlmClient | null {
  const llm = appConfig.llm;
  switch (llm.provider) {
    case "none":
      return null;
    case "gemini":
      return new GeminiClient({ ...llm.gemini, timeoutMs: llm.timeoutMs });
    case "deepseek":
      return new DeepSeekClient({ ...llm.deepseek, timeoutMs: llm.timeoutMs });
    case "pollinations":
      return new PollinationsClient({ ...llm.pollinations, timeoutMs: llm.timeoutMs });
  }
}

export function getLlmSetupSummary(client: LlmClient | null): string {
  if (!client) {
    return "llm.provider=none (未启用)";
  }
  return `llm.provider=${client.provider} model=${client.model} configured=${client.configured}`;
}
