import "dotenv/config";

export type LlmProviderSetting = "pollinations" | "deepseek" | "gemini" | "none";

type Env = Record<string, string | undefined>;

function numberFromEnv(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function booleanFromEnv(value: string | undefined, fallback = false): boolean {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "y", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "n", "off"].includes(normalized)) return false;
  return fallback;
}

function stringFromEnv(value: string | undefined, fallback: string): string {
  return value?.trim() || fallback;
}

function llmProviderFromEnv(
  value: string | undefined,
  fallback: LlmProviderSetting = "pollinations",
): LlmProviderSetting {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  if (
    normalized === "pollinations" ||
    normalized === "deepseek" ||
    normalized === "gemini" ||
    normalized === "none"
  ) {
    return normalized;
  }
  return fallback;
}

export function loadConfig(env: Env = process.env) {
  return {
    analyzer: {
      lexiconPath: stringFromEnv(env.EMOTION_LEXICON_PATH, "data/emotion_lexicon.json"),
    },
    llm: {
      provider: llmProviderFromEnv(env.LLM_PROVIDER),
      timeoutMs: numberFromEnv(env.LLM_TIMEOUT_MS, 30000),
      retries: numberFromEnv(env.LLM_RETRIES, 1),
      retryDelayMs: numberFromEnv(env.LLM_RETRY_DELAY_MS, 500),
      circuitBreaker: {
        enabled: booleanFromEnv(env.LLM_CIRCUIT_BREAKER_ENABLED, true),
        failureThreshold: numberFromEnv(env.LLM_CIRCUIT_FAILURE_THRESHOLD, 3),
        openMs: numberFromEnv(env.LLM_CIRCUIT_OPEN_MS, 30000),
      },
      pollinations: {
        baseUrl: stringFromEnv(env.POLLINATIONS_BASE_URL, "https://text.pollinations.ai"),
        model: stringFromEnv(env.POLLINATIONS_MODEL, "openai"),
        seed: numberFromEnv(env.POLLINATIONS_SEED, 42),
      },
      deepseek: {
        apiKey: env.DEEPSEEK_API_KEY?.trim() || "",
        model: stringFromEnv(env.DEEPSEEK_MODEL, "deepseek-chat"),
        baseUrl: stringFromEnv(env.DEEPSEEK_BASE_URL, "https://api.deepseek.com"),
      },
      gemini: {
        apiKey: env.GEMINI_API_KEY?.trim() || "",
        model: stringFromEnv(env.GEMINI_MODEL, "gemini-2.5-flash"),
        baseUrl: env.GEMINI_BASE_URL?.trim() || "",
      },
    },
    story: {
      versionDelayMs: numberFromEnv(env.STORY_VERSION_DELAY_MS, 1000),
      defaultVersions: numberFromEnv(env.STORY_DEFAULT_VERSIONS, 3),
      maxVersions: numberFromEnv(env.STORY_MAX_VERSIONS, 5),
    },
    history: {
      maxEntries: numberFromEnv(env.HISTORY_MAX_ENTRIES, 50),
    },
    report: {
      outputDir: stringFromEnv(env.REPORT_OUTPUT_DIR, "exports"),
    },
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const config: AppConfig = loadConfig();
